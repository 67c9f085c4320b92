import type * as v from "valibot";

import type { ErrorRecord, Result } from "@/lib/errors";

export type HttpMethod = "GET" | "POST" | "PUT" | "DELETE";

export type QueryValue = string | number | boolean;

export type RequestParams = Record<string, QueryValue | undefined>;

/**
 * A REST call as the caller describes it. `endpointId` names the rate-limit
 * scope the call is charged to.
 */
export interface RestRequest {
  endpointId: string;
  method: HttpMethod;
  path: string;
  params?: RequestParams;
  /** Tokens charged per attempt (default: the transport's cost function, else 1) */
  cost?: number;
}

export interface HttpRequest {
  method: HttpMethod;
  path: string;
  params?: RequestParams;
}

export interface HttpResponse {
  status: number;
  /** Header names are lower-case */
  headers: Record<string, string>;
  /** Parsed JSON, raw text when the body is not JSON, or null when empty */
  body: unknown;
}

/**
 * Performs one HTTP exchange. Must honor `signal`; rejects only on transport
 * failure (a non-2xx status is a response, not an error).
 */
export type HttpClient = (request: HttpRequest, signal: AbortSignal) => Promise<HttpResponse>;

export interface RestResponse<T> {
  status: number;
  headers: Record<string, string>;
  data: T;
  /** Attempts made, including the successful one */
  attempts: number;
}

export type RestResult<T> = Result<RestResponse<T>, ErrorRecord>;

export interface ExecuteOptions {
  /** Aborting stops waiting; tokens already charged are not refunded */
  signal?: AbortSignal;
}

export interface ExecuteWithSchemaOptions<T> extends ExecuteOptions {
  /** Validates a 2xx body; a mismatch is reported as ProtocolError */
  schema: v.GenericSchema<unknown, T>;
}
