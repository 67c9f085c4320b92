export { createFetchHttpClient, type FetchHttpClientConfig } from "./http-client";

export {
  createRestTransport,
  DEFAULT_RETRY_POLICY,
  RequestTimeoutError,
  type RestTransport,
  type RestTransportConfig,
  type RestTransportMetrics,
  type RetryPolicy,
} from "./rest-transport";

export type {
  ExecuteOptions,
  ExecuteWithSchemaOptions,
  HttpClient,
  HttpMethod,
  HttpRequest,
  HttpResponse,
  QueryValue,
  RequestParams,
  RestRequest,
  RestResponse,
  RestResult,
} from "./types";
