/**
 * Snapshot fetching for channels that recover from sequence gaps by reloading
 * state over REST.
 */

import type * as v from "valibot";

import { type ErrorRecord, type Result, ok } from "@/lib/errors";
import type { RestRequest, RestTransport } from "@/transport";

export interface SnapshotTarget {
  channel: string;
  symbol?: string;
}

export interface Snapshot {
  payload: unknown;
  /** Sequence the snapshot is current as of; deltas up to it are dropped on replay */
  sequence?: number;
}

/**
 * Fetches a snapshot. Failures are returned as ErrorRecords; rejects only
 * with the abort reason when `signal` fires.
 */
export type SnapshotFetcher = (
  target: SnapshotTarget,
  signal: AbortSignal,
) => Promise<Result<Snapshot, ErrorRecord>>;

export interface RestSnapshotFetcherConfig<T> {
  transport: RestTransport;
  /** Builds the REST request for a channel's snapshot */
  request: (target: SnapshotTarget) => RestRequest;
  schema: v.GenericSchema<unknown, T>;
  /** Reads the sequence from the snapshot body (e.g. Binance `lastUpdateId`) */
  sequenceOf?: (data: T) => number | undefined;
}

/**
 * Creates a SnapshotFetcher that goes through the client's RestTransport, so
 * snapshot requests share its rate limits and retry policy.
 *
 * @example
 * ```typescript
 * const fetchSnapshot = createRestSnapshotFetcher({
 *   transport,
 *   request: ({ symbol }) => ({
 *     endpointId: "depth",
 *     method: "GET",
 *     path: "/api/v3/depth",
 *     params: { symbol, limit: 1000 },
 *   }),
 *   schema: v.object({ lastUpdateId: v.number(), bids: v.array(level), asks: v.array(level) }),
 *   sequenceOf: (book) => book.lastUpdateId,
 * });
 * ```
 */
export const createRestSnapshotFetcher =
  <T>(config: RestSnapshotFetcherConfig<T>): SnapshotFetcher =>
  async (target, signal) => {
    const { transport, request, schema, sequenceOf } = config;

    const result = await transport.execute(request(target), { schema, signal });
    if (!result.ok) {
      return result;
    }

    const { data } = result.value;
    return ok({ payload: data, sequence: sequenceOf?.(data) });
  };
