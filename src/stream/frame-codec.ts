/**
 * JSON wire format for stream frames.
 *
 * Outbound: `{ action: "subscribe", channel, symbol }` and `{ action: "pong" }`.
 * Inbound: data frames `{ channel, symbol?, sequence?, payload }` and control
 * frames `{ type: "ack" | "error" | "ping", ... }`.
 *
 * Exchanges whose wire format differs supply their own FrameCodec.
 */

import * as v from "valibot";

import { type Result, err, ok } from "@/lib/errors";

import type { Subscription } from "./types";

export type InboundFrame =
  | { type: "data"; channel: string; symbol?: string; sequence?: number; payload: unknown }
  | { type: "ack"; channel: string; symbol?: string }
  | { type: "error"; code?: string; message: string; channel?: string; symbol?: string }
  | { type: "ping"; id?: string | number };

export type PingFrame = Extract<InboundFrame, { type: "ping" }>;

export interface FrameCodec {
  encodeSubscribe(subscription: Subscription): string;
  /** Reply to an application-level ping, or null when the exchange expects none */
  encodePong(ping: PingFrame): string | null;
  /** Decodes one text frame; the error is a description of what did not match */
  decode(text: string): Result<InboundFrame, string>;
}

const channelSchema = v.pipe(v.string(), v.minLength(1, "channel must not be empty"));

const sequenceSchema = v.pipe(
  v.number(),
  v.integer("sequence must be an integer"),
  v.minValue(0, "sequence must not be negative"),
);

const envelopeSchema = v.object({
  type: v.optional(v.string("type must be a string")),
});

const dataFrameSchema = v.object({
  channel: channelSchema,
  symbol: v.optional(v.string()),
  sequence: v.optional(sequenceSchema),
  payload: v.unknown(),
});

const ackFrameSchema = v.object({
  channel: channelSchema,
  symbol: v.optional(v.string()),
});

const errorFrameSchema = v.object({
  code: v.optional(
    v.pipe(
      v.union([v.string(), v.number()]),
      v.transform((code) => String(code)),
    ),
  ),
  message: v.string("message must be a string"),
  channel: v.optional(v.string()),
  symbol: v.optional(v.string()),
});

const pingFrameSchema = v.object({
  id: v.optional(v.union([v.string(), v.number()])),
});

const parseWith = <TSchema extends v.GenericSchema>(
  schema: TSchema,
  input: unknown,
): Result<v.InferOutput<TSchema>, string> => {
  const result = v.safeParse(schema, input);
  if (result.success) {
    return ok(result.output);
  }
  const issue = result.issues[0];
  const path = v.getDotPath(issue);
  return err(path ? `${path}: ${issue.message}` : issue.message);
};

const decode = (text: string): Result<InboundFrame, string> => {
  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch {
    return err("Frame is not valid JSON");
  }

  if (json === null || typeof json !== "object" || Array.isArray(json)) {
    return err("Frame is not a JSON object");
  }

  const envelope = parseWith(envelopeSchema, json);
  if (!envelope.ok) {
    return envelope;
  }

  const { type } = envelope.value;
  switch (type) {
    case undefined:
    case "data": {
      const frame = parseWith(dataFrameSchema, json);
      if (!frame.ok) return frame;
      const decoded: InboundFrame = { type: "data", ...frame.value };
      return ok(decoded);
    }
    case "ack": {
      const frame = parseWith(ackFrameSchema, json);
      if (!frame.ok) return frame;
      const decoded: InboundFrame = { type: "ack", ...frame.value };
      return ok(decoded);
    }
    case "error": {
      const frame = parseWith(errorFrameSchema, json);
      if (!frame.ok) return frame;
      const decoded: InboundFrame = { type: "error", ...frame.value };
      return ok(decoded);
    }
    case "ping": {
      const frame = parseWith(pingFrameSchema, json);
      if (!frame.ok) return frame;
      const decoded: InboundFrame = { type: "ping", ...frame.value };
      return ok(decoded);
    }
    default:
      return err(`Unknown frame type "${type}"`);
  }
};

/**
 * Creates the default JSON frame codec.
 *
 * @example
 * ```typescript
 * const codec = createJsonFrameCodec();
 *
 * codec.encodeSubscribe({ channel: "trades", symbol: "BTC-USD" });
 * // '{"action":"subscribe","channel":"trades","symbol":"BTC-USD"}'
 *
 * codec.decode('{"channel":"trades","sequence":7,"payload":{"px":"1"}}');
 * // { ok: true, value: { type: "data", channel: "trades", sequence: 7, payload: { px: "1" } } }
 * ```
 */
export const createJsonFrameCodec = (): FrameCodec => ({
  encodeSubscribe: ({ channel, symbol }) =>
    JSON.stringify({ action: "subscribe", channel, symbol }),
  encodePong: (ping) =>
    JSON.stringify({ action: "pong", ...(ping.id !== undefined && { id: ping.id }) }),
  decode,
});
