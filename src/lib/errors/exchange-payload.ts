/**
 * Extraction of error code/message pairs from exchange error bodies.
 *
 * Exchanges disagree on the shape of an error body. The common shapes are
 * matched with valibot schemas and reduced to a single ExchangeErrorInfo so the
 * classifier never looks at raw JSON.
 */

import * as v from "valibot";

export interface ExchangeErrorInfo {
  code?: string;
  message?: string;
}

const codeSchema = v.pipe(
  v.union([v.string(), v.number()]),
  v.transform((value) => String(value)),
);

// { code: -1121, msg: "Invalid symbol." } (Binance, OKX)
const codeMsgSchema = v.object({
  code: codeSchema,
  msg: v.optional(v.string()),
  message: v.optional(v.string()),
});

// { retCode: 10006, retMsg: "Too many visits!" } (Bybit)
const retCodeSchema = v.object({
  retCode: codeSchema,
  retMsg: v.optional(v.string()),
});

// { error: { code: "NOT_FOUND", message: "..." } }
const nestedErrorSchema = v.object({
  error: v.object({
    code: v.optional(codeSchema),
    message: v.optional(v.string()),
  }),
});

// { error: "NOT_FOUND", message: "product not found" } (Coinbase)
const flatErrorSchema = v.object({
  error: v.string(),
  message: v.optional(v.string()),
  error_details: v.optional(v.string()),
});

// { error: ["EQuery:Unknown asset pair"] } (Kraken)
const errorListSchema = v.object({
  error: v.pipe(v.array(v.string()), v.minLength(1)),
});

// Codes that some exchanges use to signal success inside an error-shaped body
const SUCCESS_CODES = new Set(["0", "200"]);

const nonEmpty = (info: ExchangeErrorInfo): ExchangeErrorInfo | null =>
  info.code === undefined && info.message === undefined ? null : info;

/**
 * Extracts code/message from an exchange payload.
 *
 * @returns null when the payload carries no recognizable error
 */
export const extractExchangeError = (payload: unknown): ExchangeErrorInfo | null => {
  if (typeof payload === "string") {
    const trimmed = payload.trim();
    return trimmed.length > 0 ? { message: trimmed } : null;
  }

  const codeMsg = v.safeParse(codeMsgSchema, payload);
  if (codeMsg.success) {
    if (SUCCESS_CODES.has(codeMsg.output.code)) return null;
    return nonEmpty({
      code: codeMsg.output.code,
      message: codeMsg.output.msg ?? codeMsg.output.message,
    });
  }

  const retCode = v.safeParse(retCodeSchema, payload);
  if (retCode.success) {
    if (SUCCESS_CODES.has(retCode.output.retCode)) return null;
    return nonEmpty({ code: retCode.output.retCode, message: retCode.output.retMsg });
  }

  const flat = v.safeParse(flatErrorSchema, payload);
  if (flat.success) {
    return nonEmpty({
      code: flat.output.error,
      message: flat.output.message ?? flat.output.error_details,
    });
  }

  const list = v.safeParse(errorListSchema, payload);
  if (list.success) {
    return { message: list.output.error.join("; ") };
  }

  const nested = v.safeParse(nestedErrorSchema, payload);
  if (nested.success) {
    return nonEmpty({ code: nested.output.error.code, message: nested.output.error.message });
  }

  return null;
};

const RATE_LIMIT_CODES = new Set([
  "-1003", // Binance: too many requests
  "-1015", // Binance: too many new orders
  "10006", // Bybit: too many visits
  "10018", // Bybit: IP rate limit
  "50011", // OKX: rate limit reached
  "RATE_LIMIT_EXCEEDED",
]);

const RATE_LIMIT_PATTERN = /rate limit|too many (requests|visits)|request limit/i;

const INVALID_SYMBOL_CODES = new Set([
  "-1121", // Binance: invalid symbol
  "51001", // OKX: instrument does not exist
  "10016", // Bybit (v3): symbol not found
]);

const INVALID_SYMBOL_PATTERNS: readonly RegExp[] = [
  /invalid symbol|unknown symbol/i,
  /symbol (is )?(invalid|not found|does not exist)/i,
  /unknown (asset|currency) pair/i,
  /instrument id does not exist/i,
  /product not found|invalid product/i,
];

export const isRateLimitSignal = (info: ExchangeErrorInfo): boolean =>
  (info.code !== undefined && RATE_LIMIT_CODES.has(info.code)) ||
  (info.message !== undefined && RATE_LIMIT_PATTERN.test(info.message));

export const isInvalidSymbolSignal = ({ code, message }: ExchangeErrorInfo): boolean =>
  (code !== undefined && INVALID_SYMBOL_CODES.has(code)) ||
  (message !== undefined && INVALID_SYMBOL_PATTERNS.some((pattern) => pattern.test(message)));
