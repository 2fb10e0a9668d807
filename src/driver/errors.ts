/**
 * Failure classification – maps whatever a request threw onto the
 * finish reason recorded in its outcome.
 *
 * Node's fetch (undici) reports transport failures as a TypeError
 * ("fetch failed" / "terminated") whose `cause` chain carries a system or
 * undici error code; the code decides the category.
 */

import type { FinishReason } from "../types";

export type TransportCategory =
  | "ConnectError"
  | "ConnectTimeout"
  | "ReadError"
  | "WriteError"
  | "RemoteProtocolError"
  | "RequestError";

const CODE_CATEGORIES: Record<string, TransportCategory> = {
  ECONNREFUSED: "ConnectError",
  ENOTFOUND: "ConnectError",
  EAI_AGAIN: "ConnectError",
  EHOSTUNREACH: "ConnectError",
  ENETUNREACH: "ConnectError",
  UND_ERR_CONNECT: "ConnectError",
  UND_ERR_CONNECT_TIMEOUT: "ConnectTimeout",
  ETIMEDOUT: "ConnectTimeout",
  ECONNRESET: "ReadError",
  UND_ERR_SOCKET: "ReadError",
  UND_ERR_CLOSED: "ReadError",
  EPIPE: "WriteError",
  UND_ERR_REQ_CONTENT_LENGTH_MISMATCH: "WriteError",
  UND_ERR_RES_CONTENT_LENGTH_MISMATCH: "RemoteProtocolError",
  UND_ERR_INFO: "RemoteProtocolError",
};

/** undici's own header/body timeouts count as client timeouts */
const TIMEOUT_CODES = new Set(["UND_ERR_HEADERS_TIMEOUT", "UND_ERR_BODY_TIMEOUT"]);

const TRANSPORT_MESSAGES = new Set(["fetch failed", "terminated"]);

/** First string `code` found along an error's `cause` chain */
export function findErrorCode(err: unknown): string | undefined {
  let current: unknown = err;
  for (let depth = 0; depth < 8 && typeof current === "object" && current !== null; depth++) {
    if ("code" in current && typeof current.code === "string") return current.code;
    current = "cause" in current ? current.cause : undefined;
  }
  return undefined;
}

/** Transport category for `err`, or undefined when it is not a transport failure */
export function transportCategory(err: unknown): TransportCategory | undefined {
  const code = findErrorCode(err);
  if (code !== undefined) {
    if (code in CODE_CATEGORIES) return CODE_CATEGORIES[code];
    if (code.startsWith("HPE_")) return "RemoteProtocolError";
  }
  if (err instanceof TypeError && TRANSPORT_MESSAGES.has(err.message)) return "RequestError";
  return undefined;
}

/**
 * Finish reason for a request that threw `err`.
 * `timedOut` is true when the request's own timeout fired.
 */
export function classifyFailure(err: unknown, timedOut: boolean): FinishReason {
  const code = findErrorCode(err);
  if (timedOut || (code !== undefined && TIMEOUT_CODES.has(code))) return "client_abort";

  const transport = transportCategory(err);
  if (transport) return `client_error: ${transport}`;

  const name = err instanceof Error ? err.name : typeof err;
  return `unexpected_error: ${name}`;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
