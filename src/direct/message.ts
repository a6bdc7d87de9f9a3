import { z } from 'zod';
import { encodeJson } from '../codec/json.js';

export type JsonValue =
  | null
  | boolean
  | number
  | string
  | JsonValue[]
  | { [key: string]: JsonValue };

/**
 * The canonical null payload. An absent `data` or `tid` decodes to it, a call
 * without arguments binds it, and an `undefined` result is written as it.
 */
export const NULL = null;

export const EXCEPTION_TYPE = 'exception';

// JSON null on a string field decodes to the empty string
const envelopeString = z
  .string()
  .nullish()
  .transform((v) => v ?? '');

// Values come out of JSON.parse, so anything here is already JSON
const opaque = z
  .custom<JsonValue>()
  .optional()
  .transform((v): JsonValue => v ?? NULL);

/**
 * Inbound Direct call. `action` and `method` are not required here: a call
 * missing either resolves to a key no dispatcher serves.
 */
export const InboundMessageSchema = z.object({
  action: envelopeString,
  method: envelopeString,
  data: opaque,
  tid: opaque,
  type: envelopeString,
});

export type InboundMessage = z.infer<typeof InboundMessageSchema>;

/**
 * Reply envelopes. `tid` holds the request's tid as JSON text, copied from
 * the body so numbers come back exactly as the client wrote them.
 */
export interface OutboundSuccess {
  result: unknown;
  tid: string;
  type: string;
  action: string;
  method: string;
}

export interface OutboundFailure {
  message: string;
  tid: string;
  type: typeof EXCEPTION_TYPE;
  action: string;
  method: string;
}

/** Serializes a reply in wire key order. Throws when `result` cannot be encoded. */
export function encodeOutbound(res: OutboundSuccess | OutboundFailure): string {
  const head = 'message' in res
    ? `"message":${encodeJson(res.message)}`
    : `"result":${encodeJson(res.result === undefined ? NULL : res.result)}`;
  return `{${head},"tid":${res.tid},"type":${encodeJson(res.type)},"action":${encodeJson(res.action)},"method":${encodeJson(res.method)}}`;
}

export function isNotification(msg: InboundMessage): boolean {
  return msg.tid === NULL;
}
