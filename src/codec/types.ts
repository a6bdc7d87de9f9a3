import type { ZodType, ZodTypeDef } from 'zod';
import type { DirectCodecError } from './errors.js';

export type CodecResult<T> =
  | { ok: true; value: T }
  | { ok: false; error: DirectCodecError };

/**
 * Caller-owned storage for the single positional argument of a call.
 * `schema` narrows the decoded element; `value` receives it.
 */
export interface ArgsTarget<T> {
  readonly schema: ZodType<T, ZodTypeDef, unknown>;
  value: T | null;
}

export function argsTarget<T>(schema: ZodType<T, ZodTypeDef, unknown>): ArgsTarget<T> {
  return { schema, value: null };
}

// Node's http.ServerResponse satisfies this
export interface ResponseWriter {
  setHeader(name: string, value: string): unknown;
  end(chunk: string | Uint8Array): unknown;
}

export type MessageBody = AsyncIterable<Uint8Array | string> & {
  destroy?: (error?: Error) => unknown;
};

/** One inbound call: method resolution, argument decoding, response emission. */
export interface RpcCodecRequest {
  method(): CodecResult<string>;
  readRequest<T>(target: ArgsTarget<T>): CodecResult<T | null>;
  writeResponse(w: ResponseWriter, reply: unknown, methodErr?: Error | null): CodecResult<boolean>;
}

export interface RpcCodec {
  newRequest(body: MessageBody): Promise<RpcCodecRequest>;
}
