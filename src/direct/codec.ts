import type { ZodError } from 'zod';
import { decodeJson, exactMember, jsonText } from '../codec/json.js';
import { DirectCodecError, DispatchError } from '../codec/errors.js';
import { checkDecodedPayload, getGuardrailsFromEnv, DecodedGuardrails, GuardrailCheck } from '../codec/guards.js';
import type {
  ArgsTarget,
  CodecResult,
  MessageBody,
  ResponseWriter,
  RpcCodec,
  RpcCodecRequest
} from '../codec/types.js';
import {
  EXCEPTION_TYPE,
  InboundMessage,
  InboundMessageSchema,
  NULL,
  OutboundFailure,
  OutboundSuccess,
  encodeOutbound,
  isNotification
} from './message.js';

export const CONTENT_TYPE = 'application/json; charset=utf-8';
export const DEFAULT_MAX_BODY = 10_485_760; // 10MB

/**
 * How a present `data` field is bound:
 * - `unwrap`: `data` is `[arg]`; `arg` is parsed into the target.
 * - `reject`: any present `data` fails with "missing params field", the
 *   behaviour of older Direct routers that only accepted argument-less calls.
 */
export type ParamsMode = 'unwrap' | 'reject';

export interface DirectCodecOptions {
  maxBodyBytes?: number;
  guardrails?: DecodedGuardrails;
  paramsMode?: ParamsMode;
}

/** A decoded envelope plus its tid as received, for the reply. */
interface DecodedCall {
  message: InboundMessage;
  tid: string;
}

type Failure = { ok: false; error: DirectCodecError };

function errorText(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

function describeIssues(err: ZodError): string {
  return err.issues.map(i => `${i.path.length ? i.path.join('.') : '(root)'}: ${i.message}`).join('; ');
}

function describeValue(value: unknown): string {
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'array';
  return typeof value;
}

async function readBody(body: MessageBody, limit: number): Promise<Buffer> {
  const chunks: Buffer[] = [];
  let received = 0;
  for await (const chunk of body) {
    const buf = typeof chunk === 'string' ? Buffer.from(chunk, 'utf8') : Buffer.from(chunk);
    received += buf.length;
    if (received > limit) {
      throw DirectCodecError.malformed(`body exceeds ${limit} bytes`);
    }
    chunks.push(buf);
  }
  return Buffer.concat(chunks);
}

/**
 * Codec for ExtJS Direct calls. Holds only its options, so one instance
 * serves every concurrent request.
 */
export class DirectCodec implements RpcCodec {
  private readonly options: Readonly<Required<DirectCodecOptions>>;

  constructor(options: DirectCodecOptions = {}) {
    this.options = Object.freeze({
      maxBodyBytes: options.maxBodyBytes ?? DEFAULT_MAX_BODY,
      guardrails: options.guardrails ?? getGuardrailsFromEnv(),
      paramsMode: options.paramsMode ?? 'unwrap'
    });
  }

  /**
   * Reads and closes `body`. Never rejects: a decode failure is kept in the
   * returned request and reported by each of its operations.
   */
  async newRequest(body: MessageBody): Promise<DirectCodecRequest> {
    return new DirectCodecRequest(await this.decode(body), this.options);
  }

  private async decode(body: MessageBody): Promise<CodecResult<DecodedCall>> {
    let raw: Buffer;
    try {
      raw = await readBody(body, this.options.maxBodyBytes);
    } catch (err) {
      const error = err instanceof DirectCodecError ? err : DirectCodecError.malformed(errorText(err));
      return { ok: false, error };
    } finally {
      body.destroy?.();
    }

    let text: string;
    let parsed: unknown;
    try {
      text = jsonText(raw);
      parsed = decodeJson(text);
    } catch (err) {
      return { ok: false, error: DirectCodecError.malformed(errorText(err)) };
    }

    let check: GuardrailCheck;
    try {
      check = checkDecodedPayload(parsed, this.options.guardrails);
    } catch (err) {
      return { ok: false, error: DirectCodecError.malformed(errorText(err)) };
    }
    if (!check.valid) {
      return {
        ok: false,
        error: DirectCodecError.malformed(`${check.reason} (limit ${check.limit}, actual ${check.actual})`)
      };
    }

    const envelope = InboundMessageSchema.safeParse(parsed);
    if (!envelope.success) {
      return { ok: false, error: DirectCodecError.malformed(describeIssues(envelope.error)) };
    }

    // Second, number-preserving parse; only reached for payloads within the guardrails
    let tid: string;
    try {
      tid = exactMember(text, 'tid');
    } catch (err) {
      return { ok: false, error: DirectCodecError.malformed(errorText(err)) };
    }
    return { ok: true, value: { message: envelope.data, tid } };
  }
}

export class DirectCodecRequest implements RpcCodecRequest {
  private state: CodecResult<DecodedCall>;

  constructor(state: CodecResult<DecodedCall>, private readonly options: Readonly<Required<DirectCodecOptions>>) {
    this.state = state;
  }

  /** Dispatch key in "Action.method" form. */
  method(): CodecResult<string> {
    if (!this.state.ok) return this.state;
    const { action, method } = this.state.value.message;
    return { ok: true, value: `${action}.${method}` };
  }

  readRequest<T>(target: ArgsTarget<T>): CodecResult<T | null> {
    if (!this.state.ok) return this.state;

    const { data } = this.state.value.message;
    if (data === NULL) {
      target.value = NULL;
      return { ok: true, value: NULL };
    }
    if (this.options.paramsMode === 'reject') {
      return this.fail(DirectCodecError.params('missing params field'));
    }
    if (!Array.isArray(data)) {
      return this.fail(DirectCodecError.params(`data must be a positional array, got ${describeValue(data)}`));
    }
    if (data.length === 0) {
      target.value = NULL;
      return { ok: true, value: NULL };
    }

    const parsed = target.schema.safeParse(data[0]);
    if (!parsed.success) {
      return this.fail(DirectCodecError.params(describeIssues(parsed.error)));
    }
    target.value = parsed.data;
    return { ok: true, value: parsed.data };
  }

  /**
   * Emits the reply for this call. The value tells whether a body was
   * written; it is false only for a successful notification.
   */
  writeResponse(w: ResponseWriter, reply: unknown, methodErr?: Error | null): CodecResult<boolean> {
    if (!this.state.ok) return this.state;
    const call = this.state.value;
    const msg = call.message;

    let failure: Error | null = methodErr ?? null;
    if (failure === null) {
      if (isNotification(msg)) {
        return { ok: true, value: false };
      }
      const encoded = this.encodeSuccess(call, reply);
      if (encoded.ok) {
        this.emit(w, encoded.value);
        return { ok: true, value: true };
      }
      failure = encoded.error;
    }

    const res: OutboundFailure = {
      message: failure.message,
      tid: call.tid,
      type: EXCEPTION_TYPE,
      action: msg.action,
      method: msg.method
    };
    this.emit(w, encodeOutbound(res));
    return { ok: true, value: true };
  }

  private encodeSuccess(call: DecodedCall, reply: unknown): CodecResult<string> {
    const res: OutboundSuccess = {
      result: reply,
      tid: call.tid,
      type: call.message.type,
      action: call.message.action,
      method: call.message.method
    };
    try {
      return { ok: true, value: encodeOutbound(res) };
    } catch (err) {
      return { ok: false, error: new DispatchError(`rpc: cannot encode result: ${errorText(err)}`) };
    }
  }

  private emit(w: ResponseWriter, encoded: string): void {
    w.setHeader('Content-Type', CONTENT_TYPE);
    w.end(encoded);
  }

  private fail(error: DirectCodecError): Failure {
    const failed: Failure = { ok: false, error };
    this.state = failed;
    return failed;
  }
}
