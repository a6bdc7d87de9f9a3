import type { ZodType, ZodTypeDef } from 'zod';

/** A callable behind one dispatch key, with the shape of its single argument. */
export interface Handler<T = unknown> {
  args: ZodType<T, ZodTypeDef, unknown>;
  call(args: T | null): unknown;
}

// Method lookup lives outside the codec; the gateway only asks for a handler by key
export interface Dispatcher {
  lookup(key: string): Handler | undefined;
}

export function handler<T>(args: ZodType<T, ZodTypeDef, unknown>, call: (args: T | null) => unknown): Handler<T> {
  return { args, call };
}
