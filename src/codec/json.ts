import { parse as parseLossless, stringify as stringifyLossless } from 'lossless-json';

// Invalid UTF-8 fails the decode instead of turning into U+FFFD
const utf8 = new TextDecoder('utf-8', { fatal: true, ignoreBOM: false });

export const JSON_CONTENT_TYPES = ['application/json', 'text/json'];

export function jsonText(input: Uint8Array | string): string {
  return typeof input === 'string' ? input.replace(/^\uFEFF/, '') : utf8.decode(input);
}

export function decodeJson(input: Uint8Array | string): unknown {
  return JSON.parse(jsonText(input));
}

/** JSON text of `value`; `undefined` and other unserializable leaves at the top become `null`. */
export function encodeJson(value: unknown): string {
  const text: string | undefined = JSON.stringify(value);
  return text === undefined ? 'null' : text;
}

/**
 * JSON text of the top-level member `key` of the object in `text`, with
 * numbers kept exactly as written (`1.0`, integers past 2^53). Absent
 * members and non-object documents give `null`.
 */
export function exactMember(text: string, key: string): string {
  const doc: unknown = parseLossless(text);
  if (doc === null || typeof doc !== 'object' || Array.isArray(doc)) return 'null';
  const value: unknown = Reflect.get(doc, key);
  if (value === undefined) return 'null';
  return stringifyLossless(value) ?? 'null';
}
