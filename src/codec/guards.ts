export interface DecodedGuardrails {
  maxDecodedSize: number;
  maxDepth: number;
}

export type GuardrailCheck =
  | { valid: true }
  | { valid: false; reason: 'decoded_size_exceeded' | 'depth_exceeded'; limit: number; actual: number };

export const DEFAULT_GUARDRAILS: Readonly<DecodedGuardrails> = Object.freeze({
  maxDecodedSize: 10_485_760,
  maxDepth: 32
});

function envInt(env: NodeJS.ProcessEnv, name: string, fallback: number): number {
  const parsed = parseInt(env[name] || '', 10);
  return Number.isFinite(parsed) ? parsed : fallback;
}

export function getGuardrailsFromEnv(
  env: NodeJS.ProcessEnv = process.env,
  fallback: DecodedGuardrails = DEFAULT_GUARDRAILS
): DecodedGuardrails {
  return {
    maxDecodedSize: envInt(env, 'DIRECT_CODEC_MAX_DECODED_SIZE', fallback.maxDecodedSize),
    maxDepth: envInt(env, 'DIRECT_CODEC_MAX_DEPTH', fallback.maxDepth)
  };
}

function childrenOf(value: object): unknown[] {
  return Array.isArray(value) ? value : Object.values(value);
}

/**
 * Approximate in-memory size of a decoded JSON value: UTF-8 bytes of
 * strings and keys, 8 per number, 1 per boolean, 0 for null.
 * Walks with an explicit stack, so nesting depth is bounded by memory only.
 */
export function measureDecodedSize(value: unknown): number {
  let total = 0;
  const pending: unknown[] = [value];
  while (pending.length > 0) {
    const next = pending.pop();
    switch (typeof next) {
      case 'string':
        total += Buffer.byteLength(next, 'utf8');
        break;
      case 'number':
        total += 8;
        break;
      case 'boolean':
        total += 1;
        break;
      case 'object':
        if (next === null) break;
        if (Array.isArray(next)) {
          for (const item of next) pending.push(item);
          break;
        }
        for (const [key, child] of Object.entries(next)) {
          total += Buffer.byteLength(key, 'utf8');
          pending.push(child);
        }
        break;
    }
  }
  return total;
}

export function measureDepth(value: unknown, currentDepth = 0): number {
  let max = currentDepth;
  const pending: Array<[unknown, number]> = [[value, currentDepth]];
  while (pending.length > 0) {
    const entry = pending.pop();
    if (!entry) break;
    const [node, depth] = entry;
    if (depth > max) max = depth;
    if (node === null || typeof node !== 'object') continue;
    for (const child of childrenOf(node)) pending.push([child, depth + 1]);
  }
  return max;
}

export function checkDecodedPayload(value: unknown, guardrails: DecodedGuardrails): GuardrailCheck {
  const depth = measureDepth(value);
  if (depth > guardrails.maxDepth) {
    return { valid: false, reason: 'depth_exceeded', limit: guardrails.maxDepth, actual: depth };
  }

  const size = measureDecodedSize(value);
  if (size > guardrails.maxDecodedSize) {
    return { valid: false, reason: 'decoded_size_exceeded', limit: guardrails.maxDecodedSize, actual: size };
  }

  return { valid: true };
}
