import type { RpcCodec } from './types.js';

export interface CodecEntry {
  contentType: string;
  rpc: RpcCodec;
}

export function mediaType(contentType?: string | null): string {
  return (contentType || '').split(';')[0].trim().toLowerCase();
}

/**
 * Maps request Content-Types to the RPC codec that decodes them.
 * Structured `+json` suffixes fall back to the `application/json` entry.
 */
export class CodecRegistry {
  private entries = new Map<string, CodecEntry>();

  register(contentType: string, rpc: RpcCodec): void {
    const ct = mediaType(contentType);
    this.entries.set(ct, { contentType: ct, rpc });
  }

  detect(contentType?: string | null): CodecEntry | undefined {
    const ct = mediaType(contentType);
    if (!ct) return undefined;
    const exact = this.entries.get(ct);
    if (exact) return exact;
    if (ct.endsWith('+json')) return this.entries.get('application/json');
    return undefined;
  }

  list(): CodecEntry[] {
    return Array.from(this.entries.values());
  }
}
