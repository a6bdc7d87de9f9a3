import type { ParamsMode } from '../direct/codec.js';

export const CONFIG_VERSION = 'direct-gateway/v1';

export interface HttpConfig {
  bind: string;
  port: number;
  path: string; // endpoint receiving Direct calls
  pingPath: string;
  maxBodyBytes: number;
}

export interface CodecConfig {
  paramsMode: ParamsMode;
  maxDecodedSize: number;
  maxDepth: number;
}

export interface GatewayConfig {
  version: typeof CONFIG_VERSION;
  http: HttpConfig;
  codec: CodecConfig;
  log: { path: string | null };
}

export function defaultConfig(): GatewayConfig {
  return {
    version: CONFIG_VERSION,
    http: {
      bind: '127.0.0.1',
      port: 9087,
      path: '/direct',
      pingPath: '/health',
      maxBodyBytes: 10_485_760
    },
    codec: {
      paramsMode: 'unwrap',
      maxDecodedSize: 10_485_760,
      maxDepth: 32
    },
    log: { path: null }
  };
}
