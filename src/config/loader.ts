import * as fs from 'fs';
import * as path from 'path';
import * as YAML from 'yaml';
import { getGuardrailsFromEnv } from '../codec/guards.js';
import type { ParamsMode } from '../direct/codec.js';
import { CONFIG_VERSION, CodecConfig, GatewayConfig, HttpConfig, defaultConfig } from './types.js';

type Section = Record<string, unknown>;

function isSection(value: unknown): value is Section {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isParamsMode(value: unknown): value is ParamsMode {
  return value === 'unwrap' || value === 'reject';
}

export class ConfigLoader {
  load(file: string): GatewayConfig {
    const content = fs.readFileSync(file, 'utf8');
    const raw: unknown = YAML.parse(content);
    return this.validate(raw);
  }

  validate(raw: unknown): GatewayConfig {
    if (!isSection(raw)) {
      throw new Error('Gateway config must be a mapping');
    }
    if (!raw.version) {
      throw new Error('Gateway config missing required field: version');
    }
    if (raw.version !== CONFIG_VERSION) {
      throw new Error(`Unsupported gateway config version: ${String(raw.version)}`);
    }

    const defaults = defaultConfig();
    return {
      version: CONFIG_VERSION,
      http: this.validateHttp(this.section(raw, 'http'), defaults.http),
      codec: this.validateCodec(this.section(raw, 'codec'), defaults.codec),
      log: { path: this.optionalPath(this.section(raw, 'log'), defaults.log.path) }
    };
  }

  private section(raw: Section, key: string): Section {
    const value = raw[key];
    if (value === undefined || value === null) return {};
    if (!isSection(value)) {
      throw new Error(`Gateway config field ${key} must be a mapping`);
    }
    return value;
  }

  private validateHttp(s: Section, d: HttpConfig): HttpConfig {
    return {
      bind: this.str(s, 'http.bind', 'bind', d.bind),
      port: this.int(s, 'http.port', 'port', d.port),
      path: this.str(s, 'http.path', 'path', d.path),
      pingPath: this.str(s, 'http.pingPath', 'pingPath', d.pingPath),
      maxBodyBytes: this.int(s, 'http.maxBodyBytes', 'maxBodyBytes', d.maxBodyBytes)
    };
  }

  private validateCodec(s: Section, d: CodecConfig): CodecConfig {
    const mode = s.paramsMode ?? d.paramsMode;
    if (!isParamsMode(mode)) {
      throw new Error(`Gateway config field codec.paramsMode must be "unwrap" or "reject", got ${String(mode)}`);
    }
    return {
      paramsMode: mode,
      maxDecodedSize: this.int(s, 'codec.maxDecodedSize', 'maxDecodedSize', d.maxDecodedSize),
      maxDepth: this.int(s, 'codec.maxDepth', 'maxDepth', d.maxDepth)
    };
  }

  private optionalPath(s: Section, fallback: string | null): string | null {
    const value = s.path;
    if (value === undefined) return fallback;
    if (value === null || value === '') return null;
    if (typeof value !== 'string') {
      throw new Error('Gateway config field log.path must be a string or null');
    }
    return value;
  }

  private str(s: Section, field: string, key: string, fallback: string): string {
    const value = s[key];
    if (value === undefined) return fallback;
    if (typeof value !== 'string' || value.length === 0) {
      throw new Error(`Gateway config field ${field} must be a non-empty string`);
    }
    return value;
  }

  private int(s: Section, field: string, key: string, fallback: number): number {
    const value = s[key];
    if (value === undefined) return fallback;
    if (typeof value !== 'number' || !Number.isInteger(value) || value < 0) {
      throw new Error(`Gateway config field ${field} must be a non-negative integer`);
    }
    return value;
  }
}

function envInt(env: NodeJS.ProcessEnv, name: string, fallback: number): number {
  const raw = env[name];
  if (raw === undefined || raw === '') return fallback;
  const value = Number(raw);
  if (!Number.isInteger(value) || value < 0) {
    throw new Error(`${name} must be a non-negative integer, got ${raw}`);
  }
  return value;
}

export function applyEnv(config: GatewayConfig, env: NodeJS.ProcessEnv = process.env): GatewayConfig {
  const paramsMode = env.DIRECT_PARAMS_MODE || config.codec.paramsMode;
  if (!isParamsMode(paramsMode)) {
    throw new Error(`DIRECT_PARAMS_MODE must be "unwrap" or "reject", got ${paramsMode}`);
  }
  const guardrails = getGuardrailsFromEnv(env, config.codec);
  const logPath = env.DIRECT_HTTP_LOG;

  return {
    version: config.version,
    http: {
      bind: env.DIRECT_BIND || config.http.bind,
      port: envInt(env, 'DIRECT_HTTP_PORT', config.http.port),
      path: env.DIRECT_HTTP_PATH || config.http.path,
      pingPath: config.http.pingPath,
      maxBodyBytes: envInt(env, 'DIRECT_MAX_BODY', config.http.maxBodyBytes)
    },
    codec: { paramsMode, ...guardrails },
    log: { path: logPath === undefined ? config.log.path : logPath || null }
  };
}

/**
 * Reads the YAML config (DIRECT_CONFIG, else config/gateway.yaml under the
 * working directory) and layers environment overrides on top. A missing
 * file means defaults.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env, file?: string): GatewayConfig {
  const configPath = file || env.DIRECT_CONFIG || path.join(process.cwd(), 'config', 'gateway.yaml');
  let base: GatewayConfig;
  if (fs.existsSync(configPath)) {
    base = new ConfigLoader().load(configPath);
    console.log(`[Config] Loaded ${configPath}`);
  } else {
    base = defaultConfig();
    console.log(`[Config] ${configPath} not found, using defaults`);
  }
  return applyEnv(base, env);
}
