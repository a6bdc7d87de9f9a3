import * as http from 'http';
import * as zlib from 'zlib';
import type { Socket } from 'net';
import { PassThrough, Readable } from 'stream';
import { CodecRegistry } from '../codec/registry.js';
import { DirectCodecError, DispatchError } from '../codec/errors.js';
import { argsTarget } from '../codec/types.js';
import { JSON_CONTENT_TYPES } from '../codec/json.js';
import { DirectCodec } from '../direct/codec.js';
import { NULL } from '../direct/message.js';
import type { Dispatcher } from '../backend/types.js';
import type { GatewayConfig } from '../config/types.js';
import { HttpLogEntry, RequestLog } from './log.js';

type LogFields = Omit<HttpLogEntry, 'ts' | 'event' | 'ip' | 'method' | 'path' | 'durMs'>;

function send(res: http.ServerResponse, code: number, body: { error: string; code: string }, headers: Record<string, string> = {}) {
  res.writeHead(code, { 'content-type': 'application/json', ...headers });
  res.end(JSON.stringify(body));
}

export function createRegistry(config: GatewayConfig): CodecRegistry {
  const registry = new CodecRegistry();
  const direct = new DirectCodec({
    maxBodyBytes: config.http.maxBodyBytes,
    paramsMode: config.codec.paramsMode,
    guardrails: { maxDecodedSize: config.codec.maxDecodedSize, maxDepth: config.codec.maxDepth }
  });
  for (const contentType of JSON_CONTENT_TYPES) {
    registry.register(contentType, direct);
  }
  return registry;
}

/**
 * Request listener for the Direct endpoint: one call per POST, decoded by the
 * codec registered for the request's Content-Type and answered by the handler
 * the dispatcher returns for its "Action.method" key.
 */
export function createDirectHandler(
  dispatcher: Dispatcher,
  config: GatewayConfig,
  log: RequestLog,
  registry: CodecRegistry = createRegistry(config)
): http.RequestListener {
  async function serve(req: http.IncomingMessage, res: http.ServerResponse): Promise<void> {
    const startTime = process.hrtime.bigint();
    const url = new URL(req.url || '/', 'http://localhost');
    const complete = (status: number, fields: LogFields = {}) => {
      const durNs = Number(process.hrtime.bigint() - startTime);
      log.write({
        event: 'http_request_complete',
        ip: req.socket.remoteAddress || 'unknown',
        method: req.method,
        path: url.pathname,
        durMs: Math.round(durNs / 1e6),
        status,
        ...fields
      });
    };
    const reject = (status: number, error: string, code: string, headers?: Record<string, string>) => {
      req.resume();
      send(res, status, { error, code }, headers);
      complete(status, { error, code });
    };

    if (req.method === 'GET' && url.pathname === config.http.pingPath) {
      res.writeHead(200).end();
      complete(200);
      return;
    }
    if (url.pathname !== config.http.path) {
      reject(404, `No Direct endpoint at ${url.pathname}`, 'NotFound');
      return;
    }
    if (req.method !== 'POST') {
      reject(405, `rpc: POST method required, received ${req.method}`, 'MethodNotAllowed', { allow: 'POST' });
      return;
    }

    const contentType = req.headers['content-type'];
    const entry = registry.detect(contentType);
    if (!entry) {
      reject(415, `rpc: unrecognized Content-Type: ${contentType || '(none)'}`, 'UnsupportedMediaType');
      return;
    }

    // The codec closes what it reads; keep req itself open so the reply can still go out
    const gzipped = (req.headers['content-encoding'] || '').toLowerCase().includes('gzip');
    const body: Readable = gzipped ? req.pipe(zlib.createGunzip()) : req.pipe(new PassThrough());
    const codecReq = await entry.rpc.newRequest(body);
    req.resume();

    const fail = (err: DirectCodecError, rpc?: string) => {
      send(res, 400, { error: err.message, code: err.code });
      complete(400, { rpc, error: err.message, code: err.code, gzipped });
    };

    const key = codecReq.method();
    if (!key.ok) {
      fail(key.error);
      return;
    }

    const target = dispatcher.lookup(key.value);
    if (!target) {
      reject(400, `rpc: can't find method "${key.value}"`, 'UnknownMethod');
      return;
    }

    const args = argsTarget(target.args);
    const read = codecReq.readRequest(args);
    if (!read.ok) {
      fail(read.error, key.value);
      return;
    }

    let reply: unknown = NULL;
    let methodErr: DispatchError | null = null;
    try {
      reply = await target.call(args.value);
    } catch (err) {
      methodErr = DispatchError.fromError(err);
    }

    const written = codecReq.writeResponse(res, reply, methodErr);
    if (!written.ok) {
      fail(written.error, key.value);
      return;
    }
    if (!written.value) {
      // Notification: no body, no content type
      res.end();
    }
    complete(200, {
      rpc: key.value,
      notification: !written.value,
      error: methodErr?.message,
      code: methodErr?.code,
      gzipped
    });
  }

  return (req, res) => {
    serve(req, res).catch((e: unknown) => {
      const message = e instanceof Error ? e.message : String(e);
      console.error(`[HTTP] Unhandled error for ${req.method} ${req.url}: ${message}`);
      if (!res.headersSent) {
        send(res, 500, { error: 'Internal error', code: 'InternalError' });
      } else {
        res.end();
      }
    });
  };
}

export function startHttp(dispatcher: Dispatcher, config: GatewayConfig, log: RequestLog = new RequestLog(config.log.path)) {
  const server = http.createServer(createDirectHandler(dispatcher, config, log));

  server.on('timeout', (socket: Socket) => {
    console.warn(`[HTTP] Request timeout from ${socket.remoteAddress}`);
    log.write({ event: 'http_timeout', ip: socket.remoteAddress || 'unknown', error: 'RequestTimeout' });
    socket.destroy();
  });
  server.once('close', () => {
    void log.close();
  });

  server.listen(config.http.port, config.http.bind);
  return server;
}
