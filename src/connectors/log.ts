import * as fs from 'fs';
import * as path from 'path';

export interface HttpLogEntry {
  ts: string;
  event: 'http_request_complete' | 'http_timeout';
  ip?: string;
  method?: string;
  path?: string;
  durMs?: number;
  status?: number;
  rpc?: string;
  notification?: boolean;
  error?: string;
  code?: string;
  gzipped?: boolean;
}

// Append-only JSONL request log, one object per line
export class RequestLog {
  private stream: fs.WriteStream | null = null;

  constructor(logPath: string | null) {
    if (!logPath) return;
    try {
      fs.mkdirSync(path.dirname(logPath), { recursive: true });
      this.stream = fs.createWriteStream(logPath, { flags: 'a' });
      this.stream.on('error', (err) => {
        console.error(`[HTTP] Log stream error: ${err.message}`);
        this.stream = null;
      });
      console.log(`[HTTP] JSONL logging enabled: ${logPath}`);
    } catch (e: unknown) {
      console.error(`[HTTP] Failed to initialize log stream: ${e instanceof Error ? e.message : String(e)}`);
      this.stream = null;
    }
  }

  get enabled(): boolean {
    return this.stream !== null;
  }

  write(entry: Omit<HttpLogEntry, 'ts'>): void {
    if (!this.stream) return;
    try {
      this.stream.write(JSON.stringify({ ts: new Date().toISOString(), ...entry }) + '\n');
    } catch (e: unknown) {
      console.error(`[HTTP] Failed to write log entry: ${e instanceof Error ? e.message : String(e)}`);
    }
  }

  /** Flushes pending lines and closes the file. */
  close(): Promise<void> {
    const stream = this.stream;
    this.stream = null;
    if (!stream) return Promise.resolve();
    return new Promise((resolve) => stream.end(() => resolve()));
  }
}
