import { describe, it } from 'node:test';
import { strict as assert } from 'assert';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { RequestLog } from '../src/connectors/log.js';

describe('RequestLog', () => {
  it('appends one JSON object per line', async () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'direct-log-'));
    const file = path.join(dir, 'nested', 'http.log.jsonl');
    const log = new RequestLog(file);
    assert.equal(log.enabled, true);

    log.write({ event: 'http_request_complete', path: '/direct', status: 200, rpc: 'Calc.add' });
    log.write({ event: 'http_timeout', ip: '127.0.0.1', error: 'RequestTimeout' });
    await log.close();

    const lines = fs.readFileSync(file, 'utf8').trim().split('\n').map(l => JSON.parse(l));
    assert.equal(lines.length, 2);
    assert.equal(typeof lines[0].ts, 'string');
    assert.equal(lines[0].event, 'http_request_complete');
    assert.equal(lines[0].rpc, 'Calc.add');
    assert.equal(lines[1].error, 'RequestTimeout');
    assert.equal(log.enabled, false);

    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('does nothing without a path', async () => {
    const log = new RequestLog(null);
    assert.equal(log.enabled, false);
    log.write({ event: 'http_request_complete', status: 200 });
    await log.close();
  });
});
