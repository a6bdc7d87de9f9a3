import { describe, it } from 'node:test';
import { strict as assert } from 'assert';
import { z } from 'zod';
import { DirectCodec } from '../src/direct/codec.js';
import { argsTarget } from '../src/codec/types.js';
import { bodyOf, RecordingWriter } from './harness.js';

const Operands = z.object({ a: z.number(), b: z.number() });

function call(data: string): string {
  return `{"action":"Calc","method":"add","data":${data},"tid":4,"type":"rpc"}`;
}

describe('argument decoding (unwrap)', () => {
  const codec = new DirectCodec();

  it('unwraps the single positional argument into the target', async () => {
    const req = await codec.newRequest(bodyOf(call('[{"a":1,"b":2}]')));
    const target = argsTarget(Operands);

    assert.deepEqual(req.readRequest(target), { ok: true, value: { a: 1, b: 2 } });
    assert.deepEqual(target.value, { a: 1, b: 2 });
  });

  it('binds null when data is null or absent', async () => {
    const explicit = await codec.newRequest(bodyOf(call('null')));
    const t1 = argsTarget(Operands);
    assert.deepEqual(explicit.readRequest(t1), { ok: true, value: null });
    assert.equal(t1.value, null);

    const absent = await codec.newRequest(bodyOf('{"action":"Calc","method":"add","tid":4}'));
    const t2 = argsTarget(z.string());
    t2.value = 'stale';
    assert.deepEqual(absent.readRequest(t2), { ok: true, value: null });
    assert.equal(t2.value, null);
  });

  it('binds null for an empty positional array', async () => {
    const req = await codec.newRequest(bodyOf(call('[]')));
    const target = argsTarget(z.number());
    assert.deepEqual(req.readRequest(target), { ok: true, value: null });
    assert.equal(target.value, null);
  });

  it('ignores positional elements past the first', async () => {
    const req = await codec.newRequest(bodyOf(call('[5,6]')));
    const target = argsTarget(z.number());
    assert.deepEqual(req.readRequest(target), { ok: true, value: 5 });
  });

  it('rejects a bare scalar and short-circuits the session', async () => {
    const req = await codec.newRequest(bodyOf(call('5')));
    const target = argsTarget(z.number());
    const w = new RecordingWriter();

    const read = req.readRequest(target);
    assert.equal(read.ok, false);
    if (read.ok) return;
    assert.equal(read.error.code, 'ParamsError');
    assert.equal(read.error.message, 'rpc: method request ill-formed: data must be a positional array, got number');
    assert.equal(target.value, null);

    const written = req.writeResponse(w, 1, null);
    assert.equal(written.ok, false);
    if (written.ok) return;
    assert.equal(written.error, read.error);
    assert.equal(w.ends, 0);

    const method = req.method();
    assert.equal(method.ok, false);
  });

  it('rejects an argument that does not match the target schema', async () => {
    const req = await codec.newRequest(bodyOf(call('[{"a":"one","b":2}]')));
    const read = req.readRequest(argsTarget(Operands));
    assert.equal(read.ok, false);
    if (read.ok) return;
    assert.equal(read.error.code, 'ParamsError');
    assert.ok(read.error.message.startsWith('rpc: method request ill-formed: a: '));
  });
});

describe('argument decoding (reject)', () => {
  const codec = new DirectCodec({ paramsMode: 'reject' });

  it('reports present data as a missing params field', async () => {
    const req = await codec.newRequest(bodyOf(call('[1]')));
    const target = argsTarget(z.number());
    target.value = 42;

    const read = req.readRequest(target);
    assert.equal(read.ok, false);
    if (read.ok) return;
    assert.equal(read.error.message, 'rpc: method request ill-formed: missing params field');
    assert.equal(target.value, 42);
  });

  it('accepts calls without data', async () => {
    const req = await codec.newRequest(bodyOf(call('null')));
    const w = new RecordingWriter();
    assert.deepEqual(req.readRequest(argsTarget(z.unknown())), { ok: true, value: null });
    assert.deepEqual(req.writeResponse(w, 'pong', null), { ok: true, value: true });
    assert.equal(w.body, '{"result":"pong","tid":4,"type":"rpc","action":"Calc","method":"add"}');
  });
});
