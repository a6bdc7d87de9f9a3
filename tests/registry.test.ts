import { describe, it } from 'node:test';
import { strict as assert } from 'assert';
import { CodecRegistry, mediaType } from '../src/codec/registry.js';
import { decodeJson, encodeJson, exactMember } from '../src/codec/json.js';
import { DirectCodec } from '../src/direct/codec.js';

describe('CodecRegistry', () => {
  const direct = new DirectCodec();
  const registry = new CodecRegistry();
  registry.register('application/json', direct);

  it('matches media types case-insensitively without parameters', () => {
    assert.equal(mediaType('Application/JSON; charset=utf-8'), 'application/json');
    assert.equal(registry.detect('Application/JSON; charset=utf-8')?.rpc, direct);
    assert.equal(registry.detect('application/json')?.contentType, 'application/json');
  });

  it('routes structured +json types to the JSON entry', () => {
    assert.equal(registry.detect('application/vnd.api+json')?.rpc, direct);
  });

  it('has nothing for other or missing types', () => {
    assert.equal(registry.detect('text/plain'), undefined);
    assert.equal(registry.detect(undefined), undefined);
    assert.equal(registry.detect(''), undefined);
    assert.equal(registry.list().length, 1);
  });
});

describe('JSON helpers', () => {
  it('decodes UTF-8 bytes and strings', () => {
    assert.deepEqual(decodeJson(Buffer.from('{"tid":1,"name":"ü"}', 'utf8')), { tid: 1, name: 'ü' });
    assert.deepEqual(decodeJson('[1,null]'), [1, null]);
  });

  it('encodes undefined as null', () => {
    assert.equal(encodeJson({ name: 'ü' }), '{"name":"ü"}');
    assert.equal(encodeJson(undefined), 'null');
  });

  it('drops a leading byte order mark', () => {
    assert.deepEqual(decodeJson(Buffer.from([0xef, 0xbb, 0xbf, 0x7b, 0x7d])), {});
    assert.deepEqual(decodeJson('\uFEFF[2]'), [2]);
  });

  it('throws on invalid input', () => {
    assert.throws(() => decodeJson('{'), SyntaxError);
    assert.throws(() => decodeJson(Buffer.from([0x22, 0xff, 0x22])), TypeError);
  });

  it('keeps a member\'s numbers as written', () => {
    assert.equal(exactMember('{"tid":9007199254740993}', 'tid'), '9007199254740993');
    assert.equal(exactMember('{"tid": [1.0, "x"]}', 'tid'), '[1.0,"x"]');
    assert.equal(exactMember('{"tid":null}', 'tid'), 'null');
    assert.equal(exactMember('{"other":1}', 'tid'), 'null');
    assert.equal(exactMember('[1]', 'tid'), 'null');
  });
});
