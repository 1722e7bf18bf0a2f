import assert from 'node:assert/strict';
import test from 'node:test';

import { LogEncodingError, encodeLog } from '../../../../src/core/app';
import { buildLog } from './__fixtures__/recordingAdapters';

const assertEncodingError = (attributes: Record<string, unknown>, path: string, reason: string) => {
  assert.throws(
    () => encodeLog(buildLog({ attributes })),
    (error: unknown) => {
      assert.ok(error instanceof LogEncodingError);
      assert.equal(error.path, path);
      assert.equal(error.reason, reason);
      assert.equal(error.message, `Cannot encode value at "${path}": ${reason}.`);
      return true;
    },
  );
};

test('encodeLog writes reserved fields and merges attributes at the root', () => {
  const encoded = encodeLog(
    buildLog({
      status: 'notice',
      attributes: { requestId: 'req-1', retries: 2 },
      tags: new Set(['team:mobile', 'env:prod']),
    }),
  );

  assert.deepEqual(encoded, {
    date: '2025-01-15T12:30:45.678Z',
    ddtags: 'env:prod,team:mobile',
    'logger.name': 'test-logger',
    'logger.version': '1.0.0',
    message: 'Session started.',
    requestId: 'req-1',
    retries: 2,
    service: 'test-service',
    status: 'notice',
    version: '2.3.4',
  });
  assert.deepEqual(Object.keys(encoded), [
    'date',
    'ddtags',
    'logger.name',
    'logger.version',
    'message',
    'requestId',
    'retries',
    'service',
    'status',
    'version',
  ]);
});

test('encodeLog writes an empty ddtags value when the log has no tags', () => {
  assert.equal(encodeLog(buildLog()).ddtags, '');
});

test('encodeLog keeps reserved fields when attributes reuse their names', () => {
  const encoded = encodeLog(buildLog({ attributes: { message: 'spoofed', status: 'debug' } }));

  assert.equal(encoded.message, 'Session started.');
  assert.equal(encoded.status, 'info');
});

test('encodeLog writes error fields only when the log carries an error', () => {
  const withStack = encodeLog(
    buildLog({ error: { kind: 'TypeError', message: 'bad input', stack: 'TypeError: bad input' } }),
  );
  const withoutStack = encodeLog(buildLog({ error: { kind: 'UnknownError', message: 'oops' } }));

  assert.equal(withStack['error.kind'], 'TypeError');
  assert.equal(withStack['error.message'], 'bad input');
  assert.equal(withStack['error.stack'], 'TypeError: bad input');
  assert.equal(withoutStack['error.kind'], 'UnknownError');
  assert.equal('error.stack' in withoutStack, false);
  assert.equal('error.kind' in encodeLog(buildLog()), false);
});

test('encodeLog sorts nested keys and normalises structured values', () => {
  const encoded = encodeLog(
    buildLog({
      attributes: {
        payload: {
          b: 1,
          a: [{ d: true, c: null }, undefined],
          skipped: undefined,
        },
        startedAt: new Date('2025-01-15T08:00:00.000Z'),
        lookup: new Map<string, unknown>([
          ['zulu', 26],
          ['alpha', 1],
        ]),
        labels: new Set(['x', 'y']),
      },
    }),
  );

  assert.deepEqual(encoded.payload, { a: [{ c: null, d: true }, null], b: 1 });
  assert.ok(encoded.payload && typeof encoded.payload === 'object');
  assert.deepEqual(Object.keys(encoded.payload), ['a', 'b']);
  assert.equal(encoded.startedAt, '2025-01-15T08:00:00.000Z');
  assert.deepEqual(encoded.lookup, { alpha: 1, zulu: 26 });
  assert.deepEqual(encoded.labels, ['x', 'y']);
});

test('encodeLog omits attributes whose value is undefined', () => {
  const encoded = encodeLog(buildLog({ attributes: { missing: undefined, present: 'yes' } }));

  assert.equal('missing' in encoded, false);
  assert.equal(encoded.present, 'yes');
});

test('encodeLog encodes errors and toJSON values', () => {
  const error = new Error('disk full');
  error.stack = 'Error: disk full\n    at write';
  const money = { toJSON: () => ({ currency: 'EUR', cents: 1250 }) };

  const encoded = encodeLog(buildLog({ attributes: { cause: error, price: money } }));

  assert.deepEqual(encoded.cause, {
    message: 'disk full',
    name: 'Error',
    stack: 'Error: disk full\n    at write',
  });
  assert.deepEqual(encoded.price, { cents: 1250, currency: 'EUR' });
});

test('encodeLog accepts the same object referenced twice', () => {
  const shared = { region: 'eu-west-1' };

  const encoded = encodeLog(buildLog({ attributes: { primary: shared, replica: shared } }));

  assert.deepEqual(encoded.primary, { region: 'eu-west-1' });
  assert.deepEqual(encoded.replica, { region: 'eu-west-1' });
});

test('encodeLog rejects values JSON cannot represent', () => {
  assertEncodingError({ amount: 10n }, 'amount', 'bigint values are not supported');
  assertEncodingError({ metrics: { ratio: Number.NaN } }, 'metrics.ratio', 'non-finite numbers are not supported');
  assertEncodingError({ limits: [1, Infinity] }, 'limits.1', 'non-finite numbers are not supported');
  assertEncodingError({ callback: () => undefined }, 'callback', 'function values are not supported');
  assertEncodingError({ marker: Symbol('marker') }, 'marker', 'symbol values are not supported');
  assertEncodingError({ when: new Date(Number.NaN) }, 'when', 'invalid dates are not supported');
  assertEncodingError(
    { lookup: new Map<unknown, unknown>([[1, 'one']]) },
    'lookup',
    'map keys must be strings',
  );
});

test('encodeLog rejects an invalid log date', () => {
  assert.throws(
    () => encodeLog(buildLog({ date: new Date(Number.NaN) })),
    (error: unknown) => error instanceof LogEncodingError && error.path === 'date',
  );
});
