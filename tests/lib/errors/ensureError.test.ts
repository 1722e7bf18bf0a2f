import assert from 'node:assert/strict';
import test from 'node:test';

import { describeError, ensureError } from '../../../src/lib/errors/ensureError';

test('ensureError returns Error instances unchanged', () => {
  const error = new RangeError('out of range');

  assert.equal(ensureError(error), error);
});

test('ensureError wraps strings and message-bearing objects', () => {
  assert.equal(ensureError('socket hang up').message, 'socket hang up');
  assert.equal(ensureError({ message: 'from object' }).message, 'from object');
  assert.equal(ensureError({ message: 42 }).message, 'Unknown error');
  assert.equal(ensureError(undefined, 'Nothing thrown').message, 'Nothing thrown');
});

test('describeError renders the error name and message', () => {
  assert.equal(describeError(new TypeError('bad input')), 'TypeError: bad input');
  assert.equal(describeError('plain failure'), 'Error: plain failure');
  assert.equal(describeError(new Error('')), 'Error');
});
