import assert from 'node:assert/strict';
import test from 'node:test';
import { parseParameterValues } from './parameterValues';

test('a single number is one value', () => {
  assert.deepEqual(parseParameterValues('7'), [7]);
  assert.deepEqual(parseParameterValues(' 0.25 '), [0.25]);
});

test('a braced list keeps its order and repetitions', () => {
  assert.deepEqual(parseParameterValues('{3, 1, 3}'), [3, 1, 3]);
});

test('a bracketed range includes both ends', () => {
  assert.deepEqual(parseParameterValues('[1:3]'), [1, 2, 3]);
  assert.deepEqual(parseParameterValues('[1:10:3]'), [1, 4, 7, 10]);
  assert.deepEqual(parseParameterValues('[5:1:-2]'), [5, 3, 1]);
});

test('fractional steps do not accumulate rounding errors', () => {
  assert.deepEqual(parseParameterValues('[0:0.3:0.1]'), [0, 0.1, 0.2, 0.3]);
});

test('a comma range excludes its stop', () => {
  assert.deepEqual(parseParameterValues('1,5'), [1, 2, 3, 4]);
  assert.deepEqual(parseParameterValues('0,10,4'), [0, 4, 8]);
});

test('invalid notations are rejected', () => {
  assert.throws(() => parseParameterValues('abc'), /"abc" is not a number/);
  assert.throws(() => parseParameterValues('{1,,2}'), /"" is not a number/);
  assert.throws(() => parseParameterValues('[1:5:0]'), /step must not be zero/);
  assert.throws(() => parseParameterValues('[1]'), /a range takes a start/);
  assert.throws(() => parseParameterValues('5,1'), /describe an empty sequence/);
  assert.throws(() => parseParameterValues(''), /is not a number/);
});
