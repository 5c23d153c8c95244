import assert from 'node:assert/strict';
import { test } from 'node:test';
import {
  glyphDisplayWidth,
  measureDisplayWidth,
  padToWidth,
  sliceByColumns,
  stripSgr,
  truncateToWidth,
} from '../src/text/display-width.ts';

void test('glyph widths cover ascii, wide, combining and control characters', () => {
  assert.equal(glyphDisplayWidth('a'), 1);
  assert.equal(glyphDisplayWidth('語'), 2);
  assert.equal(glyphDisplayWidth('\u0301'), 0);
  assert.equal(glyphDisplayWidth('\u0007'), 0);
  assert.equal(measureDisplayWidth('ab語'), 4);
});

void test('stripSgr removes colour sequences only', () => {
  assert.equal(stripSgr('\u001b[1;38;5;208mhot\u001b[0m path'), 'hot path');
});

void test('truncate and pad work in columns', () => {
  assert.equal(truncateToWidth('abc語d', 4), 'abc');
  assert.equal(truncateToWidth('abc', 5), 'abc');
  assert.equal(padToWidth('ab', 4), 'ab  ');
  assert.equal(padToWidth('abcdef', 4), 'abcdef');
});

void test('sliceByColumns keeps glyphs overlapping the range', () => {
  assert.equal(sliceByColumns('abcdef', 1, 4), 'bcd');
  assert.equal(sliceByColumns('a語b', 2, 3), '語');
  assert.equal(sliceByColumns('abc', 5, 9), '');
});
