import assert from 'node:assert/strict';
import { test } from 'node:test';
import {
  isMotionMouseCode,
  isWheelMouseCode,
  parseKeyText,
  parseTerminalInputChunk,
} from '../src/renderer/terminal-input.ts';

void test('SGR mouse presses, releases, motion and wheel are decoded zero-based', () => {
  const parsed = parseTerminalInputChunk('', '\u001b[<0;11;6M\u001b[<32;12;6M\u001b[<0;12;6m\u001b[<64;1;1M\u001b[<65;1;1M');
  assert.deepEqual(parsed.events, [
    { kind: 'press', button: 'left', x: 10, y: 5, shift: false, ctrl: false },
    { kind: 'motion', x: 11, y: 5 },
    { kind: 'release', x: 11, y: 5 },
    { kind: 'wheel', delta: -1, x: 0, y: 0 },
    { kind: 'wheel', delta: 1, x: 0, y: 0 },
  ]);
  assert.equal(parsed.remainder, '');
});

void test('button and modifier bits map to press fields', () => {
  const parsed = parseTerminalInputChunk('', '\u001b[<2;3;4M\u001b[<1;3;4M\u001b[<4;3;4M\u001b[<16;3;4M\u001b[<3;3;4M');
  assert.deepEqual(parsed.events, [
    { kind: 'press', button: 'right', x: 2, y: 3, shift: false, ctrl: false },
    { kind: 'press', button: 'middle', x: 2, y: 3, shift: false, ctrl: false },
    { kind: 'press', button: 'left', x: 2, y: 3, shift: true, ctrl: false },
    { kind: 'press', button: 'left', x: 2, y: 3, shift: false, ctrl: true },
    { kind: 'release', x: 2, y: 3 },
  ]);
});

void test('a mouse sequence split across chunks is carried in the remainder', () => {
  const first = parseTerminalInputChunk('', 'j\u001b[<0;5');
  assert.deepEqual(first.events, [{ kind: 'key', key: 'j' }]);
  assert.equal(first.remainder, '\u001b[<0;5');

  const second = parseTerminalInputChunk(first.remainder, ';2M');
  assert.deepEqual(second.events, [{ kind: 'press', button: 'left', x: 4, y: 1, shift: false, ctrl: false }]);
  assert.equal(second.remainder, '');
});

void test('parseKeyText names arrows, control keys and printable characters', () => {
  assert.deepEqual(
    parseKeyText('\u001b[A\u001bOB\u001b[1;5C\r\t\u0003\u007fq\u001b').map((event) => event.key),
    ['up', 'down', 'right', 'enter', 'tab', 'ctrl+c', 'backspace', 'q', 'escape'],
  );
  assert.deepEqual(parseKeyText('\u0001'), []);
});

void test('mouse code helpers test the wheel and motion bits', () => {
  assert.equal(isWheelMouseCode(64), true);
  assert.equal(isWheelMouseCode(32), false);
  assert.equal(isMotionMouseCode(35), true);
  assert.equal(isMotionMouseCode(0), false);
});
