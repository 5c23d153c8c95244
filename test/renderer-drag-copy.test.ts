import assert from 'node:assert/strict';
import { test } from 'node:test';
import {
  copyTextToClipboards,
  countCopiedLines,
  encodeOsc52,
  extractDragText,
} from '../src/renderer/drag-copy.ts';
import { RecordingMuxControl } from './mux-test-fakes.ts';

const LINES = ['\u001b[1mwin-1\u001b[0m  editor    ', '  shell   ', 'last line'];

void test('extractDragText slices one row by inclusive columns without styling', () => {
  assert.equal(extractDragText(LINES, { x: 2, y: 0 }, { x: 4, y: 0 }, 0), 'n-1');
});

void test('extractDragText normalizes a backwards drag across rows', () => {
  assert.equal(extractDragText(LINES, { x: 3, y: 1 }, { x: 4, y: 0 }, 0), '1  editor\n  sh');
  assert.equal(extractDragText(LINES, { x: 7, y: 0 }, { x: 3, y: 2 }, 0), 'editor\n  shell\nlast');
});

void test('extractDragText maps rows through the scroll offset and clamps to content', () => {
  assert.equal(extractDragText(LINES, { x: 0, y: 0 }, { x: 4, y: 0 }, 1), 'she');
  assert.equal(extractDragText(LINES, { x: 0, y: 1 }, { x: 3, y: 9 }, 0), 'shell\nlast');
  assert.equal(extractDragText(LINES, { x: 0, y: 5 }, { x: 3, y: 6 }, 0), '');
});

void test('extractDragText keeps wide glyphs that overlap the selection', () => {
  assert.equal(extractDragText(['日本語'], { x: 1, y: 0 }, { x: 2, y: 0 }, 0), '日本');
});

void test('encodeOsc52 wraps base64 text and countCopiedLines counts rows', () => {
  assert.equal(encodeOsc52('hi'), '\u001b]52;c;aGk=\u0007');
  assert.equal(countCopiedLines('a'), 1);
  assert.equal(countCopiedLines('a\nb\nc'), 3);
});

void test('copyTextToClipboards fills the paste buffer, every client tty and a status message', async () => {
  const mux = new RecordingMuxControl();
  mux.clientTtys = ['/dev/pts/3', '', '/dev/pts/4'];
  const writes: string[] = [];
  const copied = await copyTextToClipboards('hi\nthere', {
    mux,
    writeTty: (ttyPath, data) => {
      writes.push(`${ttyPath}=${data}`);
      return Promise.resolve();
    },
  });
  assert.equal(copied, true);
  assert.deepEqual(mux.calls, [
    ['set-buffer', '--', 'hi\nthere'],
    ['list-clients', '-F', '#{client_tty}'],
    ['display-message', '-d', '1500', 'Copied 2 lines'],
  ]);
  const sequence = encodeOsc52('hi\nthere');
  assert.deepEqual(writes, [`/dev/pts/3=${sequence}`, `/dev/pts/4=${sequence}`]);
});

void test('copyTextToClipboards keeps going when individual destinations fail', async () => {
  const mux = new RecordingMuxControl();
  mux.failing.add('set-buffer');
  mux.clientTtys = ['/dev/pts/8', '/dev/pts/9'];
  const writes: string[] = [];
  const copied = await copyTextToClipboards('x', {
    mux,
    writeTty: (ttyPath) => {
      if (ttyPath === '/dev/pts/8') {
        return Promise.reject(new Error('EACCES'));
      }
      writes.push(ttyPath);
      return Promise.resolve();
    },
  });
  assert.equal(copied, true);
  assert.deepEqual(writes, ['/dev/pts/9']);
  assert.deepEqual(mux.calls.at(-1), ['display-message', '-d', '1500', 'Copied 1 lines']);
});

void test('copyTextToClipboards does nothing for empty text', async () => {
  const mux = new RecordingMuxControl();
  assert.equal(await copyTextToClipboards('', { mux }), false);
  assert.deepEqual(mux.calls, []);
});
