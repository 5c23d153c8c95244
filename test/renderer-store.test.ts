import assert from 'node:assert/strict';
import { test } from 'node:test';
import type { RenderPayload } from '../src/daemon/render-protocol.ts';
import {
  applyRenderPayloadToStore,
  createRendererStore,
  resizeRendererStore,
  scrollRendererStore,
  setRendererStatus,
  splitContentLines,
} from '../src/renderer/renderer-store.ts';

function payload(overrides: Partial<RenderPayload>): RenderPayload {
  return {
    content: '',
    regions: [],
    total_lines: 0,
    sequence_num: 1,
    is_touch_mode: false,
    width: 0,
    height: 0,
    ...overrides,
  };
}

void test('splitContentLines drops one trailing empty line', () => {
  assert.deepEqual(splitContentLines(''), []);
  assert.deepEqual(splitContentLines('a\nb\n'), ['a', 'b']);
  assert.deepEqual(splitContentLines('a\n\n'), ['a', '']);
});

void test('applyRenderPayloadToStore replaces the frame and only advances to newer sequences', () => {
  const store = createRendererStore({ width: 20, height: 3, status: 'connected' });
  const first = applyRenderPayloadToStore(
    store,
    payload({ content: 'one\ntwo\nthree\nfour\n', sequence_num: 5, terminal_bg: '#000000', is_touch_mode: true }),
  );
  assert.deepEqual(first, { sequenceAccepted: true, scrollChanged: false });
  const state = store.getState();
  assert.equal(state.sequenceNum, 5);
  assert.equal(state.terminalBg, '#000000');
  assert.deepEqual(state.frame?.lines, ['one', 'two', 'three', 'four']);
  assert.equal(state.frame?.totalLines, 4);
  assert.equal(state.frame?.isTouchMode, true);

  const stale = applyRenderPayloadToStore(store, payload({ content: 'replacement', sequence_num: 4 }));
  assert.equal(stale.sequenceAccepted, false);
  assert.equal(store.getState().sequenceNum, 5);
  assert.equal(store.getState().frame?.content, 'replacement');
  assert.equal(store.getState().terminalBg, '#000000');
});

void test('a shorter frame pulls the scroll offset back into range', () => {
  const store = createRendererStore({ width: 20, height: 2, status: 'connected' });
  applyRenderPayloadToStore(store, payload({ content: 'a\nb\nc\nd\ne', sequence_num: 1 }));
  assert.equal(scrollRendererStore(store, 3), true);
  assert.equal(store.getState().scrollOffset, 3);
  assert.equal(scrollRendererStore(store, 1), false);

  const result = applyRenderPayloadToStore(store, payload({ content: 'a\nb\nc', sequence_num: 2 }));
  assert.equal(result.scrollChanged, true);
  assert.equal(store.getState().scrollOffset, 1);
});

void test('resize clamps the offset and connecting resets the sequence', () => {
  const store = createRendererStore({ width: 20, height: 2 });
  applyRenderPayloadToStore(store, payload({ content: 'a\nb\nc\nd', sequence_num: 9 }));
  scrollRendererStore(store, 2);
  assert.equal(resizeRendererStore(store, 30, 4), true);
  assert.equal(store.getState().scrollOffset, 0);
  assert.equal(store.getState().width, 30);

  setRendererStatus(store, 'connected');
  assert.equal(store.getState().sequenceNum, 9);
  setRendererStatus(store, 'connecting');
  assert.equal(store.getState().sequenceNum, 0);
  assert.equal(store.getState().status, 'connecting');
});
