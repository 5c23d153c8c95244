import assert from 'node:assert/strict';
import { test } from 'node:test';
import {
  currentPaneId,
  displayMessage,
  focusPane,
  listClientTtys,
  restoreLastPane,
  setPasteBuffer,
} from '../src/mux/mux-control.ts';
import { RecordingMuxControl } from './mux-test-fakes.ts';

void test('mux helpers issue the expected commands', async () => {
  const mux = new RecordingMuxControl();
  await focusPane(mux, '%4');
  await restoreLastPane(mux);
  await setPasteBuffer(mux, '-n looks like a flag');
  await displayMessage(mux, 'hello', 800);
  assert.deepEqual(mux.calls, [
    ['select-pane', '-t', '%4'],
    ['select-pane', '-l'],
    ['set-buffer', '--', '-n looks like a flag'],
    ['display-message', '-d', '800', 'hello'],
  ]);
});

void test('listClientTtys trims and drops blank lines', async () => {
  const mux = new RecordingMuxControl();
  mux.clientTtys = [' /dev/pts/1 ', '', '/dev/pts/2'];
  assert.deepEqual(await listClientTtys(mux), ['/dev/pts/1', '/dev/pts/2']);
});

void test('currentPaneId returns the trimmed id or null', async () => {
  const mux = new RecordingMuxControl();
  mux.paneId = '%12';
  assert.equal(await currentPaneId(mux), '%12');
  mux.paneId = '';
  assert.equal(await currentPaneId(mux), null);
});
