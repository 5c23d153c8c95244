import assert from 'node:assert/strict';
import { test } from 'node:test';
import { DEFAULT_MUXRAIL_CONFIG } from '../src/config/config-core.ts';
import type { InputPayload, MenuPayload, RenderPayload } from '../src/daemon/render-protocol.ts';
import { encodeOsc52 } from '../src/renderer/drag-copy.ts';
import { RendererRuntime, type RendererTransport } from '../src/renderer/renderer-runtime.ts';
import { createRendererStore, type RendererStore } from '../src/renderer/renderer-store.ts';
import type { PointerEvent } from '../src/renderer/terminal-input.ts';
import { ManualClock } from './gesture-test-clock.ts';
import { RecordingMuxControl } from './mux-test-fakes.ts';

class FakeTransport implements RendererTransport {
  readonly inputs: InputPayload[] = [];
  readonly viewportUpdates: number[] = [];
  readonly resizes: string[] = [];
  unsubscribeCalls = 0;

  sendInput(input: InputPayload): boolean {
    this.inputs.push(input);
    return true;
  }

  sendViewportUpdate(viewportOffset: number): boolean {
    this.viewportUpdates.push(viewportOffset);
    return true;
  }

  sendResize(width: number, height: number): boolean {
    this.resizes.push(`${String(width)}x${String(height)}`);
    return true;
  }

  unsubscribe(): Promise<void> {
    this.unsubscribeCalls += 1;
    return Promise.resolve();
  }
}

interface RuntimeRig {
  readonly runtime: RendererRuntime;
  readonly store: RendererStore;
  readonly transport: FakeTransport;
  readonly mux: RecordingMuxControl;
  readonly clock: ManualClock;
  readonly ttyWrites: string[];
  paints: number;
  quits: number;
}

const CONTENT_LINES = ['win-1  editor', 'group one', 'docs link', 'line four', 'line five'];

function renderPayload(overrides: Partial<RenderPayload> = {}): RenderPayload {
  return {
    content: CONTENT_LINES.join('\n'),
    regions: [
      { start_line: 0, end_line: 0, start_col: 0, end_col: 0, action: 'select_window', target: '@2' },
      { start_line: 1, end_line: 1, start_col: 0, end_col: 0, action: 'toggle_group', target: 'g1' },
      { start_line: 2, end_line: 2, start_col: 0, end_col: 0, action: 'open_url', target: 'docs' },
    ],
    total_lines: 5,
    sequence_num: 1,
    is_touch_mode: false,
    width: 20,
    height: 3,
    ...overrides,
  };
}

function createRig(paneId = '%5'): RuntimeRig {
  const store = createRendererStore({ width: 20, height: 3, status: 'connected' });
  const transport = new FakeTransport();
  const mux = new RecordingMuxControl();
  mux.clientTtys = ['/dev/pts/7'];
  const clock = new ManualClock();
  const ttyWrites: string[] = [];
  const rig: RuntimeRig = {
    runtime: new RendererRuntime({
      paneId,
      store,
      transport,
      mux,
      gesture: DEFAULT_MUXRAIL_CONFIG.gesture,
      requestPaint: () => {
        rig.paints += 1;
      },
      onQuit: () => {
        rig.quits += 1;
      },
      nowMs: clock.now,
      schedule: clock.schedule,
      writeTty: (ttyPath, data) => {
        ttyWrites.push(`${ttyPath}=${data}`);
        return Promise.resolve();
      },
    }),
    store,
    transport,
    mux,
    clock,
    ttyWrites,
    paints: 0,
    quits: 0,
  };
  rig.runtime.handleServerMessage({ type: 'render', client_id: 'c1', payload: renderPayload() });
  return rig;
}

function press(x: number, y: number): PointerEvent {
  return { kind: 'press', button: 'left', x, y, shift: false, ctrl: false };
}

function tap(rig: RuntimeRig, x: number, y: number): void {
  rig.clock.advance(1000);
  rig.runtime.handleTerminalEvent(press(x, y));
  rig.clock.advance(50);
  rig.runtime.handleTerminalEvent({ kind: 'release', x, y });
}

function expectedInput(overrides: Partial<InputPayload>): InputPayload {
  return {
    sequence_num: 1,
    type: 'action',
    mouse_x: 0,
    mouse_y: 0,
    button: '',
    action: '',
    viewport_offset: 0,
    resolved_action: '',
    resolved_target: '',
    pane_id: '%5',
    is_simulated_right_click: false,
    is_touch_mode: false,
    ...overrides,
  };
}

const WINDOW_MENU: MenuPayload = {
  title: 'Window',
  x: 0,
  y: 0,
  items: [{ label: 'Rename', key: 'r' }, { label: 'Close' }],
};

void test('a render frame updates the store and requests a paint', () => {
  const rig = createRig();
  assert.equal(rig.paints, 1);
  assert.equal(rig.store.getState().frame?.totalLines, 5);
  assert.equal(rig.store.getState().sequenceNum, 1);
  assert.deepEqual(rig.runtime.renderRows(0), ['win-1  editor       \u001b[0m', 'group one           \u001b[0m', 'docs link           \u001b[0m']);
});

void test('a tap sends an action input resolved against the frame regions', () => {
  const rig = createRig();
  tap(rig, 2, 0);
  assert.deepEqual(rig.transport.inputs, [
    expectedInput({
      mouse_x: 2,
      mouse_y: 0,
      button: 'left',
      action: 'press',
      resolved_action: 'select_window',
      resolved_target: '@2',
    }),
  ]);
});

void test('a tap in the edge zone on a configured action becomes a simulated right click', () => {
  const rig = createRig();
  tap(rig, 18, 0);
  tap(rig, 18, 2);
  assert.deepEqual(
    rig.transport.inputs.map((input) => [input.resolved_action, input.button, input.is_simulated_right_click]),
    [
      ['select_window', 'right', true],
      ['open_url', 'left', false],
    ],
  );
});

void test('a long press sends a simulated right click', () => {
  const rig = createRig();
  rig.runtime.handleTerminalEvent(press(3, 1));
  rig.clock.advance(500);
  rig.runtime.handleTerminalEvent({ kind: 'release', x: 3, y: 1 });
  assert.deepEqual(rig.transport.inputs, [
    expectedInput({
      mouse_x: 3,
      mouse_y: 1,
      button: 'right',
      action: 'press',
      resolved_action: 'toggle_group',
      resolved_target: 'g1',
      is_simulated_right_click: true,
    }),
  ]);
});

void test('scroll keys and the wheel move the viewport and report it', () => {
  const rig = createRig();
  rig.runtime.handleTerminalEvent({ kind: 'key', key: 'down' });
  rig.runtime.handleTerminalEvent({ kind: 'wheel', delta: 1, x: 0, y: 0 });
  rig.runtime.handleTerminalEvent({ kind: 'key', key: 'j' });
  rig.runtime.handleTerminalEvent({ kind: 'key', key: 'k' });
  assert.deepEqual(rig.transport.viewportUpdates, [1, 2, 1]);

  tap(rig, 2, 0);
  assert.equal(rig.transport.inputs[0]?.resolved_action, 'toggle_group');
  assert.equal(rig.transport.inputs[0]?.viewport_offset, 1);
});

void test('a shorter frame or a taller surface pulls the viewport back', () => {
  const rig = createRig();
  rig.runtime.handleTerminalEvent({ kind: 'key', key: 'down' });
  rig.runtime.handleTerminalEvent({ kind: 'key', key: 'down' });
  rig.runtime.handleResize(20, 4);
  assert.deepEqual(rig.transport.resizes, ['20x4']);
  assert.deepEqual(rig.transport.viewportUpdates, [1, 2, 1]);

  rig.runtime.handleServerMessage({
    type: 'render',
    client_id: 'c1',
    payload: renderPayload({ content: 'only\nthree\nlines', total_lines: 3, sequence_num: 2 }),
  });
  assert.deepEqual(rig.transport.viewportUpdates, [1, 2, 1, 0]);
});

void test('enter and r are forwarded as key inputs', () => {
  const rig = createRig();
  rig.runtime.handleTerminalEvent({ kind: 'key', key: 'enter' });
  rig.runtime.handleTerminalEvent({ kind: 'key', key: 'r' });
  rig.runtime.handleTerminalEvent({ kind: 'key', key: 'z' });
  assert.deepEqual(
    rig.transport.inputs.map((input) => [input.type, input.key]),
    [
      ['key', 'enter'],
      ['key', 'r'],
    ],
  );
});

void test('a drag copies the selected text to the paste buffer and client ttys', async () => {
  const rig = createRig();
  rig.runtime.handleTerminalEvent(press(0, 0));
  rig.clock.advance(50);
  rig.runtime.handleTerminalEvent({ kind: 'release', x: 6, y: 0 });
  await rig.runtime.settle();
  assert.deepEqual(rig.transport.inputs, []);
  assert.deepEqual(rig.mux.calls, [
    ['set-buffer', '--', 'win-1'],
    ['list-clients', '-F', '#{client_tty}'],
    ['display-message', '-d', '1500', 'Copied 1 lines'],
  ]);
  assert.deepEqual(rig.ttyWrites, [`/dev/pts/7=${encodeOsc52('win-1')}`]);
});

void test('a held press that opens a menu can be released on an item to select it', async () => {
  const rig = createRig();
  rig.runtime.handleTerminalEvent(press(3, 1));
  rig.clock.advance(500);
  rig.runtime.handleServerMessage({ type: 'menu', client_id: 'c1', payload: WINDOW_MENU });
  assert.equal(rig.runtime.isMenuOpen(), true);

  rig.runtime.handleTerminalEvent({ kind: 'motion', x: 3, y: 2 });
  assert.equal(rig.runtime.menuHighlightedIndex(), 1);
  rig.runtime.handleTerminalEvent({ kind: 'release', x: 3, y: 2 });
  assert.equal(rig.runtime.isMenuOpen(), false);
  await rig.runtime.settle();

  assert.deepEqual(rig.transport.inputs.at(-1), expectedInput({ type: 'menu_select', mouse_x: 1 }));
  assert.deepEqual(rig.mux.calls, [
    ['select-pane', '-t', '%5'],
    ['select-pane', '-l'],
  ]);
});

void test('pane focus and restore reach the multiplexer in menu order even when focus answers slowly', async () => {
  const rig = createRig();
  rig.mux.latencyMs.set('select-pane -t %5', 20);
  rig.mux.latencyMs.set('select-pane -l', 1);

  rig.runtime.handleServerMessage({ type: 'menu', client_id: 'c1', payload: WINDOW_MENU });
  rig.runtime.handleTerminalEvent({ kind: 'key', key: 'r' });
  rig.runtime.handleServerMessage({ type: 'menu', client_id: 'c1', payload: WINDOW_MENU });
  rig.runtime.handleServerMessage({ type: 'menu', client_id: 'c1', payload: WINDOW_MENU });
  rig.runtime.handleTerminalEvent({ kind: 'key', key: 'escape' });
  await rig.runtime.settle();

  assert.deepEqual(rig.mux.completed, [
    'select-pane -t %5',
    'select-pane -l',
    'select-pane -t %5',
    'select-pane -l',
    'select-pane -t %5',
    'select-pane -l',
  ]);
  assert.deepEqual(
    rig.transport.inputs.map((input) => input.mouse_x),
    [0, -1, -1],
  );
});

void test('a failed focus change is logged and later changes still run', async () => {
  const rig = createRig();
  rig.mux.failing.add('select-pane');
  rig.runtime.handleServerMessage({ type: 'menu', client_id: 'c1', payload: WINDOW_MENU });
  rig.runtime.handleTerminalEvent({ kind: 'key', key: 'escape' });
  await rig.runtime.settle();
  assert.deepEqual(rig.mux.completed, ['select-pane -t %5', 'select-pane -l']);
});

void test('keyboard selection and cancellation each send exactly one menu_select', () => {
  const rig = createRig();
  rig.runtime.handleServerMessage({ type: 'menu', client_id: 'c1', payload: WINDOW_MENU });
  rig.runtime.handleTerminalEvent({ kind: 'key', key: 'down' });
  rig.runtime.handleTerminalEvent({ kind: 'key', key: 'enter' });
  rig.runtime.handleServerMessage({ type: 'menu', client_id: 'c1', payload: WINDOW_MENU });
  rig.runtime.handleServerMessage({ type: 'menu', client_id: 'c1', payload: WINDOW_MENU });
  rig.runtime.handleTerminalEvent({ kind: 'key', key: 'escape' });
  assert.deepEqual(
    rig.transport.inputs.map((input) => [input.type, input.mouse_x]),
    [
      ['menu_select', 0],
      ['menu_select', -1],
      ['menu_select', -1],
    ],
  );
  assert.deepEqual(rig.transport.viewportUpdates, []);
});

void test('the menu overlay is drawn over the content rows', () => {
  const rig = createRig();
  rig.runtime.handleServerMessage({ type: 'menu', client_id: 'c1', payload: WINDOW_MENU });
  const rows = rig.runtime.renderRows(0);
  assert.equal(rows.length, 3);
  assert.equal(rows[0], '\u001b[38;5;241m┌─Window' + '─'.repeat(11) + '┐\u001b[0m');
});

void test('without a pane id the menu neither focuses nor restores panes', async () => {
  const rig = createRig('');
  rig.runtime.handleServerMessage({ type: 'menu', client_id: 'c1', payload: WINDOW_MENU });
  rig.runtime.handleTerminalEvent({ kind: 'key', key: 'q' });
  await rig.runtime.settle();
  assert.deepEqual(rig.mux.calls, []);
  assert.equal(rig.transport.inputs[0]?.pane_id, '');
  assert.equal(rig.quits, 0);
});

void test('quitting cancels an open menu, unsubscribes once and then calls onQuit', async () => {
  const rig = createRig();
  rig.runtime.handleServerMessage({ type: 'menu', client_id: 'c1', payload: WINDOW_MENU });
  rig.runtime.requestQuit();
  rig.runtime.requestQuit();
  await rig.runtime.settle();
  assert.deepEqual(
    rig.transport.inputs.map((input) => [input.type, input.mouse_x]),
    [['menu_select', -1]],
  );
  assert.equal(rig.transport.unsubscribeCalls, 1);
  assert.equal(rig.quits, 1);
});

void test('q and ctrl+c quit when no menu is open', async () => {
  for (const key of ['q', 'ctrl+c']) {
    const rig = createRig();
    rig.runtime.handleTerminalEvent({ kind: 'key', key });
    await rig.runtime.settle();
    assert.equal(rig.transport.unsubscribeCalls, 1);
    assert.equal(rig.quits, 1);
  }
});
