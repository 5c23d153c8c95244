import assert from 'node:assert/strict';
import { test } from 'node:test';
import type { ClickableRegion } from '../src/daemon/render-protocol.ts';
import {
  findRegionAt,
  hitTestScreenPoint,
  isEdgeZoneColumn,
  isEdgeZoneRightClick,
  regionContains,
} from '../src/renderer/region-hit-test.ts';

function region(overrides: Partial<ClickableRegion>): ClickableRegion {
  return {
    start_line: 0,
    end_line: 0,
    start_col: 0,
    end_col: 0,
    action: '',
    target: '',
    ...overrides,
  };
}

void test('regionContains treats end_col 0 as the full width and end_col as exclusive', () => {
  const fullRow = region({ start_line: 2, end_line: 3 });
  assert.equal(regionContains(fullRow, 2, 0, 30), true);
  assert.equal(regionContains(fullRow, 3, 29, 30), true);
  assert.equal(regionContains(fullRow, 3, 30, 30), false);
  assert.equal(regionContains(fullRow, 4, 0, 30), false);

  const bounded = region({ start_col: 4, end_col: 8 });
  assert.equal(regionContains(bounded, 0, 3, 30), false);
  assert.equal(regionContains(bounded, 0, 4, 30), true);
  assert.equal(regionContains(bounded, 0, 7, 30), true);
  assert.equal(regionContains(bounded, 0, 8, 30), false);
});

void test('the first stored region wins over later overlapping ones', () => {
  const regions = [
    region({ start_line: 0, end_line: 5, action: 'toggle_group', target: 'g1' }),
    region({ start_line: 2, end_line: 2, start_col: 2, end_col: 6, action: 'select_window', target: '@4' }),
  ];
  assert.equal(findRegionAt(regions, 2, 3, 20)?.target, 'g1');
  assert.equal(findRegionAt([...regions].reverse(), 2, 3, 20)?.target, '@4');
  assert.equal(findRegionAt(regions, 9, 3, 20), null);
});

void test('hitTestScreenPoint maps through the scroll offset and misses with empty strings', () => {
  const regions = [region({ start_line: 12, end_line: 12, action: 'select_pane', target: '%7' })];
  assert.deepEqual(hitTestScreenPoint(regions, 1, 2, 10, 20), { action: 'select_pane', target: '%7' });
  assert.deepEqual(hitTestScreenPoint(regions, 1, 2, 0, 20), { action: '', target: '' });
});

void test('edge zone covers the rightmost columns for configured actions only', () => {
  assert.equal(isEdgeZoneColumn(27, 30, 3), true);
  assert.equal(isEdgeZoneColumn(26, 30, 3), false);
  assert.equal(isEdgeZoneColumn(29, 30, 0), false);

  const actions = ['select_window', 'select_pane'];
  assert.equal(isEdgeZoneRightClick({ action: 'select_window', target: '@1' }, 28, 30, 3, actions), true);
  assert.equal(isEdgeZoneRightClick({ action: 'toggle_group', target: 'g' }, 28, 30, 3, actions), false);
  assert.equal(isEdgeZoneRightClick({ action: 'select_window', target: '@1' }, 10, 30, 3, actions), false);
});
