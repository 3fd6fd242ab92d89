/**
 * @file TabOrderingService.test.ts
 * @description Tests for opening, closing, moving, pinning and sorting tabs
 */

import { describe, it, expect, vi } from 'vitest';
import type { TablineConfiguration } from '../../../constants/styles';
import { NATURAL, animated } from '../../../models/Tab';
import { AnimationScheduler } from '../../../services/core/AnimationScheduler';
import { LayoutService } from '../../../services/core/LayoutService';
import { TabOrderingService } from '../../../services/core/TabOrderingService';
import { TabStateService } from '../../../services/core/TabStateService';
import { ManualClock } from '../../../services/core/clock';
import { JumpModeService } from '../../../services/ui/JumpModeService';
import { FakeHost, plainConfig } from '../../helpers/fakeHost';
import type { FakeDocument } from '../../helpers/fakeHost';

function documents(...ids: number[]): FakeDocument[] {
  return ids.map(id => ({ id, name: `/repo/${String.fromCharCode(96 + id).repeat(2)}` }));
}

function setup(host: FakeHost, settings: Record<string, unknown> = {}) {
  const config: TablineConfiguration = plainConfig(settings);
  const getConfig = () => config;
  const clock     = new ManualClock();
  const scheduler = new AnimationScheduler(clock);
  const state     = new TabStateService();
  const update    = vi.fn();
  const ordering  = new TabOrderingService(
    state,
    host,
    new LayoutService(getConfig),
    scheduler,
    new JumpModeService(getConfig),
    getConfig,
    () => ({ viewportWidth: 80 }),
    update,
  );
  return { clock, scheduler, state, update, ordering };
}

/** Pinned tabs never come after an unpinned one. */
function pinsFormPrefix(state: TabStateService): boolean {
  const pins = state.getAllTabs().map(tab => tab.state.pinned);
  return pins.every((pinned, i) => !pinned || pins.slice(0, i).every(Boolean));
}

describe('TabOrderingService', () => {
  describe('sync', () => {
    it('opens every host document in order and tracks the current one', () => {
      const host = new FakeHost(documents(1, 2, 3), 2);
      const { state, ordering } = setup(host);

      const tabs = ordering.sync();

      expect(tabs.map(tab => tab.id)).toEqual([1, 2, 3]);
      expect(tabs.map(tab => tab.metadata.label)).toEqual(['aa', 'bb', 'cc']);
      expect(tabs.map(tab => tab.state.activity)).toEqual(['Inactive', 'Current', 'Inactive']);
      expect(state.lastCurrent).toBe(2);
    });

    it('opens new documents next to the last current tab', () => {
      const host = new FakeHost(documents(1, 2, 3), 2);
      const { state, ordering } = setup(host);
      ordering.sync();

      host.open({ id: 4, name: '/repo/dd' });
      ordering.sync();

      expect(state.getOrder()).toEqual([1, 2, 4, 3]);
    });

    it('honours insert-at-start and insert-at-end', () => {
      const atStart = new FakeHost(documents(1, 2, 3), 2);
      const first   = setup(atStart, { insertAtStart: true });
      first.ordering.sync();
      atStart.open({ id: 4, name: '/repo/dd' });
      first.ordering.sync();
      expect(first.state.getOrder()).toEqual([4, 1, 2, 3]);

      const atEnd  = new FakeHost(documents(1, 2, 3), 2);
      const second = setup(atEnd, { insertAtEnd: true });
      second.ordering.sync();
      atEnd.open({ id: 4, name: '/repo/dd' });
      second.ordering.sync();
      expect(second.state.getOrder()).toEqual([1, 2, 3, 4]);
    });

    it('appends special documents at the end', () => {
      const host = new FakeHost(documents(1, 2, 3), 1);
      const { state, ordering } = setup(host);
      ordering.sync();

      host.open({ id: 4, name: 'quickfix', buftype: 'quickfix' });
      ordering.sync();

      expect(state.getOrder()).toEqual([1, 2, 3, 4]);
    });

    it('refreshes labels only when asked', () => {
      const host = new FakeHost(documents(1), 1);
      const { state, ordering } = setup(host);
      ordering.sync();

      host.documents[0].name = '/repo/renamed.ts';
      ordering.sync();
      expect(state.getTab(1)?.metadata.label).toBe('aa');

      ordering.sync(true);
      expect(state.getTab(1)?.metadata.label).toBe('renamed.ts');
    });

    it('keeps a single current tab', () => {
      const host = new FakeHost(documents(1, 2), 1);
      vi.spyOn(host, 'getActivity').mockReturnValue('Current');
      const { ordering } = setup(host);

      const tabs = ordering.sync();

      expect(tabs.map(tab => tab.state.activity)).toEqual(['Current', 'Visible']);
    });

    it('removes tabs whose documents are gone', () => {
      const host = new FakeHost(documents(1, 2), 1);
      const { state, ordering } = setup(host);
      ordering.sync();

      host.documents = host.documents.filter(document => document.id !== 2);
      ordering.sync();

      expect(state.getOrder()).toEqual([1]);
    });

    it('animates tabs whose documents are gone, drawn as inactive', () => {
      const host = new FakeHost(documents(1, 2), 2);
      const { state, ordering } = setup(host, { animation: true });
      ordering.sync();
      const tab = state.getTab(2);
      if (tab) { tab.state.realWidth = 10; }

      host.documents = host.documents.filter(document => document.id !== 2);
      ordering.sync();

      expect(tab?.state.closing).toBe(true);
      expect(tab?.state.activity).toBe('Inactive');
      expect(state.getOrder()).toEqual([1, 2]);
    });
  });

  describe('openMany', () => {
    it('does not animate a bulk open into an empty strip', () => {
      const host = new FakeHost(documents(1, 2, 3));
      const { state, scheduler, ordering } = setup(host, { animation: true });

      ordering.openMany([1, 2, 3]);

      expect(scheduler.size).toBe(0);
      expect(state.getAllTabs().every(tab => tab.state.width === NATURAL)).toBe(true);
    });

    it('does not animate the first tab', () => {
      const host = new FakeHost(documents(1));
      const { scheduler, ordering } = setup(host, { animation: true });

      ordering.openMany([1]);

      expect(scheduler.size).toBe(0);
    });

    it('grows a single new tab after the open delay', () => {
      const host = new FakeHost(documents(1, 2, 3, 4));
      const { clock, state, scheduler, update, ordering } = setup(host, { animation: true });
      ordering.openMany([1, 2, 3]);

      ordering.openMany([4]);
      const tab = state.getTab(4);

      // Four tabs of 6 base columns in 80 → padding 4, natural width 6 + 2 * 4 = 14
      expect(tab?.state.width).toEqual(animated(1));
      expect(tab?.state.realWidth).toBe(14);
      expect(scheduler.size).toBe(1);

      clock.advance(50);
      expect(tab?.state.width).toEqual(animated(1));

      clock.advance(75);
      // 1 + (14 - 1) * 0.5 = 7.5, rounded
      expect(tab?.state.width).toEqual(animated(8));

      clock.advance(75);
      expect(tab?.state.width).toBe(NATURAL);
      expect(scheduler.size).toBe(0);
      expect(update).toHaveBeenCalled();
    });

    it('animates a second tab opened next to a single one', () => {
      const host = new FakeHost(documents(1, 2));
      const { scheduler, ordering } = setup(host, { animation: true });
      ordering.openMany([1]);

      ordering.openMany([2]);

      expect(scheduler.size).toBe(1);
    });

    it('keeps pinned tabs in front', () => {
      const host = new FakeHost(documents(1, 2, 3), 1);
      const { state, ordering } = setup(host, { insertAtStart: true });
      ordering.openMany([1, 2]);
      ordering.togglePin(2);

      ordering.openMany([3]);

      expect(state.getOrder()).toEqual([2, 3, 1]);
      expect(pinsFormPrefix(state)).toBe(true);
    });
  });

  describe('close', () => {
    it('closes every tab but the current one', () => {
      const host = new FakeHost(documents(1, 2, 3), 2);
      const { state, update, ordering } = setup(host);
      ordering.sync();

      ordering.closeAllButCurrent();

      expect(host.closed).toEqual([1, 3]);
      expect(state.getOrder()).toEqual([2]);
      expect(update).toHaveBeenCalledTimes(1);
    });

    it('closes every unpinned tab', () => {
      const host = new FakeHost(documents(1, 2, 3), 2);
      const { state, ordering } = setup(host);
      ordering.sync();
      state.togglePin(1);

      ordering.closeAllButPinned();

      expect(host.closed).toEqual([2, 3]);
      expect(state.getOrder()).toEqual([1]);
    });

    it('keeps the current and pinned tabs', () => {
      const host = new FakeHost(documents(1, 2, 3, 4), 3);
      const { state, ordering } = setup(host);
      ordering.sync();
      state.togglePin(1);

      ordering.closeAllButCurrentOrPinned();

      expect(host.closed).toEqual([2, 4]);
      expect(state.getOrder()).toEqual([1, 3]);
    });

    it('closes the tabs left of the current one, nearest first', () => {
      const host = new FakeHost(documents(1, 2, 3, 4), 3);
      const { state, ordering } = setup(host);
      ordering.sync();

      ordering.closeLeft();

      expect(host.closed).toEqual([2, 1]);
      expect(state.getOrder()).toEqual([3, 4]);
    });

    it('closes the tabs right of the current one, farthest first', () => {
      const host = new FakeHost(documents(1, 2, 3, 4), 2);
      const { state, ordering } = setup(host);
      ordering.sync();

      ordering.closeRight();

      expect(host.closed).toEqual([4, 3]);
      expect(state.getOrder()).toEqual([1, 2]);
    });

    it('does nothing left of the first tab', () => {
      const host = new FakeHost(documents(1, 2), 1);
      const { update, ordering } = setup(host);
      ordering.sync();

      ordering.closeLeft();

      expect(host.closed).toEqual([]);
      expect(update).not.toHaveBeenCalled();
    });

    it('shrinks a closing tab to zero, then removes it', () => {
      const host = new FakeHost(documents(1, 2), 1);
      const { clock, state, scheduler, ordering } = setup(host, { animation: true });
      ordering.sync();
      const tab = state.getTab(2);
      if (tab) { tab.state.realWidth = 10; }

      ordering.closeAnimated(2);
      expect(tab?.state.closing).toBe(true);
      expect(tab?.state.width).toEqual(animated(10));

      clock.advance(75);
      expect(tab?.state.width).toEqual(animated(5));

      clock.advance(75);
      expect(state.has(2)).toBe(false);
      expect(scheduler.size).toBe(0);
    });

    it('removes right away when the width is already zero', () => {
      const host = new FakeHost(documents(1, 2), 1);
      const { state, scheduler, ordering } = setup(host, { animation: true });
      ordering.sync();

      ordering.closeAnimated(2);

      expect(state.has(2)).toBe(false);
      expect(scheduler.size).toBe(0);
    });

    it('close() interrupts a running close animation', () => {
      const host = new FakeHost(documents(1, 2), 1);
      const { clock, state, scheduler, ordering } = setup(host, { animation: true });
      ordering.sync();
      const tab = state.getTab(2);
      if (tab) { tab.state.realWidth = 10; }
      ordering.closeAnimated(2);

      ordering.close(2);
      clock.advance(150);

      expect(state.has(2)).toBe(false);
      expect(scheduler.size).toBe(0);
    });
  });

  describe('moveTo', () => {
    it('moves by 1-based indices and clamps the target', () => {
      const host = new FakeHost(documents(1, 2, 3), 1);
      const { state, ordering } = setup(host);
      ordering.sync();

      ordering.moveTo(1, 99);
      expect(state.getOrder()).toEqual([2, 3, 1]);

      ordering.moveTo(3, -1);
      expect(state.getOrder()).toEqual([1, 2, 3]);

      ordering.moveTo(3, -2);
      expect(state.getOrder()).toEqual([3, 1, 2]);
    });

    it('is a no-op for the same index or an invalid source', () => {
      const host = new FakeHost(documents(1, 2, 3), 1);
      const { state, update, ordering } = setup(host);
      ordering.sync();

      ordering.moveTo(2, 2);
      ordering.moveTo(0, 1);
      ordering.moveTo(4, 1);

      expect(state.getOrder()).toEqual([1, 2, 3]);
      expect(update).not.toHaveBeenCalled();
    });

    it('cannot move an unpinned tab in front of a pinned one', () => {
      const host = new FakeHost(documents(1, 2, 3), 1);
      const { state, ordering } = setup(host);
      ordering.sync();
      ordering.togglePin(3);

      ordering.moveTo(3, 1);

      expect(state.getOrder()).toEqual([3, 2, 1]);
      expect(pinsFormPrefix(state)).toBe(true);
    });

    it('moves the current tab to an index or by a number of steps', () => {
      const host = new FakeHost(documents(1, 2, 3), 2);
      const { state, ordering } = setup(host);
      ordering.sync();

      ordering.moveCurrentBy(1);
      expect(state.getOrder()).toEqual([1, 3, 2]);

      ordering.moveCurrentBy(-5);
      expect(state.getOrder()).toEqual([2, 1, 3]);

      ordering.moveCurrentTo(-1);
      expect(state.getOrder()).toEqual([1, 3, 2]);
    });

    it('slides positions from the old layout to the new one', () => {
      const host = new FakeHost(documents(1, 2, 3), 1);
      const { clock, state, update, ordering } = setup(host, { animation: true });
      ordering.sync();
      const position = (id: number) => state.getTab(id)?.state.position;

      // Three tabs of 14 columns: 1 → 0, 2 → 14, 3 → 28
      ordering.moveTo(1, 3);

      expect(state.getOrder()).toEqual([2, 3, 1]);
      expect(position(1)).toEqual(animated(0));
      expect(position(2)).toEqual(animated(14));
      expect(position(3)).toEqual(animated(28));
      expect(update).toHaveBeenCalledWith({ refocus: false });

      clock.advance(75);
      expect(position(1)).toEqual(animated(14));
      expect(position(2)).toEqual(animated(7));
      expect(position(3)).toEqual(animated(21));

      clock.advance(75);
      expect(position(1)).toBe(NATURAL);
      expect(position(2)).toBe(NATURAL);
      expect(position(3)).toBe(NATURAL);
    });
  });

  describe('togglePin', () => {
    it('pins the current tab by default and moves it to the front', () => {
      const host = new FakeHost(documents(1, 2, 3), 3);
      const { state, ordering } = setup(host);
      ordering.sync();

      ordering.togglePin();

      expect(state.isPinned(3)).toBe(true);
      expect(state.getOrder()).toEqual([3, 1, 2]);

      ordering.togglePin(3);
      expect(state.isPinned(3)).toBe(false);
      expect(state.getOrder()).toEqual([3, 1, 2]);
    });

    it('ignores unknown ids', () => {
      const host = new FakeHost(documents(1), 1);
      const { update, ordering } = setup(host);
      ordering.sync();

      ordering.togglePin(42);

      expect(update).not.toHaveBeenCalled();
    });
  });

  describe('sortBy', () => {
    it('sorts by document number with pins first', () => {
      const host = new FakeHost(documents(3, 1, 2), 1);
      const { state, ordering } = setup(host);
      ordering.sync();
      expect(state.getOrder()).toEqual([3, 1, 2]);

      ordering.sortBy('number');
      expect(state.getOrder()).toEqual([1, 2, 3]);

      state.togglePin(3);
      ordering.sortBy('number');
      expect(state.getOrder()).toEqual([3, 1, 2]);
      expect(pinsFormPrefix(state)).toBe(true);
    });

    it('sorts by directory depth, then name', () => {
      const host = new FakeHost([
        { id: 1, name: '/p/z.ts' },
        { id: 2, name: '/p/q/a.ts' },
        { id: 3, name: '/p/b.ts' },
      ], 1);
      const { state, ordering } = setup(host);
      ordering.sync();

      ordering.sortBy('directory');

      expect(state.getOrder()).toEqual([3, 1, 2]);
    });

    it('sorts by language', () => {
      const host = new FakeHost([
        { id: 1, name: '/p/a.ts', filetype: 'typescript' },
        { id: 2, name: '/p/b.rb', filetype: 'ruby' },
        { id: 3, name: '/p/c' },
      ], 1);
      const { state, ordering } = setup(host);
      ordering.sync();

      ordering.sortBy('language');

      expect(state.getOrder()).toEqual([3, 2, 1]);
    });

    it('sorts by window number', () => {
      const host = new FakeHost([
        { id: 1, name: '/p/a', window: 2 },
        { id: 2, name: '/p/b' },
        { id: 3, name: '/p/c', window: 1 },
      ], 1);
      const { state, ordering } = setup(host);
      ordering.sync();

      ordering.sortBy('window');

      expect(state.getOrder()).toEqual([2, 3, 1]);
    });
  });
});
