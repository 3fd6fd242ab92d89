import type { TablineConfiguration } from '../../constants/styles';
import { TIMINGS } from '../../constants/timings';
import type { DocumentProvider } from '../../models/Host';
import type { LayoutInput } from '../../models/Layout';
import { NATURAL, Tab, animated } from '../../models/Tab';
import type { DocumentId, TabActivity } from '../../models/Tab';
import { compareStrings, formatTabLabel, pathDepth } from '../../utils/helpers';
import type { JumpModeService } from '../ui/JumpModeService';
import { lerp } from './Animation';
import type { Animation, SchedulerTask } from './Animation';
import type { AnimationScheduler } from './AnimationScheduler';
import type { LayoutService } from './LayoutService';
import type { TabStateService } from './TabStateService';

export type SortCriterion = 'number' | 'directory' | 'language' | 'window';

export type UpdateOptions = {
  /** Re-read names and labels of every tab. */
  updateNames? : boolean;
  /** Scroll so the current tab is visible (default `true`). */
  refocus?     : boolean;
};

/**
 * Operaciones sobre el orden y la vida de las tabs: mover, pinear, ordenar,
 * abrir y cerrar (con sus animaciones).
 * Cada comando público termina pidiendo un render con `update()`; `sync()`
 * no lo hace porque se ejecuta dentro de un render.
 */
export class TabOrderingService {
  /** Open/close animation that currently owns each tab's width. */
  private widthAnimations: Map<DocumentId, SchedulerTask> = new Map();

  constructor(
    private readonly state          : TabStateService,
    private readonly host           : DocumentProvider,
    private readonly layoutService  : LayoutService,
    private readonly scheduler      : AnimationScheduler,
    private readonly jumpMode       : JumpModeService,
    private readonly getConfig      : () => TablineConfiguration,
    private readonly getLayoutInput : () => LayoutInput,
    private readonly update         : (options?: UpdateOptions) => void,
  ) {}

  //= SYNC

  /**
   * Reconciles the state with the documents the host has open:
   * new ones are opened, vanished ones start closing, and activity,
   * modified flag and (when asked, or for new tabs) labels are refreshed.
   */
  sync(updateNames = false): Tab[] {
    const open    = this.host.listOpenDocuments();
    const openSet = new Set(open);

    for (const tab of this.state.getAllTabs()) {
      if (!openSet.has(tab.id) && !tab.state.closing) { this.beginClose(tab.id); }
    }

    const added = open.filter(id => !this.state.has(id));
    if (added.length > 0) { this.openTabs(added); }
    const addedSet = new Set(added);

    const config = this.getConfig();
    let current: DocumentId | undefined;

    for (const tab of this.state.getAllTabs()) {
      // Closing tabs are drawn as inactive until they are gone
      if (!openSet.has(tab.id)) {
        tab.state.activity = 'Inactive';
        continue;
      }

      if (updateNames || addedSet.has(tab.id)) {
        tab.metadata.name  = this.host.getName(tab.id);
        tab.metadata.label = formatTabLabel(tab.metadata.name, config);
      }

      // Only one tab may be current; the first one reported wins
      let activity: TabActivity = this.host.getActivity(tab.id);
      if (activity === 'Current') {
        if (current === undefined) { current = tab.id; } else { activity = 'Visible'; }
      }
      tab.state.activity = activity;
      tab.state.modified = this.host.isModified(tab.id);
    }

    if (current !== undefined) { this.state.lastCurrent = current; }

    return this.state.getAllTabs();
  }

  //= OPEN

  /** Opens documents the host reported and renders. */
  openMany(ids: DocumentId[]): void {
    this.openTabs(ids);
    this.update();
  }

  //= CLOSE

  /** Starts the close animation; the tab is removed when it ends. */
  closeAnimated(id: DocumentId): void {
    this.beginClose(id);
    this.update();
  }

  /** Removes the tab right away. */
  close(id: DocumentId): void {
    if (!this.state.has(id)) { return; }
    this.stopWidthAnimation(id);
    this.removeTab(id);
    this.update();
  }

  closeAllButCurrent(): void {
    const current = this.state.getCurrentTab()?.id;
    this.closeDocuments(this.state.getOrder().filter(id => id !== current));
  }

  closeAllButPinned(): void {
    this.closeDocuments(this.state.getOrder().filter(id => !this.state.isPinned(id)));
  }

  closeAllButCurrentOrPinned(): void {
    const current = this.state.getCurrentTab()?.id;
    this.closeDocuments(this.state.getOrder().filter(id => id !== current && !this.state.isPinned(id)));
  }

  /** Closes every tab left of the current one. */
  closeLeft(): void {
    const index = this.currentIndex();
    if (index <= 0) { return; }
    this.closeDocuments(this.state.getOrder().slice(0, index).reverse());
  }

  /** Closes every tab right of the current one. */
  closeRight(): void {
    const index = this.currentIndex();
    if (index === -1) { return; }
    this.closeDocuments(this.state.getOrder().slice(index + 1).reverse());
  }

  //= MOVE

  /**
   * Moves the tab at `fromIndex` to `toIndex` (both 1-based).
   * The target is clamped to `[1, count]`; pinned tabs stay in front.
   */
  moveTo(fromIndex: number, toIndex: number): void {
    const count = this.state.size;
    if (fromIndex < 1 || fromIndex > count) { return; }

    const target = Math.max(1, Math.min(toIndex, count));
    if (target === fromIndex) { return; }

    const animate  = this.getConfig().animation;
    const previous = animate ? this.positionsSnapshot() : undefined;

    this.state.moveTab(fromIndex - 1, target - 1);
    this.state.sortPinsToLeft();

    if (previous) {
      const next = this.positionsSnapshot();
      if (!sameEntries(previous, next)) { this.startMoveAnimation(previous, next); }
    }

    this.update();
  }

  /** Moves the current tab to `toIndex` (1-based; `-1` means last). */
  moveCurrentTo(toIndex: number): void {
    const index = this.currentIndex();
    if (index === -1) { return; }
    this.moveTo(index + 1, toIndex === -1 ? this.state.size : toIndex);
  }

  /** Moves the current tab `steps` places (negative → left). */
  moveCurrentBy(steps: number): void {
    const index = this.currentIndex();
    if (index === -1) { return; }
    this.moveTo(index + 1, index + 1 + steps);
  }

  //= PIN / SORT

  /** Toggles the pin of `id` (current tab by default). */
  togglePin(id: DocumentId | undefined = this.state.getCurrentTab()?.id): void {
    if (id === undefined || !this.state.has(id)) { return; }
    this.state.togglePin(id);
    this.state.sortPinsToLeft();
    this.update();
  }

  /** Stable sort; pinned tabs keep the front of the strip. */
  sortBy(criterion: SortCriterion): void {
    const compare = this.comparator(criterion);
    const sorted  = [...this.state.getAllTabs()].sort((a, b) => {
      if (a.state.pinned !== b.state.pinned) { return a.state.pinned ? -1 : 1; }
      return compare(a, b);
    });

    this.state.setOrder(sorted.map(tab => tab.id));
    this.state.sortPinsToLeft();
    this.update();
  }

  //= DISPOSE

  /** Stops every width animation this service owns. */
  dispose(): void {
    for (const task of [...this.widthAnimations.values()]) {
      this.scheduler.stop(task);
    }
    this.widthAnimations.clear();
  }

  //- Private helpers

  private comparator(criterion: SortCriterion): (a: Tab, b: Tab) => number {
    switch (criterion) {
      case 'number':
        return (a, b) => a.id - b.id;
      case 'directory':
        // Shallow paths first, then names ascending like the other criteria
        return (a, b) => (pathDepth(a.metadata.name) - pathDepth(b.metadata.name))
          || compareStrings(a.metadata.name, b.metadata.name);
      case 'language':
        return (a, b) => compareStrings(
          this.host.getOption(a.id, 'filetype') ?? '',
          this.host.getOption(b.id, 'filetype') ?? '',
        );
      case 'window':
        return (a, b) => this.host.getWindowNumber(a.id) - this.host.getWindowNumber(b.id);
    }
  }

  private currentIndex(): number {
    const current = this.state.getCurrentTab();
    return current ? this.state.indexOf(current.id) : -1;
  }

  private positionsSnapshot(): Map<DocumentId, number> {
    return this.layoutService.calculatePositionsByTab(this.state.getAllTabs(), this.getLayoutInput());
  }

  /** Asks the host to close each document, then animates its tab away. */
  private closeDocuments(ids: DocumentId[]): void {
    for (const id of ids) {
      const tab = this.state.getTab(id);
      if (!tab || tab.state.closing) { continue; }
      this.host.closeDocument(id);
      this.beginClose(id);
    }
    this.update();
  }

  /**
   * Inserts new tabs next to the last current one, or at the start/end
   * depending on configuration. Special documents (non-empty `buftype`)
   * always go to the end.
   */
  private openTabs(ids: DocumentId[]): void {
    const config      = this.getConfig();
    const initialSize = this.state.size;
    const anchor      = this.state.lastCurrent;
    const opened: DocumentId[] = [];

    let nextIndex = anchor !== undefined && this.state.has(anchor)
      ? this.state.indexOf(anchor) + 1
      : this.state.size;

    this.state.batch(() => {
      for (const id of ids) {
        if (this.state.has(id)) { continue; }

        const isSpecial = (this.host.getOption(id, 'buftype') ?? '') !== '';
        let index = nextIndex;

        if (config.insertAtStart) {
          index = 0;
          nextIndex++;
        } else if (config.insertAtEnd || isSpecial) {
          index = this.state.size;
        } else {
          nextIndex++;
        }

        const name = this.host.getName(id);
        this.state.addTab(Tab.create(id, name, formatTabLabel(name, config)), index);
        opened.push(id);
      }
      this.state.sortPinsToLeft();
    });

    if (!config.animation || opened.length === 0) { return; }

    // Opening several at once (session load, first file) is not animated
    if ((initialSize <= 1 && opened.length > 1) || (initialSize === 0 && opened.length === 1)) { return; }

    for (const id of opened) { this.startOpenAnimation(id); }
  }

  private startOpenAnimation(id: DocumentId): void {
    const tab = this.state.getTab(id);
    if (!tab) { return; }

    const tabs   = this.state.getAllTabs();
    const layout = this.layoutService.calculate(tabs, this.getLayoutInput());
    const target = layout.baseWidths[tabs.indexOf(tab)] + layout.paddingWidth * 2;

    this.stopWidthAnimation(id);
    tab.state.realWidth = target;
    tab.state.width     = animated(1);

    const task = this.scheduler.startAfter(TIMINGS.ANIMATION_OPEN_DELAY, {
      duration : TIMINGS.ANIMATION_OPEN_DURATION,
      from     : 1,
      to       : target,
      kind     : 'integer',
      onTick   : (width, animation) => {
        const current = this.state.getTab(id);
        if (!current) {
          if (animation.running) { this.scheduler.stop(animation); }
          return;
        }
        current.state.width = animation.running ? animated(width) : NATURAL;
        if (!animation.running && this.widthAnimations.get(id) === task) { this.widthAnimations.delete(id); }
        this.update();
      },
    });

    this.widthAnimations.set(id, task);
  }

  /** Marks the tab as closing and shrinks it to zero before removing it. */
  private beginClose(id: DocumentId): void {
    const tab = this.state.getTab(id);
    if (!tab || tab.state.closing) { return; }

    this.stopWidthAnimation(id);

    if (!this.getConfig().animation) {
      this.removeTab(id);
      return;
    }

    const from = tab.state.realWidth;
    tab.state.closing = true;
    tab.state.width   = animated(from);

    const animation = this.scheduler.start({
      duration : TIMINGS.ANIMATION_CLOSE_DURATION,
      from,
      to       : 0,
      kind     : 'integer',
      onTick   : (width, current) => this.closeTick(id, width, current),
    });

    if (animation.running) { this.widthAnimations.set(id, animation); }
  }

  private closeTick(id: DocumentId, width: number, animation: Animation): void {
    const tab = this.state.getTab(id);

    if (!tab) {
      if (animation.running) { this.scheduler.stop(animation); }
      return;
    }

    if (animation.running && width > 0) {
      tab.state.width = animated(width);
      this.update();
      return;
    }

    // Width reached zero: stopping runs this callback once more with `running === false`
    if (animation.running) {
      this.scheduler.stop(animation);
      return;
    }

    this.removeTab(id);
    this.update();
  }

  private startMoveAnimation(previous: Map<DocumentId, number>, next: Map<DocumentId, number>): void {
    this.scheduler.start({
      channel  : 'move',
      duration : TIMINGS.ANIMATION_MOVE_DURATION,
      from     : 0,
      to       : 1,
      kind     : 'fractional',
      onTick   : (ratio, animation) => {
        for (const tab of this.state.getAllTabs()) {
          const from = previous.get(tab.id);
          const to   = next.get(tab.id);
          tab.state.position = animation.running && from !== undefined && to !== undefined
            ? animated(lerp(ratio, from, to))
            : NATURAL;
        }
        this.update({ refocus: false });
      },
    });
  }

  private stopWidthAnimation(id: DocumentId): void {
    const task = this.widthAnimations.get(id);
    if (!task) { return; }
    this.widthAnimations.delete(id);
    this.scheduler.stop(task);
  }

  private removeTab(id: DocumentId): void {
    this.widthAnimations.delete(id);
    this.jumpMode.unassign(id);
    this.state.removeTab(id);
  }
}

function sameEntries(a: Map<DocumentId, number>, b: Map<DocumentId, number>): boolean {
  if (a.size !== b.size) { return false; }
  for (const [key, value] of a) {
    if (b.get(key) !== value) { return false; }
  }
  return true;
}
