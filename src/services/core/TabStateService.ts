import { EventEmitter } from 'events';
import { Tab } from '../../models/Tab';
import type { DocumentId } from '../../models/Tab';
import type { Disposable } from '../../models/Host';

/**
 * Almacén en memoria de pestañas y su orden canónico, la "fuente de la verdad".
 * - `onDidChangeState`: cuando cambia la estructura (abrir/cerrar/mover/pinear).
 * El orden es una permutación de los ids abiertos; las pinned forman un prefijo
 * contiguo tras cada mutación que pasa por `sortPinsToLeft()`.
 */
export class TabStateService {
  private tabs          : Map<DocumentId, Tab> = new Map();
  private order         : DocumentId[]         = [];
  private _lastCurrent  : DocumentId | undefined;
  private _isBulkLoading                       = false;
  private readonly events                      = new EventEmitter();

  onDidChangeState(listener: () => void): Disposable {
    this.events.on('change', listener);
    return { dispose: () => { this.events.off('change', listener); } };
  }

  private fireChange(): void {
    if (!this._isBulkLoading) { this.events.emit('change'); }
  }

  //- Tab management

  // Insert a tab at `index` (end of the order by default). Existing ids are ignored.
  addTab(tab: Tab, index: number = this.order.length): void {
    if (this.tabs.has(tab.id)) { return; }
    const at = Math.max(0, Math.min(index, this.order.length));
    this.tabs.set(tab.id, tab);
    this.order.splice(at, 0, tab.id);
    this.fireChange();
  }

  // Remove a tab by id and drop it from the order.
  removeTab(id: DocumentId): void {
    if (!this.tabs.delete(id)) { return; }
    this.order = this.order.filter(other => other !== id);
    if (this._lastCurrent === id) { this._lastCurrent = undefined; }
    this.fireChange();
  }

  getTab(id: DocumentId): Tab | undefined {
    return this.tabs.get(id);
  }

  has(id: DocumentId): boolean {
    return this.tabs.has(id);
  }

  // Tabs in canonical order.
  getAllTabs(): Tab[] {
    const result: Tab[] = [];
    for (const id of this.order) {
      const tab = this.tabs.get(id);
      if (tab) { result.push(tab); }
    }
    return result;
  }

  getOrder(): DocumentId[] {
    return [...this.order];
  }

  // 0-based index in the canonical order, -1 when absent.
  indexOf(id: DocumentId): number {
    return this.order.indexOf(id);
  }

  get size(): number {
    return this.order.length;
  }

  getCurrentTab(): Tab | undefined {
    return this.getAllTabs().find(tab => tab.isCurrent);
  }

  /** Tab used as anchor to open new ones next to it. */
  get lastCurrent(): DocumentId | undefined {
    return this._lastCurrent;
  }

  set lastCurrent(id: DocumentId | undefined) {
    this._lastCurrent = id;
  }

  //- Reordering

  // Replace the canonical order. Ids that are not open are dropped; open ids missing from `ids` are appended.
  setOrder(ids: DocumentId[]): void {
    const next = ids.filter((id, i) => this.tabs.has(id) && ids.indexOf(id) === i);
    for (const id of this.order) {
      if (!next.includes(id)) { next.push(id); }
    }
    this.order = next;
    this.fireChange();
  }

  // Move the tab at `fromIndex` to `toIndex` (both 0-based, already clamped by the caller).
  moveTab(fromIndex: number, toIndex: number): void {
    const [id] = this.order.splice(fromIndex, 1);
    if (id === undefined) { return; }
    this.order.splice(toIndex, 0, id);
    this.fireChange();
  }

  //- Pin / unpin

  isPinned(id: DocumentId): boolean {
    return this.tabs.get(id)?.state.pinned ?? false;
  }

  togglePin(id: DocumentId): boolean {
    const tab = this.tabs.get(id);
    if (!tab) { return false; }
    tab.state.pinned = !tab.state.pinned;
    this.fireChange();
    return tab.state.pinned;
  }

  /**
   * Moves every pinned tab in front of the unpinned ones, keeping the
   * relative order inside each side.
   */
  sortPinsToLeft(): void {
    const pinned   = this.order.filter(id => this.isPinned(id));
    const unpinned = this.order.filter(id => !this.isPinned(id));
    const next     = [...pinned, ...unpinned];

    if (next.some((id, i) => id !== this.order[i])) {
      this.order = next;
      this.fireChange();
    }
  }

  //- Batches

  /** Runs `fn` firing a single change event at the end. */
  batch(fn: () => void): void {
    if (this._isBulkLoading) { fn(); return; }
    this._isBulkLoading = true;
    try {
      fn();
    } finally {
      this._isBulkLoading = false;
    }
    this.events.emit('change');
  }

  //- Utilities

  clear(): void {
    this.tabs.clear();
    this.order = [];
    this._lastCurrent = undefined;
    this.fireChange();
  }

  getStats(): { tabs: number; pinned: number; closing: number } {
    const all = this.getAllTabs();
    return {
      tabs    : all.length,
      pinned  : all.filter(tab => tab.state.pinned).length,
      closing : all.filter(tab => tab.state.closing).length,
    };
  }
}
