import * as path from 'path';
import type { TablineConfiguration } from '../../constants/styles';
import type { DocumentId } from '../../models/Tab';

/**
 * Asigna una letra a cada tab para el modo de salto.
 * Con `semanticLetters` se intenta primero una letra del nombre del archivo;
 * si no, la primera libre en el orden de `letters`.
 */
export class JumpModeService {
  private letters      : string[]                    = [];
  private lettersSource: string | undefined;
  private taken        : Set<string>                 = new Set();
  private letterByTab  : Map<DocumentId, string>     = new Map();
  private tabByLetter  : Map<string, DocumentId>     = new Map();

  /** True while the tabline is rendered with jump letters. */
  isPicking = false;

  constructor(private readonly getConfig: () => TablineConfiguration) {}

  /** Resets every assignment if the configured letters changed. */
  initializeIndexes(): void {
    const source = this.getConfig().letters;
    if (source === this.lettersSource) { return; }

    this.lettersSource = source;
    this.letters       = Array.from(new Set(Array.from(source)));
    this.taken.clear();
    this.letterByTab.clear();
    this.tabByLetter.clear();
  }

  /** Letter of the tab, assigning one on first use. `undefined` once letters run out. */
  getLetter(id: DocumentId, name: string): string | undefined {
    this.initializeIndexes();
    return this.letterByTab.get(id) ?? this.assignNextLetter(id, name);
  }

  getTab(letter: string): DocumentId | undefined {
    return this.tabByLetter.get(letter);
  }

  unassign(id: DocumentId): void {
    const letter = this.letterByTab.get(id);
    if (letter === undefined) { return; }
    this.letterByTab.delete(id);
    this.tabByLetter.delete(letter);
    this.taken.delete(letter);
  }

  /** Frees the letters of tabs that are gone. */
  prune(isOpen: (id: DocumentId) => boolean): void {
    for (const id of [...this.letterByTab.keys()]) {
      if (!isOpen(id)) { this.unassign(id); }
    }
  }

  private assignNextLetter(id: DocumentId, name: string): string | undefined {
    if (this.getConfig().semanticLetters) {
      const stem = path.parse(path.basename(name)).name;
      for (const char of stem) {
        const letter = char.toLowerCase();
        if (this.letters.includes(letter) && !this.taken.has(letter)) {
          return this.assign(id, letter);
        }
      }
    }

    const free = this.letters.find(letter => !this.taken.has(letter));
    return free === undefined ? undefined : this.assign(id, free);
  }

  private assign(id: DocumentId, letter: string): string {
    this.taken.add(letter);
    this.letterByTab.set(id, letter);
    this.tabByLetter.set(letter, id);
    return letter;
  }
}
