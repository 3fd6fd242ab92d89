import type { DocumentId, TabActivity } from './Tab';

/**
 * Contratos con el entorno anfitrión (editor, terminal…).
 * Todo se consulta de forma síncrona salvo la lectura de teclas.
 */

/** Read-only view of the host's open documents. */
export interface DocumentProvider {
  listOpenDocuments(): DocumentId[];
  getName(id: DocumentId): string;
  /** Option lookup, e.g. `filetype` or `buftype`. Unknown keys yield `undefined`. */
  getOption(id: DocumentId, key: string): string | undefined;
  getActivity(id: DocumentId): TabActivity;
  isModified(id: DocumentId): boolean;
  /** Window number showing the document, `-1` when none. */
  getWindowNumber(id: DocumentId): number;
  getTabpages(): { current: number; total: number };
  closeDocument(id: DocumentId): void;
  setCurrent(id: DocumentId): void;
}

export interface IconResult {
  glyph  : string;
  style? : string;
}

/** Opaque `(glyph, style)` producer. */
export interface IconProvider {
  getIcon(name: string, filetype: string | undefined, activityStyle: string): IconResult | undefined;
}

/** Receives the composed line. */
export interface RenderSink {
  /** Columns available to the whole line. */
  getWidth(): number;
  show(line: string): void;
  hide(): void;
}

/** Single-key input used by jump mode. Resolves `null` when input failed. */
export interface KeyReader {
  readKey(): Promise<string | null>;
}

/** User-facing, recoverable warnings. */
export interface Notifier {
  warn(message: string): void;
}

/** Handle returned by subscriptions. */
export interface Disposable {
  dispose(): void;
}
