// Opaque handle the host gives each open document.
export type DocumentId = number;

// Drives the style selected for the tab (`Buffer{Activity}…`).
export type TabActivity = 'Inactive' | 'Visible' | 'Current';

/**
 * Width or x position of a tab. `animated` is present only while an
 * animation owns the value; `natural` falls back to the computed one.
 */
export type TabGeometry =
  | { kind: 'natural' }
  | { kind: 'animated'; value: number };

export const NATURAL: TabGeometry = { kind: 'natural' };

export function animated(value: number): TabGeometry {
  return { kind: 'animated', value };
}

/** Resolves a geometry field against its natural value. */
export function resolveGeometry(geometry: TabGeometry, natural: number): number {
  return geometry.kind === 'animated' ? geometry.value : natural;
}

// Descriptive data for a tab; refreshed when names are updated.
export interface TabMetadata {
  readonly id : DocumentId;
  name        : string;   // Full name as reported by the host (path or title).
  label       : string;   // Text shown in the tab.
}

// Mutable runtime state of a tab.
export interface TabState {
  pinned       : boolean;
  activity     : TabActivity;
  modified     : boolean;
  closing      : boolean;
  width        : TabGeometry;
  position     : TabGeometry;
  realWidth    : number;   // Last natural width computed by a render pass.
  realPosition : number;   // Last natural x position computed by a render pass.
}

/** One open document as shown in the tab strip. */
export class Tab {
  constructor(
    public readonly metadata: TabMetadata,
    public state: TabState,
  ) {}

  get id(): DocumentId {
    return this.metadata.id;
  }

  get isCurrent(): boolean {
    return this.state.activity === 'Current';
  }

  static create(id: DocumentId, name: string, label: string): Tab {
    return new Tab(
      { id, name, label },
      {
        pinned       : false,
        activity     : 'Inactive',
        modified     : false,
        closing      : false,
        width        : NATURAL,
        position     : NATURAL,
        realWidth    : 0,
        realPosition : 0,
      },
    );
  }
}
