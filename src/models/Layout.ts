/** Geometry of one render pass. Recomputed every time, never persisted. */
export interface Layout {
  availableWidth : number;    // Viewport minus the offset panel.
  baseWidth      : number;    // Decoration columns every tab carries.
  baseWidths     : number[];  // Per tab: decorations + label, without padding.
  widths         : number[];  // Per tab: on-screen width (animated override wins).
  usedWidth      : number;    // Sum of `baseWidths`.
  paddingWidth   : number;    // Padding on each side of every tab.
  buffersWidth   : number;    // Columns available to tabs.
  actualWidth    : number;    // Sum of `widths`.
  tabpagesWidth  : number;    // Width of the tabpage counter, 0 when hidden.
}

/** What the layout needs besides the tabs. */
export interface LayoutInput {
  viewportWidth : number;
  offset?       : number;
  tabpages?     : { current: number; total: number };
}
