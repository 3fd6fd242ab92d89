// Click region bound to a document id until the next region marker.
export interface ClickTarget {
  id      : number;
  handler : string;
}

/**
 * A styled run of text: the atomic unit of the rendered line.
 * `style` undefined keeps whatever style the previous segment switched to.
 */
export interface Segment {
  style? : string;
  click? : ClickTarget;
  text   : string;
}

// Ordered left to right; insertion order is rendering order.
export type SegmentList = readonly Segment[];
