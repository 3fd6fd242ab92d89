/**
 * Barrel export for the tabline models.
 */

// Tab - Document representation and geometry
export { Tab, NATURAL, animated, resolveGeometry } from './Tab';
export type { DocumentId, TabActivity, TabGeometry, TabMetadata, TabState } from './Tab';

// Segment - Styled runs of text
export type { ClickTarget, Segment, SegmentList } from './Segment';

// Layout - Geometry of a render pass
export type { Layout, LayoutInput } from './Layout';

// Host - Contracts with the embedding environment
export type {
  Disposable,
  DocumentProvider,
  IconProvider,
  IconResult,
  KeyReader,
  Notifier,
  RenderSink,
} from './Host';
