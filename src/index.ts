export { activate } from './session';
export type { ActivateOptions, TablineSession } from './session';

export { TablineProvider } from './providers/TablineProvider';
export type { TablineProviderOptions } from './providers/TablineProvider';
export { TablineRenderer } from './providers/TablineRenderer';
export type { OffsetPanel, RenderOptions, RenderResult } from './providers/TablineRenderer';

export * from './models';
export * from './services';

export { TABLINE_COMMANDS, CLICK_HANDLERS } from './constants/commands';
export type { TablineCommand } from './constants/commands';
export { DEFAULT_CONFIGURATION, getConfiguration } from './constants/styles';
export type { IconsMode, TablineConfiguration } from './constants/styles';
export { TIMINGS } from './constants/timings';

export {
  cropLeft,
  cropRight,
  insertAt,
  segmentsToString,
  segmentsWidth,
} from './utils/segments';
export { displayWidth, sliceColumns, truncateToWidth } from './utils/width';
export { Logger, MemoryOutputChannel } from './utils/logger';
export type { OutputChannel } from './utils/logger';
