import { Logger } from '../utils/logger';
import { PRODUCT_ICONS } from './icons';
import type { TabActivity } from '../models/Tab';

export const STYLE_CONSTANTS = {
  // A tab is padded on both sides
  SIDES_OF_TAB: 2,

  // Decoration slots (glyph + trailing space)
  ICON_SLOT_WIDTH: 2,
  CLOSE_SLOT_WIDTH: 2,
  SPACE_AFTER_NAME: 1,
  SEPARATOR_WIDTH: 1,

  // Style names understood by the host
  HIGHLIGHTS: {
    fill: 'BufferTabpageFill',
    tabpages: 'BufferTabpages',
    offset: 'BufferOffset',
  },
} as const;

/** Style name for a tab part, e.g. `BufferCurrentMod`, `BufferInactiveSign`. */
export function tabStyle(activity: TabActivity, suffix: '' | 'Sign' | 'Index' | 'Icon' | 'Target' | 'Mod' = ''): string {
  return `Buffer${activity}${suffix}`;
}

/** What goes in front of the name. */
export type IconsMode =
  | 'icons'
  | 'numbers'
  | 'both'
  | 'buffer_numbers'
  | 'buffer_number_with_icon'
  | 'none';

const ICONS_MODES: readonly IconsMode[] = ['icons', 'numbers', 'both', 'buffer_numbers', 'buffer_number_with_icon', 'none'];

/** Configuration shape for the tabline */
export type TablineConfiguration = {
  animation             : boolean;
  autoHide              : boolean;
  tabpages              : boolean;
  closable              : boolean;
  clickable             : boolean;
  icons                 : IconsMode;
  iconCustomColors      : boolean;
  iconSeparatorActive   : string;
  iconSeparatorInactive : string;
  iconCloseTab          : string;
  iconCloseTabModified  : string;
  iconPinned            : string;
  insertAtStart         : boolean;
  insertAtEnd           : boolean;
  maximumPadding        : number;
  minimumPadding        : number;
  maximumLength         : number;
  noNameTitle           : string | null;
  letters               : string;
  semanticLetters       : boolean;
};

export const DEFAULT_CONFIGURATION: Readonly<TablineConfiguration> = {
  animation             : true,
  autoHide              : false,
  tabpages              : true,
  closable              : true,
  clickable             : true,
  icons                 : 'icons',
  iconCustomColors      : false,
  iconSeparatorActive   : PRODUCT_ICONS.separatorActive,
  iconSeparatorInactive : PRODUCT_ICONS.separatorInactive,
  iconCloseTab          : PRODUCT_ICONS.close,
  iconCloseTabModified  : PRODUCT_ICONS.closeModified,
  iconPinned            : PRODUCT_ICONS.pinned,
  insertAtStart         : false,
  insertAtEnd           : false,
  maximumPadding        : 4,
  minimumPadding        : 1,
  maximumLength         : 30,
  noNameTitle           : null,
  letters               : 'asdfjkl;ghnmxcvbziowerutyqpASDFJKLGHNMXCVBZIOWERUTYQP',
  semanticLetters       : true,
};

export const NO_NAME_TITLE = '[No Name]';

function pick<K extends keyof TablineConfiguration>(
  source: Record<string, unknown>,
  key: K,
  accept: (value: unknown) => value is TablineConfiguration[K],
): TablineConfiguration[K] {
  const value = source[key];
  if (value === undefined) { return DEFAULT_CONFIGURATION[key]; }
  if (accept(value)) { return value; }
  Logger.warn(`[Tabstrip] Ignoring invalid value for "${key}": ${JSON.stringify(value)}`);
  return DEFAULT_CONFIGURATION[key];
}

const isBoolean = (value: unknown): value is boolean => typeof value === 'boolean';
const isString  = (value: unknown): value is string  => typeof value === 'string';
const isNumber  = (value: unknown): value is number  => typeof value === 'number' && Number.isFinite(value);
const isNullableString = (value: unknown): value is string | null => value === null || typeof value === 'string';
const isIconsMode = (value: unknown): value is IconsMode =>
  ICONS_MODES.some(mode => mode === value);

/**
 * Resolves the tabline configuration from host-provided settings.
 * Unknown keys are ignored; values of the wrong type fall back to defaults.
 * @returns Resolved configuration with defaults applied.
 */
export function getConfiguration(source: Record<string, unknown> = {}): TablineConfiguration {
  const minimumPadding = Math.max(0, Math.floor(pick(source, 'minimumPadding', isNumber)));
  const maximumPadding = Math.max(minimumPadding, Math.floor(pick(source, 'maximumPadding', isNumber)));

  return {
    animation             : pick(source, 'animation', isBoolean),
    autoHide              : pick(source, 'autoHide', isBoolean),
    tabpages              : pick(source, 'tabpages', isBoolean),
    closable              : pick(source, 'closable', isBoolean),
    clickable             : pick(source, 'clickable', isBoolean),
    icons                 : pick(source, 'icons', isIconsMode),
    iconCustomColors      : pick(source, 'iconCustomColors', isBoolean),
    iconSeparatorActive   : pick(source, 'iconSeparatorActive', isString),
    iconSeparatorInactive : pick(source, 'iconSeparatorInactive', isString),
    iconCloseTab          : pick(source, 'iconCloseTab', isString),
    iconCloseTabModified  : pick(source, 'iconCloseTabModified', isString),
    iconPinned            : pick(source, 'iconPinned', isString),
    insertAtStart         : pick(source, 'insertAtStart', isBoolean),
    insertAtEnd           : pick(source, 'insertAtEnd', isBoolean),
    maximumPadding,
    minimumPadding,
    maximumLength         : Math.max(1, Math.floor(pick(source, 'maximumLength', isNumber))),
    noNameTitle           : pick(source, 'noNameTitle', isNullableString),
    letters               : pick(source, 'letters', isString),
    semanticLetters       : pick(source, 'semanticLetters', isBoolean),
  };
}

//= Derived flags

export function hasIcons(config: TablineConfiguration): boolean {
  return config.icons === 'icons' || config.icons === 'both' || config.icons === 'buffer_number_with_icon';
}

/** Shows the document id in front of the name. */
export function hasBufferNumber(config: TablineConfiguration): boolean {
  return config.icons === 'buffer_numbers' || config.icons === 'buffer_number_with_icon';
}

/** Shows the 1-based position in front of the name. */
export function hasNumbers(config: TablineConfiguration): boolean {
  return config.icons === 'numbers' || config.icons === 'both';
}
