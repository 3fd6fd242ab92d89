/**
 * Identificadores de los comandos que expone el tabline.
 * Centraliza los strings de comandos.
 */

export const TABLINE_COMMANDS = {
  // Jump mode
  ACTIVATE_JUMP_MODE: 'tabstrip.activateJumpMode',

  // Closing
  CLOSE_ALL_BUT_CURRENT: 'tabstrip.closeAllButCurrent',
  CLOSE_ALL_BUT_PINNED: 'tabstrip.closeAllButPinned',
  CLOSE_ALL_BUT_CURRENT_OR_PINNED: 'tabstrip.closeAllButCurrentOrPinned',
  CLOSE_BUFFERS_LEFT: 'tabstrip.closeBuffersLeft',
  CLOSE_BUFFERS_RIGHT: 'tabstrip.closeBuffersRight',

  // Ordering
  ORDER_BY_BUFFER_NUMBER: 'tabstrip.orderByBufferNumber',
  ORDER_BY_DIRECTORY: 'tabstrip.orderByDirectory',
  ORDER_BY_LANGUAGE: 'tabstrip.orderByLanguage',
  ORDER_BY_WINDOW_NUMBER: 'tabstrip.orderByWindowNumber',

  // Movers
  TOGGLE_PIN: 'tabstrip.togglePin',
  MOVE_TO: 'tabstrip.moveTo',
  MOVE_BY: 'tabstrip.moveBy',

  // View
  SET_OFFSET: 'tabstrip.setOffset',
  SET_SCROLL: 'tabstrip.setScroll',
  RENDER: 'tabstrip.render',
} as const;

export type TablineCommand = typeof TABLINE_COMMANDS[keyof typeof TABLINE_COMMANDS];

/** Handlers named in click-region markers. */
export const CLICK_HANDLERS = {
  MAIN: 'BufferlineMainClickHandler',
  CLOSE: 'BufferlineCloseClickHandler',
} as const;
