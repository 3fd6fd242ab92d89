import { TABLINE_COMMANDS } from '../constants/commands';
import type { Disposable } from '../models/Host';
import type { TablineProvider } from '../providers/TablineProvider';
import type { CommandRegistry } from '../services/registry/CommandRegistry';

/**
 * Registra los comandos del tabline (cerrar, mover, ordenar, pinear, vista).
 * Los argumentos llegan sin tipo desde el host; los numéricos se validan aquí
 * y un argumento inválido deja el comando sin efecto.
 */
export function registerTablineCommands(
  registry : CommandRegistry,
  provider : TablineProvider,
): Disposable[] {
  const { ordering } = provider;

  return [
    registry.register(TABLINE_COMMANDS.ACTIVATE_JUMP_MODE, () => provider.activateJumpMode()),

    // Closing
    registry.register(TABLINE_COMMANDS.CLOSE_ALL_BUT_CURRENT, () => ordering.closeAllButCurrent()),
    registry.register(TABLINE_COMMANDS.CLOSE_ALL_BUT_PINNED, () => ordering.closeAllButPinned()),
    registry.register(TABLINE_COMMANDS.CLOSE_ALL_BUT_CURRENT_OR_PINNED, () => ordering.closeAllButCurrentOrPinned()),
    registry.register(TABLINE_COMMANDS.CLOSE_BUFFERS_LEFT, () => ordering.closeLeft()),
    registry.register(TABLINE_COMMANDS.CLOSE_BUFFERS_RIGHT, () => ordering.closeRight()),

    // Ordering
    registry.register(TABLINE_COMMANDS.ORDER_BY_BUFFER_NUMBER, () => ordering.sortBy('number')),
    registry.register(TABLINE_COMMANDS.ORDER_BY_DIRECTORY, () => ordering.sortBy('directory')),
    registry.register(TABLINE_COMMANDS.ORDER_BY_LANGUAGE, () => ordering.sortBy('language')),
    registry.register(TABLINE_COMMANDS.ORDER_BY_WINDOW_NUMBER, () => ordering.sortBy('window')),

    // Movers
    registry.register(TABLINE_COMMANDS.TOGGLE_PIN, (id: unknown) => {
      ordering.togglePin(typeof id === 'number' ? id : undefined);
    }),
    registry.register(TABLINE_COMMANDS.MOVE_TO, (index: unknown) => {
      if (isInteger(index)) { ordering.moveCurrentTo(index); }
    }),
    registry.register(TABLINE_COMMANDS.MOVE_BY, (steps: unknown) => {
      if (isInteger(steps)) { ordering.moveCurrentBy(steps); }
    }),

    // View
    registry.register(TABLINE_COMMANDS.SET_OFFSET, (width: unknown, text: unknown, style: unknown) => {
      if (!isInteger(width)) { return; }
      provider.setOffset(
        width,
        typeof text === 'string' ? text : undefined,
        typeof style === 'string' ? style : undefined,
      );
    }),
    registry.register(TABLINE_COMMANDS.SET_SCROLL, (target: unknown) => {
      if (isInteger(target)) { provider.setScroll(target); }
    }),
    registry.register(TABLINE_COMMANDS.RENDER, (updateNames: unknown) => {
      provider.update({ updateNames: updateNames === true });
    }),
  ];
}

function isInteger(value: unknown): value is number {
  return typeof value === 'number' && Number.isInteger(value);
}
