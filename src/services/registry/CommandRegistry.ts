import type { TablineCommand } from '../../constants/commands';
import type { Disposable } from '../../models/Host';
import { Logger } from '../../utils/logger';

export type CommandHandler = (...args: unknown[]) => void | Promise<void>;

// ──────────────────────────────── Registry ─────────────────────────────────────

/**
 * Registro de comandos del tabline.
 *
 * **Cómo añadir un comando:**
 * ```ts
 * const handle = registry.register(TABLINE_COMMANDS.RENDER, () => provider.update());
 * await registry.execute(TABLINE_COMMANDS.RENDER);
 * handle.dispose();
 * ```
 *
 * Un id solo puede tener un handler; registrar de nuevo reemplaza al anterior.
 */
export class CommandRegistry {
  private handlers: Map<TablineCommand, CommandHandler> = new Map();

  register(id: TablineCommand, handler: CommandHandler): Disposable {
    if (this.handlers.has(id)) {
      Logger.warn(`[Command] Replacing handler for "${id}"`);
    }
    this.handlers.set(id, handler);

    return {
      dispose: () => {
        if (this.handlers.get(id) === handler) { this.handlers.delete(id); }
      },
    };
  }

  has(id: TablineCommand): boolean {
    return this.handlers.has(id);
  }

  /**
   * Runs the handler of `id`.
   * Devuelve `true` si se ejecutó, `false` si no existe o falló (el error queda en el log).
   */
  async execute(id: TablineCommand, ...args: unknown[]): Promise<boolean> {
    const handler = this.handlers.get(id);
    if (!handler) {
      Logger.warn(`[Command] Unknown command "${id}"`);
      return false;
    }

    try {
      await handler(...args);
      return true;
    } catch (error) {
      Logger.error(`[Command] Failed to execute "${id}":`, error);
      return false;
    }
  }

  /** Ids registrados (para depuración). */
  getAll(): TablineCommand[] {
    return [...this.handlers.keys()];
  }
}
