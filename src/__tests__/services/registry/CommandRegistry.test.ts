/**
 * @file CommandRegistry.test.ts
 * @description Tests for command registration and execution
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';
import { TABLINE_COMMANDS } from '../../../constants/commands';
import { CommandRegistry } from '../../../services/registry/CommandRegistry';
import { Logger, MemoryOutputChannel } from '../../../utils/logger';

describe('CommandRegistry', () => {
  let channel: MemoryOutputChannel;
  let registry: CommandRegistry;

  beforeEach(() => {
    channel  = new MemoryOutputChannel();
    Logger.initialize(channel);
    registry = new CommandRegistry();
  });

  it('runs the registered handler with its arguments', async () => {
    const handler = vi.fn();
    registry.register(TABLINE_COMMANDS.MOVE_BY, handler);

    await expect(registry.execute(TABLINE_COMMANDS.MOVE_BY, 2)).resolves.toBe(true);
    expect(handler).toHaveBeenCalledWith(2);
  });

  it('waits for async handlers', async () => {
    let done = false;
    registry.register(TABLINE_COMMANDS.ACTIVATE_JUMP_MODE, async () => {
      await Promise.resolve();
      done = true;
    });

    await registry.execute(TABLINE_COMMANDS.ACTIVATE_JUMP_MODE);
    expect(done).toBe(true);
  });

  it('reports unknown commands', async () => {
    await expect(registry.execute(TABLINE_COMMANDS.RENDER)).resolves.toBe(false);
    expect(channel.getLines()[0]).toMatch(/WARN: \[Command\] Unknown command "tabstrip.render"$/);
  });

  it('logs handler failures and returns false', async () => {
    registry.register(TABLINE_COMMANDS.RENDER, () => { throw new Error('broken'); });

    await expect(registry.execute(TABLINE_COMMANDS.RENDER)).resolves.toBe(false);
    expect(channel.getLines()[0]).toMatch(/ERROR: \[Command\] Failed to execute "tabstrip.render":$/);
  });

  it('unregisters on dispose', () => {
    const handle = registry.register(TABLINE_COMMANDS.RENDER, vi.fn());
    expect(registry.getAll()).toEqual([TABLINE_COMMANDS.RENDER]);

    handle.dispose();

    expect(registry.has(TABLINE_COMMANDS.RENDER)).toBe(false);
  });

  it('keeps a replacement handler when the old handle is disposed', () => {
    const first  = registry.register(TABLINE_COMMANDS.RENDER, vi.fn());
    const second = vi.fn();
    registry.register(TABLINE_COMMANDS.RENDER, second);

    first.dispose();

    expect(registry.has(TABLINE_COMMANDS.RENDER)).toBe(true);
    expect(channel.getLines()[0]).toMatch(/WARN: \[Command\] Replacing handler for "tabstrip.render"$/);
  });
});
