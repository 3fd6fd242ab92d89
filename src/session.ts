import { registerTablineCommands } from './commands/tablineCommands';
import type { Disposable, DocumentProvider, RenderSink } from './models/Host';
import { TablineProvider } from './providers/TablineProvider';
import type { TablineProviderOptions } from './providers/TablineProvider';
import { AnimationScheduler } from './services/core/AnimationScheduler';
import { IntervalClock } from './services/core/clock';
import type { Clock } from './services/core/clock';
import { CommandRegistry } from './services/registry/CommandRegistry';
import { Logger } from './utils/logger';
import type { OutputChannel } from './utils/logger';

export type ActivateOptions = TablineProviderOptions & {
  /** Tick source for animations (default: `IntervalClock`). */
  clock?         : Clock;
  outputChannel? : OutputChannel;
};

/** Everything a host needs to drive the tabline. */
export interface TablineSession extends Disposable {
  provider : TablineProvider;
  commands : CommandRegistry;
}

/**
 * Arranca el tabline para un host: servicios, comandos y primer render.
 * El host debe llamar a `provider.update()` cuando cambien sus documentos.
 */
export function activate(
  host    : DocumentProvider,
  sink    : RenderSink,
  options : ActivateOptions = {},
): TablineSession {
  Logger.initialize(options.outputChannel);
  Logger.log('Activating tabline…');

  try {
    const scheduler = new AnimationScheduler(options.clock ?? new IntervalClock());
    const provider  = new TablineProvider(host, sink, scheduler, options);
    const commands  = new CommandRegistry();

    const subscriptions = registerTablineCommands(commands, provider);

    // Initial render with names
    provider.update({ updateNames: true });

    Logger.log('Tabline activated successfully');

    return {
      provider,
      commands,
      dispose: () => {
        for (const subscription of subscriptions) { subscription.dispose(); }
        provider.dispose();
      },
    };
  } catch (error) {
    Logger.error('Activation failed', error);
    throw error;
  }
}
