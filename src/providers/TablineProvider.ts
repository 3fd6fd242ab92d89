import { getConfiguration } from '../constants/styles';
import type { TablineConfiguration } from '../constants/styles';
import type {
  Disposable,
  DocumentProvider,
  IconProvider,
  KeyReader,
  Notifier,
  RenderSink,
} from '../models/Host';
import type { LayoutInput } from '../models/Layout';
import type { AnimationScheduler } from '../services/core/AnimationScheduler';
import { LayoutService } from '../services/core/LayoutService';
import { TabOrderingService } from '../services/core/TabOrderingService';
import type { UpdateOptions } from '../services/core/TabOrderingService';
import { TabStateService } from '../services/core/TabStateService';
import { JumpModeService } from '../services/ui/JumpModeService';
import { TabIconManager } from '../services/ui/TabIconManager';
import { Logger } from '../utils/logger';
import { TablineRenderer } from './TablineRenderer';

export type TablineProviderOptions = {
  /** Raw settings, resolved with `getConfiguration()`. */
  configuration? : Record<string, unknown>;
  iconProvider?  : IconProvider;
  keyReader?     : KeyReader;
  notifier?      : Notifier;
};

// Upper bound of follow-up passes requested from inside a render
const MAX_PASSES_PER_UPDATE = 8;

/**
 * Coordina el tabline: sincroniza con el host, renderiza y entrega la línea
 * al `RenderSink`. La generación de la línea se delega a `TablineRenderer`
 * y las operaciones de orden a `TabOrderingService`.
 *
 * Las peticiones de render que llegan durante un render (animaciones que
 * arrancan, tabs que se cierran en `sync`) se agrupan en un único pase extra.
 */
export class TablineProvider {
  readonly state         : TabStateService;
  readonly layoutService : LayoutService;
  readonly iconManager   : TabIconManager;
  readonly jumpMode      : JumpModeService;
  readonly renderer      : TablineRenderer;
  readonly ordering      : TabOrderingService;

  private configSource  : Record<string, unknown>;
  private config        : TablineConfiguration;
  private isRendering   = false;
  private pending       : UpdateOptions | undefined;
  private _line         : string | null = null;
  private hidden        = false;
  private readonly subscriptions: Disposable[] = [];

  constructor(
    private readonly host      : DocumentProvider,
    private readonly sink      : RenderSink,
    private readonly scheduler : AnimationScheduler,
    private readonly options   : TablineProviderOptions = {},
  ) {
    this.configSource = { ...options.configuration };
    this.config       = getConfiguration(this.configSource);

    const getConfig = () => this.config;

    this.state         = new TabStateService();
    this.layoutService = new LayoutService(getConfig);
    this.iconManager   = new TabIconManager(options.iconProvider);
    this.jumpMode      = new JumpModeService(getConfig);
    this.renderer      = new TablineRenderer(
      host,
      this.layoutService,
      scheduler,
      this.iconManager,
      this.jumpMode,
      getConfig,
      () => this.update({ refocus: false }),
    );
    this.ordering = new TabOrderingService(
      this.state,
      host,
      this.layoutService,
      scheduler,
      this.jumpMode,
      getConfig,
      () => this.getLayoutInput(),
      updateOptions => this.update(updateOptions),
    );

    // Letters and icons of closed tabs are released
    this.subscriptions.push(
      this.state.onDidChangeState(() => {
        this.jumpMode.prune(id => this.state.has(id));
        this.iconManager.retainNames(this.state.getAllTabs().map(tab => tab.metadata.name));
      }),
    );
  }

  //= CONFIGURATION

  getConfiguration(): TablineConfiguration {
    return { ...this.config };
  }

  /** Merges `partial` over the current settings and re-renders with fresh labels. */
  updateConfiguration(partial: Record<string, unknown>): void {
    this.configSource = { ...this.configSource, ...partial };
    this.config       = getConfiguration(this.configSource);
    this.iconManager.clearCache();
    this.update({ updateNames: true });
  }

  //= RENDER

  /** Last line handed to the sink, `null` while hidden or before the first render. */
  get line(): string | null {
    return this._line;
  }

  /**
   * Syncs with the host and redraws. Calls made while a render is running
   * are merged into one follow-up pass.
   */
  update(options: UpdateOptions = {}): void {
    if (this.isRendering) {
      this.pending = mergeUpdateOptions(this.pending, options);
      return;
    }

    this.isRendering = true;
    try {
      let next: UpdateOptions | undefined = options;
      let passes = 0;

      while (next && passes < MAX_PASSES_PER_UPDATE) {
        this.pending = undefined;
        this.renderPass(next);
        next = this.pending;
        passes++;
      }

      if (next) {
        Logger.warn(`[Tabstrip] Render requested again after ${MAX_PASSES_PER_UPDATE} passes; dropping it`);
      }
    } finally {
      this.isRendering = false;
      this.pending     = undefined;
    }
  }

  setOffset(width: number, text?: string, style?: string): void {
    this.renderer.setOffset(width, text, style);
    this.update();
  }

  setScroll(target: number): void {
    this.renderer.setScroll(Math.max(0, Math.floor(target)));
    this.update({ refocus: false });
  }

  //= JUMP MODE

  /**
   * Shows a letter on every tab, reads one key and makes the matching
   * document current. Unknown letters and failed input are reported
   * through the notifier.
   */
  async activateJumpMode(): Promise<void> {
    const { keyReader } = this.options;
    const notifier      = this.options.notifier ?? { warn: (message: string) => Logger.warn(message) };

    if (!keyReader) {
      Logger.warn('[Tabstrip] Jump mode needs a key reader');
      return;
    }

    this.jumpMode.initializeIndexes();
    this.jumpMode.isPicking = true;
    this.update({ refocus: false });

    let key: string | null = null;
    try {
      key = await keyReader.readKey();
    } catch (error) {
      Logger.error('[Tabstrip] Reading the jump key failed', error);
    } finally {
      this.jumpMode.isPicking = false;
    }

    if (key === null) {
      notifier.warn('Invalid input');
    } else {
      const id = this.jumpMode.getTab(key);
      if (id !== undefined && this.state.has(id)) {
        this.host.setCurrent(id);
      } else {
        notifier.warn("Couldn't find buffer");
      }
    }

    this.update();
  }

  //= LIFECYCLE

  dispose(): void {
    this.ordering.dispose();
    this.scheduler.dispose();
    for (const subscription of this.subscriptions.splice(0)) {
      subscription.dispose();
    }
  }

  //- Private helpers

  private getLayoutInput(): LayoutInput {
    return {
      viewportWidth : this.sink.getWidth(),
      offset        : this.renderer.getOffset().width,
      tabpages      : this.host.getTabpages(),
    };
  }

  /** One sync + render. A failure keeps the previous line on the sink. */
  private renderPass(options: UpdateOptions): void {
    try {
      const tabs   = this.ordering.sync(options.updateNames ?? false);
      const result = this.renderer.render(tabs, {
        viewportWidth : this.sink.getWidth(),
        refocus       : options.refocus,
      });

      if (result.kind === 'hidden') {
        if (!this.hidden) {
          this.hidden = true;
          this._line  = null;
          this.sink.hide();
        }
        return;
      }

      if (this.hidden || result.text !== this._line) {
        this.hidden = false;
        this._line  = result.text;
        this.sink.show(result.text);
      }
    } catch (error) {
      Logger.error('[Tabstrip] Render failed; keeping the previous line', error);
    }
  }
}

/** Names are refreshed if any request asked; refocus wins over `refocus: false`. */
function mergeUpdateOptions(current: UpdateOptions | undefined, next: UpdateOptions): UpdateOptions {
  if (!current) { return { ...next }; }
  return {
    updateNames : Boolean(current.updateNames || next.updateNames),
    refocus     : current.refocus !== false || next.refocus !== false,
  };
}
