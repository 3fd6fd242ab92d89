/**
 * Motor de renderizado del tabline.
 * Orquesta los módulos especializados para componer la línea:
 *
 *  - LayoutService    → anchos, padding y posiciones
 *  - TabIconManager   → glifo y estilo de icono por tab
 *  - JumpModeService  → letras del modo de salto
 *  - utils/segments   → inserción, recorte y serialización de segmentos
 *
 * Un pase: recoger tabs → layout → segmentos por tab → lienzo → recorte por
 * scroll → string. El único efecto secundario es iniciar la animación de scroll.
 */

import { CLICK_HANDLERS } from '../constants/commands';
import { STYLE_CONSTANTS, hasIcons, tabStyle } from '../constants/styles';
import type { TablineConfiguration } from '../constants/styles';
import { TIMINGS } from '../constants/timings';
import type { DocumentProvider } from '../models/Host';
import type { Layout } from '../models/Layout';
import type { ClickTarget, Segment } from '../models/Segment';
import { resolveGeometry } from '../models/Tab';
import type { Tab } from '../models/Tab';
import type { AnimationScheduler } from '../services/core/AnimationScheduler';
import type { LayoutService } from '../services/core/LayoutService';
import type { JumpModeService } from '../services/ui/JumpModeService';
import type { TabIconManager } from '../services/ui/TabIconManager';
import {
  clickDirective,
  cropLeft,
  cropRight,
  escapeText,
  insertAt,
  segmentsToString,
  segmentsWidth,
  styleDirective,
} from '../utils/segments';
import { displayWidth, sliceColumns } from '../utils/width';

const { HIGHLIGHTS, SIDES_OF_TAB } = STYLE_CONSTANTS;

//= TIPOS

export type RenderOptions = {
  viewportWidth : number;
  /** Scroll so the current tab is fully visible (default `true`). */
  refocus?      : boolean;
};

export type RenderResult =
  | { kind: 'hidden' }
  | { kind: 'line'; text: string; layout: Layout };

/** One tab ready to be merged into the canvas. */
type RenderItem = {
  tab      : Tab;
  position : number;
  segments : Segment[];
};

/** Left panel reserved for file trees and sidebars. */
export type OffsetPanel = {
  width  : number;
  text?  : string;
  style? : string;
};

export class TablineRenderer {
  /** Where the tabline is scrolled, or wants to scroll to. */
  private scroll        = 0;
  /** Where the tabline is drawn right now (lags `scroll` while animating). */
  private scrollCurrent = 0;
  private offset        : OffsetPanel = { width: 0 };

  constructor(
    private readonly host          : DocumentProvider,
    private readonly layoutService : LayoutService,
    private readonly scheduler     : AnimationScheduler,
    private readonly iconManager   : TabIconManager,
    private readonly jumpMode      : JumpModeService,
    private readonly getConfig     : () => TablineConfiguration,
    private readonly requestRender : () => void,
  ) {}

  //= SCROLL / OFFSET

  getScroll(): { target: number; current: number } {
    return { target: this.scroll, current: this.scrollCurrent };
  }

  /** Scrolls to `target`, animated unless animations are off. */
  setScroll(target: number): void {
    this.scroll = target;

    if (!this.getConfig().animation) {
      const live = this.scheduler.getChannel('scroll');
      if (live) { this.scheduler.stop(live); }
      this.scrollCurrent = target;
      this.requestRender();
      return;
    }

    this.scheduler.start({
      channel  : 'scroll',
      duration : TIMINGS.ANIMATION_SCROLL_DURATION,
      from     : this.scrollCurrent,
      to       : target,
      kind     : 'integer',
      onTick   : value => {
        const changed = value !== this.scrollCurrent;
        this.scrollCurrent = value;
        if (changed) { this.requestRender(); }
      },
    });
  }

  getOffset(): OffsetPanel {
    return { ...this.offset };
  }

  setOffset(width: number, text?: string, style?: string): void {
    this.offset = width > 0 ? { width, text, style } : { width: 0 };
  }

  //= RENDER

  render(tabs: readonly Tab[], options: RenderOptions): RenderResult {
    const config = this.getConfig();

    if (config.autoHide && tabs.length <= 1) {
      return { kind: 'hidden' };
    }

    const tabpages = this.host.getTabpages();
    const layout   = this.layoutService.calculate(tabs, {
      viewportWidth : options.viewportWidth,
      offset        : this.offset.width,
      tabpages,
    });

    const items: RenderItem[] = [];
    let currentItem: RenderItem | undefined;
    let position = 0;

    tabs.forEach((tab, i) => {
      const width = layout.widths[i];

      tab.state.realWidth    = layout.baseWidths[i] + layout.paddingWidth * SIDES_OF_TAB;
      tab.state.realPosition = position;

      const item: RenderItem = {
        tab,
        position : Math.round(resolveGeometry(tab.state.position, position)),
        segments : this.buildTabSegments(tab, i, layout, config),
      };

      if (tab.isCurrent) {
        currentItem = item;
        if (options.refocus !== false) {
          this.revealRange(position, position + width, layout.buffersWidth);
        }
      }

      items.push(item);
      position += width;
    });

    // Current tab goes in last so it wins where tabs overlap
    let canvas: Segment[] = [{ style: HIGHLIGHTS.fill, text: ' '.repeat(layout.actualWidth) }];
    for (const item of items) {
      if (item !== currentItem) { canvas = insertAt(canvas, item.position, item.segments); }
    }
    if (currentItem) {
      canvas = insertAt(canvas, currentItem.position, currentItem.segments);
    }

    canvas = this.cropToScroll(canvas, layout);

    let result = this.renderOffset() + segmentsToString(canvas);

    // Keeps the last click region from stretching over the unused space
    if (config.clickable) {
      result += clickDirective({ id: 0, handler: CLICK_HANDLERS.MAIN });
    }
    result += styleDirective(HIGHLIGHTS.fill);

    if (items.length > 0 && segmentsWidth(canvas) + displayWidth(config.iconSeparatorInactive) <= layout.buffersWidth) {
      result += escapeText(config.iconSeparatorInactive);
    }

    if (layout.tabpagesWidth > 0) {
      result += `%=${styleDirective(HIGHLIGHTS.tabpages)} ${tabpages.current}/${tabpages.total} `;
    }

    result += styleDirective(HIGHLIGHTS.fill);

    return { kind: 'line', text: result, layout };
  }

  //= PRIVATE HELPERS

  /** Scrolls just enough for `[start, end)` to be inside the viewport. */
  private revealRange(start: number, end: number, buffersWidth: number): void {
    if (this.scroll > start) {
      this.setScroll(start);
    } else if (this.scroll + buffersWidth < end) {
      this.setScroll(end - buffersWidth);
    }
  }

  private cropToScroll(canvas: Segment[], layout: Layout): Segment[] {
    const maxScroll = Math.max(layout.actualWidth - layout.buffersWidth, 0);
    const scroll    = Math.max(0, Math.min(this.scrollCurrent, maxScroll));

    // Tabs keep their natural segments while their width animates, so the
    // canvas can be wider than `actualWidth`
    let cropped = cropRight(canvas, scroll + layout.buffersWidth);
    if (scroll > 0) {
      cropped = cropLeft(cropped, layout.buffersWidth);
    }
    return cropped;
  }

  private renderOffset(): string {
    const { width, text, style } = this.offset;
    if (width <= 0) { return ''; }

    let content = sliceColumns(` ${text ?? ''}`, 0, width);
    content += ' '.repeat(Math.max(width - displayWidth(content), 0));

    return segmentsToString([{ style: style ?? HIGHLIGHTS.offset, text: content }]);
  }

  private buildTabSegments(tab: Tab, index: number, layout: Layout, config: TablineConfiguration): Segment[] {
    const { activity, modified, pinned } = tab.state;
    const isInactive = activity === 'Inactive';
    const withIcons  = hasIcons(config);

    const main: ClickTarget | undefined = config.clickable
      ? { id: tab.id, handler: CLICK_HANDLERS.MAIN }
      : undefined;

    const nameStyle = tabStyle(activity, modified ? 'Mod' : '');
    const padding   = ' '.repeat(layout.paddingWidth);
    let name        = tab.metadata.label;

    const segments: Segment[] = [
      { click: main, style: tabStyle(activity, 'Sign'), text: isInactive ? config.iconSeparatorInactive : config.iconSeparatorActive },
      { text: padding },
      { style: tabStyle(activity, 'Index'), text: this.layoutService.indexLabel(tab, index) },
    ];

    if (this.jumpMode.isPicking) {
      const letter = this.jumpMode.getLetter(tab.id, tab.metadata.name);
      let suffix   = withIcons ? ` ${letter === undefined ? ' ' : ''}` : '';

      // Without icons the letter takes the place of the first character,
      // padded to its width so the tab keeps its layout width
      if (letter !== undefined && !withIcons) {
        const first = firstGrapheme(name);
        name   = name.slice(first.length);
        suffix = ' '.repeat(Math.max(displayWidth(first) - displayWidth(letter), 0));
      }

      segments.push({ style: tabStyle(activity, 'Target'), text: (letter ?? '') + suffix });
    } else if (withIcons) {
      const icon = this.iconManager.getIcon(tab.metadata.name, this.host.getOption(tab.id, 'filetype'), activity);
      const iconStyle = config.iconCustomColors
        ? tabStyle(activity, 'Icon')
        : (isInactive ? 'BufferInactive' : icon.style) ?? nameStyle;
      segments.push({ click: main, style: iconStyle, text: `${icon.glyph} ` });
    }

    segments.push(
      { click: main, style: nameStyle, text: name },
      { text: `${padding} ` },
    );

    if (config.closable || pinned) {
      const closeIcon = pinned
        ? config.iconPinned
        : (modified ? config.iconCloseTabModified : config.iconCloseTab);

      segments.push({
        click : config.clickable ? { id: tab.id, handler: CLICK_HANDLERS.CLOSE } : undefined,
        style : nameStyle,
        text  : `${closeIcon} `,
      });
    }

    return segments
      .filter(segment => segment.text.length > 0)
      .map(stripUndefined);
  }
}

function firstGrapheme(text: string): string {
  const [first] = new Intl.Segmenter(undefined, { granularity: 'grapheme' }).segment(text);
  return first ? first.segment : '';
}

/** Drops `click`/`style` keys explicitly set to `undefined`. */
function stripUndefined(segment: Segment): Segment {
  const result: Segment = { text: segment.text };
  if (segment.click) { result.click = segment.click; }
  if (segment.style) { result.style = segment.style; }
  return result;
}
