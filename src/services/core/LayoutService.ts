import { STYLE_CONSTANTS, hasBufferNumber, hasIcons, hasNumbers } from '../../constants/styles';
import type { TablineConfiguration } from '../../constants/styles';
import type { Layout, LayoutInput } from '../../models/Layout';
import { resolveGeometry } from '../../models/Tab';
import type { DocumentId, Tab } from '../../models/Tab';
import { displayWidth } from '../../utils/width';

const { SIDES_OF_TAB } = STYLE_CONSTANTS;

/**
 * Calcula anchos y posiciones de las tabs.
 * No recorta nada: el recorte por scroll es cosa del renderer.
 */
export class LayoutService {
  constructor(private readonly getConfig: () => TablineConfiguration) {}

  /**
   * Columns of decoration every tab carries, whatever its label.
   * The index slot is not included: its width depends on the number shown.
   */
  calculateBaseWidth(): number {
    const config = this.getConfig();
    return (hasIcons(config) ? STYLE_CONSTANTS.ICON_SLOT_WIDTH : 0)
      + STYLE_CONSTANTS.SPACE_AFTER_NAME
      + (config.closable ? STYLE_CONSTANTS.CLOSE_SLOT_WIDTH : 0)
      + STYLE_CONSTANTS.SEPARATOR_WIDTH;
  }

  /** Text of the index slot for the tab at `index` (0-based), `''` when hidden. */
  indexLabel(tab: Tab, index: number): string {
    const config = this.getConfig();
    if (hasBufferNumber(config)) { return `${tab.id} `; }
    if (hasNumbers(config))      { return `${index + 1} `; }
    return '';
  }

  /** Natural width of a tab showing `label`; never below `baseWidth`. */
  calculateWidth(label: string, baseWidth: number, paddingWidth: number): number {
    return Math.max(baseWidth, displayWidth(label) + baseWidth + paddingWidth * SIDES_OF_TAB);
  }

  /** ` 1/2 ` → 1 + digits + 1 + digits + 1; zero when there is a single tabpage. */
  calculateTabpagesWidth(tabpages: LayoutInput['tabpages']): number {
    if (!this.getConfig().tabpages || !tabpages || tabpages.total <= 1) { return 0; }
    return 1 + String(tabpages.current).length + 1 + String(tabpages.total).length + 1;
  }

  calculate(tabs: readonly Tab[], input: LayoutInput): Layout {
    const config         = this.getConfig();
    const baseWidth      = this.calculateBaseWidth();
    const availableWidth = Math.max(input.viewportWidth - (input.offset ?? 0), 0);
    const tabpagesWidth  = this.calculateTabpagesWidth(input.tabpages);
    const buffersWidth   = Math.max(availableWidth - tabpagesWidth, 0);

    const decorations = tabs.map((tab, i) => baseWidth
      + this.indexLabel(tab, i).length
      // Pinned tabs show their pin in the close slot even when tabs are not closable
      + (tab.state.pinned && !config.closable ? STYLE_CONSTANTS.CLOSE_SLOT_WIDTH : 0));
    const baseWidths  = tabs.map((tab, i) => decorations[i] + displayWidth(tab.metadata.label));
    const usedWidth   = baseWidths.reduce((sum, width) => sum + width, 0);

    // Spread the spare room as padding, within the configured bounds
    let paddingWidth = config.minimumPadding;
    if (tabs.length > 0) {
      const remainingWidth         = Math.max(buffersWidth - usedWidth, 0);
      const remainingPerTab        = Math.floor(remainingWidth / tabs.length);
      const remainingPaddingPerTab = Math.floor(remainingPerTab / SIDES_OF_TAB);
      paddingWidth = Math.max(config.minimumPadding, Math.min(remainingPaddingPerTab, config.maximumPadding));
    }

    const widths = tabs.map((tab, i) =>
      resolveGeometry(tab.state.width, this.calculateWidth(tab.metadata.label, decorations[i], paddingWidth)));
    const actualWidth = widths.reduce((sum, width) => sum + width, 0);

    return {
      availableWidth,
      baseWidth,
      baseWidths,
      widths,
      usedWidth,
      paddingWidth,
      buffersWidth,
      actualWidth,
      tabpagesWidth,
    };
  }

  /**
   * x position of every tab, from canonical order and current widths.
   * Snapshot before and after a reorder to drive the move animation.
   */
  calculatePositionsByTab(tabs: readonly Tab[], input: LayoutInput): Map<DocumentId, number> {
    const layout    = this.calculate(tabs, input);
    const positions = new Map<DocumentId, number>();

    let position = 0;
    tabs.forEach((tab, i) => {
      positions.set(tab.id, position);
      position += layout.widths[i];
    });

    return positions;
  }
}
