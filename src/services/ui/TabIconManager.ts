// Solo resuelve datos de iconos; no compone segmentos ni estilos de la tab.

import * as path from 'path';
import fileIcons from '../../constants/fileIcons.json';
import { PRODUCT_ICONS } from '../../constants/icons';
import type { IconProvider, IconResult } from '../../models/Host';
import { Logger } from '../../utils/logger';

type IconEntry = { glyph: string; style: string };

const BY_EXTENSION: Record<string, IconEntry>  = fileIcons.byExtension;
const BY_FILE_NAME: Record<string, IconEntry>  = fileIcons.byFileName;
const BY_FILETYPE : Record<string, string>     = fileIcons.byFiletype;

/**
 * Icon provider backed by the bundled table.
 * Search order: exact file name → extension → filetype alias.
 */
export class BuiltinIconProvider implements IconProvider {
  getIcon(name: string, filetype: string | undefined): IconResult | undefined {
    const base = path.basename(name);
    if (BY_FILE_NAME[base]) { return BY_FILE_NAME[base]; }

    const ext = path.extname(base).slice(1).toLowerCase();
    if (ext && BY_EXTENSION[ext]) { return BY_EXTENSION[ext]; }

    const alias = filetype ? BY_FILETYPE[filetype] : undefined;
    if (alias && BY_EXTENSION[alias]) { return BY_EXTENSION[alias]; }

    return undefined;
  }
}

/**
 * Resuelve y cachea iconos por (nombre, filetype, estilo de actividad).
 * Si el proveedor falla o no tiene icono, devuelve el glifo por defecto
 * sin estilo (la tab usa entonces su propio estilo de nombre).
 */
export class TabIconManager {
  // nombre → (filetype + estilo) → icono
  private _iconCache: Map<string, Map<string, IconResult>> = new Map();

  constructor(private readonly provider: IconProvider = new BuiltinIconProvider()) {}

  getIcon(name: string, filetype: string | undefined, activityStyle: string): IconResult {
    const key     = `${filetype ?? ''}\u0000${activityStyle}`;
    let byName    = this._iconCache.get(name);
    const cached  = byName?.get(key);
    if (cached) { return cached; }

    const icon = this.lookup(name, filetype, activityStyle);
    if (!byName) {
      byName = new Map();
      this._iconCache.set(name, byName);
    }
    byName.set(key, icon);
    return icon;
  }

  /** Olvida los iconos de nombres que ya no tiene ninguna tab. */
  retainNames(names: Iterable<string>): void {
    const keep = new Set(names);
    for (const name of [...this._iconCache.keys()]) {
      if (!keep.has(name)) { this._iconCache.delete(name); }
    }
  }

  /** Olvida los iconos resueltos (p. ej. tras cambiar de tema). */
  clearCache(): void {
    this._iconCache.clear();
  }

  get cacheSize(): number {
    let size = 0;
    for (const byName of this._iconCache.values()) { size += byName.size; }
    return size;
  }

  private lookup(name: string, filetype: string | undefined, activityStyle: string): IconResult {
    try {
      const icon = this.provider.getIcon(name, filetype, activityStyle);
      if (icon && icon.glyph.length > 0) {
        return icon.style ? { glyph: icon.glyph, style: icon.style } : { glyph: icon.glyph };
      }
    } catch (error) {
      Logger.error(`[Tabstrip] Icon lookup failed for "${name}"`, error);
    }
    return { glyph: PRODUCT_ICONS.defaultFile };
  }
}
