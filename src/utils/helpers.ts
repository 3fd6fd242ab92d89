import * as path from 'path';
import { NO_NAME_TITLE } from '../constants/styles';
import type { TablineConfiguration } from '../constants/styles';
import { truncateToWidth } from './width';

/**
 * Texto visible de una tab a partir del nombre que da el host.
 * - Solo el nombre base (sin directorios).
 * - Documentos sin nombre → `noNameTitle` o `[No Name]`.
 * - Recortado a `maximumLength` columnas con `…`.
 *
 * @example
 * ```ts
 * formatTabLabel('/repo/src/index.ts', config)  // => "index.ts"
 * formatTabLabel('', config)                    // => "[No Name]"
 * ```
 */
export function formatTabLabel(name: string, config: TablineConfiguration): string {
  const base  = name ? path.basename(name) : '';
  const label = base || config.noNameTitle || NO_NAME_TITLE;
  return truncateToWidth(label, config.maximumLength);
}

/** Number of path components, e.g. `a/b/c.ts` → 3. Empty names have depth 0. */
export function pathDepth(name: string): number {
  if (!name) { return 0; }
  return path.posix.normalize(name.replace(/\\/g, '/'))
    .split('/')
    .filter(part => part.length > 0 && part !== '.')
    .length;
}

/** Code-unit order, so results do not depend on the runtime locale. */
export function compareStrings(a: string, b: string): number {
  if (a < b) { return -1; }
  if (a > b) { return 1; }
  return 0;
}
