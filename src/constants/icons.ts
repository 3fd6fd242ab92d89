/**
 * Glifos por defecto del tabline.
 * Las opciones `icon*` de la configuración los sustituyen.
 */
export const PRODUCT_ICONS = {
  // Separators
  separatorActive: '▎',
  separatorInactive: '▎',

  // Tab states
  close: '\uf655',         // nf-mdi-close
  closeModified: '●',
  pinned: '\uf435',        // nf-oct-pin

  // Fallback file glyph when the icon provider has nothing
  defaultFile: '\uf15b',   // nf-fa-file
} as const;
