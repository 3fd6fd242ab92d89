import stringWidth from 'string-width';

const segmenter = new Intl.Segmenter(undefined, { granularity: 'grapheme' });

/** Splits `text` into grapheme clusters, each with its display width. */
function* graphemes(text: string): Generator<{ grapheme: string; width: number }> {
  for (const { segment } of segmenter.segment(text)) {
    yield { grapheme: segment, width: stringWidth(segment) };
  }
}

/** Number of terminal columns `text` occupies. */
export function displayWidth(text: string): number {
  if (text.length === 0) { return 0; }
  // ASCII fast path: one column per printable character
  if (/^[\x20-\x7e]*$/.test(text)) { return text.length; }

  let total = 0;
  for (const { width } of graphemes(text)) {
    total += width;
  }
  return total;
}

/**
 * Substring of `text` by display columns: `[start, start + width)`.
 * A wide grapheme cut by either edge is replaced by spaces for the
 * columns that fall inside the window, so the result keeps its width.
 */
export function sliceColumns(text: string, start: number, width?: number): string {
  const from = Math.max(start, 0);
  const to   = width === undefined ? Infinity : start + width;
  if (to <= from) { return ''; }

  let result = '';
  let column = 0;

  for (const { grapheme, width: w } of graphemes(text)) {
    const end = column + w;

    if (column >= to) { break; }

    if (w === 0) {
      if (column >= from) { result += grapheme; }
    } else if (column >= from && end <= to) {
      result += grapheme;
    } else if (end > from) {
      result += ' '.repeat(Math.min(end, to) - Math.max(column, from));
    }

    column = end;
  }

  return result;
}

/**
 * Truncates `text` to at most `maxWidth` columns, ending it with `ellipsis`
 * when something was cut.
 */
export function truncateToWidth(text: string, maxWidth: number, ellipsis = '…'): string {
  if (displayWidth(text) <= maxWidth) { return text; }
  const room = maxWidth - displayWidth(ellipsis);
  if (room <= 0) { return sliceColumns(ellipsis, 0, maxWidth); }
  return sliceColumns(text, 0, room) + ellipsis;
}
