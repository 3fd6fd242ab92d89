import type { ClickTarget, Segment, SegmentList } from '../models/Segment';
import { displayWidth, sliceColumns } from './width';

//= DIRECTIVES

/** Style switch directive understood by the host's line surface. */
export function styleDirective(style: string): string {
  return `%#${style}#`;
}

/** Clickable region marker, bound to `id` until the next marker. */
export function clickDirective(click: ClickTarget): string {
  return `%${click.id}@${click.handler}@`;
}

/** Doubles every `%` so it is not read as a directive. */
export function escapeText(text: string): string {
  return text.replace(/%/g, '%%');
}

//= MEASURE / SERIALIZE

export function segmentsWidth(segments: SegmentList): number {
  let total = 0;
  for (const segment of segments) {
    total += displayWidth(segment.text);
  }
  return total;
}

/** Concatenates `segments` into a line of directives and escaped text. */
export function segmentsToString(segments: SegmentList): string {
  let result = '';
  for (const segment of segments) {
    if (segment.click) { result += clickDirective(segment.click); }
    if (segment.style) { result += styleDirective(segment.style); }
    result += escapeText(segment.text);
  }
  return result;
}

//= SPLICE / CROP

/**
 * Overlays `others` on `segments` so that its first column lands at
 * display column `position`. Whatever was under `[position, position + width(others))`
 * is cut away; a segment straddling either edge keeps its outer part.
 */
export function insertAt(segments: SegmentList, position: number, others: SegmentList): Segment[] {
  const result: Segment[] = [];
  let current = 0;
  let i = 0;

  while (i < segments.length) {
    const segment = segments[i];
    const width   = displayWidth(segment.text);

    if (current + width <= position) {
      result.push(segment);
      current += width;
      i++;
      continue;
    }

    const available = position - current;
    if (available > 0) {
      result.push({ ...segment, text: sliceColumns(segment.text, 0, available) });
    }

    let othersWidth = 0;
    for (const other of others) {
      othersWidth += displayWidth(other.text);
      result.push(other);
    }

    const endPosition = position + othersWidth;

    // Resume with what was under and after the inserted run
    while (i < segments.length) {
      const previous      = segments[i];
      const previousWidth = displayWidth(previous.text);
      const start         = current;
      const end           = current + previousWidth;

      if (previousWidth === 0) {
        if (start >= endPosition) { result.push(previous); }
      } else if (start >= endPosition) {
        result.push(previous);
      } else if (end > endPosition) {
        const keep = end - endPosition;
        result.push({ ...previous, text: sliceColumns(previous.text, previousWidth - keep, keep) });
      }

      current = end;
      i++;
    }

    return result;
  }

  // `position` at or past the end
  result.push(...others);
  return result;
}

/** Keeps the first `width` columns of `segments`. */
export function cropRight(segments: SegmentList, width: number): Segment[] {
  if (width <= 0) { return []; }
  if (segmentsWidth(segments) <= width) { return [...segments]; }

  const result: Segment[] = [];
  let accumulated = 0;

  for (const segment of segments) {
    const textWidth = displayWidth(segment.text);
    accumulated += textWidth;

    if (accumulated >= width) {
      const fit = textWidth - (accumulated - width);
      result.push({ ...segment, text: sliceColumns(segment.text, 0, fit) });
      break;
    }

    result.push(segment);
  }

  return result;
}

/** Keeps the last `width` columns of `segments`. */
export function cropLeft(segments: SegmentList, width: number): Segment[] {
  if (width <= 0) { return []; }
  if (segmentsWidth(segments) <= width) { return [...segments]; }

  const result: Segment[] = [];
  let accumulated = 0;
  let cut = 0;

  for (let i = segments.length - 1; i >= 0; i--) {
    const segment   = segments[i];
    const textWidth = displayWidth(segment.text);
    accumulated += textWidth;

    if (accumulated >= width) {
      const fit = textWidth - (accumulated - width);
      result.unshift({ ...segment, text: sliceColumns(segment.text, textWidth - fit, fit) });
      cut = i;
      break;
    }

    result.unshift(segment);
  }

  // The first kept segment takes over the style and click region in effect at the cut
  const first = result[0];
  if (first && (first.style === undefined || first.click === undefined)) {
    let style: string | undefined;
    let click: ClickTarget | undefined;
    for (let i = 0; i <= cut; i++) {
      style = segments[i].style ?? style;
      click = segments[i].click ?? click;
    }
    result[0] = {
      ...first,
      ...(first.style === undefined && style !== undefined ? { style } : {}),
      ...(first.click === undefined && click !== undefined ? { click } : {}),
    };
  }

  return result;
}
