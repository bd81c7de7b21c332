/**
 * Drawing Number Selector
 * Picks the drawing number out of the text found in the bottom-right quadrant of a sheet.
 *
 * Title blocks on architectural sheets put the drawing number in the bottom-right
 * corner, so the lowest block wins and the rightmost breaks ties. Content is never
 * inspected: a "SCALE 1:100" note sitting below the number will be picked instead.
 */

import { Candidate, Rect, TextBlock, UNREADABLE_DRAWING_NUMBER } from './types';

export class InvalidPageGeometryError extends Error {
  constructor(width: number, height: number) {
    super(`Invalid page geometry: ${width} x ${height}`);
    this.name = 'InvalidPageGeometryError';
  }
}

function assertPageGeometry(width: number, height: number): void {
  if (!Number.isFinite(width) || !Number.isFinite(height) || width <= 0 || height <= 0) {
    throw new InvalidPageGeometryError(width, height);
  }
}

/**
 * Clip rectangle for text extraction: the bottom-right quadrant of the page, edges included
 */
export function drawingNumberRegion(pageWidth: number, pageHeight: number): Rect {
  assertPageGeometry(pageWidth, pageHeight);
  return {
    x0: pageWidth * 0.5,
    y0: pageHeight * 0.5,
    x1: pageWidth,
    y1: pageHeight,
  };
}

export function toCandidates(blocks: readonly TextBlock[]): Candidate[] {
  const candidates: Candidate[] = [];
  for (const block of blocks) {
    const text = block.text.trim();
    if (!text) continue;
    candidates.push({ text, bottom: block.y1, right: block.x1 });
  }
  return candidates;
}

/**
 * Descending by bottom edge, then by right edge.
 * Array.prototype.sort is stable, so exact ties keep extraction order.
 */
export function compareCandidates(a: Candidate, b: Candidate): number {
  if (a.bottom !== b.bottom) return b.bottom - a.bottom;
  return b.right - a.right;
}

/**
 * Select the drawing number from blocks already clipped to drawingNumberRegion().
 * Blocks are not re-filtered by position here.
 */
export function selectDrawingNumber(
  blocks: readonly TextBlock[],
  pageWidth: number,
  pageHeight: number,
): string {
  assertPageGeometry(pageWidth, pageHeight);

  const candidates = toCandidates(blocks);
  if (candidates.length === 0) return UNREADABLE_DRAWING_NUMBER;

  candidates.sort(compareCandidates);
  return candidates[0].text.replace(/[\r\n]/g, '');
}
