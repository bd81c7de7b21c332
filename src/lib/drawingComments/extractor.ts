/**
 * Comment Extractor
 * Walks a PDF page by page: drawing number first, then the page's comments,
 * each stamped with that page's number and drawing number.
 */

import { normalizeAnnotations } from './annotationNormalizer';
import { drawingNumberRegion, selectDrawingNumber } from './regionTextSelector';
import {
  ExtractedRow,
  ExtractionProgress,
  ExtractionResult,
  NormalizedAnnotation,
  PdfCommentPage,
  PdfCommentSource,
} from './types';

export interface ExtractOptions {
  onProgress?: (progress: ExtractionProgress) => void;
}

export function buildPageRows(
  page: number,
  drawingNumber: string,
  annotations: readonly NormalizedAnnotation[],
): ExtractedRow[] {
  return annotations.map((annotation) =>
    Object.freeze({
      page,
      drawingNumber,
      ...annotation,
    }),
  );
}

export async function readDrawingNumber(page: PdfCommentPage): Promise<string> {
  const clip = drawingNumberRegion(page.width, page.height);
  const blocks = await page.getTextBlocks(clip);
  return selectDrawingNumber(blocks, page.width, page.height);
}

export async function extractPageRows(page: PdfCommentPage, pageNumber: number): Promise<ExtractedRow[]> {
  const drawingNumber = await readDrawingNumber(page);
  const annotations = normalizeAnnotations(await page.getAnnotations());
  return buildPageRows(pageNumber, drawingNumber, annotations);
}

/**
 * Extract every comment in the document. The source is closed when done,
 * including on failure.
 */
export async function extractComments(
  source: PdfCommentSource,
  options: ExtractOptions = {},
): Promise<ExtractionResult> {
  const { pageCount } = source;
  const rows: ExtractedRow[] = [];

  try {
    for (let index = 0; index < pageCount; index++) {
      const page = await source.getPage(index);
      rows.push(...(await extractPageRows(page, index + 1)));
      options.onProgress?.({ page: index + 1, pageCount });
    }
  } finally {
    await source.close();
  }

  return { rows, pageCount };
}
