/**
 * Drawing Comment Types
 * Shapes shared by drawing-number selection, annotation normalization and export
 */

/** Placeholder drawing number for pages with no usable bottom-right text */
export const UNREADABLE_DRAWING_NUMBER = '(unreadable)';

/** Placeholder colour code for annotations without a stroke colour */
export const NOT_SPECIFIED = '(not specified)';

/**
 * Axis-aligned rectangle in top-down page coordinates
 * (origin top-left, y grows towards the bottom of the sheet)
 */
export interface Rect {
  x0: number;
  y0: number;
  x1: number;
  y1: number;
}

/** A contiguous run of text as reported by the PDF text collaborator */
export interface TextBlock extends Rect {
  text: string;
}

export interface Candidate {
  text: string;
  bottom: number;
  right: number;
}

/**
 * Raw annotation as read from the PDF. Every field may be missing.
 * strokeColor holds channels normalized to 0..1 (1 = gray, 3 = RGB).
 */
export interface AnnotationRecord {
  content?: string | null;
  title?: string | null;
  modDate?: string | null;
  strokeColor?: readonly number[] | null;
}

export type ColorName = 'Red' | 'Blue' | 'Black' | 'Other';

export interface NormalizedAnnotation {
  comment: string;
  author: string;
  modified: string;
  colorName: ColorName;
  colorHex: string;
}

export interface ExtractedRow extends NormalizedAnnotation {
  /** 1-based page number */
  page: number;
  drawingNumber: string;
}

export interface ExtractionResult {
  rows: ExtractedRow[];
  pageCount: number;
}

export interface ExtractionProgress {
  page: number;
  pageCount: number;
}

/**
 * One page of a PDF, as the extractor needs it.
 * width/height are the rendered page size in points (rotation applied).
 */
export interface PdfCommentPage {
  width: number;
  height: number;
  getTextBlocks(clip: Rect): Promise<TextBlock[]>;
  getAnnotations(): Promise<AnnotationRecord[]>;
}

export interface PdfCommentSource {
  pageCount: number;
  getPage(index: number): Promise<PdfCommentPage>;
  close(): Promise<void>;
}
