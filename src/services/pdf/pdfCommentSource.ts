import type { PdfCommentPage, PdfCommentSource } from "../../lib/drawingComments";
import { extractAnnotations } from "./annotations";
import { loadPdf } from "./pdfjs";
import { extractTextBlocks } from "./textBlocks";

/**
 * Open a PDF held in memory as a comment source backed by pdf.js.
 */
export async function openPdfCommentSource(data: Uint8Array): Promise<PdfCommentSource> {
  const pdf = await loadPdf(data);

  return {
    pageCount: pdf.numPages,

    async getPage(index: number): Promise<PdfCommentPage> {
      // pdf.js pages are 1-based
      const page = await pdf.getPage(index + 1);
      const viewport = page.getViewport({ scale: 1 });
      return {
        width: viewport.width,
        height: viewport.height,
        getTextBlocks: (clip) => extractTextBlocks(page, clip),
        getAnnotations: () => extractAnnotations(page),
      };
    },

    async close(): Promise<void> {
      await pdf.cleanup();
      await pdf.destroy();
    },
  };
}
