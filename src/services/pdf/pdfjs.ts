import path from "path";
import * as pdfjs from "pdfjs-dist/legacy/build/pdf";
import type { PDFDocumentProxy } from "pdfjs-dist/types/src/display/api";

pdfjs.GlobalWorkerOptions.workerSrc = require.resolve(
  "pdfjs-dist/legacy/build/pdf.worker.js",
);

const pdfjsPkg = require.resolve("pdfjs-dist/package.json");
const pdfjsRoot = path.dirname(pdfjsPkg);

// Title blocks are often set in CJK fonts; without cMaps their text decodes as garbage.
const CMAP_URL = path.join(pdfjsRoot, "cmaps") + path.sep;
const STANDARD_FONT_DATA_URL = path.join(pdfjsRoot, "standard_fonts") + path.sep;

export class PdfLoadError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "PdfLoadError";
  }
}

export async function loadPdf(data: Uint8Array): Promise<PDFDocumentProxy> {
  try {
    const loadingTask = pdfjs.getDocument({
      data,
      cMapUrl: CMAP_URL,
      cMapPacked: true,
      standardFontDataUrl: STANDARD_FONT_DATA_URL,
      verbosity: 0,
      isEvalSupported: false,
      useSystemFonts: false,
    });
    return await loadingTask.promise;
  } catch (error) {
    console.error("[pdf] Error loading PDF:", error);
    throw new PdfLoadError(
      `Failed to load PDF file: ${error instanceof Error ? error.message : "Unknown error"}`,
      { cause: error },
    );
  }
}

export type { PDFDocumentProxy };
