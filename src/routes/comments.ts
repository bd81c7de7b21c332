// src/routes/comments.ts
import { Router, Request, Response, NextFunction } from "express";
import multer from "multer";
import { z } from "zod";
import {
  extractComments,
  LOCALES,
  Locale,
  PdfCommentSource,
} from "../lib/drawingComments";
import {
  buildCommentWorkbook,
  commentWorkbookFileName,
  XLSX_MIME_TYPE,
} from "../services/export/commentWorkbook";
import { openPdfCommentSource } from "../services/pdf/pdfCommentSource";
import { PdfLoadError } from "../services/pdf/pdfjs";

export interface CommentsRouterOptions {
  /** Opens an uploaded PDF; defaults to the pdf.js-backed source */
  openSource?: (data: Uint8Array) => Promise<PdfCommentSource>;
  maxUploadBytes?: number;
  defaultLocale?: Locale;
}

const ExtractQuerySchema = z.object({
  format: z.enum(["json", "xlsx"]).default("json"),
  locale: z.enum(LOCALES).optional(),
});

const NO_COMMENTS_MESSAGE =
  "No comments found. Check that the PDF contains annotations with text.";

/**
 * multer 1.x hands over the multipart file name decoded as latin1; browsers
 * send UTF-8. Names that were already decoded correctly are kept.
 */
export function uploadedFileName(file: Express.Multer.File): string {
  const decoded = Buffer.from(file.originalname, "latin1").toString("utf8");
  return decoded.includes("\uFFFD") ? file.originalname : decoded;
}

function isPdf(file: Express.Multer.File): boolean {
  return file.mimetype === "application/pdf" || file.originalname.toLowerCase().endsWith(".pdf");
}

export function createCommentsRouter(options: CommentsRouterOptions = {}): Router {
  const {
    openSource = openPdfCommentSource,
    maxUploadBytes = 50 * 1024 * 1024,
    defaultLocale = "en",
  } = options;

  const router = Router();

  const upload = multer({
    storage: multer.memoryStorage(),
    limits: { fileSize: maxUploadBytes },
    fileFilter: (_req, file, cb) => {
      if (isPdf(file)) {
        cb(null, true);
      } else {
        cb(new Error("Only PDF files are allowed"));
      }
    },
  });

  function receiveFile(req: Request, res: Response, next: NextFunction) {
    upload.single("file")(req, res, (err?: unknown) => {
      if (!err) return next();
      if (err instanceof multer.MulterError && err.code === "LIMIT_FILE_SIZE") {
        return res.status(413).json({ error: "File too large" });
      }
      const message = err instanceof Error ? err.message : "Upload failed";
      return res.status(400).json({ error: message });
    });
  }

  /**
   * POST /comments/extract
   * multipart field "file"; ?format=json|xlsx&locale=en|ja
   */
  router.post("/extract", receiveFile, async (req, res) => {
    const query = ExtractQuerySchema.safeParse(req.query);
    if (!query.success) {
      return res.status(400).json({ error: "Invalid request", details: query.error.issues });
    }
    if (!req.file) {
      return res.status(400).json({ error: "A PDF file is required (field 'file')" });
    }

    const { format } = query.data;
    const locale = query.data.locale ?? defaultLocale;
    const fileName = uploadedFileName(req.file);

    try {
      const source = await openSource(new Uint8Array(req.file.buffer));
      console.log(`[comments] Extracting ${fileName} (${source.pageCount} pages)`);

      const result = await extractComments(source, {
        onProgress: ({ page, pageCount }) => {
          console.log(`[comments] ${fileName}: page ${page}/${pageCount}`);
        },
      });

      console.log(`[comments] ✅ ${fileName}: ${result.rows.length} comments`);

      if (result.rows.length === 0) {
        return res.json({
          ok: true,
          pageCount: result.pageCount,
          rowCount: 0,
          rows: [],
          message: NO_COMMENTS_MESSAGE,
        });
      }

      if (format === "xlsx") {
        const workbook = await buildCommentWorkbook(result.rows, { locale });
        res.attachment(commentWorkbookFileName(fileName));
        res.type(XLSX_MIME_TYPE);
        return res.send(workbook);
      }

      return res.json({
        ok: true,
        pageCount: result.pageCount,
        rowCount: result.rows.length,
        rows: result.rows,
      });
    } catch (error) {
      if (error instanceof PdfLoadError) {
        return res.status(422).json({ error: error.message });
      }
      console.error("[comments] Extraction failed:", error);
      return res.status(500).json({ error: "Failed to extract comments" });
    }
  });

  return router;
}
