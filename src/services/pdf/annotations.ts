import { z } from "zod";
import type { PDFPageProxy } from "pdfjs-dist/types/src/display/api";
import type { AnnotationRecord } from "../../lib/drawingComments";

// Links and form widgets are not review comments; popups repeat their parent's text.
const SKIPPED_SUBTYPES = new Set(["Link", "Widget", "Popup"]);

const TextObjSchema = z.object({ str: z.string() }).nullable().optional();

// pdf.js builds colours as Uint8ClampedArray inside its own module scope, so
// an instanceof check against this realm's constructor can fail.
const ColorSchema = z
  .custom<ArrayLike<number>>((value) => ArrayBuffer.isView(value) || Array.isArray(value))
  .nullable()
  .optional();

export const PdfjsAnnotationSchema = z.object({
  subtype: z.string().optional(),
  contentsObj: TextObjSchema,
  titleObj: TextObjSchema,
  modificationDate: z.string().nullable().optional(),
  color: ColorSchema,
});

export type PdfjsAnnotation = z.infer<typeof PdfjsAnnotationSchema>;

/**
 * pdf.js reports colours as 0..255 RGB bytes; records carry 0..1 channels.
 */
export function toAnnotationRecord(data: PdfjsAnnotation): AnnotationRecord {
  return {
    content: data.contentsObj?.str ?? null,
    title: data.titleObj?.str ?? null,
    modDate: data.modificationDate ?? null,
    strokeColor: data.color ? Array.from(data.color, (byte) => byte / 255) : null,
  };
}

/**
 * Map raw pdf.js annotation data to records, in page order.
 * Entries that do not look like annotation data are logged and skipped.
 */
export function toAnnotationRecords(raw: readonly unknown[], pageNumber: number): AnnotationRecord[] {
  const records: AnnotationRecord[] = [];
  raw.forEach((entry, i) => {
    const parsed = PdfjsAnnotationSchema.safeParse(entry);
    if (!parsed.success) {
      console.warn(`[pdf] Page ${pageNumber}: skipping unreadable annotation #${i}`, parsed.error.issues);
      return;
    }
    if (parsed.data.subtype && SKIPPED_SUBTYPES.has(parsed.data.subtype)) return;
    records.push(toAnnotationRecord(parsed.data));
  });
  return records;
}

export async function extractAnnotations(page: PDFPageProxy): Promise<AnnotationRecord[]> {
  const raw: unknown[] = await page.getAnnotations();
  return toAnnotationRecords(raw, page.pageNumber);
}
