import type { PDFPageProxy, TextItem } from "pdfjs-dist/types/src/display/api";
import type { Rect, TextBlock } from "../../lib/drawingComments";

/** A text item placed in top-down page coordinates */
export type PositionedText = Rect & { str: string };

export type TextItemGeometry = Pick<TextItem, "str" | "transform" | "width" | "height">;

type Matrix = readonly number[];

export function applyTransform(m: Matrix, x: number, y: number): [number, number] {
  return [m[0] * x + m[2] * y + m[4], m[1] * x + m[3] * y + m[5]];
}

function isTextItem(item: object): item is TextItem {
  return "str" in item && "transform" in item;
}

/**
 * Box a pdf.js text item in viewport space. The item's transform gives the
 * baseline origin in PDF user space; width/height extend it right and up.
 */
export function positionTextItem(item: TextItemGeometry, viewportTransform: Matrix): PositionedText {
  const [, , , , x, y] = item.transform;
  const height = item.height || Math.hypot(item.transform[2], item.transform[3]);
  const [ax, ay] = applyTransform(viewportTransform, x, y);
  const [bx, by] = applyTransform(viewportTransform, x + item.width, y + height);
  return {
    str: item.str,
    x0: Math.min(ax, bx),
    y0: Math.min(ay, by),
    x1: Math.max(ax, bx),
    y1: Math.max(ay, by),
  };
}

export function insideRect(box: Rect, clip: Rect): boolean {
  return box.x0 >= clip.x0 && box.y0 >= clip.y0 && box.x1 <= clip.x1 && box.y1 <= clip.y1;
}

interface Line extends Rect {
  text: string;
}

interface BlockDraft extends Rect {
  lines: Line[];
}

function lineHeight(box: Rect): number {
  return Math.max(box.y1 - box.y0, 1);
}

// Title-block cells share a baseline; a gap wider than one line height separates them.
function continuesLine(line: Line, item: PositionedText): boolean {
  const h = lineHeight(item);
  const gap = item.x0 - line.x1;
  return Math.abs(item.y1 - line.y1) <= h * 0.5 && gap >= -h * 0.5 && gap <= h;
}

function startsNextLine(block: BlockDraft, item: PositionedText): boolean {
  const h = lineHeight(item);
  const gap = item.y0 - block.y1;
  const overlaps = item.x0 <= block.x1 + h && item.x1 >= block.x0 - h;
  return gap >= -h * 0.5 && gap <= h * 0.5 && overlaps;
}

function grow(target: Rect, box: Rect): void {
  target.x0 = Math.min(target.x0, box.x0);
  target.y0 = Math.min(target.y0, box.y0);
  target.x1 = Math.max(target.x1, box.x1);
  target.y1 = Math.max(target.y1, box.y1);
}

/**
 * Group positioned items (in content-stream order) into paragraph-like blocks.
 * Lines inside a block are joined with "\n".
 */
export function groupTextBlocks(items: readonly PositionedText[]): TextBlock[] {
  const blocks: BlockDraft[] = [];
  let current: BlockDraft | null = null;

  for (const item of items) {
    if (!item.str) continue;

    const line: Line | undefined = current?.lines[current.lines.length - 1];
    if (current && line && continuesLine(line, item)) {
      line.text += item.str;
      grow(line, item);
      grow(current, item);
    } else if (current && startsNextLine(current, item)) {
      current.lines.push({ text: item.str, x0: item.x0, y0: item.y0, x1: item.x1, y1: item.y1 });
      grow(current, item);
    } else {
      current = {
        x0: item.x0,
        y0: item.y0,
        x1: item.x1,
        y1: item.y1,
        lines: [{ text: item.str, x0: item.x0, y0: item.y0, x1: item.x1, y1: item.y1 }],
      };
      blocks.push(current);
    }
  }

  return blocks.map(({ x0, y0, x1, y1, lines }) => ({
    x0,
    y0,
    x1,
    y1,
    text: lines.map((l) => l.text).join("\n"),
  }));
}

/**
 * Text blocks of a page restricted to a clip rectangle (top-down coordinates).
 * An item is kept only when its whole box is inside the clip.
 */
export async function extractTextBlocks(page: PDFPageProxy, clip: Rect): Promise<TextBlock[]> {
  const viewport = page.getViewport({ scale: 1 });
  const content = await page.getTextContent();

  const positioned = content.items
    .filter(isTextItem)
    .map((item) => positionTextItem(item, viewport.transform))
    .filter((box) => insideRect(box, clip));

  return groupTextBlocks(positioned);
}
