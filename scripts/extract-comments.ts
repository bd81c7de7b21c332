#!/usr/bin/env tsx
/**
 * Extract review comments from an annotated drawing PDF into an Excel list.
 *
 * Usage:
 *   npm run extract -- drawings.pdf
 *   npm run extract -- drawings.pdf --out review.xlsx --locale ja
 *   npm run extract -- drawings.pdf --json
 */

import fs from "fs";
import path from "path";
import minimist from "minimist";
import { extractComments, isLocale } from "../src/lib/drawingComments";
import { buildCommentWorkbook, commentWorkbookFileName } from "../src/services/export/commentWorkbook";
import { openPdfCommentSource } from "../src/services/pdf/pdfCommentSource";

const USAGE = "Usage: extract-comments <file.pdf> [--out path.xlsx] [--locale en|ja] [--json]";

async function main() {
  const args = minimist(process.argv.slice(2), {
    string: ["out", "locale"],
    boolean: ["json", "help"],
    alias: { o: "out", l: "locale", h: "help" },
    default: { locale: "en" },
  });

  if (args.help) {
    console.log(USAGE);
    return;
  }

  const input = args._[0];
  if (!input) {
    console.error(USAGE);
    process.exitCode = 1;
    return;
  }

  const locale = String(args.locale);
  if (!isLocale(locale)) {
    console.error(`❌ Unknown locale: ${locale}`);
    process.exitCode = 1;
    return;
  }

  const inputPath = path.resolve(String(input));
  const data = new Uint8Array(await fs.promises.readFile(inputPath));
  const source = await openPdfCommentSource(data);

  console.error(`📄 ${path.basename(inputPath)}: ${source.pageCount} pages`);

  const result = await extractComments(source, {
    onProgress: ({ page, pageCount }) => {
      process.stderr.write(`\r⏳ Page ${page}/${pageCount}`);
    },
  });
  process.stderr.write("\n");

  if (args.json) {
    console.log(JSON.stringify(result.rows, null, 2));
    return;
  }

  if (result.rows.length === 0) {
    console.warn("⚠️ No comments found. Check that the PDF contains annotations with text.");
    return;
  }

  const outPath = args.out
    ? path.resolve(String(args.out))
    : path.join(path.dirname(inputPath), commentWorkbookFileName(path.basename(inputPath)));

  await fs.promises.writeFile(outPath, await buildCommentWorkbook(result.rows, { locale }));
  console.error(`✅ ${result.rows.length} comments written to ${outPath}`);
}

main().catch((err) => {
  console.error("❌ Extraction failed:", err instanceof Error ? err.message : err);
  process.exitCode = 1;
});
