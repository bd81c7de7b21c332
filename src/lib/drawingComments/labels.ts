/**
 * Export labels
 * Column headers, colour names and placeholders per output language.
 * Row data stays in the canonical English form; only export is localized.
 */

import { ColorName, ExtractedRow, NOT_SPECIFIED, UNREADABLE_DRAWING_NUMBER } from './types';

export const LOCALES = ['en', 'ja'] as const;
export type Locale = (typeof LOCALES)[number];

export type ColumnKey = keyof ExtractedRow;

/** Export column order */
export const COLUMN_ORDER: readonly ColumnKey[] = [
  'page',
  'drawingNumber',
  'comment',
  'author',
  'modified',
  'colorName',
  'colorHex',
];

export interface ExportLabels {
  sheetName: string;
  headers: Record<ColumnKey, string>;
  colorNames: Record<ColorName, string>;
  unreadable: string;
  notSpecified: string;
}

export const EXPORT_LABELS: Record<Locale, ExportLabels> = {
  en: {
    sheetName: 'Comments',
    headers: {
      page: 'Page',
      drawingNumber: 'Drawing No.',
      comment: 'Comment',
      author: 'Author',
      modified: 'Modified',
      colorName: 'Color',
      colorHex: 'Color Code',
    },
    colorNames: { Red: 'Red', Blue: 'Blue', Black: 'Black', Other: 'Other' },
    unreadable: UNREADABLE_DRAWING_NUMBER,
    notSpecified: NOT_SPECIFIED,
  },
  ja: {
    sheetName: 'コメント一覧',
    headers: {
      page: 'ページ',
      drawingNumber: '図面番号',
      comment: 'コメント内容',
      author: '作成者',
      modified: '更新日時',
      colorName: '色名',
      colorHex: '色コード',
    },
    colorNames: { Red: '赤', Blue: '青', Black: '黒', Other: 'その他' },
    unreadable: '(読取不可)',
    notSpecified: '指定なし',
  },
};

export function isLocale(value: string): value is Locale {
  return (LOCALES as readonly string[]).includes(value);
}

/**
 * Row values in export column order, with colour names and placeholders translated
 */
export function localizeRow(row: ExtractedRow, locale: Locale): Array<string | number> {
  const labels = EXPORT_LABELS[locale];
  return COLUMN_ORDER.map((key) => {
    switch (key) {
      case 'drawingNumber':
        return row.drawingNumber === UNREADABLE_DRAWING_NUMBER ? labels.unreadable : row.drawingNumber;
      case 'colorName':
        return labels.colorNames[row.colorName];
      case 'colorHex':
        return row.colorHex === NOT_SPECIFIED ? labels.notSpecified : row.colorHex;
      default:
        return row[key];
    }
  });
}
