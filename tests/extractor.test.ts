/**
 * Comment Extractor Tests
 * Page iteration, row stamping, progress and cleanup
 */

import { describe, test, expect, jest } from '@jest/globals';
import {
  buildPageRows,
  extractComments,
  ExtractionProgress,
  NOT_SPECIFIED,
  UNREADABLE_DRAWING_NUMBER,
} from '../src/lib/drawingComments';
import { block, fakeSource } from './helpers/fakeSource';

describe('extractComments', () => {
  test('stamps each comment with its own page and drawing number', async () => {
    const source = fakeSource([
      {
        width: 1000,
        height: 800,
        blocks: [block('A-101', 850, 740, 950, 770)],
        annotations: [
          { content: 'Fix wall', title: 'Reviewer', modDate: 'D:20240101', strokeColor: [1, 0, 0] },
        ],
      },
      {
        width: 1000,
        height: 800,
        blocks: [],
        annotations: [{ content: 'Check door' }],
      },
    ]);

    const result = await extractComments(source);

    expect(result.pageCount).toBe(2);
    expect(result.rows).toEqual([
      {
        page: 1,
        drawingNumber: 'A-101',
        comment: 'Fix wall',
        author: 'Reviewer',
        modified: 'D:20240101',
        colorName: 'Red',
        colorHex: '#ff0000',
      },
      {
        page: 2,
        drawingNumber: UNREADABLE_DRAWING_NUMBER,
        comment: 'Check door',
        author: '',
        modified: '',
        colorName: 'Other',
        colorHex: NOT_SPECIFIED,
      },
    ]);
  });

  test('asks the source for the bottom-right quadrant of each page', async () => {
    const source = fakeSource([
      { width: 1000, height: 800 },
      { width: 595, height: 842 },
    ]);

    await extractComments(source);

    expect(source.clips).toEqual([
      { x0: 500, y0: 400, x1: 1000, y1: 800 },
      { x0: 297.5, y0: 421, x1: 595, y1: 842 },
    ]);
  });

  test('yields no rows for a page whose only annotation is blank', async () => {
    const source = fakeSource([
      {
        width: 1000,
        height: 800,
        blocks: [block('A-101', 850, 740, 950, 770)],
        annotations: [{ content: ' \n ', title: 'Reviewer', strokeColor: [1, 0, 0] }],
      },
    ]);

    const result = await extractComments(source);
    expect(result.rows).toEqual([]);
    expect(result.pageCount).toBe(1);
  });

  test('keeps page order then annotation order', async () => {
    const source = fakeSource([
      { width: 100, height: 100, annotations: [{ content: 'p1 a' }, { content: 'p1 b' }] },
      { width: 100, height: 100, annotations: [] },
      { width: 100, height: 100, annotations: [{ content: 'p3 a' }] },
    ]);

    const { rows } = await extractComments(source);
    expect(rows.map((r) => [r.page, r.comment])).toEqual([
      [1, 'p1 a'],
      [1, 'p1 b'],
      [3, 'p3 a'],
    ]);
  });

  test('reports progress after every page', async () => {
    const source = fakeSource([{ width: 100, height: 100 }, { width: 100, height: 100 }]);
    const onProgress = jest.fn<(progress: ExtractionProgress) => void>();

    await extractComments(source, { onProgress });

    expect(onProgress.mock.calls).toEqual([
      [{ page: 1, pageCount: 2 }],
      [{ page: 2, pageCount: 2 }],
    ]);
  });

  test('closes the source when a page fails', async () => {
    const source = fakeSource([{ width: 100, height: 100 }]);
    source.pageCount = 2;

    await expect(extractComments(source)).rejects.toThrow('No page 1');
    expect(source.closed).toBe(true);
  });

  test('closes the source after a successful run', async () => {
    const source = fakeSource([]);
    const result = await extractComments(source);
    expect(result).toEqual({ rows: [], pageCount: 0 });
    expect(source.closed).toBe(true);
  });
});

describe('buildPageRows', () => {
  test('creates frozen rows carrying the page context', () => {
    const rows = buildPageRows(4, 'A-401', [
      { comment: 'Move door', author: 'R', modified: '', colorName: 'Blue', colorHex: '#0000ff' },
    ]);
    expect(rows).toEqual([
      {
        page: 4,
        drawingNumber: 'A-401',
        comment: 'Move door',
        author: 'R',
        modified: '',
        colorName: 'Blue',
        colorHex: '#0000ff',
      },
    ]);
    expect(Object.isFrozen(rows[0])).toBe(true);
  });
});
