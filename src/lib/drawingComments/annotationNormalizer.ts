/**
 * Annotation Normalizer
 * Turns raw PDF annotations into comment rows with a colour category
 */

import { toHex } from './colorFormatter';
import { AnnotationRecord, ColorName, NormalizedAnnotation } from './types';

/**
 * Reviewers mark up in pure red, blue or black; everything else is grouped as Other
 */
export const COLOR_NAMES: Record<string, Exclude<ColorName, 'Other'>> = {
  '#FF0000': 'Red',
  '#0000FF': 'Blue',
  '#000000': 'Black',
};

export function classifyColor(colorHex: string): ColorName {
  return COLOR_NAMES[colorHex.toUpperCase()] ?? 'Other';
}

export function hasComment(annotation: AnnotationRecord): annotation is AnnotationRecord & { content: string } {
  return typeof annotation.content === 'string' && annotation.content.trim() !== '';
}

export function normalizeAnnotation(annotation: AnnotationRecord & { content: string }): NormalizedAnnotation {
  const colorHex = toHex(annotation.strokeColor);
  return {
    comment: annotation.content,
    author: annotation.title ?? '',
    modified: annotation.modDate ?? '',
    colorName: classifyColor(colorHex),
    colorHex,
  };
}

/**
 * Normalize a page's annotations, keeping their order.
 * Annotations without text (highlights, stamps, empty notes) are dropped.
 */
export function normalizeAnnotations(annotations: readonly AnnotationRecord[]): NormalizedAnnotation[] {
  return annotations.filter(hasComment).map(normalizeAnnotation);
}
