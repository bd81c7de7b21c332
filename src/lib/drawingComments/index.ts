/**
 * Drawing Comments Library
 * Central export for drawing-number selection and comment extraction
 */

export * from './types';
export * from './regionTextSelector';
export * from './colorFormatter';
export * from './annotationNormalizer';
export * from './extractor';
export * from './labels';
