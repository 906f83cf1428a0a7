export * from './textNormalizer';
export * from './htmlExtractor';
export * from './jobParser';
export * from './resumeParser';
