export * from './embedder';
export * from './embeddingStore';
