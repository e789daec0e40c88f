export * from './errors';
export type { IndexConfig, IndexStats, IntentRecord, MatchResult, RecordKind, SearchHit } from './types';
export { distanceToScore, normalize, squaredL2, vectorNorm } from './scoring';
export { DEFAULT_BATCH_SIZE, encodeInBatches } from './embedding/embedder';
export type { Embedder } from './embedding/embedder';
export { HashingEmbedder } from './embedding/hashing-embedder';
export { RemoteEmbedder } from './embedding/remote-embedder';
export { createDefaultRegistry, EmbedderRegistry } from './embedding/registry';
export type { EmbedderFactory } from './embedding/registry';
export * from './vector';
export { MetadataStore } from './metadata-store';
export { intentRecordSchema, parseRecord } from './record-schema';
export { buildSemanticIndex, SemanticIndex } from './semantic-index';
export * from './persistence';
export { IndexHandle } from './index-handle';
export { DEFAULT_FALLBACK_RESPONSE, DEFAULT_INTENT_THRESHOLD, IntentMatcher } from './intent-matcher';
export type { IntentMatcherOptions } from './intent-matcher';
export { assembleContext, DEFAULT_CONTEXT_THRESHOLD, NO_CONTEXT_FOUND } from './context-assembler';
export { flattenIntents, loadIntentsFile } from './intents-loader';
