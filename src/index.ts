export { AppContext } from '@/app/context/AppContext';
export { loadRagSettings, normalizeRagSettings } from '@/app/settings/RagSettingsLoader';
export * from '@/app/settings/types';

export { TextChunker, assertChunkSizes, type ChunkLanguage, type PositionedChunk, type TextChunkerOptions } from '@/core/chunking/TextChunker';
export * from '@/core/errors';
export type * from '@/core/po';
export { CHUNK_STRATEGIES, DEFAULT_KNOWLEDGE_BASE_CONFIG, isChunkStrategy } from '@/core/po';
export { createEmbeddingProvider } from '@/core/providers/embedding/factory';
export { HashEmbeddingProvider } from '@/core/providers/embedding/HashEmbeddingProvider';
export type { EmbeddingProvider, EmbeddingProviderType } from '@/core/providers/embedding/types';
export { SqliteGraphStore } from '@/core/storage/graph/SqliteGraphStore';
export type { GraphStoreClient, TripleInsertResult } from '@/core/storage/graph/types';
export { SqliteStoreManager } from '@/core/storage/sqlite/SqliteStoreManager';
export { VectorIndex, type VectorIndexOptions } from '@/core/vector/VectorIndex';
export type * from '@/core/vector/types';

export { DocumentProcessingService } from '@/service/document/DocumentProcessingService';
export type { DocumentProcessedEvent, ProcessingStatus } from '@/service/document/DocumentProcessingService';
export { KnowledgeBaseResourceRegistry, type ResourceFactories } from '@/service/document/KnowledgeBaseResourceRegistry';
export { KnowledgeBaseService, type DocumentStatusReport } from '@/service/document/KnowledgeBaseService';
export { ENTITY_TYPES, normalizeEntityType, type EntityType } from '@/service/extraction/entity-types';
export { LlmEntityRelationExtractor } from '@/service/extraction/LlmEntityRelationExtractor';
export type { EntityRelationExtractor, ExtractionResult } from '@/service/extraction/types';
export { GraphSearchEngine } from '@/service/search/GraphSearchEngine';
export { SearchService } from '@/service/search/SearchService';
export type * from '@/service/search/types';
