import type { ChunkPO, DocumentPO, DocumentStatus, KnowledgeBasePO } from '@/core/po';

/**
 * Mutable knowledge-base settings. Aggregates change only through `adjustAggregates`.
 */
export type KnowledgeBasePatch = Partial<Pick<KnowledgeBasePO,
	| 'name'
	| 'description'
	| 'chunkStrategy'
	| 'chunkSize'
	| 'chunkOverlap'
	| 'enableVectorStore'
	| 'enableKnowledgeGraph'
	| 'enableNer'
	| 'embeddingModel'
>>;

/**
 * Fields written by the processing pipeline and by reprocess.
 */
export type DocumentPatch = Partial<Pick<DocumentPO,
	| 'status'
	| 'errorMessage'
	| 'charCount'
	| 'wordCount'
	| 'chunkCount'
	| 'entityCount'
	| 'relationCount'
	| 'vectorStored'
	| 'graphStored'
	| 'processingTimeMs'
	| 'processedAt'
>>;

export interface DocumentListQuery {
	status?: DocumentStatus;
	offset?: number;
	limit?: number;
}

export interface ChunkEmbeddingUpdate {
	id: string;
	vectorId: string;
	embeddingModel: string;
}

export type ChunkAnnotations = Pick<ChunkPO, 'entities' | 'relations'> & Partial<Pick<ChunkPO, 'keywords'>>;
