import type { ChunkStrategy } from '@/core/po/document.po';

/**
 * Knowledge base PO (Persistent Object).
 * A named container of documents that shares default processing configuration
 * and owns one vector index plus optional extractor / graph store.
 */
export interface KnowledgeBasePO {
	id: string;
	/**
	 * Unique display name.
	 */
	name: string;
	description: string | null;
	chunkStrategy: ChunkStrategy;
	chunkSize: number;
	chunkOverlap: number;
	enableVectorStore: boolean;
	enableKnowledgeGraph: boolean;
	enableNer: boolean;
	embeddingModel: string;
	/**
	 * Running aggregates. Adjusted on create/delete, never recomputed in the hot path.
	 */
	documentCount: number;
	totalChunks: number;
	createdAt: number;
	updatedAt: number;
}

/**
 * Fields a caller may set when creating a knowledge base.
 */
export type KnowledgeBaseCreateInput = Pick<KnowledgeBasePO, 'name'> &
	Partial<Pick<KnowledgeBasePO,
		| 'description'
		| 'chunkStrategy'
		| 'chunkSize'
		| 'chunkOverlap'
		| 'enableVectorStore'
		| 'enableKnowledgeGraph'
		| 'enableNer'
		| 'embeddingModel'
	>>;

export const DEFAULT_KNOWLEDGE_BASE_CONFIG = {
	chunkStrategy: 'semantic',
	chunkSize: 500,
	chunkOverlap: 100,
	enableVectorStore: true,
	enableKnowledgeGraph: false,
	enableNer: false,
	embeddingModel: 'nomic-embed-text',
} as const satisfies Partial<KnowledgeBasePO>;
