import type { ChunkStrategy } from '@/core/po/document.po';

/**
 * Relation annotation stored on a chunk.
 */
export interface ChunkRelation {
	subject: string;
	subjectType: string;
	predicate: string;
	object: string;
	objectType: string;
	confidence: number;
	chunkIds: string[];
	contexts: string[];
}

/**
 * Chunk PO (Persistent Object). A contiguous span of a document's text.
 */
export interface ChunkPO {
	id: string;
	documentId: string;
	knowledgeBaseId: string;
	/**
	 * 0-based, contiguous within a document.
	 */
	chunkIndex: number;
	content: string;
	chunkType: ChunkStrategy;
	startPos: number;
	endPos: number;
	charCount: number;
	wordCount: number;
	/**
	 * External id in the knowledge base's vector index. Null when hasEmbedding is false.
	 */
	vectorId: string | null;
	embeddingModel: string | null;
	hasEmbedding: boolean;
	entities: string[];
	relations: ChunkRelation[];
	keywords: string[];
	createdAt: number;
	updatedAt: number;
}
