import type { ChunkPO, ChunkRelation } from '@/core/po';

/**
 * Read access to chunks, the only store dependency of graph search.
 */
export interface ChunkReader {
	listByKnowledgeBase(knowledgeBaseId: string): Promise<ChunkPO[]>;
}

/**
 * A relation that matched, with the chunk it was found in.
 */
export type GraphRelationMatch = Omit<ChunkRelation, 'chunkIds' | 'contexts'> & { chunkId: string };

export interface GraphChunkRef {
	chunkId: string;
	documentId: string;
	chunkIndex: number;
	content: string;
}

export interface RelatedEntity {
	name: string;
	type: string;
	relation: string;
}

export interface GraphSearchResult {
	entityName: string;
	entityType: string;
	score: number;
	chunkIds: string[];
	chunks: GraphChunkRef[];
	relations: GraphRelationMatch[];
	relatedEntities: RelatedEntity[];
}

export type SearchType = 'vector' | 'graph' | 'hybrid';

export interface SearchRequest {
	knowledgeBaseId: string;
	query: string;
	searchType?: SearchType;
	topK?: number;
}

/**
 * Graph match a chunk result was reached through (graph-only search).
 */
export interface GraphContext {
	matchedEntity: string;
	entityType: string;
	relatedCount: number;
}

export interface ChunkSearchResult {
	chunkId: string;
	documentId: string;
	documentTitle: string;
	content: string;
	score: number;
	chunkIndex: number;
	entities: string[] | null;
	relations: ChunkRelation[] | null;
	graphContext: GraphContext | null;
}

export interface SearchResponse {
	query: string;
	searchType: SearchType;
	results: ChunkSearchResult[];
	total: number;
	graphResults: GraphSearchResult[] | null;
	processingTimeMs: number;
}
