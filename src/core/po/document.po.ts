/**
 * Chunking strategy names.
 */
export type ChunkStrategy = 'fixed' | 'recursive' | 'semantic' | 'paragraph';

export const CHUNK_STRATEGIES: readonly ChunkStrategy[] = ['fixed', 'recursive', 'semantic', 'paragraph'];

export function isChunkStrategy(value: unknown): value is ChunkStrategy {
	return typeof value === 'string' && (CHUNK_STRATEGIES as readonly string[]).includes(value);
}

/**
 * Document processing status.
 *
 * pending -> processing -> completed | failed. Only an explicit reprocess moves
 * completed | failed back to pending.
 */
export type DocumentStatus = 'pending' | 'processing' | 'completed' | 'failed';

/**
 * Document PO (Persistent Object).
 */
export interface DocumentPO {
	id: string;
	knowledgeBaseId: string;
	title: string;
	content: string;
	source: string | null;
	filePath: string | null;
	fileType: string | null;
	author: string | null;
	category: string | null;
	tags: string[];
	/**
	 * Per-document overrides. Null means inherit from the knowledge base.
	 */
	chunkStrategy: ChunkStrategy | null;
	chunkSize: number | null;
	chunkOverlap: number | null;
	status: DocumentStatus;
	errorMessage: string | null;
	charCount: number;
	wordCount: number;
	chunkCount: number;
	entityCount: number;
	relationCount: number;
	vectorStored: boolean;
	graphStored: boolean;
	processingTimeMs: number | null;
	processedAt: number | null;
	createdAt: number;
	updatedAt: number;
}

/**
 * Fields a caller may set when creating a document.
 */
export type DocumentCreateInput = Pick<DocumentPO, 'title' | 'content'> &
	Partial<Pick<DocumentPO,
		| 'source'
		| 'filePath'
		| 'fileType'
		| 'author'
		| 'category'
		| 'tags'
		| 'chunkStrategy'
		| 'chunkSize'
		| 'chunkOverlap'
	>>;
