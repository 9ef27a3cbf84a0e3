import type { ChunkLanguage } from '@/core/chunking/TextChunker';
import type { EmbeddingProviderType } from '@/core/providers/embedding/types';
import type { DistanceMetric, IndexType } from '@/core/vector/types';

/**
 * Where data lives.
 */
export interface StorageSettings {
	/**
	 * SQLite database file. Use ':memory:' for an in-process database.
	 * Default: './data/rag.sqlite'
	 */
	dbFilePath: string;
	/**
	 * Folder for saved vector indexes (one sub-folder per knowledge base).
	 * Empty keeps indexes in memory only.
	 */
	vectorStoreDir: string;
}

export const DEFAULT_STORAGE_SETTINGS: StorageSettings = {
	dbFilePath: './data/rag.sqlite',
	vectorStoreDir: './data/vector_stores',
};

/**
 * Embedding service configuration.
 */
export interface EmbeddingSettings {
	provider: EmbeddingProviderType;
	/**
	 * Service root. For Ollama this is the server root without `/api`.
	 */
	baseUrl: string;
	/**
	 * Fallback model when a knowledge base does not name one.
	 */
	model: string;
	/**
	 * Needed by the openai provider only.
	 */
	apiKey: string;
	timeoutMs: number;
}

export const DEFAULT_EMBEDDING_SETTINGS: EmbeddingSettings = {
	provider: 'ollama',
	baseUrl: 'http://localhost:11434',
	model: 'nomic-embed-text',
	apiKey: '',
	timeoutMs: 30000,
};

/**
 * Entity/relation extraction model. Extraction is unavailable without an API key.
 */
export interface ExtractorSettings {
	apiKey: string;
	/**
	 * OpenAI-compatible endpoint. Empty uses the provider default.
	 */
	baseUrl: string;
	model: string;
	temperature: number;
	maxRetries: number;
	/**
	 * Folder of `<prompt-id>.prompt.md` files overriding the built-in prompts. Empty uses the built-ins.
	 */
	promptFolder: string;
}

export const DEFAULT_EXTRACTOR_SETTINGS: ExtractorSettings = {
	apiKey: '',
	baseUrl: '',
	model: 'gpt-4',
	temperature: 0.3,
	maxRetries: 3,
	promptFolder: '',
};

/**
 * Background document processing.
 */
export interface ProcessingSettings {
	/**
	 * Documents processed concurrently.
	 */
	maxWorkers: number;
	/**
	 * Triples per graph store batch.
	 */
	graphBatchSize: number;
	/**
	 * Sentence rules used by the chunker.
	 */
	language: ChunkLanguage;
}

export const DEFAULT_PROCESSING_SETTINGS: ProcessingSettings = {
	maxWorkers: 4,
	graphBatchSize: 100,
	language: 'zh',
};

/**
 * Vector index created for each knowledge base.
 */
export interface VectorIndexSettings {
	indexType: IndexType;
	metric: DistanceMetric;
	nlist: number;
	nprobe: number;
	hnswM: number;
}

export const DEFAULT_VECTOR_INDEX_SETTINGS: VectorIndexSettings = {
	indexType: 'Flat',
	metric: 'Cosine',
	nlist: 100,
	nprobe: 10,
	hnswM: 32,
};

/**
 * Graph search relevance knobs. Empirical; expect to rebalance.
 */
export interface GraphScoringSettings {
	exactMatchScore: number;
	partialMatchScore: number;
	relationWeight: number;
	relationCap: number;
	chunkWeight: number;
	chunkCap: number;
	maxScore: number;
	maxRelations: number;
	maxRelatedEntities: number;
}

export const DEFAULT_GRAPH_SCORING_SETTINGS: GraphScoringSettings = {
	exactMatchScore: 1.0,
	partialMatchScore: 0.7,
	relationWeight: 0.1,
	relationCap: 0.5,
	chunkWeight: 0.05,
	chunkCap: 0.3,
	maxScore: 1.0,
	maxRelations: 10,
	maxRelatedEntities: 5,
};

export interface RagSettings {
	storage: StorageSettings;
	embedding: EmbeddingSettings;
	extractor: ExtractorSettings;
	processing: ProcessingSettings;
	vectorIndex: VectorIndexSettings;
	graphScoring: GraphScoringSettings;
}

export const DEFAULT_RAG_SETTINGS: RagSettings = {
	storage: DEFAULT_STORAGE_SETTINGS,
	embedding: DEFAULT_EMBEDDING_SETTINGS,
	extractor: DEFAULT_EXTRACTOR_SETTINGS,
	processing: DEFAULT_PROCESSING_SETTINGS,
	vectorIndex: DEFAULT_VECTOR_INDEX_SETTINGS,
	graphScoring: DEFAULT_GRAPH_SCORING_SETTINGS,
};
