import fs from 'fs';
import {
	DEFAULT_EMBEDDING_SETTINGS,
	DEFAULT_EXTRACTOR_SETTINGS,
	DEFAULT_GRAPH_SCORING_SETTINGS,
	DEFAULT_PROCESSING_SETTINGS,
	DEFAULT_STORAGE_SETTINGS,
	DEFAULT_VECTOR_INDEX_SETTINGS,
	type EmbeddingSettings,
	type ExtractorSettings,
	type GraphScoringSettings,
	type ProcessingSettings,
	type RagSettings,
	type StorageSettings,
	type VectorIndexSettings,
} from '@/app/settings/types';
import type { EmbeddingProviderType } from '@/core/providers/embedding/types';
import { assertSupportedCombination } from '@/core/vector/structures';
import { DISTANCE_METRICS, INDEX_TYPES, type DistanceMetric, type IndexType } from '@/core/vector/types';
import type { ChunkLanguage } from '@/core/chunking/TextChunker';
import { ConfigurationError, getErrorMessage } from '@/core/errors';

const EMBEDDING_PROVIDERS: readonly EmbeddingProviderType[] = ['ollama', 'ollama-ai-sdk', 'openai', 'hash'];
const LANGUAGES: readonly ChunkLanguage[] = ['zh', 'en'];

/**
 * Get string value from source or return default.
 */
function getString(source: unknown, defaultValue: string): string {
	return typeof source === 'string' ? source : defaultValue;
}

/**
 * Get finite number from source or return default. Numeric strings are accepted.
 */
function getNumber(source: unknown, defaultValue: number): number {
	if (typeof source === 'number' && Number.isFinite(source)) {
		return source;
	}
	if (typeof source === 'string' && source.trim() !== '') {
		const parsed = Number(source);
		return Number.isFinite(parsed) ? parsed : defaultValue;
	}
	return defaultValue;
}

/**
 * Get positive integer from source or return default.
 */
function getPositiveInt(source: unknown, defaultValue: number): number {
	const value = getNumber(source, defaultValue);
	return Number.isInteger(value) && value > 0 ? value : defaultValue;
}

/**
 * Get one of the allowed literals from source or return default.
 */
function getEnum<T extends string>(source: unknown, allowed: readonly T[], defaultValue: T): T {
	const match = allowed.find((value) => value === source);
	return match ?? defaultValue;
}

/**
 * Get object value from source, or an empty record.
 */
function getRecord(source: unknown): Record<string, unknown> {
	if (!source || typeof source !== 'object' || Array.isArray(source)) {
		return {};
	}
	return Object.fromEntries(Object.entries(source));
}

function normalizeStorageSettings(raw: Record<string, unknown>): StorageSettings {
	const defaults = DEFAULT_STORAGE_SETTINGS;
	return {
		dbFilePath: getString(raw.dbFilePath, defaults.dbFilePath),
		vectorStoreDir: getString(raw.vectorStoreDir, defaults.vectorStoreDir),
	};
}

function normalizeEmbeddingSettings(raw: Record<string, unknown>): EmbeddingSettings {
	const defaults = DEFAULT_EMBEDDING_SETTINGS;
	return {
		provider: getEnum(raw.provider, EMBEDDING_PROVIDERS, defaults.provider),
		baseUrl: getString(raw.baseUrl, defaults.baseUrl),
		model: getString(raw.model, defaults.model) || defaults.model,
		apiKey: getString(raw.apiKey, defaults.apiKey),
		timeoutMs: getPositiveInt(raw.timeoutMs, defaults.timeoutMs),
	};
}

function normalizeExtractorSettings(raw: Record<string, unknown>): ExtractorSettings {
	const defaults = DEFAULT_EXTRACTOR_SETTINGS;
	return {
		apiKey: getString(raw.apiKey, defaults.apiKey),
		baseUrl: getString(raw.baseUrl, defaults.baseUrl),
		model: getString(raw.model, defaults.model) || defaults.model,
		temperature: getNumber(raw.temperature, defaults.temperature),
		maxRetries: getPositiveInt(raw.maxRetries, defaults.maxRetries),
		promptFolder: getString(raw.promptFolder, defaults.promptFolder),
	};
}

function normalizeProcessingSettings(raw: Record<string, unknown>): ProcessingSettings {
	const defaults = DEFAULT_PROCESSING_SETTINGS;
	return {
		maxWorkers: getPositiveInt(raw.maxWorkers, defaults.maxWorkers),
		graphBatchSize: getPositiveInt(raw.graphBatchSize, defaults.graphBatchSize),
		language: getEnum(raw.language, LANGUAGES, defaults.language),
	};
}

function normalizeVectorIndexSettings(raw: Record<string, unknown>): VectorIndexSettings {
	const defaults = DEFAULT_VECTOR_INDEX_SETTINGS;
	const indexType: IndexType = getEnum(raw.indexType, INDEX_TYPES, defaults.indexType);
	const metric: DistanceMetric = getEnum(raw.metric, DISTANCE_METRICS, defaults.metric);
	assertSupportedCombination(indexType, metric);
	return {
		indexType,
		metric,
		nlist: getPositiveInt(raw.nlist, defaults.nlist),
		nprobe: getPositiveInt(raw.nprobe, defaults.nprobe),
		hnswM: getPositiveInt(raw.hnswM, defaults.hnswM),
	};
}

function normalizeGraphScoringSettings(raw: Record<string, unknown>): GraphScoringSettings {
	const defaults = DEFAULT_GRAPH_SCORING_SETTINGS;
	return {
		exactMatchScore: getNumber(raw.exactMatchScore, defaults.exactMatchScore),
		partialMatchScore: getNumber(raw.partialMatchScore, defaults.partialMatchScore),
		relationWeight: getNumber(raw.relationWeight, defaults.relationWeight),
		relationCap: getNumber(raw.relationCap, defaults.relationCap),
		chunkWeight: getNumber(raw.chunkWeight, defaults.chunkWeight),
		chunkCap: getNumber(raw.chunkCap, defaults.chunkCap),
		maxScore: getNumber(raw.maxScore, defaults.maxScore),
		maxRelations: getPositiveInt(raw.maxRelations, defaults.maxRelations),
		maxRelatedEntities: getPositiveInt(raw.maxRelatedEntities, defaults.maxRelatedEntities),
	};
}

/**
 * Normalize settings from raw data (parsed JSON, partial objects).
 * Missing or invalid fields fall back to defaults; an unsupported index type and metric pair throws ConfigurationError.
 */
export function normalizeRagSettings(raw: unknown): RagSettings {
	const data = getRecord(raw);
	return {
		storage: normalizeStorageSettings(getRecord(data.storage)),
		embedding: normalizeEmbeddingSettings(getRecord(data.embedding)),
		extractor: normalizeExtractorSettings(getRecord(data.extractor)),
		processing: normalizeProcessingSettings(getRecord(data.processing)),
		vectorIndex: normalizeVectorIndexSettings(getRecord(data.vectorIndex)),
		graphScoring: normalizeGraphScoringSettings(getRecord(data.graphScoring)),
	};
}

/**
 * Environment variables mapped onto the raw settings shape. Unset variables are left out.
 */
function envOverrides(env: NodeJS.ProcessEnv): Record<string, Record<string, unknown>> {
	const pick = (mapping: Record<string, string>) =>
		Object.fromEntries(
			Object.entries(mapping)
				.filter(([, name]) => env[name] !== undefined && env[name] !== '')
				.map(([key, name]) => [key, env[name]]),
		);

	return {
		storage: pick({ dbFilePath: 'RAG_DB_PATH', vectorStoreDir: 'RAG_VECTOR_STORE_DIR' }),
		embedding: pick({
			provider: 'EMBEDDING_PROVIDER',
			baseUrl: 'OLLAMA_BASE_URL',
			model: 'EMBEDDING_MODEL',
			apiKey: 'EMBEDDING_API_KEY',
			timeoutMs: 'EMBEDDING_TIMEOUT_MS',
		}),
		extractor: pick({
			apiKey: 'OPENAI_API_KEY',
			baseUrl: 'OPENAI_BASE_URL',
			model: 'OPENAI_MODEL',
			promptFolder: 'RAG_PROMPT_DIR',
		}),
		processing: pick({ maxWorkers: 'RAG_MAX_WORKERS', graphBatchSize: 'GRAPH_BATCH_SIZE', language: 'RAG_LANGUAGE' }),
	};
}

/**
 * Load settings: defaults, then the optional JSON file, then environment variables.
 */
export function loadRagSettings(params: { filePath?: string; env?: NodeJS.ProcessEnv } = {}): RagSettings {
	let fromFile: Record<string, unknown> = {};
	if (params.filePath && fs.existsSync(params.filePath)) {
		try {
			fromFile = getRecord(JSON.parse(fs.readFileSync(params.filePath, 'utf8')));
		} catch (error) {
			throw new ConfigurationError(`Failed to read settings file ${params.filePath}: ${getErrorMessage(error)}`);
		}
	}

	const overrides = envOverrides(params.env ?? process.env);
	const merged: Record<string, unknown> = { ...fromFile };
	for (const [section, values] of Object.entries(overrides)) {
		merged[section] = { ...getRecord(fromFile[section]), ...values };
	}
	return normalizeRagSettings(merged);
}
