import fs from 'fs';
import path from 'path';
import { DEFAULT_VECTOR_INDEX_SETTINGS, type VectorIndexSettings } from '@/app/settings/types';
import { VECTOR_METADATA_FILENAME } from '@/core/constant';
import type { KnowledgeBasePO } from '@/core/po';
import type { EmbeddingProvider } from '@/core/providers/embedding/types';
import type { GraphStoreClient } from '@/core/storage/graph/types';
import { KeyedMutex } from '@/core/utils/lock-utils';
import { VectorIndex } from '@/core/vector/VectorIndex';
import type { EntityRelationExtractor } from '@/service/extraction/types';

/**
 * Builders for per-knowledge-base resources. A builder throws when the resource cannot be created
 * (missing credentials, unreachable service); the registry then records it as unavailable.
 */
export interface ResourceFactories {
	createEmbeddingProvider(model: string): EmbeddingProvider;
	createExtractor(knowledgeBaseId: string): EntityRelationExtractor;
	createGraphStore(knowledgeBaseId: string): GraphStoreClient;
}

export interface ResourceRegistryOptions {
	/**
	 * Saved indexes live in `<vectorStoreDir>/kb_<id>`. Empty disables loading and saving.
	 */
	vectorStoreDir?: string;
	vectorIndex?: VectorIndexSettings;
}

/**
 * Cached handle: undefined until the first attempt, null when creation failed.
 */
type Slot<T> = T | null | undefined;

interface ResourceEntry {
	vectorIndex: Slot<VectorIndex>;
	extractor: Slot<EntityRelationExtractor>;
	graphStore: Slot<GraphStoreClient>;
}

/**
 * Process-wide cache of the vector index, extractor and graph store of each knowledge base.
 * Each resource is created once, under a per-knowledge-base lock, on first use.
 */
export class KnowledgeBaseResourceRegistry {
	private readonly entries = new Map<string, ResourceEntry>();
	private readonly mutex = new KeyedMutex();
	private readonly vectorIndexSettings: VectorIndexSettings;

	constructor(
		private readonly factories: ResourceFactories,
		private readonly options: ResourceRegistryOptions = {},
	) {
		this.vectorIndexSettings = options.vectorIndex ?? DEFAULT_VECTOR_INDEX_SETTINGS;
	}

	/**
	 * Folder of the knowledge base's saved index, or null when indexes are not persisted.
	 */
	getVectorStorePath(knowledgeBaseId: string): string | null {
		return this.options.vectorStoreDir ? path.join(this.options.vectorStoreDir, `kb_${knowledgeBaseId}`) : null;
	}

	async getVectorIndex(kb: KnowledgeBasePO): Promise<VectorIndex | null> {
		return this.resolve(kb.id, 'vector index', {
			read: (entry) => entry.vectorIndex,
			write: (entry, value) => {
				entry.vectorIndex = value;
			},
			create: () => this.createVectorIndex(kb),
		});
	}

	async getExtractor(knowledgeBaseId: string): Promise<EntityRelationExtractor | null> {
		return this.resolve(knowledgeBaseId, 'extractor', {
			read: (entry) => entry.extractor,
			write: (entry, value) => {
				entry.extractor = value;
			},
			create: () => this.factories.createExtractor(knowledgeBaseId),
		});
	}

	async getGraphStore(knowledgeBaseId: string): Promise<GraphStoreClient | null> {
		return this.resolve(knowledgeBaseId, 'graph store', {
			read: (entry) => entry.graphStore,
			write: (entry, value) => {
				entry.graphStore = value;
			},
			create: () => this.factories.createGraphStore(knowledgeBaseId),
		});
	}

	/**
	 * Index already created for the knowledge base, without creating one.
	 */
	peekVectorIndex(knowledgeBaseId: string): VectorIndex | null {
		return this.entries.get(knowledgeBaseId)?.vectorIndex ?? null;
	}

	/**
	 * Drop every cached resource of the knowledge base.
	 */
	evict(knowledgeBaseId: string): void {
		this.entries.delete(knowledgeBaseId);
	}

	private async resolve<T>(
		knowledgeBaseId: string,
		label: string,
		slot: {
			read: (entry: ResourceEntry) => Slot<T>;
			write: (entry: ResourceEntry, value: T | null) => void;
			create: () => Promise<T> | T;
		},
	): Promise<T | null> {
		return this.mutex.runExclusive(knowledgeBaseId, async () => {
			const entry = this.entryFor(knowledgeBaseId);
			const cached = slot.read(entry);
			if (cached !== undefined) {
				return cached;
			}
			let created: T | null = null;
			try {
				created = await slot.create();
			} catch (error) {
				console.warn(`[KnowledgeBaseResourceRegistry] ${label} unavailable for knowledge base ${knowledgeBaseId}:`, error);
			}
			slot.write(entry, created);
			return created;
		});
	}

	private entryFor(knowledgeBaseId: string): ResourceEntry {
		let entry = this.entries.get(knowledgeBaseId);
		if (!entry) {
			entry = { vectorIndex: undefined, extractor: undefined, graphStore: undefined };
			this.entries.set(knowledgeBaseId, entry);
		}
		return entry;
	}

	private async createVectorIndex(kb: KnowledgeBasePO): Promise<VectorIndex> {
		const provider = this.factories.createEmbeddingProvider(kb.embeddingModel);
		const settings = this.vectorIndexSettings;
		const structureOptions = { nlist: settings.nlist, nprobe: settings.nprobe, hnswM: settings.hnswM };

		const savedPath = this.getVectorStorePath(kb.id);
		if (savedPath && fs.existsSync(path.join(savedPath, VECTOR_METADATA_FILENAME))) {
			return VectorIndex.load(savedPath, provider, structureOptions);
		}
		return new VectorIndex({
			provider,
			indexType: settings.indexType,
			metric: settings.metric,
			...structureOptions,
		});
	}
}
