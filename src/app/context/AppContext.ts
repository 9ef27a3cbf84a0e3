import { loadRagSettings } from '@/app/settings/RagSettingsLoader';
import type { RagSettings } from '@/app/settings/types';
import { BusinessError, ErrorCode } from '@/core/errors';
import { createEmbeddingProvider } from '@/core/providers/embedding/factory';
import { SqliteGraphStore } from '@/core/storage/graph/SqliteGraphStore';
import { SqliteStoreManager } from '@/core/storage/sqlite/SqliteStoreManager';
import { DocumentProcessingService } from '@/service/document/DocumentProcessingService';
import { KnowledgeBaseResourceRegistry } from '@/service/document/KnowledgeBaseResourceRegistry';
import { KnowledgeBaseService } from '@/service/document/KnowledgeBaseService';
import { LlmEntityRelationExtractor } from '@/service/extraction/LlmEntityRelationExtractor';
import { PromptService } from '@/service/prompt/PromptService';
import { GraphSearchEngine } from '@/service/search/GraphSearchEngine';
import { SearchService } from '@/service/search/SearchService';

/**
 * Application context containing all global dependencies.
 * Created once at startup; closing it drains background processing and closes the database.
 */
export class AppContext {
	private static instance: AppContext | null = null;

	public static getInstance(): AppContext {
		if (!AppContext.instance) {
			throw new BusinessError(ErrorCode.CONFIGURATION_MISSING, 'AppContext is not initialized');
		}
		return AppContext.instance;
	}

	/**
	 * Wire storage, per-knowledge-base resources and services from settings.
	 * Settings default to {@link loadRagSettings} (defaults, then environment).
	 */
	public static create(settings: RagSettings = loadRagSettings()): AppContext {
		if (AppContext.instance) {
			throw new BusinessError(ErrorCode.INVALID_STATE, 'AppContext is already initialized');
		}

		const store = SqliteStoreManager.open({ dbFilePath: settings.storage.dbFilePath });
		const prompts = new PromptService(settings.extractor.promptFolder || undefined);
		const registry = new KnowledgeBaseResourceRegistry(
			{
				createEmbeddingProvider: (model) => createEmbeddingProvider(settings.embedding, model),
				createExtractor: () => LlmEntityRelationExtractor.fromSettings(settings.extractor, prompts),
				createGraphStore: () => new SqliteGraphStore(store.getKysely()),
			},
			{
				vectorStoreDir: settings.storage.vectorStoreDir,
				vectorIndex: settings.vectorIndex,
			},
		);
		const processing = new DocumentProcessingService(store, registry, settings.processing);
		const knowledgeBases = new KnowledgeBaseService(store, registry, processing);
		const search = new SearchService(store, registry, new GraphSearchEngine(store.docChunkRepo, settings.graphScoring));

		const context = new AppContext(settings, store, registry, processing, knowledgeBases, search);
		AppContext.instance = context;
		console.info(`[AppContext] Ready (database: ${settings.storage.dbFilePath}, embeddings: ${settings.embedding.provider})`);
		return context;
	}

	private constructor(
		public readonly settings: RagSettings,
		public readonly store: SqliteStoreManager,
		public readonly resources: KnowledgeBaseResourceRegistry,
		public readonly processing: DocumentProcessingService,
		public readonly knowledgeBases: KnowledgeBaseService,
		public readonly search: SearchService,
	) {}

	/**
	 * Stop background processing and close the database.
	 *
	 * @param options.drain finish queued documents first (default true)
	 */
	async close(options: { drain?: boolean } = {}): Promise<void> {
		await this.processing.shutdown({ drain: options.drain ?? true });
		await this.store.close();
		if (AppContext.instance === this) {
			AppContext.instance = null;
		}
		console.info('[AppContext] Closed');
	}
}
