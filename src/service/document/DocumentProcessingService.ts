import { DEFAULT_PROCESSING_SETTINGS, type ProcessingSettings } from '@/app/settings/types';
import { TextChunker } from '@/core/chunking/TextChunker';
import { CHUNK_VECTOR_ID_PREFIX, DEFAULT_ENTITY_TYPE, DEFAULT_PREDICATE } from '@/core/constant';
import { NotFoundError, ProcessingFailure, getErrorMessage } from '@/core/errors';
import type { ChunkPO, ChunkRelation, DocumentPO, DocumentStatus, KnowledgeBasePO, Triple } from '@/core/po';
import type { SqliteStoreManager } from '@/core/storage/sqlite/SqliteStoreManager';
import { countWords } from '@/core/utils/format-utils';
import { generateUuidWithoutHyphens } from '@/core/utils/id-utils';
import { Stopwatch } from '@/core/utils/Stopwatch';
import type { KnowledgeBaseResourceRegistry } from './KnowledgeBaseResourceRegistry';

interface ProcessingJob {
	documentId: string;
	knowledgeBaseId: string;
}

export interface DocumentProcessedEvent {
	documentId: string;
	knowledgeBaseId: string;
	/**
	 * Null when the run was aborted before the document was touched (document or knowledge base missing).
	 */
	status: DocumentStatus | null;
}

export type DocumentProcessedListener = (event: DocumentProcessedEvent) => void;

export interface ProcessingStatus {
	queued: number;
	running: number;
	/**
	 * Document ids queued or running.
	 */
	outstanding: string[];
}

interface ExtractionOutcome {
	entityCount: number;
	relations: ChunkRelation[];
}

/**
 * Background document pipeline: chunk, vectorize, extract, store graph.
 *
 * Submissions go to a FIFO queue drained by at most `maxWorkers` concurrent runs.
 * A document id stays outstanding from submit until its run ends; submitting it again
 * meanwhile is a no-op. Only an empty chunking result (or an unexpected error) fails a
 * document; vector, extraction and graph steps log their failures and the run completes.
 */
export class DocumentProcessingService {
	private readonly queue: ProcessingJob[] = [];
	private readonly outstanding = new Set<string>();
	private readonly running = new Set<string>();
	private readonly listeners = new Set<DocumentProcessedListener>();
	private idleWaiters: Array<() => void> = [];
	private accepting = true;
	private readonly settings: ProcessingSettings;

	constructor(
		private readonly store: SqliteStoreManager,
		private readonly registry: KnowledgeBaseResourceRegistry,
		settings: Partial<ProcessingSettings> = {},
	) {
		this.settings = { ...DEFAULT_PROCESSING_SETTINGS, ...settings };
	}

	/**
	 * Queue a run for the document.
	 *
	 * @returns false when the document is already outstanding or the service is shut down
	 */
	submit(documentId: string, knowledgeBaseId: string): boolean {
		if (!this.accepting) {
			console.warn(`[DocumentProcessingService] Shut down, ignoring document ${documentId}`);
			return false;
		}
		if (this.outstanding.has(documentId)) {
			console.info(`[DocumentProcessingService] Document ${documentId} is already queued`);
			return false;
		}
		this.outstanding.add(documentId);
		this.queue.push({ documentId, knowledgeBaseId });
		console.info(`[DocumentProcessingService] Document ${documentId} queued (${this.queue.length} waiting)`);
		this.pump();
		return true;
	}

	isProcessing(documentId: string): boolean {
		return this.outstanding.has(documentId);
	}

	getProcessingStatus(): ProcessingStatus {
		return {
			queued: this.queue.length,
			running: this.running.size,
			outstanding: [...this.outstanding],
		};
	}

	/**
	 * Called after every run, whatever its outcome.
	 *
	 * @returns unsubscribe function
	 */
	onDocumentProcessed(listener: DocumentProcessedListener): () => void {
		this.listeners.add(listener);
		return () => {
			this.listeners.delete(listener);
		};
	}

	/**
	 * Resolves once nothing is queued or running.
	 */
	whenIdle(): Promise<void> {
		if (this.isIdle()) {
			return Promise.resolve();
		}
		return new Promise((resolve) => {
			this.idleWaiters.push(resolve);
		});
	}

	/**
	 * Stop accepting submissions. With `drain` queued runs still execute; without it they are
	 * dropped and only running ones are awaited.
	 */
	async shutdown(options: { drain?: boolean } = {}): Promise<void> {
		this.accepting = false;
		if (!options.drain) {
			const dropped = this.queue.splice(0);
			for (const job of dropped) {
				this.outstanding.delete(job.documentId);
			}
			if (dropped.length) {
				console.warn(`[DocumentProcessingService] Dropped ${dropped.length} queued document(s) on shutdown`);
			}
		}
		await this.whenIdle();
	}

	private pump(): void {
		while (this.running.size < this.settings.maxWorkers) {
			const job = this.queue.shift();
			if (!job) break;
			this.running.add(job.documentId);
			void this.runJob(job);
		}
		if (this.isIdle()) {
			const waiters = this.idleWaiters;
			this.idleWaiters = [];
			waiters.forEach((resolve) => resolve());
		}
	}

	private isIdle(): boolean {
		return this.queue.length === 0 && this.running.size === 0;
	}

	private async runJob(job: ProcessingJob): Promise<void> {
		let status: DocumentStatus | null = null;
		try {
			status = await this.processDocument(job);
		} catch (error) {
			console.error(`[DocumentProcessingService] Run for document ${job.documentId} crashed:`, error);
		} finally {
			this.running.delete(job.documentId);
			this.outstanding.delete(job.documentId);
			this.notify({ ...job, status });
			this.pump();
		}
	}

	private notify(event: DocumentProcessedEvent): void {
		for (const listener of this.listeners) {
			try {
				listener(event);
			} catch (error) {
				console.error('[DocumentProcessingService] Listener failed:', error);
			}
		}
	}

	private async processDocument(job: ProcessingJob): Promise<DocumentStatus | null> {
		const { documentRepo, knowledgeBaseRepo } = this.store;
		const doc = await documentRepo.getById(job.documentId);
		const kb = await knowledgeBaseRepo.getById(job.knowledgeBaseId);
		if (!doc || !kb) {
			const missing = doc ? new NotFoundError('KnowledgeBase', job.knowledgeBaseId) : new NotFoundError('Document', job.documentId);
			console.error(`[DocumentProcessingService] ${missing.message}`);
			return null;
		}

		const sw = new Stopwatch(`DocumentProcessingService(${doc.id})`);
		console.info(`[DocumentProcessingService] Processing document ${doc.id} "${doc.title}"`);
		await documentRepo.update(doc.id, { status: 'processing', errorMessage: null });

		try {
			const chunks = await sw.time('chunk', () => this.chunkDocument(doc, kb));

			const vectorStored = kb.enableVectorStore
				? await sw.time('vectorize', () => this.vectorizeChunks(kb, chunks))
				: false;

			const extraction = kb.enableNer
				? await sw.time('extract', () => this.extractAnnotations(kb, chunks))
				: null;

			const graphStored = kb.enableKnowledgeGraph && extraction
				? await sw.time('graph', () => this.storeGraph(kb, extraction.relations))
				: false;

			await knowledgeBaseRepo.adjustAggregates(kb.id, { documents: 1, chunks: chunks.length });
			await documentRepo.update(doc.id, {
				status: 'completed',
				errorMessage: null,
				charCount: doc.content.length,
				wordCount: countWords(doc.content),
				chunkCount: chunks.length,
				entityCount: extraction?.entityCount ?? 0,
				relationCount: extraction?.relations.length ?? 0,
				vectorStored,
				graphStored,
				processingTimeMs: Math.round(sw.elapsedMs()),
				processedAt: Date.now(),
			});
			console.info(
				`[DocumentProcessingService] Document ${doc.id} completed: ${chunks.length} chunks, vectors=${vectorStored}, graph=${graphStored}`,
			);
			console.debug(sw.toString());
			return 'completed';
		} catch (error) {
			console.error(`[DocumentProcessingService] Document ${doc.id} failed:`, error);
			await documentRepo.update(doc.id, {
				status: 'failed',
				errorMessage: getErrorMessage(error),
				processingTimeMs: Math.round(sw.elapsedMs()),
			});
			return 'failed';
		}
	}

	/**
	 * Split the document with its effective configuration and persist the chunks in index order.
	 */
	private async chunkDocument(doc: DocumentPO, kb: KnowledgeBasePO): Promise<ChunkPO[]> {
		const strategy = doc.chunkStrategy ?? kb.chunkStrategy;
		const chunker = new TextChunker({
			chunkSize: doc.chunkSize ?? kb.chunkSize,
			chunkOverlap: doc.chunkOverlap ?? kb.chunkOverlap,
			language: this.settings.language,
		});
		const pieces = chunker.chunkWithPositions(doc.content, strategy);
		if (!pieces.length) {
			throw new ProcessingFailure(`Chunking produced no chunks for document ${doc.id}`);
		}

		const now = Date.now();
		const chunks: ChunkPO[] = pieces.map((piece) => ({
			id: generateUuidWithoutHyphens(),
			documentId: doc.id,
			knowledgeBaseId: kb.id,
			chunkIndex: piece.chunkIndex,
			content: piece.content,
			chunkType: strategy,
			startPos: piece.startPos,
			endPos: piece.endPos,
			charCount: piece.charCount,
			wordCount: countWords(piece.content),
			vectorId: null,
			embeddingModel: null,
			hasEmbedding: false,
			entities: [],
			relations: [],
			keywords: [],
			createdAt: now,
			updatedAt: now,
		}));
		await this.store.docChunkRepo.insertMany(chunks);
		return chunks;
	}

	/**
	 * @returns whether the chunks made it into the vector index
	 */
	private async vectorizeChunks(kb: KnowledgeBasePO, chunks: ChunkPO[]): Promise<boolean> {
		const index = await this.registry.getVectorIndex(kb);
		if (!index) {
			return false;
		}

		let vectorIds: string[];
		try {
			vectorIds = await index.addTexts(
				chunks.map((chunk) => chunk.content),
				chunks.map((chunk) => ({
					chunk_id: chunk.id,
					document_id: chunk.documentId,
					chunk_index: chunk.chunkIndex,
				})),
				chunks.map((chunk) => `${CHUNK_VECTOR_ID_PREFIX}${chunk.id}`),
			);
		} catch (error) {
			console.warn(`[DocumentProcessingService] Vectorization failed for knowledge base ${kb.id}, continuing without vectors:`, error);
			return false;
		}

		try {
			await this.store.docChunkRepo.updateEmbedding(
				chunks.map((chunk, i) => ({ id: chunk.id, vectorId: vectorIds[i], embeddingModel: index.embeddingModel })),
			);
		} catch (error) {
			// Chunks that do not reference their vectors could never remove them again.
			console.warn(`[DocumentProcessingService] Recording vector ids failed for knowledge base ${kb.id}, removing the vectors:`, error);
			await index.deleteByIds(vectorIds);
			return false;
		}

		const savePath = this.registry.getVectorStorePath(kb.id);
		if (savePath) {
			try {
				await index.save(savePath);
			} catch (error) {
				console.warn(`[DocumentProcessingService] Saving vector index to ${savePath} failed:`, error);
			}
		}
		return true;
	}

	/**
	 * Annotate each chunk independently. A failing chunk keeps empty annotations.
	 *
	 * @returns null when no extractor is available for the knowledge base
	 */
	private async extractAnnotations(kb: KnowledgeBasePO, chunks: ChunkPO[]): Promise<ExtractionOutcome | null> {
		const extractor = await this.registry.getExtractor(kb.id);
		if (!extractor) {
			return null;
		}

		const entityNames = new Set<string>();
		const relations: ChunkRelation[] = [];
		for (const chunk of chunks) {
			try {
				const result = await extractor.processText(chunk.content, chunk.id);
				const names = result.entities.map((entity) => entity.name);
				const chunkRelations: ChunkRelation[] = result.relations.map((rel) => ({
					subject: rel.subject,
					subjectType: rel.subjectType,
					predicate: rel.predicate,
					object: rel.object,
					objectType: rel.objectType,
					confidence: rel.confidence,
					chunkIds: rel.chunkIds,
					contexts: rel.contexts,
				}));
				await this.store.docChunkRepo.updateAnnotations(chunk.id, { entities: names, relations: chunkRelations });
				names.forEach((name) => entityNames.add(name));
				relations.push(...chunkRelations);
			} catch (error) {
				console.warn(`[DocumentProcessingService] Extraction failed for chunk ${chunk.id}, skipping:`, error);
			}
		}
		console.info(
			`[DocumentProcessingService] Extracted ${entityNames.size} entities, ${relations.length} relations from ${chunks.length} chunks`,
		);
		return { entityCount: entityNames.size, relations };
	}

	/**
	 * @returns whether at least one triple was stored
	 */
	private async storeGraph(kb: KnowledgeBasePO, relations: ChunkRelation[]): Promise<boolean> {
		const triples: Triple[] = relations
			.filter((rel) => rel.subject && rel.object)
			.map((rel) => ({
				subject: rel.subject,
				subjectType: rel.subjectType || DEFAULT_ENTITY_TYPE,
				predicate: rel.predicate || DEFAULT_PREDICATE,
				object: rel.object,
				objectType: rel.objectType || DEFAULT_ENTITY_TYPE,
			}));
		if (!triples.length) {
			return false;
		}

		const graphStore = await this.registry.getGraphStore(kb.id);
		if (!graphStore) {
			return false;
		}

		try {
			const result = await graphStore.insertTriplesBatch(triples, this.settings.graphBatchSize);
			console.info(`[DocumentProcessingService] Graph triples stored: ${result.success} ok, ${result.failed} failed`);
			return result.success > 0;
		} catch (error) {
			console.warn(`[DocumentProcessingService] Graph storage failed for knowledge base ${kb.id}:`, error);
			return false;
		}
	}
}
