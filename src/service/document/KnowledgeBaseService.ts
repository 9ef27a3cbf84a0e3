import fs from 'fs/promises';
import { assertChunkSizes } from '@/core/chunking/TextChunker';
import { CHUNK_VECTOR_ID_PREFIX } from '@/core/constant';
import { ConfigurationError, InvalidStateError, NotFoundError } from '@/core/errors';
import {
	DEFAULT_KNOWLEDGE_BASE_CONFIG,
	type ChunkPO,
	type DocumentCreateInput,
	type DocumentPO,
	type DocumentStatus,
	type KnowledgeBaseCreateInput,
	type KnowledgeBasePO,
} from '@/core/po';
import type { DocumentListQuery, KnowledgeBasePatch } from '@/core/storage/sqlite/repositories/types';
import type { SqliteStoreManager } from '@/core/storage/sqlite/SqliteStoreManager';
import { countWords } from '@/core/utils/format-utils';
import { generateUuidWithoutHyphens } from '@/core/utils/id-utils';
import type { DocumentProcessingService } from './DocumentProcessingService';
import type { KnowledgeBaseResourceRegistry } from './KnowledgeBaseResourceRegistry';

export interface DocumentStatusReport {
	documentId: string;
	status: DocumentStatus;
	/**
	 * Queued or running in the processing service.
	 */
	inProcessingQueue: boolean;
	chunkCount: number;
	vectorStored: boolean;
	graphStored: boolean;
	errorMessage: string | null;
	processingTimeMs: number | null;
	processedAt: number | null;
}

/**
 * Knowledge base and document management. Processing is handed to {@link DocumentProcessingService};
 * callers poll document status.
 */
export class KnowledgeBaseService {
	constructor(
		private readonly store: SqliteStoreManager,
		private readonly registry: KnowledgeBaseResourceRegistry,
		private readonly processing: DocumentProcessingService,
	) {}

	// ==================== knowledge bases ====================

	async createKnowledgeBase(input: KnowledgeBaseCreateInput): Promise<KnowledgeBasePO> {
		const name = input.name.trim();
		if (!name) {
			throw new ConfigurationError('Knowledge base name must not be empty');
		}
		if (await this.store.knowledgeBaseRepo.getByName(name)) {
			throw new InvalidStateError(`Knowledge base name already exists: ${name}`);
		}

		const now = Date.now();
		const kb: KnowledgeBasePO = {
			id: generateUuidWithoutHyphens(),
			name,
			description: input.description ?? null,
			chunkStrategy: input.chunkStrategy ?? DEFAULT_KNOWLEDGE_BASE_CONFIG.chunkStrategy,
			chunkSize: input.chunkSize ?? DEFAULT_KNOWLEDGE_BASE_CONFIG.chunkSize,
			chunkOverlap: input.chunkOverlap ?? DEFAULT_KNOWLEDGE_BASE_CONFIG.chunkOverlap,
			enableVectorStore: input.enableVectorStore ?? DEFAULT_KNOWLEDGE_BASE_CONFIG.enableVectorStore,
			enableKnowledgeGraph: input.enableKnowledgeGraph ?? DEFAULT_KNOWLEDGE_BASE_CONFIG.enableKnowledgeGraph,
			enableNer: input.enableNer ?? DEFAULT_KNOWLEDGE_BASE_CONFIG.enableNer,
			embeddingModel: input.embeddingModel ?? DEFAULT_KNOWLEDGE_BASE_CONFIG.embeddingModel,
			documentCount: 0,
			totalChunks: 0,
			createdAt: now,
			updatedAt: now,
		};
		assertChunkSizes(kb.chunkSize, kb.chunkOverlap);
		await this.store.knowledgeBaseRepo.insert(kb);
		console.info(`[KnowledgeBaseService] Created knowledge base ${kb.id} "${kb.name}"`);
		return kb;
	}

	async getKnowledgeBase(id: string): Promise<KnowledgeBasePO> {
		const kb = await this.store.knowledgeBaseRepo.getById(id);
		if (!kb) {
			throw new NotFoundError('KnowledgeBase', id);
		}
		return kb;
	}

	async listKnowledgeBases(params: { offset?: number; limit?: number } = {}): Promise<KnowledgeBasePO[]> {
		return this.store.knowledgeBaseRepo.list(params);
	}

	/**
	 * Change configuration. Cached resources are dropped when the embedding model changes,
	 * so the next use builds an index for the new model.
	 */
	async updateKnowledgeBase(id: string, patch: KnowledgeBasePatch): Promise<KnowledgeBasePO> {
		const kb = await this.getKnowledgeBase(id);
		if (patch.name !== undefined && patch.name !== kb.name) {
			const other = await this.store.knowledgeBaseRepo.getByName(patch.name);
			if (other && other.id !== id) {
				throw new InvalidStateError(`Knowledge base name already exists: ${patch.name}`);
			}
		}
		assertChunkSizes(patch.chunkSize ?? kb.chunkSize, patch.chunkOverlap ?? kb.chunkOverlap);
		await this.store.knowledgeBaseRepo.update(id, patch);
		if (patch.embeddingModel !== undefined && patch.embeddingModel !== kb.embeddingModel) {
			this.registry.evict(id);
		}
		return this.getKnowledgeBase(id);
	}

	/**
	 * Delete a knowledge base with its documents, chunks, cached resources and saved index.
	 * A knowledge base that still has documents needs `force`.
	 */
	async deleteKnowledgeBase(id: string, options: { force?: boolean } = {}): Promise<{ deletedDocuments: number }> {
		const kb = await this.getKnowledgeBase(id);
		if (kb.documentCount > 0 && !options.force) {
			throw new InvalidStateError(`Knowledge base ${id} has ${kb.documentCount} documents; pass force to delete it`);
		}

		this.registry.evict(id);
		const savePath = this.registry.getVectorStorePath(id);
		if (savePath) {
			await fs.rm(savePath, { recursive: true, force: true });
		}
		await this.store.knowledgeBaseRepo.delete(id);
		console.info(`[KnowledgeBaseService] Deleted knowledge base ${id} "${kb.name}"`);
		return { deletedDocuments: kb.documentCount };
	}

	// ==================== documents ====================

	/**
	 * Store a document as pending and queue it for processing.
	 */
	async createDocument(knowledgeBaseId: string, input: DocumentCreateInput): Promise<DocumentPO> {
		const kb = await this.getKnowledgeBase(knowledgeBaseId);
		if (input.chunkSize != null || input.chunkOverlap != null) {
			assertChunkSizes(input.chunkSize ?? kb.chunkSize, input.chunkOverlap ?? kb.chunkOverlap);
		}

		const now = Date.now();
		const doc: DocumentPO = {
			id: generateUuidWithoutHyphens(),
			knowledgeBaseId: kb.id,
			title: input.title,
			content: input.content,
			source: input.source ?? null,
			filePath: input.filePath ?? null,
			fileType: input.fileType ?? null,
			author: input.author ?? null,
			category: input.category ?? null,
			tags: input.tags ?? [],
			chunkStrategy: input.chunkStrategy ?? null,
			chunkSize: input.chunkSize ?? null,
			chunkOverlap: input.chunkOverlap ?? null,
			status: 'pending',
			errorMessage: null,
			charCount: input.content.length,
			wordCount: countWords(input.content),
			chunkCount: 0,
			entityCount: 0,
			relationCount: 0,
			vectorStored: false,
			graphStored: false,
			processingTimeMs: null,
			processedAt: null,
			createdAt: now,
			updatedAt: now,
		};
		await this.store.documentRepo.insert(doc);
		this.processing.submit(doc.id, kb.id);
		return doc;
	}

	async getDocument(id: string): Promise<DocumentPO> {
		const doc = await this.store.documentRepo.getById(id);
		if (!doc) {
			throw new NotFoundError('Document', id);
		}
		return doc;
	}

	async listDocuments(knowledgeBaseId: string, query: DocumentListQuery = {}): Promise<DocumentPO[]> {
		await this.getKnowledgeBase(knowledgeBaseId);
		return this.store.documentRepo.listByKnowledgeBase(knowledgeBaseId, query);
	}

	async listChunks(documentId: string, params: { offset?: number; limit?: number } = {}): Promise<ChunkPO[]> {
		await this.getDocument(documentId);
		return this.store.docChunkRepo.listByDocument(documentId, params);
	}

	async getDocumentStatus(documentId: string): Promise<DocumentStatusReport> {
		const doc = await this.getDocument(documentId);
		return {
			documentId: doc.id,
			status: doc.status,
			inProcessingQueue: this.processing.isProcessing(doc.id),
			chunkCount: doc.chunkCount,
			vectorStored: doc.vectorStored,
			graphStored: doc.graphStored,
			errorMessage: doc.errorMessage,
			processingTimeMs: doc.processingTimeMs,
			processedAt: doc.processedAt,
		};
	}

	/**
	 * Queue a pending document that was never picked up (for example after a restart).
	 *
	 * @returns false when the document is already queued or running
	 * @throws InvalidStateError when the document is no longer pending; use {@link reprocessDocument}
	 */
	async processDocument(documentId: string): Promise<boolean> {
		const doc = await this.getDocument(documentId);
		if (this.processing.isProcessing(doc.id)) {
			return false;
		}
		if (doc.status !== 'pending') {
			throw new InvalidStateError(`Document ${documentId} is ${doc.status}; reprocess it instead`);
		}
		return this.processing.submit(doc.id, doc.knowledgeBaseId);
	}

	/**
	 * Drop the document's chunks and vectors, reset it to pending and queue it again.
	 * Returns the document as reset, before the new run starts.
	 * A completed document's share of the knowledge-base aggregates is released first.
	 */
	async reprocessDocument(documentId: string): Promise<DocumentPO> {
		const doc = await this.getDocument(documentId);
		if (doc.status === 'processing' || this.processing.isProcessing(doc.id)) {
			throw new InvalidStateError(`Document ${documentId} is being processed`);
		}
		const kb = await this.getKnowledgeBase(doc.knowledgeBaseId);

		await this.removeVectors(kb, doc.id);
		await this.store.docChunkRepo.deleteByDocument(doc.id);
		if (doc.status === 'completed') {
			await this.store.knowledgeBaseRepo.adjustAggregates(kb.id, { documents: -1, chunks: -doc.chunkCount });
		}
		await this.store.documentRepo.update(doc.id, {
			status: 'pending',
			errorMessage: null,
			chunkCount: 0,
			entityCount: 0,
			relationCount: 0,
			vectorStored: false,
			graphStored: false,
			processingTimeMs: null,
			processedAt: null,
		});
		const reset = await this.getDocument(doc.id);
		this.processing.submit(doc.id, kb.id);
		console.info(`[KnowledgeBaseService] Document ${doc.id} reset for reprocessing`);
		return reset;
	}

	/**
	 * Delete a document with its chunks and vectors.
	 *
	 * @returns number of deleted chunks
	 * @throws InvalidStateError while the document is queued or being processed
	 */
	async deleteDocument(documentId: string): Promise<{ deletedChunks: number }> {
		const doc = await this.getDocument(documentId);
		if (doc.status === 'processing' || this.processing.isProcessing(doc.id)) {
			throw new InvalidStateError(`Document ${documentId} is being processed`);
		}
		const kb = await this.store.knowledgeBaseRepo.getById(doc.knowledgeBaseId);
		if (kb) {
			await this.removeVectors(kb, doc.id);
		}

		const deletedChunks = await this.store.docChunkRepo.countByDocument(doc.id);
		await this.store.documentRepo.delete(doc.id);
		if (kb && doc.status === 'completed') {
			await this.store.knowledgeBaseRepo.adjustAggregates(kb.id, { documents: -1, chunks: -deletedChunks });
		}
		console.info(`[KnowledgeBaseService] Deleted document ${doc.id} (${deletedChunks} chunks)`);
		return { deletedChunks };
	}

	/**
	 * Remove the document's chunk vectors from the knowledge base's index and re-save it.
	 */
	private async removeVectors(kb: KnowledgeBasePO, documentId: string): Promise<void> {
		const chunks = await this.store.docChunkRepo.listByDocument(documentId);
		const vectorIds = chunks.filter((chunk) => chunk.hasEmbedding).map((chunk) => chunk.vectorId ?? `${CHUNK_VECTOR_ID_PREFIX}${chunk.id}`);
		if (!vectorIds.length || !kb.enableVectorStore) {
			return;
		}
		const index = await this.registry.getVectorIndex(kb);
		if (!index) {
			return;
		}
		const removed = await index.deleteByIds(vectorIds);
		const savePath = this.registry.getVectorStorePath(kb.id);
		if (removed > 0 && savePath) {
			await index.save(savePath);
		}
	}
}
