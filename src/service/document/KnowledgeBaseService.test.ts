import { existsSync } from 'fs';
import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { ConfigurationError, InvalidStateError, NotFoundError } from '@/core/errors';
import { HashEmbeddingProvider } from '@/core/providers/embedding/HashEmbeddingProvider';
import { SqliteGraphStore } from '@/core/storage/graph/SqliteGraphStore';
import { SqliteStoreManager } from '@/core/storage/sqlite/SqliteStoreManager';
import { DocumentProcessingService } from './DocumentProcessingService';
import { KnowledgeBaseResourceRegistry } from './KnowledgeBaseResourceRegistry';
import { KnowledgeBaseService } from './KnowledgeBaseService';

let tmpDir: string;
let store: SqliteStoreManager;
let registry: KnowledgeBaseResourceRegistry;
let processing: DocumentProcessingService;
let service: KnowledgeBaseService;

beforeEach(async () => {
	tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), 'kb-service-'));
	store = SqliteStoreManager.open({ dbFilePath: ':memory:' });
	registry = new KnowledgeBaseResourceRegistry(
		{
			createEmbeddingProvider: (model) => new HashEmbeddingProvider({ model, dimension: 16 }),
			createExtractor: () => {
				throw new ConfigurationError('Extractor needs an API key');
			},
			createGraphStore: () => new SqliteGraphStore(store.getKysely()),
		},
		{ vectorStoreDir: tmpDir },
	);
	processing = new DocumentProcessingService(store, registry);
	service = new KnowledgeBaseService(store, registry, processing);
});

afterEach(async () => {
	await processing.shutdown({ drain: true });
	await store.close();
	await fs.rm(tmpDir, { recursive: true, force: true });
});

async function createNotes() {
	return service.createKnowledgeBase({ name: 'notes', chunkStrategy: 'paragraph', chunkSize: 20, chunkOverlap: 0 });
}

async function createProcessedDocument(knowledgeBaseId: string) {
	const doc = await service.createDocument(knowledgeBaseId, { title: 'Meeting', content: 'Alice met Bob.\n\nBob met Alice.' });
	await processing.whenIdle();
	return service.getDocument(doc.id);
}

describe('KnowledgeBaseService', () => {
	describe('knowledge bases', () => {
		it('fills defaults for omitted configuration', async () => {
			const kb = await service.createKnowledgeBase({ name: '  research  ' });

			expect(kb).toMatchObject({
				name: 'research',
				description: null,
				chunkStrategy: 'semantic',
				chunkSize: 500,
				chunkOverlap: 100,
				enableVectorStore: true,
				enableKnowledgeGraph: false,
				enableNer: false,
				embeddingModel: 'nomic-embed-text',
				documentCount: 0,
				totalChunks: 0,
			});
			expect(await service.getKnowledgeBase(kb.id)).toEqual(kb);
			expect((await service.listKnowledgeBases()).map((k) => k.id)).toEqual([kb.id]);
		});

		it('rejects duplicate names, empty names and invalid chunk sizes', async () => {
			await createNotes();

			await expect(service.createKnowledgeBase({ name: 'notes' })).rejects.toThrow(InvalidStateError);
			await expect(service.createKnowledgeBase({ name: ' ' })).rejects.toThrow(ConfigurationError);
			await expect(service.createKnowledgeBase({ name: 'other', chunkSize: 100, chunkOverlap: 150 })).rejects.toThrow(
				ConfigurationError,
			);
		});

		it('throws NotFoundError for an unknown id', async () => {
			await expect(service.getKnowledgeBase('missing')).rejects.toThrow(NotFoundError);
			await expect(service.listDocuments('missing')).rejects.toThrow(NotFoundError);
		});

		it('drops cached resources when the embedding model changes', async () => {
			const kb = await createNotes();
			await createProcessedDocument(kb.id);
			expect(registry.peekVectorIndex(kb.id)).not.toBeNull();

			const updated = await service.updateKnowledgeBase(kb.id, { embeddingModel: 'other-model', description: 'team notes' });

			expect(updated).toMatchObject({ embeddingModel: 'other-model', description: 'team notes' });
			expect(registry.peekVectorIndex(kb.id)).toBeNull();
		});

		it('needs force to delete a knowledge base with documents, then removes its saved index', async () => {
			const kb = await createNotes();
			const doc = await createProcessedDocument(kb.id);
			const savedIndex = path.join(tmpDir, `kb_${kb.id}`, 'metadata.json');
			expect(existsSync(savedIndex)).toBe(true);

			await expect(service.deleteKnowledgeBase(kb.id)).rejects.toThrow(InvalidStateError);
			expect(await service.deleteKnowledgeBase(kb.id, { force: true })).toEqual({ deletedDocuments: 1 });

			expect(existsSync(savedIndex)).toBe(false);
			expect(registry.peekVectorIndex(kb.id)).toBeNull();
			await expect(service.getKnowledgeBase(kb.id)).rejects.toThrow(NotFoundError);
			await expect(service.getDocument(doc.id)).rejects.toThrow(NotFoundError);
		});
	});

	describe('documents', () => {
		it('stores a new document as pending and processes it in the background', async () => {
			const kb = await createNotes();

			const created = await service.createDocument(kb.id, { title: 'Meeting', content: 'Alice met Bob.\n\nBob met Alice.', tags: ['team'] });
			expect(created).toMatchObject({ status: 'pending', chunkCount: 0, tags: ['team'], chunkStrategy: null });

			await processing.whenIdle();
			const status = await service.getDocumentStatus(created.id);
			expect(status).toMatchObject({
				documentId: created.id,
				status: 'completed',
				inProcessingQueue: false,
				chunkCount: 2,
				vectorStored: true,
				graphStored: false,
				errorMessage: null,
			});
			expect((await service.listChunks(created.id)).map((c) => c.content)).toEqual(['Alice met Bob.', 'Bob met Alice.']);
			expect((await service.listChunks(created.id, { offset: 1, limit: 1 })).map((c) => c.chunkIndex)).toEqual([1]);
			expect((await service.listDocuments(kb.id, { status: 'completed' })).map((d) => d.id)).toEqual([created.id]);
			expect(await service.getKnowledgeBase(kb.id)).toMatchObject({ documentCount: 1, totalChunks: 2 });
		});

		it('rejects chunk overrides the chunker cannot use', async () => {
			const kb = await createNotes();
			await expect(service.createDocument(kb.id, { title: 't', content: 'c', chunkOverlap: 20 })).rejects.toThrow(
				ConfigurationError,
			);
		});

		it('reprocesses a completed document from a clean slate', async () => {
			const kb = await createNotes();
			const doc = await createProcessedDocument(kb.id);
			const oldChunkIds = (await service.listChunks(doc.id)).map((c) => c.id);

			const reset = await service.reprocessDocument(doc.id);
			expect(reset).toMatchObject({ status: 'pending', chunkCount: 0, vectorStored: false, processedAt: null });

			await processing.whenIdle();
			const reprocessed = await service.getDocument(doc.id);
			expect(reprocessed).toMatchObject({ status: 'completed', chunkCount: 2, vectorStored: true });
			const newChunkIds = (await service.listChunks(doc.id)).map((c) => c.id);
			expect(newChunkIds).toHaveLength(2);
			expect(newChunkIds.some((id) => oldChunkIds.includes(id))).toBe(false);
			expect(registry.peekVectorIndex(kb.id)?.size).toBe(2);
			expect(await service.getKnowledgeBase(kb.id)).toMatchObject({ documentCount: 1, totalChunks: 2 });
		});

		it('refuses to reprocess a document that is still processing', async () => {
			const kb = await createNotes();
			const doc = await service.createDocument(kb.id, { title: 'Meeting', content: 'Alice met Bob.' });

			await expect(service.reprocessDocument(doc.id)).rejects.toThrow(InvalidStateError);
			await processing.whenIdle();
		});

		it('queues a pending document once through processDocument', async () => {
			const kb = await createNotes();
			const doc = await service.createDocument(kb.id, { title: 'Meeting', content: 'Alice met Bob.' });

			expect(await service.processDocument(doc.id)).toBe(false);
			await processing.whenIdle();
			expect((await service.getDocument(doc.id)).status).toBe('completed');
		});

		it('refuses to run a completed document again through processDocument', async () => {
			const kb = await createNotes();
			const doc = await createProcessedDocument(kb.id);

			await expect(service.processDocument(doc.id)).rejects.toThrow(InvalidStateError);

			expect(await service.getDocument(doc.id)).toMatchObject({ status: 'completed', chunkCount: 2 });
			expect(await store.docChunkRepo.countByDocument(doc.id)).toBe(2);
			expect(await service.getKnowledgeBase(kb.id)).toMatchObject({ documentCount: 1, totalChunks: 2 });
		});

		it('picks up a pending document left behind by a stopped processor', async () => {
			const kb = await createNotes();
			await processing.shutdown({ drain: false });
			const doc = await service.createDocument(kb.id, { title: 'Meeting', content: 'Alice met Bob.' });
			expect((await service.getDocument(doc.id)).status).toBe('pending');

			const restarted = new DocumentProcessingService(store, registry);
			const restartedService = new KnowledgeBaseService(store, registry, restarted);
			expect(await restartedService.processDocument(doc.id)).toBe(true);
			await restarted.whenIdle();

			expect((await service.getDocument(doc.id)).status).toBe('completed');
			await restarted.shutdown({ drain: true });
		});

		it('refuses to delete a document that is still queued or processing', async () => {
			const kb = await createNotes();
			const doc = await service.createDocument(kb.id, { title: 'Meeting', content: 'Alice met Bob.\n\nBob met Alice.' });

			await expect(service.deleteDocument(doc.id)).rejects.toThrow(InvalidStateError);
			await processing.whenIdle();

			expect(await service.deleteDocument(doc.id)).toEqual({ deletedChunks: 2 });
			expect(registry.peekVectorIndex(kb.id)?.size).toBe(0);
			expect(await service.getKnowledgeBase(kb.id)).toMatchObject({ documentCount: 0, totalChunks: 0 });
		});

		it('deletes a document with its chunks and vectors and releases its aggregates', async () => {
			const kb = await createNotes();
			const keep = await createProcessedDocument(kb.id);
			const drop = await createProcessedDocument(kb.id);
			expect(registry.peekVectorIndex(kb.id)?.size).toBe(4);

			expect(await service.deleteDocument(drop.id)).toEqual({ deletedChunks: 2 });

			await expect(service.getDocument(drop.id)).rejects.toThrow(NotFoundError);
			expect(await store.docChunkRepo.countByDocument(drop.id)).toBe(0);
			const index = registry.peekVectorIndex(kb.id);
			expect(index?.size).toBe(2);
			for (const chunk of await service.listChunks(keep.id)) {
				expect(index?.getDocumentById(`chunk_${chunk.id}`)).not.toBeNull();
			}
			expect(await service.getKnowledgeBase(kb.id)).toMatchObject({ documentCount: 1, totalChunks: 2 });
		});
	});
});
