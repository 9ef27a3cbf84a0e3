import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { SqliteStoreManager } from '../SqliteStoreManager';
import { DEFAULT_KNOWLEDGE_BASE_CONFIG, type ChunkPO, type DocumentPO, type KnowledgeBasePO } from '@/core/po';

function makeKnowledgeBase(id: string, name: string): KnowledgeBasePO {
	return {
		id,
		name,
		description: null,
		...DEFAULT_KNOWLEDGE_BASE_CONFIG,
		documentCount: 0,
		totalChunks: 0,
		createdAt: 1000,
		updatedAt: 1000,
	};
}

function makeDocument(id: string, knowledgeBaseId: string, createdAt: number): DocumentPO {
	return {
		id,
		knowledgeBaseId,
		title: `Doc ${id}`,
		content: 'some content',
		source: null,
		filePath: null,
		fileType: null,
		author: null,
		category: null,
		tags: ['a', 'b'],
		chunkStrategy: null,
		chunkSize: null,
		chunkOverlap: null,
		status: 'pending',
		errorMessage: null,
		charCount: 0,
		wordCount: 0,
		chunkCount: 0,
		entityCount: 0,
		relationCount: 0,
		vectorStored: false,
		graphStored: false,
		processingTimeMs: null,
		processedAt: null,
		createdAt,
		updatedAt: createdAt,
	};
}

function makeChunk(id: string, documentId: string, knowledgeBaseId: string, chunkIndex: number): ChunkPO {
	return {
		id,
		documentId,
		knowledgeBaseId,
		chunkIndex,
		content: `chunk ${chunkIndex}`,
		chunkType: 'recursive',
		startPos: chunkIndex * 10,
		endPos: chunkIndex * 10 + 7,
		charCount: 7,
		wordCount: 2,
		vectorId: null,
		embeddingModel: null,
		hasEmbedding: false,
		entities: [],
		relations: [],
		keywords: [],
		createdAt: 2000,
		updatedAt: 2000,
	};
}

let store: SqliteStoreManager;

beforeEach(() => {
	store = SqliteStoreManager.open({ dbFilePath: ':memory:' });
});

afterEach(async () => {
	await store.close();
});

describe('KnowledgeBaseRepo', () => {
	it('round-trips a knowledge base and finds it by name', async () => {
		const kb = makeKnowledgeBase('kb1', 'Research');
		await store.knowledgeBaseRepo.insert(kb);
		expect(await store.knowledgeBaseRepo.getById('kb1')).toEqual(kb);
		expect((await store.knowledgeBaseRepo.getByName('Research'))?.id).toBe('kb1');
		expect(await store.knowledgeBaseRepo.getById('missing')).toBeNull();
	});

	it('rejects a duplicate name', async () => {
		await store.knowledgeBaseRepo.insert(makeKnowledgeBase('kb1', 'Same'));
		await expect(store.knowledgeBaseRepo.insert(makeKnowledgeBase('kb2', 'Same'))).rejects.toThrow(/UNIQUE/);
	});

	it('applies partial updates', async () => {
		await store.knowledgeBaseRepo.insert(makeKnowledgeBase('kb1', 'Research'));
		await store.knowledgeBaseRepo.update('kb1', { description: 'papers', enableNer: true });
		const kb = await store.knowledgeBaseRepo.getById('kb1');
		expect(kb).toMatchObject({ name: 'Research', description: 'papers', enableNer: true, enableVectorStore: true });
	});

	it('adjusts aggregates and floors them at zero', async () => {
		await store.knowledgeBaseRepo.insert(makeKnowledgeBase('kb1', 'Research'));
		await store.knowledgeBaseRepo.adjustAggregates('kb1', { documents: 1, chunks: 4 });
		await store.knowledgeBaseRepo.adjustAggregates('kb1', { documents: 1, chunks: 3 });
		expect(await store.knowledgeBaseRepo.getById('kb1')).toMatchObject({ documentCount: 2, totalChunks: 7 });

		await store.knowledgeBaseRepo.adjustAggregates('kb1', { documents: -5, chunks: -10 });
		expect(await store.knowledgeBaseRepo.getById('kb1')).toMatchObject({ documentCount: 0, totalChunks: 0 });
	});

	it('cascades deletion to documents and chunks', async () => {
		await store.knowledgeBaseRepo.insert(makeKnowledgeBase('kb1', 'Research'));
		await store.documentRepo.insert(makeDocument('d1', 'kb1', 1));
		await store.docChunkRepo.insertMany([makeChunk('c1', 'd1', 'kb1', 0)]);

		expect(await store.knowledgeBaseRepo.delete('kb1')).toBe(true);
		expect(await store.documentRepo.getById('d1')).toBeNull();
		expect(await store.docChunkRepo.getById('c1')).toBeNull();
		expect(await store.knowledgeBaseRepo.delete('kb1')).toBe(false);
	});
});

describe('DocumentRepo', () => {
	beforeEach(async () => {
		await store.knowledgeBaseRepo.insert(makeKnowledgeBase('kb1', 'Research'));
	});

	it('round-trips a document including tags', async () => {
		const doc = makeDocument('d1', 'kb1', 5);
		await store.documentRepo.insert(doc);
		expect(await store.documentRepo.getById('d1')).toEqual(doc);
	});

	it('lists in creation order with status filter and paging', async () => {
		await store.documentRepo.insert(makeDocument('d3', 'kb1', 30));
		await store.documentRepo.insert(makeDocument('d1', 'kb1', 10));
		await store.documentRepo.insert(makeDocument('d2', 'kb1', 20));
		await store.documentRepo.update('d2', { status: 'completed' });

		const all = await store.documentRepo.listByKnowledgeBase('kb1');
		expect(all.map((d) => d.id)).toEqual(['d1', 'd2', 'd3']);

		const pending = await store.documentRepo.listByKnowledgeBase('kb1', { status: 'pending' });
		expect(pending.map((d) => d.id)).toEqual(['d1', 'd3']);

		const page = await store.documentRepo.listByKnowledgeBase('kb1', { offset: 1, limit: 1 });
		expect(page.map((d) => d.id)).toEqual(['d2']);
	});

	it('updates pipeline fields only', async () => {
		await store.documentRepo.insert(makeDocument('d1', 'kb1', 1));
		await store.documentRepo.update('d1', {
			status: 'failed',
			errorMessage: 'boom',
			vectorStored: true,
			processingTimeMs: 12,
		});
		const doc = await store.documentRepo.getById('d1');
		expect(doc).toMatchObject({
			title: 'Doc d1',
			status: 'failed',
			errorMessage: 'boom',
			vectorStored: true,
			graphStored: false,
			processingTimeMs: 12,
		});
	});
});

describe('DocChunkRepo', () => {
	beforeEach(async () => {
		await store.knowledgeBaseRepo.insert(makeKnowledgeBase('kb1', 'Research'));
		await store.documentRepo.insert(makeDocument('d1', 'kb1', 1));
		await store.documentRepo.insert(makeDocument('d2', 'kb1', 2));
	});

	it('lists document chunks by index and knowledge-base chunks by insertion', async () => {
		await store.docChunkRepo.insertMany([makeChunk('b', 'd1', 'kb1', 1), makeChunk('a', 'd1', 'kb1', 0)]);
		await store.docChunkRepo.insertMany([makeChunk('c', 'd2', 'kb1', 0)]);

		expect((await store.docChunkRepo.listByDocument('d1')).map((c) => c.id)).toEqual(['a', 'b']);
		expect((await store.docChunkRepo.listByKnowledgeBase('kb1')).map((c) => c.id)).toEqual(['b', 'a', 'c']);
		expect(await store.docChunkRepo.countByDocument('d1')).toBe(2);
	});

	it('keeps the requested order in getByIds and skips unknown ids', async () => {
		await store.docChunkRepo.insertMany([makeChunk('a', 'd1', 'kb1', 0), makeChunk('b', 'd1', 'kb1', 1)]);
		const chunks = await store.docChunkRepo.getByIds(['b', 'zzz', 'a']);
		expect(chunks.map((c) => c.id)).toEqual(['b', 'a']);
	});

	it('records embeddings and annotations', async () => {
		await store.docChunkRepo.insertMany([makeChunk('a', 'd1', 'kb1', 0)]);
		await store.docChunkRepo.updateEmbedding([{ id: 'a', vectorId: 'chunk_a', embeddingModel: 'm' }]);
		await store.docChunkRepo.updateAnnotations('a', {
			entities: ['Alice', 'Acme'],
			relations: [
				{
					subject: 'Alice',
					subjectType: 'Person',
					predicate: 'works at',
					object: 'Acme',
					objectType: 'Organization',
					confidence: 0.9,
					chunkIds: ['a'],
					contexts: [],
				},
			],
		});

		const chunk = await store.docChunkRepo.getById('a');
		expect(chunk).toMatchObject({
			vectorId: 'chunk_a',
			embeddingModel: 'm',
			hasEmbedding: true,
			entities: ['Alice', 'Acme'],
			keywords: [],
		});
		expect(chunk?.relations[0].predicate).toBe('works at');
	});

	it('deletes chunks of one document', async () => {
		await store.docChunkRepo.insertMany([makeChunk('a', 'd1', 'kb1', 0), makeChunk('b', 'd1', 'kb1', 1)]);
		await store.docChunkRepo.insertMany([makeChunk('c', 'd2', 'kb1', 0)]);
		expect(await store.docChunkRepo.deleteByDocument('d1')).toBe(2);
		expect(await store.docChunkRepo.countByDocument('d1')).toBe(0);
		expect(await store.docChunkRepo.countByDocument('d2')).toBe(1);
	});

	it('rejects a duplicate chunk index within a document', async () => {
		await store.docChunkRepo.insertMany([makeChunk('a', 'd1', 'kb1', 0)]);
		await expect(store.docChunkRepo.insertMany([makeChunk('b', 'd1', 'kb1', 0)])).rejects.toThrow(/UNIQUE/);
	});

	it('inserts thousands of chunks of one document', async () => {
		const chunks = Array.from({ length: 2500 }, (_, i) => makeChunk(`c${i}`, 'd1', 'kb1', i));
		await store.docChunkRepo.insertMany(chunks);

		expect(await store.docChunkRepo.countByDocument('d1')).toBe(2500);
		const tail = await store.docChunkRepo.listByDocument('d1', { offset: 2499 });
		expect(tail.map((c) => c.id)).toEqual(['c2499']);
	});

	it('inserts nothing when a later batch fails', async () => {
		const chunks = Array.from({ length: 120 }, (_, i) => makeChunk(`c${i}`, 'd1', 'kb1', i));
		chunks.push(makeChunk('dup', 'd1', 'kb1', 0));

		await expect(store.docChunkRepo.insertMany(chunks)).rejects.toThrow(/UNIQUE/);
		expect(await store.docChunkRepo.countByDocument('d1')).toBe(0);
	});
});
