import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { ConfigurationError, DimensionMismatchError, EmbeddingUnavailableError, IndexNotTrainedError } from '@/core/errors';
import { BaseEmbeddingProvider } from '@/core/providers/embedding/BaseEmbeddingProvider';
import { HashEmbeddingProvider } from '@/core/providers/embedding/HashEmbeddingProvider';
import { VectorIndex } from './VectorIndex';
import { l2Norm } from './metric';
import { IvfStructure } from './structures/IvfStructure';

/**
 * Returns fixed vectors from a lookup table and counts embedded texts.
 */
class TableEmbeddingProvider extends BaseEmbeddingProvider {
	readonly providerId = 'table';
	calls = 0;

	constructor(
		private readonly table: Record<string, number[]>,
		model = 'table-model',
	) {
		super(model);
	}

	withModel(model: string): TableEmbeddingProvider {
		return new TableEmbeddingProvider(this.table, model);
	}

	protected async requestEmbeddings(texts: string[]): Promise<number[][]> {
		this.calls += texts.length;
		return texts.map((text) => {
			const vector = this.table[text];
			if (!vector) {
				throw new Error(`no vector for ${text}`);
			}
			return vector;
		});
	}
}

const PLANE: Record<string, number[]> = {
	a: [1, 0],
	b: [0, 1],
	c: [1, 1],
	q: [1, 0.5],
	long: [3, 4],
	zero: [0, 0],
};

let tmpDir: string;

beforeEach(async () => {
	tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), 'vector-index-'));
});

afterEach(async () => {
	await fs.rm(tmpDir, { recursive: true, force: true });
});

describe('VectorIndex (Flat)', () => {
	it('assigns doc_<slot> ids across batches', async () => {
		const index = new VectorIndex({ provider: new TableEmbeddingProvider(PLANE) });
		expect(await index.addTexts(['a', 'b'])).toEqual(['doc_0', 'doc_1']);
		expect(await index.addTexts(['c'], [{ tag: 'third' }])).toEqual(['doc_2']);
		expect(index.getDocumentById('doc_2')).toEqual({ docId: 'doc_2', text: 'c', metadata: { tag: 'third' } });
		expect(index.getDocumentById('doc_9')).toBeNull();
	});

	it('ranks by squared L2 distance and scores 1 / (1 + d)', async () => {
		const index = new VectorIndex({ provider: new TableEmbeddingProvider(PLANE), metric: 'L2' });
		await index.addTexts(['a', 'b', 'c'], undefined, ['A', 'B', 'C']);

		const hits = await index.search('q', 3);
		// q = (1, 0.5): d(A) = 0.25, d(C) = 0.25, d(B) = 1.25. The tie keeps the lower slot first.
		expect(hits.map((h) => h.document.docId)).toEqual(['A', 'C', 'B']);
		expect(hits[0].score).toBeCloseTo(0.8, 6);
		expect(hits[1].score).toBeCloseTo(0.8, 6);
		expect(hits[2].score).toBeCloseTo(1 / 2.25, 6);
	});

	it('returns documents only when scores are not requested', async () => {
		const index = new VectorIndex({ provider: new TableEmbeddingProvider(PLANE) });
		await index.addTexts(['a', 'b'], [{ n: 1 }, { n: 2 }]);
		expect(await index.search('a', 1, false)).toEqual([{ docId: 'doc_0', text: 'a', metadata: { n: 1 } }]);
	});

	it('scores inner product as the raw dot product', async () => {
		const index = new VectorIndex({ provider: new TableEmbeddingProvider(PLANE), metric: 'InnerProduct' });
		await index.addTexts(['a', 'b', 'long']);
		const hits = await index.search('q', 2);
		// dot(q, long) = 3 + 2 = 5, dot(q, a) = 1
		expect(hits.map((h) => [h.document.text, h.score])).toEqual([
			['long', 5],
			['a', 1],
		]);
	});

	it('stores unit-length vectors under Cosine', async () => {
		const index = new VectorIndex({ provider: new TableEmbeddingProvider(PLANE), metric: 'Cosine' });
		await index.addTexts(['long', 'c']);
		for (const id of ['doc_0', 'doc_1']) {
			const stored = index.getStoredVector(id);
			expect(stored).not.toBeNull();
			expect(l2Norm(stored ?? new Float32Array())).toBeCloseTo(1, 5);
		}
		const stored = index.getStoredVector('doc_0') ?? new Float32Array();
		expect(stored[0]).toBeCloseTo(0.6, 6);
		expect(stored[1]).toBeCloseTo(0.8, 6);
	});

	it('keeps a zero vector at zero under Cosine', async () => {
		const index = new VectorIndex({ provider: new TableEmbeddingProvider(PLANE), metric: 'Cosine' });
		await index.addTexts(['zero']);
		expect(Array.from(index.getStoredVector('doc_0') ?? [])).toEqual([0, 0]);
	});

	it('returns nothing for an empty index without embedding the query', async () => {
		const provider = new TableEmbeddingProvider(PLANE);
		const index = new VectorIndex({ provider });
		expect(await index.search('a', 5)).toEqual([]);
		expect(await index.searchByVector(Float32Array.from([1, 0]), 5)).toEqual([]);
		expect(provider.calls).toBe(0);
	});

	it('inserts nothing when an embedding fails', async () => {
		const index = new VectorIndex({ provider: new TableEmbeddingProvider(PLANE) });
		await expect(index.addTexts(['a', 'unknown'])).rejects.toBeInstanceOf(EmbeddingUnavailableError);
		expect(index.size).toBe(0);
		expect(index.getStats().totalDocuments).toBe(0);
	});

	it('rejects a query vector of the wrong dimension', async () => {
		const index = new VectorIndex({ provider: new TableEmbeddingProvider(PLANE) });
		await index.addTexts(['a']);
		await expect(index.searchByVector(Float32Array.from([1, 0, 0]), 1)).rejects.toBeInstanceOf(DimensionMismatchError);
	});

	it('keeps slots unique under concurrent adds', async () => {
		const index = new VectorIndex({ provider: new HashEmbeddingProvider({ dimension: 16 }) });
		const [first, second] = await Promise.all([index.addTexts(['one', 'two', 'three']), index.addTexts(['four', 'five'])]);
		expect([...first, ...second].sort()).toEqual(['doc_0', 'doc_1', 'doc_2', 'doc_3', 'doc_4']);
		expect(index.getStats()).toMatchObject({ totalDocuments: 5, totalVectors: 5, dimension: 16 });
	});

	it('clears every entry', async () => {
		const index = new VectorIndex({ provider: new TableEmbeddingProvider(PLANE) });
		await index.addTexts(['a', 'b']);
		await index.clear();
		expect(index.size).toBe(0);
		expect(await index.search('a', 1)).toEqual([]);
		expect(await index.addTexts(['c'])).toEqual(['doc_0']);
	});
});

describe('VectorIndex.deleteByIds', () => {
	it('removes present ids, ignores missing ones and re-embeds survivors', async () => {
		const provider = new TableEmbeddingProvider(PLANE);
		const index = new VectorIndex({ provider });
		await index.addTexts(['a', 'b', 'c'], [{ n: 0 }, { n: 1 }, { n: 2 }]);
		expect(provider.calls).toBe(3);

		expect(await index.deleteByIds(['doc_1', 'missing'])).toBe(1);
		expect(provider.calls).toBe(5);
		expect(index.size).toBe(2);
		expect(index.getDocumentById('doc_1')).toBeNull();
		expect(index.getDocumentById('doc_2')).toEqual({ docId: 'doc_2', text: 'c', metadata: { n: 2 } });

		const hits = await index.search('b', 3);
		expect(hits.map((h) => h.document.docId)).not.toContain('doc_1');
		expect(hits).toHaveLength(2);
	});

	it('returns 0 and leaves the index alone when nothing matches', async () => {
		const provider = new TableEmbeddingProvider(PLANE);
		const index = new VectorIndex({ provider });
		await index.addTexts(['a']);
		expect(await index.deleteByIds(['nope'])).toBe(0);
		expect(provider.calls).toBe(1);
		expect(index.size).toBe(1);
	});

	it('empties the index when every id is removed', async () => {
		const index = new VectorIndex({ provider: new TableEmbeddingProvider(PLANE) });
		await index.addTexts(['a', 'b']);
		expect(await index.deleteByIds(['doc_0', 'doc_1'])).toBe(2);
		expect(index.size).toBe(0);
		expect(await index.search('a', 1)).toEqual([]);
	});
});

describe('VectorIndex persistence', () => {
	it('reproduces the top hit and score after save and load', async () => {
		const provider = new HashEmbeddingProvider({ dimension: 32 });
		const index = new VectorIndex({ provider, metric: 'Cosine' });
		await index.addTexts(['a', 'b', 'c']);
		const [before] = await index.search('a', 1);

		await index.save(tmpDir);
		const loaded = await VectorIndex.load(tmpDir, provider);
		const [after] = await loaded.search('a', 1);

		expect(after.document).toEqual(before.document);
		expect(Math.abs(after.score - before.score)).toBeLessThanOrEqual(1e-5);
		expect(loaded.getStats()).toEqual(index.getStats());
	});

	it('writes the manifest with snake_case keys', async () => {
		const index = new VectorIndex({ provider: new TableEmbeddingProvider(PLANE) });
		await index.addTexts(['a', 'b'], [{ chunk_id: 'x' }, { chunk_id: 'y' }], ['chunk_x', 'chunk_y']);
		await index.save(tmpDir);

		const manifest = JSON.parse(await fs.readFile(path.join(tmpDir, 'metadata.json'), 'utf8'));
		expect(manifest).toEqual({
			dimension: 2,
			index_type: 'Flat',
			metric: 'L2',
			current_idx: 2,
			embedding_model: 'table-model',
			documents: {
				'0': { doc_id: 'chunk_x', text: 'a', metadata: { chunk_id: 'x' } },
				'1': { doc_id: 'chunk_y', text: 'b', metadata: { chunk_id: 'y' } },
			},
			doc_id_to_idx: { chunk_x: 0, chunk_y: 1 },
		});
	});

	it('points the provider at the recorded embedding model', async () => {
		const index = new VectorIndex({ provider: new TableEmbeddingProvider(PLANE, 'model-a') });
		await index.addTexts(['a']);
		await index.save(tmpDir);

		const loaded = await VectorIndex.load(tmpDir, new TableEmbeddingProvider(PLANE, 'model-b'));
		expect(loaded.embeddingModel).toBe('model-a');
		expect(await loaded.addTexts(['b'])).toEqual(['doc_1']);
	});

	it('rejects a directory without a manifest', async () => {
		await expect(VectorIndex.load(tmpDir, new TableEmbeddingProvider(PLANE))).rejects.toBeInstanceOf(ConfigurationError);
	});
});

describe('index type and metric combinations', () => {
	const provider = new TableEmbeddingProvider(PLANE);

	it.each([
		['IVF', 'Cosine'],
		['HNSW', 'InnerProduct'],
		['HNSW', 'Cosine'],
	] as const)('rejects %s with %s', (indexType, metric) => {
		expect(() => new VectorIndex({ provider, indexType, metric })).toThrow(ConfigurationError);
	});

	it.each([
		['Flat', 'Cosine'],
		['IVF', 'InnerProduct'],
		['HNSW', 'L2'],
	] as const)('accepts %s with %s', (indexType, metric) => {
		expect(() => new VectorIndex({ provider, indexType, metric })).not.toThrow();
	});
});

describe('IVF index', () => {
	const CLUSTERS: Record<string, number[]> = {
		a1: [0, 0],
		a2: [0, 1],
		a3: [1, 0],
		b1: [10, 10],
		b2: [10, 11],
		b3: [11, 10],
		origin: [0, 0],
	};

	it('trains on the first batch and only scans the probed lists', async () => {
		const index = new VectorIndex({
			provider: new TableEmbeddingProvider(CLUSTERS),
			indexType: 'IVF',
			nlist: 2,
			nprobe: 1,
		});
		expect(index.getStats().isTrained).toBe(false);
		await index.addTexts(['a1', 'a2', 'a3', 'b1', 'b2', 'b3']);
		expect(index.getStats().isTrained).toBe(true);

		// Only the near cluster is probed, so the padded slots are dropped.
		const hits = await index.search('origin', 5);
		expect(hits.map((h) => h.document.text)).toEqual(['a1', 'a2', 'a3']);
		expect(hits[0].score).toBe(1);
	});

	it('returns the same hits after save and load', async () => {
		const provider = new TableEmbeddingProvider(CLUSTERS);
		const index = new VectorIndex({ provider, indexType: 'IVF', nlist: 2, nprobe: 2 });
		await index.addTexts(['a1', 'a2', 'a3', 'b1', 'b2', 'b3']);
		await index.save(tmpDir);
		const loaded = await VectorIndex.load(tmpDir, provider, { nlist: 2, nprobe: 2 });
		expect(await loaded.search('origin', 4)).toEqual(await index.search('origin', 4));
	});

	it('refuses to search before training', () => {
		const structure = new IvfStructure('L2', 2, { nlist: 2, nprobe: 1 });
		expect(() => structure.search(Float32Array.from([0, 0]), 1)).toThrow(IndexNotTrainedError);
	});
});

describe('HNSW index', () => {
	const grid: Record<string, number[]> = {};
	for (let i = 0; i < 25; i++) {
		grid[`p${i}`] = [i % 5, Math.floor(i / 5)];
	}
	const names = Object.keys(grid);

	it('finds every stored point as its own nearest neighbour', async () => {
		const index = new VectorIndex({ provider: new TableEmbeddingProvider(grid), indexType: 'HNSW', hnswM: 4 });
		await index.addTexts(names);
		for (const name of names) {
			const [hit] = await index.search(name, 1);
			expect(hit.document.text).toBe(name);
			expect(hit.score).toBe(1);
		}
	});

	it('keeps its graph across save and load', async () => {
		const provider = new TableEmbeddingProvider(grid);
		const index = new VectorIndex({ provider, indexType: 'HNSW', hnswM: 4 });
		await index.addTexts(names.slice(0, 15));
		await index.save(tmpDir);

		const loaded = await VectorIndex.load(tmpDir, provider);
		for (const name of ['p0', 'p7', 'p14']) {
			expect(await loaded.search(name, 3)).toEqual(await index.search(name, 3));
		}

		// Both continue from the same generator state.
		await index.addTexts(names.slice(15));
		await loaded.addTexts(names.slice(15));
		expect(await loaded.search('p20', 5)).toEqual(await index.search('p20', 5));
	});
});
