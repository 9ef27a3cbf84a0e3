import fs from 'fs/promises';
import path from 'path';
import { z } from 'zod';
import { VECTOR_INDEX_FILENAME, VECTOR_METADATA_FILENAME } from '@/core/constant';
import { ConfigurationError, DimensionMismatchError, getErrorMessage } from '@/core/errors';
import type { EmbeddingProvider } from '@/core/providers/embedding/types';
import { ReadWriteLock } from '@/core/utils/lock-utils';
import { Stopwatch } from '@/core/utils/Stopwatch';
import { distanceToScore, normalizeVector } from './metric';
import { assertSupportedCombination, createStructure, deserializeStructure } from './structures';
import type {
	DistanceMetric,
	IndexType,
	VectorDocument,
	VectorIndexStats,
	VectorSearchHit,
	VectorStructure,
} from './types';

export interface VectorIndexOptions {
	provider: EmbeddingProvider;
	indexType?: IndexType;
	metric?: DistanceMetric;
	/**
	 * Known vector dimension. Discovered from the first embedding when omitted.
	 */
	dimension?: number;
	nlist?: number;
	nprobe?: number;
	hnswM?: number;
	efConstruction?: number;
	efSearch?: number;
	seed?: number;
}

const INDEX_TYPE_VALUES = ['Flat', 'IVF', 'HNSW'] as const satisfies readonly IndexType[];
const DISTANCE_METRIC_VALUES = ['L2', 'InnerProduct', 'Cosine'] as const satisfies readonly DistanceMetric[];

const manifestSchema = z.object({
	dimension: z.number().int().positive().nullable(),
	index_type: z.enum(INDEX_TYPE_VALUES),
	metric: z.enum(DISTANCE_METRIC_VALUES),
	current_idx: z.number().int().nonnegative(),
	embedding_model: z.string(),
	documents: z.record(
		z.string(),
		z.object({
			doc_id: z.string(),
			text: z.string(),
			metadata: z.record(z.string(), z.unknown()).nullish(),
		}),
	),
	doc_id_to_idx: z.record(z.string(), z.number().int().nonnegative()),
});

type IndexManifest = z.infer<typeof manifestSchema>;

/**
 * Text vector index: embeds texts through an {@link EmbeddingProvider} and keeps
 * (slot, id, text, metadata) entries over a nearest-neighbour structure.
 *
 * Slots are assigned in insertion order and never reused until a rebuild.
 * Deleting entries rebuilds the whole structure from the survivors.
 */
export class VectorIndex {
	readonly indexType: IndexType;
	readonly metric: DistanceMetric;
	private readonly provider: EmbeddingProvider;
	private dimension: number | null;
	private structure: VectorStructure | null = null;
	private documents = new Map<number, VectorDocument>();
	private docIdToSlot = new Map<string, number>();
	private currentIdx = 0;
	private readonly lock = new ReadWriteLock();
	private readonly structureOptions: {
		nlist: number;
		nprobe: number;
		hnswM: number;
		efConstruction?: number;
		efSearch?: number;
		seed?: number;
	};

	constructor(options: VectorIndexOptions) {
		this.provider = options.provider;
		this.indexType = options.indexType ?? 'Flat';
		this.metric = options.metric ?? 'L2';
		assertSupportedCombination(this.indexType, this.metric);
		if (options.dimension !== undefined && (!Number.isInteger(options.dimension) || options.dimension <= 0)) {
			throw new ConfigurationError(`Vector dimension must be a positive integer, got ${options.dimension}`);
		}
		this.dimension = options.dimension ?? null;
		this.structureOptions = {
			nlist: options.nlist ?? 100,
			nprobe: options.nprobe ?? 10,
			hnswM: options.hnswM ?? 32,
			efConstruction: options.efConstruction,
			efSearch: options.efSearch,
			seed: options.seed,
		};
	}

	get embeddingModel(): string {
		return this.provider.model;
	}

	/**
	 * Number of vectors in the structure.
	 */
	get size(): number {
		return this.structure?.size ?? 0;
	}

	/**
	 * Embed and store texts. Ids default to `doc_<slot>`.
	 * All texts are embedded before anything is inserted, so an embedding failure leaves the index untouched.
	 */
	async addTexts(texts: string[], metadatas?: Array<Record<string, unknown>>, ids?: string[]): Promise<string[]> {
		if (texts.length === 0) {
			return [];
		}
		if ((metadatas && metadatas.length !== texts.length) || (ids && ids.length !== texts.length)) {
			throw new ConfigurationError('metadatas and ids must match the number of texts');
		}

		const sw = new Stopwatch(`VectorIndex.addTexts(${texts.length})`);
		const embeddings = await sw.time('embed', () => this.provider.embedMany(texts));
		const added = await sw.time('insert', () =>
			this.lock.write(() => this.insert(texts, embeddings, metadatas, ids)),
		);
		console.debug(sw.toString());
		return added;
	}

	/**
	 * Search by query text. Returns hits best first; an empty index yields `[]`.
	 */
	search(query: string, topK?: number): Promise<VectorSearchHit[]>;
	search(query: string, topK: number, withScores: true): Promise<VectorSearchHit[]>;
	search(query: string, topK: number, withScores: false): Promise<VectorDocument[]>;
	async search(query: string, topK = 5, withScores = true): Promise<VectorSearchHit[] | VectorDocument[]> {
		if (this.size === 0) {
			return [];
		}
		const vector = await this.provider.embedOne(query);
		const hits = await this.lock.read(() => this.searchStructure(vector, topK));
		return withScores ? hits : hits.map((hit) => hit.document);
	}

	/**
	 * Search by a precomputed vector. Cosine indexes normalize it first.
	 */
	searchByVector(vector: Float32Array, topK?: number): Promise<VectorSearchHit[]>;
	searchByVector(vector: Float32Array, topK: number, withScores: true): Promise<VectorSearchHit[]>;
	searchByVector(vector: Float32Array, topK: number, withScores: false): Promise<VectorDocument[]>;
	async searchByVector(vector: Float32Array, topK = 5, withScores = true): Promise<VectorSearchHit[] | VectorDocument[]> {
		const hits = await this.lock.read(() => this.searchStructure(vector, topK));
		return withScores ? hits : hits.map((hit) => hit.document);
	}

	getDocumentById(docId: string): VectorDocument | null {
		const slot = this.docIdToSlot.get(docId);
		return slot === undefined ? null : (this.documents.get(slot) ?? null);
	}

	/**
	 * The vector as stored (normalized for Cosine), or null for an unknown id.
	 */
	getStoredVector(docId: string): Float32Array | null {
		const slot = this.docIdToSlot.get(docId);
		if (slot === undefined || !this.structure || slot >= this.structure.size) {
			return null;
		}
		return this.structure.getVector(slot);
	}

	/**
	 * Remove entries by id and rebuild the structure from the survivors in slot order.
	 * Survivors are re-embedded and receive new slots. Unknown ids are ignored.
	 *
	 * @returns number of entries removed
	 */
	async deleteByIds(docIds: string[]): Promise<number> {
		return this.lock.write(async () => {
			const removeSlots = new Set<number>();
			for (const docId of docIds) {
				const slot = this.docIdToSlot.get(docId);
				if (slot !== undefined) {
					removeSlots.add(slot);
				}
			}
			if (removeSlots.size === 0) {
				return 0;
			}

			const survivors = [...this.documents.entries()]
				.filter(([slot]) => !removeSlots.has(slot))
				.sort(([a], [b]) => a - b)
				.map(([, document]) => document);
			const embeddings = survivors.length > 0 ? await this.provider.embedMany(survivors.map((d) => d.text)) : [];

			this.resetState();
			if (survivors.length > 0) {
				this.insert(
					survivors.map((d) => d.text),
					embeddings,
					survivors.map((d) => d.metadata),
					survivors.map((d) => d.docId),
				);
			}
			console.info(`[VectorIndex] Removed ${removeSlots.size} entries, rebuilt with ${survivors.length}`);
			return removeSlots.size;
		});
	}

	async clear(): Promise<void> {
		await this.lock.write(() => {
			this.structure?.reset();
			this.documents.clear();
			this.docIdToSlot.clear();
			this.currentIdx = 0;
		});
	}

	getStats(): VectorIndexStats {
		return {
			totalDocuments: this.documents.size,
			totalVectors: this.size,
			dimension: this.dimension,
			indexType: this.indexType,
			metric: this.metric,
			embeddingModel: this.provider.model,
			isTrained: this.structure?.isTrained ?? this.indexType !== 'IVF',
		};
	}

	/**
	 * Write the structure and the JSON manifest into `directory`.
	 */
	async save(directory: string): Promise<void> {
		await this.lock.read(async () => {
			await fs.mkdir(directory, { recursive: true });
			const structure = this.structure ?? this.createEmptyStructure();
			if (structure) {
				await fs.writeFile(path.join(directory, VECTOR_INDEX_FILENAME), structure.serialize());
			}
			await fs.writeFile(
				path.join(directory, VECTOR_METADATA_FILENAME),
				JSON.stringify(this.toManifest(), null, 2),
				'utf8',
			);
		});
		console.info(`[VectorIndex] Saved ${this.documents.size} entries to ${directory}`);
	}

	/**
	 * Restore an index written by {@link save}. The provider is re-pointed at the recorded embedding model.
	 */
	static async load(
		directory: string,
		provider: EmbeddingProvider,
		options: Omit<VectorIndexOptions, 'provider' | 'indexType' | 'metric' | 'dimension'> = {},
	): Promise<VectorIndex> {
		let manifest: IndexManifest;
		try {
			const raw = await fs.readFile(path.join(directory, VECTOR_METADATA_FILENAME), 'utf8');
			manifest = manifestSchema.parse(JSON.parse(raw));
		} catch (error) {
			throw new ConfigurationError(`Failed to read vector index manifest in ${directory}: ${getErrorMessage(error)}`);
		}

		const indexType: IndexType = manifest.index_type;
		const metric: DistanceMetric = manifest.metric;
		const index = new VectorIndex({
			...options,
			provider: provider.model === manifest.embedding_model ? provider : provider.withModel(manifest.embedding_model),
			indexType,
			metric,
			dimension: manifest.dimension ?? undefined,
		});

		const structureFile = path.join(directory, VECTOR_INDEX_FILENAME);
		const buffer = await fs.readFile(structureFile).catch((error: unknown) => {
			if (manifest.current_idx > 0) {
				throw new ConfigurationError(`Missing vector index file ${structureFile}: ${getErrorMessage(error)}`);
			}
			return null;
		});
		if (buffer) {
			const structure = deserializeStructure(buffer);
			if (structure.kind !== indexType) {
				throw new ConfigurationError(`Index file holds ${structure.kind}, manifest says ${indexType}`);
			}
			index.structure = structure;
		}

		index.currentIdx = manifest.current_idx;
		for (const [slot, entry] of Object.entries(manifest.documents)) {
			index.documents.set(Number(slot), { docId: entry.doc_id, text: entry.text, metadata: entry.metadata ?? {} });
		}
		for (const [docId, slot] of Object.entries(manifest.doc_id_to_idx)) {
			index.docIdToSlot.set(docId, slot);
		}
		console.info(`[VectorIndex] Loaded ${index.size} vectors from ${directory}`);
		return index;
	}

	private insert(
		texts: string[],
		embeddings: Float32Array[],
		metadatas: Array<Record<string, unknown>> | undefined,
		ids: string[] | undefined,
	): string[] {
		const dimension = this.dimension ?? embeddings[0].length;
		for (const embedding of embeddings) {
			if (embedding.length !== dimension) {
				throw new DimensionMismatchError(dimension, embedding.length);
			}
		}
		this.dimension = dimension;

		const vectors = this.metric === 'Cosine' ? embeddings.map(normalizeVector) : embeddings;
		const structure = this.structure ?? createStructure(this.indexType, this.metric, dimension, this.structureOptions);
		this.structure = structure;
		if (!structure.isTrained) {
			console.info(`[VectorIndex] Training ${this.indexType} index on ${vectors.length} vectors`);
			structure.train(vectors);
		}

		const startIdx = this.currentIdx;
		structure.add(vectors);

		return texts.map((text, i) => {
			const slot = startIdx + i;
			const docId = ids?.[i] ?? `doc_${slot}`;
			this.documents.set(slot, { docId, text, metadata: metadatas?.[i] ?? {} });
			this.docIdToSlot.set(docId, slot);
			this.currentIdx++;
			return docId;
		});
	}

	private searchStructure(vector: Float32Array, topK: number): VectorSearchHit[] {
		const structure = this.structure;
		if (!structure || structure.size === 0 || topK <= 0) {
			return [];
		}
		if (vector.length !== structure.dimension) {
			throw new DimensionMismatchError(structure.dimension, vector.length);
		}
		const query = this.metric === 'Cosine' ? normalizeVector(vector) : vector;
		const hits: VectorSearchHit[] = [];
		for (const hit of structure.search(query, Math.min(topK, structure.size))) {
			if (hit.slot === -1) continue;
			const document = this.documents.get(hit.slot);
			if (!document) continue;
			hits.push({ document, score: distanceToScore(this.metric, hit.distance) });
		}
		return hits;
	}

	private resetState(): void {
		this.structure = null;
		this.documents.clear();
		this.docIdToSlot.clear();
		this.currentIdx = 0;
	}

	private createEmptyStructure(): VectorStructure | null {
		return this.dimension === null
			? null
			: createStructure(this.indexType, this.metric, this.dimension, this.structureOptions);
	}

	private toManifest(): IndexManifest {
		return {
			dimension: this.dimension,
			index_type: this.indexType,
			metric: this.metric,
			current_idx: this.currentIdx,
			embedding_model: this.provider.model,
			documents: Object.fromEntries(
				[...this.documents.entries()].map(([slot, d]) => [
					String(slot),
					{ doc_id: d.docId, text: d.text, metadata: d.metadata },
				]),
			),
			doc_id_to_idx: Object.fromEntries(this.docIdToSlot),
		};
	}
}

