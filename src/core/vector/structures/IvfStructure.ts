import { ConfigurationError, IndexNotTrainedError } from '@/core/errors';
import { SeededRandom } from '@/core/utils/hash-utils';
import type { StructureHit, StructureMetric } from '../types';
import { compareHits, selectTopK, structureDistance } from '../metric';
import { BaseStructure } from './BaseStructure';
import type { BinaryReader, BinaryWriter } from './binary';

export interface IvfOptions {
	/**
	 * Number of k-means centroids (inverted lists). Capped at the training set size.
	 */
	nlist: number;
	/**
	 * Lists scanned per query.
	 */
	nprobe: number;
	seed?: number;
	trainIterations?: number;
}

const DEFAULT_TRAIN_ITERATIONS = 20;
const DEFAULT_SEED = 42;

/**
 * Inverted-file index: vectors are bucketed by their nearest k-means centroid
 * and a query only scans the `nprobe` closest buckets.
 */
export class IvfStructure extends BaseStructure {
	readonly kind = 'IVF' as const;
	private centroids: Float32Array[] = [];
	private lists: number[][] = [];
	private readonly nlist: number;
	private readonly nprobe: number;
	private readonly seed: number;
	private readonly trainIterations: number;

	constructor(metric: StructureMetric, dimension: number, options: IvfOptions) {
		super(metric, dimension);
		if (options.nlist <= 0 || options.nprobe <= 0) {
			throw new ConfigurationError('IVF nlist and nprobe must be positive');
		}
		this.nlist = options.nlist;
		this.nprobe = options.nprobe;
		this.seed = options.seed ?? DEFAULT_SEED;
		this.trainIterations = options.trainIterations ?? DEFAULT_TRAIN_ITERATIONS;
	}

	get isTrained(): boolean {
		return this.centroids.length > 0;
	}

	get listCount(): number {
		return this.centroids.length;
	}

	/**
	 * Learn centroids with Lloyd's k-means from deterministically sampled seeds.
	 */
	train(vectors: Float32Array[]): void {
		if (vectors.length === 0) {
			throw new ConfigurationError('IVF training needs at least one vector');
		}
		vectors.forEach((v) => this.assertDimension(v));

		const k = Math.min(this.nlist, vectors.length);
		const random = new SeededRandom(this.seed);
		const order = vectors.map((_, i) => i);
		for (let i = order.length - 1; i > 0; i--) {
			const j = Math.floor(random.next() * (i + 1));
			[order[i], order[j]] = [order[j], order[i]];
		}
		let centroids = order.slice(0, k).map((i) => Float32Array.from(vectors[i]));

		for (let iteration = 0; iteration < this.trainIterations; iteration++) {
			const sums = centroids.map(() => new Float64Array(this.dimension));
			const counts = new Array<number>(k).fill(0);
			for (const vector of vectors) {
				const c = this.nearestCentroid(vector, centroids);
				counts[c]++;
				for (let d = 0; d < this.dimension; d++) {
					sums[c][d] += vector[d];
				}
			}
			// Empty clusters keep their previous centroid.
			centroids = centroids.map((previous, c) =>
				counts[c] === 0 ? previous : Float32Array.from(sums[c], (sum) => sum / counts[c]),
			);
		}

		this.centroids = centroids;
		this.lists = centroids.map(() => []);
		this.vectors.forEach((vector, slot) => this.onAdded(slot, vector));
	}

	add(vectors: Float32Array[]): void {
		if (!this.isTrained) {
			throw new IndexNotTrainedError('IVF index must be trained before vectors are added');
		}
		super.add(vectors);
	}

	search(query: Float32Array, k: number): StructureHit[] {
		if (!this.isTrained) {
			throw new IndexNotTrainedError();
		}
		this.assertDimension(query);

		const probes = this.centroids
			.map((centroid, slot) => ({ slot, distance: structureDistance(this.metric, query, centroid) }))
			.sort((a, b) => compareHits(this.metric, a, b))
			.slice(0, this.nprobe);

		const hits: StructureHit[] = [];
		for (const probe of probes) {
			for (const slot of this.lists[probe.slot]) {
				hits.push({ slot, distance: structureDistance(this.metric, query, this.vectors[slot]) });
			}
		}
		return selectTopK(this.metric, hits, Math.min(k, this.vectors.length));
	}

	reset(): void {
		super.reset();
		this.lists = this.centroids.map(() => []);
	}

	protected onAdded(slot: number, vector: Float32Array): void {
		this.lists[this.nearestCentroid(vector, this.centroids)].push(slot);
	}

	protected writeBody(writer: BinaryWriter): void {
		writer
			.writeUint32(this.nlist)
			.writeUint32(this.nprobe)
			.writeUint32(this.seed)
			.writeUint32(this.trainIterations)
			.writeUint32(this.centroids.length);
		for (const centroid of this.centroids) {
			writer.writeFloat32Array(centroid);
		}
		for (const list of this.lists) {
			writer.writeUint32Array(list);
		}
	}

	static restore(metric: StructureMetric, dimension: number, vectors: Float32Array[], reader: BinaryReader): IvfStructure {
		const nlist = reader.readUint32();
		const nprobe = reader.readUint32();
		const seed = reader.readUint32();
		const trainIterations = reader.readUint32();
		const structure = new IvfStructure(metric, dimension, { nlist, nprobe, seed, trainIterations });
		const centroidCount = reader.readUint32();
		for (let i = 0; i < centroidCount; i++) {
			structure.centroids.push(reader.readFloat32Array(dimension));
		}
		for (let i = 0; i < centroidCount; i++) {
			structure.lists.push(reader.readUint32Array());
		}
		structure.vectors = vectors;
		return structure;
	}

	private nearestCentroid(vector: Float32Array, centroids: Float32Array[]): number {
		let best = 0;
		let bestDistance = structureDistance(this.metric, vector, centroids[0]);
		for (let c = 1; c < centroids.length; c++) {
			const distance = structureDistance(this.metric, vector, centroids[c]);
			const better = this.metric === 'L2' ? distance < bestDistance : distance > bestDistance;
			if (better) {
				best = c;
				bestDistance = distance;
			}
		}
		return best;
	}
}
