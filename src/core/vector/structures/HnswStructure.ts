import { ConfigurationError } from '@/core/errors';
import { SeededRandom } from '@/core/utils/hash-utils';
import type { StructureHit } from '../types';
import { compareHits, selectTopK, squaredL2 } from '../metric';
import { BaseStructure } from './BaseStructure';
import type { BinaryReader, BinaryWriter } from './binary';

export interface HnswOptions {
	/**
	 * Links per node on upper layers; layer 0 keeps twice as many.
	 */
	m: number;
	efConstruction?: number;
	efSearch?: number;
	seed?: number;
}

const DEFAULT_EF_CONSTRUCTION = 40;
const DEFAULT_EF_SEARCH = 16;
const DEFAULT_SEED = 42;

const byDistance = (a: StructureHit, b: StructureHit) => compareHits('L2', a, b);

/**
 * Hierarchical navigable small-world graph over squared L2 distance.
 * Node levels come from a seeded generator whose state is persisted, so a
 * reloaded graph keeps growing exactly as the saved one would have.
 */
export class HnswStructure extends BaseStructure {
	readonly kind = 'HNSW' as const;
	private readonly m: number;
	private readonly efConstruction: number;
	private readonly efSearch: number;
	private readonly levelMultiplier: number;
	private random: SeededRandom;
	/** links[slot][layer] */
	private links: number[][][] = [];
	private entryPoint = -1;
	private maxLevel = -1;

	constructor(dimension: number, options: HnswOptions) {
		super('L2', dimension);
		if (!Number.isInteger(options.m) || options.m < 2) {
			throw new ConfigurationError(`HNSW M must be an integer >= 2, got ${options.m}`);
		}
		this.m = options.m;
		this.efConstruction = options.efConstruction ?? DEFAULT_EF_CONSTRUCTION;
		this.efSearch = options.efSearch ?? DEFAULT_EF_SEARCH;
		this.levelMultiplier = 1 / Math.log(this.m);
		this.random = new SeededRandom(options.seed ?? DEFAULT_SEED);
	}

	get isTrained(): boolean {
		return true;
	}

	train(): void {
		// The graph is built incrementally.
	}

	search(query: Float32Array, k: number): StructureHit[] {
		this.assertDimension(query);
		const limit = Math.min(k, this.vectors.length);
		if (limit <= 0 || this.entryPoint < 0) {
			return [];
		}
		let entry = this.entryPoint;
		for (let layer = this.maxLevel; layer > 0; layer--) {
			entry = this.searchLayer(query, [entry], 1, layer)[0].slot;
		}
		const found = this.searchLayer(query, [entry], Math.max(this.efSearch, limit), 0);
		return selectTopK('L2', found, limit);
	}

	reset(): void {
		super.reset();
		this.links = [];
		this.entryPoint = -1;
		this.maxLevel = -1;
	}

	protected onAdded(slot: number, vector: Float32Array): void {
		const level = this.drawLevel();
		this.links[slot] = Array.from({ length: level + 1 }, () => []);

		if (this.entryPoint < 0) {
			this.entryPoint = slot;
			this.maxLevel = level;
			return;
		}

		let entry = this.entryPoint;
		for (let layer = this.maxLevel; layer > level; layer--) {
			entry = this.searchLayer(vector, [entry], 1, layer)[0].slot;
		}

		let entries = [entry];
		for (let layer = Math.min(level, this.maxLevel); layer >= 0; layer--) {
			const candidates = this.searchLayer(vector, entries, this.efConstruction, layer);
			const neighbours = candidates.slice(0, this.m).map((hit) => hit.slot);
			this.links[slot][layer] = neighbours;
			for (const neighbour of neighbours) {
				this.connect(neighbour, slot, layer);
			}
			entries = candidates.map((hit) => hit.slot);
		}

		if (level > this.maxLevel) {
			this.entryPoint = slot;
			this.maxLevel = level;
		}
	}

	protected writeBody(writer: BinaryWriter): void {
		writer
			.writeUint32(this.m)
			.writeUint32(this.efConstruction)
			.writeUint32(this.efSearch)
			.writeUint32(this.random.state)
			.writeInt32(this.entryPoint)
			.writeInt32(this.maxLevel);
		for (const layers of this.links) {
			writer.writeUint32(layers.length);
			for (const neighbours of layers) {
				writer.writeUint32Array(neighbours);
			}
		}
	}

	static restore(dimension: number, vectors: Float32Array[], reader: BinaryReader): HnswStructure {
		const m = reader.readUint32();
		const efConstruction = reader.readUint32();
		const efSearch = reader.readUint32();
		const seed = reader.readUint32();
		const structure = new HnswStructure(dimension, { m, efConstruction, efSearch, seed });
		structure.entryPoint = reader.readInt32();
		structure.maxLevel = reader.readInt32();
		for (let slot = 0; slot < vectors.length; slot++) {
			const layerCount = reader.readUint32();
			const layers: number[][] = [];
			for (let layer = 0; layer < layerCount; layer++) {
				layers.push(reader.readUint32Array());
			}
			structure.links.push(layers);
		}
		structure.vectors = vectors;
		return structure;
	}

	private drawLevel(): number {
		// 1 - next() lies in (0, 1], so the log is finite.
		return Math.floor(-Math.log(1 - this.random.next()) * this.levelMultiplier);
	}

	private maxLinks(layer: number): number {
		return layer === 0 ? this.m * 2 : this.m;
	}

	private connect(from: number, to: number, layer: number): void {
		const neighbours = this.links[from][layer];
		neighbours.push(to);
		if (neighbours.length > this.maxLinks(layer)) {
			const origin = this.vectors[from];
			this.links[from][layer] = neighbours
				.map((slot) => ({ slot, distance: squaredL2(origin, this.vectors[slot]) }))
				.sort(byDistance)
				.slice(0, this.maxLinks(layer))
				.map((hit) => hit.slot);
		}
	}

	/**
	 * Greedy best-first search on one layer. Returns up to `ef` hits, closest first.
	 */
	private searchLayer(query: Float32Array, entries: number[], ef: number, layer: number): StructureHit[] {
		const visited = new Set(entries);
		const start = entries.map((slot) => ({ slot, distance: squaredL2(query, this.vectors[slot]) }));
		const candidates = [...start].sort(byDistance);
		let results = [...start].sort(byDistance).slice(0, ef);

		while (candidates.length > 0) {
			const current = candidates.shift();
			if (!current) break;
			const furthest = results[results.length - 1];
			if (results.length >= ef && current.distance > furthest.distance) {
				break;
			}
			for (const neighbour of this.links[current.slot][layer] ?? []) {
				if (visited.has(neighbour)) continue;
				visited.add(neighbour);
				const hit = { slot: neighbour, distance: squaredL2(query, this.vectors[neighbour]) };
				const worst = results[results.length - 1];
				if (results.length < ef || hit.distance < worst.distance) {
					candidates.push(hit);
					candidates.sort(byDistance);
					results.push(hit);
					results.sort(byDistance);
					if (results.length > ef) {
						results = results.slice(0, ef);
					}
				}
			}
		}
		return results;
	}
}
