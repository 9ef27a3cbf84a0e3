import { ConfigurationError } from '@/core/errors';
import { INDEX_TYPES, type IndexType, type StructureHit, type StructureMetric, type VectorStructure } from '../types';
import { BinaryReader, BinaryWriter } from './binary';

const MAGIC = 'RVIX';
const FORMAT_VERSION = 1;

const KIND_CODES: Record<IndexType, number> = { Flat: 0, IVF: 1, HNSW: 2 };
const METRIC_CODES: Record<StructureMetric, number> = { L2: 0, InnerProduct: 1 };
const STRUCTURE_METRICS: readonly StructureMetric[] = ['L2', 'InnerProduct'];

export interface StructureHeader {
	kind: IndexType;
	metric: StructureMetric;
	dimension: number;
	vectors: Float32Array[];
}

/**
 * Vector storage shared by all structures: slot i holds vectors[i].
 */
export abstract class BaseStructure implements VectorStructure {
	abstract readonly kind: IndexType;
	protected vectors: Float32Array[] = [];

	protected constructor(
		readonly metric: StructureMetric,
		readonly dimension: number,
	) {
		if (!Number.isInteger(dimension) || dimension <= 0) {
			throw new ConfigurationError(`Vector dimension must be a positive integer, got ${dimension}`);
		}
	}

	get size(): number {
		return this.vectors.length;
	}

	abstract get isTrained(): boolean;

	abstract train(vectors: Float32Array[]): void;

	add(vectors: Float32Array[]): void {
		for (const vector of vectors) {
			this.assertDimension(vector);
		}
		for (const vector of vectors) {
			const slot = this.vectors.length;
			this.vectors.push(vector);
			this.onAdded(slot, vector);
		}
	}

	abstract search(query: Float32Array, k: number): StructureHit[];

	getVector(slot: number): Float32Array {
		const vector = this.vectors[slot];
		if (!vector) {
			throw new RangeError(`Slot ${slot} is out of range (size ${this.vectors.length})`);
		}
		return vector;
	}

	reset(): void {
		this.vectors = [];
	}

	serialize(): Buffer {
		const writer = new BinaryWriter()
			.writeAscii(MAGIC)
			.writeUint8(FORMAT_VERSION)
			.writeUint8(KIND_CODES[this.kind])
			.writeUint8(METRIC_CODES[this.metric])
			.writeUint32(this.dimension)
			.writeUint32(this.vectors.length);
		for (const vector of this.vectors) {
			writer.writeFloat32Array(vector);
		}
		this.writeBody(writer);
		return writer.toBuffer();
	}

	/**
	 * Index the vector just stored at `slot`.
	 */
	protected abstract onAdded(slot: number, vector: Float32Array): void;

	/**
	 * Structure-specific state written after the vectors.
	 */
	protected abstract writeBody(writer: BinaryWriter): void;

	protected assertDimension(vector: Float32Array): void {
		if (vector.length !== this.dimension) {
			throw new ConfigurationError(`Vector has dimension ${vector.length}, index expects ${this.dimension}`);
		}
	}
}

/**
 * Read the common header and vectors. The reader is left at the structure body.
 */
export function readStructureHeader(reader: BinaryReader): StructureHeader {
	const magic = reader.readAscii(MAGIC.length);
	if (magic !== MAGIC) {
		throw new ConfigurationError('Not a vector index file');
	}
	const version = reader.readUint8();
	if (version !== FORMAT_VERSION) {
		throw new ConfigurationError(`Unsupported vector index format version ${version}`);
	}
	const kindCode = reader.readUint8();
	const metricCode = reader.readUint8();
	const kind = INDEX_TYPES.find((k) => KIND_CODES[k] === kindCode);
	const metric = STRUCTURE_METRICS.find((m) => METRIC_CODES[m] === metricCode);
	if (!kind || !metric) {
		throw new ConfigurationError(`Unknown index kind ${kindCode} or metric ${metricCode}`);
	}
	const dimension = reader.readUint32();
	const count = reader.readUint32();
	const vectors: Float32Array[] = [];
	for (let i = 0; i < count; i++) {
		vectors.push(reader.readFloat32Array(dimension));
	}
	return { kind, metric, dimension, vectors };
}
