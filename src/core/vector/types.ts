/**
 * Nearest-neighbour structure kinds.
 * - Flat: exact exhaustive scan
 * - IVF: inverted file over k-means centroids (approximate, needs training)
 * - HNSW: hierarchical navigable small-world graph (approximate)
 */
export type IndexType = 'Flat' | 'IVF' | 'HNSW';

/**
 * Distance metrics.
 * - L2: squared euclidean distance, scored as 1 / (1 + distance)
 * - InnerProduct: raw dot product as the score
 * - Cosine: unit-normalized vectors compared by dot product
 */
export type DistanceMetric = 'L2' | 'InnerProduct' | 'Cosine';

export const INDEX_TYPES: readonly IndexType[] = ['Flat', 'IVF', 'HNSW'];
export const DISTANCE_METRICS: readonly DistanceMetric[] = ['L2', 'InnerProduct', 'Cosine'];

/**
 * Metric as seen by a structure: cosine is inner product over normalized vectors.
 */
export type StructureMetric = 'L2' | 'InnerProduct';

/**
 * Raw neighbour returned by a structure. `slot` is -1 when there is no match.
 * `distance` is the structure's native value: squared L2 distance, or the dot product.
 */
export interface StructureHit {
	slot: number;
	distance: number;
}

/**
 * Nearest-neighbour structure over sequential slots. Vectors are appended, never removed.
 */
export interface VectorStructure {
	readonly kind: IndexType;
	readonly metric: StructureMetric;
	readonly dimension: number;
	readonly size: number;
	readonly isTrained: boolean;
	train(vectors: Float32Array[]): void;
	/**
	 * Append vectors; the first gets slot `size`.
	 */
	add(vectors: Float32Array[]): void;
	search(query: Float32Array, k: number): StructureHit[];
	getVector(slot: number): Float32Array;
	reset(): void;
	serialize(): Buffer;
}

/**
 * Stored entry behind a slot.
 */
export interface VectorDocument {
	docId: string;
	text: string;
	metadata: Record<string, unknown>;
}

export interface VectorSearchHit {
	document: VectorDocument;
	score: number;
}

export interface VectorIndexStats {
	totalDocuments: number;
	totalVectors: number;
	dimension: number | null;
	indexType: IndexType;
	metric: DistanceMetric;
	embeddingModel: string;
	isTrained: boolean;
}
