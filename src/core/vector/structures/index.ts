import { ConfigurationError } from '@/core/errors';
import type { DistanceMetric, IndexType, VectorStructure } from '../types';
import { toStructureMetric } from '../metric';
import { readStructureHeader } from './BaseStructure';
import { BinaryReader } from './binary';
import { FlatStructure } from './FlatStructure';
import { HnswStructure } from './HnswStructure';
import { IvfStructure } from './IvfStructure';

export interface StructureOptions {
	nlist: number;
	nprobe: number;
	hnswM: number;
	efConstruction?: number;
	efSearch?: number;
	seed?: number;
}

/**
 * Reject index/metric pairs that have no structure behind them.
 * IVF supports L2 and inner product; HNSW supports L2 only.
 */
export function assertSupportedCombination(indexType: IndexType, metric: DistanceMetric): void {
	if (indexType === 'IVF' && metric === 'Cosine') {
		throw new ConfigurationError('IVF index does not support the Cosine metric');
	}
	if (indexType === 'HNSW' && metric !== 'L2') {
		throw new ConfigurationError(`HNSW index only supports the L2 metric, got ${metric}`);
	}
}

export function createStructure(
	indexType: IndexType,
	metric: DistanceMetric,
	dimension: number,
	options: StructureOptions,
): VectorStructure {
	assertSupportedCombination(indexType, metric);
	const structureMetric = toStructureMetric(metric);
	switch (indexType) {
		case 'Flat':
			return new FlatStructure(structureMetric, dimension);
		case 'IVF':
			return new IvfStructure(structureMetric, dimension, {
				nlist: options.nlist,
				nprobe: options.nprobe,
				seed: options.seed,
			});
		case 'HNSW':
			return new HnswStructure(dimension, {
				m: options.hnswM,
				efConstruction: options.efConstruction,
				efSearch: options.efSearch,
				seed: options.seed,
			});
	}
}

export function deserializeStructure(buffer: Buffer): VectorStructure {
	const reader = new BinaryReader(buffer);
	const { kind, metric, dimension, vectors } = readStructureHeader(reader);
	switch (kind) {
		case 'Flat':
			return FlatStructure.restore(metric, dimension, vectors);
		case 'IVF':
			return IvfStructure.restore(metric, dimension, vectors, reader);
		case 'HNSW':
			return HnswStructure.restore(dimension, vectors, reader);
	}
}
