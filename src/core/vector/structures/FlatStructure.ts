import type { StructureHit, StructureMetric } from '../types';
import { selectTopK, structureDistance } from '../metric';
import { BaseStructure } from './BaseStructure';

/**
 * Exact search by scanning every stored vector.
 */
export class FlatStructure extends BaseStructure {
	readonly kind = 'Flat' as const;

	constructor(metric: StructureMetric, dimension: number) {
		super(metric, dimension);
	}

	get isTrained(): boolean {
		return true;
	}

	train(): void {
		// Nothing to learn.
	}

	search(query: Float32Array, k: number): StructureHit[] {
		this.assertDimension(query);
		const hits = this.vectors.map((vector, slot) => ({
			slot,
			distance: structureDistance(this.metric, query, vector),
		}));
		return selectTopK(this.metric, hits, Math.min(k, hits.length));
	}

	protected onAdded(): void {
		// Vectors are scanned directly.
	}

	protected writeBody(): void {
		// No state beyond the vectors.
	}

	static restore(metric: StructureMetric, dimension: number, vectors: Float32Array[]): FlatStructure {
		const structure = new FlatStructure(metric, dimension);
		structure.vectors = vectors;
		return structure;
	}
}
