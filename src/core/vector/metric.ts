import { NORMALIZE_EPSILON } from '@/core/constant';
import type { DistanceMetric, StructureHit, StructureMetric } from './types';

export function dot(a: Float32Array, b: Float32Array): number {
	let sum = 0;
	for (let i = 0; i < a.length; i++) {
		sum += a[i] * b[i];
	}
	return sum;
}

/**
 * Squared euclidean distance (what an L2 structure ranks by).
 */
export function squaredL2(a: Float32Array, b: Float32Array): number {
	let sum = 0;
	for (let i = 0; i < a.length; i++) {
		const diff = a[i] - b[i];
		sum += diff * diff;
	}
	return sum;
}

export function l2Norm(v: Float32Array): number {
	return Math.sqrt(dot(v, v));
}

/**
 * Unit-length copy of `v`. The epsilon keeps a zero vector at zero.
 */
export function normalizeVector(v: Float32Array): Float32Array {
	const norm = l2Norm(v) + NORMALIZE_EPSILON;
	const out = new Float32Array(v.length);
	for (let i = 0; i < v.length; i++) {
		out[i] = v[i] / norm;
	}
	return out;
}

/**
 * Native distance for a structure metric: squared L2, or the dot product.
 */
export function structureDistance(metric: StructureMetric, a: Float32Array, b: Float32Array): number {
	return metric === 'L2' ? squaredL2(a, b) : dot(a, b);
}

/**
 * Negative when `a` ranks before `b`. Equal distances keep the lower slot first.
 */
export function compareHits(metric: StructureMetric, a: StructureHit, b: StructureHit): number {
	if (a.distance !== b.distance) {
		return metric === 'L2' ? a.distance - b.distance : b.distance - a.distance;
	}
	return a.slot - b.slot;
}

/**
 * Sentinel distance for padded "no match" hits.
 */
export function worstDistance(metric: StructureMetric): number {
	return metric === 'L2' ? Number.POSITIVE_INFINITY : Number.NEGATIVE_INFINITY;
}

export function toStructureMetric(metric: DistanceMetric): StructureMetric {
	return metric === 'L2' ? 'L2' : 'InnerProduct';
}

/**
 * Turn a native distance into a relevance score (higher is better).
 */
export function distanceToScore(metric: DistanceMetric, distance: number): number {
	return metric === 'L2' ? 1 / (1 + distance) : distance;
}

/**
 * Top `k` of `hits` by the metric's ordering, padded with slot -1 when fewer are available.
 */
export function selectTopK(metric: StructureMetric, hits: StructureHit[], k: number): StructureHit[] {
	const sorted = [...hits].sort((a, b) => compareHits(metric, a, b)).slice(0, k);
	while (sorted.length < k) {
		sorted.push({ slot: -1, distance: worstDistance(metric) });
	}
	return sorted;
}
