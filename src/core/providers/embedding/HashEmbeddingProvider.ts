import { fnv1a32 } from '@/core/utils/hash-utils';
import { BaseEmbeddingProvider } from './BaseEmbeddingProvider';

export const DEFAULT_HASH_EMBEDDING_DIMENSION = 384;

/**
 * Offline, deterministic embeddings built by feature hashing.
 *
 * Every lower-cased token adds a pseudo-random unit direction seeded by its hash,
 * so texts that share tokens get similar vectors. Useful without an embedding
 * service and in tests.
 */
export class HashEmbeddingProvider extends BaseEmbeddingProvider {
	readonly providerId = 'hash';
	private readonly size: number;

	constructor(options: { model?: string; dimension?: number } = {}) {
		const dimension = options.dimension ?? DEFAULT_HASH_EMBEDDING_DIMENSION;
		super(options.model ?? `hash-${dimension}`, dimension);
		this.size = dimension;
	}

	withModel(model: string): HashEmbeddingProvider {
		return new HashEmbeddingProvider({ model, dimension: this.size });
	}

	protected async requestEmbeddings(texts: string[]): Promise<number[][]> {
		return texts.map((text) => this.embedText(text));
	}

	private embedText(text: string): number[] {
		const vector = new Array<number>(this.size).fill(0);
		const tokens = tokenize(text);
		for (const token of tokens.length > 0 ? tokens : [text]) {
			let state = fnv1a32(token);
			for (let i = 0; i < this.size; i++) {
				state = (Math.imul(state, 1664525) + 1013904223) >>> 0;
				vector[i] += (state / 0xffffffff) * 2 - 1;
			}
		}
		return normalize(vector);
	}
}

/**
 * Lower-cased word tokens; CJK text is split per character.
 */
function tokenize(text: string): string[] {
	return text.toLowerCase().match(/[\p{Script=Han}]|[\p{L}\p{N}]+/gu) ?? [];
}

function normalize(vector: number[]): number[] {
	let sumSquares = 0;
	for (const value of vector) {
		sumSquares += value * value;
	}
	const norm = Math.sqrt(sumSquares) || 1;
	return vector.map((value) => value / norm);
}
