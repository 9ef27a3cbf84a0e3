import { BusinessError, DimensionMismatchError, EmbeddingUnavailableError, getErrorMessage } from '@/core/errors';
import type { EmbeddingProvider } from './types';

const DIMENSION_PROBE_TEXT = 'dimension probe';

/**
 * Shared dimension bookkeeping and error mapping for embedding providers.
 *
 * Subclasses only fetch raw vectors. Anything that is not already a
 * BusinessError becomes an EmbeddingUnavailableError; the first vector fixes
 * the dimension and later vectors of another length raise DimensionMismatchError.
 */
export abstract class BaseEmbeddingProvider implements EmbeddingProvider {
	abstract readonly providerId: string;
	private cachedDimension: number | null;

	protected constructor(
		readonly model: string,
		dimension?: number,
	) {
		this.cachedDimension = dimension ?? null;
	}

	get dimension(): number | null {
		return this.cachedDimension;
	}

	async embedOne(text: string): Promise<Float32Array> {
		const [vector] = await this.embedMany([text]);
		return vector;
	}

	async embedMany(texts: string[]): Promise<Float32Array[]> {
		if (texts.length === 0) {
			return [];
		}

		let raw: number[][];
		try {
			raw = await this.requestEmbeddings(texts);
		} catch (error) {
			if (error instanceof BusinessError) {
				throw error;
			}
			throw new EmbeddingUnavailableError(
				`[${this.providerId}] embedding request failed for model ${this.model}: ${getErrorMessage(error)}`,
				error,
			);
		}

		if (raw.length !== texts.length) {
			throw new EmbeddingUnavailableError(
				`[${this.providerId}] expected ${texts.length} embeddings, received ${raw.length}`,
			);
		}
		return raw.map((values) => this.toVector(values));
	}

	async getDimension(): Promise<number> {
		if (this.cachedDimension === null) {
			await this.embedOne(DIMENSION_PROBE_TEXT);
		}
		if (this.cachedDimension === null) {
			throw new EmbeddingUnavailableError(`[${this.providerId}] could not determine embedding dimension`);
		}
		return this.cachedDimension;
	}

	abstract withModel(model: string): EmbeddingProvider;

	/**
	 * Fetch one raw vector per input text, in order.
	 */
	protected abstract requestEmbeddings(texts: string[]): Promise<number[][]>;

	private toVector(values: number[]): Float32Array {
		if (values.length === 0 || values.some((v) => typeof v !== 'number' || !Number.isFinite(v))) {
			throw new EmbeddingUnavailableError(`[${this.providerId}] malformed embedding returned for model ${this.model}`);
		}
		if (this.cachedDimension === null) {
			this.cachedDimension = values.length;
		} else if (values.length !== this.cachedDimension) {
			throw new DimensionMismatchError(this.cachedDimension, values.length);
		}
		return Float32Array.from(values);
	}
}
