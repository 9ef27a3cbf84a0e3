/**
 * Turns text into fixed-dimension float32 vectors.
 */
export interface EmbeddingProvider {
	/**
	 * Provider kind, recorded for diagnostics.
	 */
	readonly providerId: string;
	readonly model: string;
	/**
	 * Null until the first successful call.
	 */
	readonly dimension: number | null;
	embedOne(text: string): Promise<Float32Array>;
	embedMany(texts: string[]): Promise<Float32Array[]>;
	/**
	 * Cached dimension, probing the service once when it is not known yet.
	 */
	getDimension(): Promise<number>;
	/**
	 * Same provider kind and connection, pointed at another model.
	 */
	withModel(model: string): EmbeddingProvider;
}

export type EmbeddingProviderType = 'ollama' | 'ollama-ai-sdk' | 'openai' | 'hash';
