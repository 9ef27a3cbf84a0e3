import { embedMany, type EmbeddingModel } from 'ai';
import { BaseEmbeddingProvider } from './BaseEmbeddingProvider';

/**
 * Creates an ai-sdk embedding model for a model id.
 */
export type EmbeddingModelFactory = (modelId: string) => EmbeddingModel<string>;

export interface AiSdkEmbeddingOptions {
	providerId: string;
	model: string;
	createModel: EmbeddingModelFactory;
	dimension?: number;
	maxRetries?: number;
}

/**
 * Embeddings through the ai-sdk `embedMany` call, for any provider that
 * exposes a text embedding model (OpenAI-compatible endpoints, Ollama).
 */
export class AiSdkEmbeddingProvider extends BaseEmbeddingProvider {
	readonly providerId: string;
	private readonly embeddingModel: EmbeddingModel<string>;

	constructor(private readonly options: AiSdkEmbeddingOptions) {
		super(options.model, options.dimension);
		this.providerId = options.providerId;
		this.embeddingModel = options.createModel(options.model);
	}

	withModel(model: string): AiSdkEmbeddingProvider {
		return new AiSdkEmbeddingProvider({ ...this.options, model, dimension: undefined });
	}

	protected async requestEmbeddings(texts: string[]): Promise<number[][]> {
		const result = await embedMany({
			model: this.embeddingModel,
			values: texts,
			maxRetries: this.options.maxRetries ?? 2,
		});
		return result.embeddings;
	}
}
