import { z } from 'zod';
import { trimTrailingSlash } from '@/core/utils/format-utils';
import { BaseEmbeddingProvider } from './BaseEmbeddingProvider';

export const OLLAMA_DEFAULT_BASE = 'http://localhost:11434';
export const DEFAULT_OLLAMA_EMBEDDING_TIMEOUT_MS = 30000;

const ollamaEmbeddingResponseSchema = z.object({
	embedding: z.array(z.number()),
});

export interface OllamaEmbeddingOptions {
	model: string;
	baseUrl?: string;
	timeoutMs?: number;
	dimension?: number;
}

/**
 * Embeddings from Ollama's `/api/embeddings` endpoint, one request per text.
 */
export class OllamaEmbeddingProvider extends BaseEmbeddingProvider {
	readonly providerId = 'ollama';
	private readonly baseUrl: string;
	private readonly timeoutMs: number;

	constructor(private readonly options: OllamaEmbeddingOptions) {
		super(options.model, options.dimension);
		this.baseUrl = trimTrailingSlash(options.baseUrl ?? OLLAMA_DEFAULT_BASE);
		this.timeoutMs = options.timeoutMs ?? DEFAULT_OLLAMA_EMBEDDING_TIMEOUT_MS;
	}

	withModel(model: string): OllamaEmbeddingProvider {
		return new OllamaEmbeddingProvider({ ...this.options, model, dimension: undefined });
	}

	protected async requestEmbeddings(texts: string[]): Promise<number[][]> {
		const embeddings: number[][] = [];
		for (const text of texts) {
			embeddings.push(await this.requestOne(text));
		}
		return embeddings;
	}

	private async requestOne(text: string): Promise<number[]> {
		const response = await fetch(`${this.baseUrl}/api/embeddings`, {
			method: 'POST',
			headers: { 'Content-Type': 'application/json' },
			body: JSON.stringify({ model: this.model, prompt: text }),
			signal: AbortSignal.timeout(this.timeoutMs),
		});

		if (!response.ok) {
			const errorText = await response.text().catch(() => 'Unknown error');
			throw new Error(`Ollama embedding API error: ${response.status} ${response.statusText}. ${errorText}`);
		}

		const data: unknown = await response.json();
		const parsed = ollamaEmbeddingResponseSchema.safeParse(data);
		if (!parsed.success) {
			throw new Error(`Invalid embedding API response: ${parsed.error.issues.map((i) => i.message).join(', ')}`);
		}
		return parsed.data.embedding;
	}
}
