import { createOpenAI } from '@ai-sdk/openai';
import { createOllama } from 'ollama-ai-provider-v2';
import type { EmbeddingSettings } from '@/app/settings/types';
import { ConfigurationError } from '@/core/errors';
import { trimTrailingSlash } from '@/core/utils/format-utils';
import { AiSdkEmbeddingProvider } from './AiSdkEmbeddingProvider';
import { HashEmbeddingProvider } from './HashEmbeddingProvider';
import { OllamaEmbeddingProvider } from './OllamaEmbeddingProvider';
import type { EmbeddingProvider } from './types';

/**
 * Build the embedding provider named by the settings.
 *
 * @param model - Overrides `settings.model` (knowledge bases carry their own model name).
 */
export function createEmbeddingProvider(settings: EmbeddingSettings, model?: string): EmbeddingProvider {
	const modelId = model || settings.model;
	switch (settings.provider) {
		case 'ollama':
			return new OllamaEmbeddingProvider({
				model: modelId,
				baseUrl: settings.baseUrl,
				timeoutMs: settings.timeoutMs,
			});
		case 'ollama-ai-sdk': {
			const ollama = createOllama({ baseURL: `${trimTrailingSlash(settings.baseUrl)}/api` });
			return new AiSdkEmbeddingProvider({
				providerId: 'ollama-ai-sdk',
				model: modelId,
				createModel: (id) => ollama.textEmbeddingModel(id),
			});
		}
		case 'openai': {
			if (!settings.apiKey) {
				throw new ConfigurationError('OpenAI embedding provider requires an API key');
			}
			const openai = createOpenAI({
				apiKey: settings.apiKey,
				...(settings.baseUrl ? { baseURL: settings.baseUrl } : {}),
			});
			return new AiSdkEmbeddingProvider({
				providerId: 'openai',
				model: modelId,
				createModel: (id) => openai.textEmbeddingModel(id),
			});
		}
		case 'hash':
			return new HashEmbeddingProvider({ model: modelId });
	}
}
