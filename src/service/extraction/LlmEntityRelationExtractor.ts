import { createOpenAI } from '@ai-sdk/openai';
import { generateObject, type LanguageModel } from 'ai';
import type { ExtractorSettings } from '@/app/settings/types';
import { DEFAULT_PREDICATE, DEFAULT_RELATION_CONFIDENCE } from '@/core/constant';
import { ConfigurationError, ExtractionError, getErrorMessage } from '@/core/errors';
import type { Triple } from '@/core/po';
import { Stopwatch } from '@/core/utils/Stopwatch';
import { PromptId } from '@/service/prompt/PromptId';
import { PromptService } from '@/service/prompt/PromptService';
import { ENTITY_TYPES, ENTITY_TYPE_DESCRIPTIONS, normalizeEntityType, type EntityType } from './entity-types';
import {
	entityResponseSchema,
	relationResponseSchema,
	type EntityRelationExtractor,
	type ExtractedEntity,
	type ExtractedRelation,
	type ExtractionResult,
} from './types';

const OPENAI_DEFAULT_BASE = 'https://api.openai.com/v1';

export interface LlmExtractorOptions {
	model: LanguageModel;
	temperature?: number;
	maxRetries?: number;
	promptService?: PromptService;
}

function clampConfidence(value: number | null | undefined): number {
	if (value === null || value === undefined || !Number.isFinite(value)) {
		return DEFAULT_RELATION_CONFIDENCE;
	}
	return Math.min(1, Math.max(0, value));
}

/**
 * Two-step extraction with a chat model: entities first, then relations among those entities.
 * Model output is validated with zod; each item is cleaned on its own so one bad item does not
 * discard the rest.
 */
export class LlmEntityRelationExtractor implements EntityRelationExtractor {
	private readonly temperature: number;
	private readonly maxRetries: number;
	private readonly prompts: PromptService;

	constructor(private readonly options: LlmExtractorOptions) {
		this.temperature = options.temperature ?? 0.3;
		this.maxRetries = options.maxRetries ?? 3;
		this.prompts = options.promptService ?? new PromptService();
	}

	/**
	 * OpenAI (or OpenAI-compatible) chat model from settings. Requires an API key.
	 */
	static fromSettings(settings: ExtractorSettings, promptService?: PromptService): LlmEntityRelationExtractor {
		if (!settings.apiKey) {
			throw new ConfigurationError('Entity extraction needs an API key (OPENAI_API_KEY)');
		}
		const client = createOpenAI({
			apiKey: settings.apiKey,
			baseURL: settings.baseUrl || OPENAI_DEFAULT_BASE,
		});
		return new LlmEntityRelationExtractor({
			model: client.chat(settings.model),
			temperature: settings.temperature,
			maxRetries: settings.maxRetries,
			promptService,
		});
	}

	async processText(text: string, chunkId?: string): Promise<ExtractionResult> {
		const sw = new Stopwatch('LlmEntityRelationExtractor.processText');
		const entities = await sw.time('entities', () => this.extractEntities(text, chunkId));
		const relations = entities.length
			? await sw.time('relations', () => this.extractRelations(text, entities, chunkId))
			: [];
		console.debug(sw.toString());

		const triples: Triple[] = relations.map((relation) => ({
			subject: relation.subject,
			subjectType: relation.subjectType,
			predicate: relation.predicate,
			object: relation.object,
			objectType: relation.objectType,
		}));
		return { entities, relations, triples };
	}

	/**
	 * Entities in first-seen order; a repeated name keeps its first occurrence.
	 */
	async extractEntities(text: string, chunkId?: string): Promise<ExtractedEntity[]> {
		const prompt = await this.prompts.render(PromptId.EntityExtractJson, {
			text,
			entityTypes: ENTITY_TYPES.map((name) => ({ name, description: ENTITY_TYPE_DESCRIPTIONS[name] })),
		});

		const response = await generateObject({
			model: this.options.model,
			schema: entityResponseSchema,
			system: this.prompts.getSystem(PromptId.EntityExtractJson),
			prompt,
			temperature: this.temperature,
			maxRetries: this.maxRetries,
		}).catch((error: unknown) => {
			throw new ExtractionError(`Entity extraction failed: ${getErrorMessage(error)}`, error);
		});

		const byName = new Map<string, ExtractedEntity>();
		for (const item of response.object.entities) {
			const name = item.name.trim();
			if (!name || byName.has(name)) continue;
			byName.set(name, {
				name,
				entityType: normalizeEntityType(item.entity_type),
				description: item.description?.trim() || null,
				aliases: (item.aliases ?? []).map((alias) => alias.trim()).filter((alias) => alias && alias !== name),
				properties: item.properties ?? {},
				confidence: clampConfidence(item.confidence),
				chunkIds: chunkId ? [chunkId] : [],
			});
		}
		return [...byName.values()];
	}

	/**
	 * Relations between the given entities. A missing type falls back to the known entity's type.
	 */
	async extractRelations(text: string, entities: ExtractedEntity[], chunkId?: string): Promise<ExtractedRelation[]> {
		const prompt = await this.prompts.render(PromptId.RelationExtractJson, {
			text,
			entities: entities.map((entity) => ({ name: entity.name, entityType: entity.entityType })),
		});

		const response = await generateObject({
			model: this.options.model,
			schema: relationResponseSchema,
			system: this.prompts.getSystem(PromptId.RelationExtractJson),
			prompt,
			temperature: this.temperature,
			maxRetries: this.maxRetries,
		}).catch((error: unknown) => {
			throw new ExtractionError(`Relation extraction failed: ${getErrorMessage(error)}`, error);
		});

		const knownTypes = new Map(entities.map((entity) => [entity.name, entity.entityType]));
		const typeOf = (name: string, given: string | null | undefined): EntityType =>
			given?.trim() ? normalizeEntityType(given) : knownTypes.get(name) ?? normalizeEntityType(given);

		const relations: ExtractedRelation[] = [];
		for (const item of response.object.relations) {
			const subject = item.subject.trim();
			const object = item.object.trim();
			if (!subject || !object) continue;
			const context = item.context?.trim();
			relations.push({
				subject,
				subjectType: typeOf(subject, item.subject_type),
				predicate: item.predicate?.trim() || DEFAULT_PREDICATE,
				object,
				objectType: typeOf(object, item.object_type),
				confidence: clampConfidence(item.confidence),
				chunkIds: chunkId ? [chunkId] : [],
				contexts: context ? [context] : [],
				properties: item.properties ?? {},
			});
		}
		return relations;
	}
}
