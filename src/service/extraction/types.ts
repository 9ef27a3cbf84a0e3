import { z } from 'zod';
import type { Triple } from '@/core/po';
import type { EntityType } from './entity-types';

export interface ExtractedEntity {
	name: string;
	entityType: EntityType;
	description: string | null;
	aliases: string[];
	properties: Record<string, unknown>;
	confidence: number;
	chunkIds: string[];
}

export interface ExtractedRelation {
	subject: string;
	subjectType: EntityType;
	predicate: string;
	object: string;
	objectType: EntityType;
	confidence: number;
	chunkIds: string[];
	contexts: string[];
	properties: Record<string, unknown>;
}

export interface ExtractionResult {
	entities: ExtractedEntity[];
	relations: ExtractedRelation[];
	triples: Triple[];
}

/**
 * Turns text into entities, relations between them, and graph triples.
 */
export interface EntityRelationExtractor {
	processText(text: string, chunkId?: string): Promise<ExtractionResult>;
}

/**
 * Model output for the entity step. Everything but the name is optional; defaults are applied per item.
 */
export const entityResponseSchema = z.object({
	entities: z.array(
		z.object({
			name: z.string(),
			entity_type: z.string().nullish(),
			description: z.string().nullish(),
			aliases: z.array(z.string()).nullish(),
			properties: z.record(z.string(), z.unknown()).nullish(),
			confidence: z.number().nullish(),
		}),
	),
});

/**
 * Model output for the relation step.
 */
export const relationResponseSchema = z.object({
	relations: z.array(
		z.object({
			subject: z.string(),
			subject_type: z.string().nullish(),
			predicate: z.string().nullish(),
			object: z.string(),
			object_type: z.string().nullish(),
			confidence: z.number().nullish(),
			context: z.string().nullish(),
			properties: z.record(z.string(), z.unknown()).nullish(),
		}),
	),
});

export type EntityResponse = z.infer<typeof entityResponseSchema>;
export type RelationResponse = z.infer<typeof relationResponseSchema>;
