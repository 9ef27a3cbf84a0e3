import { describe, expect, it } from 'vitest';
import { MockLanguageModelV2 } from 'ai/test';
import { ConfigurationError, ExtractionError } from '@/core/errors';
import { DEFAULT_EXTRACTOR_SETTINGS } from '@/app/settings/types';
import { LlmEntityRelationExtractor } from './LlmEntityRelationExtractor';
import { normalizeEntityType } from './entity-types';

type GenerateCall = MockLanguageModelV2['doGenerateCalls'][number];

function textResult(text: string) {
	return {
		content: [{ type: 'text' as const, text }],
		finishReason: 'stop' as const,
		usage: { inputTokens: 10, outputTokens: 10, totalTokens: 20 },
		warnings: [],
	};
}

/**
 * Model that answers each call with the next canned JSON payload.
 */
function scriptedModel(...payloads: unknown[]): MockLanguageModelV2 {
	let call = 0;
	return new MockLanguageModelV2({
		doGenerate: async () => textResult(JSON.stringify(payloads[Math.min(call++, payloads.length - 1)])),
	});
}

function promptText(call: GenerateCall): string {
	const parts: string[] = [];
	for (const message of call.prompt) {
		if (typeof message.content === 'string') {
			parts.push(message.content);
			continue;
		}
		for (const part of message.content) {
			if (part.type === 'text') parts.push(part.text);
		}
	}
	return parts.join('\n');
}

const ENTITIES = {
	entities: [
		{ name: ' Alice ', entity_type: 'person', confidence: 0.9 },
		{ name: 'Acme', entity_type: 'company' },
		{ name: 'Alice', entity_type: 'Location' },
		{ name: '', entity_type: 'Person' },
		{ name: 'Quantum', entity_type: 'Gizmo', confidence: 1.7 },
	],
};

const RELATIONS = {
	relations: [
		{ subject: 'Alice', predicate: 'works at', object: 'Acme', confidence: 0.95, context: 'Alice works at Acme.' },
		{ subject: 'Acme', subject_type: 'org', predicate: '', object: 'Quantum' },
		{ subject: '  ', predicate: 'owns', object: 'Acme' },
	],
};

describe('normalizeEntityType', () => {
	it.each([
		['Person', 'Person'],
		['organization', 'Organization'],
		['GEO', 'Location'],
		['movie', 'Work'],
		['datetime', 'Date'],
		['spaceship', 'Concept'],
		['constructor', 'Concept'],
		['', 'Concept'],
		[null, 'Concept'],
	])('maps %s to %s', (input, expected) => {
		expect(normalizeEntityType(input)).toBe(expected);
	});
});

describe('LlmEntityRelationExtractor', () => {
	it('extracts cleaned entities, relations and triples', async () => {
		const model = scriptedModel(ENTITIES, RELATIONS);
		const extractor = new LlmEntityRelationExtractor({ model, maxRetries: 0 });

		const result = await extractor.processText('Alice works at Acme on Quantum.', 'c1');

		expect(result.entities.map((e) => [e.name, e.entityType, e.confidence])).toEqual([
			['Alice', 'Person', 0.9],
			['Acme', 'Organization', 0.8],
			['Quantum', 'Concept', 1],
		]);
		expect(result.entities[0].chunkIds).toEqual(['c1']);

		expect(result.relations).toEqual([
			{
				subject: 'Alice',
				subjectType: 'Person',
				predicate: 'works at',
				object: 'Acme',
				objectType: 'Organization',
				confidence: 0.95,
				chunkIds: ['c1'],
				contexts: ['Alice works at Acme.'],
				properties: {},
			},
			{
				subject: 'Acme',
				subjectType: 'Organization',
				predicate: 'RELATES_TO',
				object: 'Quantum',
				objectType: 'Concept',
				confidence: 0.8,
				chunkIds: ['c1'],
				contexts: [],
				properties: {},
			},
		]);
		expect(result.triples).toEqual([
			{ subject: 'Alice', subjectType: 'Person', predicate: 'works at', object: 'Acme', objectType: 'Organization' },
			{ subject: 'Acme', subjectType: 'Organization', predicate: 'RELATES_TO', object: 'Quantum', objectType: 'Concept' },
		]);
	});

	it('renders the taxonomy and the known entities into the prompts', async () => {
		const model = scriptedModel(ENTITIES, RELATIONS);
		const extractor = new LlmEntityRelationExtractor({ model, temperature: 0.1, maxRetries: 0 });

		await extractor.processText('Alice works at Acme.');

		expect(model.doGenerateCalls).toHaveLength(2);
		const [entityCall, relationCall] = model.doGenerateCalls;
		expect(entityCall.temperature).toBe(0.1);
		expect(promptText(entityCall)).toContain('1. Person - real or fictional people');
		expect(promptText(entityCall)).toContain('11. Operation - actions and processes');
		expect(promptText(entityCall)).toContain('entity recognition expert');
		expect(promptText(relationCall)).toContain('- Alice (Person)\n- Acme (Organization)\n- Quantum (Concept)');
	});

	it('skips the relation step when no entities are found', async () => {
		const model = scriptedModel({ entities: [] });
		const extractor = new LlmEntityRelationExtractor({ model, maxRetries: 0 });

		const result = await extractor.processText('nothing here');

		expect(result).toEqual({ entities: [], relations: [], triples: [] });
		expect(model.doGenerateCalls).toHaveLength(1);
	});

	it('wraps model failures in ExtractionError', async () => {
		const model = new MockLanguageModelV2({
			doGenerate: async () => {
				throw new Error('rate limited');
			},
		});
		const extractor = new LlmEntityRelationExtractor({ model, maxRetries: 0 });

		await expect(extractor.processText('text')).rejects.toBeInstanceOf(ExtractionError);
	});

	it('needs an API key to be built from settings', () => {
		expect(() => LlmEntityRelationExtractor.fromSettings(DEFAULT_EXTRACTOR_SETTINGS)).toThrow(ConfigurationError);
		expect(
			LlmEntityRelationExtractor.fromSettings({ ...DEFAULT_EXTRACTOR_SETTINGS, apiKey: 'test-secret' }),
		).toBeInstanceOf(LlmEntityRelationExtractor);
	});
});
