/**
 * Entity extraction prompt (JSON output).
 */
export const system = `You are an entity recognition expert. You extract structured entities from text and always use the entity types you are given.`;

export const template = `Extract every entity from the text below.

Text:
{{text}}

Entity types (use exactly one of these names):
{{#each entityTypes}}
{{inc @index}}. {{name}} - {{description}}
{{/each}}

Requirements:
1. Identify the entities that actually occur in the text.
2. "entity_type" must be one of the types above, spelled exactly as listed.
3. Add a short "description" and any "aliases" for important entities.
4. Give a "confidence" between 0 and 1.

Example:
{"entities": [{"name": "Ada Lovelace", "entity_type": "Person", "description": "mathematician", "aliases": ["Ada"], "properties": {"field": "mathematics"}, "confidence": 0.98}]}

Return only the JSON object, nothing else.`;

export const expectsJson = true;
export const jsonConstraint = 'Return only the JSON object, nothing else.';
