/**
 * Relation extraction prompt (JSON output). Runs after entity extraction on the same text.
 */
export const system = `You are a relation extraction expert. You identify semantic relations between known entities.`;

export const template = `Extract the relations between the entities listed below, as they are stated in the text.

Text:
{{text}}

Known entities:
{{#each entities}}
- {{name}} ({{entityType}})
{{/each}}

Requirements:
1. Only relate entities from the list above.
2. A relation is a meaningful action, state or connection (works at, founded, located in, part of, happened on).
3. "subject_type" and "object_type" must match the types of the listed entities.
4. Give a "confidence" between 0 and 1 and the sentence the relation comes from as "context".

Example:
{"relations": [{"subject": "Ada Lovelace", "subject_type": "Person", "predicate": "worked with", "object": "Charles Babbage", "object_type": "Person", "confidence": 0.95, "context": "Ada Lovelace worked with Charles Babbage."}]}

Return only the JSON object, nothing else.`;

export const expectsJson = true;
export const jsonConstraint = 'Return only the JSON object, nothing else.';
