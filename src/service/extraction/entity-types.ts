export const ENTITY_TYPES = [
	'Person',
	'Organization',
	'Location',
	'Product',
	'Event',
	'Date',
	'Work',
	'Concept',
	'Resource',
	'Category',
	'Operation',
] as const;

export type EntityType = (typeof ENTITY_TYPES)[number];

/**
 * Shown to the model in the entity prompt.
 */
export const ENTITY_TYPE_DESCRIPTIONS: Record<EntityType, string> = {
	Person: 'real or fictional people',
	Organization: 'companies, governments, schools and other institutions',
	Location: 'places, regions, rivers, buildings',
	Product: 'goods, services and software',
	Event: 'historical events and activities',
	Date: 'points or periods in time',
	Work: 'books, films, music and other creative works',
	Concept: 'abstract ideas and theories',
	Resource: 'natural resources and datasets',
	Category: 'classes and kinds of things',
	Operation: 'actions and processes',
};

const ENTITY_TYPE_ALIASES = new Map<string, EntityType>([
	['people', 'Person'],
	['human', 'Person'],
	['org', 'Organization'],
	['company', 'Organization'],
	['place', 'Location'],
	['geo', 'Location'],
	['time', 'Date'],
	['datetime', 'Date'],
	['book', 'Work'],
	['movie', 'Work'],
	['idea', 'Concept'],
]);

function isEntityType(value: string): value is EntityType {
	return ENTITY_TYPES.some((type) => type === value);
}

/**
 * Map a model-supplied type onto the taxonomy: exact, then case-insensitive, then alias, else Concept.
 */
export function normalizeEntityType(value: string | null | undefined): EntityType {
	const raw = (value ?? '').trim();
	if (isEntityType(raw)) return raw;
	const lower = raw.toLowerCase();
	const caseInsensitive = ENTITY_TYPES.find((type) => type.toLowerCase() === lower);
	if (caseInsensitive) return caseInsensitive;
	return ENTITY_TYPE_ALIASES.get(lower) ?? 'Concept';
}
