import { v4 as uuidv4 } from 'uuid';

/**
 * Generate a UUID without hyphens.
 * @returns A UUID string without hyphens (e.g., "5678475e44724cb2a898c6b7046b9e1b")
 */
export function generateUuidWithoutHyphens(): string {
	return uuidv4().replace(/-/g, '');
}

/**
 * Graph node id for an entity. Names are kept verbatim; type keeps same-named entities of different kinds apart.
 */
export function buildEntityNodeId(type: string, name: string): string {
	return `entity:${type}:${name}`;
}
