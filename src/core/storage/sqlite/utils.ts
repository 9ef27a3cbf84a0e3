import type { z } from 'zod';

/**
 * SQLite has no boolean type; booleans are stored as 0/1.
 */
export function toSqlBool(value: boolean): number {
	return value ? 1 : 0;
}

export function fromSqlBool(value: number): boolean {
	return value !== 0;
}

/**
 * Parse a JSON text column against `schema`. Unparseable or invalid content yields `fallback`
 * and is reported, so one bad row does not break a whole listing.
 */
export function parseJsonColumn<T>(text: string | null, schema: z.ZodType<T, unknown>, fallback: T, column: string): T {
	if (!text) {
		return fallback;
	}
	let raw: unknown;
	try {
		raw = JSON.parse(text);
	} catch (error) {
		console.warn(`[sqlite] Column ${column} holds invalid JSON:`, error);
		return fallback;
	}
	const parsed = schema.safeParse(raw);
	if (!parsed.success) {
		console.warn(`[sqlite] Column ${column} does not match its schema:`, parsed.error.message);
		return fallback;
	}
	return parsed.data;
}
