/**
 * Hash utility functions for generating stable hashes from strings.
 *
 * Note: fnv1a32 is not cryptographically secure. It is suitable for
 * seeding deterministic generators and bucketing tokens.
 */
import { createHash } from 'crypto';

/**
 * 32-bit FNV-1a over UTF-16 code units.
 */
export function fnv1a32(str: string): number {
	let hash = 0x811c9dc5;
	for (let i = 0; i < str.length; i++) {
		hash ^= str.charCodeAt(i);
		hash = Math.imul(hash, 0x01000193);
	}
	return hash >>> 0;
}

/**
 * Stable 32-char hex id derived from the given parts (sha1, truncated).
 */
export function stableId(...parts: string[]): string {
	return createHash('sha1').update(parts.join('\u0000')).digest('hex').slice(0, 32);
}

/**
 * Seeded pseudo-random generator (mulberry32). The state can be read back so a
 * persisted structure continues the same sequence after reload.
 */
export class SeededRandom {
	private current: number;

	constructor(seed: number) {
		this.current = seed >>> 0;
	}

	get state(): number {
		return this.current;
	}

	/**
	 * Next float in [0, 1).
	 */
	next(): number {
		this.current = (this.current + 0x6d2b79f5) >>> 0;
		let t = this.current;
		t = Math.imul(t ^ (t >>> 15), t | 1);
		t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
		return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
	}
}
