/**
 * Text chunking with four strategies: fixed-size windows, recursive separator
 * splitting, sentence-based (semantic) packing and paragraph packing.
 *
 * All strategies are pure and deterministic: identical input and options
 * always produce identical output.
 */

import { ConfigurationError } from '@/core/errors';
import { CHUNK_POSITION_PROBE_LENGTH } from '@/core/constant';
import type { ChunkStrategy } from '@/core/po/document.po';

export type ChunkLanguage = 'zh' | 'en';

export interface TextChunkerOptions {
	chunkSize?: number;
	chunkOverlap?: number;
	/**
	 * Selects the sentence terminators used by the recursive and semantic strategies.
	 */
	language?: ChunkLanguage;
}

/**
 * A chunk with its location in the source text.
 */
export interface PositionedChunk {
	content: string;
	chunkIndex: number;
	startPos: number;
	endPos: number;
	charCount: number;
}

type ChunkSpan = Pick<PositionedChunk, 'content' | 'startPos' | 'endPos'>;

const DEFAULT_CHUNKER_OPTIONS: Required<TextChunkerOptions> = {
	chunkSize: 500,
	chunkOverlap: 50,
	language: 'zh',
};

/**
 * Separators in order of preference (most specific first).
 * Sentence terminators are inserted between line breaks and spaces per language.
 */
const SENTENCE_SEPARATORS: Record<ChunkLanguage, string[]> = {
	zh: ['。', '！', '？', '；', '，'],
	en: ['. ', '! ', '? ', '; ', ', '],
};

const SENTENCE_PATTERNS: Record<ChunkLanguage, RegExp> = {
	zh: /[^。！？；…]+[。！？；…]?/g,
	en: /[^.!?]+[.!?]?/g,
};

/**
 * Sentences are stripped before packing, so English needs a space back between them.
 */
const SENTENCE_JOINERS: Record<ChunkLanguage, string> = {
	zh: '',
	en: ' ',
};

const PARAGRAPH_BREAK = /\n\s*\n/;
const PARAGRAPH_JOINER = '\n\n';

/**
 * @throws ConfigurationError unless `0 <= chunkOverlap < chunkSize`, both integers
 */
export function assertChunkSizes(chunkSize: number, chunkOverlap: number): void {
	if (!Number.isInteger(chunkSize) || chunkSize <= 0) {
		throw new ConfigurationError(`chunkSize must be a positive integer, got ${chunkSize}`);
	}
	if (!Number.isInteger(chunkOverlap) || chunkOverlap < 0) {
		throw new ConfigurationError(`chunkOverlap must be a non-negative integer, got ${chunkOverlap}`);
	}
	if (chunkOverlap >= chunkSize) {
		throw new ConfigurationError(`chunkOverlap (${chunkOverlap}) must be smaller than chunkSize (${chunkSize})`);
	}
}

export class TextChunker {
	readonly chunkSize: number;
	readonly chunkOverlap: number;
	readonly language: ChunkLanguage;

	constructor(options: TextChunkerOptions = {}) {
		const opts = { ...DEFAULT_CHUNKER_OPTIONS, ...options };
		assertChunkSizes(opts.chunkSize, opts.chunkOverlap);
		this.chunkSize = opts.chunkSize;
		this.chunkOverlap = opts.chunkOverlap;
		this.language = opts.language;
	}

	/**
	 * Chunk `content` with the given strategy.
	 */
	chunk(content: string, strategy: ChunkStrategy): string[] {
		switch (strategy) {
			case 'fixed':
				return this.fixedSizeChunking(content);
			case 'recursive':
				return this.recursiveChunking(content);
			case 'semantic':
				return this.semanticChunking(content);
			case 'paragraph':
				return this.paragraphChunking(content);
		}
	}

	/**
	 * Chunk and locate every chunk in the source text.
	 *
	 * Fixed and recursive chunks are slices of the input and keep the offsets
	 * the splitter cut them at. Semantic and paragraph chunks are re-joined text,
	 * so they are located by searching for their first characters from the
	 * previous chunk's start; a chunk that does not occur verbatim falls back to
	 * the previous start so positions never move backwards.
	 */
	chunkWithPositions(content: string, strategy: ChunkStrategy): PositionedChunk[] {
		const spans =
			strategy === 'fixed'
				? this.fixedSpans(content)
				: strategy === 'recursive'
					? this.recursiveSpans(content)
					: this.probeSpans(content, this.chunk(content, strategy));
		return spans.map((span, i) => ({
			content: span.content,
			chunkIndex: i,
			startPos: span.startPos,
			endPos: span.endPos,
			charCount: span.content.length,
		}));
	}

	/**
	 * Slide a `chunkSize` window forward by `chunkSize - chunkOverlap` characters.
	 * Stops once the next window would start inside the trailing overlap, so the
	 * last window always ends at the end of the text.
	 */
	fixedSizeChunking(text: string): string[] {
		return this.fixedSpans(text).map((span) => span.content);
	}

	/**
	 * Split on the highest-priority separator, pack pieces greedily and recurse
	 * into pieces that are still too large. Separators stay attached to the piece
	 * they end, so the packed pieces concatenate back to the input.
	 *
	 * Overlap is injected once after packing: every chunk but the first is
	 * prefixed with the previous piece's trailing `chunkOverlap` characters. Pieces
	 * are packed to `chunkSize - chunkOverlap` so the prefixed chunk still fits.
	 */
	recursiveChunking(text: string): string[] {
		return this.recursiveSpans(text).map((span) => span.content);
	}

	/**
	 * Pack whole sentences up to `chunkSize`. When a sentence does not fit, the
	 * current chunk is closed and the next one is seeded with the trailing
	 * sentences that fit in `chunkOverlap` before the new sentence is appended.
	 */
	semanticChunking(text: string): string[] {
		const joiner = SENTENCE_JOINERS[this.language];
		const sentences = this.splitSentences(text);
		const chunks: string[] = [];
		let current: string[] = [];

		const join = (parts: string[]) => parts.join(joiner);

		for (const sentence of sentences) {
			if (current.length === 0) {
				current = [sentence];
				continue;
			}
			if (join([...current, sentence]).length <= this.chunkSize) {
				current.push(sentence);
				continue;
			}

			chunks.push(join(current).trim());
			current = [...this.overlapSentences(current, sentence, joiner), sentence];
		}

		if (current.length > 0) {
			const last = join(current).trim();
			if (last) {
				chunks.push(last);
			}
		}
		return chunks;
	}

	/**
	 * Pack blank-line separated paragraphs up to `chunkSize` without overlap.
	 * A paragraph that is too large on its own is replaced in place by its
	 * recursive sub-chunks.
	 */
	paragraphChunking(text: string): string[] {
		const paragraphs = text
			.split(PARAGRAPH_BREAK)
			.map((p) => p.trim())
			.filter((p) => p.length > 0);

		const chunks: string[] = [];
		let current = '';

		for (const paragraph of paragraphs) {
			if (paragraph.length > this.chunkSize) {
				if (current) {
					chunks.push(current);
					current = '';
				}
				chunks.push(...this.recursiveChunking(paragraph));
				continue;
			}

			if (current && (current + PARAGRAPH_JOINER + paragraph).length > this.chunkSize) {
				chunks.push(current);
				current = paragraph;
			} else {
				current = current ? current + PARAGRAPH_JOINER + paragraph : paragraph;
			}
		}

		if (current) {
			chunks.push(current);
		}
		return chunks;
	}

	private recursiveSeparators(): string[] {
		return ['\n\n', '\n', ...SENTENCE_SEPARATORS[this.language], ' ', ''];
	}

	private recursiveSplit(text: string, separators: string[], budget: number): string[] {
		if (text.length <= budget) {
			return text ? [text] : [];
		}

		const [separator, ...remaining] = separators;
		// Empty separator (or none left): hard split on character boundaries.
		if (!separator) {
			return this.forceSplit(text, budget);
		}

		const splits = splitKeepingSeparator(text, separator);
		if (splits.length === 1) {
			return this.recursiveSplit(text, remaining, budget);
		}

		const pieces: string[] = [];
		let current = '';
		for (const split of splits) {
			if (split.length > budget) {
				if (current) {
					pieces.push(current);
					current = '';
				}
				pieces.push(...this.recursiveSplit(split, remaining, budget));
			} else if (current && current.length + split.length > budget) {
				pieces.push(current);
				current = split;
			} else {
				current += split;
			}
		}
		if (current) {
			pieces.push(current);
		}
		return pieces;
	}

	private forceSplit(text: string, budget: number): string[] {
		const pieces: string[] = [];
		for (let i = 0; i < text.length; i += budget) {
			pieces.push(text.slice(i, i + budget));
		}
		return pieces;
	}

	private fixedSpans(text: string): ChunkSpan[] {
		const spans: ChunkSpan[] = [];
		let start = 0;
		while (start < text.length) {
			const end = Math.min(start + this.chunkSize, text.length);
			spans.push({ content: text.slice(start, end), startPos: start, endPos: end });
			if (end >= text.length) {
				break;
			}
			start = end - this.chunkOverlap;
			if (start >= text.length - this.chunkOverlap) {
				break;
			}
		}
		return spans;
	}

	private recursiveSpans(text: string): ChunkSpan[] {
		if (!text.trim()) {
			return [];
		}
		const budget = this.chunkSize - this.chunkOverlap;
		const pieces = this.recursiveSplit(text, this.recursiveSeparators(), budget);

		const spans: ChunkSpan[] = [];
		let offset = 0;
		for (let i = 0; i < pieces.length; i++) {
			const piece = pieces[i];
			const prefix = i > 0 && this.chunkOverlap > 0 ? pieces[i - 1].slice(-this.chunkOverlap) : '';
			spans.push({ content: prefix + piece, startPos: offset - prefix.length, endPos: offset + piece.length });
			offset += piece.length;
		}
		return spans;
	}

	private probeSpans(content: string, texts: string[]): ChunkSpan[] {
		const spans: ChunkSpan[] = [];
		let cursor = 0;
		for (const text of texts) {
			const found = content.indexOf(text.slice(0, CHUNK_POSITION_PROBE_LENGTH), cursor);
			const startPos = found >= 0 ? found : cursor;
			const endPos = Math.max(startPos, Math.min(content.length, startPos + text.length));
			spans.push({ content: text, startPos, endPos });
			cursor = startPos;
		}
		return spans;
	}

	private splitSentences(text: string): string[] {
		const matches = text.match(SENTENCE_PATTERNS[this.language]) ?? [];
		return matches.map((s) => s.trim()).filter((s) => s.length > 0);
	}

	/**
	 * Longest run of trailing sentences that fits in `chunkOverlap` and still
	 * leaves room for `next` within `chunkSize`.
	 */
	private overlapSentences(previous: string[], next: string, joiner: string): string[] {
		if (this.chunkOverlap === 0) {
			return [];
		}
		const seed: string[] = [];
		let seedLength = 0;
		for (let i = previous.length - 1; i >= 0; i--) {
			const sentence = previous[i];
			const length = seedLength + sentence.length + (seed.length > 0 ? joiner.length : 0);
			if (length > this.chunkOverlap) {
				break;
			}
			if (length + joiner.length + next.length > this.chunkSize) {
				break;
			}
			seed.unshift(sentence);
			seedLength = length;
		}
		return seed;
	}
}

/**
 * Split on `separator`, keeping it at the end of every piece but the last.
 */
function splitKeepingSeparator(text: string, separator: string): string[] {
	const parts = text.split(separator);
	return parts
		.map((part, i) => (i < parts.length - 1 ? part + separator : part))
		.filter((part) => part.length > 0);
}
