import { DEFAULT_GRAPH_SCORING_SETTINGS, type GraphScoringSettings } from '@/app/settings/types';
import { DEFAULT_ENTITY_TYPE, DEFAULT_GRAPH_TOP_K } from '@/core/constant';
import type { ChunkPO } from '@/core/po';
import type { ChunkReader, GraphChunkRef, GraphRelationMatch, GraphSearchResult, RelatedEntity } from './types';

interface EntityMatch {
	entityType: string | null;
	chunks: GraphChunkRef[];
	chunkIds: Set<string>;
	relations: GraphRelationMatch[];
}

function toChunkRef(chunk: ChunkPO): GraphChunkRef {
	return {
		chunkId: chunk.id,
		documentId: chunk.documentId,
		chunkIndex: chunk.chunkIndex,
		content: chunk.content,
	};
}

/**
 * Entity/relation search over the annotations stored on chunks.
 *
 * No graph database is queried: every chunk of the knowledge base is scanned and each matched
 * entity is scored as name match + capped relation bonus + capped chunk bonus.
 * Ties keep first-match order.
 */
export class GraphSearchEngine {
	constructor(
		private readonly chunks: ChunkReader,
		private readonly scoring: GraphScoringSettings = DEFAULT_GRAPH_SCORING_SETTINGS,
	) {}

	async searchGraph(knowledgeBaseId: string, query: string, topK: number = DEFAULT_GRAPH_TOP_K): Promise<GraphSearchResult[]> {
		const needle = query.toLowerCase();
		if (!needle || topK <= 0) return [];

		const chunks = await this.chunks.listByKnowledgeBase(knowledgeBaseId);
		const matches = new Map<string, EntityMatch>();
		const matchFor = (name: string): EntityMatch => {
			let match = matches.get(name);
			if (!match) {
				match = { entityType: null, chunks: [], chunkIds: new Set(), relations: [] };
				matches.set(name, match);
			}
			return match;
		};
		const attachChunk = (match: EntityMatch, chunk: ChunkPO) => {
			if (match.chunkIds.has(chunk.id)) return;
			match.chunkIds.add(chunk.id);
			match.chunks.push(toChunkRef(chunk));
		};

		for (const chunk of chunks) {
			for (const name of chunk.entities) {
				const lower = name.toLowerCase();
				if (lower.includes(needle) || needle.includes(lower)) {
					attachChunk(matchFor(name), chunk);
				}
			}

			for (const relation of chunk.relations) {
				const hit =
					relation.subject.toLowerCase().includes(needle) ||
					relation.predicate.toLowerCase().includes(needle) ||
					relation.object.toLowerCase().includes(needle);
				if (!hit) continue;

				const record: GraphRelationMatch = {
					subject: relation.subject,
					subjectType: relation.subjectType,
					predicate: relation.predicate,
					object: relation.object,
					objectType: relation.objectType,
					confidence: relation.confidence,
					chunkId: chunk.id,
				};
				for (const [name, type] of [
					[relation.subject, relation.subjectType],
					[relation.object, relation.objectType],
				] as const) {
					const match = matchFor(name);
					match.entityType ??= type;
					match.relations.push(record);
					attachChunk(match, chunk);
				}
			}
		}

		const results: GraphSearchResult[] = [];
		for (const [name, match] of matches) {
			results.push({
				entityName: name,
				entityType: match.entityType ?? DEFAULT_ENTITY_TYPE,
				score: this.score(needle, name, match),
				chunkIds: match.chunks.map((c) => c.chunkId),
				chunks: match.chunks,
				relations: match.relations.slice(0, this.scoring.maxRelations),
				relatedEntities: this.relatedEntities(name, match.relations),
			});
		}

		// Array.prototype.sort is stable, so equal scores keep first-match order.
		results.sort((a, b) => b.score - a.score);
		return results.slice(0, topK);
	}

	private score(needle: string, name: string, match: EntityMatch): number {
		const s = this.scoring;
		const lower = name.toLowerCase();
		let score = 0;
		if (lower === needle) {
			score += s.exactMatchScore;
		} else if (lower.includes(needle)) {
			score += s.partialMatchScore;
		}
		score += Math.min(match.relations.length * s.relationWeight, s.relationCap);
		score += Math.min(match.chunks.length * s.chunkWeight, s.chunkCap);
		return Math.min(score, s.maxScore);
	}

	/**
	 * The other endpoint of each relation, deduplicated by name in first-seen order.
	 */
	private relatedEntities(name: string, relations: GraphRelationMatch[]): RelatedEntity[] {
		const related: RelatedEntity[] = [];
		const seen = new Set<string>();
		for (const rel of relations) {
			if (related.length >= this.scoring.maxRelatedEntities) break;
			if (rel.subject === name && !seen.has(rel.object)) {
				related.push({ name: rel.object, type: rel.objectType, relation: rel.predicate });
				seen.add(rel.object);
			} else if (rel.object === name && !seen.has(rel.subject)) {
				related.push({ name: rel.subject, type: rel.subjectType, relation: rel.predicate });
				seen.add(rel.subject);
			}
		}
		return related;
	}
}
