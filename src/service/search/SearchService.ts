import { DEFAULT_SEARCH_TOP_K, GRAPH_CHUNKS_PER_ENTITY } from '@/core/constant';
import { NotFoundError } from '@/core/errors';
import type { ChunkPO, KnowledgeBasePO } from '@/core/po';
import type { SqliteStoreManager } from '@/core/storage/sqlite/SqliteStoreManager';
import { Stopwatch } from '@/core/utils/Stopwatch';
import type { KnowledgeBaseResourceRegistry } from '@/service/document/KnowledgeBaseResourceRegistry';
import type { GraphSearchEngine } from './GraphSearchEngine';
import type { ChunkSearchResult, GraphContext, GraphSearchResult, SearchRequest, SearchResponse } from './types';

/**
 * Vector, graph and hybrid search over one knowledge base.
 *
 * - vector: nearest chunks by embedding
 * - graph: entity matches, plus up to 3 chunks of each matched entity as results
 * - hybrid: vector chunk results (with their annotations) and the graph matches side by side
 */
export class SearchService {
	constructor(
		private readonly store: SqliteStoreManager,
		private readonly registry: KnowledgeBaseResourceRegistry,
		private readonly graphSearch: GraphSearchEngine,
	) {}

	async search(request: SearchRequest): Promise<SearchResponse> {
		const sw = new Stopwatch('SearchService.search');
		const kb = await this.store.knowledgeBaseRepo.getById(request.knowledgeBaseId);
		if (!kb) {
			throw new NotFoundError('KnowledgeBase', request.knowledgeBaseId);
		}

		const searchType = request.searchType ?? 'vector';
		const topK = request.topK ?? DEFAULT_SEARCH_TOP_K;
		const useVector = searchType !== 'graph';
		const useGraph = searchType !== 'vector';
		const titles = new Map<string, string>();

		const results: ChunkSearchResult[] = [];
		if (useVector) {
			const hits = await sw.time('vector', () => this.searchVectors(kb, request.query, topK));
			for (const { chunk, score } of hits) {
				results.push(await this.toResult(chunk, score, titles, { withAnnotations: useGraph, graphContext: null }));
			}
		}

		let graphResults: GraphSearchResult[] | null = null;
		if (useGraph) {
			graphResults = await sw.time('graph', () => this.graphSearch.searchGraph(kb.id, request.query, topK));
			if (!useVector) {
				sw.start('graph-chunks');
				for (const match of graphResults) {
					const chunkIds = match.chunks.slice(0, GRAPH_CHUNKS_PER_ENTITY).map((c) => c.chunkId);
					const graphContext: GraphContext = {
						matchedEntity: match.entityName,
						entityType: match.entityType,
						relatedCount: match.relatedEntities.length,
					};
					for (const chunk of await this.store.docChunkRepo.getByIds(chunkIds)) {
						results.push(await this.toResult(chunk, match.score, titles, { withAnnotations: true, graphContext }));
					}
				}
				sw.stop();
			}
		}

		console.debug(sw.toString());
		return {
			query: request.query,
			searchType,
			results,
			total: results.length,
			graphResults: graphResults?.length ? graphResults : null,
			processingTimeMs: sw.elapsedMs(),
		};
	}

	/**
	 * Nearest chunks by vector similarity. Empty when the knowledge base has no usable index.
	 */
	async searchVectors(kb: KnowledgeBasePO, query: string, topK: number): Promise<Array<{ chunk: ChunkPO; score: number }>> {
		if (!kb.enableVectorStore) return [];
		const index = await this.registry.getVectorIndex(kb);
		if (!index) return [];

		const hits = await index.search(query, topK);
		const chunkIds = hits.map((hit) => hit.document.metadata.chunk_id);
		const chunks = await this.store.docChunkRepo.getByIds(
			chunkIds.filter((id): id is string => typeof id === 'string'),
		);
		const byId = new Map(chunks.map((chunk) => [chunk.id, chunk]));

		const found: Array<{ chunk: ChunkPO; score: number }> = [];
		hits.forEach((hit, i) => {
			const id = chunkIds[i];
			const chunk = typeof id === 'string' ? byId.get(id) : undefined;
			if (chunk) found.push({ chunk, score: hit.score });
		});
		return found;
	}

	private async toResult(
		chunk: ChunkPO,
		score: number,
		titles: Map<string, string>,
		extra: { withAnnotations: boolean; graphContext: GraphContext | null },
	): Promise<ChunkSearchResult> {
		let title = titles.get(chunk.documentId);
		if (title === undefined) {
			title = (await this.store.documentRepo.getById(chunk.documentId))?.title ?? '';
			titles.set(chunk.documentId, title);
		}
		return {
			chunkId: chunk.id,
			documentId: chunk.documentId,
			documentTitle: title,
			content: chunk.content,
			score,
			chunkIndex: chunk.chunkIndex,
			entities: extra.withAnnotations ? chunk.entities : null,
			relations: extra.withAnnotations ? chunk.relations : null,
			graphContext: extra.graphContext,
		};
	}
}
