import { sql, type Kysely, type Updateable } from 'kysely';
import type { Database as DbSchema } from '../ddl';
import { fromSqlBool, toSqlBool } from '../utils';
import { DEFAULT_KNOWLEDGE_BASE_CONFIG, isChunkStrategy, type KnowledgeBasePO } from '@/core/po';
import type { KnowledgeBasePatch } from './types';

type KnowledgeBaseRow = DbSchema['knowledge_base'];

function toPO(row: KnowledgeBaseRow): KnowledgeBasePO {
	return {
		id: row.id,
		name: row.name,
		description: row.description,
		chunkStrategy: isChunkStrategy(row.chunk_strategy) ? row.chunk_strategy : DEFAULT_KNOWLEDGE_BASE_CONFIG.chunkStrategy,
		chunkSize: row.chunk_size,
		chunkOverlap: row.chunk_overlap,
		enableVectorStore: fromSqlBool(row.enable_vector_store),
		enableKnowledgeGraph: fromSqlBool(row.enable_knowledge_graph),
		enableNer: fromSqlBool(row.enable_ner),
		embeddingModel: row.embedding_model,
		documentCount: row.document_count,
		totalChunks: row.total_chunks,
		createdAt: row.created_at,
		updatedAt: row.updated_at,
	};
}

/**
 * CRUD repository for `knowledge_base` table.
 */
export class KnowledgeBaseRepo {
	constructor(private readonly db: Kysely<DbSchema>) {}

	async insert(kb: KnowledgeBasePO): Promise<void> {
		await this.db
			.insertInto('knowledge_base')
			.values({
				id: kb.id,
				name: kb.name,
				description: kb.description,
				chunk_strategy: kb.chunkStrategy,
				chunk_size: kb.chunkSize,
				chunk_overlap: kb.chunkOverlap,
				enable_vector_store: toSqlBool(kb.enableVectorStore),
				enable_knowledge_graph: toSqlBool(kb.enableKnowledgeGraph),
				enable_ner: toSqlBool(kb.enableNer),
				embedding_model: kb.embeddingModel,
				document_count: kb.documentCount,
				total_chunks: kb.totalChunks,
				created_at: kb.createdAt,
				updated_at: kb.updatedAt,
			})
			.execute();
	}

	async getById(id: string): Promise<KnowledgeBasePO | null> {
		const row = await this.db.selectFrom('knowledge_base').selectAll().where('id', '=', id).executeTakeFirst();
		return row ? toPO(row) : null;
	}

	async getByName(name: string): Promise<KnowledgeBasePO | null> {
		const row = await this.db.selectFrom('knowledge_base').selectAll().where('name', '=', name).executeTakeFirst();
		return row ? toPO(row) : null;
	}

	async list(params: { offset?: number; limit?: number } = {}): Promise<KnowledgeBasePO[]> {
		const rows = await this.db
			.selectFrom('knowledge_base')
			.selectAll()
			.orderBy('created_at', 'asc')
			.orderBy('id', 'asc')
			.limit(params.limit ?? -1)
			.offset(params.offset ?? 0)
			.execute();
		return rows.map(toPO);
	}

	async update(id: string, patch: KnowledgeBasePatch): Promise<void> {
		const set: Updateable<KnowledgeBaseRow> = { updated_at: Date.now() };
		if (patch.name !== undefined) set.name = patch.name;
		if (patch.description !== undefined) set.description = patch.description;
		if (patch.chunkStrategy !== undefined) set.chunk_strategy = patch.chunkStrategy;
		if (patch.chunkSize !== undefined) set.chunk_size = patch.chunkSize;
		if (patch.chunkOverlap !== undefined) set.chunk_overlap = patch.chunkOverlap;
		if (patch.enableVectorStore !== undefined) set.enable_vector_store = toSqlBool(patch.enableVectorStore);
		if (patch.enableKnowledgeGraph !== undefined) set.enable_knowledge_graph = toSqlBool(patch.enableKnowledgeGraph);
		if (patch.enableNer !== undefined) set.enable_ner = toSqlBool(patch.enableNer);
		if (patch.embeddingModel !== undefined) set.embedding_model = patch.embeddingModel;
		await this.db.updateTable('knowledge_base').set(set).where('id', '=', id).execute();
	}

	/**
	 * Add deltas to the running aggregates in one statement. Results are floored at 0.
	 */
	async adjustAggregates(id: string, delta: { documents: number; chunks: number }): Promise<void> {
		await this.db
			.updateTable('knowledge_base')
			.set({
				document_count: sql<number>`max(0, document_count + ${delta.documents})`,
				total_chunks: sql<number>`max(0, total_chunks + ${delta.chunks})`,
				updated_at: Date.now(),
			})
			.where('id', '=', id)
			.execute();
	}

	/**
	 * Delete a knowledge base. Documents and chunks go with it (foreign key cascade).
	 */
	async delete(id: string): Promise<boolean> {
		const result = await this.db.deleteFrom('knowledge_base').where('id', '=', id).executeTakeFirst();
		return result.numDeletedRows > 0n;
	}
}
