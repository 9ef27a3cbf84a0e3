import { sql, type Kysely } from 'kysely';
import { z } from 'zod';
import type { Database as DbSchema } from '../ddl';
import { fromSqlBool, parseJsonColumn, toSqlBool } from '../utils';
import { isChunkStrategy, type ChunkPO, type ChunkRelation } from '@/core/po';
import type { ChunkAnnotations, ChunkEmbeddingUpdate } from './types';

type DocChunkRow = DbSchema['doc_chunk'];

// 18 columns per row; SQLite builds before 3.32 allow 999 variables per statement.
const INSERT_BATCH_SIZE = 50;

const stringListSchema = z.array(z.string());
const relationListSchema: z.ZodType<ChunkRelation[], unknown> = z.array(
	z.object({
		subject: z.string(),
		subjectType: z.string(),
		predicate: z.string(),
		object: z.string(),
		objectType: z.string(),
		confidence: z.number(),
		chunkIds: z.array(z.string()).default([]),
		contexts: z.array(z.string()).default([]),
	}),
);

function toPO(row: DocChunkRow): ChunkPO {
	return {
		id: row.id,
		documentId: row.document_id,
		knowledgeBaseId: row.knowledge_base_id,
		chunkIndex: row.chunk_index,
		content: row.content,
		chunkType: isChunkStrategy(row.chunk_type) ? row.chunk_type : 'recursive',
		startPos: row.start_pos,
		endPos: row.end_pos,
		charCount: row.char_count,
		wordCount: row.word_count,
		vectorId: row.vector_id,
		embeddingModel: row.embedding_model,
		hasEmbedding: fromSqlBool(row.has_embedding),
		entities: parseJsonColumn(row.entities_json, stringListSchema, [], 'doc_chunk.entities_json'),
		relations: parseJsonColumn(row.relations_json, relationListSchema, [], 'doc_chunk.relations_json'),
		keywords: parseJsonColumn(row.keywords_json, stringListSchema, [], 'doc_chunk.keywords_json'),
		createdAt: row.created_at,
		updatedAt: row.updated_at,
	};
}

function toRow(chunk: ChunkPO): DocChunkRow {
	return {
		id: chunk.id,
		document_id: chunk.documentId,
		knowledge_base_id: chunk.knowledgeBaseId,
		chunk_index: chunk.chunkIndex,
		content: chunk.content,
		chunk_type: chunk.chunkType,
		start_pos: chunk.startPos,
		end_pos: chunk.endPos,
		char_count: chunk.charCount,
		word_count: chunk.wordCount,
		vector_id: chunk.vectorId,
		embedding_model: chunk.embeddingModel,
		has_embedding: toSqlBool(chunk.hasEmbedding),
		entities_json: JSON.stringify(chunk.entities),
		relations_json: JSON.stringify(chunk.relations),
		keywords_json: JSON.stringify(chunk.keywords),
		created_at: chunk.createdAt,
		updated_at: chunk.updatedAt,
	};
}

/**
 * CRUD repository for `doc_chunk` table.
 */
export class DocChunkRepo {
	constructor(private readonly db: Kysely<DbSchema>) {}

	/**
	 * Insert chunks in one transaction, `INSERT_BATCH_SIZE` rows per statement
	 * to stay under SQLite's bound-variable limit.
	 */
	async insertMany(chunks: ChunkPO[]): Promise<void> {
		if (!chunks.length) return;
		const rows = chunks.map(toRow);
		await this.db.transaction().execute(async (trx) => {
			for (let i = 0; i < rows.length; i += INSERT_BATCH_SIZE) {
				await trx.insertInto('doc_chunk').values(rows.slice(i, i + INSERT_BATCH_SIZE)).execute();
			}
		});
	}

	async getById(id: string): Promise<ChunkPO | null> {
		const row = await this.db.selectFrom('doc_chunk').selectAll().where('id', '=', id).executeTakeFirst();
		return row ? toPO(row) : null;
	}

	/**
	 * Get chunks by IDs (batch). Unknown ids are skipped; order follows `ids`.
	 */
	async getByIds(ids: string[]): Promise<ChunkPO[]> {
		if (!ids.length) return [];
		const rows = await this.db.selectFrom('doc_chunk').selectAll().where('id', 'in', ids).execute();
		const byId = new Map(rows.map((row) => [row.id, toPO(row)]));
		return ids.flatMap((id) => byId.get(id) ?? []);
	}

	/**
	 * Chunks of a document by `chunk_index`.
	 */
	async listByDocument(documentId: string, params: { offset?: number; limit?: number } = {}): Promise<ChunkPO[]> {
		const rows = await this.db
			.selectFrom('doc_chunk')
			.selectAll()
			.where('document_id', '=', documentId)
			.orderBy('chunk_index', 'asc')
			.limit(params.limit ?? -1)
			.offset(params.offset ?? 0)
			.execute();
		return rows.map(toPO);
	}

	/**
	 * Every chunk of a knowledge base in insertion order.
	 */
	async listByKnowledgeBase(knowledgeBaseId: string): Promise<ChunkPO[]> {
		const rows = await this.db
			.selectFrom('doc_chunk')
			.selectAll()
			.where('knowledge_base_id', '=', knowledgeBaseId)
			.orderBy(sql`rowid`)
			.execute();
		return rows.map(toPO);
	}

	/**
	 * Record vector references for chunks that were added to the vector index.
	 */
	async updateEmbedding(updates: ChunkEmbeddingUpdate[]): Promise<void> {
		if (!updates.length) return;
		const now = Date.now();
		await this.db.transaction().execute(async (trx) => {
			for (const update of updates) {
				await trx
					.updateTable('doc_chunk')
					.set({
						vector_id: update.vectorId,
						embedding_model: update.embeddingModel,
						has_embedding: 1,
						updated_at: now,
					})
					.where('id', '=', update.id)
					.execute();
			}
		});
	}

	/**
	 * Replace a chunk's entity/relation annotations.
	 */
	async updateAnnotations(id: string, annotations: ChunkAnnotations): Promise<void> {
		await this.db
			.updateTable('doc_chunk')
			.set({
				entities_json: JSON.stringify(annotations.entities),
				relations_json: JSON.stringify(annotations.relations),
				...(annotations.keywords ? { keywords_json: JSON.stringify(annotations.keywords) } : {}),
				updated_at: Date.now(),
			})
			.where('id', '=', id)
			.execute();
	}

	/**
	 * Delete chunks by document id.
	 *
	 * @returns number of deleted rows
	 */
	async deleteByDocument(documentId: string): Promise<number> {
		const result = await this.db.deleteFrom('doc_chunk').where('document_id', '=', documentId).executeTakeFirst();
		return Number(result.numDeletedRows);
	}

	async countByDocument(documentId: string): Promise<number> {
		const row = await this.db
			.selectFrom('doc_chunk')
			.select((eb) => eb.fn.countAll<number>().as('count'))
			.where('document_id', '=', documentId)
			.executeTakeFirstOrThrow();
		return Number(row.count);
	}
}
