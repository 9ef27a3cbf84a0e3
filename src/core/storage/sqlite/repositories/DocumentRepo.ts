import type { Kysely, Updateable } from 'kysely';
import { z } from 'zod';
import type { Database as DbSchema } from '../ddl';
import { fromSqlBool, parseJsonColumn, toSqlBool } from '../utils';
import { isChunkStrategy, type DocumentPO, type DocumentStatus } from '@/core/po';
import type { DocumentListQuery, DocumentPatch } from './types';

type DocumentRow = DbSchema['document'];

const DOCUMENT_STATUSES: readonly DocumentStatus[] = ['pending', 'processing', 'completed', 'failed'];
const tagsSchema = z.array(z.string());

function toStatus(value: string): DocumentStatus {
	return DOCUMENT_STATUSES.find((status) => status === value) ?? 'failed';
}

function toPO(row: DocumentRow): DocumentPO {
	return {
		id: row.id,
		knowledgeBaseId: row.knowledge_base_id,
		title: row.title,
		content: row.content,
		source: row.source,
		filePath: row.file_path,
		fileType: row.file_type,
		author: row.author,
		category: row.category,
		tags: parseJsonColumn(row.tags_json, tagsSchema, [], 'document.tags_json'),
		chunkStrategy: isChunkStrategy(row.chunk_strategy) ? row.chunk_strategy : null,
		chunkSize: row.chunk_size,
		chunkOverlap: row.chunk_overlap,
		status: toStatus(row.status),
		errorMessage: row.error_message,
		charCount: row.char_count,
		wordCount: row.word_count,
		chunkCount: row.chunk_count,
		entityCount: row.entity_count,
		relationCount: row.relation_count,
		vectorStored: fromSqlBool(row.vector_stored),
		graphStored: fromSqlBool(row.graph_stored),
		processingTimeMs: row.processing_time_ms,
		processedAt: row.processed_at,
		createdAt: row.created_at,
		updatedAt: row.updated_at,
	};
}

/**
 * CRUD repository for `document` table.
 */
export class DocumentRepo {
	constructor(private readonly db: Kysely<DbSchema>) {}

	async insert(doc: DocumentPO): Promise<void> {
		await this.db
			.insertInto('document')
			.values({
				id: doc.id,
				knowledge_base_id: doc.knowledgeBaseId,
				title: doc.title,
				content: doc.content,
				source: doc.source,
				file_path: doc.filePath,
				file_type: doc.fileType,
				author: doc.author,
				category: doc.category,
				tags_json: JSON.stringify(doc.tags),
				chunk_strategy: doc.chunkStrategy,
				chunk_size: doc.chunkSize,
				chunk_overlap: doc.chunkOverlap,
				status: doc.status,
				error_message: doc.errorMessage,
				char_count: doc.charCount,
				word_count: doc.wordCount,
				chunk_count: doc.chunkCount,
				entity_count: doc.entityCount,
				relation_count: doc.relationCount,
				vector_stored: toSqlBool(doc.vectorStored),
				graph_stored: toSqlBool(doc.graphStored),
				processing_time_ms: doc.processingTimeMs,
				processed_at: doc.processedAt,
				created_at: doc.createdAt,
				updated_at: doc.updatedAt,
			})
			.execute();
	}

	async getById(id: string): Promise<DocumentPO | null> {
		const row = await this.db.selectFrom('document').selectAll().where('id', '=', id).executeTakeFirst();
		return row ? toPO(row) : null;
	}

	/**
	 * Documents of a knowledge base in creation order, optionally filtered by status.
	 */
	async listByKnowledgeBase(knowledgeBaseId: string, query: DocumentListQuery = {}): Promise<DocumentPO[]> {
		let q = this.db.selectFrom('document').selectAll().where('knowledge_base_id', '=', knowledgeBaseId);
		if (query.status) {
			q = q.where('status', '=', query.status);
		}
		const rows = await q
			.orderBy('created_at', 'asc')
			.orderBy('id', 'asc')
			.limit(query.limit ?? -1)
			.offset(query.offset ?? 0)
			.execute();
		return rows.map(toPO);
	}

	async update(id: string, patch: DocumentPatch): Promise<void> {
		const set: Updateable<DocumentRow> = { updated_at: Date.now() };
		if (patch.status !== undefined) set.status = patch.status;
		if (patch.errorMessage !== undefined) set.error_message = patch.errorMessage;
		if (patch.charCount !== undefined) set.char_count = patch.charCount;
		if (patch.wordCount !== undefined) set.word_count = patch.wordCount;
		if (patch.chunkCount !== undefined) set.chunk_count = patch.chunkCount;
		if (patch.entityCount !== undefined) set.entity_count = patch.entityCount;
		if (patch.relationCount !== undefined) set.relation_count = patch.relationCount;
		if (patch.vectorStored !== undefined) set.vector_stored = toSqlBool(patch.vectorStored);
		if (patch.graphStored !== undefined) set.graph_stored = toSqlBool(patch.graphStored);
		if (patch.processingTimeMs !== undefined) set.processing_time_ms = patch.processingTimeMs;
		if (patch.processedAt !== undefined) set.processed_at = patch.processedAt;
		await this.db.updateTable('document').set(set).where('id', '=', id).execute();
	}

	/**
	 * Delete a document. Its chunks go with it (foreign key cascade).
	 */
	async delete(id: string): Promise<boolean> {
		const result = await this.db.deleteFrom('document').where('id', '=', id).executeTakeFirst();
		return result.numDeletedRows > 0n;
	}
}
