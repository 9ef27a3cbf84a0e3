import fs from 'fs';
import path from 'path';
import type { Kysely } from 'kysely';
import { BetterSqliteStore } from './BetterSqliteStore';
import type { Database as DbSchema } from './ddl';
import { DocChunkRepo } from './repositories/DocChunkRepo';
import { DocumentRepo } from './repositories/DocumentRepo';
import { GraphEdgeRepo } from './repositories/GraphEdgeRepo';
import { GraphNodeRepo } from './repositories/GraphNodeRepo';
import { KnowledgeBaseRepo } from './repositories/KnowledgeBaseRepo';

/**
 * Owns the SQLite connection and every repository built on it.
 */
export class SqliteStoreManager {
	readonly knowledgeBaseRepo: KnowledgeBaseRepo;
	readonly documentRepo: DocumentRepo;
	readonly docChunkRepo: DocChunkRepo;
	readonly graphNodeRepo: GraphNodeRepo;
	readonly graphEdgeRepo: GraphEdgeRepo;
	private closed = false;

	private constructor(private readonly store: BetterSqliteStore) {
		const kdb = store.kysely;
		this.knowledgeBaseRepo = new KnowledgeBaseRepo(kdb);
		this.documentRepo = new DocumentRepo(kdb);
		this.docChunkRepo = new DocChunkRepo(kdb);
		this.graphNodeRepo = new GraphNodeRepo(kdb);
		this.graphEdgeRepo = new GraphEdgeRepo(kdb);
	}

	/**
	 * Open (and migrate) the database. The parent folder of a file path is created when missing.
	 *
	 * @param dbFilePath - file path, or `':memory:'`
	 */
	static open(params: { dbFilePath: string }): SqliteStoreManager {
		if (params.dbFilePath !== ':memory:') {
			fs.mkdirSync(path.dirname(path.resolve(params.dbFilePath)), { recursive: true });
		}
		return new SqliteStoreManager(BetterSqliteStore.open({ dbFilePath: params.dbFilePath }));
	}

	getKysely(): Kysely<DbSchema> {
		if (this.closed) {
			throw new Error('SqliteStoreManager is closed');
		}
		return this.store.kysely;
	}

	async close(): Promise<void> {
		if (this.closed) return;
		this.closed = true;
		await this.store.close();
	}
}
