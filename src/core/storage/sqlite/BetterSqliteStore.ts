import Database from 'better-sqlite3';
import { Kysely, SqliteDialect } from 'kysely';
import { migrateSqliteSchema } from '@/core/storage/sqlite/ddl';
import type { Database as DbSchema } from '@/core/storage/sqlite/ddl';

/**
 * File-based SQLite store backed by better-sqlite3.
 *
 * Pass `':memory:'` as the path for a throwaway database (tests).
 * Runs on the main thread; callers should batch writes in a transaction.
 */
export class BetterSqliteStore {
	readonly kysely: Kysely<DbSchema>;
	readonly rawDb: Database.Database;

	private constructor(db: Database.Database) {
		this.rawDb = db;
		this.kysely = new Kysely<DbSchema>({
			dialect: new SqliteDialect({
				database: db,
			}),
		});
	}

	static open(params: { dbFilePath: string }): BetterSqliteStore {
		const db = new Database(params.dbFilePath);
		if (params.dbFilePath !== ':memory:') {
			db.pragma('journal_mode = WAL');
		}
		db.pragma('foreign_keys = ON');
		migrateSqliteSchema(db);
		return new BetterSqliteStore(db);
	}

	async close(): Promise<void> {
		// Destroying the Kysely instance closes the underlying connection.
		await this.kysely.destroy();
	}
}
