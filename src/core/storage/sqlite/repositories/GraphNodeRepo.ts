import type { Kysely } from 'kysely';
import type { Database as DbSchema } from '../ddl';

export type GraphNodeRow = DbSchema['graph_nodes'];

/**
 * CRUD repository for `graph_nodes` table.
 */
export class GraphNodeRepo {
	constructor(private readonly db: Kysely<DbSchema>) {}

	/**
	 * Upsert a graph node. An existing node keeps its `created_at`.
	 *
	 * @param node.id - Prefixed identifier, e.g. `entity:Person:Alice`.
	 */
	async upsert(node: {
		id: string;
		type: string;
		label: string;
		attributes: string;
		created_at?: number;
		updated_at?: number;
	}): Promise<void> {
		const now = Date.now();
		await this.db
			.insertInto('graph_nodes')
			.values({
				id: node.id,
				type: node.type,
				label: node.label,
				attributes: node.attributes,
				created_at: node.created_at ?? now,
				updated_at: node.updated_at ?? now,
			})
			.onConflict((oc) =>
				oc.column('id').doUpdateSet({
					type: (eb) => eb.ref('excluded.type'),
					label: (eb) => eb.ref('excluded.label'),
					attributes: (eb) => eb.ref('excluded.attributes'),
					updated_at: (eb) => eb.ref('excluded.updated_at'),
				}),
			)
			.execute();
	}

	async getById(id: string): Promise<GraphNodeRow | null> {
		const row = await this.db.selectFrom('graph_nodes').selectAll().where('id', '=', id).executeTakeFirst();
		return row ?? null;
	}

	/**
	 * Nodes carrying this label, across all types.
	 */
	async getByLabel(label: string): Promise<GraphNodeRow[]> {
		return await this.db.selectFrom('graph_nodes').selectAll().where('label', '=', label).orderBy('id').execute();
	}

	/**
	 * Get nodes by IDs (batch).
	 */
	async getByIds(ids: string[]): Promise<Map<string, GraphNodeRow>> {
		if (!ids.length) return new Map();
		const rows = await this.db.selectFrom('graph_nodes').selectAll().where('id', 'in', ids).execute();
		return new Map(rows.map((row) => [row.id, row]));
	}

	async count(): Promise<number> {
		const row = await this.db
			.selectFrom('graph_nodes')
			.select((eb) => eb.fn.countAll<number>().as('count'))
			.executeTakeFirstOrThrow();
		return Number(row.count);
	}
}
