import { sql, type Kysely } from 'kysely';
import type { Database as DbSchema } from '../ddl';
import { stableId } from '@/core/utils/hash-utils';

export type GraphEdgeRow = DbSchema['graph_edges'];

/**
 * CRUD repository for `graph_edges` table.
 */
export class GraphEdgeRepo {
	constructor(private readonly db: Kysely<DbSchema>) {}

	/**
	 * Stable edge id: the same (from, type, to) always maps to the same row.
	 */
	static generateEdgeId(fromNodeId: string, toNodeId: string, type: string): string {
		return stableId(fromNodeId, type, toNodeId);
	}

	/**
	 * Insert an edge, or add its weight to the existing one and replace the attributes.
	 */
	async upsert(edge: {
		from_node_id: string;
		to_node_id: string;
		type: string;
		weight?: number;
		attributes: string;
	}): Promise<void> {
		const now = Date.now();
		await this.db
			.insertInto('graph_edges')
			.values({
				id: GraphEdgeRepo.generateEdgeId(edge.from_node_id, edge.to_node_id, edge.type),
				from_node_id: edge.from_node_id,
				to_node_id: edge.to_node_id,
				type: edge.type,
				weight: edge.weight ?? 1.0,
				attributes: edge.attributes,
				created_at: now,
				updated_at: now,
			})
			.onConflict((oc) =>
				oc.column('id').doUpdateSet({
					weight: sql<number>`graph_edges.weight + excluded.weight`,
					attributes: (eb) => eb.ref('excluded.attributes'),
					updated_at: (eb) => eb.ref('excluded.updated_at'),
				}),
			)
			.execute();
	}

	async getByFromNode(fromNodeId: string): Promise<GraphEdgeRow[]> {
		return await this.db
			.selectFrom('graph_edges')
			.selectAll()
			.where('from_node_id', '=', fromNodeId)
			.orderBy('created_at')
			.orderBy('id')
			.execute();
	}

	async getByToNode(toNodeId: string): Promise<GraphEdgeRow[]> {
		return await this.db
			.selectFrom('graph_edges')
			.selectAll()
			.where('to_node_id', '=', toNodeId)
			.orderBy('created_at')
			.orderBy('id')
			.execute();
	}

	async count(): Promise<number> {
		const row = await this.db
			.selectFrom('graph_edges')
			.select((eb) => eb.fn.countAll<number>().as('count'))
			.executeTakeFirstOrThrow();
		return Number(row.count);
	}
}
