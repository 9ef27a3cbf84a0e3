import type { Kysely } from 'kysely';
import { z } from 'zod';
import { DEFAULT_ENTITY_TYPE, DEFAULT_PREDICATE } from '@/core/constant';
import { getErrorMessage } from '@/core/errors';
import type { GraphNodePO, Triple } from '@/core/po/graph.po';
import type { Database as DbSchema } from '@/core/storage/sqlite/ddl';
import { GraphEdgeRepo } from '@/core/storage/sqlite/repositories/GraphEdgeRepo';
import { GraphNodeRepo, type GraphNodeRow } from '@/core/storage/sqlite/repositories/GraphNodeRepo';
import { parseJsonColumn } from '@/core/storage/sqlite/utils';
import { buildEntityNodeId } from '@/core/utils/id-utils';
import type { GraphNeighbor, GraphStoreClient, TripleInsertResult } from './types';

const DEFAULT_BATCH_SIZE = 100;
const attributesSchema = z.record(z.string(), z.unknown());

function toNodePO(row: GraphNodeRow): GraphNodePO {
	return {
		id: row.id,
		type: row.type,
		label: row.label,
		attributes: parseJsonColumn(row.attributes, attributesSchema, {}, 'graph_nodes.attributes'),
		createdAt: row.created_at,
		updatedAt: row.updated_at,
	};
}

/**
 * Entity graph persisted in the `graph_nodes` / `graph_edges` tables.
 *
 * Each triple upserts one node per (type, name) entity and one edge typed by the
 * predicate. Re-inserting a triple raises the edge weight.
 */
export class SqliteGraphStore implements GraphStoreClient {
	private readonly nodeRepo: GraphNodeRepo;
	private readonly edgeRepo: GraphEdgeRepo;

	constructor(private readonly db: Kysely<DbSchema>) {
		this.nodeRepo = new GraphNodeRepo(db);
		this.edgeRepo = new GraphEdgeRepo(db);
	}

	async insertTriplesBatch(triples: Triple[], batchSize = DEFAULT_BATCH_SIZE): Promise<TripleInsertResult> {
		const size = Math.max(1, Math.floor(batchSize));
		const result: TripleInsertResult = { success: 0, failed: 0 };

		for (let start = 0; start < triples.length; start += size) {
			const batch = triples.slice(start, start + size);
			try {
				const batchResult = await this.db.transaction().execute(async (trx) => {
					const nodeRepo = new GraphNodeRepo(trx);
					const edgeRepo = new GraphEdgeRepo(trx);
					const counts: TripleInsertResult = { success: 0, failed: 0 };
					for (const triple of batch) {
						try {
							await this.insertTriple(triple, nodeRepo, edgeRepo);
							counts.success++;
						} catch (error) {
							counts.failed++;
							console.warn('[SqliteGraphStore] Skipping triple:', getErrorMessage(error));
						}
					}
					return counts;
				});
				result.success += batchResult.success;
				result.failed += batchResult.failed;
			} catch (error) {
				result.failed += batch.length;
				console.error(`[SqliteGraphStore] Batch starting at ${start} failed:`, error);
			}
		}

		console.info(`[SqliteGraphStore] Inserted ${result.success} triples, ${result.failed} failed`);
		return result;
	}

	async getNode(type: string, name: string): Promise<GraphNodePO | null> {
		const row = await this.nodeRepo.getById(buildEntityNodeId(type, name));
		return row ? toNodePO(row) : null;
	}

	/**
	 * Edges touching any entity named `name`, outgoing first.
	 */
	async getNeighbors(name: string): Promise<GraphNeighbor[]> {
		const nodes = await this.nodeRepo.getByLabel(name);
		const neighbors: GraphNeighbor[] = [];
		for (const node of nodes) {
			const outgoing = await this.edgeRepo.getByFromNode(node.id);
			const incoming = await this.edgeRepo.getByToNode(node.id);
			const others = await this.nodeRepo.getByIds([
				...outgoing.map((e) => e.to_node_id),
				...incoming.map((e) => e.from_node_id),
			]);
			for (const edge of outgoing) {
				const other = others.get(edge.to_node_id);
				if (other) {
					neighbors.push({ predicate: edge.type, direction: 'out', weight: edge.weight, node: toNodePO(other) });
				}
			}
			for (const edge of incoming) {
				const other = others.get(edge.from_node_id);
				if (other) {
					neighbors.push({ predicate: edge.type, direction: 'in', weight: edge.weight, node: toNodePO(other) });
				}
			}
		}
		return neighbors;
	}

	async countNodes(): Promise<number> {
		return this.nodeRepo.count();
	}

	async countEdges(): Promise<number> {
		return this.edgeRepo.count();
	}

	private async insertTriple(triple: Triple, nodeRepo: GraphNodeRepo, edgeRepo: GraphEdgeRepo): Promise<void> {
		const subject = triple.subject.trim();
		const object = triple.object.trim();
		if (!subject || !object) {
			throw new Error(`triple needs a subject and an object: ${JSON.stringify(triple)}`);
		}
		const subjectType = triple.subjectType.trim() || DEFAULT_ENTITY_TYPE;
		const objectType = triple.objectType.trim() || DEFAULT_ENTITY_TYPE;
		const predicate = triple.predicate.trim() || DEFAULT_PREDICATE;

		const fromId = buildEntityNodeId(subjectType, subject);
		const toId = buildEntityNodeId(objectType, object);
		await nodeRepo.upsert({ id: fromId, type: subjectType, label: subject, attributes: JSON.stringify({ name: subject }) });
		await nodeRepo.upsert({ id: toId, type: objectType, label: object, attributes: JSON.stringify({ name: object }) });
		await edgeRepo.upsert({
			from_node_id: fromId,
			to_node_id: toId,
			type: predicate,
			attributes: JSON.stringify({ predicate }),
		});
	}
}
