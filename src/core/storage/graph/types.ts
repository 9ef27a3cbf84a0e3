import type { GraphNodePO, Triple } from '@/core/po/graph.po';

export interface TripleInsertResult {
	success: number;
	failed: number;
}

/**
 * Write side of a graph database as the processing pipeline sees it.
 */
export interface GraphStoreClient {
	/**
	 * Insert triples in batches of `batchSize`. A failing triple counts toward `failed`
	 * and does not stop the rest of the batch.
	 */
	insertTriplesBatch(triples: Triple[], batchSize?: number): Promise<TripleInsertResult>;
}

/**
 * One edge seen from an entity: the predicate, its direction and the entity at the other end.
 */
export interface GraphNeighbor {
	predicate: string;
	direction: 'out' | 'in';
	weight: number;
	node: GraphNodePO;
}
