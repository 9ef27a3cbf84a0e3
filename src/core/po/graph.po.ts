/**
 * Subject/predicate/object record with entity types, the unit written to the graph store.
 */
export interface Triple {
	subject: string;
	subjectType: string;
	predicate: string;
	object: string;
	objectType: string;
}

/**
 * Graph node PO (Persistent Object). One node per (type, name) entity.
 */
export interface GraphNodePO {
	/**
	 * Format: "entity:${type}:${name}".
	 */
	id: string;
	type: string;
	label: string;
	attributes: Record<string, unknown>;
	createdAt: number;
	updatedAt: number;
}

/**
 * Graph edge PO (Persistent Object). Typed by the relation predicate.
 */
export interface GraphEdgePO {
	id: string;
	fromNodeId: string;
	toNodeId: string;
	type: string;
	weight: number;
	attributes: Record<string, unknown>;
	createdAt: number;
	updatedAt: number;
}
