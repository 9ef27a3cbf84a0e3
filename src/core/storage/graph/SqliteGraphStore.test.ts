import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { SqliteStoreManager } from '@/core/storage/sqlite/SqliteStoreManager';
import type { Triple } from '@/core/po';
import { SqliteGraphStore } from './SqliteGraphStore';

let store: SqliteStoreManager;
let graph: SqliteGraphStore;

beforeEach(() => {
	store = SqliteStoreManager.open({ dbFilePath: ':memory:' });
	graph = new SqliteGraphStore(store.getKysely());
});

afterEach(async () => {
	await store.close();
});

function triple(subject: string, predicate: string, object: string): Triple {
	return { subject, subjectType: 'Person', predicate, object, objectType: 'Organization' };
}

describe('SqliteGraphStore', () => {
	it('creates one node per entity and one edge per predicate', async () => {
		const result = await graph.insertTriplesBatch([
			triple('Alice', 'works at', 'Acme'),
			triple('Bob', 'works at', 'Acme'),
			triple('Alice', 'founded', 'Acme'),
		]);
		expect(result).toEqual({ success: 3, failed: 0 });
		expect(await graph.countNodes()).toBe(3);
		expect(await graph.countEdges()).toBe(3);

		const acme = await graph.getNode('Organization', 'Acme');
		expect(acme).toMatchObject({ id: 'entity:Organization:Acme', label: 'Acme', attributes: { name: 'Acme' } });
	});

	it('raises the weight of a repeated triple', async () => {
		await graph.insertTriplesBatch([triple('Alice', 'works at', 'Acme'), triple('Alice', 'works at', 'Acme')]);
		const neighbors = await graph.getNeighbors('Alice');
		expect(neighbors).toHaveLength(1);
		expect(neighbors[0]).toMatchObject({ predicate: 'works at', direction: 'out', weight: 2 });
		expect(neighbors[0].node.label).toBe('Acme');
	});

	it('reports incoming edges', async () => {
		await graph.insertTriplesBatch([triple('Alice', 'works at', 'Acme')]);
		const neighbors = await graph.getNeighbors('Acme');
		expect(neighbors.map((n) => [n.direction, n.node.label])).toEqual([['in', 'Alice']]);
	});

	it('counts invalid triples as failed without dropping the batch', async () => {
		const result = await graph.insertTriplesBatch(
			[triple('Alice', 'works at', 'Acme'), triple('  ', 'works at', 'Acme'), triple('Carol', '', 'Acme')],
			2,
		);
		expect(result).toEqual({ success: 2, failed: 1 });
		const carol = await graph.getNeighbors('Carol');
		expect(carol[0].predicate).toBe('RELATES_TO');
	});

	it('handles an empty input', async () => {
		expect(await graph.insertTriplesBatch([])).toEqual({ success: 0, failed: 0 });
	});
});
