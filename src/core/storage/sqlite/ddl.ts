/**
 * Database schema definition for type safety.
 *
 * Booleans are stored as 0/1 integers, timestamps as epoch milliseconds and
 * list/object columns as JSON text.
 */
export interface Database {
	knowledge_base: {
		id: string;
		name: string;
		description: string | null;
		chunk_strategy: string;
		chunk_size: number;
		chunk_overlap: number;
		enable_vector_store: number;
		enable_knowledge_graph: number;
		enable_ner: number;
		embedding_model: string;
		document_count: number;
		total_chunks: number;
		created_at: number;
		updated_at: number;
	};
	document: {
		id: string;
		knowledge_base_id: string;
		title: string;
		content: string;
		source: string | null;
		file_path: string | null;
		file_type: string | null;
		author: string | null;
		category: string | null;
		tags_json: string;
		chunk_strategy: string | null;
		chunk_size: number | null;
		chunk_overlap: number | null;
		status: string;
		error_message: string | null;
		char_count: number;
		word_count: number;
		chunk_count: number;
		entity_count: number;
		relation_count: number;
		vector_stored: number;
		graph_stored: number;
		processing_time_ms: number | null;
		processed_at: number | null;
		created_at: number;
		updated_at: number;
	};
	doc_chunk: {
		id: string;
		document_id: string;
		knowledge_base_id: string;
		chunk_index: number;
		content: string;
		chunk_type: string;
		start_pos: number;
		end_pos: number;
		char_count: number;
		word_count: number;
		vector_id: string | null;
		embedding_model: string | null;
		has_embedding: number;
		entities_json: string;
		relations_json: string;
		keywords_json: string;
		created_at: number;
		updated_at: number;
	};
	graph_nodes: {
		/**
		 * Prefixed identifier, e.g. `entity:Person:Alice`.
		 */
		id: string;
		type: string;
		label: string;
		attributes: string;
		created_at: number;
		updated_at: number;
	};
	graph_edges: {
		id: string;
		from_node_id: string;
		to_node_id: string;
		type: string;
		weight: number;
		attributes: string;
		created_at: number;
		updated_at: number;
	};
}

/**
 * Anything that can run a multi-statement SQL script (better-sqlite3 `Database`).
 */
interface SqliteDatabaseLike {
	exec(sql: string): void;
}

/**
 * Apply schema migrations. Keep this idempotent.
 */
export function migrateSqliteSchema(db: SqliteDatabaseLike): void {
	db.exec(`
		CREATE TABLE IF NOT EXISTS knowledge_base (
			id TEXT PRIMARY KEY,
			name TEXT NOT NULL UNIQUE,
			description TEXT,
			chunk_strategy TEXT NOT NULL,
			chunk_size INTEGER NOT NULL,
			chunk_overlap INTEGER NOT NULL,
			enable_vector_store INTEGER NOT NULL DEFAULT 1,
			enable_knowledge_graph INTEGER NOT NULL DEFAULT 0,
			enable_ner INTEGER NOT NULL DEFAULT 0,
			embedding_model TEXT NOT NULL,
			document_count INTEGER NOT NULL DEFAULT 0,
			total_chunks INTEGER NOT NULL DEFAULT 0,
			created_at INTEGER NOT NULL,
			updated_at INTEGER NOT NULL
		);
		CREATE TABLE IF NOT EXISTS document (
			id TEXT PRIMARY KEY,
			knowledge_base_id TEXT NOT NULL,
			title TEXT NOT NULL,
			content TEXT NOT NULL,
			source TEXT,
			file_path TEXT,
			file_type TEXT,
			author TEXT,
			category TEXT,
			tags_json TEXT NOT NULL DEFAULT '[]',
			chunk_strategy TEXT,
			chunk_size INTEGER,
			chunk_overlap INTEGER,
			status TEXT NOT NULL,
			error_message TEXT,
			char_count INTEGER NOT NULL DEFAULT 0,
			word_count INTEGER NOT NULL DEFAULT 0,
			chunk_count INTEGER NOT NULL DEFAULT 0,
			entity_count INTEGER NOT NULL DEFAULT 0,
			relation_count INTEGER NOT NULL DEFAULT 0,
			vector_stored INTEGER NOT NULL DEFAULT 0,
			graph_stored INTEGER NOT NULL DEFAULT 0,
			processing_time_ms INTEGER,
			processed_at INTEGER,
			created_at INTEGER NOT NULL,
			updated_at INTEGER NOT NULL,
			FOREIGN KEY (knowledge_base_id) REFERENCES knowledge_base(id) ON DELETE CASCADE
		);
		CREATE INDEX IF NOT EXISTS idx_document_kb ON document(knowledge_base_id);
		CREATE INDEX IF NOT EXISTS idx_document_status ON document(status);
		CREATE TABLE IF NOT EXISTS doc_chunk (
			id TEXT PRIMARY KEY,
			document_id TEXT NOT NULL,
			knowledge_base_id TEXT NOT NULL,
			chunk_index INTEGER NOT NULL,
			content TEXT NOT NULL,
			chunk_type TEXT NOT NULL,
			start_pos INTEGER NOT NULL,
			end_pos INTEGER NOT NULL,
			char_count INTEGER NOT NULL,
			word_count INTEGER NOT NULL,
			vector_id TEXT,
			embedding_model TEXT,
			has_embedding INTEGER NOT NULL DEFAULT 0,
			entities_json TEXT NOT NULL DEFAULT '[]',
			relations_json TEXT NOT NULL DEFAULT '[]',
			keywords_json TEXT NOT NULL DEFAULT '[]',
			created_at INTEGER NOT NULL,
			updated_at INTEGER NOT NULL,
			FOREIGN KEY (document_id) REFERENCES document(id) ON DELETE CASCADE
		);
		CREATE UNIQUE INDEX IF NOT EXISTS idx_doc_chunk_doc_index ON doc_chunk(document_id, chunk_index);
		CREATE INDEX IF NOT EXISTS idx_doc_chunk_kb ON doc_chunk(knowledge_base_id);
		CREATE TABLE IF NOT EXISTS graph_nodes (
			id TEXT PRIMARY KEY,
			type TEXT NOT NULL,
			label TEXT NOT NULL,
			attributes TEXT NOT NULL,
			created_at INTEGER NOT NULL,
			updated_at INTEGER NOT NULL
		);
		CREATE INDEX IF NOT EXISTS idx_graph_nodes_type ON graph_nodes(type);
		CREATE INDEX IF NOT EXISTS idx_graph_nodes_label ON graph_nodes(label);
		CREATE TABLE IF NOT EXISTS graph_edges (
			id TEXT PRIMARY KEY,
			from_node_id TEXT NOT NULL,
			to_node_id TEXT NOT NULL,
			type TEXT NOT NULL,
			weight REAL NOT NULL DEFAULT 1.0,
			attributes TEXT NOT NULL,
			created_at INTEGER NOT NULL,
			updated_at INTEGER NOT NULL,
			FOREIGN KEY (from_node_id) REFERENCES graph_nodes(id) ON DELETE CASCADE,
			FOREIGN KEY (to_node_id) REFERENCES graph_nodes(id) ON DELETE CASCADE
		);
		CREATE INDEX IF NOT EXISTS idx_graph_edges_from_node ON graph_edges(from_node_id);
		CREATE INDEX IF NOT EXISTS idx_graph_edges_to_node ON graph_edges(to_node_id);
		CREATE INDEX IF NOT EXISTS idx_graph_edges_type ON graph_edges(type);
	`);
}
