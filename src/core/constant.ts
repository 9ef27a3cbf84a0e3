/*
 * Common constants. Some of them are configurable in settings, while others are not -- so they are here.
 */

/**
 * Files written by a saved vector index.
 */
export const VECTOR_INDEX_FILENAME = 'index.bin';
export const VECTOR_METADATA_FILENAME = 'metadata.json';

/**
 * Added to the vector norm before dividing, so a zero vector normalizes to zero instead of NaN.
 */
export const NORMALIZE_EPSILON = 1e-8;

/**
 * Chunk start positions are located by searching for this many leading characters.
 */
export const CHUNK_POSITION_PROBE_LENGTH = 50;

/**
 * Default top K value for search results.
 */
export const DEFAULT_SEARCH_TOP_K = 5;

/**
 * Default top K value for graph search.
 */
export const DEFAULT_GRAPH_TOP_K = 10;

/**
 * Graph-only search attaches at most this many chunks per matched entity.
 */
export const GRAPH_CHUNKS_PER_ENTITY = 3;

/**
 * Fallback entity type for unknown or missing types.
 */
export const DEFAULT_ENTITY_TYPE = 'Concept';

/**
 * Fallback predicate when a relation comes without one.
 */
export const DEFAULT_PREDICATE = 'RELATES_TO';

/**
 * Confidence assigned to relations the extractor did not score.
 */
export const DEFAULT_RELATION_CONFIDENCE = 0.8;

/**
 * Prefix for external ids of chunk vectors in the vector index.
 */
export const CHUNK_VECTOR_ID_PREFIX = 'chunk_';
