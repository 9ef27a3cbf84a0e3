/**
 * Business error codes for application errors
 */
export enum ErrorCode {
	CONFIGURATION_INVALID = 'CONFIGURATION_INVALID',
	CONFIGURATION_MISSING = 'CONFIGURATION_MISSING',
	EMBEDDING_UNAVAILABLE = 'EMBEDDING_UNAVAILABLE',
	DIMENSION_MISMATCH = 'DIMENSION_MISMATCH',
	INDEX_NOT_TRAINED = 'INDEX_NOT_TRAINED',
	NOT_FOUND = 'NOT_FOUND',
	EXTRACTION_FAILED = 'EXTRACTION_FAILED',
	PROCESSING_FAILED = 'PROCESSING_FAILED',
	INVALID_STATE = 'INVALID_STATE',
	UNKNOWN_ERROR = 'UNKNOWN_ERROR',
}

/**
 * Default error message when the embedding service cannot be reached
 */
export const EMBEDDING_UNAVAILABLE_MESSAGE = 'Embedding service is currently unavailable. Please check the embedding settings and ensure the provider is running.';

/**
 * Custom error class for business errors
 */
export class BusinessError extends Error {
	constructor(
		public readonly code: ErrorCode,
		message: string,
		cause?: unknown
	) {
		super(message);
		this.name = 'BusinessError';
		if (cause !== undefined) {
			this.cause = cause;
		}
	}
}

/**
 * Invalid parameters supplied by the caller (chunker sizes, index type/metric combination, settings).
 */
export class ConfigurationError extends BusinessError {
	constructor(message: string) {
		super(ErrorCode.CONFIGURATION_INVALID, message);
		this.name = 'ConfigurationError';
	}
}

/**
 * Upstream embedding service unreachable or returned a malformed payload.
 */
export class EmbeddingUnavailableError extends BusinessError {
	constructor(message: string, cause?: unknown) {
		super(ErrorCode.EMBEDDING_UNAVAILABLE, message, cause);
		this.name = 'EmbeddingUnavailableError';
	}
}

export class DimensionMismatchError extends BusinessError {
	constructor(
		public readonly expected: number,
		public readonly actual: number,
	) {
		super(ErrorCode.DIMENSION_MISMATCH, `Embedding dimension mismatch: expected ${expected}, got ${actual}`);
		this.name = 'DimensionMismatchError';
	}
}

export class IndexNotTrainedError extends BusinessError {
	constructor(message = 'IVF index must be trained before it can be searched') {
		super(ErrorCode.INDEX_NOT_TRAINED, message);
		this.name = 'IndexNotTrainedError';
	}
}

export class NotFoundError extends BusinessError {
	constructor(
		public readonly entity: string,
		public readonly id: string,
	) {
		super(ErrorCode.NOT_FOUND, `${entity} not found: ${id}`);
		this.name = 'NotFoundError';
	}
}

export class ExtractionError extends BusinessError {
	constructor(message: string, cause?: unknown) {
		super(ErrorCode.EXTRACTION_FAILED, message, cause);
		this.name = 'ExtractionError';
	}
}

/**
 * Operation not allowed in the target's current state (duplicate name, document mid-run).
 */
export class InvalidStateError extends BusinessError {
	constructor(message: string) {
		super(ErrorCode.INVALID_STATE, message);
		this.name = 'InvalidStateError';
	}
}

/**
 * Any pipeline failure that ends a document run. The message is recorded on the document.
 */
export class ProcessingFailure extends BusinessError {
	constructor(message: string, cause?: unknown) {
		super(ErrorCode.PROCESSING_FAILED, message, cause);
		this.name = 'ProcessingFailure';
	}
}

/**
 * Get user-friendly error message from an error
 */
export function getErrorMessage(error: unknown): string {
	if (error instanceof BusinessError) {
		if (error.code === ErrorCode.EMBEDDING_UNAVAILABLE && !error.message) {
			return EMBEDDING_UNAVAILABLE_MESSAGE;
		}
		return error.message;
	}

	if (error instanceof Error) {
		return error.message;
	}

	return String(error);
}
