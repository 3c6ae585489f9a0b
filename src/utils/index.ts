/**
 * Shared utilities
 */

export { VectorUtils, type SimilarityMatrix, type SimilarPair, type SimilarityResult, type EmbeddingCache } from './vector-utils.js';
export {
  ErrorHandler,
  ErrorCategory,
  ErrorSeverity,
  HypergraphRAGError,
  EmbeddingError,
  GenerationError,
  ValidationError,
  StorageError,
  toError,
  type ErrorInfo,
  type ErrorResult,
  type SuccessResult,
  type OperationResult,
  type RetryOptions
} from './error-handler.js';
