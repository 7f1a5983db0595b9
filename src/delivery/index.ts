// ============================================================================
// Delivery Module — Barrel Export
// ============================================================================

export type {
  BatchOutcome,
  DeliveredFile,
  DeliverySettings,
  FileResult,
  RelocationFailedFile,
  SendFailedFile,
} from './types.js';

export { DeliveryIncompleteError, OrchestrationError } from './errors.js';
export type { OrchestrationErrorCode } from './errors.js';

export { nodeFileSystem } from './file-system.js';
export type { FileSystem } from './file-system.js';
export { assertDeliveryComplete, runDelivery, summarize } from './orchestrator.js';
export type { DeliveryDeps } from './orchestrator.js';
