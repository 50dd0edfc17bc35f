/**
 * Transformers Module - Barrel exports
 *
 * Usage:
 * import { TransformerOrchestrator, TransformerModule } from './transformers';
 */

// Module
export { TransformerModule } from "./transformer.module";

// Orchestrator
export { TransformerOrchestrator, TRANSFORMERS } from "./transformer.orchestrator";

// Interfaces
export type {
  Transformer,
  TransformContext,
  TransformResult,
  TransformOptions,
  OrchestrationResult,
  MatchState,
  DemoInfo,
  EventTables,
} from "./transformer.interface";
export { createEmptyState } from "./transformer.interface";

// Normalizer
export { EventNormalizer } from "./normalizers/event.normalizer";

// Extractors
export * from "./extractors";

// Computers
export * from "./computers";

// Analyzers
export * from "./analyzers";
