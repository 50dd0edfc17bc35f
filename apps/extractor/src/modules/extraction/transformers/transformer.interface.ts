/**
 * Transformer Interface - Contract for all match data transformers
 *
 * Usage:
 * 1. Implement Transformer interface
 * 2. Register in ExtractionModule providers
 * 3. Orchestrator executes by priority
 *
 * Transformers are synchronous: the whole match is already in memory and
 * nothing inside the derivation waits on I/O.
 */

import type {
  RawEventRow,
  Round,
  Player,
  Kill,
  Damage,
  Grenade,
  BombEvent,
  EconomySnapshot,
  RoundStats,
  Clutch,
  PlayerMatchStats,
} from "@match-insights/types";
import type { ExtractionSettings } from "../../../common/config";

// =============================================================================
// INPUT TYPES - Data coming from the parser
// =============================================================================

/** Named event tables, keyed by parser event name */
export type EventTables = Readonly<Record<string, readonly RawEventRow[]>>;

export interface DemoInfo {
  /** Demo file name, used as the match identifier */
  id: string;
  mapName: string;
  serverName: string;
  tickRate: number;
}

// =============================================================================
// STATE - Collections produced by transformers
// =============================================================================

/**
 * Canonical and derived collections of one match.
 *
 * Each transformer owns the collections it fills. Kills are the exception:
 * the round summarizer and the trade linker replace kill records with
 * annotated copies.
 */
export interface MatchState {
  rounds: Round[];
  players: Player[];
  kills: Kill[];
  damages: Damage[];
  grenades: Grenade[];
  bombEvents: BombEvent[];
  economy: EconomySnapshot[];
  roundStats: RoundStats[];
  clutches: Clutch[];
  playerStats: PlayerMatchStats[];

  /** Malformed rows dropped per event kind */
  dropped: Record<string, number>;
}

// =============================================================================
// CONTEXT - Shared data passed to all transformers
// =============================================================================

export interface TransformContext {
  /** Match identifier */
  demoId: string;

  /** Demo metadata */
  demo: DemoInfo;

  /** Raw event tables from the parser */
  tables: EventTables;

  /** Resolved settings for this run */
  settings: ExtractionSettings;

  /** Collections built so far */
  state: MatchState;
}

export interface TransformOptions {
  /** Skip specific transformers by name */
  skip?: string[];

  /** Only run specific transformers */
  only?: string[];
}

// =============================================================================
// RESULT - Output from each transformer
// =============================================================================

export interface TransformResult {
  /** Transformer name */
  transformer: string;

  /** Success status */
  success: boolean;

  /** Number of records created or annotated */
  recordsCreated: number;

  /** Processing time in milliseconds */
  processingTimeMs: number;

  /** Additional metrics specific to transformer */
  metrics?: Record<string, number>;

  /** Errors encountered (non-fatal) */
  warnings?: string[];

  /** Fatal error message if success=false */
  error?: string;
}

// =============================================================================
// TRANSFORMER CONTRACT
// =============================================================================

/**
 * Base transformer interface
 *
 * Priority determines execution order (lower = runs first).
 *
 * Dependencies:
 * - Extractors (5-14) fill the canonical collections
 * - RoundStatsComputer (15) and TradeDetector (20) only need kills and rounds
 * - ClutchDetector (25) needs kills and round winners
 * - PlayerStatsComputer (30) needs everything above
 */
export interface Transformer {
  /** Unique identifier for this transformer */
  readonly name: string;

  /** Execution priority (lower = runs first) */
  readonly priority: number;

  /** Human-readable description */
  readonly description: string;

  /**
   * Execute the transformation
   *
   * Must be idempotent: running it twice on the same context leaves the
   * same state.
   */
  transform(ctx: TransformContext): TransformResult;

  /**
   * Check if this transformer should run (e.g. skip if required data is missing)
   */
  shouldRun?(ctx: TransformContext): boolean;
}

// =============================================================================
// ORCHESTRATOR RESULT
// =============================================================================

export interface OrchestrationResult {
  /** Overall success (all transformers succeeded) */
  success: boolean;

  /** Total processing time */
  totalTimeMs: number;

  /** Results from each transformer */
  results: TransformResult[];

  /** Transformers that were skipped */
  skipped: string[];

  /** Summary metrics */
  summary: {
    total: number;
    succeeded: number;
    failed: number;
    recordsCreated: number;
  };
}

// =============================================================================
// HELPERS
// =============================================================================

export function createEmptyState(): MatchState {
  return {
    rounds: [],
    players: [],
    kills: [],
    damages: [],
    grenades: [],
    bombEvents: [],
    economy: [],
    roundStats: [],
    clutches: [],
    playerStats: [],
    dropped: {},
  };
}

/**
 * Create success result
 */
export function createResult(
  transformer: string,
  startTime: number,
  recordsCreated: number,
  metrics: Record<string, number>,
  warnings?: string[],
): TransformResult {
  const result: TransformResult = {
    transformer,
    success: true,
    recordsCreated,
    processingTimeMs: Date.now() - startTime,
    metrics,
  };
  if (warnings && warnings.length > 0) {
    result.warnings = warnings;
  }
  return result;
}

/**
 * Create error result
 */
export function createErrorResult(
  transformer: string,
  startTime: number,
  error: unknown,
): TransformResult {
  return {
    transformer,
    success: false,
    recordsCreated: 0,
    processingTimeMs: Date.now() - startTime,
    error: error instanceof Error ? error.message : String(error),
  };
}
