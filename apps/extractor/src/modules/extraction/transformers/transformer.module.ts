/**
 * Transformer Module - NestJS module for match data transformers
 *
 * Registers all transformers and makes them available for dependency injection.
 * The orchestrator receives them through the TRANSFORMERS token.
 *
 * Adding a new transformer:
 * 1. Create transformer class implementing Transformer interface
 * 2. Add to TRANSFORMER_CLASSES
 * 3. Add to transformers array in useFactory
 */

import { Module } from "@nestjs/common";

// Orchestrator
import { TransformerOrchestrator, TRANSFORMERS } from "./transformer.orchestrator";

// Normalizer
import { EventNormalizer } from "./normalizers/event.normalizer";

// Extractors
import { RoundExtractor } from "./extractors/round.extractor";
import { KillExtractor } from "./extractors/kill.extractor";
import { DamageExtractor } from "./extractors/damage.extractor";
import { UtilityExtractor } from "./extractors/utility.extractor";
import { EconomyExtractor } from "./extractors/economy.extractor";
import { PlayerExtractor } from "./extractors/player.extractor";

// Computers
import { RoundStatsComputer } from "./computers/round-stats.computer";
import { PlayerStatsComputer } from "./computers/player-stats.computer";

// Analyzers
import { TradeDetector } from "./analyzers/trade.detector";
import { ClutchDetector } from "./analyzers/clutch.detector";

/**
 * All transformer classes - add new transformers here
 */
const TRANSFORMER_CLASSES = [
  RoundExtractor,
  KillExtractor,
  DamageExtractor,
  UtilityExtractor,
  EconomyExtractor,
  PlayerExtractor,
  RoundStatsComputer,
  TradeDetector,
  ClutchDetector,
  PlayerStatsComputer,
];

@Module({
  providers: [
    EventNormalizer,

    // Register all transformer classes as providers
    ...TRANSFORMER_CLASSES,

    // Provide transformers array for orchestrator injection
    {
      provide: TRANSFORMERS,
      useFactory: (
        roundExtractor: RoundExtractor,
        killExtractor: KillExtractor,
        damageExtractor: DamageExtractor,
        utilityExtractor: UtilityExtractor,
        economyExtractor: EconomyExtractor,
        playerExtractor: PlayerExtractor,
        roundStatsComputer: RoundStatsComputer,
        tradeDetector: TradeDetector,
        clutchDetector: ClutchDetector,
        playerStatsComputer: PlayerStatsComputer,
      ) => [
        roundExtractor,
        killExtractor,
        damageExtractor,
        utilityExtractor,
        economyExtractor,
        playerExtractor,
        roundStatsComputer,
        tradeDetector,
        clutchDetector,
        playerStatsComputer,
      ],
      inject: TRANSFORMER_CLASSES,
    },

    // Orchestrator
    TransformerOrchestrator,
  ],
  exports: [TransformerOrchestrator, EventNormalizer],
})
export class TransformerModule {}
