/**
 * Engine configuration: rule distances, round limits and scoring values.
 */

import { z } from 'zod';
import type { LogLevel } from '../utils/logger';

export const EngineConfigSchema = z.object({
  maxBattleRounds: z.number().int().positive(),
  engagementRange: z.number().positive(),
  coherencyDistance: z.number().positive(),
  objectiveControlRange: z.number().positive(),
  verticalTerrainThreshold: z.number().nonnegative(),
  maxChargeDistance: z.number().positive(),
  reserveArrivalDistance: z.number().positive(),
  firstReserveRound: z.number().int().positive(),
  cpPerCommandPhase: z.number().int().nonnegative(),
  startingCp: z.number().int().nonnegative(),
  vpPerObjective: z.number().int().nonnegative(),
  holdTimerRequired: z.number().int().nonnegative(),
  pileInDistance: z.number().nonnegative(),
  logLevel: z.enum(['debug', 'info', 'warn', 'error', 'silent'])
});

export interface EngineConfig {
  /** Match ends once this battle round has been played */
  maxBattleRounds: number;
  /** Distance (inches) within which units are locked in melee */
  engagementRange: number;
  /** Maximum gap between models of the same unit */
  coherencyDistance: number;
  objectiveControlRange: number;
  /** Terrain taller than this costs vertical movement to cross */
  verticalTerrainThreshold: number;
  maxChargeDistance: number;
  /** Reserves must arrive more than this far from every enemy model */
  reserveArrivalDistance: number;
  firstReserveRound: number;
  cpPerCommandPhase: number;
  startingCp: number;
  vpPerObjective: number;
  /** Consecutive scoring phases an objective must be held before it scores */
  holdTimerRequired: number;
  /** Pile-in and consolidation move */
  pileInDistance: number;
  logLevel: LogLevel;
}

export const DEFAULT_ENGINE_CONFIG: EngineConfig = {
  maxBattleRounds: 5,
  engagementRange: 1,
  coherencyDistance: 2,
  objectiveControlRange: 3,
  verticalTerrainThreshold: 2,
  maxChargeDistance: 12,
  reserveArrivalDistance: 9,
  firstReserveRound: 2,
  cpPerCommandPhase: 1,
  startingCp: 0,
  vpPerObjective: 5,
  holdTimerRequired: 0,
  pileInDistance: 3,
  logLevel: 'warn'
};

/**
 * Merge overrides onto the defaults and validate the result
 */
export function resolveEngineConfig(overrides: Partial<EngineConfig> = {}): EngineConfig {
  const merged: EngineConfig = { ...DEFAULT_ENGINE_CONFIG, ...overrides };
  const parsed = EngineConfigSchema.safeParse(merged);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`);
    throw new Error(`Invalid engine config: ${issues.join('; ')}`);
  }
  return merged;
}
