export * from './types';

export { DEFAULT_ENGINE_CONFIG, resolveEngineConfig, type EngineConfig } from './simulation/config';
export { IntegrityError, ProcessingError } from './simulation/errors';
export { createLogger, type Logger, type LogLevel } from './utils/logger';

export { createRng, createScriptedRng, Dice, type Rng, type RngFactory } from './simulation/dice';
export { applyChanges, getAtPath, StateDraft } from './simulation/state-changes';
export { deserializeSnapshot, parseAction, serializeSnapshot, validateSnapshot } from './simulation/snapshot';

export { PhaseManager, TURN_PHASES, type PhaseManagerOptions } from './simulation/phase-manager';
export {
  createGameState,
  GameSession,
  type GameSetup,
  type ModelSetup,
  type UnitSetup
} from './simulation/game-session';
export { BasePhase, type PhaseContext, type PhaseOutcome } from './phases/base-phase';

export { resolveAttack, type AttackRequest, type AttackSummary } from './simulation/attack-resolution';
export { applyDirectDamage, type DamageResult } from './simulation/damage-allocation';
export { checkChargeMove, chargeDeclarationErrors } from './simulation/charge';
export { checkCoherency, unitDistance } from './simulation/distance';
export {
  checkLineOfSight,
  createBarricade,
  createContainer,
  createRuins,
  createWoods,
  type TerrainFeature
} from './simulation/terrain';

export { EFFECT_PRIMITIVES, getUnitEffectProfile, type UnitEffectProfile } from './simulation/effects';
export { getAbilityDefinition, registerAbility, type AbilityDefinition } from './simulation/ability-registry';
export {
  canUseStratagem,
  CORE_STRATAGEMS,
  getStratagem,
  registerStratagem,
  useStratagem,
  type StratagemDefinition,
  type StratagemRequest
} from './simulation/stratagem-registry';
export { calculateObjectiveControl, scoreObjectives } from './simulation/objective-scoring';
export { isBelowHalfStrength, testBattleShock } from './simulation/battle-shock';
