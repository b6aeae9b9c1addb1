/**
 * Phase state machine: routes actions to the current phase, records history
 * and computes the diffs that move the game from one phase to the next.
 */

import type {
  Action,
  ActionDescriptor,
  ActionResult,
  GameState,
  HistoryEntry,
  PhaseName,
  PlayerId,
  StateChange,
  ValidationResult
} from '../types';
import { readPendingDecision, type BasePhase, type PhaseContext } from '../phases/base-phase';
import { ChargePhase } from '../phases/charge-phase';
import { CommandPhase } from '../phases/command-phase';
import { DeploymentPhase } from '../phases/deployment-phase';
import { FightPhase } from '../phases/fight-phase';
import { MoralePhase } from '../phases/morale-phase';
import { MovementPhase } from '../phases/movement-phase';
import { ScoringPhase } from '../phases/scoring-phase';
import { ShootingPhase } from '../phases/shooting-phase';
import { createLogger, type Logger } from '../utils/logger';
import { resolveEngineConfig, type EngineConfig } from './config';
import { createRng, type RngFactory } from './dice';
import { clearEffectChanges, effectsExpiringAt } from './effects';
import { ProcessingError } from './errors';
import { applyChanges, setChange } from './state-changes';
import { opponentOf, playerKey } from './stratagem-registry';

export interface PhaseManagerOptions {
  config?: Partial<EngineConfig>;
  rngFactory?: RngFactory;
  logger?: Logger;
}

/** Turn order after deployment */
export const TURN_PHASES: readonly PhaseName[] = [
  'command',
  'movement',
  'shooting',
  'charge',
  'fight',
  'morale',
  'scoring'
];

function hasSurvivors(state: GameState, player: PlayerId): boolean {
  return Object.values(state.units).some(u => u.owner === player && u.status !== 'DESTROYED');
}

/**
 * Player who submitted the action: the payload's player, else the acting
 * unit's owner, else whoever is active
 */
function actingPlayer(state: GameState, action: Action): PlayerId {
  switch (action.type) {
    case 'USE_STRATAGEM':
    case 'USE_REACTION':
    case 'DECLINE_REACTION':
      return action.payload.player;
    default:
      break;
  }
  if ('actor_unit_id' in action) {
    const unit = state.units[action.actor_unit_id];
    if (unit) return unit.owner;
  }
  return state.meta.active_player;
}

export class PhaseManager {
  readonly config: EngineConfig;
  readonly logger: Logger;
  private readonly phases: Record<PhaseName, BasePhase>;

  constructor(options: PhaseManagerOptions = {}) {
    this.config = resolveEngineConfig(options.config);
    this.logger = options.logger ?? createLogger('engine', this.config.logLevel);

    const ctx: PhaseContext = {
      config: this.config,
      logger: this.logger,
      rngFactory: options.rngFactory ?? createRng
    };
    this.phases = {
      deployment: new DeploymentPhase(ctx),
      command: new CommandPhase(ctx),
      movement: new MovementPhase(ctx),
      shooting: new ShootingPhase(ctx),
      charge: new ChargePhase(ctx),
      fight: new FightPhase(ctx),
      morale: new MoralePhase(ctx),
      scoring: new ScoringPhase(ctx)
    };
  }

  getPhase(name: PhaseName): BasePhase {
    return this.phases[name];
  }

  currentPhase(state: GameState): BasePhase {
    return this.phases[state.meta.phase];
  }

  getAvailableActions(state: GameState): ActionDescriptor[] {
    return this.currentPhase(state).getAvailableActions(state);
  }

  validateAction(state: GameState, action: Action): ValidationResult {
    return this.currentPhase(state).validateAction(state, action);
  }

  /**
   * Resolve an action in the current phase. Successful results also carry
   * the change that appends the action to the history.
   */
  processAction(state: GameState, action: Action): ActionResult {
    const result = this.currentPhase(state).processAction(state, action);
    if (!result.success) {
      return result;
    }

    const entry: HistoryEntry = {
      seq: state.history.length + 1,
      battle_round: state.meta.battle_round,
      turn_number: state.meta.turn_number,
      phase: state.meta.phase,
      player: actingPlayer(state, action),
      action,
      dice: result.dice ?? [],
      log: result.log ?? []
    };
    return {
      ...result,
      changes: [...(result.changes ?? []), setChange(`history.${state.history.length}`, entry)]
    };
  }

  // ==========================================================================
  // TRANSITIONS
  // ==========================================================================

  /**
   * Exit diffs for the current phase, transition diffs, and enter diffs for
   * the next phase
   */
  advancePhase(state: GameState): StateChange[] {
    if (state.meta.game_over) {
      throw new ProcessingError('The battle is over');
    }
    const decision = readPendingDecision(state);
    if (decision) {
      throw new ProcessingError(`Waiting for player ${decision.decider} to use or decline a reaction`);
    }

    const changes = this.currentPhase(state).exit(state);
    let next = applyChanges(state, changes);

    const transition = this.transition(next);
    changes.push(...transition);
    next = applyChanges(next, transition);

    if (!next.meta.game_over) {
      changes.push(...this.phases[next.meta.phase].enter(next));
    }
    this.logger.info(next.meta.game_over
      ? `Battle over, winner: ${next.meta.winner ?? 'draw'}`
      : `Round ${next.meta.battle_round}, player ${next.meta.active_player}: ${next.meta.phase}`);
    return changes;
  }

  private transition(state: GameState): StateChange[] {
    const { meta } = state;

    if (meta.phase === 'deployment') {
      return [
        setChange('meta.phase', 'command'),
        setChange('meta.active_player', meta.first_player)
      ];
    }
    if (meta.phase !== 'scoring') {
      const idx = TURN_PHASES.indexOf(meta.phase);
      return [setChange('meta.phase', TURN_PHASES[idx + 1])];
    }

    const survivors1 = hasSurvivors(state, 1);
    const survivors2 = hasSurvivors(state, 2);
    if (!survivors1 || !survivors2) {
      let winner: PlayerId | null = null;
      if (survivors1) winner = 1;
      if (survivors2) winner = 2;
      return this.gameOver(state, winner);
    }

    if (meta.active_player === meta.first_player) {
      return [
        setChange('meta.phase', 'command'),
        setChange('meta.active_player', opponentOf(meta.first_player)),
        setChange('meta.turn_number', meta.turn_number + 1)
      ];
    }

    if (meta.battle_round + 1 > this.config.maxBattleRounds) {
      const vp1 = state.players[playerKey(1)].vp;
      const vp2 = state.players[playerKey(2)].vp;
      let winner: PlayerId | null = null;
      if (vp1 > vp2) winner = 1;
      if (vp2 > vp1) winner = 2;
      return this.gameOver(state, winner);
    }

    return [
      setChange('meta.phase', 'command'),
      setChange('meta.active_player', meta.first_player),
      setChange('meta.turn_number', meta.turn_number + 1),
      setChange('meta.battle_round', meta.battle_round + 1)
    ];
  }

  private gameOver(state: GameState, winner: PlayerId | null): StateChange[] {
    return [
      ...clearEffectChanges(state, effectsExpiringAt(state, 'end_of_battle')),
      setChange('meta.game_over', true),
      setChange('meta.winner', winner)
    ];
  }
}
