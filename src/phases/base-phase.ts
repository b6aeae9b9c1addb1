/**
 * Shared validate/process pipeline for every phase.
 *
 * Phases are stateless services: everything they need between actions lives
 * in `state.phase_data`, including a pending decision while the game waits for
 * a player to react.
 */

import { z } from 'zod';
import type {
  Action,
  ActionDescriptor,
  ActionResult,
  ActionType,
  DecisionKind,
  GameState,
  PendingDecision,
  PhaseName,
  PlayerId,
  StateChange,
  Unit,
  ValidationResult
} from '../types';
import type { EngineConfig } from '../simulation/config';
import { Dice, type RngFactory } from '../simulation/dice';
import { clearEffectChanges, effectsExpiringAt } from '../simulation/effects';
import { ProcessingError } from '../simulation/errors';
import { setChange, StateDraft } from '../simulation/state-changes';
import {
  canUseStratagem,
  getStratagem,
  getStratagemsFor,
  useStratagem,
  type StratagemTrigger
} from '../simulation/stratagem-registry';
import type { Logger } from '../utils/logger';

export interface PhaseContext {
  config: EngineConfig;
  logger: Logger;
  rngFactory: RngFactory;
}

export interface PhaseOutcome {
  log: string[];
  phase_complete?: boolean;
  awaiting_decision?: PendingDecision;
}

export interface ReactionChoice {
  stratagemId: string;
  targetUnitId: string;
}

const PlayerIdSchema = z.union([z.literal(1), z.literal(2)]);

const PendingDecisionSchema = z.object({
  decider: PlayerIdSchema,
  kind: z.enum(['defensive_reaction', 'overwatch', 'command_reroll']),
  options: z.array(z.string()),
  context: z.record(z.unknown())
});

const StringListSchema = z.array(z.string());

const DECISION_TRIGGERS: Record<DecisionKind, StratagemTrigger> = {
  defensive_reaction: 'after_targets_selected',
  overwatch: 'after_charge_declared',
  command_reroll: 'reroll'
};

export const END_ACTIONS: Record<PhaseName, ActionType> = {
  deployment: 'END_DEPLOYMENT',
  command: 'END_COMMAND',
  movement: 'END_MOVEMENT',
  shooting: 'END_SHOOTING',
  charge: 'END_CHARGE',
  fight: 'END_FIGHT',
  morale: 'END_MORALE',
  scoring: 'END_SCORING'
};

/**
 * Decision waiting in phase_data, if any
 */
export function readPendingDecision(state: GameState): PendingDecision | undefined {
  const raw = state.phase_data.pending_decision;
  if (raw === undefined) return undefined;
  const parsed = PendingDecisionSchema.safeParse(raw);
  return parsed.success ? parsed.data : undefined;
}

/**
 * Units that acted or were skipped this phase
 */
export function doneUnits(state: GameState): string[] {
  const parsed = StringListSchema.safeParse(state.phase_data.done);
  return parsed.success ? parsed.data : [];
}

export function markDone(draft: StateDraft, unitId: string): void {
  const done = doneUnits(draft.state);
  if (!done.includes(unitId)) {
    draft.set('phase_data.done', [...done, unitId]);
  }
}

export function unitsOf(state: GameState, player: PlayerId): Unit[] {
  return Object.values(state.units).filter(u => u.owner === player);
}

export abstract class BasePhase {
  abstract readonly name: PhaseName;
  /** Phase-specific action types, besides the ones every phase accepts */
  protected abstract readonly actionTypes: readonly ActionType[];

  /** Whether SKIP_UNIT may be used on pending units */
  protected readonly allowsSkip: boolean = true;

  constructor(protected readonly ctx: PhaseContext) {}

  // ==========================================================================
  // LIFECYCLE
  // ==========================================================================

  enter(_state: GameState): StateChange[] {
    return [setChange('phase_data', {})];
  }

  /**
   * Clear effects that last until the end of the phase and all phase data
   */
  exit(state: GameState): StateChange[] {
    return [
      ...clearEffectChanges(state, effectsExpiringAt(state, 'end_of_phase')),
      setChange('phase_data', {})
    ];
  }

  // ==========================================================================
  // HOOKS
  // ==========================================================================

  /**
   * Units that still have to act or be skipped before the phase can end
   */
  protected pendingUnits(_state: GameState): Unit[] {
    return [];
  }

  /**
   * Stratagem triggers a USE_STRATAGEM action may use right now
   */
  protected openTriggers(_state: GameState): StratagemTrigger[] {
    return ['phase'];
  }

  protected unitActions(_state: GameState): ActionDescriptor[] {
    return [];
  }

  protected validatePhaseAction(_state: GameState, action: Action): string[] {
    return [`${action.type} is not handled by the ${this.name} phase`];
  }

  protected resolvePhaseAction(_draft: StateDraft, _dice: Dice, action: Action): PhaseOutcome {
    throw new ProcessingError(`${action.type} is not handled by the ${this.name} phase`);
  }

  /**
   * Continue the resolution a decision interrupted
   */
  protected resumeDecision(
    _draft: StateDraft,
    _dice: Dice,
    decision: PendingDecision,
    _choice: ReactionChoice | null
  ): PhaseOutcome {
    throw new ProcessingError(`The ${this.name} phase cannot resume a ${decision.kind} decision`);
  }

  /**
   * Side effects of skipping a unit besides marking it done
   */
  protected onSkip(_draft: StateDraft, _unitId: string): void {}

  /**
   * Resolution performed by END_<PHASE> before the phase completes
   */
  protected onEnd(_draft: StateDraft, _dice: Dice): string[] {
    return [];
  }

  /**
   * Phase-specific restrictions on USE_STRATAGEM
   */
  protected stratagemRestrictions(_state: GameState, _player: PlayerId, _trigger: StratagemTrigger): string[] {
    return [];
  }

  /**
   * Extra checks on a reaction beyond the stratagem's own restrictions
   */
  protected validateReaction(_state: GameState, _decision: PendingDecision, _choice: ReactionChoice): string[] {
    return [];
  }

  // ==========================================================================
  // AVAILABLE ACTIONS
  // ==========================================================================

  getAvailableActions(state: GameState): ActionDescriptor[] {
    if (state.meta.game_over) return [];

    const decision = readPendingDecision(state);
    if (decision) {
      return [
        ...decision.options.map(option => ({
          type: 'USE_REACTION' as const,
          player: decision.decider,
          description: `Use ${getStratagem(option)?.name ?? option}`
        })),
        { type: 'DECLINE_REACTION', player: decision.decider, description: 'Decline' }
      ];
    }

    const active = state.meta.active_player;
    const actions: ActionDescriptor[] = [...this.unitActions(state)];

    for (const unit of this.allowsSkip ? this.pendingUnits(state) : []) {
      actions.push({ type: 'SKIP_UNIT', actor_unit_id: unit.id, player: unit.owner, description: `Skip ${unit.meta.name}` });
    }

    for (const trigger of this.openTriggers(state)) {
      for (const definition of getStratagemsFor(this.name, trigger)) {
        for (const player of [active, active === 1 ? 2 : 1] as const) {
          const units = Object.values(state.units);
          const sources: (Unit | undefined)[] = definition.source ? units : [undefined];
          const usable = units.some(target => sources.some(source =>
            canUseStratagem(state, {
              player,
              stratagemId: definition.id,
              trigger,
              targetUnitId: target.id,
              sourceUnitId: source?.id
            }, this.ctx.config).canUse));
          if (usable) {
            actions.push({ type: 'USE_STRATAGEM', player, description: `Use ${definition.name}` });
          }
        }
      }
    }

    if (this.pendingUnits(state).length === 0) {
      actions.push({ type: END_ACTIONS[this.name], player: active, description: `End ${this.name} phase` });
    }
    return actions;
  }

  // ==========================================================================
  // VALIDATION
  // ==========================================================================

  validateAction(state: GameState, action: Action): ValidationResult {
    const errors = this.collectErrors(state, action);
    return { valid: errors.length === 0, errors };
  }

  private collectErrors(state: GameState, action: Action): string[] {
    if (state.meta.game_over) {
      return ['The battle is over'];
    }
    if (state.meta.phase !== this.name) {
      return [`The game is in the ${state.meta.phase} phase, not ${this.name}`];
    }

    const decision = readPendingDecision(state);
    if (decision) {
      if (action.type === 'USE_REACTION') return this.reactionErrors(state, decision, action.payload);
      if (action.type === 'DECLINE_REACTION') {
        return action.payload.player === decision.decider
          ? []
          : [`Waiting for player ${decision.decider} to decide`];
      }
      return [`Waiting for player ${decision.decider} to use or decline a reaction; ${action.type} is not allowed`];
    }

    switch (action.type) {
      case 'USE_REACTION':
      case 'DECLINE_REACTION':
        return ['There is no decision to respond to'];
      case 'USE_STRATAGEM':
        return this.stratagemErrors(state, action);
      case 'SKIP_UNIT':
        return this.skipErrors(state, action.actor_unit_id);
      default:
        break;
    }

    if (action.type === END_ACTIONS[this.name]) {
      const pending = this.pendingUnits(state);
      return pending.length === 0
        ? []
        : [`Units still to act or be skipped: ${pending.map(u => u.meta.name).join(', ')}`];
    }
    if (!this.actionTypes.includes(action.type)) {
      return [`${action.type} is not a legal action in the ${this.name} phase`];
    }
    return this.validatePhaseAction(state, action);
  }

  private stratagemErrors(state: GameState, action: Extract<Action, { type: 'USE_STRATAGEM' }>): string[] {
    const definition = getStratagem(action.payload.stratagem_id);
    if (!definition) {
      return [`Unknown stratagem ${action.payload.stratagem_id}`];
    }
    const open = this.openTriggers(state);
    const trigger = open.includes(definition.timing.trigger) ? definition.timing.trigger : 'phase';
    return [
      ...canUseStratagem(state, {
        player: action.payload.player,
        stratagemId: definition.id,
        trigger,
        targetUnitId: action.payload.target_unit_id,
        sourceUnitId: action.actor_unit_id
      }, this.ctx.config).reasons,
      ...this.stratagemRestrictions(state, action.payload.player, trigger)
    ];
  }

  private skipErrors(state: GameState, unitId: string): string[] {
    const unit = state.units[unitId];
    if (!unit) return [`Unknown unit ${unitId}`];
    if (!this.allowsSkip || !this.pendingUnits(state).some(u => u.id === unitId)) {
      return [`${unit.meta.name} has nothing to do in the ${this.name} phase`];
    }
    return [];
  }

  private reactionChoice(
    decision: PendingDecision,
    payload: { stratagem_id: string; target_unit_id?: string }
  ): ReactionChoice | null {
    const allowed = StringListSchema.safeParse(decision.context.allowed_targets);
    const targets = allowed.success ? allowed.data : [];
    const targetUnitId = payload.target_unit_id ?? (targets.length === 1 ? targets[0] : undefined);
    return targetUnitId ? { stratagemId: payload.stratagem_id, targetUnitId } : null;
  }

  private reactionErrors(
    state: GameState,
    decision: PendingDecision,
    payload: { player: PlayerId; stratagem_id: string; target_unit_id?: string }
  ): string[] {
    const errors: string[] = [];
    if (payload.player !== decision.decider) {
      errors.push(`Waiting for player ${decision.decider} to decide`);
    }
    if (!decision.options.includes(payload.stratagem_id)) {
      errors.push(`${payload.stratagem_id} is not one of the offered reactions`);
    }

    const choice = this.reactionChoice(decision, payload);
    if (!choice) {
      errors.push('Select a target unit for the reaction');
      return errors;
    }
    const allowed = StringListSchema.safeParse(decision.context.allowed_targets);
    if (allowed.success && !allowed.data.includes(choice.targetUnitId)) {
      errors.push(`${choice.targetUnitId} cannot be selected for this reaction`);
    }

    errors.push(...canUseStratagem(state, {
      player: payload.player,
      stratagemId: payload.stratagem_id,
      trigger: DECISION_TRIGGERS[decision.kind],
      targetUnitId: choice.targetUnitId
    }, this.ctx.config).reasons);
    errors.push(...this.validateReaction(state, decision, choice));
    return errors;
  }

  // ==========================================================================
  // PROCESSING
  // ==========================================================================

  processAction(state: GameState, action: Action): ActionResult {
    const validation = this.validateAction(state, action);
    if (!validation.valid) {
      return { valid: false, success: false, errors: validation.errors };
    }

    const draft = new StateDraft(state);
    const dice = new Dice(this.ctx.rngFactory(state.meta.rng));
    let outcome: PhaseOutcome;

    try {
      outcome = this.resolve(draft, dice, action);
    } catch (err) {
      if (err instanceof ProcessingError) {
        this.ctx.logger.warn(`${action.type} failed: ${err.message}`);
        return { valid: true, success: false, error: err.message };
      }
      throw err;
    }

    if (dice.used) {
      draft.set('meta.rng', dice.rngState);
    }
    this.ctx.logger.debug(`${action.type} resolved`, outcome.log);

    const result: ActionResult = {
      valid: true,
      success: true,
      changes: draft.changes,
      dice: dice.records,
      log: outcome.log
    };
    if (outcome.phase_complete) result.phase_complete = true;
    if (outcome.awaiting_decision) result.awaiting_decision = outcome.awaiting_decision;
    return result;
  }

  private resolve(draft: StateDraft, dice: Dice, action: Action): PhaseOutcome {
    switch (action.type) {
      case 'USE_REACTION':
      case 'DECLINE_REACTION': {
        const decision = readPendingDecision(draft.state);
        if (!decision) {
          throw new ProcessingError('There is no decision to respond to');
        }
        draft.remove('phase_data.pending_decision');
        if (action.type === 'DECLINE_REACTION') {
          const outcome = this.resumeDecision(draft, dice, decision, null);
          return { ...outcome, log: [`Player ${decision.decider} declines`, ...outcome.log] };
        }
        const choice = this.reactionChoice(decision, action.payload);
        if (!choice) {
          throw new ProcessingError('Select a target unit for the reaction');
        }
        const log = useStratagem(draft, dice, {
          player: decision.decider,
          stratagemId: choice.stratagemId,
          trigger: DECISION_TRIGGERS[decision.kind],
          targetUnitId: choice.targetUnitId
        }, this.ctx.config);
        const outcome = this.resumeDecision(draft, dice, decision, choice);
        return { ...outcome, log: [...log, ...outcome.log] };
      }
      case 'USE_STRATAGEM': {
        const definition = getStratagem(action.payload.stratagem_id);
        if (!definition) {
          throw new ProcessingError(`Unknown stratagem ${action.payload.stratagem_id}`);
        }
        return {
          log: useStratagem(draft, dice, {
            player: action.payload.player,
            stratagemId: definition.id,
            trigger: this.openTriggers(draft.state).includes(definition.timing.trigger) ? definition.timing.trigger : 'phase',
            targetUnitId: action.payload.target_unit_id,
            sourceUnitId: action.actor_unit_id
          }, this.ctx.config)
        };
      }
      case 'SKIP_UNIT': {
        markDone(draft, action.actor_unit_id);
        this.onSkip(draft, action.actor_unit_id);
        return { log: [`${draft.state.units[action.actor_unit_id].meta.name} skipped`] };
      }
      default:
        break;
    }

    if (action.type === END_ACTIONS[this.name]) {
      return { log: [...this.onEnd(draft, dice), `End of ${this.name} phase`], phase_complete: true };
    }
    return this.resolvePhaseAction(draft, dice, action);
  }

  /**
   * Store a decision and hand it back to the caller
   */
  protected suspend(draft: StateDraft, decision: PendingDecision, log: string[]): PhaseOutcome {
    draft.set('phase_data.pending_decision', decision);
    log.push(`Waiting for player ${decision.decider}: ${decision.options.join(', ')} or decline`);
    return { log, awaiting_decision: decision };
  }
}
