import { z } from 'zod';
import type { Action, ActionDescriptor, ActionType, GameState, PendingDecision, Unit } from '../types';
import { isBelowHalfStrength, testBattleShock, formatBattleShockResult } from '../simulation/battle-shock';
import type { Dice } from '../simulation/dice';
import { isOnTable } from '../simulation/distance';
import { getUnitEffectProfile } from '../simulation/effects';
import { IntegrityError } from '../simulation/errors';
import type { StateDraft } from '../simulation/state-changes';
import { offerableStratagems } from '../simulation/stratagem-registry';
import { BasePhase, doneUnits, markDone, unitsOf, type PhaseOutcome, type ReactionChoice } from './base-phase';

const RetestContextSchema = z.object({ unit_id: z.string() });

/**
 * Morale phase: the active player's units below half strength test for
 * battle-shock
 */
export class MoralePhase extends BasePhase {
  readonly name = 'morale' as const;
  protected readonly actionTypes: readonly ActionType[] = ['BATTLE_SHOCK_TEST'];

  protected pendingUnits(state: GameState): Unit[] {
    const done = doneUnits(state);
    return unitsOf(state, state.meta.active_player).filter(u =>
      isOnTable(u)
      && !done.includes(u.id)
      && u.flags.battle_shock_tested !== true
      && isBelowHalfStrength(u));
  }

  protected unitActions(state: GameState): ActionDescriptor[] {
    return this.pendingUnits(state).map(unit => ({
      type: 'BATTLE_SHOCK_TEST',
      actor_unit_id: unit.id,
      player: unit.owner,
      description: `Battle-shock test for ${unit.meta.name}`
    }));
  }

  protected validatePhaseAction(state: GameState, action: Action): string[] {
    if (action.type !== 'BATTLE_SHOCK_TEST') {
      return super.validatePhaseAction(state, action);
    }
    const unit = state.units[action.actor_unit_id];
    if (!unit) return [`Unknown unit ${action.actor_unit_id}`];
    if (!this.pendingUnits(state).some(u => u.id === unit.id)) {
      return [`${unit.meta.name} does not need to take a battle-shock test`];
    }
    return [];
  }

  protected resolvePhaseAction(draft: StateDraft, dice: Dice, action: Action): PhaseOutcome {
    if (action.type !== 'BATTLE_SHOCK_TEST') {
      return super.resolvePhaseAction(draft, dice, action);
    }
    const unit = draft.state.units[action.actor_unit_id];
    draft.setFlag(unit.id, 'battle_shock_tested', true);
    markDone(draft, unit.id);

    if (getUnitEffectProfile(draft.state, unit).battleShockImmune) {
      return { log: [`${unit.meta.name} automatically passes its battle-shock test`] };
    }

    const result = testBattleShock(dice, unit);
    const log = [formatBattleShockResult(unit, result)];
    if (result.passed) {
      return { log };
    }

    const options = offerableStratagems(draft.state, unit.owner, 'reroll', [unit.id], this.ctx.config);
    if (options.length > 0) {
      return this.suspend(draft, {
        decider: unit.owner,
        kind: 'command_reroll',
        options,
        context: { unit_id: unit.id, allowed_targets: [unit.id] }
      }, log);
    }
    return { log: [...log, this.shock(draft, unit)] };
  }

  protected resumeDecision(
    draft: StateDraft,
    dice: Dice,
    decision: PendingDecision,
    choice: ReactionChoice | null
  ): PhaseOutcome {
    if (decision.kind !== 'command_reroll') {
      return super.resumeDecision(draft, dice, decision, choice);
    }
    const parsed = RetestContextSchema.safeParse(decision.context);
    if (!parsed.success) {
      throw new IntegrityError(`Malformed battle-shock decision: ${parsed.error.message}`);
    }
    const unit = draft.state.units[parsed.data.unit_id];
    if (!choice) {
      return { log: [this.shock(draft, unit)] };
    }

    const result = testBattleShock(dice, unit);
    const log = [formatBattleShockResult(unit, result)];
    if (!result.passed) {
      log.push(this.shock(draft, unit));
    }
    return { log };
  }

  private shock(draft: StateDraft, unit: Unit): string {
    draft.setFlag(unit.id, 'battle_shocked', true);
    return `${unit.meta.name} is battle-shocked`;
  }
}
