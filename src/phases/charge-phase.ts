/**
 * Charge phase: declare, survive overwatch, roll 2D6, then move in.
 *
 * The charge in progress lives in `phase_data.charge` so it survives the
 * overwatch and re-roll decision windows.
 */

import { z } from 'zod';
import type { Action, ActionDescriptor, ActionType, GameState, PendingDecision, Unit } from '../types';
import { resolveAttack } from '../simulation/attack-resolution';
import { chargeDeclarationErrors, checkChargeMove } from '../simulation/charge';
import type { Dice } from '../simulation/dice';
import { enemyUnits, isOnTable, unitDistance } from '../simulation/distance';
import { IntegrityError } from '../simulation/errors';
import { placeUnit } from '../simulation/movement';
import { modelsInRange, overwatchCandidates, weaponsAbleToFire } from '../simulation/shooting';
import type { StateDraft } from '../simulation/state-changes';
import { offerableStratagems, opponentOf } from '../simulation/stratagem-registry';
import { BasePhase, doneUnits, markDone, unitsOf, type PhaseOutcome, type ReactionChoice } from './base-phase';

const ChargeDataSchema = z.object({
  unit_id: z.string(),
  target_unit_ids: z.array(z.string()),
  roll: z.number().int().optional()
});

export type ChargeInProgress = z.infer<typeof ChargeDataSchema>;

export function readCharge(state: GameState): ChargeInProgress | undefined {
  const parsed = ChargeDataSchema.safeParse(state.phase_data.charge);
  return parsed.success ? parsed.data : undefined;
}

/**
 * Distance the charge roll has to cover to reach every target
 */
export function requiredChargeDistance(state: GameState, unit: Unit, targetIds: readonly string[], engagementRange: number): number {
  return Math.max(0, ...targetIds.map(id => unitDistance(unit, state.units[id]) - engagementRange));
}

export class ChargePhase extends BasePhase {
  readonly name = 'charge' as const;
  protected readonly actionTypes: readonly ActionType[] = ['DECLARE_CHARGE', 'CHARGE_MOVE'];

  private canDeclare(state: GameState, unit: Unit): boolean {
    return enemyUnits(state, unit)
      .some(enemy => chargeDeclarationErrors(state, unit, [enemy.id], this.ctx.config).length === 0);
  }

  protected pendingUnits(state: GameState): Unit[] {
    const done = doneUnits(state);
    const charging = readCharge(state)?.unit_id;
    return unitsOf(state, state.meta.active_player)
      .filter(u => !done.includes(u.id) && (u.id === charging || this.canDeclare(state, u)));
  }

  protected unitActions(state: GameState): ActionDescriptor[] {
    const charge = readCharge(state);
    if (charge) {
      const unit = state.units[charge.unit_id];
      return charge.roll === undefined
        ? []
        : [{ type: 'CHARGE_MOVE', actor_unit_id: unit.id, player: unit.owner, description: `Charge with ${unit.meta.name} (${charge.roll}")` }];
    }
    return this.pendingUnits(state).map(unit => ({
      type: 'DECLARE_CHARGE',
      actor_unit_id: unit.id,
      player: unit.owner,
      description: `Declare a charge with ${unit.meta.name}`
    }));
  }

  protected onSkip(draft: StateDraft, unitId: string): void {
    if (readCharge(draft.state)?.unit_id === unitId) {
      draft.remove('phase_data.charge');
    }
  }

  // ==========================================================================
  // VALIDATION
  // ==========================================================================

  protected validatePhaseAction(state: GameState, action: Action): string[] {
    if (action.type !== 'DECLARE_CHARGE' && action.type !== 'CHARGE_MOVE') {
      return super.validatePhaseAction(state, action);
    }
    const unit = state.units[action.actor_unit_id];
    if (!unit) return [`Unknown unit ${action.actor_unit_id}`];
    if (unit.owner !== state.meta.active_player) {
      return [`${unit.meta.name} belongs to player ${unit.owner}, not the active player`];
    }
    const charge = readCharge(state);

    if (action.type === 'DECLARE_CHARGE') {
      if (charge) {
        return [`Finish the charge by ${state.units[charge.unit_id].meta.name} first`];
      }
      const errors = doneUnits(state).includes(unit.id) ? [`${unit.meta.name} is done for this phase`] : [];
      return [...errors, ...chargeDeclarationErrors(state, unit, action.payload.target_unit_ids, this.ctx.config)];
    }

    if (!charge || charge.unit_id !== unit.id) {
      return [`${unit.meta.name} has no charge in progress`];
    }
    if (charge.roll === undefined) {
      return [`${unit.meta.name} has not rolled for its charge`];
    }
    // An illegal move is refused here and the charge stays open: the player can
    // submit another move or SKIP_UNIT, which ends the charge without moving
    return checkChargeMove(
      state, unit, action.payload.positions, charge.target_unit_ids, charge.roll, this.ctx.config
    ).errors;
  }

  // ==========================================================================
  // RESOLUTION
  // ==========================================================================

  protected resolvePhaseAction(draft: StateDraft, dice: Dice, action: Action): PhaseOutcome {
    if (action.type === 'DECLARE_CHARGE') {
      return this.declare(draft, dice, action.actor_unit_id, action.payload.target_unit_ids);
    }
    if (action.type === 'CHARGE_MOVE') {
      const unit = draft.state.units[action.actor_unit_id];
      const charge = this.requireCharge(draft.state);
      placeUnit(draft, unit, action.payload.positions);
      draft.setFlag(unit.id, 'charged', true);
      draft.remove('phase_data.charge');
      markDone(draft, unit.id);
      const targets = charge.target_unit_ids.map(id => draft.state.units[id].meta.name);
      return { log: [`${unit.meta.name} charges into ${targets.join(', ')}`] };
    }
    return super.resolvePhaseAction(draft, dice, action);
  }

  private requireCharge(state: GameState): ChargeInProgress {
    const charge = readCharge(state);
    if (!charge) {
      throw new IntegrityError('No charge in progress');
    }
    return charge;
  }

  private declare(draft: StateDraft, dice: Dice, unitId: string, targetIds: string[]): PhaseOutcome {
    const unit = draft.state.units[unitId];
    draft.setFlag(unit.id, 'charge_attempted', true);
    draft.set('phase_data.charge', { unit_id: unit.id, target_unit_ids: targetIds });

    const targets = targetIds.map(id => draft.state.units[id].meta.name);
    const log = [`${unit.meta.name} declares a charge against ${targets.join(', ')}`];

    const defender = opponentOf(unit.owner);
    const candidates = overwatchCandidates(draft.state, unit, this.ctx.config).map(u => u.id);
    const options = offerableStratagems(draft.state, defender, 'after_charge_declared', candidates, this.ctx.config);
    if (options.length > 0) {
      return this.suspend(draft, {
        decider: defender,
        kind: 'overwatch',
        options,
        context: { unit_id: unit.id, allowed_targets: candidates }
      }, log);
    }
    return this.rollCharge(draft, dice, log);
  }

  /**
   * Roll 2D6 for the charge in progress. A short roll opens a re-roll
   * window for the charging player when one is available.
   */
  private rollCharge(draft: StateDraft, dice: Dice, log: string[], isReroll = false): PhaseOutcome {
    const charge = this.requireCharge(draft.state);
    const unit = draft.state.units[charge.unit_id];
    const needed = requiredChargeDistance(draft.state, unit, charge.target_unit_ids, this.ctx.config.engagementRange);

    const rolls = dice.roll(`${unit.meta.name}: charge roll${isReroll ? ' (re-roll)' : ''}`, 2);
    const total = rolls[0] + rolls[1];
    draft.set('phase_data.charge.roll', total);

    if (total >= needed) {
      log.push(`${unit.meta.name} rolls ${total}" for the charge (needs ${needed.toFixed(1)}")`);
      return { log };
    }

    log.push(`${unit.meta.name} rolls ${total}" for the charge, short of ${needed.toFixed(1)}"`);
    if (!isReroll) {
      const options = offerableStratagems(draft.state, unit.owner, 'reroll', [unit.id], this.ctx.config);
      if (options.length > 0) {
        return this.suspend(draft, {
          decider: unit.owner,
          kind: 'command_reroll',
          options,
          context: { unit_id: unit.id, allowed_targets: [unit.id], roll: total }
        }, log);
      }
    }
    return this.failCharge(draft, unit, log);
  }

  private failCharge(draft: StateDraft, unit: Unit, log: string[]): PhaseOutcome {
    draft.remove('phase_data.charge');
    markDone(draft, unit.id);
    log.push(`${unit.meta.name} fails its charge`);
    return { log };
  }

  protected resumeDecision(
    draft: StateDraft,
    dice: Dice,
    decision: PendingDecision,
    choice: ReactionChoice | null
  ): PhaseOutcome {
    const charge = this.requireCharge(draft.state);
    const unit = draft.state.units[charge.unit_id];

    switch (decision.kind) {
      case 'overwatch': {
        const log = choice ? this.overwatch(draft, dice, choice.targetUnitId, unit.id) : [];
        if (!isOnTable(draft.state.units[unit.id])) {
          draft.remove('phase_data.charge');
          markDone(draft, unit.id);
          log.push(`${unit.meta.name} is destroyed before it can charge`);
          return { log };
        }
        return this.rollCharge(draft, dice, log);
      }
      case 'command_reroll':
        return choice
          ? this.rollCharge(draft, dice, [], true)
          : this.failCharge(draft, unit, []);
      default:
        return super.resumeDecision(draft, dice, decision, choice);
    }
  }

  /**
   * The reacting unit fires every weapon that can reach the charger; only
   * unmodified 6s hit
   */
  private overwatch(draft: StateDraft, dice: Dice, shooterId: string, chargerId: string): string[] {
    const log: string[] = [];
    const shooter = draft.state.units[shooterId];
    for (const weapon of weaponsAbleToFire(draft.state, shooter, draft.state.units[chargerId], this.ctx.config)) {
      const charger = draft.state.units[chargerId];
      if (!isOnTable(charger) || !isOnTable(draft.state.units[shooterId])) break;
      const summary = resolveAttack(draft, dice, {
        attackerId: shooterId,
        targetId: chargerId,
        weaponId: weapon.id,
        modelIds: modelsInRange(draft.state.units[shooterId], weapon, charger).map(m => m.id),
        overwatch: true
      });
      log.push(...summary.log);
    }
    return log;
  }
}
