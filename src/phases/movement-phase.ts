import type { Action, ActionDescriptor, ActionType, GameState, Point, Unit } from '../types';
import type { Dice } from '../simulation/dice';
import { isEngaged, isOnTable } from '../simulation/distance';
import { moveErrors, placeUnit, reserveArrivalErrors, type MoveRules } from '../simulation/movement';
import type { StateDraft } from '../simulation/state-changes';
import { BasePhase, doneUnits, markDone, unitsOf, type PhaseOutcome } from './base-phase';

type MovementAction = Extract<Action, {
  type: 'NORMAL_MOVE' | 'BEGIN_ADVANCE' | 'ADVANCE' | 'FALL_BACK' | 'REMAIN_STATIONARY' | 'ARRIVE_FROM_RESERVES';
}>;

const MOVEMENT_ACTIONS: readonly ActionType[] = [
  'NORMAL_MOVE',
  'BEGIN_ADVANCE',
  'ADVANCE',
  'FALL_BACK',
  'REMAIN_STATIONARY',
  'ARRIVE_FROM_RESERVES'
];

function isMovementAction(action: Action): action is MovementAction {
  return MOVEMENT_ACTIONS.includes(action.type);
}

function advanceRoll(unit: Unit): number | undefined {
  const roll = unit.flags.advance_roll;
  return typeof roll === 'number' ? roll : undefined;
}

export class MovementPhase extends BasePhase {
  readonly name = 'movement' as const;
  protected readonly actionTypes = MOVEMENT_ACTIONS;

  private canArrive(state: GameState): boolean {
    return state.meta.battle_round >= this.ctx.config.firstReserveRound;
  }

  protected pendingUnits(state: GameState): Unit[] {
    const done = doneUnits(state);
    return unitsOf(state, state.meta.active_player).filter(u => {
      if (done.includes(u.id)) return false;
      if (u.status === 'IN_RESERVES') return this.canArrive(state);
      return isOnTable(u);
    });
  }

  protected unitActions(state: GameState): ActionDescriptor[] {
    const range = this.ctx.config.engagementRange;
    return this.pendingUnits(state).flatMap((unit): ActionDescriptor[] => {
      const player = unit.owner;
      const describe = (type: ActionType, description: string): ActionDescriptor =>
        ({ type, actor_unit_id: unit.id, player, description: `${description} ${unit.meta.name}` });

      if (unit.status === 'IN_RESERVES') {
        return [describe('ARRIVE_FROM_RESERVES', 'Bring in')];
      }
      if (advanceRoll(unit) !== undefined) {
        return [describe('ADVANCE', 'Advance')];
      }
      if (isEngaged(state, unit, range)) {
        return [describe('FALL_BACK', 'Fall back with'), describe('REMAIN_STATIONARY', 'Hold')];
      }
      return [
        describe('NORMAL_MOVE', 'Move'),
        describe('BEGIN_ADVANCE', 'Roll to advance'),
        describe('REMAIN_STATIONARY', 'Hold')
      ];
    });
  }

  // ==========================================================================
  // VALIDATION
  // ==========================================================================

  protected validatePhaseAction(state: GameState, action: Action): string[] {
    if (!isMovementAction(action)) {
      return super.validatePhaseAction(state, action);
    }
    const unit = state.units[action.actor_unit_id];
    if (!unit) return [`Unknown unit ${action.actor_unit_id}`];

    if (unit.owner !== state.meta.active_player) {
      return [`${unit.meta.name} belongs to player ${unit.owner}, not the active player`];
    }
    if (doneUnits(state).includes(unit.id)) {
      return [`${unit.meta.name} has already moved this phase`];
    }

    if (action.type === 'ARRIVE_FROM_RESERVES') {
      const errors: string[] = [];
      if (unit.status !== 'IN_RESERVES') {
        errors.push(`${unit.meta.name} is not in reserves`);
      }
      if (!this.canArrive(state)) {
        errors.push(`Reserves cannot arrive before battle round ${this.ctx.config.firstReserveRound}`);
      }
      return errors.length > 0
        ? errors
        : reserveArrivalErrors(state, unit, action.payload.positions, this.ctx.config);
    }

    if (!isOnTable(unit)) {
      return [`${unit.meta.name} is not on the battlefield`];
    }
    const engaged = isEngaged(state, unit, this.ctx.config.engagementRange);
    const roll = advanceRoll(unit);

    switch (action.type) {
      case 'NORMAL_MOVE': {
        if (roll !== undefined) return [`${unit.meta.name} is advancing and must use ADVANCE`];
        if (engaged) return [`${unit.meta.name} is within Engagement Range and can only fall back or remain stationary`];
        return this.moveErrors(state, unit, action.payload.positions, unit.meta.stats.move);
      }
      case 'BEGIN_ADVANCE': {
        if (roll !== undefined) return [`${unit.meta.name} has already rolled to advance`];
        return engaged ? [`${unit.meta.name} is within Engagement Range and cannot advance`] : [];
      }
      case 'ADVANCE': {
        if (roll === undefined) return [`Roll to advance with BEGIN_ADVANCE before moving ${unit.meta.name}`];
        return this.moveErrors(state, unit, action.payload.positions, unit.meta.stats.move + roll);
      }
      case 'FALL_BACK': {
        if (!engaged) return [`${unit.meta.name} is not within Engagement Range and cannot fall back`];
        return this.moveErrors(state, unit, action.payload.positions, unit.meta.stats.move);
      }
      case 'REMAIN_STATIONARY':
        return roll === undefined ? [] : [`${unit.meta.name} has rolled to advance and must move`];
    }
  }

  private moveErrors(state: GameState, unit: Unit, positions: readonly Point[], maxDistance: number): string[] {
    const rules: MoveRules = { maxDistance, mayEndEngaged: false };
    return moveErrors(state, unit, positions, rules, this.ctx.config);
  }

  // ==========================================================================
  // RESOLUTION
  // ==========================================================================

  /** A unit skipped after rolling to advance stays put but counts as having advanced */
  protected onSkip(draft: StateDraft, unitId: string): void {
    if (draft.state.units[unitId].flags.advance_roll !== undefined) {
      draft.setFlag(unitId, 'advanced', true);
    }
  }

  protected resolvePhaseAction(draft: StateDraft, dice: Dice, action: Action): PhaseOutcome {
    if (!isMovementAction(action)) {
      return super.resolvePhaseAction(draft, dice, action);
    }
    const unit = draft.state.units[action.actor_unit_id];
    const name = unit.meta.name;

    switch (action.type) {
      case 'BEGIN_ADVANCE': {
        const [roll] = dice.roll(`${name}: advance`, 1);
        draft.setFlag(unit.id, 'advance_roll', roll);
        return { log: [`${name} rolls ${roll} to advance (${unit.meta.stats.move + roll}")`] };
      }
      case 'NORMAL_MOVE':
        placeUnit(draft, unit, action.payload.positions);
        draft.setFlag(unit.id, 'moved', true);
        markDone(draft, unit.id);
        return { log: [`${name} moves`] };
      case 'ADVANCE':
        placeUnit(draft, unit, action.payload.positions);
        draft.setFlag(unit.id, 'moved', true);
        draft.setFlag(unit.id, 'advanced', true);
        markDone(draft, unit.id);
        return { log: [`${name} advances`] };
      case 'FALL_BACK':
        placeUnit(draft, unit, action.payload.positions);
        draft.setFlag(unit.id, 'moved', true);
        draft.setFlag(unit.id, 'fell_back', true);
        markDone(draft, unit.id);
        return { log: [`${name} falls back`] };
      case 'REMAIN_STATIONARY':
        draft.setFlag(unit.id, 'remained_stationary', true);
        markDone(draft, unit.id);
        return { log: [`${name} remains stationary`] };
      case 'ARRIVE_FROM_RESERVES':
        placeUnit(draft, unit, action.payload.positions);
        draft.set(`units.${unit.id}.status`, 'DEPLOYED');
        draft.setFlag(unit.id, 'moved', true);
        markDone(draft, unit.id);
        return { log: [`${name} arrives from reserves`] };
    }
  }
}
