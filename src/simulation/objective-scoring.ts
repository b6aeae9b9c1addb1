import type { GameState, Objective, PlayerId, PlayerKey, StateChange } from '../types';
import type { EngineConfig } from './config';
import { centerDistance, placedModels } from './distance';
import { setChange } from './state-changes';

export interface ObjectiveControl {
  objectiveId: string;
  levelOfControl: Record<PlayerKey, number>;
  controlledBy: PlayerId | null;
  scoringUnits: Record<PlayerKey, string[]>;
}

export interface ScoringResult {
  changes: StateChange[];
  vp: number;
  controls: ObjectiveControl[];
  log: string[];
}

/**
 * Level of control on one objective: the summed OC of alive models within
 * range of the marker. Battle-shocked units have OC 0.
 */
export function calculateObjectiveControl(
  state: GameState,
  objective: Objective,
  config: EngineConfig
): ObjectiveControl {
  const levelOfControl: Record<PlayerKey, number> = { '1': 0, '2': 0 };
  const scoringUnits: Record<PlayerKey, string[]> = { '1': [], '2': [] };
  const marker = { x: objective.x, y: objective.y };

  for (const unit of Object.values(state.units)) {
    if (unit.status !== 'DEPLOYED') continue;
    if (unit.flags.battle_shocked === true) continue;

    const oc = unit.meta.stats.objective_control;
    const inRange = placedModels(unit)
      .filter(m => centerDistance(m.position, marker) - m.radius <= config.objectiveControlRange);
    if (inRange.length === 0 || oc <= 0) continue;

    const key: PlayerKey = unit.owner === 1 ? '1' : '2';
    levelOfControl[key] += oc * inRange.length;
    scoringUnits[key].push(unit.meta.name);
  }

  let controlledBy: PlayerId | null = null;
  if (levelOfControl['1'] > levelOfControl['2']) {
    controlledBy = 1;
  } else if (levelOfControl['2'] > levelOfControl['1']) {
    controlledBy = 2;
  }

  return { objectiveId: objective.id, levelOfControl, controlledBy, scoringUnits };
}

/**
 * Update control and hold timers on every objective and award VP to the
 * scoring player for the objectives it holds
 */
export function scoreObjectives(state: GameState, player: PlayerId, config: EngineConfig): ScoringResult {
  const changes: StateChange[] = [];
  const controls: ObjectiveControl[] = [];
  const log: string[] = [];
  let vp = 0;

  state.board.objectives.forEach((objective, idx) => {
    const control = calculateObjectiveControl(state, objective, config);
    controls.push(control);

    const previous = objective.controlled_by ?? null;
    const held = control.controlledBy === null
      ? 0
      : (previous === control.controlledBy ? objective.held_rounds ?? 0 : 0) + 1;

    changes.push(setChange(`board.objectives.${idx}.controlled_by`, control.controlledBy));
    changes.push(setChange(`board.objectives.${idx}.held_rounds`, held));

    if (control.controlledBy === null) {
      log.push(`${objective.name}: contested (0VP)`);
    } else if (control.controlledBy === player && held >= config.holdTimerRequired) {
      vp += config.vpPerObjective;
      log.push(`${objective.name}: player ${player} (h${held}, +${config.vpPerObjective}VP)`);
    } else {
      log.push(`${objective.name}: player ${control.controlledBy} (h${held})`);
    }
  });

  const key: PlayerKey = player === 1 ? '1' : '2';
  if (vp > 0) {
    changes.push(setChange(`players.${key}.vp`, state.players[key].vp + vp));
  }

  return { changes, vp, controls, log };
}
