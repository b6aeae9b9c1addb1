/**
 * State changes ("diffs") are the only channel through which the engine
 * communicates mutation. Paths are dotted segments into the snapshot, with
 * array elements addressed by index (e.g. `units.U1.models.0.current_wounds`).
 */

import type { FlagValue, GameState, StateChange } from '../types';
import { IntegrityError } from './errors';

type Container = Record<string, unknown> | unknown[];

function isContainer(value: unknown): value is Container {
  return typeof value === 'object' && value !== null;
}

function splitPath(path: string): string[] {
  const segments = path.split('.');
  if (segments.some(s => s.length === 0)) {
    throw new IntegrityError(`Malformed state path "${path}"`);
  }
  return segments;
}

function readChild(container: Container, key: string): unknown {
  if (Array.isArray(container)) {
    return container[Number(key)];
  }
  return container[key];
}

function writeChild(container: Container, key: string, value: unknown): void {
  if (Array.isArray(container)) {
    const idx = Number(key);
    if (!Number.isInteger(idx) || idx < 0 || idx > container.length) {
      throw new IntegrityError(`Array index ${key} out of bounds`);
    }
    container[idx] = value;
    return;
  }
  container[key] = value;
}

function deleteChild(container: Container, key: string): void {
  if (Array.isArray(container)) {
    container.splice(Number(key), 1);
    return;
  }
  delete container[key];
}

export function setChange(path: string, value: unknown): StateChange {
  return { op: 'set', path, value };
}

export function removeChange(path: string): StateChange {
  return { op: 'remove', path };
}

export function flagChange(unitId: string, flag: string, value: FlagValue): StateChange {
  return setChange(`units.${unitId}.flags.${flag}`, value);
}

/**
 * Read the value at a dotted path, or undefined when any segment is missing
 */
export function getAtPath(root: unknown, path: string): unknown {
  let cursor: unknown = root;
  for (const segment of splitPath(path)) {
    if (!isContainer(cursor)) return undefined;
    cursor = readChild(cursor, segment);
  }
  return cursor;
}

/**
 * Apply changes to `target` in place. Intermediate objects are created on set.
 */
export function applyChangesInPlace(target: object, changes: readonly StateChange[]): void {
  for (const change of changes) {
    const segments = splitPath(change.path);
    const last = segments[segments.length - 1];
    let cursor: unknown = target;

    for (const segment of segments.slice(0, -1)) {
      if (!isContainer(cursor)) {
        throw new IntegrityError(`Cannot traverse "${change.path}" at "${segment}"`);
      }
      let next = readChild(cursor, segment);
      if (next === undefined && change.op === 'set') {
        next = {};
        writeChild(cursor, segment, next);
      }
      cursor = next;
    }

    if (!isContainer(cursor)) {
      if (change.op === 'remove') continue;
      throw new IntegrityError(`Cannot apply change at "${change.path}"`);
    }

    if (change.op === 'set') {
      writeChild(cursor, last, structuredClone(change.value));
    } else {
      deleteChild(cursor, last);
    }
  }
}

/**
 * Return a new state with the changes applied; the input is left untouched
 */
export function applyChanges(state: GameState, changes: readonly StateChange[]): GameState {
  const next = structuredClone(state);
  applyChangesInPlace(next, changes);
  return next;
}

/**
 * Private working copy of the caller's state. Writes go to the copy and are
 * recorded, so later resolution steps observe earlier ones while the caller's
 * object stays untouched until it applies the recorded changes.
 */
export class StateDraft {
  readonly state: GameState;
  private readonly recorded: StateChange[] = [];

  constructor(source: GameState) {
    this.state = structuredClone(source);
  }

  set(path: string, value: unknown): void {
    const change = setChange(path, value);
    applyChangesInPlace(this.state, [change]);
    this.recorded.push(change);
  }

  remove(path: string): void {
    const change = removeChange(path);
    applyChangesInPlace(this.state, [change]);
    this.recorded.push(change);
  }

  setFlag(unitId: string, flag: string, value: FlagValue): void {
    this.set(`units.${unitId}.flags.${flag}`, value);
  }

  apply(changes: readonly StateChange[]): void {
    applyChangesInPlace(this.state, changes);
    this.recorded.push(...changes);
  }

  get changes(): StateChange[] {
    return [...this.recorded];
  }
}
