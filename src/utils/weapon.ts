/**
 * Weapon-related utility functions
 */

import type { Model, Unit, WeaponProfile } from '../types';
import { parseWeaponAbilities, type WeaponAbilities } from '../rules/special-weapons';

export type WeaponType = 'ranged' | 'melee' | 'pistol';

/**
 * Determine weapon type from weapon data
 */
export function getWeaponType(weapon: WeaponProfile): WeaponType {
  if (weapon.type === 'melee') return 'melee';
  return weapon.keywords.some(k => k.trim().toLowerCase() === 'pistol') ? 'pistol' : 'ranged';
}

export function findWeapon(unit: Unit, weaponId: string): WeaponProfile | undefined {
  return unit.meta.weapons.find(w => w.id === weaponId);
}

/**
 * Alive, placed models that carry the weapon
 */
export function modelsWithWeapon(unit: Unit, weapon: WeaponProfile): Model[] {
  return unit.models.filter(m =>
    m.alive && m.position !== null && (!weapon.model_ids || weapon.model_ids.includes(m.id))
  );
}

/**
 * Keywords the weapon has right now: its own plus any granted by effects.
 * Granted entries may be scoped as "ranged:LETHAL HITS".
 */
export function effectiveKeywords(weapon: WeaponProfile, granted: readonly string[]): string[] {
  const keywords = [...weapon.keywords];
  for (const entry of granted) {
    const [scope, keyword] = entry.includes(':') ? entry.split(':', 2) : ['', entry];
    if (scope && scope !== weapon.type) continue;
    if (!keywords.some(k => k.toLowerCase() === keyword.toLowerCase())) {
      keywords.push(keyword);
    }
  }
  return keywords;
}

export function weaponAbilities(weapon: WeaponProfile, granted: readonly string[] = []): WeaponAbilities {
  return parseWeaponAbilities(effectiveKeywords(weapon, granted));
}

export function unitHasKeyword(unit: Unit, keyword: string): boolean {
  const wanted = keyword.toUpperCase();
  return unit.meta.keywords.some(k => k.toUpperCase() === wanted);
}
