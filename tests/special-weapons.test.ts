import { describe, it, expect } from 'vitest';
import { antiThreshold, blastBonus, parseWeaponAbilities } from '../src/rules/special-weapons';
import { effectiveKeywords, getWeaponType, modelsWithWeapon, weaponAbilities } from '../src/utils/weapon';
import { makeUnit, meleeWeapon, rangedWeapon } from './fixtures';

describe('Special Weapons Rules', () => {
  describe('parseWeaponAbilities', () => {
    it('should parse every keyword in the list', () => {
      const abilities = parseWeaponAbilities([
        'Assault',
        'Sustained Hits 2',
        'Rapid Fire 1',
        'Melta 2',
        'Anti-Infantry 4+',
        'Lethal Hits'
      ]);

      expect(abilities.assault).toBe(true);
      expect(abilities.sustainedHits).toBe(2);
      expect(abilities.rapidFire).toBe('1');
      expect(abilities.melta).toBe(2);
      expect(abilities.anti).toEqual([{ keyword: 'INFANTRY', threshold: 4 }]);
      expect(abilities.lethalHits).toBe(true);
      expect(abilities.heavy).toBe(false);
      expect(abilities.devastatingWounds).toBe(false);
    });

    it('should keep dice expressions for Rapid Fire', () => {
      expect(parseWeaponAbilities(['Rapid Fire D3']).rapidFire).toBe('D3');
    });

    it('should keep the largest Sustained Hits value', () => {
      expect(parseWeaponAbilities(['SUSTAINED HITS 1', 'SUSTAINED HITS 2']).sustainedHits).toBe(2);
    });

    it('should return defaults for an empty list', () => {
      const abilities = parseWeaponAbilities([]);
      expect(abilities.rapidFire).toBeNull();
      expect(abilities.anti).toEqual([]);
      expect(abilities.melta).toBe(0);
    });
  });

  describe('antiThreshold', () => {
    const abilities = parseWeaponAbilities(['Anti-Infantry 4+']);

    it('should match target keywords case-insensitively', () => {
      expect(antiThreshold(abilities, ['Infantry'])).toBe(4);
    });

    it('should return null when no rule matches', () => {
      expect(antiThreshold(abilities, ['VEHICLE'])).toBeNull();
    });

    it('should take the lowest matching threshold', () => {
      const both = parseWeaponAbilities(['Anti-Infantry 4+', 'Anti-Infantry 2+']);
      expect(antiThreshold(both, ['INFANTRY'])).toBe(2);
    });
  });

  describe('blastBonus', () => {
    const blast = parseWeaponAbilities(['Blast']);

    it('should add one attack per five models', () => {
      expect(blastBonus(blast, 10)).toBe(2);
      expect(blastBonus(blast, 4)).toBe(0);
    });

    it('should add nothing without Blast', () => {
      expect(blastBonus(parseWeaponAbilities([]), 10)).toBe(0);
    });
  });
});

describe('Weapon utilities', () => {
  it('should merge granted keywords scoped to the weapon type', () => {
    const weapon = rangedWeapon('bolter', { keywords: ['Assault'] });
    expect(effectiveKeywords(weapon, ['ranged:LETHAL HITS', 'melee:LANCE', 'TORRENT']))
      .toEqual(['Assault', 'LETHAL HITS', 'TORRENT']);
  });

  it('should not duplicate keywords the weapon already has', () => {
    const weapon = rangedWeapon('bolter', { keywords: ['Lethal Hits'] });
    expect(effectiveKeywords(weapon, ['LETHAL HITS'])).toEqual(['Lethal Hits']);
  });

  it('should parse granted keywords into abilities', () => {
    const weapon = meleeWeapon('blade');
    expect(weaponAbilities(weapon, ['melee:LANCE']).lance).toBe(true);
    expect(weaponAbilities(weapon, ['ranged:LANCE']).lance).toBe(false);
  });

  it('should classify weapon types', () => {
    expect(getWeaponType(meleeWeapon('blade'))).toBe('melee');
    expect(getWeaponType(rangedWeapon('pistol', { keywords: ['Pistol'] }))).toBe('pistol');
    expect(getWeaponType(rangedWeapon('bolter'))).toBe('ranged');
  });

  it('should list alive, placed models that carry a weapon', () => {
    const weapon = rangedWeapon('plasma', { model_ids: ['squad-m2', 'squad-m3'] });
    const unit = makeUnit('squad', { at: [{ x: 1, y: 1 }, { x: 2, y: 1 }, { x: 3, y: 1 }] });
    unit.models[2].alive = false;

    expect(modelsWithWeapon(unit, weapon).map(m => m.id)).toEqual(['squad-m2']);
  });
});
