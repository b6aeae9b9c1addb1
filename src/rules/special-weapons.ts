/**
 * Weapon keyword parsing: Rapid Fire, Melta, Sustained Hits, Lethal Hits,
 * Devastating Wounds, Anti-X, Hazardous, and the movement/engagement
 * restrictions (Assault, Heavy, Pistol).
 */

export interface AntiRule {
  keyword: string;
  threshold: number;
}

export interface WeaponAbilities {
  assault: boolean;
  heavy: boolean;
  pistol: boolean;
  torrent: boolean;
  lethalHits: boolean;
  sustainedHits: number;      // extra hits per critical hit, 0 when absent
  devastatingWounds: boolean;
  twinLinked: boolean;
  lance: boolean;
  ignoresCover: boolean;
  blast: boolean;
  hazardous: boolean;
  indirectFire: boolean;
  rapidFire: string | null;   // bonus attacks expression at half range
  melta: number;              // bonus damage at half range
  anti: AntiRule[];
}

/**
 * Parse a weapon's keyword list (case-insensitive)
 */
export function parseWeaponAbilities(keywords: readonly string[]): WeaponAbilities {
  const abilities: WeaponAbilities = {
    assault: false,
    heavy: false,
    pistol: false,
    torrent: false,
    lethalHits: false,
    sustainedHits: 0,
    devastatingWounds: false,
    twinLinked: false,
    lance: false,
    ignoresCover: false,
    blast: false,
    hazardous: false,
    indirectFire: false,
    rapidFire: null,
    melta: 0,
    anti: []
  };

  for (const raw of keywords) {
    const keyword = raw.trim().toLowerCase();

    switch (keyword) {
      case 'assault': abilities.assault = true; continue;
      case 'heavy': abilities.heavy = true; continue;
      case 'pistol': abilities.pistol = true; continue;
      case 'torrent': abilities.torrent = true; continue;
      case 'lethal hits': abilities.lethalHits = true; continue;
      case 'devastating wounds': abilities.devastatingWounds = true; continue;
      case 'twin-linked': abilities.twinLinked = true; continue;
      case 'lance': abilities.lance = true; continue;
      case 'ignores cover': abilities.ignoresCover = true; continue;
      case 'blast': abilities.blast = true; continue;
      case 'hazardous': abilities.hazardous = true; continue;
      case 'indirect fire': abilities.indirectFire = true; continue;
    }

    const sustainedHitsMatch = keyword.match(/^sustained hits (\d+)$/);
    if (sustainedHitsMatch) {
      abilities.sustainedHits = Math.max(abilities.sustainedHits, parseInt(sustainedHitsMatch[1], 10));
      continue;
    }

    const rapidFireMatch = keyword.match(/^rapid fire (\d+|d\d+(?:\+\d+)?)$/);
    if (rapidFireMatch) {
      abilities.rapidFire = rapidFireMatch[1].toUpperCase();
      continue;
    }

    const meltaMatch = keyword.match(/^melta (\d+)$/);
    if (meltaMatch) {
      abilities.melta = parseInt(meltaMatch[1], 10);
      continue;
    }

    // Anti-INFANTRY 4+, Anti-VEHICLE 2+ ...
    const antiMatch = keyword.match(/^anti-([\w -]+?)\s+(\d)\+$/);
    if (antiMatch) {
      abilities.anti.push({ keyword: antiMatch[1].toUpperCase(), threshold: parseInt(antiMatch[2], 10) });
    }
  }

  return abilities;
}

/**
 * Critical wound threshold against a target, lowered by matching Anti-X rules
 */
export function antiThreshold(abilities: WeaponAbilities, targetKeywords: readonly string[]): number | null {
  const upper = targetKeywords.map(k => k.toUpperCase());
  let best: number | null = null;
  for (const rule of abilities.anti) {
    if (upper.includes(rule.keyword)) {
      best = best === null ? rule.threshold : Math.min(best, rule.threshold);
    }
  }
  return best;
}

/**
 * Bonus attacks for Blast: one per five models in the target unit
 */
export function blastBonus(abilities: WeaponAbilities, targetModelCount: number): number {
  return abilities.blast ? Math.floor(targetModelCount / 5) : 0;
}
