import { getTables } from './tables.js';
import { type OpponentProfile, PROFILE_NAMES, type ProfileName } from './types.js';

export function isProfileName(name: string): name is ProfileName {
  return PROFILE_NAMES.some((p) => p === name);
}

/** Archetype parameters; unknown names use the `unknown` profile. */
export function opponentProfileFor(name: string): OpponentProfile {
  const { profiles } = getTables();
  const key = name.trim().toLowerCase();
  return isProfileName(key) ? profiles[key] : profiles.unknown;
}

export function listOpponentProfiles(): OpponentProfile[] {
  const { profiles } = getTables();
  return PROFILE_NAMES.map((name) => profiles[name]);
}
