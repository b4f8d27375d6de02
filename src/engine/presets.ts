/**
 * Fixed game data keyed by seat count: which roles are dealt and how many
 * players each of the five missions takes. Unknown seat counts fall back to the
 * six-seat tables.
 */
import rawPresets from "./presets.json";
import { ALL_ROLES, Role } from "./types";

export const FALLBACK_SEAT_COUNT = 6;
export const MISSIONS_PER_GAME = 5;
const LANCELOT_PRESET_KEY = "10_lancelot";

function isRole(value: string): value is Role {
  return ALL_ROLES.some(role => role === value);
}

function parseRoleTable(table: Record<string, readonly string[]>): Map<string, readonly Role[]> {
  const parsed = new Map<string, readonly Role[]>();
  for (const [key, names] of Object.entries(table)) {
    const roles = names.map(name => {
      if (!isRole(name)) {
        throw new Error(`Unknown role "${name}" in preset ${key}`);
      }
      return name;
    });
    parsed.set(key, roles);
  }
  return parsed;
}

function parseSizeTable(table: Record<string, readonly number[]>): Map<string, readonly number[]> {
  const parsed = new Map<string, readonly number[]>();
  for (const [key, sizes] of Object.entries(table)) {
    if (sizes.length !== MISSIONS_PER_GAME || sizes.some(size => !Number.isInteger(size) || size < 1)) {
      throw new Error(`Mission sizes for ${key} must be ${MISSIONS_PER_GAME} positive integers`);
    }
    parsed.set(key, [...sizes]);
  }
  return parsed;
}

const ROLE_PRESETS = parseRoleTable(rawPresets.rolePresets);
const MISSION_SIZES = parseSizeTable(rawPresets.missionSizes);

function lookup<T>(table: Map<string, T>, key: string): T {
  const value = table.get(key) ?? table.get(String(FALLBACK_SEAT_COUNT));
  if (value === undefined) {
    throw new Error(`Preset table is missing the ${FALLBACK_SEAT_COUNT}-seat fallback`);
  }
  return value;
}

/** Seat counts with a dedicated preset. */
export const SUPPORTED_SEAT_COUNTS: readonly number[] = [...ROLE_PRESETS.keys()]
  .filter(key => /^\d+$/.test(key))
  .map(Number)
  .sort((a, b) => a - b);

/** Role multiset for a table; the Lancelot variant only exists at exactly ten seats. */
export function rolePresetFor(seatTarget: number, lancelotRequested: boolean): Role[] {
  if (lancelotRequested && seatTarget === 10) {
    return [...lookup(ROLE_PRESETS, LANCELOT_PRESET_KEY)];
  }
  return [...lookup(ROLE_PRESETS, String(seatTarget))];
}

export function missionSizesFor(seatTarget: number): readonly number[] {
  return lookup(MISSION_SIZES, String(seatTarget));
}

/** Team size for the given zero-based round, clamped to the last entry past round five. */
export function requiredTeamSize(seatTarget: number, roundIndex: number): number {
  const sizes = missionSizesFor(seatTarget);
  return sizes[Math.min(roundIndex, sizes.length - 1)];
}

/** Fail ballots needed to sink a mission: two on the fourth mission at seven or more seats. */
export function failsRequired(seatTarget: number, roundIndex: number): number {
  return seatTarget >= 7 && roundIndex === 3 ? 2 : 1;
}
