/** Utility helpers shared across engine modules. */
import { GameRuleError, Player } from "./types";

export type RandomFn = () => number;

/** Default RNG, override in tests for determinism. */
export const defaultRandom: RandomFn = () => Math.random();

/** Fisher-Yates shuffle (pure). */
export function shuffle<T>(items: readonly T[], random: RandomFn = defaultRandom): T[] {
  const copy = [...items];
  for (let i = copy.length - 1; i > 0; i--) {
    const j = Math.floor(random() * (i + 1));
    [copy[i], copy[j]] = [copy[j], copy[i]];
  }
  return copy;
}

/** Uniform integer in [0, size), throwing on empty ranges. */
export function randomIndex(size: number, random: RandomFn = defaultRandom): number {
  if (size <= 0) {
    throw new GameRuleError("INVALID_SEAT_TARGET", "Cannot pick from an empty range");
  }
  return Math.min(size - 1, Math.floor(random() * size));
}

/** Non-negative modulo, so `wrapIndex(-1, 5) === 4`. */
export function wrapIndex(index: number, size: number): number {
  return ((index % size) + size) % size;
}

/** Safe player lookup, null when missing. */
export function getPlayer(players: Player[], name: string): Player | null {
  return players.find(p => p.name === name) ?? null;
}

/** Counts how many entries of a vote map carry the given choice. */
export function countChoice<T extends string>(votes: Record<string, T>, choice: T): number {
  return Object.values(votes).filter(vote => vote === choice).length;
}
