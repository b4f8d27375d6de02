import { PlayerResult, Winner } from "../engine/types";

export interface LeaderboardEntry {
  name: string;
  wins: number;
  total: number;
  /** Percentage rounded to one decimal place. */
  winRate: number;
}

/**
 * Outbound port for finished games. The session service calls `record` after a
 * winner is committed and never lets its failure reach the player.
 */
export interface ResultsRecorder {
  record(results: PlayerResult[], winner: Winner): Promise<void>;
  leaderboard(): Promise<LeaderboardEntry[]>;
}

interface Tally {
  wins: number;
  total: number;
}

/** Process-local recorder; results live as long as the server does. */
export class InMemoryResultsRecorder implements ResultsRecorder {
  private tallies = new Map<string, Tally>();

  async record(results: PlayerResult[], _winner: Winner): Promise<void> {
    for (const { name, won } of results) {
      const tally = this.tallies.get(name) ?? { wins: 0, total: 0 };
      this.tallies.set(name, { wins: tally.wins + (won ? 1 : 0), total: tally.total + 1 });
    }
  }

  /** Most wins first; fewer games played breaks ties, then name. */
  async leaderboard(): Promise<LeaderboardEntry[]> {
    return [...this.tallies.entries()]
      .map(([name, { wins, total }]) => ({
        name,
        wins,
        total,
        winRate: total > 0 ? Math.round((wins / total) * 1000) / 10 : 0
      }))
      .sort((a, b) => b.wins - a.wins || a.total - b.total || a.name.localeCompare(b.name));
  }
}
