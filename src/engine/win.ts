import { isCurrentlyEvil } from "./alignment";
import { Player, PlayerResult, Role, Session, Winner } from "./types";

export const SUCCESSES_TO_WIN = 3;
export const FAILS_TO_LOSE = 3;
export const REJECTIONS_TO_LOSE = 5;

/** Why the main loop stopped: good earned an assassination attempt, or evil already won. */
export type GameEnd = "ASSASSINATION" | "EVIL_WINS";

/**
 * Computes the end-game trigger (if any) for the supplied state.
 * Successes are checked first, so three successes always lead to assassination
 * even when another threshold is met in the same resolution.
 */
export function checkGameEnd(session: Session): GameEnd | null {
  const successes = session.missions.filter(m => m.result === "SUCCESS").length;
  const fails = session.missions.filter(m => m.result === "FAIL").length;

  if (successes >= SUCCESSES_TO_WIN) return "ASSASSINATION";
  if (fails >= FAILS_TO_LOSE) return "EVIL_WINS";
  if (session.consecutiveRejections >= REJECTIONS_TO_LOSE) return "EVIL_WINS";
  return null;
}

/** Moves the session into the phase matching the current end-game trigger, if any. */
export function applyGameEnd(session: Session): Session {
  const end = checkGameEnd(session);
  if (end === "ASSASSINATION") {
    return { ...session, phase: "ASSASSIN_PENDING" };
  }
  if (end === "EVIL_WINS") {
    return { ...session, phase: "ENDED", winner: "EVIL" };
  }
  return session;
}

/** The seat that performs the assassination: the Assassin, or Morgana in tables without one. */
export function getAssassinSeat(players: Player[]): Player | null {
  return (
    players.find(p => p.role === "ASSASSIN") ??
    players.find(p => p.role === "MORGANA") ??
    null
  );
}

export function getAssassinRole(players: Player[]): Role | null {
  return getAssassinSeat(players)?.role ?? null;
}

/**
 * Win/loss per seat for the results recorder, judged on effective alignment so a
 * Lancelot who changed sides wins or loses with the side they ended on.
 */
export function buildFinalResults(session: Session, winner: Winner): PlayerResult[] {
  return session.players.map(player => {
    const evil = isCurrentlyEvil(player, session.lancelot.swapped);
    return { name: player.name, won: winner === "EVIL" ? evil : !evil };
  });
}
