import * as transitions from "../engine/transitions";
import { Alignment, ExcaliburFlip, MissionVote, Session, TeamVote, Winner } from "../engine/types";
import { RandomFn, defaultRandom } from "../engine/utils";
import { buildFinalResults } from "../engine/win";
import { LobbyView, ResetGamePayload, SessionView, buildLobbyView, buildSessionView } from "../shared/messages";
import { ServerConfig } from "./config";
import { Logger } from "./logger";
import { LeaderboardEntry, ResultsRecorder } from "./results";
import { SessionStore } from "./store";

export type VoteStatus = "ok" | "ignored";
export type JoinStatus = "joined" | "rejoined";

export type SessionListener = (session: Session) => void;

export interface AvalonServiceOptions {
  store: SessionStore;
  recorder: ResultsRecorder;
  logger: Logger;
  config: ServerConfig;
  random?: RandomFn;
}

/**
 * Coordinates every mutation of the live session: runs the engine transition
 * inside the store's critical section, notifies listeners with the committed
 * state, and hands finished games to the results recorder.
 */
export class AvalonService {
  private readonly store: SessionStore;
  private readonly recorder: ResultsRecorder;
  private readonly logger: Logger;
  private readonly config: ServerConfig;
  private readonly random: RandomFn;
  private readonly listeners = new Set<SessionListener>();
  private readonly pending = new Set<Promise<void>>();

  constructor(options: AvalonServiceOptions) {
    this.store = options.store;
    this.recorder = options.recorder;
    this.logger = options.logger;
    this.config = options.config;
    this.random = options.random ?? defaultRandom;
  }

  /** Registers a callback run after every committed change. Returns an unsubscribe function. */
  onChange(listener: SessionListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  current(): Session {
    return this.store.get();
  }

  view(viewerName: string): SessionView {
    return buildSessionView(this.store.get(), viewerName);
  }

  lobby(): LobbyView {
    return buildLobbyView(this.store.get());
  }

  leaderboard(): Promise<LeaderboardEntry[]> {
    return this.recorder.leaderboard();
  }

  /** Resolves once every results write started so far has settled. */
  async idle(): Promise<void> {
    await Promise.all([...this.pending]);
  }

  reset(payload: Partial<ResetGamePayload> = {}): { previousPlayers: string[] } {
    const session = this.commit("reset", current =>
      transitions.resetSession(current, {
        seatTarget: payload.playerCount ?? this.config.defaultSeatTarget,
        lancelotEnabled: payload.lancelotEnabled ?? false,
        excaliburEnabled: payload.excaliburEnabled ?? false,
        ladyOfTheLakeEnabled: payload.ladyOfTheLakeEnabled ?? this.config.ladyOfTheLakeDefault
      })
    );
    return { previousPlayers: session.previousPlayers };
  }

  clear(): void {
    this.commit("clear", transitions.clearSession);
  }

  endGame(): void {
    this.commit("endGame", transitions.forceEnd);
  }

  join(playerName: string): JoinStatus {
    const seated = this.store.get().players.some(p => p.name === playerName.trim());
    this.commit("join", current => transitions.joinSession(current, playerName, this.random));
    return seated ? "rejoined" : "joined";
  }

  recordVoteFail(): void {
    this.commit("recordVoteFail", transitions.recordVoteFail);
  }

  proposeTeam(team: string[], proposerName?: string | null): { requiredSize: number } {
    const requiredSize = transitions.currentTeamSize(this.store.get());
    this.commit("proposeTeam", current => transitions.proposeTeam(current, team, proposerName));
    return { requiredSize };
  }

  voteTeam(playerName: string, vote: TeamVote): VoteStatus {
    if (!transitions.isTeamVoteOpen(this.store.get())) {
      this.logger.debug("Team vote ignored outside voting", { playerName });
      return "ignored";
    }
    this.commit("voteTeam", current => transitions.recordTeamVote(current, playerName, vote));
    return "ok";
  }

  voteMission(playerName: string, action: MissionVote): VoteStatus {
    if (!transitions.isMissionVoteOpen(this.store.get())) {
      this.logger.debug("Mission vote ignored outside a mission", { playerName });
      return "ignored";
    }
    this.commit("voteMission", current => transitions.recordMissionVote(current, playerName, action));
    return "ok";
  }

  assignExcalibur(target: string): void {
    this.commit("assignExcalibur", current => transitions.assignExcalibur(current, target));
  }

  /** Returns the flip that was applied, or null when the holder passed. */
  useExcalibur(target: string | null): ExcaliburFlip | null {
    const session = this.commit("useExcalibur", current => transitions.useExcalibur(current, target));
    return session.excalibur.result;
  }

  inspectWithLady(target: string): Alignment {
    const session = this.commit("inspectWithLady", current => transitions.inspectWithLady(current, target));
    const { result } = session.ladyOfTheLake;
    if (!result) {
      throw new Error("Inspection committed without a result");
    }
    return result.alignment;
  }

  assassinate(target: string): Winner {
    const session = this.commit("assassinate", current => transitions.assassinate(current, target));
    if (!session.winner) {
      throw new Error("Assassination committed without a winner");
    }
    return session.winner;
  }

  private commit(action: string, updater: (current: Session) => Session): Session {
    const before = this.store.get();
    const after = this.store.withSession(updater);
    if (after === before) {
      return after;
    }

    this.logger.info(`Session ${action}`, { phase: after.phase, step: after.step });
    if (before.winner === null && after.winner !== null) {
      this.recordResults(after, after.winner);
    }
    this.notify(after);
    return after;
  }

  private notify(session: Session): void {
    for (const listener of this.listeners) {
      try {
        listener(session);
      } catch (err) {
        this.logger.error("Session listener failed", { err });
      }
    }
  }

  /** Fire-and-forget: a failed write is logged and never undoes the committed state. */
  private recordResults(session: Session, winner: Winner): void {
    const results = buildFinalResults(session, winner);
    this.logger.info("Game finished", { winner, players: results.length });
    const write = this.recorder
      .record(results, winner)
      .catch((err: unknown) => {
        this.logger.error("Failed to record game results", { err });
      })
      .finally(() => {
        this.pending.delete(write);
      });
    this.pending.add(write);
  }
}
