/**
 * Core domain types for the Avalon session engine.
 * Keep this file dependency-free so it can be shared across layers.
 */

/** Hidden character dealt to every seat once the room fills. */
export type Role =
  | "MERLIN"
  | "PERCIVAL"
  | "LOYAL_SERVANT"
  | "MORGANA"
  | "ASSASSIN"
  | "MORDRED"
  | "OBERON"
  | "MINION"
  | "LANCELOT_GOOD"
  | "LANCELOT_EVIL";

export const ALL_ROLES: readonly Role[] = [
  "MERLIN",
  "PERCIVAL",
  "LOYAL_SERVANT",
  "MORGANA",
  "ASSASSIN",
  "MORDRED",
  "OBERON",
  "MINION",
  "LANCELOT_GOOD",
  "LANCELOT_EVIL"
];

export type Alignment = "GOOD" | "EVIL";

/** Side declared the winner; always an alignment. */
export type Winner = Alignment;

/** Lifecycle phases of the single live session. */
export type Phase = "EMPTY" | "JOINING" | "ACTIVE" | "ASSASSIN_PENDING" | "ENDED";

/** Sub-state while the session is ACTIVE. */
export type ActiveStep =
  | "PROPOSAL"
  | "TEAM_VOTE"
  | "EXCALIBUR_ASSIGN"
  | "MISSION"
  | "EXCALIBUR_DECIDE"
  | "LADY_OF_THE_LAKE";

export type TeamVote = "APPROVE" | "REJECT";
export type MissionVote = "SUCCESS" | "FAIL";
export type RoundOutcome = "REJECTED" | "SUCCESS" | "FAIL";

export type ExcaliburPhase = "NONE" | "ASSIGN" | "MISSION" | "DECIDE" | "DONE";

/**
 * One seat. The name doubles as the identity key; there is no separate id.
 * `role` is LOYAL_SERVANT until roles are assigned and never changes afterwards.
 */
export interface Player {
  name: string;
  role: Role;
}

/** Options fixed when the session is created. */
export interface SessionOptions {
  seatTarget: number;
  lancelotEnabled: boolean;
  excaliburEnabled: boolean;
  ladyOfTheLakeEnabled: boolean;
}

/** A single mission ballot, kept in the order it was cast. */
export interface MissionBallot {
  voter: string;
  vote: MissionVote;
}

/** Outcome of a completed mission. At most five exist per session. */
export interface MissionRecord {
  roundNumber: number;
  team: string[];
  failCount: number;
  result: Exclude<RoundOutcome, "REJECTED">;
}

/** Immutable history entry for every resolved proposal, rejected or played. */
export interface RoundRecord {
  roundNumber: number;
  proposalIndex: number;
  proposedTeam: string[];
  proposerName: string | null;
  captainName: string | null;
  teamVotes: Record<string, TeamVote>;
  missionVotes: Record<string, MissionVote>;
  outcome: RoundOutcome;
}

export interface LastTeamVote {
  result: "APPROVED" | "REJECTED";
  votes: Record<string, TeamVote>;
  /** 1-based position of the voted proposal within its round. */
  proposalIndex: number;
}

export interface LancelotState {
  enabled: boolean;
  /** Five pre-shuffled flags, two of them true; one is revealed per completed mission. */
  swapCards: boolean[];
  revealed: (boolean | null)[];
  swapped: boolean;
}

export interface LadyInspection {
  target: string;
  alignment: Alignment;
}

export interface LadyOfTheLakeState {
  enabled: boolean;
  holder: string | null;
  initialHolder: string | null;
  /** Everyone who has ever held the token; none of them may be inspected. */
  history: string[];
  result: LadyInspection | null;
  inspector: string | null;
}

export interface ExcaliburFlip {
  target: string;
  originalVote: MissionVote;
}

export interface ExcaliburState {
  enabled: boolean;
  holder: string | null;
  phase: ExcaliburPhase;
  result: ExcaliburFlip | null;
}

/**
 * Immutable snapshot of the entire session.
 * Key invariants:
 * - `players.length === options.seatTarget` once `phase` has left JOINING.
 * - `rolesAssigned === false` implies `phase` is EMPTY or JOINING.
 * - `step` is only meaningful while `phase === "ACTIVE"`.
 * - `winner !== null` implies `phase === "ENDED"`.
 */
export interface Session {
  phase: Phase;
  step: ActiveStep;
  options: SessionOptions;
  players: Player[];
  rolesAssigned: boolean;
  captainIndex: number;
  currentTeam: string[];
  proposer: string | null;
  teamVotes: Record<string, TeamVote>; // voter -> choice, live during TEAM_VOTE
  lastTeamVote: LastTeamVote | null;
  missionBallots: MissionBallot[];
  consecutiveRejections: number;
  missions: MissionRecord[];
  history: RoundRecord[];
  lancelot: LancelotState;
  ladyOfTheLake: LadyOfTheLakeState;
  excalibur: ExcaliburState;
  winner: Winner | null;
  assassinTarget: string | null;
  previousPlayers: string[];
}

/** Finalized per-player outcome handed to the results recorder. */
export interface PlayerResult {
  name: string;
  won: boolean;
}

export type GameRuleCode =
  | "WRONG_PHASE"
  | "INVALID_TEAM_SIZE"
  | "UNKNOWN_PLAYER"
  | "ROOM_FULL"
  | "INVALID_TARGET"
  | "INVALID_NAME"
  | "INVALID_SEAT_TARGET"
  | "INVALID_CHOICE";

/** Application-level error for invalid transitions. Surfaces to clients as structured error codes. */
export class GameRuleError extends Error {
  constructor(public code: GameRuleCode, message: string) {
    super(message);
    this.name = "GameRuleError";
  }
}
