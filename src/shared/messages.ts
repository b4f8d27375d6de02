import { isLancelot, currentAlignment } from "../engine/alignment";
import { currentTeamSize, captainName } from "../engine/transitions";
import {
  ActiveStep,
  Alignment,
  ExcaliburFlip,
  ExcaliburPhase,
  LadyInspection,
  LastTeamVote,
  MissionRecord,
  MissionVote,
  Phase,
  Role,
  RoundRecord,
  Session,
  TeamVote,
  Winner
} from "../engine/types";
import { getPlayer } from "../engine/utils";
import { computeVision, VisionEntry } from "../engine/vision";
import { getAssassinRole } from "../engine/win";

/** Options a host sends to open a new lobby; omitted fields take the configured defaults. */
export interface ResetGamePayload {
  playerCount: number;
  lancelotEnabled?: boolean;
  excaliburEnabled?: boolean;
  ladyOfTheLakeEnabled?: boolean;
}

/**
 * All actions that a client may issue over the WebSocket channel.
 * A socket must SUBSCRIBE under a player name before it receives state; the
 * gameplay messages mirror the HTTP routes one for one.
 */
export type ClientMessage =
  /** Bind this socket to a seat name so it receives that seat's view. */
  | { type: "SUBSCRIBE"; payload: { playerName: string } }
  /** Discard the current session and open a new lobby. */
  | { type: "RESET_GAME"; payload: Partial<ResetGamePayload> }
  /** Discard the current session without opening a lobby. */
  | { type: "CLEAR_GAME" }
  /** Stop the game without a winner. */
  | { type: "END_GAME" }
  | { type: "JOIN"; payload: { playerName: string } }
  /** Captain proposes a team; the proposer defaults to the captain. */
  | { type: "PROPOSE_TEAM"; payload: { team: string[]; playerName?: string } }
  | { type: "VOTE_TEAM"; payload: { playerName: string; vote: TeamVote } }
  | { type: "VOTE_MISSION"; payload: { playerName: string; action: MissionVote } }
  | { type: "ASSIGN_EXCALIBUR"; payload: { target: string } }
  /** Omit the target to pass without flipping a ballot. */
  | { type: "USE_EXCALIBUR"; payload: { target?: string | null } }
  | { type: "LADY_OF_THE_LAKE"; payload: { target: string } }
  | { type: "ASSASSINATE"; payload: { target: string } };

export interface RevealedPlayer {
  name: string;
  role: Role;
}

/** The view before anyone has created a game. Every field is a fixed default. */
export interface EmptySessionView {
  phase: "EMPTY";
  currentCount: 0;
  targetCount: 0;
  players: [];
  requiredTeamSize: 2;
}

/**
 * Redacted snapshot tailored for a specific viewer.
 * Other seats' roles only appear in `vision`, and in `revealedPlayers` once the game has ended.
 */
export interface LiveSessionView {
  phase: Exclude<Phase, "EMPTY">;
  /** Sub-step while ACTIVE, null otherwise. */
  step: ActiveStep | null;
  currentCount: number;
  targetCount: number;
  players: string[];
  missions: MissionRecord[];
  consecutiveRejections: number;
  yourRole: Role | null;
  /** Only set for Lancelots, whose side can change mid-game. */
  yourAlignment: Alignment | null;
  vision: VisionEntry[];
  revealedPlayers: RevealedPlayer[];
  history: RoundRecord[];
  captain: string | null;
  proposer: string | null;
  requiredTeamSize: number;
  teamVoteActive: boolean;
  teamVotes: Record<string, TeamVote>;
  lastTeamVote: LastTeamVote | null;
  missionActive: boolean;
  missionTeam: string[];
  hasActed: boolean;
  winner: Winner | null;
  assassinTarget: string | null;
  /** Which role performs the assassination; never who holds it. */
  assassinRole: Role | null;
  ladyOfTheLake: {
    enabled: boolean;
    active: boolean;
    holder: string | null;
    history: string[];
    result: LadyInspection | null;
    inspector: string | null;
  };
  lancelot: {
    enabled: boolean;
    swapped: boolean;
    revealed: (boolean | null)[];
  };
  excalibur: {
    enabled: boolean;
    holder: string | null;
    phase: ExcaliburPhase;
    result: ExcaliburFlip | null;
  };
}

export type SessionView = EmptySessionView | LiveSessionView;

export const EMPTY_SESSION_VIEW: EmptySessionView = {
  phase: "EMPTY",
  currentCount: 0,
  targetCount: 0,
  players: [],
  requiredTeamSize: 2
};

/**
 * Builds a per-viewer view by redacting hidden information.
 * The viewer need not be seated; an unknown name simply sees the public fields.
 */
export function buildSessionView(session: Session, viewerName: string): SessionView {
  if (session.phase === "EMPTY") {
    return EMPTY_SESSION_VIEW;
  }

  const viewer = getPlayer(session.players, viewerName);
  const seatedViewer = session.rolesAssigned ? viewer : null;
  const ended = session.phase === "ENDED";
  const showVision = session.phase === "ACTIVE" || session.phase === "ASSASSIN_PENDING";
  const lady = session.ladyOfTheLake;
  const isInspector = lady.inspector !== null && lady.inspector === viewerName;
  const isSwordHolder = session.excalibur.holder !== null && session.excalibur.holder === viewerName;

  return {
    phase: session.phase,
    step: session.phase === "ACTIVE" ? session.step : null,
    currentCount: session.players.length,
    targetCount: session.options.seatTarget,
    players: session.players.map(p => p.name),
    missions: session.missions,
    consecutiveRejections: session.consecutiveRejections,
    yourRole: seatedViewer?.role ?? null,
    yourAlignment:
      seatedViewer && isLancelot(seatedViewer.role)
        ? currentAlignment(seatedViewer, session.lancelot.swapped)
        : null,
    vision: seatedViewer && showVision ? computeVision(seatedViewer, session.players) : [],
    revealedPlayers: ended && session.rolesAssigned ? session.players.map(p => ({ name: p.name, role: p.role })) : [],
    history: ended ? session.history : [],
    captain: session.rolesAssigned ? captainName(session) : null,
    proposer: session.proposer,
    requiredTeamSize: currentTeamSize(session),
    teamVoteActive: session.phase === "ACTIVE" && session.step === "TEAM_VOTE",
    teamVotes: session.teamVotes,
    lastTeamVote: session.lastTeamVote,
    missionActive: session.phase === "ACTIVE" && session.step === "MISSION",
    missionTeam: session.currentTeam,
    hasActed: session.missionBallots.some(ballot => ballot.voter === viewerName),
    winner: session.winner,
    assassinTarget: session.assassinTarget,
    assassinRole: session.rolesAssigned ? getAssassinRole(session.players) : null,
    ladyOfTheLake: {
      enabled: lady.enabled,
      active: session.phase === "ACTIVE" && session.step === "LADY_OF_THE_LAKE",
      holder: lady.holder,
      history: lady.history,
      result: isInspector ? lady.result : null,
      inspector: isInspector ? lady.inspector : null
    },
    lancelot: {
      enabled: session.lancelot.enabled,
      swapped: session.lancelot.swapped,
      revealed: session.lancelot.revealed
    },
    excalibur: {
      enabled: session.excalibur.enabled,
      holder: session.excalibur.holder,
      phase: session.excalibur.phase,
      result: isSwordHolder ? session.excalibur.result : null
    }
  };
}

/** Public lobby summary shown on the join screen. */
export interface LobbyView {
  phase: Phase;
  currentCount: number;
  targetCount: number;
  players: string[];
  previousPlayers: string[];
  lancelotEnabled: boolean;
  excaliburEnabled: boolean;
  ladyOfTheLakeEnabled: boolean;
}

export function buildLobbyView(session: Session): LobbyView {
  return {
    phase: session.phase,
    currentCount: session.players.length,
    targetCount: session.phase === "EMPTY" ? 0 : session.options.seatTarget,
    players: session.players.map(p => p.name),
    previousPlayers: session.previousPlayers,
    lancelotEnabled: session.lancelot.enabled,
    excaliburEnabled: session.excalibur.enabled,
    ladyOfTheLakeEnabled: session.ladyOfTheLake.enabled
  };
}

/**
 * Messages emitted by the server. SESSION_STATE always carries the receiving
 * socket's own redacted view.
 */
export type ServerMessage =
  | { type: "ERROR"; payload: { code: string; message: string } }
  | { type: "SUBSCRIBED"; payload: { playerName: string } }
  | { type: "SESSION_STATE"; payload: { session: SessionView } };
