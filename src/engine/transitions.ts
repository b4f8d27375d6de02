import { currentAlignment, isCurrentlyEvil, isLancelot } from "./alignment";
import { failsRequired, MISSIONS_PER_GAME, missionSizesFor, requiredTeamSize, rolePresetFor } from "./presets";
import {
  ActiveStep,
  GameRuleError,
  MissionBallot,
  MissionVote,
  Phase,
  Player,
  Session,
  SessionOptions,
  TeamVote
} from "./types";
import { RandomFn, countChoice, defaultRandom, getPlayer, randomIndex, shuffle, wrapIndex } from "./utils";
import { applyGameEnd, checkGameEnd } from "./win";

/** Partial overrides to tweak defaults when creating a session. */
export type SessionOptionsOverrides = Partial<SessionOptions>;

/** Default table: six seats, Lady of the Lake on, the other modifiers off. */
export const DEFAULT_SESSION_OPTIONS: SessionOptions = {
  seatTarget: 6,
  lancelotEnabled: false,
  excaliburEnabled: false,
  ladyOfTheLakeEnabled: true
};

/** Modifiers only come into play from this many seats. */
export const LARGE_TABLE_SEATS = 8;

/** Completed-mission counts after which the Lady of the Lake is used. */
const LADY_ROUNDS: readonly number[] = [2, 3, 4];

const SWAP_CARDS: readonly boolean[] = [true, true, false, false, false];

/** Merges supplied overrides with the default options. */
export function mergeOptions(overrides?: SessionOptionsOverrides): SessionOptions {
  return { ...DEFAULT_SESSION_OPTIONS, ...overrides };
}

/**
 * Ensures the state machine is in one of the allowed phases before continuing.
 * Throws a GameRuleError if the guard fails.
 */
export function ensurePhase(session: Session, expected: Phase | Phase[], message: string): void {
  const allowed = Array.isArray(expected) ? expected : [expected];
  if (!allowed.includes(session.phase)) {
    throw new GameRuleError("WRONG_PHASE", message);
  }
}

/** Same as ensurePhase for the sub-steps of an ACTIVE session. */
export function ensureStep(session: Session, expected: ActiveStep | ActiveStep[], message: string): void {
  const allowed = Array.isArray(expected) ? expected : [expected];
  if (session.phase !== "ACTIVE" || !allowed.includes(session.step)) {
    throw new GameRuleError("WRONG_PHASE", message);
  }
}

/** Looks up a seat by name, throwing UNKNOWN_PLAYER when nobody sits there. */
export function assertPlayer(session: Session, name: string): Player {
  const player = getPlayer(session.players, name);
  if (!player) {
    throw new GameRuleError("UNKNOWN_PLAYER", `Player ${name} not found`);
  }
  return player;
}

export function captainName(session: Session): string | null {
  return session.players[session.captainIndex]?.name ?? null;
}

/** Passes the captaincy to the next seat. */
export function advanceCaptain(session: Session): Session {
  if (session.players.length === 0) return session;
  return { ...session, captainIndex: (session.captainIndex + 1) % session.players.length };
}

/** The session before anyone has created a game. */
export function createEmptySession(previousPlayers: string[] = []): Session {
  const options = mergeOptions();
  return {
    phase: "EMPTY",
    step: "PROPOSAL",
    options,
    players: [],
    rolesAssigned: false,
    captainIndex: 0,
    currentTeam: [],
    proposer: null,
    teamVotes: {},
    lastTeamVote: null,
    missionBallots: [],
    consecutiveRejections: 0,
    missions: [],
    history: [],
    lancelot: { enabled: false, swapCards: [], revealed: [], swapped: false },
    ladyOfTheLake: { enabled: false, holder: null, initialHolder: null, history: [], result: null, inspector: null },
    excalibur: { enabled: false, holder: null, phase: "NONE", result: null },
    winner: null,
    assassinTarget: null,
    previousPlayers
  };
}

/** Opens a fresh lobby. Modifier flags record the request; they are settled when roles are dealt. */
export function createSession(overrides?: SessionOptionsOverrides, previousPlayers: string[] = []): Session {
  const options = mergeOptions(overrides);
  if (!Number.isInteger(options.seatTarget) || options.seatTarget < 1) {
    throw new GameRuleError("INVALID_SEAT_TARGET", "Seat count must be a positive integer");
  }
  const largestTeam = Math.max(...missionSizesFor(options.seatTarget));
  if (options.seatTarget < largestTeam) {
    throw new GameRuleError("INVALID_SEAT_TARGET", `A table needs at least ${largestTeam} seats to fill every mission`);
  }
  const empty = createEmptySession(previousPlayers);
  return {
    ...empty,
    phase: "JOINING",
    options,
    lancelot: { ...empty.lancelot, enabled: options.lancelotEnabled },
    ladyOfTheLake: { ...empty.ladyOfTheLake, enabled: options.ladyOfTheLakeEnabled },
    excalibur: { ...empty.excalibur, enabled: options.excaliburEnabled }
  };
}

function rosterNames(session: Session): string[] {
  return session.players.length > 0 ? session.players.map(p => p.name) : session.previousPlayers;
}

/** Discards the current session and opens a new lobby, remembering who was seated. */
export function resetSession(current: Session, overrides?: SessionOptionsOverrides): Session {
  return createSession(overrides, rosterNames(current));
}

/** Discards the current session without opening a lobby. */
export function clearSession(current: Session): Session {
  return createEmptySession(rosterNames(current));
}

/** Host override that stops the game without declaring a winner. */
export function forceEnd(session: Session): Session {
  ensurePhase(session, ["JOINING", "ACTIVE", "ASSASSIN_PENDING"], "There is no game to end");
  return { ...session, phase: "ENDED" };
}

/**
 * Deals the preset for the table in shuffled order, one role per seat.
 * Lancelot is on exactly when a Lancelot was dealt, whatever was requested.
 */
export function assignRoles(session: Session, random: RandomFn = defaultRandom): Session {
  if (session.players.length !== session.options.seatTarget) {
    throw new GameRuleError("WRONG_PHASE", "Roles are dealt once every seat is filled");
  }
  if (session.rolesAssigned) return session;

  const roles = shuffle(rolePresetFor(session.options.seatTarget, session.options.lancelotEnabled), random);
  const players = session.players.map((player, index) => ({
    ...player,
    role: index < roles.length ? roles[index] : ("LOYAL_SERVANT" as const)
  }));
  const hasLancelot = players.some(p => isLancelot(p.role));

  return {
    ...session,
    players,
    rolesAssigned: true,
    lancelot: { ...session.lancelot, enabled: hasLancelot }
  };
}

function setupLancelot(session: Session, random: RandomFn): Session {
  if (!session.lancelot.enabled) return session;
  return {
    ...session,
    lancelot: {
      enabled: true,
      swapCards: shuffle(SWAP_CARDS, random),
      revealed: Array.from({ length: MISSIONS_PER_GAME }, () => null),
      swapped: false
    }
  };
}

/** The first holder sits just before the first captain and can never be inspected. */
function setupLadyOfTheLake(session: Session): Session {
  const enabled = session.options.ladyOfTheLakeEnabled && session.options.seatTarget >= LARGE_TABLE_SEATS;
  if (!enabled) {
    return { ...session, ladyOfTheLake: { ...session.ladyOfTheLake, enabled: false } };
  }
  const holder = session.players[wrapIndex(session.captainIndex - 1, session.players.length)].name;
  return {
    ...session,
    ladyOfTheLake: { ...session.ladyOfTheLake, enabled: true, holder, initialHolder: holder, history: [holder] }
  };
}

function setupExcalibur(session: Session): Session {
  const enabled = session.options.excaliburEnabled && session.options.seatTarget >= LARGE_TABLE_SEATS;
  return { ...session, excalibur: { enabled, holder: null, phase: "NONE", result: null } };
}

/** Runs the moment the last seat fills: deal, pick a captain, prepare modifiers. */
function startSession(session: Session, random: RandomFn): Session {
  const dealt = assignRoles(session, random);
  const withCaptain: Session = { ...dealt, captainIndex: randomIndex(dealt.players.length, random) };
  const withModifiers = setupLancelot(setupExcalibur(setupLadyOfTheLake(withCaptain)), random);
  return { ...withModifiers, phase: "ACTIVE", step: "PROPOSAL" };
}

/**
 * Seats a player. Re-joining with a seated name is a no-op in any phase so phones
 * can reconnect; filling the last seat starts the game.
 */
export function joinSession(session: Session, rawName: string, random: RandomFn = defaultRandom): Session {
  const name = rawName.trim();
  if (name.length === 0) {
    throw new GameRuleError("INVALID_NAME", "Player name must not be empty");
  }
  if (getPlayer(session.players, name)) return session;

  ensurePhase(session, "JOINING", "The game has already started or has not been created");
  if (session.players.length >= session.options.seatTarget) {
    throw new GameRuleError("ROOM_FULL", "The room is full");
  }

  const joined: Session = { ...session, players: [...session.players, { name, role: "LOYAL_SERVANT" }] };
  if (joined.players.length < joined.options.seatTarget) return joined;
  return startSession(joined, random);
}

/** Team size the current captain has to propose. */
export function currentTeamSize(session: Session): number {
  return requiredTeamSize(session.options.seatTarget, session.missions.length);
}

/**
 * Puts a team to the vote. A new proposal made while one is being voted on
 * replaces it and discards its votes.
 */
export function proposeTeam(session: Session, team: string[], proposerName?: string | null): Session {
  ensureStep(session, ["PROPOSAL", "TEAM_VOTE"], "A team can only be proposed before the mission starts");

  const required = currentTeamSize(session);
  if (team.length !== required) {
    throw new GameRuleError("INVALID_TEAM_SIZE", `This mission needs ${required} players`);
  }
  for (const name of team) {
    assertPlayer(session, name);
  }
  if (new Set(team).size !== team.length) {
    throw new GameRuleError("INVALID_TARGET", "A player can only be on the team once");
  }

  const proposer = proposerName ? assertPlayer(session, proposerName).name : captainName(session);
  return {
    ...session,
    step: "TEAM_VOTE",
    currentTeam: [...team],
    proposer,
    teamVotes: {}
  };
}

export function isTeamVoteOpen(session: Session): boolean {
  return session.phase === "ACTIVE" && session.step === "TEAM_VOTE";
}

function approveTeam(session: Session, votes: Record<string, TeamVote>): Session {
  const approved: Session = {
    ...session,
    teamVotes: {},
    lastTeamVote: { result: "APPROVED", votes, proposalIndex: session.consecutiveRejections + 1 },
    consecutiveRejections: 0,
    missionBallots: []
  };
  if (session.excalibur.enabled) {
    return {
      ...approved,
      step: "EXCALIBUR_ASSIGN",
      excalibur: { ...session.excalibur, holder: null, phase: "ASSIGN", result: null }
    };
  }
  return { ...approved, step: "MISSION" };
}

function rejectTeam(session: Session, votes: Record<string, TeamVote>): Session {
  const rejected: Session = {
    ...session,
    step: "PROPOSAL",
    history: [
      ...session.history,
      {
        roundNumber: session.missions.length + 1,
        proposalIndex: session.consecutiveRejections + 1,
        proposedTeam: [...session.currentTeam],
        proposerName: session.proposer,
        captainName: captainName(session),
        teamVotes: votes,
        missionVotes: {},
        outcome: "REJECTED"
      }
    ],
    currentTeam: [],
    teamVotes: {},
    lastTeamVote: { result: "REJECTED", votes, proposalIndex: session.consecutiveRejections + 1 },
    consecutiveRejections: session.consecutiveRejections + 1
  };
  return applyGameEnd(advanceCaptain(rejected));
}

/**
 * Records a team vote; a second vote from the same seat replaces the first.
 * Outside the voting step the call is ignored. Once every seat has voted the
 * proposal passes only on a strict majority of approvals.
 */
export function recordTeamVote(session: Session, voterName: string, vote: TeamVote): Session {
  if (!isTeamVoteOpen(session)) return session;
  const voter = assertPlayer(session, voterName);
  if (vote !== "APPROVE" && vote !== "REJECT") {
    throw new GameRuleError("INVALID_CHOICE", "Vote must be APPROVE or REJECT");
  }

  const votes = { ...session.teamVotes, [voter.name]: vote };
  if (Object.keys(votes).length < session.players.length) {
    return { ...session, teamVotes: votes };
  }

  const approvals = countChoice(votes, "APPROVE");
  const rejections = countChoice(votes, "REJECT");
  return approvals > rejections ? approveTeam(session, votes) : rejectTeam(session, votes);
}

/**
 * Host override that counts one more rejected proposal, for votes taken at the
 * table instead of on phones. Five in a row still hands evil the game.
 */
export function recordVoteFail(session: Session): Session {
  ensurePhase(session, "ACTIVE", "Rejections can only be counted during a game");
  return applyGameEnd({ ...session, consecutiveRejections: session.consecutiveRejections + 1 });
}

export function isMissionVoteOpen(session: Session): boolean {
  return session.phase === "ACTIVE" && session.step === "MISSION";
}

/** Good seats always play success; a Lancelot on the evil side always plays fail. */
export function coerceMissionVote(player: Player, lancelotSwapped: boolean, submitted: MissionVote): MissionVote {
  if (!isCurrentlyEvil(player, lancelotSwapped)) return "SUCCESS";
  if (isLancelot(player.role)) return "FAIL";
  return submitted;
}

/**
 * Records a mission ballot. Only the first ballot per seat counts and calls
 * outside the mission step are ignored. The last ballot either hands the
 * decision to the Excalibur holder or resolves the mission.
 */
export function recordMissionVote(session: Session, voterName: string, vote: MissionVote): Session {
  if (!isMissionVoteOpen(session)) return session;
  const voter = assertPlayer(session, voterName);
  if (!session.currentTeam.includes(voter.name)) {
    throw new GameRuleError("INVALID_TARGET", "Only team members vote on the mission");
  }
  if (vote !== "SUCCESS" && vote !== "FAIL") {
    throw new GameRuleError("INVALID_CHOICE", "Mission vote must be SUCCESS or FAIL");
  }
  if (session.missionBallots.some(ballot => ballot.voter === voter.name)) return session;

  const ballot: MissionBallot = {
    voter: voter.name,
    vote: coerceMissionVote(voter, session.lancelot.swapped, vote)
  };
  const updated: Session = { ...session, missionBallots: [...session.missionBallots, ballot] };
  if (updated.missionBallots.length < updated.currentTeam.length) return updated;

  if (updated.excalibur.phase === "MISSION") {
    return {
      ...updated,
      step: "EXCALIBUR_DECIDE",
      excalibur: { ...updated.excalibur, phase: "DECIDE" }
    };
  }
  return resolveMission(updated);
}

/** The proposer hands the sword to another member of the approved team. */
export function assignExcalibur(session: Session, targetName: string): Session {
  if (session.phase !== "ACTIVE" || session.excalibur.phase !== "ASSIGN") {
    throw new GameRuleError("WRONG_PHASE", "Excalibur is not being assigned right now");
  }
  const proposer = session.proposer ?? captainName(session);
  if (targetName === proposer) {
    throw new GameRuleError("INVALID_TARGET", "The proposer cannot keep Excalibur");
  }
  if (!session.currentTeam.includes(targetName)) {
    throw new GameRuleError("INVALID_TARGET", "Excalibur must go to a member of this team");
  }
  return {
    ...session,
    step: "MISSION",
    missionBallots: [],
    excalibur: { ...session.excalibur, holder: targetName, phase: "MISSION" }
  };
}

/**
 * The sword holder may flip one recorded ballot, or pass with `null`.
 * Either way the mission resolves immediately.
 */
export function useExcalibur(session: Session, targetName: string | null): Session {
  if (session.phase !== "ACTIVE" || session.excalibur.phase !== "DECIDE") {
    throw new GameRuleError("WRONG_PHASE", "Excalibur cannot be used right now");
  }

  if (!targetName) {
    return resolveMission({ ...session, excalibur: { ...session.excalibur, phase: "DONE", result: null } });
  }

  const index = session.missionBallots.findIndex(ballot => ballot.voter === targetName);
  if (index === -1) {
    throw new GameRuleError("INVALID_TARGET", "Excalibur can only flip a ballot from this mission");
  }
  const originalVote = session.missionBallots[index].vote;
  const flipped: MissionVote = originalVote === "SUCCESS" ? "FAIL" : "SUCCESS";
  const missionBallots = session.missionBallots.map((ballot, i) =>
    i === index ? { ...ballot, vote: flipped } : ballot
  );

  return resolveMission({
    ...session,
    missionBallots,
    excalibur: { ...session.excalibur, phase: "DONE", result: { target: targetName, originalVote } }
  });
}

function revealSwapCard(session: Session, roundIndex: number): Session {
  if (!session.lancelot.enabled || roundIndex >= MISSIONS_PER_GAME) return session;
  const card = session.lancelot.swapCards[roundIndex] ?? false;
  const revealed = session.lancelot.revealed.map((value, i) => (i === roundIndex ? card : value));
  return {
    ...session,
    lancelot: {
      ...session.lancelot,
      revealed,
      swapped: card ? !session.lancelot.swapped : session.lancelot.swapped
    }
  };
}

/**
 * Scores the mission from the recorded ballots, reveals the Lancelot card for
 * the round, then ends the game, opens the Lady of the Lake or moves on to the
 * next captain.
 */
export function resolveMission(session: Session): Session {
  ensureStep(session, ["MISSION", "EXCALIBUR_DECIDE"], "There is no mission to resolve");

  const roundIndex = session.missions.length;
  const failCount = session.missionBallots.filter(ballot => ballot.vote === "FAIL").length;
  const result = failCount >= failsRequired(session.options.seatTarget, roundIndex) ? "FAIL" : "SUCCESS";
  const missionVotes: Record<string, MissionVote> = {};
  for (const ballot of session.missionBallots) {
    missionVotes[ballot.voter] = ballot.vote;
  }

  const recorded: Session = {
    ...session,
    history: [
      ...session.history,
      {
        roundNumber: roundIndex + 1,
        proposalIndex: session.lastTeamVote?.proposalIndex ?? 1,
        proposedTeam: [...session.currentTeam],
        proposerName: session.proposer,
        captainName: captainName(session),
        teamVotes: { ...(session.lastTeamVote?.votes ?? {}) },
        missionVotes,
        outcome: result
      }
    ],
    missions: [
      ...session.missions,
      { roundNumber: roundIndex + 1, team: [...session.currentTeam], failCount, result }
    ],
    currentTeam: [],
    missionBallots: [],
    step: "PROPOSAL",
    excalibur: { ...session.excalibur, phase: "NONE" }
  };

  const revealed = revealSwapCard(recorded, roundIndex);
  const end = checkGameEnd(revealed);
  if (end) {
    return applyGameEnd(revealed);
  }

  if (revealed.ladyOfTheLake.enabled && LADY_ROUNDS.includes(revealed.missions.length)) {
    return {
      ...revealed,
      step: "LADY_OF_THE_LAKE",
      ladyOfTheLake: { ...revealed.ladyOfTheLake, result: null, inspector: null }
    };
  }
  return applyGameEnd(advanceCaptain(revealed));
}

/**
 * The current holder learns the target's effective alignment; the token passes
 * to the target, who can never be inspected afterwards.
 */
export function inspectWithLady(session: Session, targetName: string): Session {
  ensureStep(session, "LADY_OF_THE_LAKE", "The Lady of the Lake is not in play right now");
  if (session.ladyOfTheLake.history.includes(targetName)) {
    throw new GameRuleError("INVALID_TARGET", "That player has already held the Lady of the Lake");
  }
  const target = assertPlayer(session, targetName);
  const alignment = currentAlignment(target, session.lancelot.swapped);

  const inspected: Session = {
    ...session,
    step: "PROPOSAL",
    ladyOfTheLake: {
      ...session.ladyOfTheLake,
      inspector: session.ladyOfTheLake.holder,
      result: { target: target.name, alignment },
      history: [...session.ladyOfTheLake.history, target.name],
      holder: target.name
    }
  };
  return applyGameEnd(advanceCaptain(inspected));
}

/** Evil wins by naming the original Merlin; any other seat hands the win to good. */
export function assassinate(session: Session, targetName: string): Session {
  ensurePhase(session, "ASSASSIN_PENDING", "It is not time for the assassination");
  const target = assertPlayer(session, targetName);
  return {
    ...session,
    phase: "ENDED",
    assassinTarget: target.name,
    winner: target.role === "MERLIN" ? "EVIL" : "GOOD"
  };
}
