import { describe, expect, it } from "vitest";
import {
  assassinate,
  assignExcalibur,
  assignRoles,
  clearSession,
  coerceMissionVote,
  createEmptySession,
  createSession,
  forceEnd,
  inspectWithLady,
  joinSession,
  proposeTeam,
  recordMissionVote,
  recordTeamVote,
  recordVoteFail,
  resetSession,
  useExcalibur
} from "../../src/engine/transitions";
import { SUPPORTED_SEAT_COUNTS, rolePresetFor } from "../../src/engine/presets";
import { Session } from "../../src/engine/types";
import { RandomFn } from "../../src/engine/utils";
import {
  EIGHT_SEATS,
  FIVE_SEATS,
  SEVEN_SEATS,
  Seat,
  activeSession,
  approveTeam,
  castMission,
  everyoneVotes,
  joinAll,
  keepOrder,
  mission,
  playMission,
  ruleCode
} from "../support/sessions";

const names = (count: number) => Array.from({ length: count }, (_, i) => `p${i + 1}`);

const SIX_SEATS: Seat[] = [
  ["merlin", "MERLIN"],
  ["percival", "PERCIVAL"],
  ["servant1", "LOYAL_SERVANT"],
  ["servant2", "LOYAL_SERVANT"],
  ["morgana", "MORGANA"],
  ["assassin", "ASSASSIN"]
];

/** Park-Miller generator so shuffles are mixed but repeatable. */
function seeded(seed: number): RandomFn {
  let state = seed;
  return () => {
    state = (state * 16807) % 2147483647;
    return (state - 1) / 2147483646;
  };
}

function roleOf(session: Session, name: string) {
  return session.players.find(p => p.name === name)?.role;
}

describe("lobby", () => {
  it("opens a six-seat lobby with the Lady requested by default", () => {
    const session = createSession();
    expect(session.phase).toBe("JOINING");
    expect(session.options).toEqual({
      seatTarget: 6,
      lancelotEnabled: false,
      excaliburEnabled: false,
      ladyOfTheLakeEnabled: true
    });
    expect(session.players).toEqual([]);
  });

  it("rejects a seat count that is not a positive integer", () => {
    expect(ruleCode(() => createSession({ seatTarget: 0 }))).toBe("INVALID_SEAT_TARGET");
    expect(ruleCode(() => createSession({ seatTarget: 2.5 }))).toBe("INVALID_SEAT_TARGET");
  });

  it("rejects tables too small to field the largest mission team", () => {
    expect(ruleCode(() => createSession({ seatTarget: 1 }))).toBe("INVALID_SEAT_TARGET");
    expect(ruleCode(() => createSession({ seatTarget: 3 }))).toBe("INVALID_SEAT_TARGET");
    expect(createSession({ seatTarget: 4 }).phase).toBe("JOINING");
    expect(createSession({ seatTarget: 11 }).phase).toBe("JOINING");
  });

  it("seats players in join order with trimmed names", () => {
    const session = joinAll(createSession({ seatTarget: 5 }), ["  ana ", "bo"]);
    expect(session.players.map(p => p.name)).toEqual(["ana", "bo"]);
    expect(session.phase).toBe("JOINING");
    expect(session.rolesAssigned).toBe(false);
  });

  it("treats joining with a seated name as a no-op", () => {
    const session = joinAll(createSession({ seatTarget: 5 }), ["ana"]);
    expect(joinSession(session, "ana")).toBe(session);
    expect(joinSession(session, " ana ")).toBe(session);
  });

  it("rejects blank names", () => {
    expect(ruleCode(() => joinSession(createSession(), "   "))).toBe("INVALID_NAME");
  });

  it("refuses joins before a game exists", () => {
    expect(ruleCode(() => joinSession(createEmptySession(), "ana"))).toBe("WRONG_PHASE");
  });

  it("refuses a new name when every seat is taken", () => {
    const full: Session = {
      ...createSession({ seatTarget: 5 }),
      players: names(5).map(name => ({ name, role: "LOYAL_SERVANT" as const }))
    };
    expect(ruleCode(() => joinSession(full, "cy"))).toBe("ROOM_FULL");
  });

  it("refuses new names once the game is running but lets seated players rejoin", () => {
    const started = joinAll(createSession({ seatTarget: 5 }), names(5));
    expect(ruleCode(() => joinSession(started, "late"))).toBe("WRONG_PHASE");
    expect(joinSession(started, "p3")).toBe(started);
  });
});

describe("game start", () => {
  it("deals roles and picks a captain when the last seat fills", () => {
    const session = joinAll(createSession({ seatTarget: 5 }), names(5));
    expect(session.phase).toBe("ACTIVE");
    expect(session.step).toBe("PROPOSAL");
    expect(session.rolesAssigned).toBe(true);
    expect(session.players.map(p => p.role)).toEqual(["MERLIN", "PERCIVAL", "LOYAL_SERVANT", "MORGANA", "ASSASSIN"]);
    expect(session.captainIndex).toBe(4);
  });

  it("deals exactly the preset for every supported table", () => {
    for (const seatTarget of SUPPORTED_SEAT_COUNTS) {
      const session = joinAll(createSession({ seatTarget }), names(seatTarget), seeded(seatTarget));
      expect(session.players).toHaveLength(seatTarget);
      expect(session.players.map(p => p.role).sort()).toEqual(rolePresetFor(seatTarget, false).sort());
    }
  });

  it("only brings in the Lady of the Lake at eight or more seats", () => {
    const small = joinAll(createSession({ seatTarget: 5, ladyOfTheLakeEnabled: true }), names(5));
    expect(small.ladyOfTheLake.enabled).toBe(false);
    expect(small.ladyOfTheLake.holder).toBeNull();

    const large = joinAll(createSession({ seatTarget: 8, ladyOfTheLakeEnabled: true }), names(8));
    expect(large.captainIndex).toBe(7);
    expect(large.ladyOfTheLake).toEqual({
      enabled: true,
      holder: "p7",
      initialHolder: "p7",
      history: ["p7"],
      result: null,
      inspector: null
    });
  });

  it("only brings in Excalibur at eight or more seats", () => {
    const small = joinAll(createSession({ seatTarget: 5, excaliburEnabled: true }), names(5));
    expect(small.excalibur.enabled).toBe(false);

    const large = joinAll(createSession({ seatTarget: 8, excaliburEnabled: true }), names(8));
    expect(large.excalibur).toEqual({ enabled: true, holder: null, phase: "NONE", result: null });
  });

  it("deals the Lancelot preset at ten seats and prepares the swap cards", () => {
    const session = joinAll(
      createSession({ seatTarget: 10, lancelotEnabled: true, ladyOfTheLakeEnabled: false }),
      names(10)
    );
    expect(roleOf(session, "p6")).toBe("LANCELOT_GOOD");
    expect(roleOf(session, "p10")).toBe("LANCELOT_EVIL");
    expect(session.lancelot).toEqual({
      enabled: true,
      swapCards: [true, true, false, false, false],
      revealed: [null, null, null, null, null],
      swapped: false
    });
  });

  it("turns Lancelot on when the preset deals one even if it was not requested", () => {
    const session = joinAll(createSession({ seatTarget: 12 }), names(12));
    expect(session.lancelot.enabled).toBe(true);
    expect(session.lancelot.swapCards).toHaveLength(5);
  });

  it("turns Lancelot off when the table has no Lancelot preset", () => {
    const session = joinAll(createSession({ seatTarget: 8, lancelotEnabled: true }), names(8));
    expect(session.players.some(p => p.role === "LANCELOT_GOOD" || p.role === "LANCELOT_EVIL")).toBe(false);
    expect(session.lancelot.enabled).toBe(false);
  });

  it("pads unsupported tables with loyal servants on top of the six-seat preset", () => {
    const session = joinAll(createSession({ seatTarget: 11 }), names(11));
    expect(session.players.map(p => p.role)).toEqual([
      "MERLIN",
      "PERCIVAL",
      "LOYAL_SERVANT",
      "LOYAL_SERVANT",
      "MORGANA",
      "ASSASSIN",
      "LOYAL_SERVANT",
      "LOYAL_SERVANT",
      "LOYAL_SERVANT",
      "LOYAL_SERVANT",
      "LOYAL_SERVANT"
    ]);
  });

  it("refuses to deal before every seat is filled", () => {
    const partial = joinAll(createSession({ seatTarget: 5 }), ["ana"]);
    expect(ruleCode(() => assignRoles(partial, keepOrder))).toBe("WRONG_PHASE");
  });
});

describe("reset, clear and force end", () => {
  it("remembers the seated names across a reset", () => {
    const running = joinAll(createSession({ seatTarget: 5 }), names(5));
    const reset = resetSession(running, { seatTarget: 7 });
    expect(reset.phase).toBe("JOINING");
    expect(reset.options.seatTarget).toBe(7);
    expect(reset.players).toEqual([]);
    expect(reset.previousPlayers).toEqual(names(5));
  });

  it("carries the remembered names forward when nobody has joined since", () => {
    const reset = resetSession(createSession({}, ["ana", "bo"]));
    expect(reset.previousPlayers).toEqual(["ana", "bo"]);
  });

  it("clears back to an empty session", () => {
    const cleared = clearSession(joinAll(createSession({ seatTarget: 5 }), ["ana"]));
    expect(cleared.phase).toBe("EMPTY");
    expect(cleared.previousPlayers).toEqual(["ana"]);
  });

  it("ends a running game without a winner", () => {
    const ended = forceEnd(activeSession(FIVE_SEATS));
    expect(ended.phase).toBe("ENDED");
    expect(ended.winner).toBeNull();
    expect(ruleCode(() => forceEnd(ended))).toBe("WRONG_PHASE");
    expect(ruleCode(() => forceEnd(createEmptySession()))).toBe("WRONG_PHASE");
  });
});

describe("proposeTeam", () => {
  it("requires the team size for the current round", () => {
    const session = activeSession(FIVE_SEATS);
    expect(ruleCode(() => proposeTeam(session, ["merlin"]))).toBe("INVALID_TEAM_SIZE");
    expect(ruleCode(() => proposeTeam(session, ["merlin", "percival", "servant"]))).toBe("INVALID_TEAM_SIZE");
  });

  it("rejects unknown and repeated names", () => {
    const session = activeSession(FIVE_SEATS);
    expect(ruleCode(() => proposeTeam(session, ["merlin", "ghost"]))).toBe("UNKNOWN_PLAYER");
    expect(ruleCode(() => proposeTeam(session, ["merlin", "merlin"]))).toBe("INVALID_TARGET");
    expect(ruleCode(() => proposeTeam(session, ["merlin", "percival"], "ghost"))).toBe("UNKNOWN_PLAYER");
  });

  it("opens the team vote with the captain as proposer by default", () => {
    const session = proposeTeam(activeSession(FIVE_SEATS), ["merlin", "percival"]);
    expect(session.step).toBe("TEAM_VOTE");
    expect(session.currentTeam).toEqual(["merlin", "percival"]);
    expect(session.proposer).toBe("merlin");
    expect(proposeTeam(activeSession(FIVE_SEATS), ["merlin", "percival"], "morgana").proposer).toBe("morgana");
  });

  it("replaces a proposal that is still being voted on", () => {
    const voting = recordTeamVote(proposeTeam(activeSession(FIVE_SEATS), ["merlin", "percival"]), "merlin", "APPROVE");
    const replaced = proposeTeam(voting, ["servant", "morgana"]);
    expect(replaced.currentTeam).toEqual(["servant", "morgana"]);
    expect(replaced.teamVotes).toEqual({});
  });

  it("is refused once the mission is under way", () => {
    const onMission = approveTeam(activeSession(FIVE_SEATS), ["merlin", "percival"]);
    expect(ruleCode(() => proposeTeam(onMission, ["merlin", "percival"]))).toBe("WRONG_PHASE");
  });
});

describe("recordTeamVote", () => {
  it("is ignored outside the voting step", () => {
    const session = activeSession(FIVE_SEATS);
    expect(recordTeamVote(session, "merlin", "APPROVE")).toBe(session);
  });

  it("lets a seat change its vote before the tally", () => {
    const proposed = proposeTeam(activeSession(FIVE_SEATS), ["merlin", "percival"]);
    const changed = recordTeamVote(recordTeamVote(proposed, "merlin", "APPROVE"), "merlin", "REJECT");
    expect(changed.teamVotes).toEqual({ merlin: "REJECT" });
  });

  it("rejects votes from names that are not seated", () => {
    const proposed = proposeTeam(activeSession(FIVE_SEATS), ["merlin", "percival"]);
    expect(ruleCode(() => recordTeamVote(proposed, "ghost", "APPROVE"))).toBe("UNKNOWN_PLAYER");
  });

  it("sends an approved team on the mission and clears the rejection streak", () => {
    const session = approveTeam(activeSession(FIVE_SEATS, {}, { consecutiveRejections: 3 }), ["merlin", "percival"]);
    expect(session.step).toBe("MISSION");
    expect(session.consecutiveRejections).toBe(0);
    expect(session.currentTeam).toEqual(["merlin", "percival"]);
    expect(session.teamVotes).toEqual({});
    expect(session.lastTeamVote?.result).toBe("APPROVED");
  });

  it("treats a tie as a rejection and passes the captaincy", () => {
    const proposed = proposeTeam(activeSession(SIX_SEATS), ["merlin", "percival"]);
    const tallied = [
      ["merlin", "APPROVE"],
      ["percival", "APPROVE"],
      ["servant1", "APPROVE"],
      ["servant2", "REJECT"],
      ["morgana", "REJECT"],
      ["assassin", "REJECT"]
    ].reduce<Session>(
      (current, [name, vote]) => recordTeamVote(current, name, vote === "APPROVE" ? "APPROVE" : "REJECT"),
      proposed
    );

    expect(tallied.step).toBe("PROPOSAL");
    expect(tallied.captainIndex).toBe(1);
    expect(tallied.consecutiveRejections).toBe(1);
    expect(tallied.currentTeam).toEqual([]);
    expect(tallied.lastTeamVote?.result).toBe("REJECTED");
    expect(tallied.history).toEqual([
      {
        roundNumber: 1,
        proposalIndex: 1,
        proposedTeam: ["merlin", "percival"],
        proposerName: "merlin",
        captainName: "merlin",
        teamVotes: {
          merlin: "APPROVE",
          percival: "APPROVE",
          servant1: "APPROVE",
          servant2: "REJECT",
          morgana: "REJECT",
          assassin: "REJECT"
        },
        missionVotes: {},
        outcome: "REJECTED"
      }
    ]);
  });

  it("hands evil the game after five rejected proposals in a row", () => {
    let session = activeSession(FIVE_SEATS);
    for (let i = 0; i < 5; i++) {
      session = everyoneVotes(proposeTeam(session, ["servant", "morgana"]), "REJECT");
    }
    expect(session.phase).toBe("ENDED");
    expect(session.winner).toBe("EVIL");
    expect(session.consecutiveRejections).toBe(5);
    expect(session.history.map(round => round.captainName)).toEqual([
      "merlin",
      "percival",
      "servant",
      "morgana",
      "assassin"
    ]);
    expect(session.history.map(round => round.proposalIndex)).toEqual([1, 2, 3, 4, 5]);
  });

  it("numbers a mission by the proposal that sent it", () => {
    let session = activeSession(FIVE_SEATS);
    session = everyoneVotes(proposeTeam(session, ["servant", "morgana"]), "REJECT");
    session = everyoneVotes(proposeTeam(session, ["servant", "morgana"]), "REJECT");
    session = playMission(session, { merlin: "SUCCESS", percival: "SUCCESS" });
    session = playMission(session, { merlin: "SUCCESS", percival: "SUCCESS", servant: "SUCCESS" });

    expect(session.history.map(round => [round.roundNumber, round.outcome, round.proposalIndex])).toEqual([
      [1, "REJECTED", 1],
      [1, "REJECTED", 2],
      [1, "SUCCESS", 3],
      [2, "SUCCESS", 1]
    ]);
  });
});

describe("recordVoteFail", () => {
  it("counts a rejection called by the host", () => {
    const session = recordVoteFail(activeSession(FIVE_SEATS, {}, { consecutiveRejections: 2 }));
    expect(session.consecutiveRejections).toBe(3);
    expect(session.captainIndex).toBe(0);
    expect(session.phase).toBe("ACTIVE");
  });

  it("hands evil the game on the fifth rejection", () => {
    const session = recordVoteFail(activeSession(FIVE_SEATS, {}, { consecutiveRejections: 4 }));
    expect(session.phase).toBe("ENDED");
    expect(session.winner).toBe("EVIL");
  });

  it("is refused outside a running game", () => {
    expect(ruleCode(() => recordVoteFail(createSession({ seatTarget: 5 })))).toBe("WRONG_PHASE");
  });
});

describe("recordMissionVote", () => {
  it("turns a good player's fail into a success", () => {
    const session = playMission(activeSession(FIVE_SEATS), { merlin: "FAIL", percival: "SUCCESS" });
    expect(session.missions).toEqual([{ roundNumber: 1, team: ["merlin", "percival"], failCount: 0, result: "SUCCESS" }]);
  });

  it("lets evil players fail the mission", () => {
    const session = playMission(activeSession(FIVE_SEATS), { merlin: "SUCCESS", morgana: "FAIL" });
    expect(session.missions[0]).toEqual({ roundNumber: 1, team: ["merlin", "morgana"], failCount: 1, result: "FAIL" });
  });

  it("keeps only the first ballot from each team member", () => {
    const first = recordMissionVote(approveTeam(activeSession(FIVE_SEATS), ["merlin", "morgana"]), "morgana", "FAIL");
    expect(recordMissionVote(first, "morgana", "SUCCESS")).toBe(first);
    expect(first.missionBallots).toEqual([{ voter: "morgana", vote: "FAIL" }]);
  });

  it("rejects ballots from outside the team and ignores ballots outside a mission", () => {
    const onMission = approveTeam(activeSession(FIVE_SEATS), ["merlin", "morgana"]);
    expect(ruleCode(() => recordMissionVote(onMission, "assassin", "FAIL"))).toBe("INVALID_TARGET");

    const idle = activeSession(FIVE_SEATS);
    expect(recordMissionVote(idle, "merlin", "SUCCESS")).toBe(idle);
  });

  it("records the round and moves to the next captain", () => {
    const session = playMission(activeSession(FIVE_SEATS), { merlin: "SUCCESS", morgana: "FAIL" });
    expect(session.step).toBe("PROPOSAL");
    expect(session.captainIndex).toBe(1);
    expect(session.currentTeam).toEqual([]);
    expect(session.missionBallots).toEqual([]);
    expect(session.history).toHaveLength(1);
    expect(session.history[0].outcome).toBe("FAIL");
    expect(session.history[0].missionVotes).toEqual({ merlin: "SUCCESS", morgana: "FAIL" });
    expect(session.history[0].teamVotes).toEqual({
      merlin: "APPROVE",
      percival: "APPROVE",
      servant: "APPROVE",
      morgana: "APPROVE",
      assassin: "APPROVE"
    });
  });

  it("needs two fails to sink the fourth mission at seven seats", () => {
    const fourthRound = activeSession(SEVEN_SEATS, {}, {
      missions: [mission("SUCCESS", 1), mission("FAIL", 2), mission("SUCCESS", 3)]
    });

    const oneFail = playMission(fourthRound, {
      morgana: "FAIL",
      assassin: "SUCCESS",
      merlin: "SUCCESS",
      percival: "SUCCESS"
    });
    expect(oneFail.missions[3]).toEqual({
      roundNumber: 4,
      team: ["morgana", "assassin", "merlin", "percival"],
      failCount: 1,
      result: "SUCCESS"
    });
    expect(oneFail.phase).toBe("ASSASSIN_PENDING");

    const twoFails = playMission(fourthRound, {
      morgana: "FAIL",
      assassin: "FAIL",
      merlin: "SUCCESS",
      percival: "SUCCESS"
    });
    expect(twoFails.missions[3].result).toBe("FAIL");
    expect(twoFails.phase).toBe("ACTIVE");
  });

  it("sinks the fourth mission with a single fail below seven seats", () => {
    const fourthRound = activeSession(SIX_SEATS, {}, {
      missions: [mission("SUCCESS", 1), mission("FAIL", 2), mission("SUCCESS", 3)]
    });
    const session = playMission(fourthRound, { morgana: "FAIL", merlin: "SUCCESS", percival: "SUCCESS" });
    expect(session.missions[3].result).toBe("FAIL");
  });

  it("hands evil the game on the third failed mission", () => {
    const session = playMission(activeSession(FIVE_SEATS, {}, { missions: [mission("FAIL", 1), mission("FAIL", 2)] }), {
      merlin: "SUCCESS",
      morgana: "FAIL"
    });
    expect(session.phase).toBe("ENDED");
    expect(session.winner).toBe("EVIL");
  });
});

describe("assassination", () => {
  function threeSuccesses(): Session {
    let session = activeSession(FIVE_SEATS);
    session = playMission(session, { merlin: "SUCCESS", percival: "SUCCESS" });
    session = playMission(session, { merlin: "SUCCESS", percival: "SUCCESS", servant: "SUCCESS" });
    return playMission(session, { merlin: "SUCCESS", percival: "SUCCESS" });
  }

  it("waits for the assassin after the third successful mission", () => {
    const session = threeSuccesses();
    expect(session.phase).toBe("ASSASSIN_PENDING");
    expect(session.winner).toBeNull();
    expect(session.missions.map(m => m.result)).toEqual(["SUCCESS", "SUCCESS", "SUCCESS"]);
  });

  it("gives evil the win when Merlin is named", () => {
    const session = assassinate(threeSuccesses(), "merlin");
    expect(session.phase).toBe("ENDED");
    expect(session.winner).toBe("EVIL");
    expect(session.assassinTarget).toBe("merlin");
  });

  it("gives good the win when anyone else is named", () => {
    const session = assassinate(threeSuccesses(), "percival");
    expect(session.winner).toBe("GOOD");
    expect(session.assassinTarget).toBe("percival");
  });

  it("is only allowed while the assassin is choosing and only on seated names", () => {
    expect(ruleCode(() => assassinate(activeSession(FIVE_SEATS), "merlin"))).toBe("WRONG_PHASE");
    expect(ruleCode(() => assassinate(threeSuccesses(), "ghost"))).toBe("UNKNOWN_PLAYER");
  });
});

describe("Excalibur", () => {
  const team = ["merlin", "morgana", "servant1"];

  function awaitingSword(): Session {
    return approveTeam(activeSession(EIGHT_SEATS, { excaliburEnabled: true }), team);
  }

  function awaitingDecision(): Session {
    return castMission(assignExcalibur(awaitingSword(), "morgana"), {
      merlin: "SUCCESS",
      morgana: "FAIL",
      servant1: "SUCCESS"
    });
  }

  it("asks the proposer to hand out the sword after the team is approved", () => {
    const session = awaitingSword();
    expect(session.step).toBe("EXCALIBUR_ASSIGN");
    expect(session.excalibur.phase).toBe("ASSIGN");
    expect(recordMissionVote(session, "merlin", "SUCCESS")).toBe(session);
  });

  it("only gives the sword to another team member", () => {
    const session = awaitingSword();
    expect(ruleCode(() => assignExcalibur(session, "merlin"))).toBe("INVALID_TARGET");
    expect(ruleCode(() => assignExcalibur(session, "percival"))).toBe("INVALID_TARGET");

    const assigned = assignExcalibur(session, "morgana");
    expect(assigned.step).toBe("MISSION");
    expect(assigned.excalibur).toEqual({ enabled: true, holder: "morgana", phase: "MISSION", result: null });
    expect(ruleCode(() => assignExcalibur(assigned, "servant1"))).toBe("WRONG_PHASE");
  });

  it("waits for the holder once every ballot is in", () => {
    const session = awaitingDecision();
    expect(session.step).toBe("EXCALIBUR_DECIDE");
    expect(session.excalibur.phase).toBe("DECIDE");
    expect(session.missions).toEqual([]);
  });

  it("flips the chosen ballot before scoring", () => {
    const session = useExcalibur(awaitingDecision(), "morgana");
    expect(session.missions[0]).toEqual({ roundNumber: 1, team, failCount: 0, result: "SUCCESS" });
    expect(session.history[0].missionVotes).toEqual({ merlin: "SUCCESS", morgana: "SUCCESS", servant1: "SUCCESS" });
    expect(session.excalibur).toEqual({
      enabled: true,
      holder: "morgana",
      phase: "NONE",
      result: { target: "morgana", originalVote: "FAIL" }
    });
  });

  it("scores the ballots unchanged when the holder passes", () => {
    const session = useExcalibur(awaitingDecision(), null);
    expect(session.missions[0].result).toBe("FAIL");
    expect(session.excalibur.result).toBeNull();
  });

  it("only flips ballots from this mission and only when asked", () => {
    expect(ruleCode(() => useExcalibur(awaitingDecision(), "percival"))).toBe("INVALID_TARGET");
    expect(ruleCode(() => useExcalibur(awaitingSword(), "morgana"))).toBe("WRONG_PHASE");
  });

  it("clears the previous holder when the next team is approved", () => {
    const resolved = useExcalibur(awaitingDecision(), "morgana");
    const next = approveTeam(resolved, ["merlin", "percival", "servant1", "servant2"]);
    expect(next.excalibur).toEqual({ enabled: true, holder: null, phase: "ASSIGN", result: null });
  });
});

describe("Lady of the Lake", () => {
  function afterSecondMission(): Session {
    let session = activeSession(EIGHT_SEATS, { ladyOfTheLakeEnabled: true });
    session = playMission(session, { merlin: "SUCCESS", percival: "SUCCESS", servant1: "SUCCESS" });
    return playMission(session, {
      merlin: "SUCCESS",
      percival: "SUCCESS",
      servant1: "SUCCESS",
      servant2: "SUCCESS"
    });
  }

  it("is not used after the first mission", () => {
    let session = activeSession(EIGHT_SEATS, { ladyOfTheLakeEnabled: true });
    session = playMission(session, { merlin: "SUCCESS", percival: "SUCCESS", servant1: "SUCCESS" });
    expect(session.step).toBe("PROPOSAL");
    expect(session.captainIndex).toBe(1);
  });

  it("pauses play after the second mission and keeps the captain", () => {
    const session = afterSecondMission();
    expect(session.step).toBe("LADY_OF_THE_LAKE");
    expect(session.captainIndex).toBe(1);
    expect(ruleCode(() => proposeTeam(session, ["merlin", "percival", "servant1", "servant2"]))).toBe(
      "WRONG_PHASE"
    );
  });

  it("shows the holder the target's alignment and passes the token", () => {
    const session = inspectWithLady(afterSecondMission(), "morgana");
    expect(session.step).toBe("PROPOSAL");
    expect(session.captainIndex).toBe(2);
    expect(session.ladyOfTheLake).toEqual({
      enabled: true,
      holder: "morgana",
      initialHolder: "minion",
      history: ["minion", "morgana"],
      result: { target: "morgana", alignment: "EVIL" },
      inspector: "minion"
    });
  });

  it("never inspects a former holder", () => {
    expect(ruleCode(() => inspectWithLady(afterSecondMission(), "minion"))).toBe("INVALID_TARGET");
  });

  it("is refused outside its step", () => {
    expect(ruleCode(() => inspectWithLady(activeSession(EIGHT_SEATS, { ladyOfTheLakeEnabled: true }), "merlin"))).toBe(
      "WRONG_PHASE"
    );
  });

  it("is skipped when the mission ends the game", () => {
    const session = playMission(
      activeSession(EIGHT_SEATS, { ladyOfTheLakeEnabled: true }, { missions: [mission("SUCCESS", 1), mission("SUCCESS", 2)] }),
      { merlin: "SUCCESS", percival: "SUCCESS", servant1: "SUCCESS", servant2: "SUCCESS" }
    );
    expect(session.phase).toBe("ASSASSIN_PENDING");
    expect(session.step).toBe("PROPOSAL");
  });
});

describe("Lancelot", () => {
  it("swaps sides when a swap card is revealed and forces each Lancelot's ballot", () => {
    let session = joinAll(
      createSession({ seatTarget: 10, lancelotEnabled: true, ladyOfTheLakeEnabled: false }),
      names(10)
    );

    session = playMission(session, { p1: "SUCCESS", p2: "SUCCESS", p6: "FAIL" });
    expect(session.missions[0].result).toBe("SUCCESS");
    expect(session.lancelot.swapped).toBe(true);
    expect(session.lancelot.revealed).toEqual([true, null, null, null, null]);

    session = playMission(session, { p1: "SUCCESS", p2: "SUCCESS", p3: "SUCCESS", p6: "SUCCESS" });
    expect(session.missions[1]).toEqual({
      roundNumber: 2,
      team: ["p1", "p2", "p3", "p6"],
      failCount: 1,
      result: "FAIL"
    });
    expect(session.lancelot.swapped).toBe(false);
    expect(session.lancelot.revealed).toEqual([true, true, null, null, null]);
  });

  it("lets a Lancelot who turned good only succeed", () => {
    const evilLancelot = { name: "lance", role: "LANCELOT_EVIL" as const };
    expect(coerceMissionVote(evilLancelot, false, "SUCCESS")).toBe("FAIL");
    expect(coerceMissionVote(evilLancelot, true, "FAIL")).toBe("SUCCESS");
  });
});
