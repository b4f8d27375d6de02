import { MissionVote, TeamVote } from "../engine/types";
import { ClientMessage, ResetGamePayload } from "../shared/messages";

/** Malformed request payload. Distinct from GameRuleError, which means the game said no. */
export class RequestError extends Error {
  readonly code = "BAD_REQUEST";

  constructor(message: string) {
    super(message);
    this.name = "RequestError";
  }
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function asRecord(value: unknown, what: string): Record<string, unknown> {
  if (!isRecord(value)) {
    throw new RequestError(`${what} must be an object`);
  }
  return value;
}

export function requireString(body: Record<string, unknown>, key: string): string {
  const value = body[key];
  if (typeof value !== "string" || value.trim().length === 0) {
    throw new RequestError(`${key} must be a non-empty string`);
  }
  return value;
}

export function optionalString(body: Record<string, unknown>, key: string): string | null {
  const value = body[key];
  if (value === undefined || value === null || value === "") return null;
  if (typeof value !== "string") {
    throw new RequestError(`${key} must be a string`);
  }
  return value;
}

function optionalBoolean(body: Record<string, unknown>, key: string): boolean | undefined {
  const value = body[key];
  if (value === undefined) return undefined;
  if (typeof value !== "boolean") {
    throw new RequestError(`${key} must be a boolean`);
  }
  return value;
}

export function requireStringArray(body: Record<string, unknown>, key: string): string[] {
  const value = body[key];
  if (!Array.isArray(value) || !value.every((item): item is string => typeof item === "string")) {
    throw new RequestError(`${key} must be an array of names`);
  }
  return value;
}

/** Accepts `approve`/`reject` in any case. */
export function parseTeamVote(value: unknown): TeamVote {
  const normalized = typeof value === "string" ? value.trim().toUpperCase() : "";
  if (normalized === "APPROVE" || normalized === "REJECT") return normalized;
  throw new RequestError("vote must be approve or reject");
}

/** Accepts `success`/`fail` in any case. */
export function parseMissionVote(value: unknown): MissionVote {
  const normalized = typeof value === "string" ? value.trim().toUpperCase() : "";
  if (normalized === "SUCCESS" || normalized === "FAIL") return normalized;
  throw new RequestError("action must be success or fail");
}

export function parseResetPayload(raw: unknown): Partial<ResetGamePayload> {
  const body: Record<string, unknown> = raw === undefined ? {} : asRecord(raw, "body");
  const rawCount = body["playerCount"];
  let playerCount: number | undefined;
  if (rawCount !== undefined) {
    if (typeof rawCount !== "number" || !Number.isInteger(rawCount)) {
      throw new RequestError("playerCount must be an integer");
    }
    playerCount = rawCount;
  }
  return {
    playerCount,
    lancelotEnabled: optionalBoolean(body, "lancelotEnabled"),
    excaliburEnabled: optionalBoolean(body, "excaliburEnabled"),
    ladyOfTheLakeEnabled: optionalBoolean(body, "ladyOfTheLakeEnabled")
  };
}

/** Validates a decoded WebSocket frame into a typed client message. */
export function parseClientMessage(raw: unknown): ClientMessage {
  const message = asRecord(raw, "message");
  const payload: Record<string, unknown> =
    message["payload"] === undefined ? {} : asRecord(message["payload"], "payload");

  switch (message["type"]) {
    case "SUBSCRIBE":
      return { type: "SUBSCRIBE", payload: { playerName: requireString(payload, "playerName") } };
    case "RESET_GAME":
      return { type: "RESET_GAME", payload: parseResetPayload(payload) };
    case "CLEAR_GAME":
      return { type: "CLEAR_GAME" };
    case "END_GAME":
      return { type: "END_GAME" };
    case "JOIN":
      return { type: "JOIN", payload: { playerName: requireString(payload, "playerName") } };
    case "PROPOSE_TEAM":
      return {
        type: "PROPOSE_TEAM",
        payload: {
          team: requireStringArray(payload, "team"),
          playerName: optionalString(payload, "playerName") ?? undefined
        }
      };
    case "VOTE_TEAM":
      return {
        type: "VOTE_TEAM",
        payload: { playerName: requireString(payload, "playerName"), vote: parseTeamVote(payload["vote"]) }
      };
    case "VOTE_MISSION":
      return {
        type: "VOTE_MISSION",
        payload: { playerName: requireString(payload, "playerName"), action: parseMissionVote(payload["action"]) }
      };
    case "ASSIGN_EXCALIBUR":
      return { type: "ASSIGN_EXCALIBUR", payload: { target: requireString(payload, "target") } };
    case "USE_EXCALIBUR":
      return { type: "USE_EXCALIBUR", payload: { target: optionalString(payload, "target") } };
    case "LADY_OF_THE_LAKE":
      return { type: "LADY_OF_THE_LAKE", payload: { target: requireString(payload, "target") } };
    case "ASSASSINATE":
      return { type: "ASSASSINATE", payload: { target: requireString(payload, "target") } };
    default:
      throw new RequestError("Unknown message type");
  }
}
