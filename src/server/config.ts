import { Logger } from "./logger";

export interface ServerConfig {
  port: number;
  /** Seat count used when a reset request omits it. */
  defaultSeatTarget: number;
  /** Whether the Lady of the Lake is on when a reset request omits the flag. */
  ladyOfTheLakeDefault: boolean;
}

export const DEFAULT_SERVER_CONFIG: ServerConfig = {
  port: 3000,
  defaultSeatTarget: 6,
  ladyOfTheLakeDefault: true
};

function readPositiveInt(env: NodeJS.ProcessEnv, key: string, fallback: number, logger?: Logger): number {
  const raw = env[key];
  if (raw === undefined || raw === "") return fallback;
  const value = Number(raw);
  if (!Number.isInteger(value) || value <= 0) {
    logger?.warn(`Ignoring invalid ${key}`, { value: raw, fallback });
    return fallback;
  }
  return value;
}

function readBoolean(env: NodeJS.ProcessEnv, key: string, fallback: boolean, logger?: Logger): boolean {
  const raw = env[key]?.trim().toLowerCase();
  if (raw === undefined || raw === "") return fallback;
  if (["1", "true", "yes", "on"].includes(raw)) return true;
  if (["0", "false", "no", "off"].includes(raw)) return false;
  logger?.warn(`Ignoring invalid ${key}`, { value: raw, fallback });
  return fallback;
}

/** Reads server settings from the environment, falling back to defaults on bad input. */
export function loadConfig(env: NodeJS.ProcessEnv = process.env, logger?: Logger): ServerConfig {
  return {
    port: readPositiveInt(env, "PORT", DEFAULT_SERVER_CONFIG.port, logger),
    defaultSeatTarget: readPositiveInt(env, "AVALON_DEFAULT_SEATS", DEFAULT_SERVER_CONFIG.defaultSeatTarget, logger),
    ladyOfTheLakeDefault: readBoolean(env, "AVALON_LADY_DEFAULT", DEFAULT_SERVER_CONFIG.ladyOfTheLakeDefault, logger)
  };
}
