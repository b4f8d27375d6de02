import { Alignment, Player, Role } from "./types";

/** Roles whose original alignment is evil. */
export function isEvilRole(role: Role): boolean {
  switch (role) {
    case "MORGANA":
    case "ASSASSIN":
    case "MORDRED":
    case "OBERON":
    case "MINION":
    case "LANCELOT_EVIL":
      return true;
    case "MERLIN":
    case "PERCIVAL":
    case "LOYAL_SERVANT":
    case "LANCELOT_GOOD":
      return false;
    default: {
      const exhaustive: never = role;
      throw new Error(`Unhandled role ${exhaustive}`);
    }
  }
}

export function isLancelot(role: Role): boolean {
  return role === "LANCELOT_GOOD" || role === "LANCELOT_EVIL";
}

/**
 * Effective alignment after the Lancelot swap. Both Lancelots flip together on
 * every revealed swap card; every other role keeps its original side.
 * Mission coercion, Lady of the Lake and final scoring all read this.
 */
export function isCurrentlyEvil(player: Player, lancelotSwapped: boolean): boolean {
  const originallyEvil = isEvilRole(player.role);
  if (isLancelot(player.role)) {
    return lancelotSwapped ? !originallyEvil : originallyEvil;
  }
  return originallyEvil;
}

export function currentAlignment(player: Player, lancelotSwapped: boolean): Alignment {
  return isCurrentlyEvil(player, lancelotSwapped) ? "EVIL" : "GOOD";
}
