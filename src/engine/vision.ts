import { Player, Role } from "./types";

/** What a viewer learns about another seat at the start of the game. */
export type VisionLabel = "EVIL" | "MERLIN?" | "ALLY" | "RED_LANCELOT";

export interface VisionEntry {
  name: string;
  label: VisionLabel;
}

const MERLIN_SEES: ReadonlySet<Role> = new Set<Role>(["MORGANA", "ASSASSIN", "MINION", "OBERON", "LANCELOT_EVIL"]);
const PERCIVAL_SEES: ReadonlySet<Role> = new Set<Role>(["MERLIN", "MORGANA"]);
const EVIL_TEAM: ReadonlySet<Role> = new Set<Role>(["MORGANA", "ASSASSIN", "MORDRED", "MINION"]);

function labelFor(viewer: Role, target: Role): VisionLabel | null {
  switch (viewer) {
    case "MERLIN":
      return MERLIN_SEES.has(target) ? "EVIL" : null;
    case "PERCIVAL":
      return PERCIVAL_SEES.has(target) ? "MERLIN?" : null;
    case "MORGANA":
    case "ASSASSIN":
    case "MORDRED":
    case "MINION":
      if (EVIL_TEAM.has(target)) return "ALLY";
      if (target === "LANCELOT_EVIL") return "RED_LANCELOT";
      return null;
    // Oberon is evil but blind; the evil Lancelot is seen by the team yet sees no one.
    case "OBERON":
    case "LANCELOT_EVIL":
    case "LANCELOT_GOOD":
    case "LOYAL_SERVANT":
      return null;
    default: {
      const exhaustive: never = viewer;
      throw new Error(`Unhandled role ${exhaustive}`);
    }
  }
}

/**
 * Per-viewer night-zero information, computed from original roles only.
 * The Lancelot swap never changes what anyone sees.
 */
export function computeVision(viewer: Player, players: Player[]): VisionEntry[] {
  const entries: VisionEntry[] = [];
  for (const target of players) {
    if (target.name === viewer.name) continue;
    const label = labelFor(viewer.role, target.role);
    if (label) {
      entries.push({ name: target.name, label });
    }
  }
  return entries;
}
