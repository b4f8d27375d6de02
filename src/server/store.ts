import { createEmptySession } from "../engine/transitions";
import { Session } from "../engine/types";

/**
 * Holder of the one live session per process.
 * The HTTP and WS layers both treat it as the single source of truth.
 */
export class SessionStore {
  private session: Session;

  constructor(initial: Session = createEmptySession()) {
    this.session = initial;
  }

  /** Current snapshot. Snapshots are immutable, so callers may keep it. */
  get(): Session {
    return this.session;
  }

  /**
   * Atomically load-modify-store the session.
   * Engine transitions are synchronous and the event loop runs one callback at a
   * time, so no other mutation can interleave with the updater. If the updater
   * throws, nothing is stored.
   */
  withSession(updater: (current: Session) => Session): Session {
    const updated = updater(this.session);
    this.session = updated;
    return updated;
  }
}
