import type { Session } from "./lib/session-types";
import type { Logger } from "./lib/logger";

/** A platform health store that keeps "mindful session" entries. */
export interface HealthSync {
  saveMindfulSession(session: Session): Promise<void>;
  /** Resolves false when no matching entry was found. */
  deleteMindfulSession(session: Session): Promise<boolean>;
  updateConsecutiveDays(days: number): Promise<void>;
}

export const createNoopHealthSync = (): HealthSync => ({
  saveMindfulSession: async () => {},
  deleteMindfulSession: async () => false,
  updateConsecutiveDays: async () => {},
});

/**
 * Fire-and-forget front for a {@link HealthSync}. Calls never block local
 * state, failures are logged and never retried.
 */
export class HealthSyncDispatcher {
  private readonly pending = new Set<Promise<void>>();

  constructor(
    private readonly target: HealthSync,
    private readonly logger: Logger,
    private readonly enabled = true,
  ) {}

  sessionFinished(session: Session): void {
    this.dispatch("save mindful session", () =>
      this.target.saveMindfulSession(session),
    );
  }

  sessionsDeleted(sessions: readonly Session[]): void {
    for (const session of sessions) {
      this.dispatch("delete mindful session", async () => {
        const deleted = await this.target.deleteMindfulSession(session);
        if (!deleted) {
          this.logger.debug(`No health entry found for session ${session.id}`);
        }
      });
    }
  }

  streakChanged(days: number): void {
    this.dispatch("update consecutive days", () =>
      this.target.updateConsecutiveDays(days),
    );
  }

  /** Resolves once every call dispatched so far has settled. */
  async flush(): Promise<void> {
    while (this.pending.size > 0) {
      await Promise.all([...this.pending]);
    }
  }

  private dispatch(label: string, call: () => Promise<void>) {
    if (!this.enabled) return;
    const task: Promise<void> = Promise.resolve()
      .then(call)
      .catch((error: unknown) => {
        this.logger.warn(`Failed to ${label}`, error);
      })
      .finally(() => {
        this.pending.delete(task);
      });
    this.pending.add(task);
  }
}
