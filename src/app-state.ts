import type { AppConfig } from "./app-config";
import type { BlobStore } from "./blob-store";
import { CompanionBridge, type CompanionLink } from "./companion";
import {
  HealthSyncDispatcher,
  createNoopHealthSync,
  type HealthSync,
} from "./health-sync";
import { SessionStore } from "./session-store";
import { SessionTimer } from "./session-timer";
import type { Logger } from "./lib/logger";
import { summarizeSessions } from "./lib/session-stats";
import type {
  CompletedSession,
  Session,
  SessionList,
  SessionStatsSummary,
} from "./lib/session-types";
import { calculateStreak, startOfLocalDay } from "./lib/streak";

export type AppSnapshot = {
  remaining: number;
  progress: number;
  isRunning: boolean;
  plannedDuration: number;
  currentSession: Readonly<Session> | null;
  sessions: readonly Session[];
  streak: number;
  /** Local midnight of the current day, epoch ms. */
  day: number;
};

export type AppStateOptions = {
  blobs: BlobStore;
  config: AppConfig;
  logger: Logger;
  healthSync?: HealthSync;
  companion?: CompanionLink;
  now?: () => number;
  createId?: () => string;
};

export type AppStateListener = (snapshot: AppSnapshot) => void;

/**
 * Application root: built once at startup and handed to whatever needs the
 * timer, the session history or the streak.
 */
export class AppState {
  readonly timer: SessionTimer;
  readonly store: SessionStore;
  private readonly health: HealthSyncDispatcher;
  private readonly companion: CompanionBridge | null;
  private readonly listeners = new Set<AppStateListener>();
  private readonly now: () => number;
  private readonly config: AppConfig;
  private readonly logger: Logger;
  private streak = 0;
  private day: number;
  private snapshot: AppSnapshot;

  constructor(options: AppStateOptions) {
    this.now = options.now ?? (() => Date.now());
    this.config = options.config;
    this.logger = options.logger;
    this.store = new SessionStore(options.blobs, options.logger);
    this.health = new HealthSyncDispatcher(
      options.healthSync ?? createNoopHealthSync(),
      options.logger,
      options.config.healthSync,
    );
    this.timer = new SessionTimer({
      onComplete: (session) => this.handleSessionComplete(session),
      logger: options.logger,
      tickIntervalMs: options.config.tickIntervalMs,
      now: this.now,
      createId: options.createId,
    });
    this.companion = options.companion
      ? new CompanionBridge({
          link: options.companion,
          logger: options.logger,
          onSample: (sample) => this.timer.recordSample(sample),
          now: this.now,
        })
      : null;

    this.store.load();
    this.streak = this.computeStreak();
    this.day = startOfLocalDay(new Date(this.now()));
    this.snapshot = this.buildSnapshot();

    this.store.subscribe(() => this.handleSessionsChanged());
    this.timer.subscribe(() => this.publish());
  }

  getSnapshot(): AppSnapshot {
    return this.snapshot;
  }

  subscribe(listener: AppStateListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  /** Starts a run of `duration` seconds, or the configured default. */
  start(duration: number = this.config.defaultMinutes * 60): boolean {
    const started = this.timer.start(duration);
    if (started) {
      this.companion?.sessionStarted(duration);
    }
    return started;
  }

  stop(): void {
    this.timer.stop();
  }

  /** Recomputes time-derived state, e.g. after the host process resumes. */
  refresh(): void {
    this.timer.refresh();
    const streak = this.computeStreak();
    const day = startOfLocalDay(new Date(this.now()));
    if (streak !== this.streak || day !== this.day) {
      this.streak = streak;
      this.day = day;
      this.publish();
    }
  }

  deleteSession(id: string): void {
    const removed = this.store.remove(id);
    if (removed) {
      this.health.sessionsDeleted([removed]);
    }
  }

  deleteAll(): void {
    const removed = this.store.removeAll();
    this.health.sessionsDeleted(removed);
  }

  history(page: number, pageSize: number): SessionList {
    return this.store.listPage(page, pageSize);
  }

  summary(): SessionStatsSummary {
    return summarizeSessions([...this.store.list()], new Date(this.now()));
  }

  /** Waits for outstanding health-store calls. */
  flush(): Promise<void> {
    return this.health.flush();
  }

  dispose(): void {
    this.timer.dispose();
    this.companion?.dispose();
    this.listeners.clear();
  }

  private handleSessionComplete(session: CompletedSession) {
    this.store.append(session);
    this.health.sessionFinished(session);
    this.companion?.sessionStopped();
  }

  private handleSessionsChanged() {
    this.streak = this.computeStreak();
    this.logger.debug(`Streak is now ${this.streak}`);
    this.health.streakChanged(this.streak);
    this.publish();
  }

  private computeStreak() {
    return calculateStreak(
      this.store.list().map((session) => session.startDate),
      new Date(this.now()),
    );
  }

  private buildSnapshot(): AppSnapshot {
    const timer = this.timer.getSnapshot();
    return {
      remaining: timer.remaining,
      progress: timer.progress,
      isRunning: timer.isRunning,
      plannedDuration: timer.plannedDuration,
      currentSession: timer.currentSession,
      sessions: this.store.list(),
      streak: this.streak,
      day: this.day,
    };
  }

  private publish() {
    this.snapshot = this.buildSnapshot();
    for (const listener of this.listeners) {
      listener(this.snapshot);
    }
  }
}
