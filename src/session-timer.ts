import { v4 as uuidv4 } from "uuid";
import { isValidDuration } from "./lib/meditation";
import type {
  BiometricSample,
  CompletedSession,
  Session,
} from "./lib/session-types";
import type { Logger } from "./lib/logger";

export const DEFAULT_TICK_INTERVAL_MS = 1000;

export type TimerStatus = "idle" | "running";

export type TimerSnapshot = {
  status: TimerStatus;
  isRunning: boolean;
  /** Seconds left, never negative. */
  remaining: number;
  /** 0..1 */
  progress: number;
  plannedDuration: number;
  currentSession: Readonly<Session> | null;
};

export type TimerListener = (snapshot: TimerSnapshot) => void;

export type SessionTimerOptions = {
  onComplete: (session: CompletedSession) => void;
  logger: Logger;
  tickIntervalMs?: number;
  now?: () => number;
  createId?: () => string;
};

const IDLE_SNAPSHOT: TimerSnapshot = Object.freeze({
  status: "idle",
  isRunning: false,
  remaining: 0,
  progress: 0,
  plannedDuration: 0,
  currentSession: null,
});

const freezeSession = (session: CompletedSession): CompletedSession => {
  if (session.heartRateSamples) {
    Object.freeze(session.heartRateSamples);
  }
  return Object.freeze(session);
};

/**
 * Single countdown. Remaining time is always recomputed from the wall clock,
 * so a wake-up that arrives late (or never, while the process is suspended)
 * is corrected by the next `refresh()`.
 */
export class SessionTimer {
  private snapshot: TimerSnapshot = IDLE_SNAPSHOT;
  private startTime: number | null = null;
  private duration = 0;
  private provisional: Session | null = null;
  private interval: NodeJS.Timeout | number | null = null;
  private readonly listeners = new Set<TimerListener>();
  private readonly now: () => number;
  private readonly createId: () => string;
  private readonly tickIntervalMs: number;

  constructor(private readonly options: SessionTimerOptions) {
    this.now = options.now ?? (() => Date.now());
    this.createId = options.createId ?? (() => uuidv4());
    this.tickIntervalMs = options.tickIntervalMs ?? DEFAULT_TICK_INTERVAL_MS;
  }

  get isRunning(): boolean {
    return this.startTime !== null;
  }

  getSnapshot(): TimerSnapshot {
    return this.snapshot;
  }

  subscribe(listener: TimerListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  /** Returns false when the call was ignored. */
  start(duration: number): boolean {
    if (this.isRunning) {
      this.options.logger.debug("Session already running, ignoring start");
      return false;
    }
    if (!isValidDuration(duration)) {
      this.options.logger.warn(`Ignoring start with invalid duration ${duration}`);
      return false;
    }

    const startTime = this.now();
    this.startTime = startTime;
    this.duration = duration;
    this.provisional = {
      id: this.createId(),
      startDate: new Date(startTime).toISOString(),
      plannedDuration: duration,
    };
    this.interval = setInterval(() => this.refresh(), this.tickIntervalMs);
    this.options.logger.info(`Started session of ${duration / 60} minutes`);
    this.publish({
      status: "running",
      isRunning: true,
      remaining: duration,
      progress: 0,
      plannedDuration: duration,
      currentSession: this.provisional,
    });
    return true;
  }

  refresh(): void {
    if (this.startTime === null || !this.provisional) return;

    const elapsed = Math.max(0, (this.now() - this.startTime) / 1000);
    const remaining = Math.max(0, this.duration - elapsed);
    const progress = Math.min(1, elapsed / this.duration);

    if (remaining <= 0) {
      this.finalize();
      return;
    }

    this.publish({
      ...this.snapshot,
      remaining,
      progress,
    });
  }

  stop(): void {
    if (!this.isRunning) return;
    this.finalize();
  }

  recordSample(sample: BiometricSample): void {
    if (!this.provisional) return;
    this.provisional = {
      ...this.provisional,
      heartRateSamples: [...(this.provisional.heartRateSamples ?? []), sample],
    };
    this.publish({ ...this.snapshot, currentSession: this.provisional });
  }

  /** Cancels the wake-up without recording a session. */
  dispose(): void {
    this.cancelWakeUp();
    this.listeners.clear();
  }

  private finalize() {
    const provisional = this.provisional;
    const startTime = this.startTime;
    if (!provisional || startTime === null) return;

    const endTime = Math.max(startTime, this.now());
    const session = freezeSession({
      ...provisional,
      endDate: new Date(endTime).toISOString(),
      actualDuration: (endTime - startTime) / 1000,
    });

    this.cancelWakeUp();
    this.startTime = null;
    this.duration = 0;
    this.provisional = null;
    this.snapshot = IDLE_SNAPSHOT;

    try {
      this.options.onComplete(session);
    } catch (error) {
      this.options.logger.error("Failed to hand off finished session", error);
    }
    this.options.logger.info(`Finished session ${session.id}`);
    this.notify();
  }

  private cancelWakeUp() {
    if (this.interval === null) return;
    clearInterval(this.interval);
    this.interval = null;
  }

  private publish(next: TimerSnapshot) {
    this.snapshot = next;
    this.notify();
  }

  private notify() {
    for (const listener of this.listeners) {
      listener(this.snapshot);
    }
  }
}
