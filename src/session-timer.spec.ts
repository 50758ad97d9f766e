import { SessionTimer, type SessionTimerOptions } from "./session-timer";
import type { CompletedSession } from "./lib/session-types";
import { createTestLogger } from "./testing/fixtures";

const START = new Date("2024-03-15T10:00:00.000Z");

describe("SessionTimer", () => {
  let completed: CompletedSession[];
  let timer: SessionTimer;
  let logger: ReturnType<typeof createTestLogger>;

  const createTimer = (overrides: Partial<SessionTimerOptions> = {}) =>
    new SessionTimer({
      onComplete: (session) => {
        completed.push(session);
      },
      logger,
      createId: () => "session-1",
      ...overrides,
    });

  beforeEach(() => {
    jest.useFakeTimers();
    jest.setSystemTime(START);
    completed = [];
    logger = createTestLogger();
    timer = createTimer();
  });

  afterEach(() => {
    timer.dispose();
    jest.useRealTimers();
  });

  it("publishes a provisional session on start", () => {
    expect(timer.start(600)).toBe(true);

    expect(timer.getSnapshot()).toEqual({
      status: "running",
      isRunning: true,
      remaining: 600,
      progress: 0,
      plannedDuration: 600,
      currentSession: {
        id: "session-1",
        startDate: "2024-03-15T10:00:00.000Z",
        plannedDuration: 600,
      },
    });
  });

  it("records a zero-length session when stopped immediately", () => {
    timer.start(600);
    timer.stop();

    expect(completed).toEqual([
      {
        id: "session-1",
        startDate: "2024-03-15T10:00:00.000Z",
        plannedDuration: 600,
        endDate: "2024-03-15T10:00:00.000Z",
        actualDuration: 0,
      },
    ]);
    expect(timer.getSnapshot().status).toBe("idle");
  });

  it("counts down once per tick", () => {
    const listener = jest.fn();
    timer.subscribe(listener);
    timer.start(100);

    jest.advanceTimersByTime(1000);

    expect(timer.getSnapshot().remaining).toBe(99);
    expect(timer.getSnapshot().progress).toBe(0.01);
    expect(listener).toHaveBeenCalledTimes(2);
  });

  it("finalizes by itself when the countdown reaches zero", () => {
    timer.start(60);

    jest.advanceTimersByTime(60_000);

    expect(completed).toHaveLength(1);
    expect(completed[0].endDate).toBe("2024-03-15T10:01:00.000Z");
    expect(completed[0].actualDuration).toBe(60);
    expect(timer.isRunning).toBe(false);
    expect(jest.getTimerCount()).toBe(0);
  });

  it("ignores a start while a session is running", () => {
    timer.start(600);

    expect(timer.start(300)).toBe(false);
    expect(timer.getSnapshot().plannedDuration).toBe(600);
    expect(logger.debug).toHaveBeenCalledWith("Session already running, ignoring start");
  });

  it.each([0, -60, Number.NaN, Number.POSITIVE_INFINITY])(
    "rejects a duration of %p",
    (duration) => {
      expect(timer.start(duration)).toBe(false);
      expect(timer.isRunning).toBe(false);
      expect(logger.warn).toHaveBeenCalledTimes(1);
    },
  );

  it("recomputes progress from the clock after a suspension", () => {
    timer.start(100);

    jest.setSystemTime(START.getTime() + 25_000);
    timer.refresh();

    expect(timer.getSnapshot().remaining).toBe(75);
    expect(timer.getSnapshot().progress).toBe(0.25);
    expect(completed).toHaveLength(0);
  });

  it("finalizes on refresh when the planned end passed while suspended", () => {
    timer.start(100);

    jest.setSystemTime(START.getTime() + 300_000);
    timer.refresh();

    expect(completed).toHaveLength(1);
    expect(completed[0].endDate).toBe("2024-03-15T10:05:00.000Z");
    expect(completed[0].actualDuration).toBe(300);
  });

  it("hands off each session exactly once", () => {
    const onComplete = jest.fn();
    timer = createTimer({ onComplete });
    timer.start(5);

    jest.advanceTimersByTime(5000);
    timer.stop();
    timer.refresh();
    jest.advanceTimersByTime(10_000);

    expect(onComplete).toHaveBeenCalledTimes(1);
  });

  it("freezes finished sessions", () => {
    timer.start(600);
    timer.recordSample({ timestamp: "2024-03-15T10:00:30.000Z", value: 62 });
    timer.stop();

    const [session] = completed;
    expect(Object.isFrozen(session)).toBe(true);
    expect(Object.isFrozen(session.heartRateSamples)).toBe(true);
  });

  it("attaches samples to the running session only", () => {
    timer.recordSample({ timestamp: "2024-03-15T09:59:00.000Z", value: 70 });
    timer.start(600);
    timer.recordSample({ timestamp: "2024-03-15T10:00:30.000Z", value: 62 });

    expect(timer.getSnapshot().currentSession?.heartRateSamples).toEqual([
      { timestamp: "2024-03-15T10:00:30.000Z", value: 62 },
    ]);

    timer.stop();
    expect(completed[0].heartRateSamples).toHaveLength(1);
  });

  it("goes idle before the hand-off and notifies listeners afterwards", () => {
    const seen: string[] = [];
    timer = createTimer({
      onComplete: () => {
        seen.push(`complete:${timer.getSnapshot().status}`);
      },
    });
    timer.subscribe((snapshot) => seen.push(`notify:${snapshot.status}`));

    timer.start(600);
    timer.stop();

    expect(seen).toEqual(["notify:running", "complete:idle", "notify:idle"]);
  });

  it("logs and survives a throwing completion handler", () => {
    timer = createTimer({
      onComplete: () => {
        throw new Error("boom");
      },
    });
    timer.start(600);

    expect(() => timer.stop()).not.toThrow();
    expect(logger.error.mock.calls[0][0]).toBe("Failed to hand off finished session");
    expect(timer.isRunning).toBe(false);
  });
});
