import {
  averageHeartRate,
  clampSessionMinutes,
  completionPercentage,
  effectiveDuration,
  formatSessionDuration,
  formatTime,
  isCompleted,
} from "./meditation";
import type { Session } from "./session-types";

const running: Session = {
  id: "a",
  startDate: "2024-03-15T10:00:00.000Z",
  plannedDuration: 600,
};

describe("session derived values", () => {
  it("uses the planned duration while a session is still running", () => {
    expect(isCompleted(running)).toBe(false);
    expect(effectiveDuration(running)).toBe(600);
    expect(completionPercentage(running)).toBe(1);
  });

  it("falls back to the span between start and end", () => {
    const session = { ...running, endDate: "2024-03-15T10:05:00.000Z" };
    expect(isCompleted(session)).toBe(true);
    expect(effectiveDuration(session)).toBe(300);
    expect(completionPercentage(session)).toBe(0.5);
  });

  it("prefers the recorded actual duration", () => {
    const session = {
      ...running,
      endDate: "2024-03-15T10:05:00.000Z",
      actualDuration: 120,
    };
    expect(effectiveDuration(session)).toBe(120);
    expect(completionPercentage(session)).toBe(0.2);
  });

  it("caps completion at 1", () => {
    const session = {
      ...running,
      endDate: "2024-03-15T10:15:00.000Z",
      actualDuration: 900,
    };
    expect(completionPercentage(session)).toBe(1);
  });

  it("reports 0% for a session stopped immediately", () => {
    const session = {
      ...running,
      endDate: running.startDate,
      actualDuration: 0,
    };
    expect(completionPercentage(session)).toBe(0);
    expect(formatSessionDuration(session)).toBe("00:00");
  });

  it("averages heart-rate samples", () => {
    expect(averageHeartRate(running)).toBeUndefined();
    expect(
      averageHeartRate({
        ...running,
        heartRateSamples: [
          { timestamp: "2024-03-15T10:01:00.000Z", value: 60 },
          { timestamp: "2024-03-15T10:02:00.000Z", value: 70 },
        ],
      }),
    ).toBe(65);
  });
});

describe("formatTime", () => {
  it.each([
    [0, "00:00"],
    [65, "01:05"],
    [59.9, "00:59"],
    [3600, "60:00"],
    [-5, "00:00"],
  ])("formats %p seconds as %p", (seconds, expected) => {
    expect(formatTime(seconds)).toBe(expected);
  });
});

describe("clampSessionMinutes", () => {
  it("keeps minutes inside the supported range", () => {
    expect(clampSessionMinutes(0)).toBe(1);
    expect(clampSessionMinutes(200)).toBe(180);
    expect(clampSessionMinutes(12.4)).toBe(12);
    expect(clampSessionMinutes(Number.NaN)).toBe(10);
  });
});
