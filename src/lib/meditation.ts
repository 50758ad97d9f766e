import type { Session } from "./session-types";

export const MIN_SESSION_MINUTES = 1;
export const MAX_SESSION_MINUTES = 180;
export const DEFAULT_SESSION_MINUTES = 10;

export const PRESET_MINUTES = [5, 10, 15, 20, 30, 45, 60] as const;

export const clampSessionMinutes = (value: number) => {
  if (!Number.isFinite(value)) return DEFAULT_SESSION_MINUTES;
  const rounded = Math.round(value);
  return Math.min(MAX_SESSION_MINUTES, Math.max(MIN_SESSION_MINUTES, rounded));
};

export const isValidDuration = (seconds: number) =>
  Number.isFinite(seconds) && seconds > 0;

export const formatTime = (totalSeconds: number) => {
  const safe = Math.max(0, Math.floor(totalSeconds));
  const minutes = Math.floor(safe / 60);
  const seconds = safe % 60;
  return `${String(minutes).padStart(2, "0")}:${String(seconds).padStart(2, "0")}`;
};

export const secondsBetween = (startIso: string, endIso: string) =>
  (Date.parse(endIso) - Date.parse(startIso)) / 1000;

export const isCompleted = (session: Session) => session.endDate !== undefined;

export const effectiveDuration = (session: Session) => {
  if (session.actualDuration !== undefined) return session.actualDuration;
  if (session.endDate !== undefined) {
    return secondsBetween(session.startDate, session.endDate);
  }
  return session.plannedDuration;
};

export const completionPercentage = (session: Session) =>
  Math.min(1, effectiveDuration(session) / session.plannedDuration);

export const averageHeartRate = (session: Session) => {
  const samples = session.heartRateSamples ?? [];
  if (samples.length === 0) return undefined;
  const total = samples.reduce((sum, sample) => sum + sample.value, 0);
  return total / samples.length;
};

export const formatSessionDuration = (session: Session) =>
  formatTime(effectiveDuration(session));
