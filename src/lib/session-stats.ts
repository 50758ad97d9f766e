import { effectiveDuration } from "./meditation";
import type { Session, SessionStatsSummary } from "./session-types";
import { calculateStreak, localDaysBefore, startOfLocalDay } from "./streak";

const secondsStartedBetween = (
  sessions: Session[],
  start: number,
  end: number,
) => {
  return sessions.reduce((total, session) => {
    const startedAt = Date.parse(session.startDate);
    if (!Number.isFinite(startedAt) || startedAt < start || startedAt > end) {
      return total;
    }
    return total + Math.max(0, effectiveDuration(session));
  }, 0);
};

export const summarizeSessions = (
  sessions: Session[],
  now: Date = new Date(),
): SessionStatsSummary => {
  const end = now.getTime();
  const startOfToday = startOfLocalDay(now);
  const startOfWeek = localDaysBefore(startOfToday, 6);
  const startOfMonth = localDaysBefore(startOfToday, 29);

  const totalSeconds = sessions.reduce(
    (total, session) => total + Math.max(0, effectiveDuration(session)),
    0,
  );

  return {
    totalSessions: sessions.length,
    totalSeconds,
    averageSeconds: sessions.length > 0 ? totalSeconds / sessions.length : 0,
    todaySeconds: secondsStartedBetween(sessions, startOfToday, end),
    weekSeconds: secondsStartedBetween(sessions, startOfWeek, end),
    monthSeconds: secondsStartedBetween(sessions, startOfMonth, end),
    streak: calculateStreak(
      sessions.map((session) => session.startDate),
      now,
    ),
  };
};

export const formatTotalDuration = (seconds: number) => {
  const totalMinutes = Math.max(0, Math.round(seconds / 60));
  const hours = Math.floor(totalMinutes / 60);
  const minutes = totalMinutes % 60;
  return hours > 0 ? `${hours}h ${minutes}m` : `${minutes}m`;
};
