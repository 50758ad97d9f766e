/** Local midnight of the given instant, as epoch milliseconds. */
export const startOfLocalDay = (date: Date) => {
  const day = new Date(date);
  day.setHours(0, 0, 0, 0);
  return day.getTime();
};

/**
 * Start of the local day `days` calendar days before `dayStart`. Rebuilt from
 * the calendar date so a midnight skipped by DST lands on that day's start.
 */
export const localDaysBefore = (dayStart: number, days: number) => {
  const day = new Date(dayStart);
  return startOfLocalDay(
    new Date(day.getFullYear(), day.getMonth(), day.getDate() - days),
  );
};

export const collectPracticeDays = (startDates: Iterable<string>) => {
  const days = new Set<number>();
  for (const value of startDates) {
    const time = Date.parse(value);
    if (!Number.isFinite(time)) continue;
    days.add(startOfLocalDay(new Date(time)));
  }
  return days;
};

/**
 * Number of consecutive local calendar days, ending today, that contain at
 * least one session start. A streak with no session today is 0, even when
 * yesterday had one.
 */
export const calculateStreak = (
  startDates: Iterable<string>,
  now: Date = new Date(),
) => {
  const days = collectPracticeDays(startDates);
  let cursor = startOfLocalDay(now);
  let streak = 0;
  while (days.has(cursor)) {
    streak += 1;
    cursor = localDaysBefore(cursor, 1);
  }
  return streak;
};
