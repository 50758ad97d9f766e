export type BiometricSample = {
  timestamp: string;
  value: number;
};

export type Session = {
  id: string;
  startDate: string;
  /** Seconds requested before the run started. */
  plannedDuration: number;
  endDate?: string;
  /** Seconds between `startDate` and `endDate`, set together with `endDate`. */
  actualDuration?: number;
  heartRateSamples?: BiometricSample[];
};

export type CompletedSession = Session & {
  endDate: string;
  actualDuration: number;
};

export type SessionList = {
  items: Session[];
  total: number;
};

export type SessionImportMode = "merge" | "overwrite";

export type SessionTransferResult = {
  ok: boolean;
  count?: number;
  filePath?: string;
  reason?: "invalid-format" | "read-failed" | "write-failed";
};

export type SessionStatsSummary = {
  totalSessions: number;
  totalSeconds: number;
  averageSeconds: number;
  todaySeconds: number;
  weekSeconds: number;
  monthSeconds: number;
  streak: number;
};
