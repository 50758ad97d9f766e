export { AppState } from "./app-state";
export type { AppSnapshot, AppStateOptions } from "./app-state";
export { ConfigStore, DEFAULT_CONFIG, normalizeConfig } from "./app-config";
export type { AppConfig } from "./app-config";
export { SqliteBlobStore } from "./blob-store";
export type { BlobStore } from "./blob-store";
export { CompanionBridge, parseCompanionSample } from "./companion";
export type { CompanionLink, CompanionOutboundMessage } from "./companion";
export { HealthSyncDispatcher, createNoopHealthSync } from "./health-sync";
export type { HealthSync } from "./health-sync";
export { SessionStore } from "./session-store";
export { SessionTimer } from "./session-timer";
export type { TimerSnapshot } from "./session-timer";
export { exportSessions, importSessions } from "./session-transfer";
export { createLogger } from "./lib/logger";
export type { Logger, LogLevel } from "./lib/logger";
export * from "./lib/meditation";
export { summarizeSessions } from "./lib/session-stats";
export { calculateStreak } from "./lib/streak";
export type * from "./lib/session-types";
export {
  AppStateProvider,
  useAppSnapshot,
  useAppState,
} from "./lib/hooks/app-hooks";
export { useMeditationTimer } from "./lib/hooks/timer-hooks";
export { useSessionHistory, useSessionStats } from "./lib/hooks/session-hooks";
