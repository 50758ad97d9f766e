import fs from "node:fs/promises";
import { SESSIONS_FORMAT_VERSION, extractSessions } from "./session-codec";
import type { SessionStore } from "./session-store";
import type {
  SessionImportMode,
  SessionTransferResult,
} from "./lib/session-types";
import type { Logger } from "./lib/logger";

export const buildExportFileName = (now: Date = new Date()) => {
  const padded = (value: number) => String(value).padStart(2, "0");
  const timestamp = `${now.getFullYear()}${padded(now.getMonth() + 1)}${padded(
    now.getDate(),
  )}-${padded(now.getHours())}${padded(now.getMinutes())}${padded(
    now.getSeconds(),
  )}`;
  return `stillpoint-sessions-${timestamp}.json`;
};

export const exportSessions = async (
  store: SessionStore,
  filePath: string,
  logger: Logger,
  now: Date = new Date(),
): Promise<SessionTransferResult> => {
  const sessions = store.list();
  const payload = {
    version: SESSIONS_FORMAT_VERSION,
    exportedAt: now.toISOString(),
    sessions,
  };

  try {
    await fs.writeFile(filePath, JSON.stringify(payload, null, 2), "utf8");
    return { ok: true, count: sessions.length, filePath };
  } catch (error) {
    logger.error("Failed to export sessions", error);
    return { ok: false, reason: "write-failed" };
  }
};

export const importSessions = async (
  store: SessionStore,
  filePath: string,
  mode: SessionImportMode,
  logger: Logger,
): Promise<SessionTransferResult> => {
  let raw = "";
  try {
    raw = await fs.readFile(filePath, "utf8");
  } catch (error) {
    logger.error("Failed to read sessions file", error);
    return { ok: false, reason: "read-failed" };
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    logger.error("Failed to parse sessions file", error);
    return { ok: false, reason: "invalid-format" };
  }

  const { sessions, recognized, sourceCount } = extractSessions(parsed);
  if (!recognized || (sourceCount > 0 && sessions.length === 0)) {
    return { ok: false, reason: "invalid-format" };
  }

  try {
    if (mode === "overwrite") {
      store.replaceAll(sessions);
      return { ok: true, count: sessions.length };
    }
    return { ok: true, count: store.merge(sessions) };
  } catch (error) {
    logger.error("Failed to import sessions", error);
    return { ok: false, reason: "write-failed" };
  }
};
