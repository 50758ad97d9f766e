import type { BlobStore } from "./blob-store";
import { decodeSessions, encodeSessions } from "./session-codec";
import type { Session, SessionList } from "./lib/session-types";
import type { Logger } from "./lib/logger";

export const SESSIONS_KEY = "sessions";

export type SessionStoreListener = (sessions: readonly Session[]) => void;

const sortByStartDate = (sessions: Session[]) => {
  return sessions.slice().sort((a, b) => {
    const aTime = Date.parse(a.startDate);
    const bTime = Date.parse(b.startDate);
    if (!Number.isFinite(aTime) || !Number.isFinite(bTime)) {
      return a.startDate.localeCompare(b.startDate);
    }
    return aTime - bTime;
  });
};

/**
 * In-memory session collection backed by a blob store. The whole collection
 * is rewritten after every mutation; a failed write is logged and the
 * in-memory state stays authoritative.
 */
export class SessionStore {
  private sessions: Session[] = [];
  private readonly listeners = new Set<SessionStoreListener>();

  constructor(
    private readonly blobs: BlobStore,
    private readonly logger: Logger,
    private readonly key: string = SESSIONS_KEY,
  ) {}

  load(): readonly Session[] {
    let raw: Buffer | null = null;
    try {
      raw = this.blobs.get(this.key);
    } catch (error) {
      this.logger.error("Failed to read sessions", error);
    }
    if (!raw) {
      this.sessions = [];
      return this.sessions;
    }
    try {
      const { sessions, recognized, sourceCount } = decodeSessions(raw);
      if (!recognized) {
        this.logger.warn("Stored sessions have an unknown format, starting empty");
      } else if (sessions.length < sourceCount) {
        this.logger.warn(
          `Dropped ${sourceCount - sessions.length} unreadable stored session(s)`,
        );
      }
      this.sessions = sessions;
    } catch (error) {
      this.logger.error("Failed to decode sessions, starting empty", error);
      this.sessions = [];
    }
    return this.sessions;
  }

  list(): readonly Session[] {
    return this.sessions;
  }

  get(id: string): Session | null {
    return this.sessions.find((session) => session.id === id) ?? null;
  }

  /** Newest first. */
  listPage(page: number, pageSize: number): SessionList {
    const safePage = Number.isFinite(page) && page > 0 ? Math.floor(page) : 1;
    const safePageSize =
      Number.isFinite(pageSize) && pageSize > 0 ? Math.floor(pageSize) : 10;
    const offset = (safePage - 1) * safePageSize;
    const newestFirst = sortByStartDate(this.sessions).reverse();
    return {
      items: newestFirst.slice(offset, offset + safePageSize),
      total: this.sessions.length,
    };
  }

  append(session: Session): void {
    if (this.sessions.some((existing) => existing.id === session.id)) {
      this.logger.debug(`Session ${session.id} already stored, skipping`);
      return;
    }
    this.commit([...this.sessions, session]);
  }

  remove(id: string): Session | null {
    const removed = this.get(id);
    if (!removed) return null;
    this.commit(this.sessions.filter((session) => session.id !== id));
    return removed;
  }

  removeAll(): Session[] {
    const removed = this.sessions.slice();
    this.commit([]);
    return removed;
  }

  replaceAll(sessions: Session[]): void {
    const seen = new Set<string>();
    const unique = sessions.filter((session) => {
      if (seen.has(session.id)) return false;
      seen.add(session.id);
      return true;
    });
    this.commit(sortByStartDate(unique));
  }

  /** Adds sessions whose id is not stored yet; returns how many were added. */
  merge(sessions: Session[]): number {
    const existingIds = new Set(this.sessions.map((session) => session.id));
    const uniqueEntries = sessions.filter((session) => {
      if (existingIds.has(session.id)) return false;
      existingIds.add(session.id);
      return true;
    });
    if (uniqueEntries.length === 0) {
      return 0;
    }
    this.commit([...this.sessions, ...sortByStartDate(uniqueEntries)]);
    return uniqueEntries.length;
  }

  subscribe(listener: SessionStoreListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  private commit(next: Session[]) {
    this.sessions = next;
    this.persist();
    for (const listener of this.listeners) {
      listener(this.sessions);
    }
  }

  private persist() {
    try {
      this.blobs.set(this.key, encodeSessions(this.sessions));
    } catch (error) {
      this.logger.error("Failed to save sessions", error);
    }
  }
}
