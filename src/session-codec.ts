import { z } from "zod";
import type { Session } from "./lib/session-types";

export const SESSIONS_FORMAT_VERSION = 1;

const isoDate = z
  .string()
  .refine((value) => Number.isFinite(Date.parse(value)), "invalid date");

const biometricSampleSchema = z.object({
  timestamp: isoDate,
  value: z.number().finite(),
});

export const sessionSchema = z.object({
  id: z.string().min(1),
  startDate: isoDate,
  plannedDuration: z.number().finite().positive(),
  endDate: isoDate.optional(),
  actualDuration: z.number().finite().optional(),
  heartRateSamples: z.array(biometricSampleSchema).optional(),
});

const envelopeSchema = z.object({
  version: z.number().int(),
  sessions: z.array(z.unknown()),
});

export type DecodedSessions = {
  sessions: Session[];
  /** False when the payload is not a sessions envelope at all. */
  recognized: boolean;
  sourceCount: number;
};

const toSession = (value: z.infer<typeof sessionSchema>): Session => {
  const session: Session = {
    id: value.id,
    startDate: value.startDate,
    plannedDuration: value.plannedDuration,
  };
  if (value.endDate !== undefined) session.endDate = value.endDate;
  if (value.actualDuration !== undefined) {
    session.actualDuration = value.actualDuration;
  }
  if (value.heartRateSamples !== undefined) {
    session.heartRateSamples = value.heartRateSamples.map((sample) => ({
      ...sample,
    }));
  }
  return session;
};

/** Validates an already parsed `{ version, sessions }` payload. */
export const extractSessions = (payload: unknown): DecodedSessions => {
  const envelope = envelopeSchema.safeParse(payload);
  if (!envelope.success) {
    return { sessions: [], recognized: false, sourceCount: 0 };
  }
  const seen = new Set<string>();
  const sessions: Session[] = [];
  for (const entry of envelope.data.sessions) {
    const parsed = sessionSchema.safeParse(entry);
    if (!parsed.success || seen.has(parsed.data.id)) continue;
    seen.add(parsed.data.id);
    sessions.push(toSession(parsed.data));
  }
  return {
    sessions,
    recognized: true,
    sourceCount: envelope.data.sessions.length,
  };
};

export const encodeSessions = (sessions: readonly Session[]): Buffer => {
  const payload = { version: SESSIONS_FORMAT_VERSION, sessions };
  return Buffer.from(JSON.stringify(payload), "utf8");
};

/** Throws when the bytes are not JSON; invalid entries are dropped. */
export const decodeSessions = (bytes: Buffer): DecodedSessions => {
  const parsed: unknown = JSON.parse(bytes.toString("utf8"));
  return extractSessions(parsed);
};
