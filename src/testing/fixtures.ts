import type { BlobStore } from "../blob-store";
import type { HealthSync } from "../health-sync";
import type { Logger } from "../lib/logger";
import type { Session } from "../lib/session-types";

export type MockLogger = { [K in keyof Logger]: jest.Mock<void, [string, ...unknown[]]> };

export const createTestLogger = (): MockLogger => ({
  trace: jest.fn<void, [string, ...unknown[]]>(),
  debug: jest.fn<void, [string, ...unknown[]]>(),
  info: jest.fn<void, [string, ...unknown[]]>(),
  warn: jest.fn<void, [string, ...unknown[]]>(),
  error: jest.fn<void, [string, ...unknown[]]>(),
});

export const createMemoryBlobStore = (): BlobStore & {
  data: Map<string, Buffer>;
} => {
  const data = new Map<string, Buffer>();
  return {
    data,
    get: (key) => data.get(key) ?? null,
    set: (key, bytes) => {
      data.set(key, bytes);
    },
  };
};

export type MockHealthSync = {
  saveMindfulSession: jest.Mock<Promise<void>, [Session]>;
  deleteMindfulSession: jest.Mock<Promise<boolean>, [Session]>;
  updateConsecutiveDays: jest.Mock<Promise<void>, [number]>;
};

export const createMockHealthSync = (): MockHealthSync & HealthSync => ({
  saveMindfulSession: jest.fn<Promise<void>, [Session]>(async () => {}),
  deleteMindfulSession: jest.fn<Promise<boolean>, [Session]>(async () => true),
  updateConsecutiveDays: jest.fn<Promise<void>, [number]>(async () => {}),
});

export const buildSession = (overrides: Partial<Session> = {}): Session => ({
  id: "session-1",
  startDate: "2024-03-15T10:00:00.000Z",
  plannedDuration: 600,
  endDate: "2024-03-15T10:10:00.000Z",
  actualDuration: 600,
  ...overrides,
});
