import { HealthSyncDispatcher } from "./health-sync";
import {
  buildSession,
  createMockHealthSync,
  createTestLogger,
} from "./testing/fixtures";

describe("HealthSyncDispatcher", () => {
  it("forwards finished sessions and streak changes", async () => {
    const target = createMockHealthSync();
    const dispatcher = new HealthSyncDispatcher(target, createTestLogger());
    const session = buildSession();

    dispatcher.sessionFinished(session);
    dispatcher.streakChanged(4);
    await dispatcher.flush();

    expect(target.saveMindfulSession).toHaveBeenCalledWith(session);
    expect(target.updateConsecutiveDays).toHaveBeenCalledWith(4);
  });

  it("does not call the target synchronously", () => {
    const target = createMockHealthSync();
    const dispatcher = new HealthSyncDispatcher(target, createTestLogger());

    dispatcher.sessionFinished(buildSession());

    expect(target.saveMindfulSession).not.toHaveBeenCalled();
  });

  it("deletes each session on its own and keeps going after a failure", async () => {
    const target = createMockHealthSync();
    target.deleteMindfulSession
      .mockRejectedValueOnce(new Error("denied"))
      .mockResolvedValueOnce(false)
      .mockResolvedValueOnce(true);
    const logger = createTestLogger();
    const dispatcher = new HealthSyncDispatcher(target, logger);

    dispatcher.sessionsDeleted([
      buildSession({ id: "a" }),
      buildSession({ id: "b" }),
      buildSession({ id: "c" }),
    ]);
    await dispatcher.flush();

    expect(target.deleteMindfulSession).toHaveBeenCalledTimes(3);
    expect(logger.warn).toHaveBeenCalledTimes(1);
    expect(logger.warn.mock.calls[0][0]).toBe("Failed to delete mindful session");
    expect(logger.debug).toHaveBeenCalledWith("No health entry found for session b");
  });

  it("logs a failed save instead of rejecting", async () => {
    const target = createMockHealthSync();
    target.saveMindfulSession.mockRejectedValue(new Error("unavailable"));
    const logger = createTestLogger();
    const dispatcher = new HealthSyncDispatcher(target, logger);

    dispatcher.sessionFinished(buildSession());

    await expect(dispatcher.flush()).resolves.toBeUndefined();
    expect(logger.warn.mock.calls[0][0]).toBe("Failed to save mindful session");
  });

  it("does nothing when disabled", async () => {
    const target = createMockHealthSync();
    const dispatcher = new HealthSyncDispatcher(target, createTestLogger(), false);

    dispatcher.sessionFinished(buildSession());
    dispatcher.sessionsDeleted([buildSession()]);
    dispatcher.streakChanged(1);
    await dispatcher.flush();

    expect(target.saveMindfulSession).not.toHaveBeenCalled();
    expect(target.deleteMindfulSession).not.toHaveBeenCalled();
    expect(target.updateConsecutiveDays).not.toHaveBeenCalled();
  });
});
