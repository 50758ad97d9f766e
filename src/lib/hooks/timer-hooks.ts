import { useCallback } from "react";
import { clampSessionMinutes, formatTime } from "../meditation";
import { useAppSnapshot, useAppState, useRefreshOnVisible } from "./app-hooks";

export const useMeditationTimer = () => {
  const appState = useAppState();
  const snapshot = useAppSnapshot();
  useRefreshOnVisible();

  const start = useCallback(
    (minutes?: number) => {
      if (minutes === undefined) return appState.start();
      return appState.start(clampSessionMinutes(minutes) * 60);
    },
    [appState],
  );

  const stop = useCallback(() => {
    appState.stop();
  }, [appState]);

  return {
    isRunning: snapshot.isRunning,
    remaining: snapshot.remaining,
    progress: snapshot.progress,
    total: snapshot.plannedDuration,
    // Round up so the display reads 00:01 until the run is actually over.
    formattedRemaining: formatTime(Math.ceil(snapshot.remaining)),
    currentSession: snapshot.currentSession,
    start,
    stop,
  };
};
