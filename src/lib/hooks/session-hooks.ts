import { useCallback, useMemo } from "react";
import { useAppSnapshot, useAppState } from "./app-hooks";

export const useSessionHistory = (page: number, pageSize: number) => {
  const appState = useAppState();
  const { sessions } = useAppSnapshot();

  // `sessions` changes identity on every store mutation.
  const data = useMemo(
    () => appState.history(page, pageSize),
    [appState, page, pageSize, sessions],
  );

  const deleteSession = useCallback(
    (id: string) => {
      appState.deleteSession(id);
    },
    [appState],
  );

  const deleteAll = useCallback(() => {
    appState.deleteAll();
  }, [appState]);

  return { data, deleteSession, deleteAll };
};

export const useSessionStats = () => {
  const appState = useAppState();
  const { sessions, streak, day } = useAppSnapshot();
  // `day` moves on the first refresh after midnight.
  const summary = useMemo(
    () => appState.summary(),
    [appState, sessions, streak, day],
  );
  return { summary, streak };
};
