import {
  createContext,
  createElement,
  useCallback,
  useContext,
  useEffect,
  useSyncExternalStore,
  type ReactNode,
} from "react";
import type { AppSnapshot, AppState } from "../../app-state";

const AppStateContext = createContext<AppState | null>(null);

export const AppStateProvider = ({
  value,
  children,
}: {
  value: AppState;
  children?: ReactNode;
}) => createElement(AppStateContext.Provider, { value }, children);

export const useAppState = (): AppState => {
  const appState = useContext(AppStateContext);
  if (!appState) {
    throw new Error("useAppState must be used inside an AppStateProvider");
  }
  return appState;
};

export const useAppSnapshot = (): AppSnapshot => {
  const appState = useAppState();
  const subscribe = useCallback(
    (onChange: () => void) => appState.subscribe(onChange),
    [appState],
  );
  const getSnapshot = useCallback(() => appState.getSnapshot(), [appState]);
  return useSyncExternalStore(subscribe, getSnapshot, getSnapshot);
};

// Timers are throttled or frozen while the page is hidden; catch up on return.
export const useRefreshOnVisible = () => {
  const appState = useAppState();

  useEffect(() => {
    if (typeof document === "undefined") return;
    const handleVisibility = () => {
      if (document.visibilityState === "visible") {
        appState.refresh();
      }
    };
    document.addEventListener("visibilitychange", handleVisibility);
    return () => {
      document.removeEventListener("visibilitychange", handleVisibility);
    };
  }, [appState]);
};
