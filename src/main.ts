#!/usr/bin/env node
import path from "node:path";
import { ConfigStore, type AppConfig } from "./app-config";
import { AppState } from "./app-state";
import { SqliteBlobStore } from "./blob-store";
import { createLogger, isLogLevel, type Logger } from "./lib/logger";
import {
  clampSessionMinutes,
  effectiveDuration,
  formatTime,
} from "./lib/meditation";
import { formatTotalDuration } from "./lib/session-stats";
import {
  buildExportFileName,
  exportSessions,
  importSessions,
} from "./session-transfer";

const HISTORY_PAGE_SIZE = 10;

const USAGE = `Usage: stillpoint <command>

Commands:
  start [minutes]          run a meditation countdown
  history [page]           list recorded sessions, newest first
  stats                    totals and current streak
  delete <id>              delete one session
  clear                    delete every session
  export [file]            write all sessions to a JSON file
  import <file> [--merge]  load sessions from a JSON file
  config [key value]       show or change a setting`;

const dateFormatter = new Intl.DateTimeFormat("en-US", {
  year: "numeric",
  month: "2-digit",
  day: "2-digit",
  hour: "2-digit",
  minute: "2-digit",
  hour12: false,
});

const print = (line = "") => {
  process.stdout.write(`${line}\n`);
};

const runCountdown = (appState: AppState, minutes: number | undefined) =>
  new Promise<void>((resolve) => {
    const render = () => {
      const { remaining, isRunning } = appState.getSnapshot();
      if (!isRunning) return;
      process.stdout.write(`\r${formatTime(Math.ceil(remaining))} remaining `);
    };
    const unsubscribe = appState.subscribe((snapshot) => {
      if (snapshot.isRunning) {
        render();
        return;
      }
      unsubscribe();
      process.off("SIGINT", handleInterrupt);
      const last = snapshot.sessions[snapshot.sessions.length - 1];
      print();
      if (last) {
        print(`Session ${last.id} saved (${formatTime(effectiveDuration(last))}).`);
      }
      print(`Streak: ${snapshot.streak} day(s)`);
      resolve();
    });
    const handleInterrupt = () => {
      appState.stop();
    };
    process.on("SIGINT", handleInterrupt);

    const started =
      minutes === undefined
        ? appState.start()
        : appState.start(clampSessionMinutes(minutes) * 60);
    if (!started) {
      unsubscribe();
      process.off("SIGINT", handleInterrupt);
      print("A session is already running.");
      resolve();
      return;
    }
    render();
  });

const showHistory = (appState: AppState, page: number) => {
  const { items, total } = appState.history(page, HISTORY_PAGE_SIZE);
  if (total === 0) {
    print("No sessions yet.");
    return;
  }
  for (const session of items) {
    const started = dateFormatter.format(new Date(session.startDate));
    const planned = formatTime(session.plannedDuration);
    print(`${session.id}  ${started}  ${formatTime(effectiveDuration(session))} / ${planned}`);
  }
  const totalPages = Math.max(1, Math.ceil(total / HISTORY_PAGE_SIZE));
  print(`Page ${Math.min(page, totalPages)} of ${totalPages} (${total} sessions)`);
};

const showStats = (appState: AppState) => {
  const summary = appState.summary();
  print(`Sessions:   ${summary.totalSessions}`);
  print(`Total:      ${formatTotalDuration(summary.totalSeconds)}`);
  print(`Average:    ${formatTotalDuration(summary.averageSeconds)}`);
  print(`Today:      ${formatTotalDuration(summary.todaySeconds)}`);
  print(`Last 7d:    ${formatTotalDuration(summary.weekSeconds)}`);
  print(`Last 30d:   ${formatTotalDuration(summary.monthSeconds)}`);
  print(`Streak:     ${summary.streak} day(s)`);
};

const updateConfig = (
  configStore: ConfigStore,
  key: string,
  value: string,
): AppConfig | null => {
  switch (key) {
    case "defaultMinutes":
      return configStore.set({ defaultMinutes: Number(value) });
    case "tickIntervalMs":
      return configStore.set({ tickIntervalMs: Number(value) });
    case "logLevel":
      return isLogLevel(value) ? configStore.set({ logLevel: value }) : null;
    case "healthSync":
      return configStore.set({ healthSync: value === "true" });
    default:
      return null;
  }
};

const run = async (argv: string[], logger: Logger, configStore: ConfigStore) => {
  const [command, ...args] = argv;
  const config = configStore.get();
  const blobs = new SqliteBlobStore({
    path: path.join(path.dirname(configStore.path), "stillpoint.sqlite"),
    freshStart: process.env.FRESH_START === "1",
  });
  const appState = new AppState({ blobs, config, logger });

  try {
    switch (command) {
      case "start": {
        const minutes = args[0] === undefined ? undefined : Number(args[0]);
        await runCountdown(appState, minutes);
        return 0;
      }
      case "history": {
        const page = Number(args[0] ?? 1);
        showHistory(appState, Number.isFinite(page) && page > 0 ? Math.floor(page) : 1);
        return 0;
      }
      case "stats":
        showStats(appState);
        return 0;
      case "delete": {
        const id = args[0];
        if (!id || !appState.store.get(id)) {
          print(`No session with id ${id ?? ""}`.trimEnd());
          return 1;
        }
        appState.deleteSession(id);
        print(`Deleted ${id}.`);
        return 0;
      }
      case "clear": {
        const count = appState.getSnapshot().sessions.length;
        appState.deleteAll();
        print(`Deleted ${count} session(s).`);
        return 0;
      }
      case "export": {
        const filePath = path.resolve(args[0] ?? buildExportFileName());
        const result = await exportSessions(appState.store, filePath, logger);
        print(
          result.ok
            ? `Exported ${result.count} session(s) to ${result.filePath}`
            : `Export failed: ${result.reason}`,
        );
        return result.ok ? 0 : 1;
      }
      case "import": {
        const filePath = args.find((arg) => !arg.startsWith("--"));
        if (!filePath) {
          print(USAGE);
          return 1;
        }
        const mode = args.includes("--merge") ? "merge" : "overwrite";
        const result = await importSessions(
          appState.store,
          path.resolve(filePath),
          mode,
          logger,
        );
        print(
          result.ok
            ? `Imported ${result.count} session(s).`
            : `Import failed: ${result.reason}`,
        );
        return result.ok ? 0 : 1;
      }
      case "config": {
        if (args.length === 0) {
          print(JSON.stringify(config, null, 2));
          return 0;
        }
        const [key, value] = args;
        const next = value === undefined ? null : updateConfig(configStore, key, value);
        if (!next) {
          print(USAGE);
          return 1;
        }
        print(JSON.stringify(next, null, 2));
        return 0;
      }
      default:
        print(USAGE);
        return command === undefined || command === "help" ? 0 : 1;
    }
  } finally {
    await appState.flush();
    appState.dispose();
    blobs.close();
  }
};

const main = async () => {
  const configStore = new ConfigStore();
  const logger = createLogger(configStore.get().logLevel);
  process.exitCode = await run(process.argv.slice(2), logger, configStore);
};

main().catch((error: unknown) => {
  console.error("[stillpoint] Unexpected failure", error);
  process.exitCode = 1;
});
