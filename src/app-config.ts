import Conf from "conf";
import { DEFAULT_SESSION_MINUTES, clampSessionMinutes } from "./lib/meditation";
import { isLogLevel, type LogLevel } from "./lib/logger";

export type AppConfig = {
  defaultMinutes: number;
  tickIntervalMs: number;
  logLevel: LogLevel;
  healthSync: boolean;
};

export const MIN_TICK_INTERVAL_MS = 250;
export const MAX_TICK_INTERVAL_MS = 5000;

export const DEFAULT_CONFIG: AppConfig = {
  defaultMinutes: DEFAULT_SESSION_MINUTES,
  tickIntervalMs: 1000,
  logLevel: "warn",
  healthSync: true,
};

export const clampTickInterval = (value: number) => {
  if (!Number.isFinite(value)) return DEFAULT_CONFIG.tickIntervalMs;
  const rounded = Math.round(value);
  return Math.min(MAX_TICK_INTERVAL_MS, Math.max(MIN_TICK_INTERVAL_MS, rounded));
};

export const normalizeConfig = (value?: Partial<AppConfig>): AppConfig => {
  const logLevel = value?.logLevel;
  const healthSync = value?.healthSync;
  return {
    defaultMinutes: clampSessionMinutes(
      value?.defaultMinutes ?? DEFAULT_CONFIG.defaultMinutes,
    ),
    tickIntervalMs: clampTickInterval(
      value?.tickIntervalMs ?? DEFAULT_CONFIG.tickIntervalMs,
    ),
    logLevel: isLogLevel(logLevel) ? logLevel : DEFAULT_CONFIG.logLevel,
    healthSync:
      typeof healthSync === "boolean" ? healthSync : DEFAULT_CONFIG.healthSync,
  };
};

export type ConfigStoreOptions = {
  /** Directory holding config.json; defaults to the per-user config dir. */
  cwd?: string;
};

export class ConfigStore {
  private readonly store: Conf<AppConfig>;

  constructor(options: ConfigStoreOptions = {}) {
    this.store = new Conf<AppConfig>({
      projectName: "stillpoint",
      cwd: options.cwd,
      defaults: DEFAULT_CONFIG,
      clearInvalidConfig: true,
    });
  }

  get(): AppConfig {
    return normalizeConfig({
      defaultMinutes: this.store.get("defaultMinutes"),
      tickIntervalMs: this.store.get("tickIntervalMs"),
      logLevel: this.store.get("logLevel"),
      healthSync: this.store.get("healthSync"),
    });
  }

  set(value: Partial<AppConfig>): AppConfig {
    const next = normalizeConfig({ ...this.get(), ...value });
    this.store.set(next);
    return next;
  }

  reset(): AppConfig {
    this.store.clear();
    return this.get();
  }

  get path(): string {
    return this.store.path;
  }
}
