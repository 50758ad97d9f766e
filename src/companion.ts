import { z } from "zod";
import type { BiometricSample } from "./lib/session-types";
import type { Logger } from "./lib/logger";

export type CompanionOutboundMessage =
  | { action: "startMeditation"; duration: number }
  | { action: "stopMeditation" };

/** Transport to a paired secondary device. */
export interface CompanionLink {
  isReachable(): boolean;
  send(message: CompanionOutboundMessage): Promise<void>;
  onMessage(listener: (message: unknown) => void): () => void;
}

const healthDataSchema = z.object({
  type: z.literal("healthData"),
  heartRate: z.number().finite().positive(),
  timestamp: z
    .string()
    .refine((value) => Number.isFinite(Date.parse(value)))
    .optional(),
});

/** Returns null for anything that is not a heart-rate reading. */
export const parseCompanionSample = (
  message: unknown,
  now: () => number = () => Date.now(),
): BiometricSample | null => {
  const parsed = healthDataSchema.safeParse(message);
  if (!parsed.success) return null;
  return {
    timestamp: parsed.data.timestamp ?? new Date(now()).toISOString(),
    value: parsed.data.heartRate,
  };
};

export type CompanionBridgeOptions = {
  link: CompanionLink;
  logger: Logger;
  onSample: (sample: BiometricSample) => void;
  now?: () => number;
};

/**
 * Mirrors start/stop to the companion and feeds its readings back. Nothing
 * here affects the local session lifecycle when the device is away.
 */
export class CompanionBridge {
  private readonly unsubscribe: () => void;

  constructor(private readonly options: CompanionBridgeOptions) {
    this.unsubscribe = options.link.onMessage((message) => {
      const sample = parseCompanionSample(message, options.now);
      if (!sample) {
        options.logger.debug("Ignoring companion message", message);
        return;
      }
      options.onSample(sample);
    });
  }

  sessionStarted(duration: number): void {
    this.send({ action: "startMeditation", duration });
  }

  sessionStopped(): void {
    this.send({ action: "stopMeditation" });
  }

  dispose(): void {
    this.unsubscribe();
  }

  private send(message: CompanionOutboundMessage) {
    const { link, logger } = this.options;
    if (!link.isReachable()) {
      logger.debug(`Companion not reachable, skipping ${message.action}`);
      return;
    }
    void link.send(message).catch((error: unknown) => {
      logger.warn(`Failed to send ${message.action} to companion`, error);
    });
  }
}
