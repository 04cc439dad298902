// packages/contracts/src/schema/alert_level_v1.ts
import { z } from "zod";

/**
 * AlertLevelV1
 * ------------
 * Discrete alert ladder. Array order IS the severity order (index 0 = lowest).
 */
export const ALERT_LEVELS = ["GREEN", "YELLOW", "ORANGE", "RED"] as const;

export const AlertLevelV1Schema = z.enum(ALERT_LEVELS);

export type AlertLevelV1 = z.infer<typeof AlertLevelV1Schema>;

/** Levels that have a rising threshold (everything above GREEN). */
export type ElevatedAlertLevelV1 = Exclude<AlertLevelV1, "GREEN">;

export function alertRank(level: AlertLevelV1): number {
  return ALERT_LEVELS.indexOf(level);
}
