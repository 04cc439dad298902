// apps/server/src/env.ts
//
// Process settings and configuration file resolution.
//
// - .env files: KEY=VALUE lines, explicitly provided env vars are never overwritten
// - engine config: EWS_CONFIG_PATH, else config/ews/default.json found by walking up from cwd

import fs from "node:fs";
import path from "node:path";
import { z } from "zod";

import { sampleClock, wallClock } from "@ews/risk-engine";
import type { Clock } from "@ews/risk-engine";

export const CONFIG_RELATIVE_PATH = path.join("config", "ews", "default.json");

export function loadDotEnvFile(fp: string, env: NodeJS.ProcessEnv = process.env): void {
  if (!fs.existsSync(fp)) return;
  const raw = fs.readFileSync(fp, "utf8");
  for (const line of raw.split(/\r?\n/)) {
    const s = line.trim();
    if (!s || s.startsWith("#")) continue;
    const m = s.match(/^([A-Za-z_][A-Za-z0-9_]*)=(.*)$/);
    if (!m) continue;
    const key = m[1];
    let val = m[2] ?? "";
    // Strip surrounding quotes if present
    if ((val.startsWith('"') && val.endsWith('"')) || (val.startsWith("'") && val.endsWith("'"))) {
      val = val.slice(1, -1);
    }
    if (env[key] == null) env[key] = val;
  }
}

/** Loads `.env` from each directory in order; earlier files win over later ones. */
export function loadEnv(dirs: string[], env: NodeJS.ProcessEnv = process.env): void {
  for (const dir of dirs) loadDotEnvFile(path.join(dir, ".env"), env);
}

/**
 * Walks upward from `startDir` until `requiredRelativePath` exists.
 * Throws if it cannot be found within `maxHops`.
 */
export function findRepoRoot(startDir: string, requiredRelativePath: string, maxHops = 8): string {
  let cur = path.resolve(startDir);

  for (let hop = 0; hop <= maxHops; hop++) {
    if (fs.existsSync(path.join(cur, requiredRelativePath))) return cur;
    const parent = path.dirname(cur);
    if (parent === cur) break;
    cur = parent;
  }

  throw new Error(`repo root not found: ${requiredRelativePath} is not reachable from ${startDir}`);
}

const ServerEnvSchema = z.object({
  PORT: z.coerce.number().int().min(0).max(65535).default(3110),
  HOST: z.string().min(1).default("0.0.0.0"),
  EWS_CONFIG_PATH: z.string().min(1).optional(),
  EWS_CLOCK: z.enum(["wall", "sample"]).default("wall"),
});

export type ClockMode = z.infer<typeof ServerEnvSchema>["EWS_CLOCK"];

export type ServerSettings = {
  port: number;
  host: string;
  configPath: string;
  clock: ClockMode;
};

export function readServerSettings(env: NodeJS.ProcessEnv, cwd: string): ServerSettings {
  const parsed = ServerEnvSchema.safeParse(env);
  if (!parsed.success) {
    const detail = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ");
    throw new Error(`invalid server environment: ${detail}`);
  }
  const e = parsed.data;
  const configPath = e.EWS_CONFIG_PATH
    ? path.resolve(cwd, e.EWS_CONFIG_PATH)
    : path.join(findRepoRoot(cwd, CONFIG_RELATIVE_PATH), CONFIG_RELATIVE_PATH);
  return { port: e.PORT, host: e.HOST, configPath, clock: e.EWS_CLOCK };
}

export function readConfigFile(fp: string): unknown {
  const raw = fs.readFileSync(fp, "utf8");
  const parsed: unknown = JSON.parse(raw);
  return parsed;
}

export function resolveClock(mode: ClockMode): Clock {
  return mode === "sample" ? sampleClock : wallClock;
}
