/**
 * config.ts — Supervisor Configuration + Session Paths
 *
 * Defaults live here as plain data. A project may override them with
 * `.edge/config.json`; callers may override again per invocation.
 */

import { existsSync, readFileSync } from "fs";
import { join, resolve } from "path";
import { z } from "zod";

// ─── Types ────────────────────────────────────────────────────────────────────

export interface SupervisorConfig {
  /** State directory, relative to the project root */
  state_dir: string;
  /** Session-wide cap on dispatch turns before a forced stop */
  max_iterations: number;
  /** Consecutive no-progress iterations before a "stuck" junction */
  stuck_threshold: number;
  /** Empty patrol passes before PATROL drops into DREAM */
  patrol_empty_limit: number;
  lock_timeout_ms: number;
  /** A lock file older than this is considered abandoned */
  lock_stale_ms: number;
  /** Default suppression window for `dismiss` */
  suppress_minutes: number;
}

/** Where library warnings go. Never stdout: the host reads JSON there. */
export interface Logger {
  warn(message: string): void;
}

export const consoleLogger: Logger = {
  warn: (message) => console.error(message),
};

export class ConfigError extends Error {
  public readonly path: string;

  public constructor(path: string, detail: string) {
    super(`Invalid config at ${path}: ${detail}`);
    this.name = "ConfigError";
    this.path = path;
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

// ─── Defaults ────────────────────────────────────────────────────────────────

export const DEFAULT_CONFIG: Readonly<SupervisorConfig> = Object.freeze({
  state_dir: join(".edge", "state"),
  max_iterations: 50,
  stuck_threshold: 3,
  patrol_empty_limit: 3,
  lock_timeout_ms: 5_000,
  lock_stale_ms: 30_000,
  suppress_minutes: 60,
});

/** Decision history is a fixed-size tail, not a tunable */
export const HISTORY_CAP = 10;

const positiveInt = z.number().int().positive();

const ConfigFileSchema = z
  .object({
    state_dir: z.string().min(1),
    max_iterations: positiveInt,
    stuck_threshold: positiveInt,
    patrol_empty_limit: positiveInt,
    lock_timeout_ms: positiveInt,
    lock_stale_ms: positiveInt,
    suppress_minutes: positiveInt,
  })
  .partial()
  .strict();

// ─── Loading ─────────────────────────────────────────────────────────────────

/** Path of the optional per-project config file */
export function configPath(projectRoot: string): string {
  return join(projectRoot, ".edge", "config.json");
}

/**
 * Merge defaults ← `.edge/config.json` ← overrides.
 * A missing file is fine; a malformed one throws ConfigError.
 */
export function loadConfig(
  projectRoot: string,
  overrides: Partial<SupervisorConfig> = {},
): SupervisorConfig {
  const path = configPath(projectRoot);
  let fromFile: Partial<SupervisorConfig> = {};

  if (existsSync(path)) {
    let raw: unknown;
    try {
      raw = JSON.parse(readFileSync(path, "utf-8"));
    } catch (err) {
      throw new ConfigError(path, errorMessage(err));
    }
    const parsed = ConfigFileSchema.safeParse(raw);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      const field = issue && issue.path.length > 0 ? issue.path.join(".") : "(root)";
      throw new ConfigError(path, `${field}: ${issue?.message ?? "invalid value"}`);
    }
    fromFile = parsed.data;
  }

  return { ...DEFAULT_CONFIG, ...fromFile, ...definedOnly(overrides) };
}

function definedOnly(overrides: Partial<SupervisorConfig>): Partial<SupervisorConfig> {
  const out: Partial<SupervisorConfig> = {};
  for (const [key, value] of Object.entries(overrides)) {
    if (value !== undefined) Object.assign(out, { [key]: value });
  }
  return out;
}

// ─── Paths ───────────────────────────────────────────────────────────────────

/** EDGE_PROJECT_DIR wins; otherwise the working directory is the project */
export function resolveProjectDir(
  env: NodeJS.ProcessEnv = process.env,
  cwd: string = process.cwd(),
): string {
  const fromEnv = env["EDGE_PROJECT_DIR"];
  return resolve(fromEnv && fromEnv.trim() ? fromEnv.trim() : cwd);
}

export function stateDir(projectRoot: string, config: SupervisorConfig): string {
  return resolve(projectRoot, config.state_dir);
}

export const STATE_FILES = {
  gear: "gear_state.json",
  junction: "junction_state.json",
  loop: "loop_state.json",
  /** Written by the previous schema; read for migration only */
  legacyDispatch: "dispatch_state.json",
} as const;
