/**
 * junction.ts — Junction Manager
 *
 * junction_state.json is the single source of truth for "a decision is
 * pending". At most one pending record exists; a new one overwrites the old
 * (last writer wins, no queue). Decisions move the record into a bounded
 * history tail, and `dismiss` adds a time-boxed suppression entry keyed by a
 * content fingerprint of (type, payload).
 *
 * The state operations are pure functions over JunctionState; the
 * JunctionManager class wraps them in locked read-modify-write cycles.
 */

import { createHash, randomBytes } from "crypto";
import { join } from "path";
import { z } from "zod";

import { HISTORY_CAP, STATE_FILES, consoleLogger, type Logger } from "./config";
import { PAUSING_JUNCTION_TYPES, type PausingJunctionType } from "./classifier";
import { StateFile, parserFor, readJson, stableStringify, type LockOptions } from "./store";

// ─── Schema ──────────────────────────────────────────────────────────────────

export const JUNCTION_SCHEMA_VERSION = 2;

export const PausingTypeSchema = z.enum(["irreversible", "external", "ambiguous", "blocked"]);

export const DecisionSchema = z.enum(["approve", "skip", "dismiss"]);
export type JunctionDecision = z.infer<typeof DecisionSchema>;

export type JunctionPayload = Record<string, unknown>;

export const PendingJunctionSchema = z.object({
  id: z.string().min(1),
  type: PausingTypeSchema,
  payload: z.record(z.unknown()),
  created_at: z.string(),
  source: z.string(),
});
export type PendingJunction = z.infer<typeof PendingJunctionSchema>;

export const HistoryEntrySchema = z.object({
  id: z.string().min(1),
  type: PausingTypeSchema,
  decision: DecisionSchema,
  decided_at: z.string(),
});
export type HistoryEntry = z.infer<typeof HistoryEntrySchema>;

export const SuppressionEntrySchema = z.object({
  fingerprint: z.string().min(1),
  expires_at: z.string(),
});
export type SuppressionEntry = z.infer<typeof SuppressionEntrySchema>;

export const JunctionStateSchema = z.object({
  schema_version: z.literal(JUNCTION_SCHEMA_VERSION),
  pending: PendingJunctionSchema.nullable(),
  history_tail: z.array(HistoryEntrySchema),
  suppression: z.array(SuppressionEntrySchema),
});
export type JunctionState = z.infer<typeof JunctionStateSchema>;

/** Outcome of setPending: either a visible record or an auto-dismissal */
export type SetPendingResult =
  | { status: "pending"; junction: PendingJunction }
  | { status: "suppressed"; decision: "dismiss"; fingerprint: string; expires_at: string };

export type MigrationResult =
  | { status: "current" }
  | { status: "initialized" }
  | { status: "imported"; pending: PendingJunction };

// ─── Pure State Operations ───────────────────────────────────────────────────

export function createJunctionState(): JunctionState {
  return {
    schema_version: JUNCTION_SCHEMA_VERSION,
    pending: null,
    history_tail: [],
    suppression: [],
  };
}

/** Stable content hash of (type, payload); key order does not matter */
export function fingerprint(type: PausingJunctionType, payload: JunctionPayload): string {
  return createHash("sha256")
    .update(stableStringify({ type, payload }))
    .digest("hex")
    .slice(0, 16);
}

export function newJunctionId(now: Date): string {
  return `jct-${now.getTime().toString(36)}-${randomBytes(3).toString("hex")}`;
}

/** Append and keep only the newest `cap` entries (most recent last) */
export function appendHistory(
  tail: HistoryEntry[],
  entry: HistoryEntry,
  cap: number = HISTORY_CAP,
): HistoryEntry[] {
  const next = [...tail, entry];
  return next.length > cap ? next.slice(next.length - cap) : next;
}

export function pruneSuppression(state: JunctionState, now: Date): JunctionState {
  const live = state.suppression.filter((s) => Date.parse(s.expires_at) > now.getTime());
  return live.length === state.suppression.length ? state : { ...state, suppression: live };
}

export function findSuppression(
  state: JunctionState,
  fp: string,
  now: Date,
): SuppressionEntry | null {
  return (
    state.suppression.find(
      (s) => s.fingerprint === fp && Date.parse(s.expires_at) > now.getTime(),
    ) ?? null
  );
}

export interface PendingInput {
  type: PausingJunctionType;
  payload: JunctionPayload;
  source: string;
  id: string;
  now: Date;
}

export function applySetPending(
  state: JunctionState,
  input: PendingInput,
): { state: JunctionState; result: SetPendingResult } {
  const pruned = pruneSuppression(state, input.now);
  const fp = fingerprint(input.type, input.payload);
  const suppressed = findSuppression(pruned, fp, input.now);
  if (suppressed) {
    return {
      state: pruned,
      result: {
        status: "suppressed",
        decision: "dismiss",
        fingerprint: fp,
        expires_at: suppressed.expires_at,
      },
    };
  }

  const junction: PendingJunction = {
    id: input.id,
    type: input.type,
    payload: input.payload,
    created_at: input.now.toISOString(),
    source: input.source,
  };
  return {
    state: { ...pruned, pending: junction },
    result: { status: "pending", junction },
  };
}

/**
 * Resolve the pending record. With nothing pending the input state is
 * returned untouched (same reference) and `cleared` is null.
 */
export function applyClearPending(
  state: JunctionState,
  decision: JunctionDecision,
  suppressMinutes: number,
  now: Date,
): { state: JunctionState; cleared: PendingJunction | null } {
  const pending = state.pending;
  if (!pending) return { state, cleared: null };

  let next: JunctionState = {
    ...pruneSuppression(state, now),
    pending: null,
    history_tail: appendHistory(state.history_tail, {
      id: pending.id,
      type: pending.type,
      decision,
      decided_at: now.toISOString(),
    }),
  };

  if (decision === "dismiss") {
    const fp = fingerprint(pending.type, pending.payload);
    const expires_at = new Date(now.getTime() + suppressMinutes * 60_000).toISOString();
    next = {
      ...next,
      suppression: [...next.suppression.filter((s) => s.fingerprint !== fp), { fingerprint: fp, expires_at }],
    };
  }

  return { state: next, cleared: pending };
}

/** Non-positive or non-numeric windows fall back to the default */
export function resolveSuppressMinutes(
  minutes: number | null | undefined,
  fallback: number,
): number {
  return typeof minutes === "number" && Number.isFinite(minutes) && minutes > 0 ? minutes : fallback;
}

// ─── Legacy Format ───────────────────────────────────────────────────────────

// The previous schema kept the open junction inside dispatch_state.json.
const LegacyDispatchSchema = z.object({
  state: z.string().optional(),
  junction: z
    .object({
      type: z.string(),
      reason: z.string().nullable().optional(),
      context: z.record(z.unknown()).nullable().optional(),
      created_at: z.string().optional(),
    })
    .nullable()
    .optional(),
});

const SchemaVersionSchema = z.object({ schema_version: z.number() });

function toPausingType(raw: string): PausingJunctionType {
  const lower = raw.trim().toLowerCase();
  return PAUSING_JUNCTION_TYPES.find((t) => t === lower) ?? "ambiguous";
}

/** Build the equivalent pending record from a legacy dispatch state, if any */
export function legacyPendingFrom(raw: unknown, now: Date): PendingJunction | null {
  const parsed = LegacyDispatchSchema.safeParse(raw);
  if (!parsed.success) return null;
  const { state, junction } = parsed.data;
  if (state !== "junction" || !junction) return null;

  const type = toPausingType(junction.type);
  const payload: JunctionPayload = { reason: junction.reason ?? null };
  if (junction.context) payload["context"] = junction.context;
  if (type !== junction.type) payload["legacy_type"] = junction.type;

  return {
    id: `legacy-${fingerprint(type, payload)}`,
    type,
    payload,
    created_at: junction.created_at ?? now.toISOString(),
    source: "legacy",
  };
}

// ─── Manager ─────────────────────────────────────────────────────────────────

export interface JunctionManagerOptions {
  stateDir: string;
  lock: LockOptions;
  suppressMinutes: number;
  now?: () => Date;
  logger?: Logger;
}

export class JunctionManager {
  public readonly file: StateFile<JunctionState>;
  /** Read for migration only; nothing here writes it */
  public readonly legacyPath: string;
  readonly #suppressMinutes: number;
  readonly #now: () => Date;
  readonly #logger: Logger;

  public constructor(opts: JunctionManagerOptions) {
    this.file = new StateFile(
      join(opts.stateDir, STATE_FILES.junction),
      parserFor(JunctionStateSchema),
      createJunctionState,
      opts.lock,
    );
    this.legacyPath = join(opts.stateDir, STATE_FILES.legacyDispatch);
    this.#suppressMinutes = opts.suppressMinutes;
    this.#now = opts.now ?? (() => new Date());
    this.#logger = opts.logger ?? consoleLogger;
  }

  /** Record a new pending decision, overwriting any previous one */
  public setPending(
    type: PausingJunctionType,
    payload: JunctionPayload,
    source: string,
  ): SetPendingResult {
    const now = this.#now();
    return this.file.update((current) => {
      const { state, result } = applySetPending(current, {
        type,
        payload,
        source,
        id: newJunctionId(now),
        now,
      });
      if (current.pending && result.status === "pending") {
        this.#logger.warn(
          `[junction] ${current.pending.id} (${current.pending.type}) replaced by ${result.junction.id} (${type})`,
        );
      }
      return { next: state === current ? null : state, result };
    });
  }

  /** Pure read; run migrate() once per turn to surface legacy state */
  public getPending(): PendingJunction | null {
    return this.file.read().pending;
  }

  public clearPending(
    decision: JunctionDecision,
    suppressMinutes?: number | null,
  ): PendingJunction | null {
    const minutes = resolveSuppressMinutes(suppressMinutes, this.#suppressMinutes);
    const now = this.#now();
    return this.file.update((current) => {
      const { state, cleared } = applyClearPending(current, decision, minutes, now);
      return { next: cleared ? state : null, result: cleared };
    });
  }

  public isSuppressed(type: PausingJunctionType, payload: JunctionPayload): boolean {
    return findSuppression(this.file.read(), fingerprint(type, payload), this.#now()) !== null;
  }

  public history(): HistoryEntry[] {
    return this.file.read().history_tail;
  }

  public snapshot(): JunctionState {
    return this.file.read();
  }

  /** True when the junction file exists at the current schema version */
  public isCurrent(): boolean {
    const version = SchemaVersionSchema.safeParse(this.file.readRaw());
    return version.success && version.data.schema_version === JUNCTION_SCHEMA_VERSION;
  }

  /**
   * Bring the junction file to the current schema, importing an open
   * junction from the legacy dispatch state. Idempotent: once the current
   * version is on disk this is a no-op.
   */
  public migrate(): MigrationResult {
    if (this.isCurrent()) return { status: "current" };

    const now = this.#now();
    return this.file.update<MigrationResult>((current) => {
      if (this.isCurrent()) return { next: null, result: { status: "current" } };

      const legacy = current.pending ? null : legacyPendingFrom(readJson(this.legacyPath), now);
      if (!legacy) {
        return { next: current, result: { status: "initialized" } };
      }
      this.#logger.warn(`[junction] imported legacy pending junction ${legacy.id} (${legacy.type})`);
      return {
        next: { ...current, pending: legacy },
        result: { status: "imported", pending: legacy },
      };
    });
  }
}
