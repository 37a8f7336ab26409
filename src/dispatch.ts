/**
 * dispatch.ts — Dispatch Loop
 *
 * The entry point a host calls once per agent turn. Combines the junction
 * manager, the gear state machine and the loop counters into one
 * JSON-shaped DispatchResult. dispatch() never rejects: every failure comes
 * back as `outcome: "error"`, and the message says whether the turn had
 * already saved its gear step.
 *
 * Main entry points:
 *   dispatch(projectRoot, opts)  — run one turn (mutates state)
 *   queryStatus(projectRoot)     — lock-free snapshot for status displays
 */

import { join } from "path";
import { z } from "zod";

import { isDecision, parseCommand, type DecisionCommand } from "./auto";
import type { PausingJunctionType, ProposedAction } from "./classifier";
import type { Collaborators, Finding, JunctionRuling, Proposal } from "./collaborators";
import {
  ConfigError,
  STATE_FILES,
  consoleLogger,
  errorMessage,
  loadConfig,
  stateDir,
  type Logger,
  type SupervisorConfig,
} from "./config";
import {
  GearStateSchema,
  applyQualityGateOverride,
  createGearState,
  runGearStep,
  type GearMode,
  type GearState,
  type GearStepResult,
  type GearTransition,
} from "./gear";
import {
  JunctionManager,
  PausingTypeSchema,
  legacyPendingFrom,
  type HistoryEntry,
  type JunctionDecision,
  type PendingJunction,
  type SuppressionEntry,
} from "./junction";
import { StateBusyError, StateFile, parserFor, readJson, type LockOptions } from "./store";

// ─── Loop State ──────────────────────────────────────────────────────────────

const counter = z.number().int().nonnegative();

export const ProposedActionSchema = z.discriminatedUnion("kind", [
  z.object({ kind: z.literal("shell"), command: z.string() }),
  z.object({ kind: z.literal("control"), name: z.string() }),
  z.object({ kind: z.literal("output"), text: z.string() }),
  z.object({
    kind: z.literal("edit"),
    path: z.string(),
    risky: z.boolean(),
    reason: z.string().optional(),
  }),
]);

export const JunctionRulingSchema = z.object({
  fingerprint: z.string(),
  type: PausingTypeSchema,
  reason: z.string(),
});

export const LoopStateSchema = z.object({
  session_iterations: counter,
  stalled_iterations: counter,
  last_step_key: z.string().nullable(),
  stopped: z.boolean(),
  /** Fingerprints of approved actions not yet handed out */
  approved_actions: z.array(z.string()),
  skipped_actions: z.array(ProposedActionSchema),
  approved_junctions: z.array(JunctionRulingSchema).default([]),
  skipped_junctions: z.array(JunctionRulingSchema).default([]),
  updated_at: z.string().nullable(),
});
export type LoopState = z.infer<typeof LoopStateSchema>;

export const SKIPPED_ACTIONS_CAP = 10;

export function createLoopState(): LoopState {
  return {
    session_iterations: 0,
    stalled_iterations: 0,
    last_step_key: null,
    stopped: false,
    approved_actions: [],
    skipped_actions: [],
    approved_junctions: [],
    skipped_junctions: [],
    updated_at: null,
  };
}

/** Fresh counters; approvals and skips survive */
export function resetCounters(loop: LoopState, stopped: boolean, now: Date): LoopState {
  return {
    ...loop,
    session_iterations: 0,
    stalled_iterations: 0,
    last_step_key: null,
    stopped,
    updated_at: now.toISOString(),
  };
}

/**
 * Fold one gear step into the loop counters.
 *
 * Only completed plan steps count as progress. Another turn on the same
 * step without completing anything adds one to the stall count, whatever
 * the step proposed; a new step starts the count at one. A turn that paused
 * at a junction leaves the stall count alone.
 */
export function advanceLoop(
  loop: LoopState,
  step: GearStepResult,
  paused: boolean,
  maxIterations: number,
  now: Date,
): LoopState {
  const { step_key, advanced } = step.progress;
  const consumed = step.consumed_approvals;
  const session_iterations = loop.session_iterations + 1;

  let stalled = loop.stalled_iterations;
  let skipped = loop.skipped_actions;
  let skippedJunctions = loop.skipped_junctions;
  if (step_key === null) {
    stalled = 0;
    skipped = [];
    skippedJunctions = [];
  } else {
    if (step_key !== loop.last_step_key) {
      skipped = [];
      skippedJunctions = [];
    }
    if (!paused) {
      if (advanced) stalled = 0;
      else if (step_key === loop.last_step_key) stalled += 1;
      else stalled = 1;
    }
  }

  return {
    session_iterations,
    stalled_iterations: stalled,
    last_step_key: step_key,
    stopped: loop.stopped || session_iterations > maxIterations,
    approved_actions: loop.approved_actions.filter((fp) => !consumed.includes(fp)),
    skipped_actions: skipped,
    approved_junctions: loop.approved_junctions.filter((r) => !consumed.includes(r.fingerprint)),
    skipped_junctions: skippedJunctions,
    updated_at: now.toISOString(),
  };
}

// ─── Session ─────────────────────────────────────────────────────────────────

export interface SessionOptions {
  config?: Partial<SupervisorConfig>;
  logger?: Logger;
  now?: () => Date;
}

/** All state files of one project, opened with one configuration */
export interface Session {
  root: string;
  config: SupervisorConfig;
  stateDir: string;
  gear: StateFile<GearState>;
  loop: StateFile<LoopState>;
  junctions: JunctionManager;
  logger: Logger;
  now: () => Date;
}

export function openSession(projectRoot: string, opts: SessionOptions = {}): Session {
  const config = loadConfig(projectRoot, opts.config);
  const dir = stateDir(projectRoot, config);
  const lock: LockOptions = { timeoutMs: config.lock_timeout_ms, staleMs: config.lock_stale_ms };
  const now = opts.now ?? (() => new Date());
  const logger = opts.logger ?? consoleLogger;

  return {
    root: projectRoot,
    config,
    stateDir: dir,
    gear: new StateFile(join(dir, STATE_FILES.gear), parserFor(GearStateSchema), () => createGearState(now()), lock),
    loop: new StateFile(join(dir, STATE_FILES.loop), parserFor(LoopStateSchema), createLoopState, lock),
    junctions: new JunctionManager({
      stateDir: dir,
      lock,
      suppressMinutes: config.suppress_minutes,
      now,
      logger,
    }),
    logger,
    now,
  };
}

// ─── Result Types ────────────────────────────────────────────────────────────

export type DispatchOutcome =
  | "advanced"
  | "junction"
  | "idle"
  | "stopped"
  | "max_iterations"
  | "error";

export interface AppliedDecision {
  decision: JunctionDecision;
  junction_id: string;
  junction_type: PausingJunctionType;
}

export interface DispatchResult {
  outcome: DispatchOutcome;
  /** Mode whose behavior ran (or that was current when nothing ran) */
  mode: GearMode | null;
  transitioned: boolean;
  transition: GearTransition | null;
  new_mode: GearMode | null;
  junction_hit: boolean;
  junction_type: PausingJunctionType | null;
  junction_reason: string | null;
  junction_id: string | null;
  /** true → the host should invoke dispatch again without asking anyone */
  continue_loop: boolean;
  message: string;
  /** Next action for the host to run, when one was cleared to proceed */
  action: ProposedAction | null;
  findings: Finding[];
  proposals: Proposal[];
  decision: AppliedDecision | null;
  warnings: string[];
}

export interface DispatchOptions extends SessionOptions {
  collaborators: Collaborators;
  /** Raw human command for this turn: approve, skip, dismiss [m], stop, resume, "objective" */
  command?: string | null;
}

type ResultFields = Partial<DispatchResult> & Pick<DispatchResult, "outcome" | "message">;

function buildResult(fields: ResultFields): DispatchResult {
  return {
    mode: null,
    transitioned: false,
    transition: null,
    new_mode: null,
    junction_hit: false,
    junction_type: null,
    junction_reason: null,
    junction_id: null,
    continue_loop: false,
    action: null,
    findings: [],
    proposals: [],
    decision: null,
    warnings: [],
    ...fields,
  };
}

/** Human-readable reason stored in a junction payload */
export function junctionReason(junction: PendingJunction): string {
  const reason = junction.payload["reason"];
  return typeof reason === "string" && reason.length > 0 ? reason : `${junction.type} junction`;
}

function junctionFields(junction: PendingJunction): Partial<DispatchResult> {
  return {
    junction_hit: true,
    junction_type: junction.type,
    junction_reason: junctionReason(junction),
    junction_id: junction.id,
  };
}

function pausedMessage(junction: PendingJunction): string {
  return `paused at ${junction.type} junction: ${junctionReason(junction)} (approve | skip | dismiss [minutes] | stop)`;
}

// ─── Decisions ───────────────────────────────────────────────────────────────

const ActionPayloadSchema = z.object({
  kind: z.literal("action"),
  fingerprint: z.string(),
  action: ProposedActionSchema,
});

/** A junction the step raised itself (executor or output scan) */
const StepJunctionPayloadSchema = z.object({
  kind: z.enum(["executor", "output"]),
  fingerprint: z.string(),
});

const QualityGatePayloadSchema = z.object({
  kind: z.literal("quality_gate"),
  objective: z.string(),
  failures: z.array(z.object({ check: z.string(), message: z.string() })),
});

/** Resolve the pending junction and record what the decision means downstream */
function applyDecision(
  session: Session,
  command: DecisionCommand,
  warnings: string[],
): AppliedDecision | null {
  const cleared = session.junctions.clearPending(
    command.kind,
    command.kind === "dismiss" ? command.minutes : null,
  );
  if (!cleared) {
    warnings.push(`no pending junction to ${command.kind}`);
    return null;
  }
  const now = session.now();

  const action = ActionPayloadSchema.safeParse(cleared.payload);
  if (action.success && command.kind !== "dismiss") {
    const { fingerprint, action: proposed } = action.data;
    session.loop.update((loop) => ({
      next:
        command.kind === "approve"
          ? {
              ...loop,
              approved_actions: [...loop.approved_actions.filter((fp) => fp !== fingerprint), fingerprint],
              updated_at: now.toISOString(),
            }
          : {
              ...loop,
              skipped_actions: [...loop.skipped_actions, proposed].slice(-SKIPPED_ACTIONS_CAP),
              updated_at: now.toISOString(),
            },
      result: null,
    }));
  }

  const raised = StepJunctionPayloadSchema.safeParse(cleared.payload);
  if (raised.success && command.kind !== "dismiss") {
    const ruling: JunctionRuling = {
      fingerprint: raised.data.fingerprint,
      type: cleared.type,
      reason: junctionReason(cleared),
    };
    session.loop.update((loop) => ({
      next:
        command.kind === "approve"
          ? {
              ...loop,
              approved_junctions: [
                ...loop.approved_junctions.filter((r) => r.fingerprint !== ruling.fingerprint),
                ruling,
              ],
              updated_at: now.toISOString(),
            }
          : {
              ...loop,
              skipped_junctions: [...loop.skipped_junctions, ruling].slice(-SKIPPED_ACTIONS_CAP),
              updated_at: now.toISOString(),
            },
      result: null,
    }));
  }

  const gate = QualityGatePayloadSchema.safeParse(cleared.payload);
  if (gate.success && command.kind === "approve") {
    const { objective, failures } = gate.data;
    const checks = failures.map((f) => f.check);
    session.gear.update((gear) => ({
      next: applyQualityGateOverride(gear, objective, checks, now),
      result: null,
    }));
  }

  return { decision: command.kind, junction_id: cleared.id, junction_type: cleared.type };
}

/**
 * Apply a human decision outside a turn (e.g. from the CLI). The next
 * dispatch() sees the junction cleared and any approval or skip recorded.
 */
export function decide(
  projectRoot: string,
  command: DecisionCommand,
  opts: SessionOptions = {},
): { decision: AppliedDecision | null; warnings: string[] } {
  const session = openSession(projectRoot, opts);
  session.junctions.migrate();
  const warnings: string[] = [];
  return { decision: applyDecision(session, command, warnings), warnings };
}

// ─── Main Dispatch Function ──────────────────────────────────────────────────

/**
 * Run one turn. Order of business:
 *   1. migrate legacy junction state, parse the human command
 *   2. apply stop/resume/objective and any junction decision
 *   3. a junction still pending → surface it, do not advance
 *   4. advance the gear one step; a pausing verdict → set pending, surface it
 *   5. count the iteration; past max_iterations → forced stop
 *   6. stuck detection → synthetic ambiguous junction
 */
export async function dispatch(projectRoot: string, options: DispatchOptions): Promise<DispatchResult> {
  const logger = options.logger ?? consoleLogger;
  const trace: TurnTrace = { warnings: [], gear_saved: false };
  try {
    return await runTurn(projectRoot, options, trace);
  } catch (err) {
    const detail = errorMessage(err);
    logger.warn(`[dispatch] ${detail}`);
    let message = "internal error: state unchanged, safe to retry";
    if (trace.gear_saved) message = "internal error after the gear step was saved; check status before retrying";
    else if (err instanceof StateBusyError) message = "state busy, retry";
    else if (err instanceof ConfigError) message = detail;
    return buildResult({ outcome: "error", message, warnings: [...trace.warnings, detail] });
  }
}

/** What a turn has done so far, for reporting a failure halfway through */
interface TurnTrace {
  warnings: string[];
  /** The gear step is on disk; a later failure leaves the turn partly applied */
  gear_saved: boolean;
}

async function runTurn(
  projectRoot: string,
  options: DispatchOptions,
  trace: TurnTrace,
): Promise<DispatchResult> {
  const { warnings } = trace;
  const session = openSession(projectRoot, options);
  const { config, junctions, logger } = session;
  const plan = options.collaborators.plan;

  const migration = junctions.migrate();
  if (migration.status === "imported") {
    warnings.push(`imported legacy junction ${migration.pending.id}`);
  }

  const command = parseCommand(options.command ?? "");

  // ── Loop control ──
  if (command.kind === "stop") {
    session.loop.update((loop) => ({ next: resetCounters(loop, true, session.now()), result: null }));
    const mode = session.gear.read().mode;
    const pending = junctions.getPending();
    return buildResult({
      outcome: "stopped",
      mode,
      new_mode: mode,
      message: pending
        ? `autonomous loop stopped; junction ${pending.id} is still pending`
        : "autonomous loop stopped",
      warnings,
    });
  }

  if (command.kind === "resume") {
    session.loop.update((loop) => ({ next: resetCounters(loop, false, session.now()), result: null }));
  }

  if (command.kind === "objective") {
    if (plan.setObjective) {
      await plan.setObjective(command.text);
      session.loop.update((loop) => ({ next: resetCounters(loop, false, session.now()), result: null }));
    } else {
      warnings.push(`plan source does not accept objectives; "${command.text}" ignored`);
    }
  }

  if (command.kind === "unknown") {
    warnings.push(`unrecognized command "${command.text}" ignored`);
    logger.warn(`[dispatch] unrecognized command "${command.text}"`);
  }

  // ── Human decision ──
  const decision = isDecision(command) ? applyDecision(session, command, warnings) : null;

  // ── Outstanding junction: never advance past it ──
  const pending = junctions.getPending();
  if (pending) {
    const mode = session.gear.read().mode;
    return buildResult({
      outcome: "junction",
      mode,
      new_mode: mode,
      ...junctionFields(pending),
      message: pausedMessage(pending),
      decision,
      warnings,
    });
  }

  const loop = session.loop.read();
  if (loop.stopped) {
    const mode = session.gear.read().mode;
    return buildResult({
      outcome: "stopped",
      mode,
      new_mode: mode,
      message: "autonomous loop is stopped; send resume to continue",
      decision,
      warnings,
    });
  }

  // ── Advance the gear ──
  const snapshot = session.gear.load();
  const step = await runGearStep(snapshot.value, {
    collaborators: options.collaborators,
    config,
    approved_actions: loop.approved_actions,
    skipped_actions: loop.skipped_actions,
    approved_junctions: loop.approved_junctions,
    skipped_junctions: loop.skipped_junctions,
    now: session.now,
  });

  if (!session.gear.replaceIf(snapshot, step.state)) {
    warnings.push("gear state changed by another turn; this step was discarded");
    return buildResult({
      outcome: "error",
      mode: snapshot.value.mode,
      message: "state busy, retry",
      decision,
      warnings,
    });
  }
  trace.gear_saved = true;

  if (step.error) {
    warnings.push(`${step.mode}: ${step.message}: ${step.error}`);
    logger.warn(`[dispatch] ${step.mode} step error: ${step.error}`);
  }

  const last = step.transitions[step.transitions.length - 1] ?? null;
  const stepFields: Partial<DispatchResult> = {
    mode: step.mode,
    transitioned: last !== null,
    transition: last,
    new_mode: step.state.mode,
    findings: step.findings,
    proposals: step.proposals,
    decision,
    warnings,
  };

  // ── Junction raised by the step ──
  let raised: PendingJunction | null = null;
  if (step.junction) {
    const set = junctions.setPending(
      step.junction.type,
      { reason: step.junction.reason, ...step.junction.payload },
      step.junction.source,
    );
    if (set.status === "pending") {
      raised = set.junction;
    } else {
      warnings.push(`${step.junction.type} junction dismissed until ${set.expires_at}: ${step.junction.reason}`);
    }
  }

  // ── Iteration counters ──
  const counters = session.loop.update((current) => {
    const next = advanceLoop(current, step, raised !== null, config.max_iterations, session.now());
    return { next, result: next };
  });

  if (raised) {
    return buildResult({
      ...stepFields,
      outcome: "junction",
      ...junctionFields(raised),
      message: pausedMessage(raised),
    });
  }

  if (counters.session_iterations > config.max_iterations) {
    logger.warn(`[dispatch] max iterations (${config.max_iterations}) reached; loop stopped`);
    return buildResult({
      ...stepFields,
      outcome: "max_iterations",
      message: `max iterations (${config.max_iterations}) reached; loop stopped, send resume to continue`,
    });
  }

  // ── Stuck detection ──
  const key = step.progress.step_key;
  if (key !== null && counters.stalled_iterations >= config.stuck_threshold) {
    const reason = `no progress on "${key}" for ${counters.stalled_iterations} iterations`;
    const stuck = junctions.setPending("ambiguous", { kind: "stuck", reason, step: key }, "stuck_detector");
    session.loop.update((current) => ({
      next: { ...current, stalled_iterations: 0, updated_at: session.now().toISOString() },
      result: null,
    }));
    if (stuck.status === "pending") {
      return buildResult({
        ...stepFields,
        outcome: "junction",
        ...junctionFields(stuck.junction),
        message: pausedMessage(stuck.junction),
      });
    }
    warnings.push(`stuck junction dismissed until ${stuck.expires_at}: ${reason}`);
  }

  // ── Nothing to do ──
  if (step.state.mode === "dream") {
    return buildResult({ ...stepFields, outcome: "idle", message: step.message });
  }

  return buildResult({
    ...stepFields,
    outcome: "advanced",
    continue_loop: true,
    action: step.action,
    message: step.message,
  });
}

// ─── Status ──────────────────────────────────────────────────────────────────

export interface SessionStatus {
  project_root: string;
  state_dir: string;
  gear: GearState;
  pending: PendingJunction | null;
  /** An open junction in the legacy file that migrate() has not imported yet */
  legacy_pending: PendingJunction | null;
  history: HistoryEntry[];
  suppression: SuppressionEntry[];
  loop: LoopState;
}

/** Read-only snapshot; takes no locks and writes nothing */
export function queryStatus(projectRoot: string, opts: SessionOptions = {}): SessionStatus {
  const session = openSession(projectRoot, opts);
  const junction = session.junctions.snapshot();
  const now = session.now();

  return {
    project_root: session.root,
    state_dir: session.stateDir,
    gear: session.gear.read(),
    pending: junction.pending,
    legacy_pending: session.junctions.isCurrent()
      ? null
      : legacyPendingFrom(readJson(session.junctions.legacyPath), now),
    history: junction.history_tail,
    suppression: junction.suppression.filter((s) => Date.parse(s.expires_at) > now.getTime()),
    loop: session.loop.read(),
  };
}
