/**
 * gear.ts — Gear State Machine
 *
 * Three operating modes:
 *   active  — an objective with unfinished steps; run the next step
 *   patrol  — nothing left to do; scan for new issues
 *   dream   — fully idle; consolidate and propose new objectives
 *
 * Transitions are a closed table of five edges. Everything here is a
 * function of (GearState, plan) → new GearState; persistence belongs to the
 * caller. Collaborator failures come back as data in `error`, never thrown.
 */

import { createHash } from "crypto";
import { z } from "zod";

import { errorMessage, type SupervisorConfig } from "./config";
import {
  classifyAction,
  describeAction,
  detectOutputJunction,
  isPausing,
  type PausingJunctionType,
  type ProposedAction,
} from "./classifier";
import type {
  Collaborators,
  Finding,
  JunctionRuling,
  PlanSnapshot,
  PlanStep,
  Proposal,
  QualityCheckFailure,
  QualityGateResult,
  StepOutcome,
} from "./collaborators";
import type { JunctionPayload } from "./junction";
import { stableStringify } from "./store";

// ─── Modes + Transitions ─────────────────────────────────────────────────────

export const GearModeSchema = z.enum(["active", "patrol", "dream"]);
export type GearMode = z.infer<typeof GearModeSchema>;

export const GearTransitionSchema = z.enum([
  "active_to_patrol",
  "patrol_to_active",
  "patrol_to_dream",
  "active_to_dream",
  "dream_to_active",
]);
export type GearTransition = z.infer<typeof GearTransitionSchema>;

/** The only legal edges */
export const TRANSITIONS: Readonly<Record<GearTransition, { from: GearMode; to: GearMode }>> = {
  active_to_patrol: { from: "active", to: "patrol" },
  patrol_to_active: { from: "patrol", to: "active" },
  patrol_to_dream: { from: "patrol", to: "dream" },
  active_to_dream: { from: "active", to: "dream" },
  dream_to_active: { from: "dream", to: "active" },
};

export class InvalidTransitionError extends Error {
  public readonly from: GearMode;
  public readonly transition: string;

  public constructor(from: GearMode, transition: string) {
    super(`Invalid gear transition "${transition}" from mode "${from}"`);
    this.name = "InvalidTransitionError";
    this.from = from;
    this.transition = transition;
  }
}

// ─── State ───────────────────────────────────────────────────────────────────

const counter = z.number().int().nonnegative();

export const QualityGateOverrideSchema = z.object({
  objective: z.string(),
  checks: z.array(z.string()),
  approved_at: z.string(),
});
export type QualityGateOverride = z.infer<typeof QualityGateOverrideSchema>;

export const GearStateSchema = z.object({
  mode: GearModeSchema,
  entered_at: z.string(),
  iterations: counter,
  last_transition: GearTransitionSchema.nullable(),
  patrol_findings_count: counter,
  dream_proposals_count: counter,
  empty_patrol_passes: counter,
  quality_gate_override: QualityGateOverrideSchema.nullable(),
});
export type GearState = z.infer<typeof GearStateSchema>;

export function createGearState(now: Date = new Date()): GearState {
  return {
    mode: "active",
    entered_at: now.toISOString(),
    iterations: 0,
    last_transition: null,
    patrol_findings_count: 0,
    dream_proposals_count: 0,
    empty_patrol_passes: 0,
    quality_gate_override: null,
  };
}

export function isGearTransition(value: string): value is GearTransition {
  return GearTransitionSchema.safeParse(value).success;
}

/** The edge from → to, or null when no legal edge exists */
export function findTransition(from: GearMode, to: GearMode): GearTransition | null {
  for (const name of GearTransitionSchema.options) {
    const edge = TRANSITIONS[name];
    if (edge.from === from && edge.to === to) return name;
  }
  return null;
}

/**
 * Apply one transition. Throws InvalidTransitionError (input untouched) when
 * the name is unknown or does not start at the current mode.
 */
export function executeTransition(
  state: GearState,
  transition: string,
  now: Date = new Date(),
): GearState {
  if (!isGearTransition(transition) || TRANSITIONS[transition].from !== state.mode) {
    throw new InvalidTransitionError(state.mode, transition);
  }
  const edge = TRANSITIONS[transition];
  return {
    ...state,
    mode: edge.to,
    entered_at: now.toISOString(),
    iterations: 0,
    last_transition: transition,
    empty_patrol_passes: 0,
    // The override is scoped to one ACTIVE run
    quality_gate_override: edge.from === "active" ? null : state.quality_gate_override,
  };
}

export function transitionTo(
  state: GearState,
  target: GearMode,
  now: Date = new Date(),
): { state: GearState; transition: GearTransition } {
  const transition = findTransition(state.mode, target);
  if (!transition) {
    throw new InvalidTransitionError(state.mode, `${state.mode}_to_${target}`);
  }
  return { state: executeTransition(state, transition, now), transition };
}

export function applyQualityGateOverride(
  state: GearState,
  objective: string,
  checks: string[],
  now: Date = new Date(),
): GearState {
  return {
    ...state,
    quality_gate_override: {
      objective,
      checks: [...new Set(checks)].sort(),
      approved_at: now.toISOString(),
    },
  };
}

// ─── Plan Inspection ─────────────────────────────────────────────────────────

function isUnfinished(step: PlanStep): boolean {
  return step.status !== "completed" && step.status !== "skipped";
}

function hasObjective(plan: PlanSnapshot): plan is PlanSnapshot & { objective: string } {
  return typeof plan.objective === "string" && plan.objective.trim().length > 0;
}

export function nextUnfinishedStep(plan: PlanSnapshot): { step: PlanStep; index: number } | null {
  const index = plan.steps.findIndex(isUnfinished);
  const step = index >= 0 ? plan.steps[index] : undefined;
  return step ? { step, index } : null;
}

/** "active" iff there is an objective and an unfinished step; else "patrol" */
export function detectCurrentGear(plan: PlanSnapshot): GearMode {
  return hasObjective(plan) && nextUnfinishedStep(plan) !== null ? "active" : "patrol";
}

export function stepKey(step: PlanStep, index: number): string {
  return step.id ?? `${index}:${step.description.trim()}`;
}

function shortHash(value: unknown): string {
  return createHash("sha256").update(stableStringify(value)).digest("hex").slice(0, 16);
}

export function actionFingerprint(action: ProposedAction): string {
  return shortHash(action);
}

/** Identity of a junction a step raised itself; stable while step and reason stay the same */
export function stepJunctionFingerprint(
  source: "executor" | "output",
  step: string,
  type: PausingJunctionType,
  reason: string,
): string {
  return shortHash({ source, step, type, reason });
}

function overrideCovers(
  override: QualityGateOverride | null,
  objective: string,
  failures: QualityCheckFailure[],
): boolean {
  if (!override || override.objective !== objective) return false;
  return failures.every((f) => override.checks.includes(f.check));
}

// ─── One Step ────────────────────────────────────────────────────────────────

export interface GearJunction {
  type: PausingJunctionType;
  reason: string;
  payload: JunctionPayload;
  source: string;
}

export interface GearStepContext {
  collaborators: Collaborators;
  config: Pick<SupervisorConfig, "patrol_empty_limit">;
  /** Fingerprints of actions a human approved and that have not run yet */
  approved_actions: string[];
  skipped_actions: ProposedAction[];
  approved_junctions: JunctionRuling[];
  skipped_junctions: JunctionRuling[];
  now: () => Date;
}

export interface StepProgress {
  /** Identity of the work unit; null outside ACTIVE */
  step_key: string | null;
  /** At least one plan step completed */
  advanced: boolean;
}

export interface GearStepResult {
  state: GearState;
  /** Mode whose behavior ran this turn */
  mode: GearMode;
  /** Transitions applied this turn, in order */
  transitions: GearTransition[];
  junction: GearJunction | null;
  /** Safe (or approved) action for the caller to run next */
  action: ProposedAction | null;
  /** Approved action and junction fingerprints used up this turn */
  consumed_approvals: string[];
  progress: StepProgress;
  findings: Finding[];
  proposals: Proposal[];
  error: string | null;
  message: string;
}

const NO_PROGRESS: StepProgress = { step_key: null, advanced: false };

function emptyResult(state: GearState, transitions: GearTransition[], message: string): GearStepResult {
  return {
    state,
    mode: state.mode,
    transitions,
    junction: null,
    action: null,
    consumed_approvals: [],
    progress: NO_PROGRESS,
    findings: [],
    proposals: [],
    error: null,
    message,
  };
}

/**
 * Advance one step: switch to ACTIVE if the plan has work, then run the
 * current mode's behavior once.
 */
export async function runGearStep(state: GearState, ctx: GearStepContext): Promise<GearStepResult> {
  let plan: PlanSnapshot;
  try {
    plan = await ctx.collaborators.plan.load();
  } catch (err) {
    const failed = { ...state, iterations: state.iterations + 1 };
    return { ...emptyResult(failed, [], "could not load plan"), error: errorMessage(err) };
  }

  let current = state;
  const transitions: GearTransition[] = [];
  if (detectCurrentGear(plan) === "active" && current.mode !== "active") {
    const moved = transitionTo(current, "active", ctx.now());
    current = moved.state;
    transitions.push(moved.transition);
  }

  switch (current.mode) {
    case "active":
      return runActive(current, plan, ctx, transitions);
    case "patrol":
      return runPatrol(current, plan, ctx, transitions);
    case "dream":
      return runDream(current, plan, ctx, transitions);
  }
}

// ─── ACTIVE ──────────────────────────────────────────────────────────────────

async function runActive(
  state: GearState,
  plan: PlanSnapshot,
  ctx: GearStepContext,
  transitions: GearTransition[],
): Promise<GearStepResult> {
  const stepped: GearState = { ...state, iterations: state.iterations + 1 };
  const next = nextUnfinishedStep(plan);

  if (!next || !hasObjective(plan)) {
    if (!hasObjective(plan) && plan.steps.length === 0) {
      const moved = transitionTo(stepped, "dream", ctx.now());
      return {
        ...emptyResult(moved.state, [...transitions, moved.transition], "no objective and no plan; dreaming"),
        mode: "active",
      };
    }
    return completeObjective(stepped, plan, ctx, transitions, emptyResult(stepped, transitions, ""));
  }

  const key = stepKey(next.step, next.index);
  let outcome: StepOutcome;
  try {
    outcome = await ctx.collaborators.executor.executeStep({
      plan,
      step: next.step,
      step_index: next.index,
      skipped_actions: ctx.skipped_actions,
      approved_junctions: ctx.approved_junctions,
      skipped_junctions: ctx.skipped_junctions,
    });
  } catch (err) {
    return {
      ...emptyResult(stepped, transitions, `step "${key}" failed`),
      progress: { step_key: key, advanced: false },
      error: errorMessage(err),
    };
  }

  const advanced = outcome.steps_completed > 0;
  const base: GearStepResult = {
    ...emptyResult(stepped, transitions, ""),
    progress: { step_key: key, advanced },
  };

  if (outcome.error) {
    return { ...base, error: outcome.error, message: `step "${key}" reported an error` };
  }

  // ── Junctions the step raised itself: executor first, then output signals ──
  // Approvals are used up only by a turn that goes through without pausing.
  const consumed: string[] = [];
  for (const raised of stepJunctions(key, outcome)) {
    const fp = raised.fingerprint;
    if (ctx.skipped_junctions.some((r) => r.fingerprint === fp)) {
      return {
        ...base,
        message: `step "${key}" raised a skipped ${raised.junction.type} junction again (${raised.junction.reason}); not running it`,
      };
    }
    if (ctx.approved_junctions.some((r) => r.fingerprint === fp)) {
      consumed.push(fp);
      continue;
    }
    return { ...base, junction: raised.junction, message: raised.message };
  }

  // ── Proposed action ──
  let action: ProposedAction | null = null;
  if (outcome.proposed_action) {
    const proposed = outcome.proposed_action;
    const fp = actionFingerprint(proposed);

    if (ctx.skipped_actions.some((a) => actionFingerprint(a) === fp)) {
      return {
        ...base,
        message: `step "${key}" re-proposed a skipped action (${describeAction(proposed)}); not running it`,
      };
    }

    const verdict = classifyAction(proposed);
    if (isPausing(verdict.type) && !ctx.approved_actions.includes(fp)) {
      const reason = verdict.reason ?? verdict.type;
      return {
        ...base,
        junction: {
          type: verdict.type,
          reason,
          payload: { kind: "action", step: key, fingerprint: fp, action: proposed },
          source: "classifier",
        },
        message: `${describeAction(proposed)} needs a decision: ${reason}`,
      };
    }
    if (isPausing(verdict.type)) consumed.push(fp);
    action = proposed;
  }

  const approvedNote = consumed.length > 0 ? " (approved)" : "";
  const result: GearStepResult = {
    ...base,
    action,
    consumed_approvals: consumed,
    message: action
      ? `step "${key}": ${describeAction(action)}${approvedNote}`
      : `step "${key}": ${outcome.steps_completed} step(s) completed${approvedNote}`,
  };

  if (outcome.objective_completed) {
    return completeObjective(stepped, plan, ctx, transitions, result);
  }
  return result;
}

interface RaisedStepJunction {
  junction: GearJunction;
  fingerprint: string;
  message: string;
}

function stepJunctions(key: string, outcome: StepOutcome): RaisedStepJunction[] {
  const raised: RaisedStepJunction[] = [];

  if (outcome.junction) {
    const { type, reason } = outcome.junction;
    const fingerprint = stepJunctionFingerprint("executor", key, type, reason);
    raised.push({
      junction: {
        type,
        reason,
        payload: { kind: "executor", step: key, fingerprint, reason },
        source: "executor",
      },
      fingerprint,
      message: `step "${key}" raised a junction: ${reason}`,
    });
  }

  if (outcome.output) {
    const verdict = detectOutputJunction(outcome.output);
    if (isPausing(verdict.type)) {
      const reason = verdict.reason ?? verdict.type;
      const fingerprint = stepJunctionFingerprint("output", key, verdict.type, reason);
      raised.push({
        junction: {
          type: verdict.type,
          reason,
          payload: { kind: "output", step: key, fingerprint, excerpt: outcome.output.trim().slice(0, 200) },
          source: "output",
        },
        fingerprint,
        message: `step "${key}" output needs attention: ${reason}`,
      });
    }
  }

  return raised;
}

/** Objective done: run the quality gate, then leave for PATROL or pause */
async function completeObjective(
  state: GearState,
  plan: PlanSnapshot,
  ctx: GearStepContext,
  transitions: GearTransition[],
  base: GearStepResult,
): Promise<GearStepResult> {
  if (!hasObjective(plan)) {
    const moved = transitionTo(state, "patrol", ctx.now());
    return {
      ...base,
      state: moved.state,
      transitions: [...transitions, moved.transition],
      message: "plan finished without an objective; patrolling",
    };
  }

  let gate: QualityGateResult;
  try {
    gate = await ctx.collaborators.qualityGate.run(plan);
  } catch (err) {
    return {
      ...base,
      progress: { step_key: "quality_gate", advanced: false },
      error: errorMessage(err),
      message: "quality gate could not run",
    };
  }

  const override = !gate.passed && overrideCovers(state.quality_gate_override, plan.objective, gate.failures);
  if (gate.passed || override) {
    const moved = transitionTo(state, "patrol", ctx.now());
    return {
      ...base,
      state: moved.state,
      transitions: [...transitions, moved.transition],
      message: override
        ? `objective complete; quality gate overridden (${gate.failures.map((f) => f.check).join(", ")})`
        : "objective complete; quality gate passed",
    };
  }

  const checks = gate.failures.map((f) => f.check);
  const reason = `quality gate failed: ${checks.length > 0 ? checks.join(", ") : "unspecified"}`;
  return {
    ...base,
    progress: { step_key: "quality_gate", advanced: false },
    junction: {
      type: "ambiguous",
      reason,
      payload: { kind: "quality_gate", objective: plan.objective, failures: gate.failures },
      source: "quality_gate",
    },
    message: reason,
  };
}

// ─── PATROL ──────────────────────────────────────────────────────────────────

async function runPatrol(
  state: GearState,
  plan: PlanSnapshot,
  ctx: GearStepContext,
  transitions: GearTransition[],
): Promise<GearStepResult> {
  let findings: Finding[];
  try {
    findings = await ctx.collaborators.scanner.scan(plan);
  } catch (err) {
    const failed = { ...state, iterations: state.iterations + 1 };
    return { ...emptyResult(failed, transitions, "patrol scan failed"), error: errorMessage(err) };
  }

  const scanned: GearState = {
    ...state,
    iterations: state.iterations + 1,
    patrol_findings_count: state.patrol_findings_count + findings.length,
    empty_patrol_passes: findings.length === 0 ? state.empty_patrol_passes + 1 : 0,
  };

  if (scanned.empty_patrol_passes >= ctx.config.patrol_empty_limit) {
    const moved = transitionTo(scanned, "dream", ctx.now());
    return {
      ...emptyResult(moved.state, [...transitions, moved.transition], `patrol found nothing ${scanned.empty_patrol_passes} time(s); dreaming`),
      mode: "patrol",
    };
  }

  return {
    ...emptyResult(scanned, transitions, `patrol: ${findings.length} finding(s)`),
    findings,
  };
}

// ─── DREAM ───────────────────────────────────────────────────────────────────

async function runDream(
  state: GearState,
  plan: PlanSnapshot,
  ctx: GearStepContext,
  transitions: GearTransition[],
): Promise<GearStepResult> {
  let proposals: Proposal[];
  try {
    proposals = await ctx.collaborators.dreamer.propose(plan);
  } catch (err) {
    const failed = { ...state, iterations: state.iterations + 1 };
    return { ...emptyResult(failed, transitions, "dream consolidation failed"), error: errorMessage(err) };
  }

  const dreamed: GearState = {
    ...state,
    iterations: state.iterations + 1,
    dream_proposals_count: state.dream_proposals_count + proposals.length,
  };
  return {
    ...emptyResult(dreamed, transitions, `dream: ${proposals.length} proposal(s); nothing to do`),
    proposals,
  };
}
