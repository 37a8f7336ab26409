/**
 * collaborators.ts — External Collaborator Interfaces
 *
 * The supervisor decides *whether* to act; these do the acting. Plan text,
 * step execution, quality checks, patrol scans and dream proposals all live
 * outside this package and are injected per dispatch call. None of them may
 * touch gear or junction state.
 */

import type { PausingJunctionType, ProposedAction } from "./classifier";

export type Awaitable<T> = T | Promise<T>;

// ─── Plan ────────────────────────────────────────────────────────────────────

export type StepStatus = "pending" | "in_progress" | "completed" | "skipped" | "blocked";

export interface PlanStep {
  /** Stable id if the planner has one; otherwise index + description identify the step */
  id?: string;
  description: string;
  status: StepStatus;
}

export interface PlanSnapshot {
  objective: string | null;
  steps: PlanStep[];
}

export interface PlanSource {
  load(): Awaitable<PlanSnapshot>;
  /** Accept a new objective typed by the human (optional capability) */
  setObjective?(objective: string): Awaitable<void>;
}

// ─── ACTIVE ──────────────────────────────────────────────────────────────────

/** A junction a step raised earlier, as the human decided it */
export interface JunctionRuling {
  fingerprint: string;
  type: PausingJunctionType;
  reason: string;
}

export interface StepContext {
  plan: PlanSnapshot;
  step: PlanStep;
  step_index: number;
  /** Actions the human skipped for this step: propose something else */
  skipped_actions: ProposedAction[];
  /** Raising one of these again proceeds once instead of pausing */
  approved_junctions: JunctionRuling[];
  /** The human said not to go this way: take another path */
  skipped_junctions: JunctionRuling[];
}

export interface StepOutcome {
  steps_completed: number;
  objective_completed?: boolean;
  /** What the step wants to run next; it goes through the classifier */
  proposed_action?: ProposedAction | null;
  /** The executor hit a decision point on its own */
  junction?: { type: PausingJunctionType; reason: string } | null;
  /** Free text produced by the step; scanned for blocked/ambiguous signals */
  output?: string | null;
  error?: string | null;
}

export interface StepExecutor {
  executeStep(ctx: StepContext): Awaitable<StepOutcome>;
}

export interface QualityCheckFailure {
  check: string;
  message: string;
}

export interface QualityGateResult {
  passed: boolean;
  failures: QualityCheckFailure[];
}

export interface QualityGate {
  run(plan: PlanSnapshot): Awaitable<QualityGateResult>;
}

// ─── PATROL / DREAM ──────────────────────────────────────────────────────────

export interface Finding {
  title: string;
  detail?: string;
}

export interface IssueScanner {
  scan(plan: PlanSnapshot): Awaitable<Finding[]>;
}

export interface Proposal {
  objective: string;
  rationale?: string;
}

export interface DreamConsolidator {
  propose(plan: PlanSnapshot): Awaitable<Proposal[]>;
}

export interface Collaborators {
  plan: PlanSource;
  executor: StepExecutor;
  qualityGate: QualityGate;
  scanner: IssueScanner;
  dreamer: DreamConsolidator;
}
