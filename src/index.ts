/**
 * Edge Supervisor — control core
 *
 * Five modules, one turn:
 *   store.ts      → locked, atomically replaced JSON state files
 *   classifier.ts → proposed action → junction type (pure rule tables)
 *   junction.ts   → the single pending decision, suppression, history
 *   gear.ts       → active / patrol / dream state machine
 *   dispatch.ts   → one turn: decisions, gear step, iteration + stuck limits
 */

// Config
export {
  type SupervisorConfig,
  type Logger,
  ConfigError,
  DEFAULT_CONFIG,
  HISTORY_CAP,
  STATE_FILES,
  consoleLogger,
  configPath,
  loadConfig,
  resolveProjectDir,
  stateDir,
} from "./config";

// Store
export {
  type LockOptions,
  type LockMetadata,
  type LockHolder,
  type Parser,
  type Snapshot,
  type Mutation,
  StateBusyError,
  StateFile,
  acquireLock,
  breakStaleLock,
  withFileLock,
  writeJsonAtomic,
  stableStringify,
  parserFor,
} from "./store";

// Classifier
export {
  type JunctionType,
  type PausingJunctionType,
  type ProposedAction,
  type PatternRule,
  type Verdict,
  PAUSING_JUNCTION_TYPES,
  SHELL_PRECEDENCE,
  SHELL_RULES,
  SAFE_CONTROL_COMMANDS,
  OUTPUT_PRECEDENCE,
  OUTPUT_RULES,
  isPausing,
  classifyShellCommand,
  matchShellCommand,
  classifyControlCommand,
  detectOutputJunction,
  classifyAction,
  describeAction,
} from "./classifier";

// Junctions
export {
  type JunctionState,
  type PendingJunction,
  type HistoryEntry,
  type SuppressionEntry,
  type JunctionDecision,
  type JunctionPayload,
  type SetPendingResult,
  type MigrationResult,
  JUNCTION_SCHEMA_VERSION,
  JunctionManager,
  fingerprint,
} from "./junction";

// Gear
export {
  type GearMode,
  type GearTransition,
  type GearState,
  type GearStepResult,
  type QualityGateOverride,
  TRANSITIONS,
  InvalidTransitionError,
  createGearState,
  findTransition,
  executeTransition,
  transitionTo,
  detectCurrentGear,
  runGearStep,
  stepJunctionFingerprint,
} from "./gear";

// Collaborators
export type {
  Collaborators,
  PlanSource,
  PlanSnapshot,
  PlanStep,
  StepStatus,
  StepContext,
  StepOutcome,
  JunctionRuling,
  StepExecutor,
  QualityGate,
  QualityGateResult,
  QualityCheckFailure,
  IssueScanner,
  Finding,
  DreamConsolidator,
  Proposal,
} from "./collaborators";

// Commands
export { type TurnCommand, type DecisionCommand, parseCommand, isDecision } from "./auto";

// Dispatch
export {
  type DispatchResult,
  type DispatchOutcome,
  type DispatchOptions,
  type AppliedDecision,
  type LoopState,
  type SessionStatus,
  type Session,
  dispatch,
  decide,
  queryStatus,
  openSession,
} from "./dispatch";
