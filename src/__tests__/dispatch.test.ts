import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from "fs";
import { join } from "path";
import { tmpdir } from "os";

import type { ProposedAction } from "../classifier";
import type {
  Collaborators,
  PlanSnapshot,
  QualityCheckFailure,
  StepContext,
  StepOutcome,
} from "../collaborators";
import type { SupervisorConfig } from "../config";
import { dispatch, decide, queryStatus, type DispatchResult } from "../dispatch";
import { stepJunctionFingerprint } from "../gear";

const START = Date.parse("2025-03-01T12:00:00.000Z");

const RM_BUILD: ProposedAction = { kind: "shell", command: "rm -rf build/" };

const CLEAN_PLAN: PlanSnapshot = {
  objective: "Clean the build",
  steps: [{ id: "clean", description: "remove build output", status: "pending" }],
};

describe("dispatch", () => {
  let tempDir: string;
  let clock: number;
  let warn: ReturnType<typeof vi.fn>;

  beforeEach(() => {
    tempDir = mkdtempSync(join(tmpdir(), "dispatch-test-"));
    clock = START;
    warn = vi.fn();
  });

  afterEach(() => {
    rmSync(tempDir, { recursive: true, force: true });
  });

  /** Helper: stub collaborators around a fixed plan */
  function collaborators(plan: PlanSnapshot, overrides: Partial<Collaborators> = {}): Collaborators {
    return {
      plan: { load: () => plan },
      executor: { executeStep: () => ({ steps_completed: 1 }) },
      qualityGate: { run: () => ({ passed: true, failures: [] }) },
      scanner: { scan: () => [] },
      dreamer: { propose: () => [] },
      ...overrides,
    };
  }

  function proposing(action: ProposedAction, steps_completed = 0): Collaborators {
    return collaborators(CLEAN_PLAN, {
      executor: { executeStep: () => ({ steps_completed, proposed_action: action }) },
    });
  }

  /** Helper: one turn with a fixed clock and a quiet logger */
  function turn(
    collab: Collaborators,
    command?: string,
    config: Partial<SupervisorConfig> = {},
  ): Promise<DispatchResult> {
    return dispatch(tempDir, { collaborators: collab, command, config, logger: { warn }, now: () => new Date(clock) });
  }

  function status() {
    return queryStatus(tempDir, { now: () => new Date(clock) });
  }

  function stateFile(name: string): string {
    return join(tempDir, ".edge", "state", name);
  }

  // ── Junction round trip ───────────────────────────────────────────────────

  describe("junctions", () => {
    it("pauses on rm -rf and continues after skip", async () => {
      const collab = proposing(RM_BUILD);

      const first = await turn(collab);
      expect(first.outcome).toBe("junction");
      expect(first.junction_hit).toBe(true);
      expect(first.junction_type).toBe("irreversible");
      expect(first.junction_reason).toBe("irreversible command: recursive or forced delete");
      expect(first.continue_loop).toBe(false);
      expect(first.mode).toBe("active");

      const second = await turn(collab, "skip");
      expect(second.decision).toEqual({
        decision: "skip",
        junction_id: first.junction_id,
        junction_type: "irreversible",
      });
      expect(second.junction_hit).toBe(false);
      expect(second.continue_loop).toBe(true);
      expect(second.action).toBeNull();
      expect(status().pending).toBeNull();
      expect(status().loop.skipped_actions).toEqual([RM_BUILD]);
    });

    it("never advances while a junction is outstanding", async () => {
      const executeStep = vi.fn((): StepOutcome => ({ steps_completed: 0, proposed_action: RM_BUILD }));
      const collab = collaborators(CLEAN_PLAN, { executor: { executeStep } });

      const first = await turn(collab);
      const second = await turn(collab);
      expect(second.outcome).toBe("junction");
      expect(second.junction_id).toBe(first.junction_id);
      expect(second.message).toBe(
        "paused at irreversible junction: irreversible command: recursive or forced delete (approve | skip | dismiss [minutes] | stop)",
      );
      expect(executeStep).toHaveBeenCalledTimes(1);
    });

    it("hands out an approved action exactly once", async () => {
      const collab = proposing(RM_BUILD);
      await turn(collab);

      const approved = await turn(collab, "approve");
      expect(approved.outcome).toBe("advanced");
      expect(approved.action).toEqual(RM_BUILD);
      expect(approved.continue_loop).toBe(true);
      expect(status().loop.approved_actions).toEqual([]);

      const again = await turn(collab);
      expect(again.outcome).toBe("junction");
      expect(again.junction_type).toBe("irreversible");
    });

    it("auto-dismisses the same junction after dismiss", async () => {
      const collab = proposing(RM_BUILD);
      await turn(collab);

      const dismissed = await turn(collab, "dismiss");
      const expires = new Date(START + 60 * 60_000).toISOString();
      expect(dismissed.outcome).toBe("advanced");
      expect(dismissed.junction_hit).toBe(false);
      expect(dismissed.warnings).toContain(
        `irreversible junction dismissed until ${expires}: irreversible command: recursive or forced delete`,
      );
      expect(status().pending).toBeNull();
      expect(status().history.map((h) => h.decision)).toEqual(["dismiss"]);
    });

    it("honours a custom dismiss window", async () => {
      const collab = proposing(RM_BUILD);
      await turn(collab);
      await turn(collab, "dismiss 5");

      clock = START + 6 * 60_000;
      const later = await turn(collab);
      expect(later.outcome).toBe("junction");
    });

    it("warns when a decision arrives with nothing pending", async () => {
      const result = await turn(proposing({ kind: "shell", command: "npm test" }), "approve");
      expect(result.warnings).toContain("no pending junction to approve");
      expect(result.decision).toBeNull();
      expect(result.outcome).toBe("advanced");
    });

    it("surfaces a junction the executor raises itself", async () => {
      const collab = collaborators(CLEAN_PLAN, {
        executor: {
          executeStep: () => ({ steps_completed: 0, junction: { type: "external", reason: "needs prod credentials" } }),
        },
      });
      const result = await turn(collab);
      expect(result.junction_type).toBe("external");
      expect(result.junction_reason).toBe("needs prod credentials");
    });

    it("approve lets a blocked output through once and skip stops pausing on it", async () => {
      const reason = 'matched "error" (error report)';
      const collab = collaborators(CLEAN_PLAN, {
        executor: { executeStep: () => ({ steps_completed: 0, output: "Error: build failed" }) },
      });

      const first = await turn(collab);
      expect(first.outcome).toBe("junction");
      expect(first.junction_type).toBe("blocked");
      expect(first.junction_reason).toBe(reason);

      const approved = await turn(collab, "approve");
      expect(approved.decision?.decision).toBe("approve");
      expect(approved.outcome).toBe("advanced");
      expect(approved.junction_hit).toBe(false);
      expect(approved.message).toBe('step "clean": 0 step(s) completed (approved)');
      expect(status().loop.approved_junctions).toEqual([]);

      const again = await turn(collab);
      expect(again.outcome).toBe("junction");
      expect(again.junction_type).toBe("blocked");

      const skipped = await turn(collab, "skip");
      expect(skipped.outcome).toBe("advanced");
      expect(skipped.action).toBeNull();
      expect(skipped.message).toBe(`step "clean" raised a skipped blocked junction again (${reason}); not running it`);
      expect(status().loop.skipped_junctions).toEqual([
        { fingerprint: stepJunctionFingerprint("output", "clean", "blocked", reason), type: "blocked", reason },
      ]);

      const stuck = await turn(collab);
      expect(stuck.outcome).toBe("junction");
      expect(stuck.junction_reason).toBe('no progress on "clean" for 3 iterations');
    });

    it("tells the executor which of its junctions were approved or skipped", async () => {
      const ruling = {
        fingerprint: stepJunctionFingerprint("executor", "clean", "external", "needs prod credentials"),
        type: "external" as const,
        reason: "needs prod credentials",
      };
      const executeStep = vi.fn(
        (ctx: StepContext): StepOutcome =>
          ctx.skipped_junctions.length > 0
            ? { steps_completed: 1 }
            : {
                steps_completed: 0,
                junction: { type: "external", reason: "needs prod credentials" },
                proposed_action: { kind: "shell", command: "npm run deploy:staging" },
              },
      );
      const collab = collaborators(CLEAN_PLAN, { executor: { executeStep } });

      expect((await turn(collab)).junction_type).toBe("external");

      const approved = await turn(collab, "approve");
      expect(approved.outcome).toBe("advanced");
      expect(approved.action).toEqual({ kind: "shell", command: "npm run deploy:staging" });
      expect(executeStep.mock.calls[1]?.[0].approved_junctions).toEqual([ruling]);

      expect((await turn(collab)).junction_type).toBe("external");

      const skipped = await turn(collab, "skip");
      expect(executeStep.mock.calls[3]?.[0].skipped_junctions).toEqual([ruling]);
      expect(skipped.outcome).toBe("advanced");
      expect(skipped.junction_hit).toBe(false);
      expect(skipped.message).toBe('step "clean": 1 step(s) completed');
    });
  });

  // ── Limits ────────────────────────────────────────────────────────────────

  describe("limits", () => {
    it("forces a stop past max_iterations and resumes on request", async () => {
      const collab = proposing({ kind: "shell", command: "npm run build" }, 1);
      const config = { max_iterations: 2 };

      expect((await turn(collab, undefined, config)).outcome).toBe("advanced");
      expect((await turn(collab, undefined, config)).outcome).toBe("advanced");

      const capped = await turn(collab, undefined, config);
      expect(capped.outcome).toBe("max_iterations");
      expect(capped.continue_loop).toBe(false);
      expect(capped.message).toBe("max iterations (2) reached; loop stopped, send resume to continue");

      const stopped = await turn(collab, undefined, config);
      expect(stopped.outcome).toBe("stopped");

      const resumed = await turn(collab, "resume", config);
      expect(resumed.outcome).toBe("advanced");
      expect(status().loop.session_iterations).toBe(1);
    });

    it("pauses with a stuck junction when a step makes no progress", async () => {
      const collab = collaborators(CLEAN_PLAN, { executor: { executeStep: () => ({ steps_completed: 0 }) } });

      expect((await turn(collab)).continue_loop).toBe(true);
      expect((await turn(collab)).continue_loop).toBe(true);

      const stuck = await turn(collab);
      expect(stuck.outcome).toBe("junction");
      expect(stuck.junction_type).toBe("ambiguous");
      expect(stuck.junction_reason).toBe('no progress on "clean" for 3 iterations');
      expect(status().pending?.source).toBe("stuck_detector");

      const after = await turn(collab, "skip");
      expect(after.outcome).toBe("advanced");
      expect(status().loop.stalled_iterations).toBe(1);
    });

    it("counts a step that keeps proposing different actions without finishing as stuck", async () => {
      let calls = 0;
      const collab = collaborators(CLEAN_PLAN, {
        executor: {
          executeStep: () => ({
            steps_completed: 0,
            proposed_action: { kind: "shell", command: calls++ % 2 === 0 ? "npm test" : "npm run lint" },
          }),
        },
      });

      const first = await turn(collab);
      expect(first.outcome).toBe("advanced");
      expect(first.action).toEqual({ kind: "shell", command: "npm test" });
      const second = await turn(collab);
      expect(second.action).toEqual({ kind: "shell", command: "npm run lint" });
      expect(status().loop.stalled_iterations).toBe(2);

      const stuck = await turn(collab);
      expect(stuck.outcome).toBe("junction");
      expect(stuck.junction_reason).toBe('no progress on "clean" for 3 iterations');
    });

    it("does not count completed work as stalling", async () => {
      const collab = collaborators(CLEAN_PLAN);
      for (let i = 0; i < 5; i++) {
        expect((await turn(collab)).outcome).toBe("advanced");
      }
      expect(status().loop.stalled_iterations).toBe(0);
    });
  });

  // ── Loop control ──────────────────────────────────────────────────────────

  describe("stop / resume", () => {
    it("stays stopped until resumed", async () => {
      const collab = collaborators(CLEAN_PLAN);
      await turn(collab);

      const stopped = await turn(collab, "stop");
      expect(stopped.outcome).toBe("stopped");
      expect(stopped.message).toBe("autonomous loop stopped");
      expect(status().loop.session_iterations).toBe(0);

      const idle = await turn(collab);
      expect(idle.outcome).toBe("stopped");
      expect(idle.message).toBe("autonomous loop is stopped; send resume to continue");

      const resumed = await turn(collab, "on");
      expect(resumed.outcome).toBe("advanced");
    });

    it("leaves a pending junction in place when stopped", async () => {
      const collab = proposing(RM_BUILD);
      const first = await turn(collab);

      const stopped = await turn(collab, "off");
      expect(stopped.message).toBe(`autonomous loop stopped; junction ${first.junction_id} is still pending`);
      expect(status().pending?.id).toBe(first.junction_id);
    });
  });

  // ── Gear modes ────────────────────────────────────────────────────────────

  describe("modes", () => {
    const DONE_PLAN: PlanSnapshot = {
      objective: "Ship it",
      steps: [{ id: "ship", description: "ship", status: "completed" }],
    };

    it("goes idle in dream when there is nothing to do", async () => {
      const collab = collaborators(
        { objective: null, steps: [] },
        { dreamer: { propose: () => [{ objective: "Add caching" }] } },
      );

      const first = await turn(collab);
      expect(first.outcome).toBe("idle");
      expect(first.continue_loop).toBe(false);
      expect(first.transitioned).toBe(true);
      expect(first.transition).toBe("active_to_dream");
      expect(first.new_mode).toBe("dream");

      const second = await turn(collab);
      expect(second.outcome).toBe("idle");
      expect(second.mode).toBe("dream");
      expect(second.proposals).toEqual([{ objective: "Add caching" }]);
    });

    it("patrols after the quality gate passes", async () => {
      const collab = collaborators(DONE_PLAN, { scanner: { scan: () => [{ title: "flaky test" }] } });

      const first = await turn(collab);
      expect(first.outcome).toBe("advanced");
      expect(first.transition).toBe("active_to_patrol");
      expect(first.continue_loop).toBe(true);

      const second = await turn(collab);
      expect(second.mode).toBe("patrol");
      expect(second.findings).toEqual([{ title: "flaky test" }]);
      expect(second.message).toBe("patrol: 1 finding(s)");
    });

    it("approving a quality gate junction overrides the failing checks", async () => {
      const failures: QualityCheckFailure[] = [{ check: "lint", message: "2 warnings" }];
      const collab = collaborators(DONE_PLAN, { qualityGate: { run: () => ({ passed: false, failures }) } });

      const first = await turn(collab);
      expect(first.junction_type).toBe("ambiguous");
      expect(first.junction_reason).toBe("quality gate failed: lint");

      const approved = await turn(collab, "approve");
      expect(approved.outcome).toBe("advanced");
      expect(approved.transition).toBe("active_to_patrol");
      expect(approved.new_mode).toBe("patrol");
      expect(status().gear.quality_gate_override).toBeNull();
    });

    it("hands a quoted objective to the plan source", async () => {
      const setObjective = vi.fn();
      const collab = collaborators(CLEAN_PLAN);
      collab.plan = { load: () => CLEAN_PLAN, setObjective };

      await turn(collab, '"Deploy auth"');
      expect(setObjective).toHaveBeenCalledWith("Deploy auth");
    });
  });

  // ── Failures ──────────────────────────────────────────────────────────────

  describe("failures", () => {
    it("turns an executor exception into a warning and keeps going", async () => {
      const collab = collaborators(CLEAN_PLAN, {
        executor: {
          executeStep: () => {
            throw new Error("boom");
          },
        },
      });
      const result = await turn(collab);
      expect(result.outcome).toBe("advanced");
      expect(result.continue_loop).toBe(true);
      expect(result.warnings).toContain('active: step "clean" failed: boom');
      expect(status().gear.iterations).toBe(1);
    });

    it("reports state busy when a lock is held elsewhere", async () => {
      mkdirSync(join(tempDir, ".edge", "state"), { recursive: true });
      writeFileSync(
        stateFile("junction_state.json.lock"),
        JSON.stringify({ pid: 1, hostname: "elsewhere", acquired_at_ms: Date.now() }),
        "utf-8",
      );
      const result = await turn(collaborators(CLEAN_PLAN), undefined, { lock_timeout_ms: 50 });
      expect(result.outcome).toBe("error");
      expect(result.message).toBe("state busy, retry");
      expect(result.continue_loop).toBe(false);
      expect(warn).toHaveBeenCalled();
    });

    it("does not claim an unchanged state once the gear step was saved", async () => {
      const collab = collaborators(CLEAN_PLAN, {
        executor: {
          executeStep: () => {
            writeFileSync(
              stateFile("junction_state.json.lock"),
              JSON.stringify({ pid: 1, hostname: "elsewhere", acquired_at_ms: Date.now() }),
              "utf-8",
            );
            return { steps_completed: 0, junction: { type: "external", reason: "needs prod credentials" } };
          },
        },
      });
      const result = await turn(collab, undefined, { lock_timeout_ms: 50 });
      expect(result.outcome).toBe("error");
      expect(result.message).toBe("internal error after the gear step was saved; check status before retrying");
      expect(status().gear.iterations).toBe(1);
    });

    it("reports an invalid config file without throwing", async () => {
      mkdirSync(join(tempDir, ".edge"), { recursive: true });
      writeFileSync(join(tempDir, ".edge", "config.json"), JSON.stringify({ max_iterations: "many" }), "utf-8");
      const result = await turn(collaborators(CLEAN_PLAN));
      expect(result.outcome).toBe("error");
      expect(result.message).toMatch(/^Invalid config at /);
    });

    it("warns about unrecognized commands and still advances", async () => {
      const result = await turn(collaborators(CLEAN_PLAN), "make it faster");
      expect(result.warnings).toContain('unrecognized command "make it faster" ignored');
      expect(result.outcome).toBe("advanced");
    });
  });

  // ── Legacy state + out-of-turn decisions ──────────────────────────────────

  describe("legacy + decide", () => {
    it("surfaces a junction left in the legacy dispatch state", async () => {
      mkdirSync(join(tempDir, ".edge", "state"), { recursive: true });
      writeFileSync(
        stateFile("dispatch_state.json"),
        JSON.stringify({ state: "junction", junction: { type: "BLOCKED", reason: "tests failing" } }),
        "utf-8",
      );
      expect(status().legacy_pending?.type).toBe("blocked");

      const result = await turn(collaborators(CLEAN_PLAN));
      expect(result.outcome).toBe("junction");
      expect(result.junction_type).toBe("blocked");
      expect(result.junction_reason).toBe("tests failing");
      expect(result.junction_id).toMatch(/^legacy-/);
      expect(result.warnings).toContain(`imported legacy junction ${result.junction_id}`);
      expect(status().legacy_pending).toBeNull();
    });

    it("applies a decision outside a turn", async () => {
      const collab = proposing(RM_BUILD);
      const first = await turn(collab);

      const { decision, warnings } = decide(tempDir, { kind: "approve" }, { now: () => new Date(clock) });
      expect(decision?.junction_id).toBe(first.junction_id);
      expect(warnings).toEqual([]);

      const next = await turn(collab);
      expect(next.action).toEqual(RM_BUILD);
    });
  });
});
