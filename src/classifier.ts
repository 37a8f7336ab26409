/**
 * classifier.ts — Command / Output Classifier
 *
 * Pure, deterministic mapping from a proposed action to a JunctionType.
 * The rule tables are plain data; evaluation is first-match-wins inside a
 * tier, and tiers are walked in the order of the *_PRECEDENCE constants.
 *
 * When in doubt, pause: a missed risky command costs more than an extra
 * question to the human.
 */

// ─── Types ────────────────────────────────────────────────────────────────────

/** "none" = safe to auto-execute; everything else pauses */
export type JunctionType = "none" | "irreversible" | "external" | "ambiguous" | "blocked";

export type PausingJunctionType = Exclude<JunctionType, "none">;

export const PAUSING_JUNCTION_TYPES: readonly PausingJunctionType[] = [
  "irreversible",
  "external",
  "ambiguous",
  "blocked",
];

export function isPausing(type: JunctionType): type is PausingJunctionType {
  return type !== "none";
}

export interface PatternRule {
  label: string;
  pattern: RegExp;
}

export interface Verdict {
  type: JunctionType;
  reason: string | null;
}

/** Something a plan step wants to do next */
export type ProposedAction =
  | { kind: "shell"; command: string }
  | { kind: "control"; name: string }
  | { kind: "output"; text: string }
  /** `risky` is decided upstream by the edit-risk rules */
  | { kind: "edit"; path: string; risky: boolean; reason?: string };

// ─── Shell Rules ─────────────────────────────────────────────────────────────

export const SHELL_PRECEDENCE = ["irreversible", "external"] as const;
export type ShellTier = (typeof SHELL_PRECEDENCE)[number];

// Patterns run against the normalized (lower-cased, single-spaced) command.
// `[^;&|]*` keeps a flag match inside one segment of a chained command.
export const SHELL_RULES: Record<ShellTier, PatternRule[]> = {
  irreversible: [
    { label: "recursive or forced delete", pattern: /\brm\s+(?:[^;&|]*\s)?-(?:[a-z]*[rf]|-recursive|-force)/ },
    { label: "find -delete", pattern: /\bfind\b[^;&|]*\s-delete\b/ },
    { label: "shred", pattern: /\bshred\b/ },
    { label: "git push", pattern: /\bgit\s+push\b/ },
    { label: "git reset --hard", pattern: /\bgit\s+reset\s+(?:[^;&|]*\s)?--hard\b/ },
    {
      label: "history rewrite",
      pattern: /\bgit\s+(?:rebase|filter-branch|filter-repo|commit\s+(?:[^;&|]*\s)?--amend)\b/,
    },
    { label: "git clean -f", pattern: /\bgit\s+clean\s+(?:[^;&|]*\s)?-[a-z]*f/ },
    { label: "branch delete", pattern: /\bgit\s+branch\s+(?:[^;&|]*\s)?-(?:d|-delete)\b/ },
    { label: "discard working tree", pattern: /\bgit\s+(?:checkout|restore)\s+(?:--\s+)?\.(?:\s|$)/ },
    {
      label: "recursive permission change",
      pattern: /\b(?:chmod|chown|chgrp)\s+(?:[^;&|]*\s)?-(?:[a-z]*r|-recursive)/,
    },
    { label: "filesystem format", pattern: /\b(?:mkfs(?:\.[a-z0-9]+)?|fdisk|parted|wipefs)\b/ },
    { label: "raw device write", pattern: /\bdd\s+[^;&|]*\bof=\/dev\/|>\s*\/dev\/(?:sd|hd|nvme|disk)/ },
    { label: "fork bomb", pattern: /:\(\)\s*\{\s*:\s*\|\s*:?\s*&\s*\}\s*;?\s*:/ },
    { label: "destructive sql", pattern: /\b(?:drop\s+(?:table|database|schema)|truncate\s+table)\b/ },
    { label: "infrastructure teardown", pattern: /\b(?:terraform|pulumi|tofu)\s+destroy\b|\bkubectl\s+delete\b/ },
    {
      label: "download piped to a shell",
      pattern: /\b(?:curl|wget)\b[^;&]*\|\s*(?:sudo\s+)?(?:sh|bash|zsh|dash|ksh)\b/,
    },
  ],
  external: [
    {
      label: "kubernetes change",
      pattern: /\bkubectl\s+(?:apply|create|patch|replace|scale|rollout|set|edit|label|annotate)\b/,
    },
    { label: "helm release", pattern: /\bhelm\s+(?:install|upgrade|uninstall|rollback|delete)\b/ },
    {
      label: "infrastructure as code",
      pattern: /\b(?:terraform|pulumi|tofu)\s+(?:apply|destroy|import|up|refresh)\b/,
    },
    {
      label: "cloud cli",
      pattern: /\b(?:aws|gcloud|gsutil|az|doctl|flyctl|fly|heroku|vercel|netlify|wrangler)\s+\S/,
    },
    {
      label: "package registry publish",
      pattern: /\b(?:npm|yarn|pnpm|cargo|gem)\s+publish\b|\btwine\s+upload\b|\bpoetry\s+publish\b/,
    },
    { label: "container registry", pattern: /\bdocker\s+(?:push|login)\b/ },
    { label: "github api", pattern: /\bgh\s+(?:pr|release|issue|repo|api|workflow)\b/ },
    {
      label: "http write",
      pattern:
        /\bcurl\b[^;&|]*\s(?:-x\s*(?:post|put|patch|delete)|--request\s*(?:post|put|patch|delete)|-d|--data[a-z-]*|--form)(?:\s|=|$)/,
    },
    // Any fetch that does not name a loopback host counts as remote.
    {
      label: "network request",
      pattern: /\b(?:curl|wget)\b(?![^;&|]*(?:\blocalhost\b|\b127\.0\.0\.1\b|\b0\.0\.0\.0\b|\[::1\]))/,
    },
    {
      label: "package install",
      pattern:
        /\b(?:npm|pnpm|yarn)\s+(?:install|i|add|ci)\b|\b(?:pip3?|python3?\s+-m\s+pip)\s+install\b|\bcargo\s+(?:install|add)\b|\bgem\s+install\b|\bgo\s+(?:get|install)\b|\b(?:poetry|uv)\s+add\b/,
    },
    { label: "remote shell", pattern: /\b(?:ssh|scp|rsync|sftp)\s/ },
  ],
};

export function normalizeCommand(text: string): string {
  return text.trim().replace(/\s+/g, " ").toLowerCase();
}

/** Shell verdict plus the label of the rule that produced it */
export function matchShellCommand(text: string): { type: JunctionType; rule: string | null } {
  const normalized = normalizeCommand(text);
  if (!normalized) return { type: "none", rule: null };

  for (const tier of SHELL_PRECEDENCE) {
    for (const rule of SHELL_RULES[tier]) {
      if (rule.pattern.test(normalized)) {
        return { type: tier, rule: rule.label };
      }
    }
  }
  return { type: "none", rule: null };
}

export function classifyShellCommand(text: string): JunctionType {
  return matchShellCommand(text).type;
}

// ─── Control Commands ────────────────────────────────────────────────────────

/** The only control commands trusted to run without a human */
export const SAFE_CONTROL_COMMANDS: ReadonlySet<string> = new Set([
  "status",
  "plan",
  "step",
  "verify",
  "review",
  "checkpoint",
  "learn",
  "score",
  "patrol",
  "dream",
  "brainstorm",
  "research",
  "help",
]);

/** "/edge-plan now" → "plan" */
export function normalizeControlName(name: string): string {
  const first = name.trim().toLowerCase().split(/\s+/)[0] ?? "";
  return first.replace(/^\/+/, "").replace(/^edge-/, "");
}

export function classifyControlCommand(name: string): JunctionType {
  return SAFE_CONTROL_COMMANDS.has(normalizeControlName(name)) ? "none" : "ambiguous";
}

// ─── Output Signals ──────────────────────────────────────────────────────────

export const OUTPUT_PRECEDENCE = ["blocked", "ambiguous"] as const;
export type OutputTier = (typeof OUTPUT_PRECEDENCE)[number];

export const OUTPUT_RULES: Record<OutputTier, PatternRule[]> = {
  blocked: [
    { label: "error report", pattern: /\berrors?\b/ },
    { label: "failure report", pattern: /\b(?:fail|fails|failed|failing|failure)\b/ },
    { label: "mismatch", pattern: /\bmismatch(?:ed|es)?\b|\bdoes not match\b/ },
    { label: "exception", pattern: /\bexception\b|\btraceback\b|\bpanic(?:ked)?\b/ },
    { label: "cannot proceed", pattern: /\bcannot\b|\bcan't\b|\bunable to\b/ },
    { label: "access denied", pattern: /\b(?:permission|access) denied\b/ },
    { label: "missing resource", pattern: /\bnot found\b|\bno such file\b/ },
  ],
  ambiguous: [
    { label: "explicit choice", pattern: /\bchoose\b|\bchoice\b/ },
    { label: "alternatives", pattern: /\balternatives?\b/ },
    { label: "option list", pattern: /\boption\s+[a-c1-3]\b/ },
    { label: "either/or", pattern: /\beither\b[^.?!]*\bor\b/ },
    { label: "open question", pattern: /\bwhich\s+(?:one|approach|option|way)\b/ },
    { label: "multiple approaches", pattern: /\bmultiple\s+(?:options|approaches|ways|paths)\b/ },
    { label: "trade-off", pattern: /\btrade-?offs?\b/ },
  ],
};

/** Scan free text for BLOCKED, then AMBIGUOUS, signals */
export function detectOutputJunction(text: string): Verdict {
  const lower = text.toLowerCase();
  for (const tier of OUTPUT_PRECEDENCE) {
    for (const rule of OUTPUT_RULES[tier]) {
      const match = rule.pattern.exec(lower);
      if (match) {
        return { type: tier, reason: `matched "${match[0]}" (${rule.label})` };
      }
    }
  }
  return { type: "none", reason: null };
}

// ─── Dispatch by Action Kind ─────────────────────────────────────────────────

export function classifyAction(action: ProposedAction): Verdict {
  switch (action.kind) {
    case "shell": {
      const { type, rule } = matchShellCommand(action.command);
      return { type, reason: rule ? `${type} command: ${rule}` : null };
    }
    case "control": {
      const type = classifyControlCommand(action.name);
      return {
        type,
        reason: type === "none" ? null : `control command "${normalizeControlName(action.name)}" is not on the allow-list`,
      };
    }
    case "output":
      return detectOutputJunction(action.text);
    case "edit":
      if (!action.risky) return { type: "none", reason: null };
      return {
        type: "ambiguous",
        reason: `risky edit to ${action.path}${action.reason ? `: ${action.reason}` : ""}`,
      };
  }
}

/** Human-readable one-liner for an action */
export function describeAction(action: ProposedAction): string {
  switch (action.kind) {
    case "shell":
      return `run: ${action.command.trim()}`;
    case "control":
      return `control: ${normalizeControlName(action.name)}`;
    case "output":
      return `output: ${action.text.trim().slice(0, 80)}`;
    case "edit":
      return `edit: ${action.path}`;
  }
}
