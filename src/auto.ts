/**
 * auto.ts — Turn Command Parser
 *
 * Maps the raw string a host passes with each turn into a TurnCommand
 * using keyword matching only. An empty string means "just advance".
 *
 * Accepted forms (optionally prefixed with "/edge"):
 *   approve [note]      skip [note]      dismiss [minutes]
 *   stop | off          resume | on      continue | next | go
 *   "New objective"     (quoted text)
 */

// ─── Types ───────────────────────────────────────────────────────────────────

export type DecisionCommand =
  | { kind: "approve"; note?: string }
  | { kind: "skip"; note?: string }
  /** minutes is null when absent or unparseable; the default window applies */
  | { kind: "dismiss"; minutes: number | null };

export type TurnCommand =
  | { kind: "none" }
  | DecisionCommand
  | { kind: "stop" }
  | { kind: "resume" }
  | { kind: "objective"; text: string }
  | { kind: "unknown"; text: string };

export function isDecision(command: TurnCommand): command is DecisionCommand {
  return command.kind === "approve" || command.kind === "skip" || command.kind === "dismiss";
}

// ─── Parsing ─────────────────────────────────────────────────────────────────

/** Text wrapped in matching straight or curly quotes */
export function extractObjectiveText(message: string): string | null {
  const match = message.trim().match(/^(?:"([^"]*)"|'([^']*)'|“([^”]*)”)$/);
  if (!match) return null;
  const text = (match[1] ?? match[2] ?? match[3] ?? "").trim();
  return text.length > 0 ? text : null;
}

export function isObjectiveText(message: string): boolean {
  return extractObjectiveText(message) !== null;
}

/** "30" → 30, "30m" → 30; anything else → null */
function parseMinutes(token: string | undefined): number | null {
  if (!token) return null;
  const match = token.match(/^(\d+)m?$/i);
  if (!match || match[1] === undefined) return null;
  const minutes = Number.parseInt(match[1], 10);
  return minutes > 0 ? minutes : null;
}

function noteFrom(rest: string | undefined): string | undefined {
  const note = rest?.replace(/^[\s:,-]+/, "").trim();
  return note ? note : undefined;
}

/**
 * Classify a turn command. Priority order matters: decisions are checked
 * before loop control so that "skip" never reads as "stop".
 */
export function parseCommand(message: string): TurnCommand {
  const msg = message.trim().replace(/^\/edge\b\s*/i, "");
  if (!msg) return { kind: "none" };

  // ── Objective (quoted) ──
  const objective = extractObjectiveText(msg);
  if (objective) return { kind: "objective", text: objective };

  // ── Decisions ──
  const approve = msg.match(/^(?:approve|approved|lgtm|yes|y)\b(.*)$/is);
  if (approve) return { kind: "approve", note: noteFrom(approve[1]) };

  const skip = msg.match(/^(?:skip|skipped|no|n)\b(.*)$/is);
  if (skip) return { kind: "skip", note: noteFrom(skip[1]) };

  const dismiss = msg.match(/^dismiss\b(?:\s+(\S+))?/i);
  if (dismiss) return { kind: "dismiss", minutes: parseMinutes(dismiss[1]) };

  // ── Loop control ──
  if (/^(?:stop|off|halt)\s*$/i.test(msg)) return { kind: "stop" };
  if (/^(?:resume|on)\s*$/i.test(msg)) return { kind: "resume" };
  if (/^(?:continue|next|go|proceed)\s*$/i.test(msg)) return { kind: "none" };

  return { kind: "unknown", text: msg };
}
