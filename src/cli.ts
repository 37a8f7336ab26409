#!/usr/bin/env node
/**
 * cli.ts — CLI entry point for the edge supervisor
 *
 * Commands:
 *   status [project-root]                             Gear, pending junction, history, loop counters
 *   pending [project-root]                            Pending junction (or null)
 *   decide [project-root] approve|skip|dismiss [m]    Resolve the pending junction
 *   migrate [project-root]                            Import legacy junction state
 *   classify <shell command>                          Classify a shell command
 *   classify-control <name>                           Classify a control command
 *   detect-output <text>                              Scan output text for junction signals
 *
 * Results go to stdout as JSON; diagnostics go to stderr. A missing
 * project root falls back to $EDGE_PROJECT_DIR, then the working directory.
 */

import { resolve } from "path";

import { isDecision, parseCommand } from "./auto";
import {
  classifyControlCommand,
  detectOutputJunction,
  matchShellCommand,
  normalizeControlName,
} from "./classifier";
import { errorMessage, resolveProjectDir } from "./config";
import { decide, openSession, queryStatus } from "./dispatch";

const [, , command, ...args] = process.argv;

function usage(): never {
  console.error(`Usage: edge-supervisor <command> [args]

Commands:
  status [project-root]                             Gear, pending junction, history, loop counters
  pending [project-root]                            Pending junction (or null)
  decide [project-root] approve|skip|dismiss [m]    Resolve the pending junction
  migrate [project-root]                            Import legacy junction state
  classify <shell command>                          Classify a shell command
  classify-control <name>                           Classify a control command
  detect-output <text>                              Scan output text for junction signals
`);
  process.exit(1);
}

function resolveRoot(raw: string | undefined): string {
  return raw ? resolve(raw) : resolveProjectDir();
}

function requireText(parts: string[], name: string): string {
  const text = parts.join(" ").trim();
  if (!text) {
    console.error(`Error: <${name}> is required`);
    process.exit(1);
  }
  return text;
}

function print(value: unknown): void {
  console.log(JSON.stringify(value, null, 2));
}

try {
  switch (command) {
    case "status": {
      print(queryStatus(resolveRoot(args[0])));
      break;
    }

    case "pending": {
      const session = openSession(resolveRoot(args[0]));
      print(session.junctions.getPending());
      break;
    }

    case "decide": {
      // Root is optional: "decide approve" or "decide ./proj approve"
      const hasRoot = args.length > 0 && !isDecision(parseCommand(args.join(" ")));
      const projectRoot = resolveRoot(hasRoot ? args[0] : undefined);
      const decision = parseCommand(requireText(hasRoot ? args.slice(1) : args, "decision"));
      if (!isDecision(decision)) {
        console.error("Error: decision must be approve, skip or dismiss [minutes]");
        process.exit(1);
      }
      const result = decide(projectRoot, decision);
      for (const warning of result.warnings) console.error(`[decide] ${warning}`);
      print(result.decision);
      if (!result.decision) process.exit(1);
      break;
    }

    case "migrate": {
      const session = openSession(resolveRoot(args[0]));
      const result = session.junctions.migrate();
      print(result);
      console.error(`[migrate] ${result.status}`);
      break;
    }

    case "classify": {
      const text = requireText(args, "shell command");
      print(matchShellCommand(text));
      break;
    }

    case "classify-control": {
      const name = requireText(args, "name");
      print({ name: normalizeControlName(name), type: classifyControlCommand(name) });
      break;
    }

    case "detect-output": {
      print(detectOutputJunction(requireText(args, "text")));
      break;
    }

    default:
      if (command) {
        console.error(`Unknown command: ${command}`);
      }
      usage();
  }
} catch (err) {
  console.error(`Error: ${errorMessage(err)}`);
  process.exit(1);
}
