/**
 * store.ts — Atomic State Store
 *
 * One JSON document per file. Writers take an exclusive `<file>.lock`
 * (created with O_EXCL) around read-modify-write, and replace the file by
 * renaming a temp file from the same directory, so a reader only ever sees
 * a complete document.
 *
 * Every invocation is a fresh process: nothing here caches file contents.
 */

import {
  closeSync,
  existsSync,
  linkSync,
  mkdirSync,
  openSync,
  readFileSync,
  renameSync,
  rmSync,
  statSync,
  writeFileSync,
  writeSync,
} from "fs";
import { basename, dirname, join } from "path";
import { hostname } from "os";
import { randomBytes } from "crypto";
import { z } from "zod";

// ─── Errors ──────────────────────────────────────────────────────────────────

/** Lock acquisition exceeded its timeout. Transient: retry the whole operation. */
export class StateBusyError extends Error {
  public readonly lockPath: string;
  public readonly waitedMs: number;

  public constructor(lockPath: string, waitedMs: number) {
    super(`state busy, retry: lock ${lockPath} held for more than ${waitedMs}ms`);
    this.name = "StateBusyError";
    this.lockPath = lockPath;
    this.waitedMs = waitedMs;
  }
}

// ─── Locking ─────────────────────────────────────────────────────────────────

export interface LockOptions {
  timeoutMs: number;
  staleMs: number;
  pollMs?: number;
}

export const LockMetadataSchema = z.object({
  pid: z.number().int(),
  hostname: z.string().min(1),
  acquired_at_ms: z.number().int(),
  /** Random per acquisition; tells two holders with the same pid apart */
  token: z.string().optional(),
});
export type LockMetadata = z.infer<typeof LockMetadataSchema>;

/** Who holds a lock right now: its metadata, or only the file's mtime if unreadable */
export interface LockHolder {
  meta: LockMetadata | null;
  mtimeMs: number;
}

const DEFAULT_POLL_MS = 25;

function isErrno(err: unknown, code: string): boolean {
  return err instanceof Error && "code" in err && err.code === code;
}

function sleepSync(ms: number): void {
  Atomics.wait(new Int32Array(new SharedArrayBuffer(4)), 0, 0, ms);
}

export function lockPathFor(path: string): string {
  return `${path}.lock`;
}

/** Read the metadata of an existing lock, or null if absent/unreadable */
export function readLockMetadata(lockPath: string): LockMetadata | null {
  try {
    const raw = readFileSync(lockPath, "utf-8").trim();
    if (raw.length === 0) return null;
    const parsed = LockMetadataSchema.safeParse(JSON.parse(raw));
    return parsed.success ? parsed.data : null;
  } catch (err) {
    if (isErrno(err, "ENOENT") || err instanceof SyntaxError) return null;
    throw err;
  }
}

/** null when there is no lock file */
export function readLockHolder(lockPath: string): LockHolder | null {
  let mtimeMs: number;
  try {
    mtimeMs = statSync(lockPath).mtimeMs;
  } catch (err) {
    if (isErrno(err, "ENOENT")) return null;
    throw err;
  }
  return { meta: readLockMetadata(lockPath), mtimeMs };
}

function sameHolder(a: LockHolder, b: LockHolder): boolean {
  if (a.meta && b.meta) {
    return (
      a.meta.pid === b.meta.pid &&
      a.meta.hostname === b.meta.hostname &&
      a.meta.acquired_at_ms === b.meta.acquired_at_ms &&
      a.meta.token === b.meta.token
    );
  }
  // A crash between create and write leaves an empty lock; only mtime identifies it.
  return a.meta === null && b.meta === null && a.mtimeMs === b.mtimeMs;
}

function isStale(holder: LockHolder, staleMs: number, nowMs: number): boolean {
  const since = holder.meta ? holder.meta.acquired_at_ms : holder.mtimeMs;
  return nowMs - since > staleMs;
}

/**
 * Remove a stale lock, but only if it still belongs to `stale`.
 *
 * The lock is first renamed to a private path, so of several processes
 * racing to break it only one gets the file. If what it got is no longer
 * the stale holder's lock (someone broke and re-took it in between), the
 * file is linked back in place. Returns true when the stale lock was removed.
 */
export function breakStaleLock(lockPath: string, stale: LockHolder): boolean {
  const moved = `${lockPath}.${process.pid}.${randomBytes(4).toString("hex")}.stale`;
  try {
    renameSync(lockPath, moved);
  } catch (err) {
    if (isErrno(err, "ENOENT")) return false;
    throw err;
  }

  try {
    const taken = readLockHolder(moved);
    if (taken && sameHolder(taken, stale)) return true;
    try {
      linkSync(moved, lockPath);
    } catch (err) {
      // A third writer created a fresh lock meanwhile; that one stands.
      if (!isErrno(err, "EEXIST")) throw err;
    }
    return false;
  } finally {
    rmSync(moved, { force: true });
  }
}

/**
 * Acquire `lockPath` exclusively, polling until `timeoutMs`.
 * Returns the release function. Throws StateBusyError on timeout.
 */
export function acquireLock(lockPath: string, opts: LockOptions): () => void {
  mkdirSync(dirname(lockPath), { recursive: true });
  const started = Date.now();
  const pollMs = opts.pollMs ?? DEFAULT_POLL_MS;

  for (;;) {
    let fd: number | null = null;
    try {
      fd = openSync(lockPath, "wx", 0o600);
    } catch (err) {
      if (!isErrno(err, "EEXIST")) throw err;
    }

    if (fd !== null) {
      const meta: LockMetadata = {
        pid: process.pid,
        hostname: hostname(),
        acquired_at_ms: Date.now(),
        token: randomBytes(8).toString("hex"),
      };
      try {
        writeSync(fd, `${JSON.stringify(meta)}\n`);
      } catch (err) {
        closeSync(fd);
        rmSync(lockPath, { force: true });
        throw err;
      }
      closeSync(fd);

      let released = false;
      return () => {
        if (released) return;
        released = true;
        // Leave the file alone if our lock was broken and re-taken by someone else.
        const current = readLockMetadata(lockPath);
        if (current && current.pid === meta.pid && current.token === meta.token) {
          rmSync(lockPath, { force: true });
        }
      };
    }

    const now = Date.now();
    const holder = readLockHolder(lockPath);
    if (holder === null) continue;
    if (isStale(holder, opts.staleMs, now)) {
      breakStaleLock(lockPath, holder);
      continue;
    }

    const waited = now - started;
    if (waited >= opts.timeoutMs) {
      throw new StateBusyError(lockPath, waited);
    }
    sleepSync(Math.min(pollMs, opts.timeoutMs - waited));
  }
}

/** Run `fn` while holding the lock for `path` */
export function withFileLock<R>(path: string, opts: LockOptions, fn: () => R): R {
  const release = acquireLock(lockPathFor(path), opts);
  try {
    return fn();
  } finally {
    release();
  }
}

// ─── Atomic Write ────────────────────────────────────────────────────────────

/** Write JSON to a sibling temp file, then rename it over `path` */
export function writeJsonAtomic(path: string, value: unknown): void {
  const dir = dirname(path);
  mkdirSync(dir, { recursive: true });
  const tmp = join(
    dir,
    `.${basename(path)}.${process.pid}.${randomBytes(4).toString("hex")}.tmp`,
  );
  try {
    writeFileSync(tmp, JSON.stringify(value, null, 2) + "\n", "utf-8");
    renameSync(tmp, path);
  } catch (err) {
    rmSync(tmp, { force: true });
    throw err;
  }
}

/** JSON encoding with object keys sorted, for hashing and comparison */
export function stableStringify(value: unknown): string {
  return JSON.stringify(sortKeys(value));
}

function sortKeys(value: unknown): unknown {
  if (Array.isArray(value)) return value.map(sortKeys);
  if (value !== null && typeof value === "object") {
    const out: Record<string, unknown> = {};
    const entries: [string, unknown][] = Object.entries(value);
    entries.sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
    for (const [key, inner] of entries) {
      out[key] = sortKeys(inner);
    }
    return out;
  }
  return value;
}

/** Parse a JSON file; undefined when it is missing or not valid JSON */
export function readJson(path: string): unknown {
  try {
    return JSON.parse(readFileSync(path, "utf-8"));
  } catch (err) {
    if (isErrno(err, "ENOENT") || err instanceof SyntaxError) return undefined;
    throw err;
  }
}

// ─── StateFile ───────────────────────────────────────────────────────────────

export type Parser<T> = (raw: unknown) => T | null;

/** Adapt a zod schema into a Parser that yields null for invalid input */
export function parserFor<S extends z.ZodTypeAny>(schema: S): Parser<z.infer<S>> {
  return (raw) => {
    const parsed = schema.safeParse(raw);
    return parsed.success ? parsed.data : null;
  };
}

export interface Snapshot<T> {
  value: T;
  /** "default" when the file was missing, corrupt or failed validation */
  source: "file" | "default";
}

/** Result of an update callback: `next: null` means "don't write" */
export interface Mutation<T, R> {
  next: T | null;
  result: R;
}

export class StateFile<T> {
  public readonly path: string;
  readonly #parse: Parser<T>;
  readonly #defaults: () => T;
  readonly #lock: LockOptions;

  public constructor(path: string, parse: Parser<T>, defaults: () => T, lock: LockOptions) {
    this.path = path;
    this.#parse = parse;
    this.#defaults = defaults;
    this.#lock = lock;
  }

  public exists(): boolean {
    return existsSync(this.path);
  }

  /** Parsed JSON without validation; undefined when missing or not JSON */
  public readRaw(): unknown {
    return readJson(this.path);
  }

  /** Lock-free snapshot. Corrupt or missing content yields the default shape. */
  public load(): Snapshot<T> {
    const raw = this.readRaw();
    if (raw !== undefined) {
      const value = this.#parse(raw);
      if (value !== null) return { value, source: "file" };
    }
    return { value: this.#defaults(), source: "default" };
  }

  public read(): T {
    return this.load().value;
  }

  public write(value: T): void {
    withFileLock(this.path, this.#lock, () => writeJsonAtomic(this.path, value));
  }

  /** Locked read-modify-write; the callback decides whether to write */
  public update<R>(fn: (current: T) => Mutation<T, R>): R {
    return withFileLock(this.path, this.#lock, () => {
      const { next, result } = fn(this.read());
      if (next !== null) writeJsonAtomic(this.path, next);
      return result;
    });
  }

  /**
   * Compare-and-write: persist `next` only if the file still holds what
   * `expected` saw. Used when the new value was computed outside the lock.
   */
  public replaceIf(expected: Snapshot<T>, next: T): boolean {
    return withFileLock(this.path, this.#lock, () => {
      const current = this.load();
      const unchanged =
        current.source === "default"
          ? expected.source === "default"
          : expected.source === "file" &&
            stableStringify(current.value) === stableStringify(expected.value);
      if (!unchanged) return false;
      writeJsonAtomic(this.path, next);
      return true;
    });
  }
}
