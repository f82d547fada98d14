import { randomBytes } from "node:crypto";
import { mkdir, readFile, rename, rm, writeFile } from "node:fs/promises";
import path from "node:path";
import { sanitizePathComponent } from "./security.js";

export const JOURNAL_SCHEMA_VERSION = 1;

export type JournalStatus = "pending" | "completed" | "failed" | "skipped-idempotent";

const STATUSES: readonly JournalStatus[] = ["pending", "completed", "failed", "skipped-idempotent"];

export type JournalEntry = {
  status: JournalStatus;
  timestamp: string | null;
  fingerprint: string | null;
  warnings: string[];
};

export type JournalFile = {
  schemaVersion: number;
  target: string;
  phases: Record<string, JournalEntry>;
};

const PENDING: JournalEntry = { status: "pending", timestamp: null, fingerprint: null, warnings: [] };

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isJournalStatus(value: unknown): value is JournalStatus {
  return typeof value === "string" && STATUSES.some((s) => s === value);
}

/**
 * Read one persisted entry. Unknown fields are ignored; a missing or unknown
 * status reads as pending so an older or newer file never blocks a run.
 */
export function parseEntry(raw: unknown): JournalEntry {
  if (!isRecord(raw) || !isJournalStatus(raw.status)) return { ...PENDING, warnings: [] };
  return {
    status: raw.status,
    timestamp: typeof raw.timestamp === "string" ? raw.timestamp : null,
    fingerprint: typeof raw.fingerprint === "string" ? raw.fingerprint : null,
    warnings: Array.isArray(raw.warnings) ? raw.warnings.filter((w): w is string => typeof w === "string") : [],
  };
}

export function parseJournal(raw: unknown): Record<string, JournalEntry> {
  const phases = isRecord(raw) && isRecord(raw.phases) ? raw.phases : {};
  const result: Record<string, JournalEntry> = {};
  for (const [id, entry] of Object.entries(phases)) {
    result[id] = parseEntry(entry);
  }
  return result;
}

export function journalPathFor(stateDir: string, targetName: string): string {
  return path.join(stateDir, `${sanitizePathComponent(targetName)}.journal.json`);
}

/**
 * Installation journal: durable record of phase outcomes keyed by phase id.
 * Every save writes a sibling temp file and renames it into place.
 */
export class Journal {
  private constructor(
    readonly target: string,
    private readonly filePath: string | null,
    private phases: Record<string, JournalEntry>,
  ) {}

  /** Load the journal at `filePath`; a missing file yields an empty journal. */
  static async open(filePath: string, target: string): Promise<Journal> {
    let raw: string;
    try {
      raw = await readFile(filePath, "utf8");
    } catch (e) {
      if (isErrnoCode(e, "ENOENT")) return new Journal(target, filePath, {});
      throw e;
    }
    return new Journal(target, filePath, parseJournal(JSON.parse(raw)));
  }

  /** Journal that is never persisted. */
  static inMemory(target: string): Journal {
    return new Journal(target, null, {});
  }

  get path(): string | null {
    return this.filePath;
  }

  get(phaseId: string): JournalEntry {
    const entry = this.phases[phaseId];
    return entry ? { ...entry, warnings: [...entry.warnings] } : { ...PENDING, warnings: [] };
  }

  entries(): Record<string, JournalEntry> {
    const copy: Record<string, JournalEntry> = {};
    for (const id of Object.keys(this.phases)) copy[id] = this.get(id);
    return copy;
  }

  record(phaseId: string, entry: { status: JournalStatus; fingerprint?: string | null; warnings?: string[] }, now = new Date()): void {
    this.phases[phaseId] = {
      status: entry.status,
      timestamp: now.toISOString(),
      fingerprint: entry.fingerprint ?? null,
      warnings: [...(entry.warnings ?? [])],
    };
  }

  /** Clear one phase, or every phase when no id is given. */
  reset(phaseId?: string): void {
    if (phaseId === undefined) {
      this.phases = {};
      return;
    }
    delete this.phases[phaseId];
  }

  /** True when the phase last ended completed or idempotent-skipped with this exact fingerprint. */
  matches(phaseId: string, fingerprint: string | null): boolean {
    if (fingerprint === null) return false;
    const entry = this.get(phaseId);
    return (entry.status === "completed" || entry.status === "skipped-idempotent") && entry.fingerprint === fingerprint;
  }

  /** True when the phase has a terminal success entry, whatever its fingerprint. */
  isDone(phaseId: string): boolean {
    const { status } = this.get(phaseId);
    return status === "completed" || status === "skipped-idempotent";
  }

  toJSON(): JournalFile {
    return { schemaVersion: JOURNAL_SCHEMA_VERSION, target: this.target, phases: this.entries() };
  }

  async save(): Promise<void> {
    if (!this.filePath) return;
    const dir = path.dirname(this.filePath);
    await mkdir(dir, { recursive: true });
    const tmp = `${this.filePath}.tmp.${randomBytes(4).toString("hex")}`;
    try {
      await writeFile(tmp, JSON.stringify(this.toJSON(), null, 2) + "\n", "utf8");
      await rename(tmp, this.filePath);
    } catch (e) {
      await rm(tmp, { force: true });
      throw e;
    }
  }
}

function isErrnoCode(err: unknown, code: string): boolean {
  return err instanceof Error && Reflect.get(err, "code") === code;
}
