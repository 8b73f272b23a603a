import { mkdirSync, writeFileSync, readFileSync, existsSync } from "node:fs";
import { dirname } from "node:path";
import { Logger } from "../logger.js";
import { ferryError, asError, errorLogFields } from "../errors.js";
import { isRecord, isTurnRole } from "../agent-types.js";
import type { ConversationTurn, TurnRole } from "../agent-types.js";

export const DEFAULT_MAX_HISTORY = 15;

/** Room for the system turn plus the query being asked. */
export const MIN_MAX_HISTORY = 2;

const PREVIEW_CHARS = 100;

export interface MemoryEntry {
  index: number;
  role: TurnRole;
  preview: string;
}

export type MemoryStats = Record<`${TurnRole}_messages` | "total_messages", number>;

/**
 * Keep well-formed turns only, with at most one system turn and that one first.
 */
function normalizeTurns(raw: unknown): ConversationTurn[] {
  if (!Array.isArray(raw)) {
    Logger.warn("Memory snapshot is not a JSON array; starting empty");
    return [];
  }

  let system: ConversationTurn | null = null;
  const rest: ConversationTurn[] = [];
  for (const entry of raw) {
    if (!isRecord(entry) || !isTurnRole(entry.role) || typeof entry.content !== "string") {
      Logger.debug(`Memory snapshot: skipping malformed entry ${JSON.stringify(entry)}`);
      continue;
    }
    const turn: ConversationTurn = { role: entry.role, content: entry.content };
    if (turn.role !== "system") rest.push(turn);
    else if (!system) system = turn;
    else Logger.debug("Memory snapshot: dropping extra system turn");
  }
  return system ? [system, ...rest] : rest;
}

/**
 * ConversationMemory: the durable, size-bounded turn log.
 *
 * Layout: one JSON array of `{ role, content }` records, rewritten in full on
 * every persist(). There is no locking; one process per snapshot file.
 */
export class ConversationMemory {
  private turns: ConversationTurn[] = [];

  constructor(
    private readonly snapshotPath: string,
    private readonly maxHistory: number = DEFAULT_MAX_HISTORY,
  ) {
    if (!Number.isInteger(maxHistory) || maxHistory < MIN_MAX_HISTORY) {
      throw ferryError("config_error", `max history must be an integer of at least ${MIN_MAX_HISTORY}, got ${maxHistory}`);
    }
  }

  /**
   * Read the snapshot. A missing file is created empty; an unreadable one is
   * treated as empty history.
   */
  load(): ConversationTurn[] {
    if (!existsSync(this.snapshotPath)) {
      Logger.debug(`Memory file not found. Creating new memory file at ${this.snapshotPath}`);
      this.turns = [];
      this.persist();
      return this.snapshot();
    }

    let raw: unknown;
    try {
      raw = JSON.parse(readFileSync(this.snapshotPath, "utf-8"));
    } catch (e: unknown) {
      const fe = ferryError("persistence_error", `Failed to read memory ${this.snapshotPath}: ${asError(e).message}`, { cause: e });
      Logger.warn(fe.message, errorLogFields(fe));
      this.turns = [];
      return this.snapshot();
    }

    this.turns = normalizeTurns(raw);
    if (this.turns.length > this.maxHistory) {
      this.truncate(this.maxHistory);
      this.persist();
    }
    return this.snapshot();
  }

  /** Insert a system turn at position 0 unless one already exists. */
  ensureSystem(instruction: string): void {
    if (this.turns.length > 0 && this.turns[0].role === "system") return;
    this.turns.unshift({ role: "system", content: instruction });
    this.truncate(this.maxHistory);
  }

  append(turn: ConversationTurn): void {
    if (turn.role === "system") {
      throw new Error("system turns are added with ensureSystem(), not append()");
    }
    this.turns.push({ role: turn.role, content: turn.content });
    this.truncate(this.maxHistory);
  }

  /** Keep the first turn and the most recent `maxLen - 1`, dropping the middle. */
  truncate(maxLen: number): void {
    if (!Number.isInteger(maxLen) || maxLen < 1) {
      throw ferryError("config_error", `truncate length must be a positive integer, got ${maxLen}`);
    }
    if (this.turns.length <= maxLen) return;
    const first = this.turns[0];
    const tail = maxLen > 1 ? this.turns.slice(-(maxLen - 1)) : [];
    Logger.debug(`Memory: truncating ${this.turns.length} turns to ${maxLen}`);
    this.turns = [first, ...tail];
  }

  /** Write the full sequence. Last writer wins. */
  persist(): void {
    try {
      mkdirSync(dirname(this.snapshotPath), { recursive: true });
      writeFileSync(this.snapshotPath, JSON.stringify(this.turns, null, 2));
    } catch (e: unknown) {
      const fe = ferryError("persistence_error", `Failed to save memory ${this.snapshotPath}: ${asError(e).message}`, { cause: e });
      Logger.error("Memory save failed:", errorLogFields(fe));
      throw fe;
    }
  }

  /**
   * Drop history. With `keepSystem` the system turn survives.
   * Returns the number of turns removed.
   */
  clear(keepSystem = true): number {
    this.load();
    const before = this.turns.length;
    this.turns = keepSystem ? this.turns.filter((t) => t.role === "system") : [];
    this.persist();
    return before - this.turns.length;
  }

  /** Entries of the snapshot on disk, content cut to a preview. */
  view(): MemoryEntry[] {
    this.load();
    return this.turns.map((t, i) => ({
      index: i + 1,
      role: t.role,
      preview: t.content.length > PREVIEW_CHARS ? t.content.slice(0, PREVIEW_CHARS) + "..." : t.content,
    }));
  }

  stats(): MemoryStats {
    this.load();
    const count = (role: TurnRole) => this.turns.filter((t) => t.role === role).length;
    return {
      total_messages: this.turns.length,
      user_messages: count("user"),
      assistant_messages: count("assistant"),
      system_messages: count("system"),
    };
  }

  size(): number {
    return this.turns.length;
  }

  snapshot(): ConversationTurn[] {
    return this.turns.map((t) => ({ ...t }));
  }
}
