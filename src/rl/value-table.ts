import { z } from 'zod';
import { ACTIONS, Action, State, ValueEntry } from './types';
import { DataCorruptionError } from '../utils/errors';

export const VALUE_TABLE_SCHEMA_VERSION = 1;

export interface ValueTableSnapshot {
  version: number;
  actions: Action[];
  entries: Array<{
    state: State;
    action: Action;
    estimate: number;
    visits: number;
    lastUpdated: number;
  }>;
}

const entrySchema = z.object({
  state: z.string().min(1),
  action: z.enum(ACTIONS),
  estimate: z.number().finite(),
  visits: z.number().int().nonnegative(),
  lastUpdated: z.number().int().nonnegative(),
});

const snapshotSchema = z.object({
  version: z.number().int(),
  actions: z.array(z.string()),
  entries: z.array(entrySchema),
});

export interface ValueTableOptions {
  initialEstimate?: number;
  actions?: readonly Action[];
  now?: () => number;
}

/**
 * Q-table over (state, action) pairs.
 *
 * Entries are created lazily by get() with the configured prior. Callers that
 * update the same key concurrently must serialize through the Learner.
 */
export class ValueTable {
  private table: Map<string, ValueEntry> = new Map();
  private readonly initialEstimate: number;
  private readonly now: () => number;
  readonly actions: readonly Action[];

  constructor(options: ValueTableOptions = {}) {
    this.initialEstimate = options.initialEstimate ?? 0;
    this.actions = options.actions ?? ACTIONS;
    this.now = options.now ?? Date.now;
  }

  get(state: State, action: Action): ValueEntry {
    const key = this.buildKey(state, action);
    let entry = this.table.get(key);
    if (!entry) {
      entry = { estimate: this.initialEstimate, visits: 0, lastUpdated: this.now() };
      this.table.set(key, entry);
    }
    return { ...entry };
  }

  /**
   * Read without creating the entry
   */
  peek(state: State, action: Action): ValueEntry | undefined {
    const entry = this.table.get(this.buildKey(state, action));
    return entry ? { ...entry } : undefined;
  }

  /**
   * Estimate for a pair, falling back to the prior for unseen pairs
   */
  estimate(state: State, action: Action): number {
    return this.table.get(this.buildKey(state, action))?.estimate ?? this.initialEstimate;
  }

  /**
   * Store a new estimate and count one more visit
   */
  update(state: State, action: Action, newEstimate: number): ValueEntry {
    return this.write(state, action, newEstimate, 1);
  }

  /**
   * Store a corrected estimate without counting a visit
   */
  adjust(state: State, action: Action, newEstimate: number): ValueEntry {
    return this.write(state, action, newEstimate, 0);
  }

  stateActions(state: State): Array<{ action: Action } & ValueEntry> {
    const rows: Array<{ action: Action } & ValueEntry> = [];
    for (const action of this.actions) {
      const entry = this.table.get(this.buildKey(state, action));
      if (entry) {
        rows.push({ action, ...entry });
      }
    }
    return rows;
  }

  states(): State[] {
    const seen = new Set<State>();
    for (const key of this.table.keys()) {
      seen.add(this.splitKey(key).state);
    }
    return Array.from(seen).sort();
  }

  size(): number {
    return this.table.size;
  }

  totalVisits(): number {
    let total = 0;
    for (const entry of this.table.values()) {
      total += entry.visits;
    }
    return total;
  }

  snapshot(): ValueTableSnapshot {
    const entries: ValueTableSnapshot['entries'] = [];
    for (const [key, entry] of this.table.entries()) {
      const { state, action } = this.splitKey(key);
      entries.push({ state, action, ...entry });
    }
    return {
      version: VALUE_TABLE_SCHEMA_VERSION,
      actions: [...this.actions],
      entries,
    };
  }

  /**
   * Replace the whole table from a snapshot. Either every entry loads or the
   * table is left untouched and DataCorruptionError is thrown.
   */
  restore(snapshot: unknown): void {
    const parsed = snapshotSchema.safeParse(snapshot);
    if (!parsed.success) {
      throw new DataCorruptionError('Value table snapshot failed schema validation', {
        issues: parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
      });
    }

    const data = parsed.data;
    if (data.version !== VALUE_TABLE_SCHEMA_VERSION) {
      throw new DataCorruptionError(
        `Unsupported value table version ${data.version} (expected ${VALUE_TABLE_SCHEMA_VERSION})`
      );
    }

    const sameActions = data.actions.length === this.actions.length &&
      data.actions.every((action, i) => action === this.actions[i]);
    if (!sameActions) {
      throw new DataCorruptionError('Value table snapshot was written for a different action set', {
        expected: this.actions,
        found: data.actions,
      });
    }

    const next = new Map<string, ValueEntry>();
    for (const row of data.entries) {
      if (!this.actions.includes(row.action)) {
        throw new DataCorruptionError(`Value table entry uses action ${row.action} outside the configured set`, {
          state: row.state,
          expected: this.actions,
        });
      }
      const key = this.buildKey(row.state, row.action);
      if (next.has(key)) {
        throw new DataCorruptionError(`Duplicate value table entry for ${key}`);
      }
      next.set(key, { estimate: row.estimate, visits: row.visits, lastUpdated: row.lastUpdated });
    }

    this.table = next;
  }

  private write(state: State, action: Action, newEstimate: number, visitIncrement: number): ValueEntry {
    const key = this.buildKey(state, action);
    const existing = this.table.get(key);
    const entry: ValueEntry = {
      estimate: newEstimate,
      visits: (existing?.visits ?? 0) + visitIncrement,
      lastUpdated: this.now(),
    };
    this.table.set(key, entry);
    return { ...entry };
  }

  private buildKey(state: State, action: Action): string {
    return `${state}::${action}`;
  }

  private splitKey(key: string): { state: State; action: Action } {
    const at = key.lastIndexOf('::');
    const action = key.slice(at + 2);
    const found = this.actions.find((candidate) => candidate === action);
    if (at < 0 || !found) {
      throw new DataCorruptionError(`Malformed value table key ${key}`);
    }
    return { state: key.slice(0, at), action: found };
  }
}
