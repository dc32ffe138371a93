/**
 * Snapshot persistence for the value table and the episode log
 */

import * as path from 'path';
import { JsonFileStore } from './file-store';
import { ValueTable, ValueTableSnapshot } from '../rl/value-table';
import { EpisodeLog, EpisodeLogSnapshot } from '../episodes/episode-log';
import { DataCorruptionError } from '../utils/errors';
import { createLogger } from '../utils/logger';

const logger = createLogger('SnapshotStore');

export interface Snapshottable<S> {
  snapshot(): S;
  restore(snapshot: unknown): void;
}

export type LoadStatus = 'loaded' | 'missing' | 'corrupt';

export interface LoadReport {
  status: LoadStatus;
  file: string;
  warning?: string;
  quarantinedTo?: string;
}

export class SnapshotStore<S> {
  private readonly file: JsonFileStore<S>;

  constructor(
    private readonly name: string,
    private readonly target: Snapshottable<S>,
    filePath: string
  ) {
    this.file = new JsonFileStore<S>(filePath);
  }

  /**
   * Restore the target from disk. A corrupt or schema-mismatched file leaves
   * the target untouched, is moved aside, and is reported as a warning.
   */
  async load(): Promise<LoadReport> {
    const file = this.file.getFilePath();

    try {
      const data = await this.file.load();
      if (data === null) {
        logger.info(`No ${this.name} found at ${file}, starting fresh`);
        return { status: 'missing', file };
      }
      this.target.restore(data);
      logger.info(`Loaded ${this.name} from ${file}`);
      return { status: 'loaded', file };
    } catch (error) {
      if (!(error instanceof DataCorruptionError)) {
        throw error;
      }
      const quarantinedTo = await this.file.quarantine();
      const warning = `${this.name} at ${file} is corrupt (${error.message}); starting empty`;
      logger.warn(warning, { details: error.details, quarantinedTo });
      return { status: 'corrupt', file, warning, quarantinedTo };
    }
  }

  /**
   * Snapshot synchronously, then write. In-memory updates finish without
   * yielding, so the snapshot never holds a partial update.
   */
  async save(): Promise<void> {
    await this.file.save(this.target.snapshot());
  }

  async flush(): Promise<void> {
    await this.file.flush();
  }

  getFilePath(): string {
    return this.file.getFilePath();
  }
}

export const createValueTableStore = (
  table: ValueTable,
  dataDir: string,
  fileName: string = 'value-table.json'
): SnapshotStore<ValueTableSnapshot> => {
  return new SnapshotStore('value table', table, path.join(dataDir, fileName));
};

export const createEpisodeLogStore = (
  log: EpisodeLog,
  dataDir: string,
  fileName: string = 'episodes.json'
): SnapshotStore<EpisodeLogSnapshot> => {
  return new SnapshotStore('episode log', log, path.join(dataDir, fileName));
};
