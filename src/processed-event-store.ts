/**
 * Processed Event Store
 *
 * Remembers which Slack event ids have already been taken on, so a webhook
 * delivery is acted on at most once, including across restarts. The set is
 * persisted as a JSON array and the whole file is rewritten on every new
 * claim.
 *
 * Claiming (check + add + persist) runs inside a single mutex so concurrent
 * deliveries of the same id observe it as one atomic step.
 */

import * as fsp from 'node:fs/promises';
import * as path from 'node:path';
import { Mutex } from 'async-mutex';
import { z } from 'zod';
import { PersistenceError, errorMessage } from './errors.js';
import type { Logger } from './types.js';

const persistedSchema = z.array(z.string());

export class ProcessedEventStore {
  private readonly filePath: string;
  private readonly logger: Logger;
  private readonly ids = new Set<string>();
  private readonly mutex = new Mutex();

  constructor(filePath: string, logger: Logger) {
    this.filePath = filePath;
    this.logger = logger;
  }

  /**
   * Read persisted ids. A missing file is an empty store; an unreadable or
   * corrupt one is logged and also treated as empty.
   */
  async load(): Promise<void> {
    let raw: string;
    try {
      raw = await fsp.readFile(this.filePath, 'utf-8');
    } catch (err) {
      if (isNotFound(err)) return;
      this.logger.error(`ProcessedEventStore: error loading processed events: ${errorMessage(err)}`);
      return;
    }

    let decoded: unknown;
    try {
      decoded = JSON.parse(raw);
    } catch (err) {
      this.logger.error(`ProcessedEventStore: error loading processed events: ${errorMessage(err)}`);
      return;
    }

    const parsed = persistedSchema.safeParse(decoded);
    if (!parsed.success) {
      this.logger.error(
        `ProcessedEventStore: error loading processed events: ${this.filePath} is not a list of event ids`,
      );
      return;
    }

    for (const id of parsed.data) this.ids.add(id);
    this.logger.info(`ProcessedEventStore: loaded ${this.ids.size} processed event(s) from ${this.filePath}`);
  }

  has(eventId: string): boolean {
    return this.ids.has(eventId);
  }

  get size(): number {
    return this.ids.size;
  }

  /**
   * Add an id and rewrite the state file. The id stays in memory even when
   * the write fails; the failure is reported as a PersistenceError.
   */
  async record(eventId: string): Promise<void> {
    await this.mutex.runExclusive(() => this.addAndPersist(eventId));
  }

  /**
   * Atomically claim an id. Resolves true only for the first-ever claim;
   * later or concurrent claims of the same id resolve false. A failed write
   * is logged and the claim still stands for this process.
   */
  async tryClaim(eventId: string): Promise<boolean> {
    return this.mutex.runExclusive(async () => {
      if (this.ids.has(eventId)) return false;
      try {
        await this.addAndPersist(eventId);
      } catch (err) {
        this.logger.error(`ProcessedEventStore: error saving processed events: ${errorMessage(err)}`);
      }
      return true;
    });
  }

  private async addAndPersist(eventId: string): Promise<void> {
    this.ids.add(eventId);
    try {
      await fsp.mkdir(path.dirname(this.filePath), { recursive: true });
      await fsp.writeFile(this.filePath, JSON.stringify([...this.ids]), 'utf-8');
    } catch (err) {
      throw new PersistenceError(this.filePath, err);
    }
  }
}

// fs errors come from Node's own realm, so `instanceof Error` is not reliable here.
function isNotFound(err: unknown): boolean {
  return typeof err === 'object' && err !== null && 'code' in err && err.code === 'ENOENT';
}
