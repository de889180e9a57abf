import { mkdir, open, readFile, rename, rm } from 'node:fs/promises';
import path from 'node:path';

import type { Logging } from 'homebridge';

import { PersistenceError, describeError } from '../errors.js';
import { CAMERA_PLACEHOLDER } from '../settings.js';
import { privacyOff, privacyOn } from './state.js';
import type { PrivacyState } from './state.js';

export interface StateStore {
  /** Restores the records of the named cameras. Cameras without a readable record are absent. */
  load(cameraNames: readonly string[]): Promise<Map<string, PrivacyState>>;
  /** @throws PersistenceError */
  save(cameraName: string, state: PrivacyState): Promise<void>;
}

interface StoredRecord {
  cameraName: string;
  privacyEnabled: boolean;
  enabledAtTimestamp: string | null;
}

type Document = Record<string, unknown>;

function isDocument(value: unknown): value is Document {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

function encode(state: PrivacyState): StoredRecord {
  return {
    cameraName: state.cameraName,
    privacyEnabled: state.privacyEnabled,
    enabledAtTimestamp: state.privacyEnabled ? new Date(state.enabledAtTimestamp).toISOString() : null,
  };
}

function parseTimestamp(value: unknown): number | null {
  if (typeof value === 'number' && Number.isFinite(value)) {
    return value;
  }
  if (typeof value === 'string') {
    const parsed = Date.parse(value);
    return Number.isNaN(parsed) ? null : parsed;
  }
  return null;
}

/**
 * Persists privacy state as JSON. A `{camera}` placeholder in the path template gives every
 * camera its own file; without one, all cameras share a single document keyed by camera name.
 *
 * Writes go to a flushed temp file that is renamed over the target, then the directory is
 * flushed. Writes to one file are queued.
 */
export class FileStateStore implements StateStore {
  private readonly queues = new Map<string, Promise<void>>();
  private sharedDocument: Document = {};
  private tempCounter = 0;

  constructor(
    private readonly template: string,
    private readonly log: Logging,
    private readonly now: () => number = Date.now,
  ) {}

  public get perCamera(): boolean {
    return this.template.includes(CAMERA_PLACEHOLDER);
  }

  public pathFor(cameraName: string): string {
    return this.perCamera ? this.template.split(CAMERA_PLACEHOLDER).join(cameraName) : this.template;
  }

  public async load(cameraNames: readonly string[]): Promise<Map<string, PrivacyState>> {
    const states = new Map<string, PrivacyState>();

    if (this.perCamera) {
      for (const name of cameraNames) {
        const file = this.pathFor(name);
        const state = this.decode(name, await this.readDocument(file), file);
        if (state) {
          states.set(name, state);
        }
      }
      return states;
    }

    const document = await this.readDocument(this.template);
    this.sharedDocument = isDocument(document) ? { ...document } : {};

    for (const name of cameraNames) {
      const state = this.decode(name, this.sharedDocument[name], this.template);
      if (state) {
        states.set(name, state);
      }
    }
    return states;
  }

  public save(cameraName: string, state: PrivacyState): Promise<void> {
    const file = this.pathFor(cameraName);

    return this.enqueue(file, async () => {
      let body: unknown = encode(state);
      if (!this.perCamera) {
        this.sharedDocument[cameraName] = body;
        body = this.sharedDocument;
      }
      await this.writeAtomic(file, `${JSON.stringify(body, null, 2)}\n`);
      this.log.debug(`[${cameraName}] Saved privacy state to ${file}`);
    });
  }

  private enqueue(file: string, write: () => Promise<void>): Promise<void> {
    const previous = this.queues.get(file) ?? Promise.resolve();
    const next = previous.then(write);
    // The queue only orders writes; each caller sees its own failure through `next`.
    this.queues.set(file, next.catch(() => undefined));
    return next;
  }

  private async writeAtomic(file: string, contents: string): Promise<void> {
    const temp = `${file}.${process.pid}.${++this.tempCounter}.tmp`;

    try {
      await mkdir(path.dirname(file), { recursive: true });
      const handle = await open(temp, 'w');
      try {
        await handle.writeFile(contents, 'utf8');
        await handle.sync();
      } finally {
        await handle.close();
      }
      await rename(temp, file);
    } catch (error) {
      await rm(temp, { force: true });
      throw new PersistenceError(`Failed to write ${file}: ${describeError(error)}`, file, { cause: error });
    }

    await this.syncDirectory(path.dirname(file));
  }

  /** Makes the rename itself durable. Not every filesystem lets a directory be fsynced. */
  private async syncDirectory(directory: string): Promise<void> {
    try {
      const handle = await open(directory, 'r');
      try {
        await handle.sync();
      } finally {
        await handle.close();
      }
    } catch (error) {
      this.log.debug(`Could not flush directory ${directory}: ${describeError(error)}`);
    }
  }

  private async readDocument(file: string): Promise<unknown> {
    let contents: string;
    try {
      contents = await readFile(file, 'utf8');
    } catch (error) {
      if (!isMissingFile(error)) {
        this.log.error(`Failed to read privacy state from ${file}: ${describeError(error)}`);
      }
      return undefined;
    }

    try {
      return JSON.parse(contents);
    } catch (error) {
      this.log.error(`Ignoring malformed privacy state in ${file}: ${describeError(error)}`);
      return undefined;
    }
  }

  private decode(cameraName: string, record: unknown, source: string): PrivacyState | undefined {
    if (record === undefined) {
      return undefined;
    }
    if (!isDocument(record) || typeof record.privacyEnabled !== 'boolean') {
      this.log.warn(`[${cameraName}] Ignoring privacy state without a privacyEnabled flag in ${source}`);
      return undefined;
    }

    const enabledAt = parseTimestamp(record.enabledAtTimestamp);

    if (!record.privacyEnabled) {
      if (enabledAt !== null) {
        this.log.warn(`[${cameraName}] Dropping enabledAtTimestamp stored while privacy was off`);
      }
      return privacyOff(cameraName);
    }

    if (enabledAt === null) {
      this.log.warn(`[${cameraName}] Privacy was stored as enabled without a start time; timing it from now`);
      return privacyOn(cameraName, this.now());
    }

    return privacyOn(cameraName, enabledAt);
  }
}
