/**
 * File Checkpoint Store
 *
 * One JSON document per fingerprint: `<directory>/<content_hash>.json`.
 *
 * @module checkpoint
 */

import { mkdir, readFile, rm, writeFile } from 'node:fs/promises';
import { existsSync } from 'node:fs';
import { join, resolve } from 'node:path';
import type { EngineLogger } from '../core/EngineLogger.js';
import { errorMessage } from '../errors/index.js';
import {
  fromCheckpointRecord,
  toCheckpointRecord,
  type CheckpointData,
  type CheckpointStore,
} from './CheckpointStore.js';

export class FileCheckpointStore implements CheckpointStore {
  private readonly directory: string;

  constructor(
    directory: string,
    private readonly logger: EngineLogger
  ) {
    this.directory = resolve(directory);
  }

  pathFor(contentHash: string): string {
    return join(this.directory, `${contentHash}.json`);
  }

  async save(data: CheckpointData): Promise<void> {
    await mkdir(this.directory, { recursive: true });
    await writeFile(this.pathFor(data.contentHash), JSON.stringify(toCheckpointRecord(data), null, 2), 'utf-8');
  }

  async load(contentHash: string): Promise<CheckpointData | null> {
    const filePath = this.pathFor(contentHash);
    if (!existsSync(filePath)) {
      return null;
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(await readFile(filePath, 'utf-8'));
    } catch (error) {
      this.logger.warn(`Ignoring unreadable checkpoint ${filePath}: ${errorMessage(error)}`);
      return null;
    }

    const data = fromCheckpointRecord(parsed);
    if (!data) {
      this.logger.warn(`Ignoring malformed checkpoint ${filePath}`);
      return null;
    }
    if (data.contentHash !== contentHash) {
      this.logger.warn(`Ignoring checkpoint ${filePath}: content hash mismatch`);
      return null;
    }
    return data;
  }

  async clear(contentHash: string): Promise<void> {
    await rm(this.pathFor(contentHash), { force: true });
  }
}
