/**
 * Checkpoint store factory
 *
 * @module checkpoint
 */

import type { SleepFn } from '../automation/runtime/BackoffTimer.js';
import type { EngineLogger } from '../core/EngineLogger.js';
import { ConfigurationError } from '../errors/index.js';
import type { TransportFactory } from '../http/HttpTransport.js';
import type { Session } from '../session/Session.js';
import type { IncrementalConfig } from '../types/core-types.js';
import type { CheckpointStore } from './CheckpointStore.js';
import { FileCheckpointStore } from './FileCheckpointStore.js';
import { RemoteCheckpointStore } from './RemoteCheckpointStore.js';

export interface CheckpointStoreDependencies {
  logger: EngineLogger;
  resolveSession: (name: string) => Session;
  transportFactory?: TransportFactory;
  sleep?: SleepFn;
}

/**
 * @returns null when incremental execution is disabled
 */
export function createCheckpointStore(
  config: IncrementalConfig,
  deps: CheckpointStoreDependencies
): CheckpointStore | null {
  if (!config.enabled) {
    return null;
  }

  switch (config.store) {
    case 'file': {
      if (!config.filePath) {
        throw new ConfigurationError({ message: 'incremental.file_path is required for the file store', path: 'incremental.file_path' });
      }
      return new FileCheckpointStore(config.filePath, deps.logger);
    }
    case 'remote': {
      const { session, endpoint } = config;
      if (!session || !endpoint) {
        throw new ConfigurationError({
          message: 'incremental.session and incremental.endpoint are required for the remote store',
          path: 'incremental',
        });
      }
      return new RemoteCheckpointStore({
        resolveSession: () => deps.resolveSession(session),
        endpoint,
        logger: deps.logger,
        transportFactory: deps.transportFactory,
        sleep: deps.sleep,
      });
    }
  }
}
