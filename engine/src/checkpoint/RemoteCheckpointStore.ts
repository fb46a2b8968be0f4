/**
 * Remote Checkpoint Store
 *
 * Keeps checkpoints behind an HTTP API reached through a session:
 * `PUT|GET|DELETE {endpoint}/checkpoints/{content_hash}`. A 404 on GET means
 * no checkpoint. Requests go through the resilient client, so the session's
 * retry settings apply.
 *
 * @module checkpoint
 */

import type { SleepFn } from '../automation/runtime/BackoffTimer.js';
import type { EngineLogger } from '../core/EngineLogger.js';
import { PlaybookError, PlaybookErrorCode } from '../errors/index.js';
import type { HttpResponse } from '../http/HttpResponse.js';
import type { TransportFactory } from '../http/HttpTransport.js';
import { ResilientHttpClient } from '../http/ResilientHttpClient.js';
import type { HttpRequestSpec } from '../http/HttpRequestBuilder.js';
import type { Session } from '../session/Session.js';
import { DEFAULT_RETRY_CONFIG } from '../types/core-types.js';
import {
  fromCheckpointRecord,
  toCheckpointRecord,
  type CheckpointData,
  type CheckpointStore,
} from './CheckpointStore.js';

export interface RemoteCheckpointStoreOptions {
  /** Resolved per call, so playbook-scoped sessions can be used */
  resolveSession: () => Session;
  endpoint: string;
  logger: EngineLogger;
  transportFactory?: TransportFactory;
  sleep?: SleepFn;
}

export class RemoteCheckpointStore implements CheckpointStore {
  constructor(private readonly options: RemoteCheckpointStoreOptions) {}

  pathFor(contentHash: string): string {
    return `${this.options.endpoint.replace(/\/+$/, '')}/checkpoints/${encodeURIComponent(contentHash)}`;
  }

  async save(data: CheckpointData): Promise<void> {
    const response = await this.send({
      method: 'PUT',
      endpoint: this.pathFor(data.contentHash),
      json: toCheckpointRecord(data),
    });
    this.expectSuccess(response, 'save');
  }

  async load(contentHash: string): Promise<CheckpointData | null> {
    const response = await this.send({ method: 'GET', endpoint: this.pathFor(contentHash) });
    if (response.status === 404) {
      return null;
    }
    this.expectSuccess(response, 'load');

    const data = fromCheckpointRecord(response.data);
    if (!data) {
      this.options.logger.warn('Ignoring malformed remote checkpoint', { contentHash });
      return null;
    }
    return data.contentHash === contentHash ? data : null;
  }

  async clear(contentHash: string): Promise<void> {
    const response = await this.send({ method: 'DELETE', endpoint: this.pathFor(contentHash) });
    if (response.status !== 404) {
      this.expectSuccess(response, 'clear');
    }
  }

  private async send(spec: HttpRequestSpec): Promise<HttpResponse> {
    const session = this.options.resolveSession();
    const client = new ResilientHttpClient(
      session,
      {
        retry: session.retryConfig ?? DEFAULT_RETRY_CONFIG,
        validateSsl: session.validateSsl,
        timeout: session.timeout,
      },
      {
        logger: this.options.logger,
        transportFactory: this.options.transportFactory,
        sleep: this.options.sleep,
      }
    );
    try {
      return await client.executeRequest(spec);
    } finally {
      await client.close();
    }
  }

  private expectSuccess(response: HttpResponse, operation: string): void {
    if (!response.ok) {
      throw new PlaybookError({
        code: PlaybookErrorCode.CHECKPOINT_STORE_FAILED,
        message: `Remote checkpoint ${operation} failed with HTTP ${response.status}`,
        context: { status: response.status, body: response.text.slice(0, 500) },
      });
    }
  }
}
