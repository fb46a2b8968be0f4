/**
 * Session Manager
 *
 * Resolves session names for one run. Sessions declared in the playbook
 * (temporary sessions) take precedence over the host's SessionProvider.
 * Temporary sessions are rendered against the variables at the time they
 * are materialized and are dropped at the end of the run.
 *
 * @module session
 */

import type { ConfigRenderer } from '../context/ConfigRenderer.js';
import type { VariableManager } from '../context/VariableManager.js';
import type { EngineLogger } from '../core/EngineLogger.js';
import type { SessionConfig } from '../types/core-types.js';
import {
  ConfiguredSession,
  type AuthenticatorFactory,
  type Session,
  type SessionProvider,
} from './Session.js';

export interface SessionManagerOptions {
  provider: SessionProvider;
  renderer: ConfigRenderer;
  variables: VariableManager;
  logger: EngineLogger;
  authenticators?: Readonly<Record<string, AuthenticatorFactory>>;
}

export class SessionManager implements SessionProvider {
  private readonly tempSessions = new Map<string, Session>();
  private tempConfigs: Readonly<Record<string, SessionConfig>> = {};

  constructor(private readonly options: SessionManagerOptions) {}

  /**
   * Register the playbook's session configs without materializing them
   */
  register(configs: Readonly<Record<string, SessionConfig>>): void {
    this.tempConfigs = configs;
  }

  /**
   * Render and build every registered temporary session against the
   * current variables, replacing any built earlier
   */
  initializeTempSessions(): void {
    this.tempSessions.clear();
    for (const name of Object.keys(this.tempConfigs)) {
      this.materialize(name);
    }
    if (this.tempSessions.size > 0) {
      this.options.logger.debug(`Initialized ${this.tempSessions.size} temporary session(s)`, {
        sessions: [...this.tempSessions.keys()],
      });
    }
  }

  clearTempSessions(): void {
    this.tempSessions.clear();
    this.tempConfigs = {};
  }

  /**
   * Temporary sessions first, built on demand; then the provider
   */
  getSession(name: string): Session {
    const existing = this.tempSessions.get(name);
    if (existing) {
      return existing;
    }
    if (Object.prototype.hasOwnProperty.call(this.tempConfigs, name)) {
      return this.materialize(name);
    }
    return this.options.provider.getSession(name);
  }

  private materialize(name: string): Session {
    const config = this.options.renderer.renderSession(this.tempConfigs[name], this.options.variables.getAll());
    const session = new ConfiguredSession(name, config, { authenticators: this.options.authenticators });
    this.tempSessions.set(name, session);
    return session;
  }
}
