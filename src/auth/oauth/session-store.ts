/**
 * In-Memory Session Store
 *
 * Server-side sessions keyed by a random UUID, each holding string values
 * and expiring after a fixed TTL. Sessions live in process memory, so they
 * are lost on restart and not shared between processes; deployments running
 * several instances need a shared implementation of {@link SessionStore}.
 *
 * @module auth/oauth/session-store
 */

import { randomUUID } from "node:crypto";
import type { Logger } from "pino";
import { getComponentLogger } from "../../logging/index.js";
import { SessionNotFoundError } from "../errors.js";
import type { SessionStore } from "./oauth-types.js";

interface SessionEntry {
  values: Map<string, string>;
  expiresAt: number;
}

/**
 * Options for {@link MemorySessionStore}
 */
export interface MemorySessionStoreOptions {
  /** Session lifetime in seconds */
  ttlSeconds: number;

  /** Clock, overridable in tests */
  now?: () => number;
}

export class MemorySessionStore implements SessionStore {
  private readonly sessions = new Map<string, SessionEntry>();
  private readonly ttlMs: number;
  private readonly now: () => number;
  private cleanupInterval: NodeJS.Timeout | null = null;
  private _logger: Logger | null = null;

  constructor(options: MemorySessionStoreOptions) {
    this.ttlMs = options.ttlSeconds * 1000;
    this.now = options.now ?? Date.now;
  }

  private get logger(): Logger {
    if (!this._logger) {
      this._logger = getComponentLogger("auth:session-store");
    }
    return this._logger;
  }

  async createSession(): Promise<string> {
    const sessionId = randomUUID();
    this.sessions.set(sessionId, {
      values: new Map(),
      expiresAt: this.now() + this.ttlMs,
    });
    this.logger.debug({ sessionId: sessionId.substring(0, 8) }, "Session created");
    return sessionId;
  }

  async hasSession(sessionId: string): Promise<boolean> {
    return this.getLiveEntry(sessionId) !== undefined;
  }

  async getValue(sessionId: string, key: string): Promise<string | undefined> {
    return this.getLiveEntry(sessionId)?.values.get(key);
  }

  async setValue(sessionId: string, key: string, value: string): Promise<void> {
    const entry = this.getLiveEntry(sessionId);
    if (!entry) {
      throw new SessionNotFoundError(sessionId);
    }
    entry.values.set(key, value);
  }

  async deleteValue(sessionId: string, key: string): Promise<void> {
    this.getLiveEntry(sessionId)?.values.delete(key);
  }

  async destroySession(sessionId: string): Promise<void> {
    this.sessions.delete(sessionId);
  }

  async cleanExpiredSessions(): Promise<number> {
    const now = this.now();
    let removed = 0;

    for (const [sessionId, entry] of this.sessions) {
      if (entry.expiresAt <= now) {
        this.sessions.delete(sessionId);
        removed++;
      }
    }

    if (removed > 0) {
      this.logger.info({ removed, remaining: this.sessions.size }, "Expired sessions cleaned up");
    }
    return removed;
  }

  /**
   * @param intervalMs - Cleanup interval in milliseconds (default: 300000 = 5 minutes)
   */
  startAutoCleanup(intervalMs: number = 300000): void {
    if (this.cleanupInterval) {
      this.logger.debug("Automatic session cleanup already running");
      return;
    }

    this.cleanupInterval = setInterval(() => {
      this.cleanExpiredSessions().catch((error: unknown) => {
        this.logger.error({ err: error }, "Automatic session cleanup failed");
      });
    }, intervalMs);

    // Do not keep the process alive for cleanup alone
    this.cleanupInterval.unref();

    this.logger.info({ intervalMs }, "Started automatic session cleanup");
  }

  stopAutoCleanup(): void {
    if (this.cleanupInterval) {
      clearInterval(this.cleanupInterval);
      this.cleanupInterval = null;
      this.logger.info("Stopped automatic session cleanup");
    }
  }

  isAutoCleanupRunning(): boolean {
    return this.cleanupInterval !== null;
  }

  /**
   * Number of sessions held, expired ones included until cleanup runs
   */
  get size(): number {
    return this.sessions.size;
  }

  private getLiveEntry(sessionId: string): SessionEntry | undefined {
    const entry = this.sessions.get(sessionId);
    if (!entry) {
      return undefined;
    }
    if (entry.expiresAt <= this.now()) {
      this.sessions.delete(sessionId);
      return undefined;
    }
    return entry;
  }
}
