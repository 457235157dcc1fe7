// Copyright 2026 Layne Penney
// SPDX-License-Identifier: Apache-2.0

import { AGENT_CONFIG } from './constants.js';
import { KeyedMutex } from './utils/keyed-mutex.js';

/**
 * One completed question and answer.
 */
export interface Exchange {
  query: string;
  answer: string;
  timestamp: string;
}

/**
 * Holds recent exchanges per session in memory.
 * Each session keeps at most `maxHistory` exchanges, oldest dropped first.
 */
export class SessionManager {
  private readonly sessions = new Map<string, Exchange[]>();
  private readonly locks = new KeyedMutex();
  private counter = 0;

  constructor(private readonly maxHistory: number = AGENT_CONFIG.MAX_HISTORY) {
    if (!Number.isInteger(maxHistory) || maxHistory < 0) {
      throw new RangeError(`maxHistory must be a non-negative integer, got ${maxHistory}`);
    }
  }

  getMaxHistory(): number {
    return this.maxHistory;
  }

  /**
   * Create an empty session and return its id.
   */
  createSession(): string {
    let id: string;
    do {
      this.counter++;
      id = `session_${this.counter}`;
    } while (this.sessions.has(id));

    this.sessions.set(id, []);
    return id;
  }

  hasSession(sessionId: string): boolean {
    return this.sessions.has(sessionId);
  }

  /**
   * Exchanges for a session, newest last. Unknown sessions have none.
   */
  getHistory(sessionId: string): Exchange[] {
    return [...(this.sessions.get(sessionId) ?? [])];
  }

  /**
   * Record an exchange, creating the session on first use.
   * Appends to the same session run one at a time.
   */
  async append(sessionId: string, query: string, answer: string): Promise<void> {
    await this.locks.runExclusive(sessionId, () => {
      const exchanges = [
        ...(this.sessions.get(sessionId) ?? []),
        { query, answer, timestamp: new Date().toISOString() },
      ];
      this.sessions.set(sessionId, this.maxHistory > 0 ? exchanges.slice(-this.maxHistory) : []);
    });
  }

  /**
   * Render history as prompt text, or null when there is none.
   */
  formatHistory(sessionId: string): string | null {
    const exchanges = this.getHistory(sessionId);
    if (exchanges.length === 0) return null;

    return exchanges
      .map((e) => `User: ${e.query}\nAssistant: ${e.answer}`)
      .join('\n');
  }

  /**
   * Drop all exchanges but keep the session.
   */
  clearSession(sessionId: string): void {
    if (this.sessions.has(sessionId)) {
      this.sessions.set(sessionId, []);
    }
  }

  deleteSession(sessionId: string): boolean {
    return this.sessions.delete(sessionId);
  }

  listSessions(): string[] {
    return Array.from(this.sessions.keys());
  }
}
