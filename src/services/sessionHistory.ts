import { v4 as uuidv4 } from 'uuid';
import { FinalResponse } from '../domain/models/stepResults';
import { createLogger } from '../utils/logger';

const logger = createLogger('SessionHistory');

export interface SessionHistory {
  session_id: string;
  query_history: string[];
  response_history: FinalResponse[];
  documents_added: number;
  created_at: string;
  updated_at: string;
}

export interface SessionHistoryLimits {
  maxSessions: number;
  maxEntriesPerSession: number;
}

const DEFAULT_LIMITS: SessionHistoryLimits = {
  maxSessions: 1000,
  maxEntriesPerSession: 100,
};

export const newSessionId = (): string => `session-${uuidv4()}`;

/**
 * In-memory per-session record of queries, responses and indexed documents.
 * The least recently updated session is evicted once `maxSessions` is reached.
 */
export class SessionHistoryStore {
  private sessions = new Map<string, SessionHistory>();
  private limits: SessionHistoryLimits;

  constructor(limits: Partial<SessionHistoryLimits> = {}) {
    this.limits = { ...DEFAULT_LIMITS, ...limits };
  }

  get(sessionId: string): SessionHistory | undefined {
    return this.sessions.get(sessionId);
  }

  recordQuery(sessionId: string, query: string, response: FinalResponse): SessionHistory {
    const session = this.touch(sessionId);
    session.query_history.push(query);
    session.response_history.push(response);

    const overflow = session.query_history.length - this.limits.maxEntriesPerSession;
    if (overflow > 0) {
      session.query_history.splice(0, overflow);
      session.response_history.splice(0, overflow);
    }
    return session;
  }

  recordDocuments(sessionId: string, count: number): SessionHistory {
    const session = this.touch(sessionId);
    session.documents_added += count;
    return session;
  }

  /** Empties the query and response history; the document count is kept. Returns false for unknown sessions. */
  clear(sessionId: string): boolean {
    const session = this.sessions.get(sessionId);
    if (!session) {
      return false;
    }
    session.query_history = [];
    session.response_history = [];
    session.updated_at = new Date().toISOString();
    return true;
  }

  size(): number {
    return this.sessions.size;
  }

  private touch(sessionId: string): SessionHistory {
    const now = new Date().toISOString();
    const existing = this.sessions.get(sessionId);
    if (existing) {
      // Re-insert so Map iteration order tracks recency
      this.sessions.delete(sessionId);
      existing.updated_at = now;
      this.sessions.set(sessionId, existing);
      return existing;
    }

    if (this.sessions.size >= this.limits.maxSessions) {
      const oldest = this.sessions.keys().next();
      if (!oldest.done) {
        this.sessions.delete(oldest.value);
        logger.debug(`Evicted session ${oldest.value}`);
      }
    }

    const session: SessionHistory = {
      session_id: sessionId,
      query_history: [],
      response_history: [],
      documents_added: 0,
      created_at: now,
      updated_at: now,
    };
    this.sessions.set(sessionId, session);
    return session;
  }
}
