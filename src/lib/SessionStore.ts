import { z } from 'zod';
import { ConversationState, SessionLoadResult, SessionSaveResult, SessionStore } from '../types';
import { SessionStoreUnavailableError } from './errors';
import { createLogger } from './logger';
import { ConversationStateSchema } from './schemas';

const logger = createLogger('SessionStore');

const SessionRecordSchema = z.object({
  version: z.number().int().positive(),
  state: ConversationStateSchema
});

export type SessionRecord = z.infer<typeof SessionRecordSchema>;

export function encodeSessionRecord(version: number, state: ConversationState): string {
  return JSON.stringify({ version, state });
}

export function decodeSessionRecord(sessionId: string, raw: string): SessionRecord {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (error) {
    throw new SessionStoreUnavailableError(`Stored session ${sessionId} is not valid JSON`, error);
  }
  const parsed = SessionRecordSchema.safeParse(json);
  if (!parsed.success) {
    throw new SessionStoreUnavailableError(
      `Stored session ${sessionId} is unreadable: ${parsed.error.issues.map(issue => issue.message).join('; ')}`,
      parsed.error
    );
  }
  return parsed.data;
}

export interface InMemorySessionStoreOptions {
  idleTimeoutMs: number;
  now?: () => number;
}

interface StoredEntry {
  payload: string;
  version: number;
  expiresAt: number;
}

/**
 * Process-local session store. Entries are kept serialized so a loaded
 * state never aliases the stored one, and expire after the idle timeout.
 */
export class InMemorySessionStore implements SessionStore {
  private entries = new Map<string, StoredEntry>();
  private now: () => number;

  constructor(private options: InMemorySessionStoreOptions) {
    this.now = options.now ?? Date.now;
  }

  async load(sessionId: string): Promise<SessionLoadResult> {
    const entry = this.liveEntry(sessionId);
    if (!entry) return { status: 'not_found' };

    const record = decodeSessionRecord(sessionId, entry.payload);
    return { status: 'found', state: record.state, version: record.version };
  }

  async save(sessionId: string, state: ConversationState, expectedVersion: number): Promise<SessionSaveResult> {
    this.sweep();
    const currentVersion = this.liveEntry(sessionId)?.version ?? 0;
    if (currentVersion !== expectedVersion) {
      logger.debug(`Version conflict on ${sessionId}: expected ${expectedVersion}, found ${currentVersion}`);
      return { status: 'version_conflict', currentVersion };
    }

    const version = currentVersion + 1;
    this.entries.set(sessionId, {
      payload: encodeSessionRecord(version, state),
      version,
      expiresAt: this.now() + this.options.idleTimeoutMs
    });
    return { status: 'ok', version };
  }

  /** Entries held, including expired ones not yet swept. */
  size(): number {
    return this.entries.size;
  }

  private sweep(): void {
    const now = this.now();
    for (const [sessionId, entry] of this.entries) {
      if (entry.expiresAt <= now) this.entries.delete(sessionId);
    }
  }

  private liveEntry(sessionId: string): StoredEntry | undefined {
    const entry = this.entries.get(sessionId);
    if (entry && entry.expiresAt <= this.now()) {
      this.entries.delete(sessionId);
      return undefined;
    }
    return entry;
  }
}
