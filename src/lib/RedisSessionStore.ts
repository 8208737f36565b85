import Redis from 'ioredis';
import { ConversationState, SessionLoadResult, SessionSaveResult, SessionStore } from '../types';
import { SessionStoreUnavailableError } from './errors';
import { createLogger } from './logger';
import { decodeSessionRecord } from './SessionStore';

const logger = createLogger('RedisSessionStore');

/** The subset of ioredis the store uses. */
export interface RedisCommands {
  get(key: string): Promise<string | null>;
  eval(script: string, numKeys: number, ...args: (string | number)[]): Promise<unknown>;
  quit(): Promise<unknown>;
}

// KEYS[1] session key; ARGV[1] expected version, ARGV[2] state JSON, ARGV[3] ttl in ms.
// Returns {1, newVersion} on success or {0, currentVersion} on a conflict.
export const COMPARE_AND_SET_SCRIPT = `
local current = redis.call('GET', KEYS[1])
local version = 0
if current then
  version = tonumber(cjson.decode(current)['version']) or 0
end
if version ~= tonumber(ARGV[1]) then
  return {0, version}
end
local nextVersion = version + 1
redis.call('SET', KEYS[1], '{"version":' .. nextVersion .. ',"state":' .. ARGV[2] .. '}', 'PX', ARGV[3])
return {1, nextVersion}
`;

export interface RedisSessionStoreOptions {
  idleTimeoutMs: number;
  keyPrefix?: string;
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export class RedisSessionStore implements SessionStore {
  private keyPrefix: string;

  constructor(
    private client: RedisCommands,
    private options: RedisSessionStoreOptions
  ) {
    this.keyPrefix = options.keyPrefix ?? 'chef:session:';
  }

  static fromUrl(url: string, options: RedisSessionStoreOptions): RedisSessionStore {
    const redis = new Redis(url, { maxRetriesPerRequest: 1, enableOfflineQueue: false });

    redis.on('error', (error: Error) => {
      logger.error('Redis connection error', error.message);
    });

    return new RedisSessionStore(
      {
        get: key => redis.get(key),
        eval: (script, numKeys, ...args) => redis.eval(script, numKeys, ...args),
        quit: () => redis.quit()
      },
      options
    );
  }

  async load(sessionId: string): Promise<SessionLoadResult> {
    let raw: string | null;
    try {
      raw = await this.client.get(this.key(sessionId));
    } catch (error) {
      throw new SessionStoreUnavailableError(`Could not load session ${sessionId}: ${describe(error)}`, error);
    }
    if (raw === null) return { status: 'not_found' };

    const record = decodeSessionRecord(sessionId, raw);
    return { status: 'found', state: record.state, version: record.version };
  }

  async save(sessionId: string, state: ConversationState, expectedVersion: number): Promise<SessionSaveResult> {
    let result: unknown;
    try {
      result = await this.client.eval(
        COMPARE_AND_SET_SCRIPT,
        1,
        this.key(sessionId),
        expectedVersion,
        JSON.stringify(state),
        this.options.idleTimeoutMs
      );
    } catch (error) {
      throw new SessionStoreUnavailableError(`Could not save session ${sessionId}: ${describe(error)}`, error);
    }

    if (!Array.isArray(result) || result.length !== 2) {
      throw new SessionStoreUnavailableError(`Unexpected reply from Redis while saving session ${sessionId}`);
    }
    const [applied, version] = result.map(Number);
    if (applied === 1) {
      return { status: 'ok', version };
    }
    logger.debug(`Version conflict on ${sessionId}: expected ${expectedVersion}, found ${version}`);
    return { status: 'version_conflict', currentVersion: version };
  }

  async close(): Promise<void> {
    await this.client.quit();
  }

  private key(sessionId: string): string {
    return `${this.keyPrefix}${sessionId}`;
  }
}
