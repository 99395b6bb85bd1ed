import { z } from 'zod';
import { type RedisClient, asNumber, asString, asStringArray, type RedisArg } from '../../src/lib/upstash.js';

/** One subscription: which connection waits for a task's completion. */
export interface RegistryEntry {
  taskId: string;
  tenantId: string;
  connectionId: string;
  /** Gateway instance holding the connection. */
  instanceId: string;
  subscribedAt: number;
  /** Highest stream sequence relayed so far, -1 before the first chunk. */
  lastSequence: number;
}

/**
 * Backing storage for the notification registry. At most one entry per task;
 * a newer put replaces the older one.
 */
export interface RegistryStore {
  /** Stores the entry and returns the one it replaced, if any. */
  put(entry: RegistryEntry): Promise<RegistryEntry | null>;
  get(taskId: string): Promise<RegistryEntry | null>;
  /** Removes the entry; with a connection id, only while that connection holds it. */
  delete(taskId: string, connectionId?: string): Promise<boolean>;
  /** Set-if-absent delivered marker; true for exactly one caller per task and connection. */
  claimDelivery(taskId: string, connectionId: string, ttlMs: number): Promise<boolean>;
  /** Records a stream sequence number; false when it is not newer than the last one. */
  advanceSequence(taskId: string, sequence: number): Promise<boolean>;
  listOlderThan(cutoff: number, limit: number): Promise<RegistryEntry[]>;
  listByConnection(connectionId: string): Promise<RegistryEntry[]>;
  size(): Promise<number>;
}

export class InMemoryRegistryStore implements RegistryStore {
  private entries = new Map<string, RegistryEntry>();
  private byConnection = new Map<string, Set<string>>();
  private delivered = new Map<string, number>();

  constructor(private readonly now: () => number = Date.now) {}

  async put(entry: RegistryEntry): Promise<RegistryEntry | null> {
    const previous = this.entries.get(entry.taskId) ?? null;
    if (previous) this.unindex(previous);
    this.entries.set(entry.taskId, { ...entry });
    const ids = this.byConnection.get(entry.connectionId) ?? new Set<string>();
    ids.add(entry.taskId);
    this.byConnection.set(entry.connectionId, ids);
    return previous ? { ...previous } : null;
  }

  async get(taskId: string): Promise<RegistryEntry | null> {
    const entry = this.entries.get(taskId);
    return entry ? { ...entry } : null;
  }

  async delete(taskId: string, connectionId?: string): Promise<boolean> {
    const entry = this.entries.get(taskId);
    if (!entry) return false;
    if (connectionId !== undefined && entry.connectionId !== connectionId) return false;
    this.entries.delete(taskId);
    this.unindex(entry);
    return true;
  }

  async claimDelivery(taskId: string, connectionId: string, ttlMs: number): Promise<boolean> {
    const now = this.now();
    for (const [key, expiresAt] of this.delivered) {
      if (expiresAt <= now) this.delivered.delete(key);
    }
    const key = `${taskId}\u0000${connectionId}`;
    if (this.delivered.has(key)) return false;
    this.delivered.set(key, now + ttlMs);
    return true;
  }

  async advanceSequence(taskId: string, sequence: number): Promise<boolean> {
    const entry = this.entries.get(taskId);
    if (!entry || sequence <= entry.lastSequence) return false;
    entry.lastSequence = sequence;
    return true;
  }

  async listOlderThan(cutoff: number, limit: number): Promise<RegistryEntry[]> {
    const out: RegistryEntry[] = [];
    for (const entry of this.entries.values()) {
      if (entry.subscribedAt < cutoff) out.push({ ...entry });
      if (out.length >= limit) break;
    }
    return out;
  }

  async listByConnection(connectionId: string): Promise<RegistryEntry[]> {
    const ids = this.byConnection.get(connectionId) ?? new Set<string>();
    const out: RegistryEntry[] = [];
    for (const id of ids) {
      const entry = this.entries.get(id);
      if (entry) out.push({ ...entry });
    }
    return out;
  }

  async size(): Promise<number> {
    return this.entries.size;
  }

  private unindex(entry: RegistryEntry): void {
    const ids = this.byConnection.get(entry.connectionId);
    if (!ids) return;
    ids.delete(entry.taskId);
    if (ids.size === 0) this.byConnection.delete(entry.connectionId);
  }
}

const StoredEntrySchema = z.object({
  taskId: z.string(),
  tenantId: z.string(),
  connectionId: z.string(),
  instanceId: z.string(),
  subscribedAt: z.number(),
  lastSequence: z.number().int().default(-1),
});

function parseEntry(raw: string | null): RegistryEntry | null {
  if (!raw) return null;
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch {
    return null;
  }
  const parsed = StoredEntrySchema.safeParse(json);
  return parsed.success ? parsed.data : null;
}

// KEYS: sequence key. ARGV: sequence, ttl ms
const ADVANCE_SEQUENCE_SCRIPT = `
local current = tonumber(redis.call('GET', KEYS[1]) or '-1')
local next = tonumber(ARGV[1])
if next <= current then return 0 end
redis.call('SET', KEYS[1], next, 'PX', ARGV[2])
return 1
`;

// KEYS: entry key. ARGV: connection id ('' for any)
const DELETE_ENTRY_SCRIPT = `
local raw = redis.call('GET', KEYS[1])
if not raw then return nil end
if ARGV[1] ~= '' and not string.find(raw, '"connectionId":"' .. ARGV[1] .. '"', 1, true) then return nil end
redis.call('DEL', KEYS[1])
return raw
`;

/**
 * Registry shared by several gateway instances. Entries expire with the
 * registry TTL so a crashed instance leaves nothing behind for long.
 */
export class RedisRegistryStore implements RegistryStore {
  private readonly indexKey = 'subs:index';

  constructor(
    private readonly client: RedisClient,
    private readonly ttlMs: number,
  ) {}

  private entryKey(taskId: string): string {
    return `sub:${taskId}`;
  }

  private sequenceKey(taskId: string): string {
    return `subseq:${taskId}`;
  }

  private connectionKey(connectionId: string): string {
    return `subs:conn:${connectionId}`;
  }

  private deliveredKey(taskId: string, connectionId: string): string {
    return `delivered:${taskId}:${connectionId}`;
  }

  async put(entry: RegistryEntry): Promise<RegistryEntry | null> {
    const [previousRaw] = await this.client.pipeline([
      ['GET', this.entryKey(entry.taskId)],
      ['SET', this.entryKey(entry.taskId), JSON.stringify(entry), 'PX', this.ttlMs],
      ['SET', this.sequenceKey(entry.taskId), entry.lastSequence, 'PX', this.ttlMs],
      ['ZADD', this.indexKey, entry.subscribedAt, entry.taskId],
      ['SADD', this.connectionKey(entry.connectionId), entry.taskId],
      ['PEXPIRE', this.connectionKey(entry.connectionId), this.ttlMs],
    ]);
    const previous = parseEntry(asString(previousRaw));
    if (previous && previous.connectionId !== entry.connectionId) {
      await this.client.command(['SREM', this.connectionKey(previous.connectionId), entry.taskId]);
    }
    return previous;
  }

  async get(taskId: string): Promise<RegistryEntry | null> {
    const [raw, sequence] = await this.client.pipeline([
      ['GET', this.entryKey(taskId)],
      ['GET', this.sequenceKey(taskId)],
    ]);
    const entry = parseEntry(asString(raw));
    if (!entry) return null;
    return sequence === null ? entry : { ...entry, lastSequence: asNumber(sequence) };
  }

  async delete(taskId: string, connectionId?: string): Promise<boolean> {
    const raw = asString(await this.client.eval(DELETE_ENTRY_SCRIPT, [this.entryKey(taskId)], [connectionId ?? '']));
    const removed = parseEntry(raw);
    if (!removed) return false;
    await this.client.pipeline([
      ['DEL', this.sequenceKey(taskId)],
      ['ZREM', this.indexKey, taskId],
      ['SREM', this.connectionKey(removed.connectionId), taskId],
    ]);
    return true;
  }

  async claimDelivery(taskId: string, connectionId: string, ttlMs: number): Promise<boolean> {
    const claimed = await this.client.command(['SET', this.deliveredKey(taskId, connectionId), '1', 'NX', 'PX', ttlMs]);
    return claimed !== null;
  }

  async advanceSequence(taskId: string, sequence: number): Promise<boolean> {
    const advanced = await this.client.eval(ADVANCE_SEQUENCE_SCRIPT, [this.sequenceKey(taskId)], [sequence, this.ttlMs]);
    return asNumber(advanced) === 1;
  }

  async listOlderThan(cutoff: number, limit: number): Promise<RegistryEntry[]> {
    const args: RedisArg[] = ['ZRANGEBYSCORE', this.indexKey, '-inf', `(${cutoff}`, 'LIMIT', 0, limit];
    const ids = asStringArray(await this.client.command(args));
    return this.loadMany(ids, true);
  }

  async listByConnection(connectionId: string): Promise<RegistryEntry[]> {
    const ids = asStringArray(await this.client.command(['SMEMBERS', this.connectionKey(connectionId)]));
    return this.loadMany(ids, false);
  }

  async size(): Promise<number> {
    return asNumber(await this.client.command(['ZCARD', this.indexKey]));
  }

  private async loadMany(ids: string[], dropMissing: boolean): Promise<RegistryEntry[]> {
    if (ids.length === 0) return [];
    const raws = await this.client.pipeline(ids.map((id) => ['GET', this.entryKey(id)]));
    const out: RegistryEntry[] = [];
    const missing: string[] = [];
    raws.forEach((raw, i) => {
      const entry = parseEntry(asString(raw));
      const id = ids[i];
      if (entry) out.push(entry);
      else if (id !== undefined) missing.push(id);
    });
    // Entries that expired by TTL still sit in the index
    if (dropMissing && missing.length > 0) {
      await this.client.command(['ZREM', this.indexKey, ...missing]);
    }
    return out;
  }
}
