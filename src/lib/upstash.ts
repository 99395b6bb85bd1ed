import { TransientInfraError } from '../errors.js';

interface UpstashResponse {
  result?: unknown;
  error?: string;
}

export type RedisArg = string | number;

function isUpstashResponse(value: unknown): value is UpstashResponse {
  return typeof value === 'object' && value !== null && ('result' in value || 'error' in value);
}

/** The Redis surface the stores use; `UpstashClient` is the production one. */
export interface RedisClient {
  command(command: RedisArg[]): Promise<unknown>;
  pipeline(commands: RedisArg[][]): Promise<unknown[]>;
  eval(script: string, keys: string[], args?: RedisArg[]): Promise<unknown>;
}

/**
 * Minimal Upstash REST client: one JSON command array per POST, or a batch
 * through /pipeline. Transport failures surface as TransientInfraError.
 */
export class UpstashClient implements RedisClient {
  private readonly baseUrl: string;

  constructor(url: string, private readonly token: string, private readonly fetchImpl: typeof fetch = fetch) {
    this.baseUrl = url.replace(/\/$/, '');
  }

  async command(command: RedisArg[]): Promise<unknown> {
    const data = await this.post('/', command.map(String));
    if (!isUpstashResponse(data)) throw new TransientInfraError('Malformed Redis response');
    if (data.error) throw new TransientInfraError(`Redis error: ${data.error}`);
    return data.result ?? null;
  }

  async pipeline(commands: RedisArg[][]): Promise<unknown[]> {
    if (commands.length === 0) return [];
    const data = await this.post('/pipeline', commands.map((c) => c.map(String)));
    if (!Array.isArray(data)) throw new TransientInfraError('Malformed Redis pipeline response');
    return data.map((entry: unknown) => {
      if (!isUpstashResponse(entry)) throw new TransientInfraError('Malformed Redis pipeline entry');
      if (entry.error) throw new TransientInfraError(`Redis error: ${entry.error}`);
      return entry.result ?? null;
    });
  }

  /** EVAL with keys and args; scripts keep multi-key updates atomic. */
  eval(script: string, keys: string[], args: RedisArg[] = []): Promise<unknown> {
    return this.command(['EVAL', script, keys.length, ...keys, ...args]);
  }

  private async post(path: string, body: unknown): Promise<unknown> {
    let response: Response;
    try {
      response = await this.fetchImpl(`${this.baseUrl}${path}`, {
        method: 'POST',
        headers: {
          'Authorization': `Bearer ${this.token}`,
          'Content-Type': 'application/json',
        },
        body: JSON.stringify(body),
      });
    } catch (error) {
      throw new TransientInfraError('Redis unreachable', { cause: error });
    }

    if (!response.ok) {
      throw new TransientInfraError(`Redis request failed: ${response.status} ${response.statusText}`);
    }
    const json: unknown = await response.json();
    return json;
  }
}

export function asString(value: unknown): string | null {
  return typeof value === 'string' ? value : null;
}

export function asNumber(value: unknown): number {
  if (typeof value === 'number') return value;
  if (typeof value === 'string') {
    const n = Number(value);
    return Number.isFinite(n) ? n : 0;
  }
  return 0;
}

export function asStringArray(value: unknown): string[] {
  return Array.isArray(value) ? value.filter((v): v is string => typeof v === 'string') : [];
}

/** HGETALL answers a flat [field, value, ...] list. */
export function asHash(value: unknown): Record<string, string> {
  const flat = asStringArray(value);
  const out: Record<string, string> = {};
  for (let i = 0; i + 1 < flat.length; i += 2) {
    const field = flat[i];
    const v = flat[i + 1];
    if (field !== undefined && v !== undefined) out[field] = v;
  }
  return out;
}
