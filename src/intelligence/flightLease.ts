import crypto from "node:crypto";
import type { Logger } from "../config/logger";
import { withCommandTimeout, type RedisConnection } from "../connectivity/redis";

/**
 * Cross-process half of the single-flight guard. The coordinator keeps its own
 * in-memory flight map; a lease additionally stops two processes from running
 * the same (book, kind) at once.
 */
export interface FlightLease {
  acquire(key: string): Promise<string | null>;
  release(key: string, token: string): Promise<void>;
}

export class MemoryFlightLease implements FlightLease {
  private readonly held = new Map<string, string>();

  async acquire(key: string): Promise<string | null> {
    if (this.held.has(key)) return null;
    const token = crypto.randomUUID();
    this.held.set(key, token);
    return token;
  }

  async release(key: string, token: string): Promise<void> {
    if (this.held.get(key) === token) {
      this.held.delete(key);
    }
  }
}

export type RedisCommandSender = (args: string[]) => Promise<unknown>;

const RELEASE_SCRIPT = `if redis.call("GET", KEYS[1]) == ARGV[1] then return redis.call("DEL", KEYS[1]) else return 0 end`;

export type RedisFlightLeaseOptions = {
  prefix?: string;
  commandTimeoutMs?: number;
};

/** SET NX PX lease; release only deletes the key while it still holds our token. */
export class RedisFlightLease implements FlightLease {
  private readonly prefix: string;
  private readonly commandTimeoutMs: number;

  constructor(
    private readonly sendCommand: RedisCommandSender,
    private readonly leaseMs: number,
    private readonly logger: Logger,
    options: RedisFlightLeaseOptions = {}
  ) {
    this.prefix = options.prefix ?? "library:flight:";
    this.commandTimeoutMs = Math.max(1, options.commandTimeoutMs ?? 5_000);
  }

  async acquire(key: string): Promise<string | null> {
    const token = crypto.randomUUID();
    const reply = await withCommandTimeout("lease acquire", this.commandTimeoutMs, () =>
      this.sendCommand(["SET", `${this.prefix}${key}`, token, "NX", "PX", String(this.leaseMs)])
    );
    if (reply !== "OK") {
      this.logger.debug("flight_lease_busy", { key });
      return null;
    }
    return token;
  }

  async release(key: string, token: string): Promise<void> {
    await withCommandTimeout("lease release", this.commandTimeoutMs, () =>
      this.sendCommand(["EVAL", RELEASE_SCRIPT, "1", `${this.prefix}${key}`, token])
    );
  }
}

export function createRedisFlightLease(redis: RedisConnection, leaseMs: number, logger: Logger): RedisFlightLease {
  return new RedisFlightLease((args) => redis.client.sendCommand(args), leaseMs, logger, {
    commandTimeoutMs: redis.commandTimeoutMs,
  });
}
