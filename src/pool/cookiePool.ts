import type { Logger } from "pino";
import type { CookieEntry } from "../config.js";
import { describeReason, noValidKey, type Reason } from "../errors.js";
import { normalizeCookie } from "../relay/upstream.js";
import { Channel } from "../utils/channel.js";

export interface CookieLease {
  id: number;
  cookie: string;
  orgUuid?: string;
  /** Known once the organization list has been read for this cookie. */
  isPro?: boolean;
}

/** What a finished request sends back: the (possibly rotated) cookie and its health. */
export interface CookieReturn {
  lease: CookieLease;
  reason: Reason | null;
}

export interface CookieReturnSink {
  send(entry: CookieReturn): Promise<boolean>;
}

export interface CookieSource {
  acquire(): Promise<CookieLease>;
  readonly returns: CookieReturnSink;
}

export interface CookiePoolSummary {
  total: number;
  available: number;
  leased: number;
  coolingDown: number;
  invalid: number;
}

type CookieState =
  | { status: "available" }
  | { status: "cooling"; until: number }
  | { status: "invalid"; reason: Reason };

interface PooledCookie {
  id: number;
  cookie: string;
  orgUuid?: string;
  isPro?: boolean;
  state: CookieState;
  activeLeases: number;
}

export interface MemoryCookiePoolOptions {
  cookies: CookieEntry[];
  logger: Logger;
  defaultCooldownSec: number;
  returnCapacity?: number;
  now?: () => number;
}

/**
 * In-process cookie pool. Requests take cookies with `acquire()` and give
 * them back through `returns`; a single consumer loop applies the returns,
 * so no request touches pool state directly. A healthy cookie may be leased
 * to several requests at once.
 */
export class MemoryCookiePool implements CookieSource {
  public readonly returns: Channel<CookieReturn>;
  private readonly cookies: PooledCookie[];
  private readonly logger: Logger;
  private readonly defaultCooldownSec: number;
  private readonly now: () => number;
  private cursor = 0;
  private readonly consumer: Promise<void>;

  public constructor(options: MemoryCookiePoolOptions) {
    this.cookies = options.cookies.map((entry, id) => ({
      id,
      cookie: normalizeCookie(entry.cookie),
      orgUuid: entry.orgUuid,
      state: { status: "available" },
      activeLeases: 0,
    }));
    this.logger = options.logger;
    this.defaultCooldownSec = options.defaultCooldownSec;
    this.now = options.now ?? (() => Date.now());
    this.returns = new Channel<CookieReturn>(options.returnCapacity ?? 64);
    this.consumer = this.consumeReturns();
  }

  public async acquire(): Promise<CookieLease> {
    this.wakeCooledDown();

    const total = this.cookies.length;
    for (let step = 0; step < total; step += 1) {
      const index = (this.cursor + step) % total;
      const candidate = this.cookies[index];
      if (!candidate || candidate.state.status !== "available") {
        continue;
      }

      this.cursor = (index + 1) % total;
      candidate.activeLeases += 1;
      const lease: CookieLease = { id: candidate.id, cookie: candidate.cookie };
      if (candidate.orgUuid) {
        lease.orgUuid = candidate.orgUuid;
      }
      if (candidate.isPro !== undefined) {
        lease.isPro = candidate.isPro;
      }
      return lease;
    }

    throw noValidKey(total === 0 ? "No cookie configured" : "All cookies are cooling down or invalid");
  }

  public summary(): CookiePoolSummary {
    this.wakeCooledDown();
    const count = (status: CookieState["status"]): number =>
      this.cookies.filter((entry) => entry.state.status === status).length;

    return {
      total: this.cookies.length,
      available: count("available"),
      leased: this.cookies.reduce((sum, entry) => sum + entry.activeLeases, 0),
      coolingDown: count("cooling"),
      invalid: count("invalid"),
    };
  }

  /** Stops accepting returns and waits for the ones already queued. */
  public async close(): Promise<void> {
    this.returns.close();
    await this.consumer;
  }

  private async consumeReturns(): Promise<void> {
    for await (const entry of this.returns) {
      this.applyReturn(entry);
    }
  }

  private applyReturn({ lease, reason }: CookieReturn): void {
    const pooled = this.cookies.find((entry) => entry.id === lease.id);
    if (!pooled) {
      this.logger.warn({ event: "cookie_return_unknown", cookieId: lease.id }, "cookie_return_unknown");
      return;
    }

    pooled.activeLeases = Math.max(0, pooled.activeLeases - 1);
    pooled.cookie = lease.cookie;
    if (lease.orgUuid) {
      pooled.orgUuid = lease.orgUuid;
    }
    if (lease.isPro !== undefined) {
      pooled.isPro = lease.isPro;
    }

    if (!reason) {
      // A healthy return never revives a cookie another request already reported.
      if (pooled.state.status !== "available") {
        this.logger.debug(
          { event: "cookie_return_stale", cookieId: lease.id, state: pooled.state.status },
          "cookie_return_stale",
        );
      }
    } else if (reason.kind === "exhausted") {
      const cooldownSec = reason.retryAfterSec > 0 ? reason.retryAfterSec : this.defaultCooldownSec;
      pooled.state = { status: "cooling", until: this.now() + cooldownSec * 1000 };
    } else {
      pooled.state = { status: "invalid", reason };
    }

    this.logger.info(
      {
        event: "cookie_returned",
        cookieId: lease.id,
        reason: describeReason(reason),
        state: pooled.state.status,
      },
      "cookie_returned",
    );
  }

  private wakeCooledDown(): void {
    const now = this.now();
    for (const entry of this.cookies) {
      if (entry.state.status === "cooling" && entry.state.until <= now) {
        entry.state = { status: "available" };
      }
    }
  }
}
