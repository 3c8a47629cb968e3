import { formatCacheDate } from './reportCache/entries.js';

export type GateDenialReason = 'daily_limit' | 'no_coins' | 'busy';

export type GateDecision =
  | { allowed: true; charge: 'free' | 'coin' }
  | { allowed: false; reason: GateDenialReason };

/**
 * Decides whether a user may start a report request. Callers that were
 * allowed must call release() once the request has finished.
 */
export interface RequestGate {
  authorize(userId: string): Promise<GateDecision>;
  release(userId: string): void;
}

/**
 * Gate that never refuses; used by the terminal front end
 */
export const allowAllGate: RequestGate = {
  authorize: async () => ({ allowed: true, charge: 'free' }),
  release: () => undefined,
};

/**
 * Balance lookup for paid requests; the coin economy lives elsewhere
 */
export interface CoinLedger {
  getBalance(userId: string): Promise<number>;
  debit(userId: string, amount: number): Promise<void>;
}

export interface DailyQuotaGateOptions {
  /** Free requests per user per calendar day */
  dailyFreeRequests: number;
  /** Without a ledger, users past their free quota are refused */
  ledger?: CoinLedger;
  clock?: () => Date;
}

interface DailyUsage {
  date: string;
  count: number;
}

/**
 * N free requests per user per day, then one coin per request, and at most
 * one request in flight per user.
 */
export class DailyQuotaGate implements RequestGate {
  private readonly usage = new Map<string, DailyUsage>();
  private readonly inFlight = new Set<string>();
  private readonly clock: () => Date;

  constructor(private readonly options: DailyQuotaGateOptions) {
    this.clock = options.clock ?? (() => new Date());
  }

  async authorize(userId: string): Promise<GateDecision> {
    if (this.inFlight.has(userId)) {
      return { allowed: false, reason: 'busy' };
    }

    const today = formatCacheDate(this.clock());
    const current = this.usage.get(userId);
    const usage: DailyUsage = current && current.date === today ? current : { date: today, count: 0 };

    if (usage.count < this.options.dailyFreeRequests) {
      this.usage.set(userId, { date: today, count: usage.count + 1 });
      this.inFlight.add(userId);
      return { allowed: true, charge: 'free' };
    }

    const { ledger } = this.options;
    if (!ledger) {
      return { allowed: false, reason: 'daily_limit' };
    }

    // Claim the slot before awaiting the ledger so a second call sees 'busy'
    this.inFlight.add(userId);
    try {
      const balance = await ledger.getBalance(userId);
      if (balance < 1) {
        this.inFlight.delete(userId);
        return { allowed: false, reason: 'no_coins' };
      }
      await ledger.debit(userId, 1);
    } catch (error) {
      this.inFlight.delete(userId);
      throw error;
    }

    this.usage.set(userId, { date: today, count: usage.count + 1 });
    return { allowed: true, charge: 'coin' };
  }

  release(userId: string): void {
    this.inFlight.delete(userId);
  }

  /** Requests counted for the user today */
  usedToday(userId: string): number {
    const usage = this.usage.get(userId);
    return usage && usage.date === formatCacheDate(this.clock()) ? usage.count : 0;
  }
}
