import { AssistantStore } from "../store/types";
import { Clock, PhoneKey, UsagePeriod } from "../types/domain";

const DAY_MS = 24 * 60 * 60 * 1000;
export const USAGE_PERIOD_DAYS = 30;

export type QuotaThreshold = "none" | "warning" | "exceeded";

export type UsageInfo = {
  currentCount: number;
  limit: number;
  remaining: number;
  daysRemaining: number;
  periodStart: Date;
  periodEnd: Date;
  /** Set only on the send that first crossed a threshold in this period. */
  threshold: QuotaThreshold;
};

export const startOfUtcDay = (date: Date): Date =>
  new Date(Date.UTC(date.getUTCFullYear(), date.getUTCMonth(), date.getUTCDate()));

const addDays = (date: Date, days: number) => new Date(date.getTime() + days * DAY_MS);

export interface UsageQuotaService {
  /** Count one assistant reply. System messages must not come through here. */
  recordOutgoing(phone: PhoneKey): Promise<UsageInfo>;
  /** Current-period usage without counting anything. */
  getUsage(phone: PhoneKey): Promise<UsageInfo>;
  isExceeded(phone: PhoneKey): Promise<boolean>;
}

type QuotaDeps = {
  store: AssistantStore;
  now: Clock;
  limit: number;
  warningRemaining: number;
};

/**
 * Rolling 30-day counter anchored to the UTC day of the first tracked send.
 * Advisory: callers decide whether `remaining === 0` blocks anything.
 */
export const createUsageQuotaService = ({
  store,
  now,
  limit,
  warningRemaining,
}: QuotaDeps): UsageQuotaService => {
  const toInfo = (period: UsagePeriod, at: Date, threshold: QuotaThreshold): UsageInfo => ({
    currentCount: period.messageCount,
    limit,
    remaining: Math.max(0, limit - period.messageCount),
    daysRemaining: Math.max(0, Math.floor((period.periodEnd.getTime() - at.getTime()) / DAY_MS)),
    periodStart: period.periodStart,
    periodEnd: period.periodEnd,
    threshold,
  });

  const currentPeriod = async (phone: PhoneKey, at: Date): Promise<UsagePeriod> => {
    const existing = await store.findUsagePeriod(phone, at);
    if (existing) return existing;
    const periodStart = startOfUtcDay(at);
    return store.openUsagePeriod(phone, periodStart, addDays(periodStart, USAGE_PERIOD_DAYS));
  };

  const recordOutgoing = async (phone: PhoneKey): Promise<UsageInfo> => {
    const at = now();
    const period = await currentPeriod(phone, at);
    const updated = await store.incrementUsage(phone, period.periodStart);

    let threshold: QuotaThreshold = "none";
    if (updated.messageCount >= limit) {
      if (await store.flagQuotaExceeded(phone, updated.periodStart)) threshold = "exceeded";
    } else if (limit - updated.messageCount <= warningRemaining) {
      if (await store.flagQuotaWarning(phone, updated.periodStart)) threshold = "warning";
    }

    return toInfo(updated, at, threshold);
  };

  const getUsage = async (phone: PhoneKey): Promise<UsageInfo> => {
    const at = now();
    const existing = await store.findUsagePeriod(phone, at);
    if (existing) return toInfo(existing, at, "none");

    const periodStart = startOfUtcDay(at);
    return toInfo(
      {
        phone,
        periodStart,
        periodEnd: addDays(periodStart, USAGE_PERIOD_DAYS),
        messageCount: 0,
        quotaWarningsSent: 0,
        quotaExceeded: false,
      },
      at,
      "none"
    );
  };

  const isExceeded = async (phone: PhoneKey): Promise<boolean> => {
    const existing = await store.findUsagePeriod(phone, now());
    return existing ? existing.quotaExceeded || existing.messageCount >= limit : false;
  };

  return { recordOutgoing, getUsage, isExceeded };
};
