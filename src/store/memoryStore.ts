import {
  MessageRecord,
  OnboardingLogEntry,
  PhoneKey,
  ProfileUpdate,
  SmsDeliveryLogEntry,
  StripeEventLogEntry,
  UsageAnalyticsRecord,
  UsagePeriod,
  UserProfile,
  WhitelistEntry,
  WhitelistEvent,
  WhitelistSource,
} from "../types/domain";
import { PersistenceError } from "../utils/errors";
import { AssistantStore, EnsureProfileResult } from "./types";

const usageKey = (phone: PhoneKey, periodStart: Date) => `${phone}|${periodStart.toISOString()}`;

/**
 * In-process engine (STORE_DRIVER=memory). Every method runs to completion
 * before yielding, which gives the same check-then-act guarantees the
 * Mongo engine gets from conditional updates.
 *
 * Logs are public so tests can audit them directly.
 */
export class MemoryStore implements AssistantStore {
  readonly profiles = new Map<PhoneKey, UserProfile>();
  readonly whitelist = new Map<PhoneKey, WhitelistEntry>();
  readonly usage = new Map<string, UsagePeriod>();
  readonly whitelistEvents: WhitelistEvent[] = [];
  readonly messages: MessageRecord[] = [];
  readonly analytics: UsageAnalyticsRecord[] = [];
  readonly onboardingLog: OnboardingLogEntry[] = [];
  readonly stripeEvents: StripeEventLogEntry[] = [];
  readonly deliveryLog: SmsDeliveryLogEntry[] = [];

  async getProfile(phone: PhoneKey): Promise<UserProfile | null> {
    const profile = this.profiles.get(phone);
    return profile ? { ...profile } : null;
  }

  async findProfileByCustomerId(customerId: string): Promise<UserProfile | null> {
    for (const profile of this.profiles.values()) {
      if (profile.billingCustomerId === customerId) return { ...profile };
    }
    return null;
  }

  async ensureProfile(phone: PhoneKey, now: Date): Promise<EnsureProfileResult> {
    const existing = this.profiles.get(phone);
    if (existing) return { profile: { ...existing }, created: false };

    const profile: UserProfile = {
      phone,
      firstName: null,
      location: null,
      onboardingStep: 1,
      onboardingCompleted: false,
      billingCustomerId: null,
      subscriptionStatus: "inactive",
      subscriptionId: null,
      trialEnd: null,
      createdAt: now,
      updatedAt: now,
    };
    this.profiles.set(phone, profile);
    return { profile: { ...profile }, created: true };
  }

  async updateProfile(phone: PhoneKey, update: ProfileUpdate, now: Date): Promise<UserProfile | null> {
    const existing = this.profiles.get(phone);
    if (!existing) return null;
    const changes = Object.fromEntries(Object.entries(update).filter(([, value]) => value !== undefined));
    const next: UserProfile = { ...existing, ...changes, updatedAt: now };
    this.profiles.set(phone, next);
    return { ...next };
  }

  async advanceOnboarding(
    phone: PhoneKey,
    fromStep: number,
    update: ProfileUpdate,
    now: Date
  ): Promise<UserProfile | null> {
    const existing = this.profiles.get(phone);
    if (!existing || existing.onboardingStep !== fromStep) return null;
    return this.updateProfile(phone, update, now);
  }

  async getWhitelistEntry(phone: PhoneKey): Promise<WhitelistEntry | null> {
    const entry = this.whitelist.get(phone);
    return entry ? { ...entry } : null;
  }

  async activateWhitelist(phone: PhoneKey, source: WhitelistSource, now: Date): Promise<boolean> {
    const existing = this.whitelist.get(phone);
    if (existing?.isActive) return false;
    this.whitelist.set(phone, {
      phone,
      isActive: true,
      addedBy: source,
      addedAt: now,
      removedBy: null,
      removedAt: null,
    });
    return true;
  }

  async deactivateWhitelist(phone: PhoneKey, source: WhitelistSource, now: Date): Promise<boolean> {
    const existing = this.whitelist.get(phone);
    if (!existing?.isActive) return false;
    this.whitelist.set(phone, { ...existing, isActive: false, removedBy: source, removedAt: now });
    return true;
  }

  async countWhitelist(): Promise<{ active: number; inactive: number }> {
    let active = 0;
    let inactive = 0;
    for (const entry of this.whitelist.values()) {
      if (entry.isActive) active += 1;
      else inactive += 1;
    }
    return { active, inactive };
  }

  async listActivePhones(): Promise<PhoneKey[]> {
    return [...this.whitelist.values()].filter((entry) => entry.isActive).map((entry) => entry.phone);
  }

  async appendWhitelistEvent(event: WhitelistEvent): Promise<void> {
    this.whitelistEvents.push({ ...event });
  }

  async listWhitelistEvents(phone: PhoneKey): Promise<WhitelistEvent[]> {
    return this.whitelistEvents.filter((event) => event.phone === phone).map((event) => ({ ...event }));
  }

  async findUsagePeriod(phone: PhoneKey, at: Date): Promise<UsagePeriod | null> {
    for (const period of this.usage.values()) {
      if (
        period.phone === phone &&
        period.periodStart.getTime() <= at.getTime() &&
        at.getTime() < period.periodEnd.getTime()
      ) {
        return { ...period };
      }
    }
    return null;
  }

  async openUsagePeriod(phone: PhoneKey, periodStart: Date, periodEnd: Date): Promise<UsagePeriod> {
    const key = usageKey(phone, periodStart);
    const existing = this.usage.get(key);
    if (existing) return { ...existing };
    const period: UsagePeriod = {
      phone,
      periodStart,
      periodEnd,
      messageCount: 0,
      quotaWarningsSent: 0,
      quotaExceeded: false,
    };
    this.usage.set(key, period);
    return { ...period };
  }

  async incrementUsage(phone: PhoneKey, periodStart: Date): Promise<UsagePeriod> {
    const period = this.requirePeriod(phone, periodStart);
    period.messageCount += 1;
    return { ...period };
  }

  async flagQuotaWarning(phone: PhoneKey, periodStart: Date): Promise<boolean> {
    const period = this.requirePeriod(phone, periodStart);
    if (period.quotaWarningsSent > 0) return false;
    period.quotaWarningsSent += 1;
    return true;
  }

  async flagQuotaExceeded(phone: PhoneKey, periodStart: Date): Promise<boolean> {
    const period = this.requirePeriod(phone, periodStart);
    if (period.quotaExceeded) return false;
    period.quotaExceeded = true;
    return true;
  }

  async appendMessage(message: MessageRecord): Promise<void> {
    this.messages.push({ ...message });
  }

  async listMessages(phone: PhoneKey, limit: number): Promise<MessageRecord[]> {
    return this.messages
      .filter((message) => message.phone === phone)
      .slice(-limit)
      .reverse()
      .map((message) => ({ ...message }));
  }

  async appendUsageAnalytics(record: UsageAnalyticsRecord): Promise<void> {
    this.analytics.push({ ...record });
  }

  async appendOnboardingLog(entry: OnboardingLogEntry): Promise<void> {
    this.onboardingLog.push({ ...entry });
  }

  async appendStripeEvent(entry: StripeEventLogEntry): Promise<void> {
    this.stripeEvents.push({ ...entry });
  }

  async appendDeliveryLog(entry: SmsDeliveryLogEntry): Promise<void> {
    this.deliveryLog.push({ ...entry });
  }

  private requirePeriod(phone: PhoneKey, periodStart: Date): UsagePeriod {
    const period = this.usage.get(usageKey(phone, periodStart));
    if (!period) {
      throw new PersistenceError(`No usage period for ${phone} starting ${periodStart.toISOString()}`);
    }
    return period;
  }
}
