import Message, { IMessage } from "../models/Message";
import MonthlySmsUsage, { IMonthlySmsUsage } from "../models/MonthlySmsUsage";
import OnboardingLog from "../models/OnboardingLog";
import SmsDeliveryLog from "../models/SmsDeliveryLog";
import StripeEventLog from "../models/StripeEventLog";
import UsageAnalytics from "../models/UsageAnalytics";
import UserProfileModel, { IUserProfile } from "../models/UserProfile";
import WhitelistEntryModel, { IWhitelistEntry } from "../models/WhitelistEntry";
import WhitelistEventModel, { IWhitelistEvent } from "../models/WhitelistEvent";
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
import { PersistenceError, errorMessage } from "../utils/errors";
import { AssistantStore, EnsureProfileResult } from "./types";

// =========================================
// HELPERS
// =========================================

const isDuplicateKeyError = (err: unknown): boolean =>
  typeof err === "object" && err !== null && "code" in err && err.code === 11000;

const guard = async <T>(operation: string, run: () => Promise<T>): Promise<T> => {
  try {
    return await run();
  } catch (err) {
    if (err instanceof PersistenceError) throw err;
    throw new PersistenceError(`${operation} failed: ${errorMessage(err)}`);
  }
};

const toProfile = (doc: IUserProfile): UserProfile => ({
  phone: doc.phone,
  firstName: doc.firstName ?? null,
  location: doc.location ?? null,
  onboardingStep: doc.onboardingStep,
  onboardingCompleted: doc.onboardingCompleted,
  billingCustomerId: doc.billingCustomerId ?? null,
  subscriptionStatus: doc.subscriptionStatus,
  subscriptionId: doc.subscriptionId ?? null,
  trialEnd: doc.trialEnd ?? null,
  createdAt: doc.createdAt,
  updatedAt: doc.updatedAt,
});

const toWhitelistEntry = (doc: IWhitelistEntry): WhitelistEntry => ({
  phone: doc.phone,
  isActive: doc.isActive,
  addedBy: doc.addedBy,
  addedAt: doc.addedAt,
  removedBy: doc.removedBy ?? null,
  removedAt: doc.removedAt ?? null,
});

const toUsagePeriod = (doc: IMonthlySmsUsage): UsagePeriod => ({
  phone: doc.phone,
  periodStart: doc.periodStart,
  periodEnd: doc.periodEnd,
  messageCount: doc.messageCount,
  quotaWarningsSent: doc.quotaWarningsSent,
  quotaExceeded: doc.quotaExceeded,
});

const toMessage = (doc: IMessage): MessageRecord => ({
  phone: doc.phone,
  direction: doc.direction,
  body: doc.body,
  intent: doc.intent ?? null,
  responseTimeMs: doc.responseTimeMs,
  createdAt: doc.createdAt,
});

const toWhitelistEvent = (doc: IWhitelistEvent): WhitelistEvent => ({
  phone: doc.phone,
  action: doc.action,
  source: doc.source,
  createdAt: doc.createdAt,
});

// =========================================
// MONGO ENGINE
// =========================================

/**
 * Mongoose-backed store. Transitions are expressed as single conditional
 * updates; the unique indexes on `phone` and `(phone, periodStart)` turn a
 * lost upsert race into a duplicate-key error, which is read as
 * "already in the target state".
 */
export class MongoStore implements AssistantStore {
  getProfile(phone: PhoneKey): Promise<UserProfile | null> {
    return guard("getProfile", async () => {
      const doc: IUserProfile | null = await UserProfileModel.findOne({ phone }).lean<IUserProfile>();
      return doc ? toProfile(doc) : null;
    });
  }

  findProfileByCustomerId(customerId: string): Promise<UserProfile | null> {
    return guard("findProfileByCustomerId", async () => {
      const doc: IUserProfile | null = await UserProfileModel.findOne({
        billingCustomerId: customerId,
      }).lean<IUserProfile>();
      return doc ? toProfile(doc) : null;
    });
  }

  ensureProfile(phone: PhoneKey, now: Date): Promise<EnsureProfileResult> {
    return guard("ensureProfile", async () => {
      let created = false;
      try {
        const result = await UserProfileModel.updateOne(
          { phone },
          {
            $setOnInsert: {
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
            },
          },
          { upsert: true, timestamps: false }
        );
        created = result.upsertedCount > 0;
      } catch (err) {
        if (!isDuplicateKeyError(err)) throw err;
      }

      const doc: IUserProfile | null = await UserProfileModel.findOne({ phone }).lean<IUserProfile>();
      if (!doc) throw new PersistenceError(`Profile for ${phone} missing after upsert`);
      return { profile: toProfile(doc), created };
    });
  }

  updateProfile(phone: PhoneKey, update: ProfileUpdate, now: Date): Promise<UserProfile | null> {
    return guard("updateProfile", async () => {
      const changes = Object.fromEntries(
        Object.entries(update).filter(([, value]) => value !== undefined)
      );
      const doc: IUserProfile | null = await UserProfileModel.findOneAndUpdate(
        { phone },
        { $set: { ...changes, updatedAt: now } },
        { new: true, timestamps: false }
      ).lean<IUserProfile>();
      return doc ? toProfile(doc) : null;
    });
  }

  advanceOnboarding(
    phone: PhoneKey,
    fromStep: number,
    update: ProfileUpdate,
    now: Date
  ): Promise<UserProfile | null> {
    return guard("advanceOnboarding", async () => {
      const changes = Object.fromEntries(
        Object.entries(update).filter(([, value]) => value !== undefined)
      );
      const doc: IUserProfile | null = await UserProfileModel.findOneAndUpdate(
        { phone, onboardingStep: fromStep },
        { $set: { ...changes, updatedAt: now } },
        { new: true, timestamps: false }
      ).lean<IUserProfile>();
      return doc ? toProfile(doc) : null;
    });
  }

  getWhitelistEntry(phone: PhoneKey): Promise<WhitelistEntry | null> {
    return guard("getWhitelistEntry", async () => {
      const doc: IWhitelistEntry | null = await WhitelistEntryModel.findOne({ phone }).lean<IWhitelistEntry>();
      return doc ? toWhitelistEntry(doc) : null;
    });
  }

  activateWhitelist(phone: PhoneKey, source: WhitelistSource, now: Date): Promise<boolean> {
    return guard("activateWhitelist", async () => {
      try {
        // Matches a missing or inactive row; an active row makes the upsert
        // collide with the unique phone index instead.
        const result = await WhitelistEntryModel.updateOne(
          { phone, isActive: { $ne: true } },
          {
            $set: {
              isActive: true,
              addedBy: source,
              addedAt: now,
              removedBy: null,
              removedAt: null,
            },
          },
          { upsert: true }
        );
        return result.modifiedCount > 0 || result.upsertedCount > 0;
      } catch (err) {
        if (isDuplicateKeyError(err)) return false;
        throw err;
      }
    });
  }

  deactivateWhitelist(phone: PhoneKey, source: WhitelistSource, now: Date): Promise<boolean> {
    return guard("deactivateWhitelist", async () => {
      const result = await WhitelistEntryModel.updateOne(
        { phone, isActive: true },
        { $set: { isActive: false, removedBy: source, removedAt: now } }
      );
      return result.modifiedCount > 0;
    });
  }

  countWhitelist(): Promise<{ active: number; inactive: number }> {
    return guard("countWhitelist", async () => {
      const [active, inactive] = await Promise.all([
        WhitelistEntryModel.countDocuments({ isActive: true }),
        WhitelistEntryModel.countDocuments({ isActive: false }),
      ]);
      return { active, inactive };
    });
  }

  listActivePhones(): Promise<PhoneKey[]> {
    return guard("listActivePhones", async () => {
      const docs = await WhitelistEntryModel.find({ isActive: true })
        .sort({ addedAt: -1 })
        .select("phone")
        .lean<Pick<IWhitelistEntry, "phone">[]>();
      return docs.map((doc) => doc.phone);
    });
  }

  appendWhitelistEvent(event: WhitelistEvent): Promise<void> {
    return guard("appendWhitelistEvent", async () => {
      await WhitelistEventModel.create(event);
    });
  }

  listWhitelistEvents(phone: PhoneKey): Promise<WhitelistEvent[]> {
    return guard("listWhitelistEvents", async () => {
      const docs = await WhitelistEventModel.find({ phone }).sort({ createdAt: 1 }).lean<IWhitelistEvent[]>();
      return docs.map(toWhitelistEvent);
    });
  }

  findUsagePeriod(phone: PhoneKey, at: Date): Promise<UsagePeriod | null> {
    return guard("findUsagePeriod", async () => {
      const doc: IMonthlySmsUsage | null = await MonthlySmsUsage.findOne({
        phone,
        periodStart: { $lte: at },
        periodEnd: { $gt: at },
      })
        .sort({ periodStart: -1 })
        .lean<IMonthlySmsUsage>();
      return doc ? toUsagePeriod(doc) : null;
    });
  }

  openUsagePeriod(phone: PhoneKey, periodStart: Date, periodEnd: Date): Promise<UsagePeriod> {
    return guard("openUsagePeriod", async () => {
      try {
        await MonthlySmsUsage.updateOne(
          { phone, periodStart },
          {
            $setOnInsert: {
              periodEnd,
              messageCount: 0,
              quotaWarningsSent: 0,
              quotaExceeded: false,
            },
          },
          { upsert: true }
        );
      } catch (err) {
        if (!isDuplicateKeyError(err)) throw err;
      }
      return this.requirePeriod(phone, periodStart);
    });
  }

  incrementUsage(phone: PhoneKey, periodStart: Date): Promise<UsagePeriod> {
    return guard("incrementUsage", async () => {
      const doc: IMonthlySmsUsage | null = await MonthlySmsUsage.findOneAndUpdate(
        { phone, periodStart },
        { $inc: { messageCount: 1 } },
        { new: true }
      ).lean<IMonthlySmsUsage>();
      if (!doc) throw new PersistenceError(`No usage period for ${phone} starting ${periodStart.toISOString()}`);
      return toUsagePeriod(doc);
    });
  }

  flagQuotaWarning(phone: PhoneKey, periodStart: Date): Promise<boolean> {
    return guard("flagQuotaWarning", async () => {
      const result = await MonthlySmsUsage.updateOne(
        { phone, periodStart, quotaWarningsSent: 0 },
        { $inc: { quotaWarningsSent: 1 } }
      );
      return result.modifiedCount > 0;
    });
  }

  flagQuotaExceeded(phone: PhoneKey, periodStart: Date): Promise<boolean> {
    return guard("flagQuotaExceeded", async () => {
      const result = await MonthlySmsUsage.updateOne(
        { phone, periodStart, quotaExceeded: false },
        { $set: { quotaExceeded: true } }
      );
      return result.modifiedCount > 0;
    });
  }

  appendMessage(message: MessageRecord): Promise<void> {
    return guard("appendMessage", async () => {
      await Message.create(message);
    });
  }

  listMessages(phone: PhoneKey, limit: number): Promise<MessageRecord[]> {
    return guard("listMessages", async () => {
      const docs = await Message.find({ phone }).sort({ createdAt: -1 }).limit(limit).lean<IMessage[]>();
      return docs.map(toMessage);
    });
  }

  appendUsageAnalytics(record: UsageAnalyticsRecord): Promise<void> {
    return guard("appendUsageAnalytics", async () => {
      await UsageAnalytics.create(record);
    });
  }

  appendOnboardingLog(entry: OnboardingLogEntry): Promise<void> {
    return guard("appendOnboardingLog", async () => {
      await OnboardingLog.create(entry);
    });
  }

  appendStripeEvent(entry: StripeEventLogEntry): Promise<void> {
    return guard("appendStripeEvent", async () => {
      await StripeEventLog.create(entry);
    });
  }

  appendDeliveryLog(entry: SmsDeliveryLogEntry): Promise<void> {
    return guard("appendDeliveryLog", async () => {
      await SmsDeliveryLog.create(entry);
    });
  }

  private async requirePeriod(phone: PhoneKey, periodStart: Date): Promise<UsagePeriod> {
    const doc: IMonthlySmsUsage | null = await MonthlySmsUsage.findOne({ phone, periodStart }).lean<IMonthlySmsUsage>();
    if (!doc) throw new PersistenceError(`No usage period for ${phone} starting ${periodStart.toISOString()}`);
    return toUsagePeriod(doc);
  }
}
