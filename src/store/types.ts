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

export interface EnsureProfileResult {
  profile: UserProfile;
  created: boolean;
}

/**
 * Storage seam for every phone-keyed table.
 *
 * Each mutating method is a single conditional operation against the
 * backing engine; methods that report a transition (`activateWhitelist`,
 * `flagQuotaWarning`, ...) return true only for the caller that actually
 * changed the row, so racing callers see at most one winner.
 */
export interface AssistantStore {
  // ---- profiles ----
  getProfile(phone: PhoneKey): Promise<UserProfile | null>;
  findProfileByCustomerId(customerId: string): Promise<UserProfile | null>;
  /** Insert at onboarding step 1 unless a profile exists. */
  ensureProfile(phone: PhoneKey, now: Date): Promise<EnsureProfileResult>;
  updateProfile(phone: PhoneKey, update: ProfileUpdate, now: Date): Promise<UserProfile | null>;
  /** Apply `update` only while the profile still sits at `fromStep`. Null when it has moved on. */
  advanceOnboarding(
    phone: PhoneKey,
    fromStep: number,
    update: ProfileUpdate,
    now: Date
  ): Promise<UserProfile | null>;

  // ---- whitelist ----
  getWhitelistEntry(phone: PhoneKey): Promise<WhitelistEntry | null>;
  /** Insert active or flip inactive -> active. False when already active. */
  activateWhitelist(phone: PhoneKey, source: WhitelistSource, now: Date): Promise<boolean>;
  /** Flip active -> inactive. False when there was no active row. */
  deactivateWhitelist(phone: PhoneKey, source: WhitelistSource, now: Date): Promise<boolean>;
  countWhitelist(): Promise<{ active: number; inactive: number }>;
  listActivePhones(): Promise<PhoneKey[]>;
  appendWhitelistEvent(event: WhitelistEvent): Promise<void>;
  listWhitelistEvents(phone: PhoneKey): Promise<WhitelistEvent[]>;

  // ---- rolling usage ----
  /** The period whose [periodStart, periodEnd) contains `at`. */
  findUsagePeriod(phone: PhoneKey, at: Date): Promise<UsagePeriod | null>;
  /** Insert-if-absent on (phone, periodStart); returns whichever row won. */
  openUsagePeriod(phone: PhoneKey, periodStart: Date, periodEnd: Date): Promise<UsagePeriod>;
  incrementUsage(phone: PhoneKey, periodStart: Date): Promise<UsagePeriod>;
  flagQuotaWarning(phone: PhoneKey, periodStart: Date): Promise<boolean>;
  flagQuotaExceeded(phone: PhoneKey, periodStart: Date): Promise<boolean>;

  // ---- append-only logs ----
  appendMessage(message: MessageRecord): Promise<void>;
  listMessages(phone: PhoneKey, limit: number): Promise<MessageRecord[]>;
  appendUsageAnalytics(record: UsageAnalyticsRecord): Promise<void>;
  appendOnboardingLog(entry: OnboardingLogEntry): Promise<void>;
  appendStripeEvent(entry: StripeEventLogEntry): Promise<void>;
  appendDeliveryLog(entry: SmsDeliveryLogEntry): Promise<void>;
}

export type StoreDriver = "mongo" | "memory";
