/**
 * Canonical phone identity, always `+<country><national>`.
 * Produced by `normalizePhone`; never store raw user input as a key.
 */
export type PhoneKey = string;

export type Clock = () => Date;

export const OnboardingStep = {
  NEW: 0,
  AWAITING_NAME: 1,
  AWAITING_LOCATION: 2,
  COMPLETE: 3,
} as const;

export type SubscriptionStatus =
  | "inactive"
  | "trialing"
  | "active"
  | "past_due"
  | "unpaid"
  | "canceled";

export const SUBSCRIPTION_STATUSES: SubscriptionStatus[] = [
  "inactive",
  "trialing",
  "active",
  "past_due",
  "unpaid",
  "canceled",
];

// Statuses that block queries once a phone is whitelisted
export const BLOCKED_SUBSCRIPTION_STATUSES: SubscriptionStatus[] = ["canceled", "past_due", "unpaid"];

export interface UserProfile {
  phone: PhoneKey;
  firstName: string | null;
  location: string | null;
  onboardingStep: number;
  onboardingCompleted: boolean;
  billingCustomerId: string | null;
  subscriptionStatus: SubscriptionStatus;
  subscriptionId: string | null;
  trialEnd: Date | null;
  createdAt: Date;
  updatedAt: Date;
}

/** The only profile fields callers may change. */
export type ProfileUpdate = Partial<
  Pick<
    UserProfile,
    | "firstName"
    | "location"
    | "onboardingStep"
    | "onboardingCompleted"
    | "billingCustomerId"
    | "subscriptionStatus"
    | "subscriptionId"
    | "trialEnd"
  >
>;

export type WhitelistSource =
  | "manual"
  | "system"
  | "admin"
  | "legacy_migration"
  | "stripe_subscription"
  | "stripe_payment"
  | "stripe_cancellation";

export interface WhitelistEntry {
  phone: PhoneKey;
  isActive: boolean;
  addedBy: WhitelistSource;
  addedAt: Date;
  removedBy: WhitelistSource | null;
  removedAt: Date | null;
}

export type WhitelistAction = "added" | "removed";

export interface WhitelistEvent {
  phone: PhoneKey;
  action: WhitelistAction;
  source: WhitelistSource;
  createdAt: Date;
}

export interface WhitelistStats {
  active: number;
  inactive: number;
  total: number;
}

export interface UsagePeriod {
  phone: PhoneKey;
  periodStart: Date;
  periodEnd: Date;
  messageCount: number;
  quotaWarningsSent: number;
  quotaExceeded: boolean;
}

export type QueryIntent = "sports_schedule" | "business_hours" | "weather" | "general" | "error";

export type MessageDirection = "inbound" | "outbound";

export interface MessageRecord {
  phone: PhoneKey;
  direction: MessageDirection;
  body: string;
  intent: QueryIntent | null;
  // 0 for anything that is not an answer to a query
  responseTimeMs: number;
  createdAt: Date;
}

export interface UsageAnalyticsRecord {
  phone: PhoneKey;
  intent: QueryIntent;
  responseTimeMs: number;
  success: boolean;
  createdAt: Date;
}

export type OnboardingField = "first_name" | "location";

export interface OnboardingLogEntry {
  phone: PhoneKey;
  step: number;
  field: OnboardingField;
  value: string;
  createdAt: Date;
}

export type StripeEventOutcome = "processed" | "no_phone" | "error" | "ignored";

export interface StripeEventLogEntry {
  eventId: string;
  eventType: string;
  phone: PhoneKey | null;
  customerId: string | null;
  outcome: StripeEventOutcome;
  detail: string;
  createdAt: Date;
}

export type DeliveryCategory = "reply" | "system";

export interface SmsDeliveryLogEntry {
  phone: PhoneKey;
  body: string;
  category: DeliveryCategory;
  status: string;
  providerMessageId: string | null;
  error: string | null;
  createdAt: Date;
}
