import { AssistantStore } from "../store/types";
import { BLOCKED_SUBSCRIPTION_STATUSES, Clock, PhoneKey, UserProfile } from "../types/domain";
import { createLogger } from "../utils/logger";
import { maskPhone, normalizePhone } from "../utils/phone";
import { checkContent } from "./contentFilter";
import { MessageTemplates } from "./messageTemplates";
import { Messenger } from "./messenger";
import { OnboardingService } from "./onboardingService";
import { QueryContext, QueryResolver } from "./queryResolver";
import { UsageInfo, UsageQuotaService } from "./usageQuotaService";
import { WhitelistLedger } from "./whitelistLedger";

const log = createLogger("Router");

export type InboundOutcomeKind =
  | "invalid"
  | "filtered"
  | "command"
  | "onboarding"
  | "not_subscribed"
  | "subscription_inactive"
  | "quota_exceeded"
  | "answered"
  | "error";

export type InboundOutcome = {
  kind: InboundOutcomeKind;
  phone: PhoneKey | null;
  /** Text sent back to the user, if any. */
  reply: string | null;
};

type Command = "stop" | "start" | "help";

const COMMANDS: Record<string, Command> = {
  STOP: "stop",
  QUIT: "stop",
  UNSUBSCRIBE: "stop",
  START: "start",
  SUBSCRIBE: "start",
  RESUME: "start",
  HELP: "help",
  INFO: "help",
};

export const parseCommand = (text: string): Command | null =>
  COMMANDS[text.trim().replace(/[.!?]+$/, "").toUpperCase()] ?? null;

export interface InboundRouter {
  handleInbound(rawPhone: string, rawText: string): Promise<InboundOutcome>;
}

type RouterDeps = {
  store: AssistantStore;
  ledger: WhitelistLedger;
  onboarding: OnboardingService;
  quota: UsageQuotaService;
  messenger: Messenger;
  resolver: QueryResolver;
  templates: MessageTemplates;
  now: Clock;
  quotaEnforced: boolean;
};

const contextFor = (profile: UserProfile): QueryContext =>
  profile.onboardingCompleted && profile.firstName && profile.location
    ? { personalized: true, firstName: profile.firstName, location: profile.location }
    : { personalized: false };

/**
 * One inbound SMS in, at most a couple of SMS out. Commands first, then
 * whitelist reconciliation, the billing and quota gates, onboarding, and
 * finally the query resolver.
 */
export const createInboundRouter = ({
  store,
  ledger,
  onboarding,
  quota,
  messenger,
  resolver,
  templates,
  now,
  quotaEnforced,
}: RouterDeps): InboundRouter => {
  const respond = async (kind: InboundOutcomeKind, phone: PhoneKey, reply: string): Promise<InboundOutcome> => {
    await messenger.sendSystem(phone, reply);
    return { kind, phone, reply };
  };

  const handleCommand = async (phone: PhoneKey, command: Command): Promise<InboundOutcome> => {
    switch (command) {
      case "stop":
        // Soft unsubscribe: the whitelist row stays active
        log.warn("STOP received, whitelist left unchanged", { phone: maskPhone(phone) });
        return respond("command", phone, templates.unsubscribed());
      case "start": {
        await ledger.add(phone, "system", false);
        const profile = await store.getProfile(phone);
        const reply =
          profile?.onboardingCompleted ? templates.welcomeBack(profile.firstName) : onboarding.promptFor(profile);
        return respond("command", phone, reply);
      }
      case "help":
        return respond("command", phone, templates.help());
    }
  };

  // Returns an outcome when the message was fully handled here
  const reconcile = async (phone: PhoneKey): Promise<InboundOutcome | null> => {
    if (await ledger.isActive(phone)) return null;

    const profile = await store.getProfile(phone);
    if (profile?.onboardingCompleted) {
      log.info("Onboarded user missing from whitelist, restoring", { phone: maskPhone(phone) });
      await ledger.add(phone, "system", false);
    } else if (!profile) {
      const { profile: created } = await store.ensureProfile(phone, now());
      await ledger.add(phone, "system", false);
      return respond("onboarding", phone, onboarding.promptFor(created));
    } else {
      await ledger.add(phone, "system", false);
    }

    if (await ledger.isActive(phone)) return null;
    return respond("not_subscribed", phone, templates.startGuidance());
  };

  const noticeFor = (usage: UsageInfo): string | null => {
    const params = { count: usage.currentCount, remaining: usage.remaining, daysRemaining: usage.daysRemaining };
    if (usage.threshold === "warning") return templates.quotaWarning(params);
    if (usage.threshold === "exceeded") return templates.quotaExceeded({ ...params, count: usage.limit });
    return null;
  };

  const answer = async (
    phone: PhoneKey,
    profile: UserProfile,
    text: string,
    startedAt: number
  ): Promise<InboundOutcome> => {
    const resolved = await resolver.resolve(phone, text, contextFor(profile));
    const responseTimeMs = Math.max(0, now().getTime() - startedAt);
    const delivered = await messenger.sendReply(phone, resolved.text, resolved.intent, responseTimeMs);

    try {
      await store.appendUsageAnalytics({
        phone,
        intent: resolved.intent,
        responseTimeMs,
        success: delivered && resolved.intent !== "error",
        createdAt: now(),
      });
    } catch (err) {
      log.error("Failed to write usage analytics", err, { phone: maskPhone(phone) });
    }

    if (!delivered) {
      // One fallback attempt, whatever its own delivery result
      return respond("error", phone, templates.fallback());
    }

    // Resolver failures reach the user as the fallback text but are not metered
    if (resolved.intent !== "error") {
      const usage = await quota.recordOutgoing(phone);
      const notice = noticeFor(usage);
      if (notice) await messenger.sendSystem(phone, notice);
    }
    return { kind: "answered", phone, reply: resolved.text };
  };

  const route = async (phone: PhoneKey, text: string, startedAt: number): Promise<InboundOutcome> => {
    try {
      await store.appendMessage({
        phone,
        direction: "inbound",
        body: text,
        intent: null,
        responseTimeMs: 0,
        createdAt: now(),
      });
    } catch (err) {
      log.error("Failed to store inbound message", err, { phone: maskPhone(phone) });
    }

    const command = parseCommand(text);
    if (command) return handleCommand(phone, command);

    const reconciled = await reconcile(phone);
    if (reconciled) return reconciled;

    const { profile } = await store.ensureProfile(phone, now());

    if (BLOCKED_SUBSCRIPTION_STATUSES.includes(profile.subscriptionStatus)) {
      return respond("subscription_inactive", phone, templates.subscriptionInactive());
    }

    if (quotaEnforced && (await quota.isExceeded(phone))) {
      const usage = await quota.getUsage(phone);
      return respond(
        "quota_exceeded",
        phone,
        templates.quotaExceeded({ count: usage.limit, remaining: 0, daysRemaining: usage.daysRemaining })
      );
    }

    if (!profile.onboardingCompleted) {
      const result = await onboarding.advance(phone, text);
      return respond("onboarding", phone, result.reply);
    }

    return answer(phone, profile, text, startedAt);
  };

  const handleInbound = async (rawPhone: string, rawText: string): Promise<InboundOutcome> => {
    const startedAt = now().getTime();
    const phone = normalizePhone(rawPhone);
    const text = rawText.trim();
    if (!phone || !text) {
      log.warn("Dropping inbound SMS with missing sender or body", { hasPhone: Boolean(phone) });
      return { kind: "invalid", phone, reply: null };
    }

    const check = checkContent(text);
    if (!check.allowed) {
      log.info("Inbound SMS filtered", { phone: maskPhone(phone), reason: check.reason });
      return { kind: "filtered", phone, reply: null };
    }

    try {
      return await route(phone, text, startedAt);
    } catch (err) {
      log.error("Inbound handling failed", err, { phone: maskPhone(phone) });
      const reply = templates.fallback();
      await messenger.sendSystem(phone, reply);
      return { kind: "error", phone, reply };
    }
  };

  return { handleInbound };
};
