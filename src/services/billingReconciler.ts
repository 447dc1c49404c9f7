import { AssistantStore } from "../store/types";
import { Clock, PhoneKey, StripeEventOutcome } from "../types/domain";
import { errorMessage } from "../utils/errors";
import { createLogger } from "../utils/logger";
import { maskPhone, normalizePhone } from "../utils/phone";
import { BillingEvent } from "./billingEvents";
import { CustomerDirectory } from "./customerDirectory";
import { MessageTemplates } from "./messageTemplates";
import { Messenger } from "./messenger";
import { WhitelistLedger } from "./whitelistLedger";

const log = createLogger("Billing");

const REMOVAL_STATUSES = new Set(["canceled", "unpaid", "past_due"]);

export type BillingOutcome = {
  outcome: StripeEventOutcome;
  phone: PhoneKey | null;
  detail: string;
};

export interface BillingReconciler {
  handle(event: BillingEvent): Promise<BillingOutcome>;
  /** Audit an event type that carries no state change for us. */
  recordIgnored(eventId: string, eventType: string): Promise<void>;
}

type ReconcilerDeps = {
  store: AssistantStore;
  ledger: WhitelistLedger;
  messenger: Messenger;
  customers: CustomerDirectory;
  templates: MessageTemplates;
  now: Clock;
};

type PhoneResolution = { phone: PhoneKey; via: string } | null;

/**
 * Turns billing lifecycle events into profile and whitelist changes.
 * Billing fields are written here; whitelist rows only ever through the
 * ledger. Every event, including failures, lands in the Stripe event log.
 */
export const createBillingReconciler = ({
  store,
  ledger,
  messenger,
  customers,
  templates,
  now,
}: ReconcilerDeps): BillingReconciler => {
  const audit = async (event: { id: string; type: string; customerId: string | null }, result: BillingOutcome) => {
    try {
      await store.appendStripeEvent({
        eventId: event.id,
        eventType: event.type,
        phone: result.phone,
        customerId: event.customerId,
        outcome: result.outcome,
        detail: result.detail,
        createdAt: now(),
      });
    } catch (err) {
      log.error("Failed to write Stripe event log", err, { eventId: event.id });
    }
  };

  // metadata.phone -> customer phone -> stored billing customer id
  const resolvePhone = async (event: BillingEvent): Promise<PhoneResolution> => {
    const fromMetadata = normalizePhone(event.metadata.phone);
    if (fromMetadata) return { phone: fromMetadata, via: "metadata" };

    if (event.customerId) {
      const customerPhone = event.customerPhone ?? (await customers.findPhone(event.customerId));
      const fromCustomer = normalizePhone(customerPhone);
      if (fromCustomer) return { phone: fromCustomer, via: "customer" };

      const profile = await store.findProfileByCustomerId(event.customerId);
      if (profile) return { phone: profile.phone, via: "profile" };
    }
    return null;
  };

  const ensureBillingProfile = async (phone: PhoneKey, event: BillingEvent) => {
    await store.ensureProfile(phone, now());
    await store.updateProfile(
      phone,
      {
        billingCustomerId: event.customerId ?? undefined,
        subscriptionStatus: event.status ?? "active",
        subscriptionId: event.subscriptionId,
        trialEnd: event.trialEnd,
      },
      now()
    );
  };

  const apply = async (phone: PhoneKey, event: BillingEvent): Promise<string> => {
    switch (event.kind) {
      case "subscription_created": {
        await ensureBillingProfile(phone, event);
        const added = await ledger.add(phone, "stripe_subscription", true);
        return added ? "subscription created, whitelisted" : "subscription created, whitelist add failed";
      }
      case "subscription_updated": {
        await store.ensureProfile(phone, now());
        await store.updateProfile(
          phone,
          {
            billingCustomerId: event.customerId ?? undefined,
            subscriptionStatus: event.status ?? undefined,
            subscriptionId: event.subscriptionId,
            trialEnd: event.trialEnd,
          },
          now()
        );
        if (event.status === "active") {
          await ledger.add(phone, "stripe_subscription", false);
          return "status active, whitelisted";
        }
        if (event.status && REMOVAL_STATUSES.has(event.status)) {
          const removed = await ledger.remove(phone, "stripe_cancellation", true);
          return removed ? `status ${event.status}, removed` : `status ${event.status}, already inactive`;
        }
        return `status ${event.status ?? "unknown"}, no whitelist change`;
      }
      case "subscription_deleted": {
        await store.ensureProfile(phone, now());
        await store.updateProfile(phone, { subscriptionStatus: "canceled", subscriptionId: null }, now());
        const removed = await ledger.remove(phone, "stripe_cancellation", true);
        return removed ? "subscription deleted, removed" : "subscription deleted, already inactive";
      }
      case "trial_will_end": {
        const sent = await messenger.sendSystem(phone, templates.trialEnding(event.trialEnd));
        return sent ? "trial ending notice sent" : "trial ending notice not delivered";
      }
      case "payment_failed": {
        const sent = await messenger.sendSystem(phone, templates.paymentFailed());
        return sent ? "payment failed notice sent" : "payment failed notice not delivered";
      }
      case "payment_succeeded": {
        await store.ensureProfile(phone, now());
        await store.updateProfile(
          phone,
          { subscriptionStatus: "active", billingCustomerId: event.customerId ?? undefined },
          now()
        );
        await ledger.add(phone, "stripe_payment", false);
        return "payment succeeded, whitelisted";
      }
    }
  };

  const handle = async (event: BillingEvent): Promise<BillingOutcome> => {
    let result: BillingOutcome;
    let resolution: PhoneResolution = null;
    try {
      resolution = await resolvePhone(event);
      if (!resolution) {
        result = {
          outcome: "no_phone",
          phone: null,
          detail: `no phone found (customer ${event.customerId ?? "none"})`,
        };
        log.warn("No phone for billing event", { eventId: event.id, type: event.type });
      } else {
        const detail = await apply(resolution.phone, event);
        result = { outcome: "processed", phone: resolution.phone, detail: `${detail} (phone via ${resolution.via})` };
        log.info("Billing event processed", { eventId: event.id, kind: event.kind, phone: maskPhone(resolution.phone) });
      }
    } catch (err) {
      result = { outcome: "error", phone: resolution?.phone ?? null, detail: errorMessage(err) };
      log.error("Billing event failed", err, { eventId: event.id, kind: event.kind });
    }

    await audit(event, result);
    return result;
  };

  const recordIgnored = (eventId: string, eventType: string) =>
    audit(
      { id: eventId, type: eventType, customerId: null },
      { outcome: "ignored", phone: null, detail: "event type not handled" }
    );

  return { handle, recordIgnored };
};
