import Stripe from "stripe";
import { SubscriptionStatus } from "../types/domain";

export type BillingEventKind =
  | "subscription_created"
  | "subscription_updated"
  | "subscription_deleted"
  | "trial_will_end"
  | "payment_succeeded"
  | "payment_failed";

/** Provider-neutral view of a verified billing webhook. */
export type BillingEvent = {
  id: string;
  kind: BillingEventKind;
  // Provider event type, kept for the audit log
  type: string;
  customerId: string | null;
  // Phone on an expanded customer or invoice, when the payload carries one
  customerPhone: string | null;
  subscriptionId: string | null;
  status: SubscriptionStatus | null;
  trialEnd: Date | null;
  metadata: Record<string, string>;
};

const STRIPE_EVENT_KINDS: Record<string, BillingEventKind> = {
  "customer.subscription.created": "subscription_created",
  "customer.subscription.updated": "subscription_updated",
  "customer.subscription.deleted": "subscription_deleted",
  "customer.subscription.trial_will_end": "trial_will_end",
  "invoice.payment_succeeded": "payment_succeeded",
  "invoice.payment_failed": "payment_failed",
};

export const mapStripeStatus = (status: Stripe.Subscription.Status): SubscriptionStatus => {
  switch (status) {
    case "active":
    case "trialing":
    case "past_due":
    case "unpaid":
    case "canceled":
      return status;
    default:
      // incomplete, incomplete_expired, paused
      return "inactive";
  }
};

const idOf = (value: string | { id: string } | null | undefined): string | null => {
  if (!value) return null;
  return typeof value === "string" ? value : value.id;
};

const phoneOfCustomer = (customer: string | Stripe.Customer | Stripe.DeletedCustomer | null): string | null => {
  if (!customer || typeof customer === "string" || customer.deleted) return null;
  return customer.phone ?? null;
};

/**
 * Translate a verified Stripe event into a BillingEvent. Returns null for
 * event types this service does not act on.
 */
export function toBillingEvent(event: Stripe.Event): BillingEvent | null {
  const kind = STRIPE_EVENT_KINDS[event.type];
  if (!kind) return null;

  if (kind === "payment_succeeded" || kind === "payment_failed") {
    const invoice = event.data.object as Stripe.Invoice;
    return {
      id: event.id,
      kind,
      type: event.type,
      customerId: idOf(invoice.customer),
      customerPhone: invoice.customer_phone ?? phoneOfCustomer(invoice.customer),
      subscriptionId: idOf(invoice.subscription),
      status: null,
      trialEnd: null,
      metadata: invoice.metadata ?? {},
    };
  }

  const subscription = event.data.object as Stripe.Subscription;
  return {
    id: event.id,
    kind,
    type: event.type,
    customerId: idOf(subscription.customer),
    customerPhone: phoneOfCustomer(subscription.customer),
    subscriptionId: subscription.id,
    status: mapStripeStatus(subscription.status),
    trialEnd: subscription.trial_end ? new Date(subscription.trial_end * 1000) : null,
    metadata: subscription.metadata ?? {},
  };
}
