import Stripe from "stripe";

type StripeClientConfig = {
  secretKey: string;
  timeoutMs: number;
};

/**
 * Stripe SDK handle. Built once at boot and passed to whatever needs it,
 * so tests never have to touch STRIPE_SECRET_KEY.
 */
export const createStripeClient = ({ secretKey, timeoutMs }: StripeClientConfig): Stripe =>
  new Stripe(secretKey, {
    apiVersion: "2023-10-16",
    timeout: timeoutMs,
    maxNetworkRetries: 0,
  });

export type WebhookVerifier = (payload: Buffer, signature: string) => Stripe.Event;

export const createWebhookVerifier =
  (stripe: Stripe, webhookSecret: string): WebhookVerifier =>
  (payload, signature) =>
    stripe.webhooks.constructEvent(payload, signature, webhookSecret);
