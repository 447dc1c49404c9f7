import { Request, Response } from "express";
import Stripe from "stripe";
import { toBillingEvent } from "../services/billingEvents";
import { Services } from "../services/container";
import { errorMessage } from "../utils/errors";
import { createLogger } from "../utils/logger";

const log = createLogger("StripeWebhook");

export const createBillingController = ({ billing, verifyWebhook }: Services) => {
  const handleStripeWebhook = async (req: Request, res: Response) => {
    const sig = req.headers["stripe-signature"];

    let event: Stripe.Event;
    try {
      if (typeof sig !== "string") {
        throw new Error("Missing stripe-signature header");
      }
      if (!Buffer.isBuffer(req.body)) {
        throw new Error("Webhook body must be the raw request payload");
      }
      event = verifyWebhook(req.body, sig);
    } catch (err) {
      log.warn("Webhook signature verification failed", { error: errorMessage(err) });
      return res.status(400).send(`Webhook Error: ${errorMessage(err)}`);
    }

    try {
      const billingEvent = toBillingEvent(event);
      if (!billingEvent) {
        await billing.recordIgnored(event.id, event.type);
        return res.json({ received: true, outcome: "ignored" });
      }

      const result = await billing.handle(billingEvent);
      // A 500 makes Stripe redeliver; every branch is safe to replay
      if (result.outcome === "error") {
        return res.status(500).json({ received: false, outcome: result.outcome, message: result.detail });
      }
      return res.json({ received: true, outcome: result.outcome });
    } catch (err) {
      log.error("Webhook handling failed", err, { eventId: event.id, type: event.type });
      return res.status(500).json({ received: false, message: errorMessage(err) });
    }
  };

  return { handleStripeWebhook };
};
