import Stripe from "stripe";
import { createLogger } from "../utils/logger";

const log = createLogger("Billing");

export interface CustomerDirectory {
  /** Phone on the billing customer record, or null when unknown/unreachable. */
  findPhone(customerId: string): Promise<string | null>;
}

export const createStripeCustomerDirectory = (stripe: Stripe): CustomerDirectory => ({
  findPhone: async (customerId) => {
    try {
      const customer = await stripe.customers.retrieve(customerId);
      if (customer.deleted) return null;
      return customer.phone ?? null;
    } catch (err) {
      log.error("Stripe customer lookup failed", err, { customerId });
      return null;
    }
  },
});
