import express from "express";
import { createBillingController } from "../controllers/billing.controller";
import { Services } from "../services/container";

export const createBillingRoutes = (services: Services) => {
  const router = express.Router();
  const { handleStripeWebhook } = createBillingController(services);

  // Stripe webhook (no auth); signature check needs the untouched body
  router.post("/stripe/webhook", express.raw({ type: "application/json", limit: "1mb" }), handleStripeWebhook);

  return router;
};
