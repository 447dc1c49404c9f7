import { AppConfig } from "./config/env";
import { connectDB } from "./config/connectDB";
import { createStore } from "./store";
import { createClickSendGateway } from "./services/clicksendGateway";
import { Services, createServices } from "./services/container";
import { createStripeCustomerDirectory } from "./services/customerDirectory";
import { createMessageTemplates } from "./services/messageTemplates";
import { createOpenAiQueryResolver } from "./services/queryResolver";
import { createStripeClient, createWebhookVerifier } from "./services/stripeClient";

/**
 * Production wiring: connect the store engine and build every external
 * adapter from config.
 */
export const bootstrapServices = async (config: AppConfig): Promise<Services> => {
  if (config.storeDriver === "mongo" && config.mongoUri) {
    await connectDB(config.mongoUri);
  }

  const stripe = createStripeClient({ secretKey: config.stripe.secretKey, timeoutMs: config.externalTimeoutMs });

  return createServices({
    store: createStore(config.storeDriver),
    gateway: createClickSendGateway({ ...config.clicksend, timeoutMs: config.externalTimeoutMs }),
    resolver: createOpenAiQueryResolver({
      ...config.openai,
      timeoutMs: config.externalTimeoutMs,
      assistantName: config.assistantName,
      fallbackText: createMessageTemplates(config.assistantName).fallback(),
    }),
    customers: createStripeCustomerDirectory(stripe),
    verifyWebhook: createWebhookVerifier(stripe, config.stripe.webhookSecret),
    settings: config,
  });
};
