import { AppSettings } from "../config/env";
import { AssistantStore } from "../store/types";
import { Clock } from "../types/domain";
import { BillingReconciler, createBillingReconciler } from "./billingReconciler";
import { CustomerDirectory } from "./customerDirectory";
import { InboundRouter, createInboundRouter } from "./inboundRouter";
import { MessageTemplates, createMessageTemplates } from "./messageTemplates";
import { Messenger, createMessenger } from "./messenger";
import { OnboardingService, createOnboardingService } from "./onboardingService";
import { QueryResolver } from "./queryResolver";
import { SmsGateway } from "./smsGateway";
import { WebhookVerifier } from "./stripeClient";
import { UsageQuotaService, createUsageQuotaService } from "./usageQuotaService";
import { WhitelistLedger, createWhitelistLedger } from "./whitelistLedger";

export type ServiceDeps = {
  store: AssistantStore;
  gateway: SmsGateway;
  resolver: QueryResolver;
  customers: CustomerDirectory;
  verifyWebhook: WebhookVerifier;
  settings: AppSettings;
  now?: Clock;
};

export type Services = {
  store: AssistantStore;
  templates: MessageTemplates;
  messenger: Messenger;
  onboarding: OnboardingService;
  ledger: WhitelistLedger;
  quota: UsageQuotaService;
  billing: BillingReconciler;
  router: InboundRouter;
  verifyWebhook: WebhookVerifier;
};

/**
 * Wire every component once. External adapters (gateway, resolver,
 * customer directory, webhook verifier) come in from the caller so
 * tests can swap them for in-process fakes.
 */
export const createServices = ({
  store,
  gateway,
  resolver,
  customers,
  verifyWebhook,
  settings,
  now = () => new Date(),
}: ServiceDeps): Services => {
  const templates = createMessageTemplates(settings.assistantName);
  const messenger = createMessenger({ store, gateway, now });
  const onboarding = createOnboardingService({ store, templates, now });
  const ledger = createWhitelistLedger({ store, messenger, onboarding, templates, now });
  const quota = createUsageQuotaService({
    store,
    now,
    limit: settings.monthlySmsLimit,
    warningRemaining: settings.quotaWarningRemaining,
  });
  const billing = createBillingReconciler({ store, ledger, messenger, customers, templates, now });
  const router = createInboundRouter({
    store,
    ledger,
    onboarding,
    quota,
    messenger,
    resolver,
    templates,
    now,
    quotaEnforced: settings.quotaEnforced,
  });

  return { store, templates, messenger, onboarding, ledger, quota, billing, router, verifyWebhook };
};
