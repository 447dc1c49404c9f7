import Stripe from "stripe";
import { AppSettings } from "../../../src/config/env";
import { Services, createServices } from "../../../src/services/container";
import { CustomerDirectory } from "../../../src/services/customerDirectory";
import { QueryContext, QueryResolver, ResolvedQuery, classifyIntent } from "../../../src/services/queryResolver";
import { DeliveryResult, SmsGateway } from "../../../src/services/smsGateway";
import { WebhookVerifier } from "../../../src/services/stripeClient";
import { MemoryStore } from "../../../src/store/memoryStore";
import { PhoneKey } from "../../../src/types/domain";

export const TEST_PHONE = "+15551234567";
export const TEST_SIGNATURE = "test-signature";

export const testSettings = (overrides: Partial<AppSettings> = {}): AppSettings => ({
  nodeEnv: "test",
  assistantName: "Sage",
  monthlySmsLimit: 300,
  quotaWarningRemaining: 30,
  quotaEnforced: false,
  adminApiKey: "test-admin-key",
  allowedOrigins: [],
  ...overrides,
});

export class FixedClock {
  private current: Date;

  constructor(iso = "2026-03-10T15:00:00.000Z") {
    this.current = new Date(iso);
  }

  now = (): Date => new Date(this.current.getTime());

  advanceDays(days: number) {
    this.current = new Date(this.current.getTime() + days * 24 * 60 * 60 * 1000);
  }
}

export type SentSms = { phone: PhoneKey; text: string };

export class RecordingGateway implements SmsGateway {
  readonly sent: SentSms[] = [];
  failing = false;

  async deliver(phone: PhoneKey, text: string): Promise<DeliveryResult> {
    if (this.failing) return { ok: false, error: "gateway down" };
    this.sent.push({ phone, text });
    return { ok: true, status: "SUCCESS", providerMessageId: `msg-${this.sent.length}` };
  }

  textsTo(phone: PhoneKey): string[] {
    return this.sent.filter((sms) => sms.phone === phone).map((sms) => sms.text);
  }
}

export class StubResolver implements QueryResolver {
  readonly calls: { phone: PhoneKey; text: string; context: QueryContext }[] = [];

  async resolve(phone: PhoneKey, text: string, context: QueryContext): Promise<ResolvedQuery> {
    this.calls.push({ phone, text, context });
    return { text: `Answer: ${text}`, intent: classifyIntent(text) };
  }
}

export class StaticCustomers implements CustomerDirectory {
  readonly phones = new Map<string, string>();

  async findPhone(customerId: string): Promise<string | null> {
    return this.phones.get(customerId) ?? null;
  }
}

// Accepts TEST_SIGNATURE and parses the payload as the event
export const stubVerifier: WebhookVerifier = (payload, signature) => {
  if (signature !== TEST_SIGNATURE) {
    throw new Error("No signatures found matching the expected signature for payload");
  }
  const event: Stripe.Event = JSON.parse(payload.toString("utf8"));
  return event;
};

export type Harness = {
  services: Services;
  store: MemoryStore;
  gateway: RecordingGateway;
  resolver: StubResolver;
  customers: StaticCustomers;
  clock: FixedClock;
  settings: AppSettings;
};

export const createHarness = (overrides: Partial<AppSettings> = {}): Harness => {
  const store = new MemoryStore();
  const gateway = new RecordingGateway();
  const resolver = new StubResolver();
  const customers = new StaticCustomers();
  const clock = new FixedClock();
  const settings = testSettings(overrides);

  const services = createServices({
    store,
    gateway,
    resolver,
    customers,
    verifyWebhook: stubVerifier,
    settings,
    now: clock.now,
  });

  return { services, store, gateway, resolver, customers, clock, settings };
};
