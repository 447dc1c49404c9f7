import { Server } from "http";
import { createApp } from "../../../src/app";
import { Harness, TEST_PHONE, TEST_SIGNATURE, createHarness } from "../helpers/harness";

const subscriptionEvent = (type: string, status: string) => ({
  id: "evt_test_1",
  object: "event",
  type,
  data: {
    object: {
      id: "sub_1",
      object: "subscription",
      customer: "cus_1",
      status,
      trial_end: null,
      metadata: { phone: "5551234567" },
    },
  },
});

describe("webhooks", () => {
  let harness: Harness;
  let server: Server;
  let baseUrl: string;

  beforeEach(async () => {
    harness = createHarness();
    const app = createApp(harness.services, harness.settings);
    server = await new Promise<Server>((resolve) => {
      const listening = app.listen(0, () => resolve(listening));
    });
    const address = server.address();
    if (!address || typeof address === "string") throw new Error("Server has no port");
    baseUrl = `http://127.0.0.1:${address.port}`;
  });

  afterEach(async () => {
    await new Promise<void>((resolve, reject) => server.close((err) => (err ? reject(err) : resolve())));
  });

  const postStripe = (payload: unknown, signature = TEST_SIGNATURE) =>
    fetch(`${baseUrl}/api/billing/stripe/webhook`, {
      method: "POST",
      headers: { "Content-Type": "application/json", "stripe-signature": signature },
      body: JSON.stringify(payload),
    });

  describe("POST /api/sms/inbound", () => {
    test("routes a JSON inbound message", async () => {
      const res = await fetch(`${baseUrl}/api/sms/inbound`, {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body: JSON.stringify({ from: "+15551234567", body: "START" }),
      });

      expect(res.status).toBe(200);
      expect(await res.json()).toEqual({ success: true, outcome: "command" });
      expect(harness.gateway.textsTo(TEST_PHONE)).toEqual([harness.services.templates.namePrompt()]);
    });

    test("accepts form-encoded fields with capitalised names", async () => {
      const res = await fetch(`${baseUrl}/api/sms/inbound`, {
        method: "POST",
        body: new URLSearchParams({ From: "5551234567", Body: "HELP" }),
      });

      expect(await res.json()).toEqual({ success: true, outcome: "command" });
      expect(harness.gateway.textsTo(TEST_PHONE)).toEqual([harness.services.templates.help()]);
    });

    test("rejects a payload without a sender", async () => {
      const res = await fetch(`${baseUrl}/api/sms/inbound`, {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body: JSON.stringify({ body: "hello" }),
      });

      expect(res.status).toBe(400);
    });
  });

  describe("POST /api/billing/stripe/webhook", () => {
    test("applies a verified subscription event", async () => {
      const res = await postStripe(subscriptionEvent("customer.subscription.created", "active"));

      expect(res.status).toBe(200);
      expect(await res.json()).toEqual({ received: true, outcome: "processed" });
      expect(await harness.services.ledger.isActive(TEST_PHONE)).toBe(true);
      expect(harness.store.stripeEvents[0]).toMatchObject({ eventId: "evt_test_1", outcome: "processed" });
    });

    test("rejects a bad signature without touching state", async () => {
      const res = await postStripe(subscriptionEvent("customer.subscription.created", "active"), "forged");

      expect(res.status).toBe(400);
      expect(harness.store.whitelist.size).toBe(0);
      expect(harness.store.stripeEvents).toHaveLength(0);
    });

    test("acknowledges and audits event types it does not handle", async () => {
      const res = await postStripe({ id: "evt_test_2", object: "event", type: "charge.refunded", data: { object: {} } });

      expect(await res.json()).toEqual({ received: true, outcome: "ignored" });
      expect(harness.store.stripeEvents[0]).toMatchObject({ eventId: "evt_test_2", outcome: "ignored" });
    });

    test("answers 500 when the reconciler fails so the event is redelivered", async () => {
      jest.spyOn(harness.store, "updateProfile").mockRejectedValueOnce(new Error("db down"));

      const res = await postStripe(subscriptionEvent("customer.subscription.updated", "active"));

      expect(res.status).toBe(500);
      expect(await res.json()).toEqual({ received: false, outcome: "error", message: "db down" });
    });
  });
});
