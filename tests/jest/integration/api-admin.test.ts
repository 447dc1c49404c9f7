import { Server } from "http";
import { createApp } from "../../../src/app";
import { Harness, TEST_PHONE, createHarness } from "../helpers/harness";

const API_KEY = "test-admin-key";

describe("admin API", () => {
  let harness: Harness;
  let server: Server;
  let baseUrl: string;

  beforeEach(async () => {
    harness = createHarness({ adminApiKey: API_KEY });
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

  const call = (method: string, route: string, body?: unknown, key: string | null = API_KEY) =>
    fetch(`${baseUrl}${route}`, {
      method,
      headers: {
        "Content-Type": "application/json",
        ...(key === null ? {} : { "x-api-key": key }),
      },
      body: body === undefined ? undefined : JSON.stringify(body),
    });

  test("health check needs no key", async () => {
    const res = await fetch(`${baseUrl}/health`);

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ success: true, status: "healthy", env: "test" });
  });

  test("rejects a missing or incorrect API key", async () => {
    const missing = await call("GET", "/api/admin/whitelist", undefined, null);
    const wrong = await call("GET", "/api/admin/whitelist", undefined, "not-the-key");

    expect(missing.status).toBe(401);
    expect(wrong.status).toBe(401);
    expect(await wrong.json()).toEqual({ success: false, message: "Invalid or missing API key" });
  });

  test("adds a phone once and lists it", async () => {
    const created = await call("POST", "/api/admin/whitelist", { phone: "(555) 123-4567" });
    const repeated = await call("POST", "/api/admin/whitelist", { phone: "555-123-4567" });

    expect(created.status).toBe(201);
    expect(await created.json()).toEqual({ success: true, phone: TEST_PHONE, added: true });
    expect(repeated.status).toBe(200);
    expect(await repeated.json()).toEqual({ success: true, phone: TEST_PHONE, added: false });
    expect(harness.gateway.sent).toHaveLength(0);

    const list = await call("GET", "/api/admin/whitelist");
    expect(await list.json()).toEqual({ success: true, count: 1, phones: [TEST_PHONE] });
  });

  test("two simultaneous adds report exactly one creation", async () => {
    const responses = await Promise.all([
      call("POST", "/api/admin/whitelist", { phone: TEST_PHONE }),
      call("POST", "/api/admin/whitelist", { phone: TEST_PHONE }),
    ]);

    expect(responses.map((res) => res.status).sort()).toEqual([200, 201]);
    expect(await harness.store.listWhitelistEvents(TEST_PHONE)).toHaveLength(1);
  });

  test("sends the welcome when notify is set", async () => {
    await call("POST", "/api/admin/whitelist", { phone: TEST_PHONE, notify: true });

    expect(harness.gateway.textsTo(TEST_PHONE)).toEqual([harness.services.templates.namePrompt()]);
  });

  test("rejects a phone without digits", async () => {
    const res = await call("POST", "/api/admin/whitelist", { phone: "abc" });

    expect(res.status).toBe(400);
  });

  test("removes a phone and reports stats", async () => {
    await call("POST", "/api/admin/whitelist", { phone: TEST_PHONE });
    await call("POST", "/api/admin/whitelist", { phone: "+15559876543" });

    const removed = await call("DELETE", "/api/admin/whitelist/+15559876543");
    const again = await call("DELETE", "/api/admin/whitelist/+15559876543");
    const stats = await call("GET", "/api/admin/whitelist/stats");

    expect(removed.status).toBe(200);
    expect(again.status).toBe(404);
    expect(await stats.json()).toEqual({ success: true, stats: { active: 1, inactive: 1, total: 2 } });
  });

  test("looks up a user and their usage", async () => {
    await call("POST", "/api/admin/whitelist", { phone: TEST_PHONE });

    const user = await call("GET", "/api/admin/users/+15551234567");
    const unknown = await call("GET", "/api/admin/users/+15550000000");
    const usage = await call("GET", "/api/admin/users/+15551234567/usage");

    expect(user.status).toBe(200);
    expect(await user.json()).toMatchObject({
      success: true,
      profile: { phone: TEST_PHONE, onboardingStep: 1 },
      whitelist: { isActive: true, addedBy: "admin" },
    });
    expect(unknown.status).toBe(404);
    expect(await usage.json()).toMatchObject({ usage: { currentCount: 0, limit: 300, remaining: 300 } });
  });
});
