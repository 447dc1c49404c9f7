import { MAX_SMS_LENGTH } from "../../../src/services/smsGateway";
import { TEST_PHONE, createHarness } from "../helpers/harness";

describe("messenger", () => {
  test("a delivered system text is logged and stored without an intent", async () => {
    const { services, store, gateway } = createHarness();

    expect(await services.messenger.sendSystem(TEST_PHONE, "hello")).toBe(true);

    expect(gateway.textsTo(TEST_PHONE)).toEqual(["hello"]);
    expect(store.deliveryLog).toHaveLength(1);
    expect(store.deliveryLog[0]).toMatchObject({ category: "system", status: "SUCCESS", providerMessageId: "msg-1" });
    expect(store.messages).toEqual([
      expect.objectContaining({ direction: "outbound", body: "hello", intent: null, responseTimeMs: 0 }),
    ]);
  });

  test("a reply keeps its intent and response time", async () => {
    const { services, store } = createHarness();

    await services.messenger.sendReply(TEST_PHONE, "It is sunny", "weather", 1200);

    expect(store.messages[0]).toMatchObject({ intent: "weather", responseTimeMs: 1200 });
    expect(store.deliveryLog[0].category).toBe("reply");
  });

  test("a failed delivery is logged but not stored as a message", async () => {
    const { services, store, gateway } = createHarness();
    gateway.failing = true;

    expect(await services.messenger.sendSystem(TEST_PHONE, "hello")).toBe(false);

    expect(store.deliveryLog[0]).toMatchObject({ status: "FAILED", error: "gateway down", providerMessageId: null });
    expect(store.messages).toHaveLength(0);
  });

  test("long bodies are cut to the SMS maximum", async () => {
    const { services, gateway } = createHarness();

    await services.messenger.sendSystem(TEST_PHONE, "a".repeat(2000));

    expect(gateway.sent[0].text).toHaveLength(MAX_SMS_LENGTH);
  });
});
