import { TEST_PHONE, createHarness } from "../helpers/harness";

describe("whitelist ledger", () => {
  test("repeated adds produce a single event", async () => {
    const { services, store } = createHarness();

    expect(await services.ledger.add(TEST_PHONE, "admin", false)).toBe(true);
    expect(await services.ledger.add("(555) 123-4567", "system", false)).toBe(true);

    expect(store.whitelistEvents.map((event) => [event.action, event.source])).toEqual([["added", "admin"]]);
    expect((await store.getWhitelistEntry(TEST_PHONE))?.addedBy).toBe("admin");
  });

  test("concurrent adds still produce a single event", async () => {
    const { services, store } = createHarness();

    await Promise.all([1, 2, 3, 4, 5].map(() => services.ledger.add(TEST_PHONE, "system", false)));

    expect(store.whitelistEvents).toHaveLength(1);
  });

  test("activate says whether this call flipped the row", async () => {
    const { services } = createHarness();

    const results = await Promise.all([
      services.ledger.activate(TEST_PHONE, "admin", false),
      services.ledger.activate(TEST_PHONE, "admin", false),
    ]);

    expect(results).toEqual(["added", "already_active"]);
    expect(await services.ledger.activate("no digits", "admin", false)).toBe("failed");
  });

  test("welcome goes out only on the transition", async () => {
    const { services, gateway } = createHarness();

    await services.ledger.add(TEST_PHONE, "stripe_subscription", true);
    await services.ledger.add(TEST_PHONE, "stripe_subscription", true);

    expect(gateway.textsTo(TEST_PHONE)).toEqual([services.templates.namePrompt()]);
  });

  test("refuses phones without digits", async () => {
    const { services, store } = createHarness();

    expect(await services.ledger.add("no digits", "admin", false)).toBe(false);
    expect(store.whitelist.size).toBe(0);
  });

  test("remove reports the transition once and says goodbye once", async () => {
    const { services, store, gateway } = createHarness();
    await services.ledger.add(TEST_PHONE, "admin", false);

    expect(await services.ledger.remove(TEST_PHONE, "stripe_cancellation", true)).toBe(true);
    expect(await services.ledger.remove(TEST_PHONE, "stripe_cancellation", true)).toBe(false);

    expect(gateway.textsTo(TEST_PHONE)).toEqual([services.templates.goodbye()]);
    const entry = await store.getWhitelistEntry(TEST_PHONE);
    expect(entry?.isActive).toBe(false);
    expect(entry?.removedBy).toBe("stripe_cancellation");
    expect(store.whitelistEvents.map((event) => event.action)).toEqual(["added", "removed"]);
    expect(await services.ledger.isActive(TEST_PHONE)).toBe(false);
  });

  test("re-adding a removed phone reactivates it", async () => {
    const { services } = createHarness();
    await services.ledger.add(TEST_PHONE, "admin", false);
    await services.ledger.remove(TEST_PHONE, "admin", false);

    await services.ledger.add(TEST_PHONE, "stripe_payment", false);

    expect(await services.ledger.isActive(TEST_PHONE)).toBe(true);
  });

  test("stats and listActive reflect the table", async () => {
    const { services } = createHarness();
    await services.ledger.add(TEST_PHONE, "admin", false);
    await services.ledger.add("+15559876543", "admin", false);
    await services.ledger.remove("+15559876543", "admin", false);

    expect(await services.ledger.stats()).toEqual({ active: 1, inactive: 1, total: 2 });
    expect(await services.ledger.listActive()).toEqual([TEST_PHONE]);
  });

  test("a failing store reads as inactive", async () => {
    const { services, store } = createHarness();
    jest.spyOn(store, "getWhitelistEntry").mockRejectedValueOnce(new Error("db down"));

    expect(await services.ledger.isActive(TEST_PHONE)).toBe(false);
  });
});
