import { UsageInfo } from "../../../src/services/usageQuotaService";
import { TEST_PHONE, createHarness } from "../helpers/harness";

const sendMany = async (record: () => Promise<UsageInfo>, count: number): Promise<UsageInfo[]> => {
  const results: UsageInfo[] = [];
  for (let i = 0; i < count; i += 1) {
    results.push(await record());
  }
  return results;
};

describe("usage quota", () => {
  test("the 300th reply exhausts the allowance and the 301st is still counted", async () => {
    const { services } = createHarness();
    const record = () => services.quota.recordOutgoing(TEST_PHONE);

    const first299 = await sendMany(record, 299);
    expect(first299[298].currentCount).toBe(299);
    expect(first299[298].remaining).toBe(1);

    const at300 = await record();
    expect(at300.currentCount).toBe(300);
    expect(at300.remaining).toBe(0);
    expect(at300.threshold).toBe("exceeded");
    expect(await services.quota.isExceeded(TEST_PHONE)).toBe(true);

    const at301 = await record();
    expect(at301.currentCount).toBe(301);
    expect(at301.remaining).toBe(0);
    expect(at301.threshold).toBe("none");
  });

  test("the warning fires once when 30 replies remain", async () => {
    const { services } = createHarness();

    const results = await sendMany(() => services.quota.recordOutgoing(TEST_PHONE), 275);

    const warnings = results.filter((info) => info.threshold === "warning");
    expect(warnings).toHaveLength(1);
    expect(warnings[0].currentCount).toBe(270);
    expect(warnings[0].remaining).toBe(30);
  });

  test("the period is 30 days from the UTC day of the first send", async () => {
    const { services } = createHarness();

    const info = await services.quota.recordOutgoing(TEST_PHONE);

    expect(info.periodStart.toISOString()).toBe("2026-03-10T00:00:00.000Z");
    expect(info.periodEnd.toISOString()).toBe("2026-04-09T00:00:00.000Z");
    expect(info.daysRemaining).toBe(29);
    expect(info.limit).toBe(300);
  });

  test("a new period opens once the old one has ended", async () => {
    const { services, clock } = createHarness();
    await sendMany(() => services.quota.recordOutgoing(TEST_PHONE), 5);

    clock.advanceDays(30);
    const info = await services.quota.recordOutgoing(TEST_PHONE);

    expect(info.currentCount).toBe(1);
    expect(info.periodStart.toISOString()).toBe("2026-04-09T00:00:00.000Z");
  });

  test("getUsage reports an empty period without opening one", async () => {
    const { services, store } = createHarness();

    const info = await services.quota.getUsage(TEST_PHONE);

    expect(info).toMatchObject({ currentCount: 0, limit: 300, remaining: 300, daysRemaining: 29 });
    expect(store.usage.size).toBe(0);
    expect(await services.quota.isExceeded(TEST_PHONE)).toBe(false);
  });

  test("counts are kept per phone", async () => {
    const { services } = createHarness();
    await services.quota.recordOutgoing(TEST_PHONE);
    await services.quota.recordOutgoing(TEST_PHONE);

    expect((await services.quota.getUsage("+15559876543")).currentCount).toBe(0);
    expect((await services.quota.getUsage(TEST_PHONE)).currentCount).toBe(2);
  });
});
