import { mkdtemp, rm, writeFile } from "fs/promises";
import { tmpdir } from "os";
import path from "path";
import { migrateLegacyWhitelist, parseLegacyWhitelist } from "../../../src/services/legacyMigration";
import { ValidationError } from "../../../src/utils/errors";
import { TEST_PHONE, createHarness } from "../helpers/harness";

describe("parseLegacyWhitelist", () => {
  test("reads one phone per line and skips comments and blanks", () => {
    expect(parseLegacyWhitelist("# subscribers\n5551234567\n\n  +15559876543  \r\n")).toEqual([
      "5551234567",
      "+15559876543",
    ]);
  });

  test("reads a JSON array of strings and numbers", () => {
    expect(parseLegacyWhitelist('["5551234567", 5559876543, null]')).toEqual(["5551234567", "5559876543"]);
  });

  test("rejects malformed JSON", () => {
    expect(() => parseLegacyWhitelist("[1, ")).toThrow(ValidationError);
  });
});

describe("migrateLegacyWhitelist", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(tmpdir(), "legacy-whitelist-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  test("imports new phones and counts duplicates and junk", async () => {
    const { services, store, gateway } = createHarness();
    await services.ledger.add("+15550001111", "admin", false);
    const file = path.join(dir, "whitelist.txt");
    await writeFile(
      file,
      ["# legacy list", "(555) 123-4567", "555-123-4567", "not-a-phone", "+442079460958", "5550001111"].join("\n")
    );

    const report = await migrateLegacyWhitelist(services.ledger, file);

    expect(report).toEqual({ migrated: 2, skipped: 2, invalid: 1 });
    expect((await store.getWhitelistEntry(TEST_PHONE))?.addedBy).toBe("legacy_migration");
    expect(await services.ledger.isActive("+442079460958")).toBe(true);
    expect(gateway.sent).toHaveLength(0);
  });

  test("imports a JSON file", async () => {
    const { services } = createHarness();
    const file = path.join(dir, "whitelist.json");
    await writeFile(file, JSON.stringify(["5551234567", "abc"]));

    const report = await migrateLegacyWhitelist(services.ledger, file);

    expect(report).toEqual({ migrated: 1, skipped: 0, invalid: 1 });
  });

  test("fails when the file is missing", async () => {
    const { services } = createHarness();

    await expect(migrateLegacyWhitelist(services.ledger, path.join(dir, "missing.txt"))).rejects.toThrow();
  });
});
