/**
 * Import a legacy whitelist file into the access ledger.
 * Run with: npm run migrate:legacy -- <path>   (defaults to LEGACY_WHITELIST_FILE)
 */
import { bootstrapServices } from "../bootstrap";
import { disconnectDB } from "../config/connectDB";
import { loadConfig } from "../config/env";
import { migrateLegacyWhitelist } from "../services/legacyMigration";

async function run() {
  const config = loadConfig();
  const filePath = process.argv[2] || config.legacyWhitelistFile;
  if (!filePath) {
    console.error("Usage: migrateLegacyWhitelist <file> (or set LEGACY_WHITELIST_FILE)");
    process.exit(1);
  }

  const services = await bootstrapServices(config);
  const report = await migrateLegacyWhitelist(services.ledger, filePath);
  console.log(`Migrated: ${report.migrated}, skipped: ${report.skipped}, invalid: ${report.invalid}`);

  await disconnectDB();
  process.exit(0);
}

run().catch((err) => {
  console.error(err);
  process.exit(1);
});
