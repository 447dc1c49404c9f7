import { createApp } from "./app";
import { bootstrapServices } from "./bootstrap";
import { loadConfig } from "./config/env";
import { migrateLegacyWhitelist } from "./services/legacyMigration";
import { createLogger } from "./utils/logger";

const log = createLogger("Server");

async function start() {
  const config = loadConfig();
  const services = await bootstrapServices(config);

  if (config.legacyWhitelistFile) {
    await migrateLegacyWhitelist(services.ledger, config.legacyWhitelistFile);
  }

  const app = createApp(services, config);
  app.listen(config.port, () => {
    log.info(`Server running on port ${config.port}`, { storeDriver: config.storeDriver });
  });
}

start().catch((err) => {
  log.error("Startup failed", err);
  process.exit(1);
});
