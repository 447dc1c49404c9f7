import { readFile } from "fs/promises";
import { ValidationError, errorMessage } from "../utils/errors";
import { createLogger } from "../utils/logger";
import { maskPhone, normalizePhone } from "../utils/phone";
import { WhitelistLedger } from "./whitelistLedger";

const log = createLogger("Migration");

export type MigrationReport = {
  migrated: number;
  skipped: number;
  invalid: number;
};

/**
 * Legacy whitelist files are either a JSON array of phones or plain text
 * with one phone per line; `#` starts a comment line.
 */
export function parseLegacyWhitelist(content: string): string[] {
  const trimmed = content.trim();
  if (trimmed.startsWith("[")) {
    let parsed: unknown;
    try {
      parsed = JSON.parse(trimmed);
    } catch (err) {
      throw new ValidationError(`Legacy whitelist is not valid JSON: ${errorMessage(err)}`);
    }
    if (!Array.isArray(parsed)) {
      throw new ValidationError("Legacy whitelist JSON must be an array");
    }
    return parsed
      .filter((item): item is string | number => typeof item === "string" || typeof item === "number")
      .map((item) => String(item));
  }

  return trimmed
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line && !line.startsWith("#"));
}

export const migrateLegacyWhitelist = async (
  ledger: WhitelistLedger,
  filePath: string
): Promise<MigrationReport> => {
  const content = await readFile(filePath, "utf8");
  const report: MigrationReport = { migrated: 0, skipped: 0, invalid: 0 };

  for (const raw of parseLegacyWhitelist(content)) {
    const phone = normalizePhone(raw);
    if (!phone) {
      log.warn("Skipping unparseable legacy entry", { raw });
      report.invalid += 1;
      continue;
    }

    if (await ledger.isActive(phone)) {
      report.skipped += 1;
      continue;
    }

    if (await ledger.add(phone, "legacy_migration", false)) {
      report.migrated += 1;
    } else {
      log.error("Legacy entry could not be whitelisted", undefined, { phone: maskPhone(phone) });
      report.skipped += 1;
    }
  }

  log.info("Legacy whitelist migration finished", { filePath, ...report });
  return report;
};
