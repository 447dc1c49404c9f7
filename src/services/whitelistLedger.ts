import { AssistantStore } from "../store/types";
import { Clock, PhoneKey, WhitelistAction, WhitelistSource, WhitelistStats } from "../types/domain";
import { createLogger } from "../utils/logger";
import { maskPhone, normalizePhone } from "../utils/phone";
import { MessageTemplates } from "./messageTemplates";
import { Messenger } from "./messenger";
import { OnboardingService } from "./onboardingService";

const log = createLogger("Ledger");

/** What `activate` did: flipped the row, found it already active, or could not write. */
export type ActivateResult = "added" | "already_active" | "failed";

export interface WhitelistLedger {
  isActive(phone: string): Promise<boolean>;
  activate(phone: string, source: WhitelistSource, sendWelcome: boolean): Promise<ActivateResult>;
  /**
   * Activate a phone. Resolves true when the phone is active afterwards
   * (including when it already was); false only when the phone cannot be
   * normalized or the store failed.
   */
  add(phone: string, source: WhitelistSource, sendWelcome: boolean): Promise<boolean>;
  /** Deactivate a phone. Resolves false when it was not active. */
  remove(phone: string, source: WhitelistSource, sendGoodbye: boolean): Promise<boolean>;
  stats(): Promise<WhitelistStats>;
  listActive(): Promise<PhoneKey[]>;
}

type LedgerDeps = {
  store: AssistantStore;
  messenger: Messenger;
  onboarding: OnboardingService;
  templates: MessageTemplates;
  now: Clock;
};

/**
 * Single writer for whitelist rows and their event trail. Callers hit
 * add/remove defensively on every message, so an event row and a
 * welcome/goodbye text are produced only for a real state transition.
 */
export const createWhitelistLedger = ({
  store,
  messenger,
  onboarding,
  templates,
  now,
}: LedgerDeps): WhitelistLedger => {
  const appendEvent = async (phone: PhoneKey, action: WhitelistAction, source: WhitelistSource) => {
    try {
      await store.appendWhitelistEvent({ phone, action, source, createdAt: now() });
    } catch (err) {
      log.error("Failed to append whitelist event", err, { phone: maskPhone(phone), action });
    }
  };

  const isActive = async (raw: string): Promise<boolean> => {
    const phone = normalizePhone(raw);
    if (!phone) return false;
    try {
      const entry = await store.getWhitelistEntry(phone);
      return entry?.isActive ?? false;
    } catch (err) {
      log.error("Whitelist lookup failed, treating as inactive", err, { phone: maskPhone(phone) });
      return false;
    }
  };

  const activate = async (raw: string, source: WhitelistSource, sendWelcome: boolean): Promise<ActivateResult> => {
    const phone = normalizePhone(raw);
    if (!phone) {
      log.warn("Refusing to whitelist unparseable phone", { raw });
      return "failed";
    }

    let changed: boolean;
    try {
      changed = await store.activateWhitelist(phone, source, now());
    } catch (err) {
      log.error("Whitelist add failed", err, { phone: maskPhone(phone), source });
      return "failed";
    }

    if (!changed) return "already_active";

    await appendEvent(phone, "added", source);
    log.info("Phone whitelisted", { phone: maskPhone(phone), source });

    try {
      const { profile } = await store.ensureProfile(phone, now());
      if (sendWelcome) {
        await messenger.sendSystem(phone, onboarding.promptFor(profile));
      }
    } catch (err) {
      log.error("Post-add profile/welcome step failed", err, { phone: maskPhone(phone) });
    }
    return "added";
  };

  const add = async (raw: string, source: WhitelistSource, sendWelcome: boolean): Promise<boolean> =>
    (await activate(raw, source, sendWelcome)) !== "failed";

  const remove = async (raw: string, source: WhitelistSource, sendGoodbye: boolean): Promise<boolean> => {
    const phone = normalizePhone(raw);
    if (!phone) return false;

    let changed: boolean;
    try {
      changed = await store.deactivateWhitelist(phone, source, now());
    } catch (err) {
      log.error("Whitelist remove failed", err, { phone: maskPhone(phone), source });
      return false;
    }

    if (!changed) {
      log.debug("Remove skipped, phone was not active", { phone: maskPhone(phone), source });
      return false;
    }

    await appendEvent(phone, "removed", source);
    log.info("Phone removed from whitelist", { phone: maskPhone(phone), source });

    if (sendGoodbye) {
      await messenger.sendSystem(phone, templates.goodbye());
    }
    return true;
  };

  const stats = async (): Promise<WhitelistStats> => {
    try {
      const { active, inactive } = await store.countWhitelist();
      return { active, inactive, total: active + inactive };
    } catch (err) {
      log.error("Whitelist stats unavailable", err);
      return { active: 0, inactive: 0, total: 0 };
    }
  };

  const listActive = async (): Promise<PhoneKey[]> => {
    try {
      return await store.listActivePhones();
    } catch (err) {
      log.error("Active whitelist unavailable, returning empty set", err);
      return [];
    }
  };

  return { isActive, activate, add, remove, stats, listActive };
};
