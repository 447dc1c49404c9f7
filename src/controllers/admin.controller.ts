import { Request, Response } from "express";
import { Services } from "../services/container";
import { errorMessage } from "../utils/errors";
import { createLogger } from "../utils/logger";
import { maskPhone, normalizePhone } from "../utils/phone";

const log = createLogger("Admin");

const RECENT_MESSAGE_LIMIT = 20;

const parseNotify = (value: unknown): boolean =>
  value === true || value === "true" || value === "1" || value === 1;

export const createAdminController = ({ store, ledger, quota }: Services) => {
  // GET /whitelist
  const listWhitelist = async (_req: Request, res: Response) => {
    try {
      const phones = await ledger.listActive();
      return res.json({ success: true, count: phones.length, phones });
    } catch (err) {
      return res.status(500).json({ success: false, message: errorMessage(err) });
    }
  };

  // GET /whitelist/stats
  const whitelistStats = async (_req: Request, res: Response) => {
    try {
      const stats = await ledger.stats();
      return res.json({ success: true, stats });
    } catch (err) {
      return res.status(500).json({ success: false, message: errorMessage(err) });
    }
  };

  // POST /whitelist { phone, notify }
  const addToWhitelist = async (req: Request, res: Response) => {
    try {
      const phone = normalizePhone(typeof req.body?.phone === "string" ? req.body.phone : null);
      if (!phone) {
        return res.status(400).json({ success: false, message: "A valid phone number is required" });
      }

      const result = await ledger.activate(phone, "admin", parseNotify(req.body?.notify));
      if (result === "failed") {
        return res.status(503).json({ success: false, message: "Whitelist update failed" });
      }

      const added = result === "added";
      log.info("Admin whitelisted phone", { phone: maskPhone(phone), added });
      return res.status(added ? 201 : 200).json({ success: true, phone, added });
    } catch (err) {
      return res.status(500).json({ success: false, message: errorMessage(err) });
    }
  };

  // DELETE /whitelist/:phone?notify=
  const removeFromWhitelist = async (req: Request, res: Response) => {
    try {
      const phone = normalizePhone(req.params.phone);
      if (!phone) {
        return res.status(400).json({ success: false, message: "A valid phone number is required" });
      }

      const removed = await ledger.remove(phone, "admin", parseNotify(req.query.notify));
      if (!removed) {
        return res.status(404).json({ success: false, message: "Phone is not on the active whitelist" });
      }

      log.info("Admin removed phone", { phone: maskPhone(phone) });
      return res.json({ success: true, phone, removed: true });
    } catch (err) {
      return res.status(500).json({ success: false, message: errorMessage(err) });
    }
  };

  // GET /users/:phone
  const getUser = async (req: Request, res: Response) => {
    try {
      const phone = normalizePhone(req.params.phone);
      if (!phone) {
        return res.status(400).json({ success: false, message: "A valid phone number is required" });
      }

      const profile = await store.getProfile(phone);
      if (!profile) {
        return res.status(404).json({ success: false, message: "User not found" });
      }

      const [whitelist, events, messages] = await Promise.all([
        store.getWhitelistEntry(phone),
        store.listWhitelistEvents(phone),
        store.listMessages(phone, RECENT_MESSAGE_LIMIT),
      ]);
      return res.json({ success: true, profile, whitelist, events, messages });
    } catch (err) {
      return res.status(500).json({ success: false, message: errorMessage(err) });
    }
  };

  // GET /users/:phone/usage
  const getUsage = async (req: Request, res: Response) => {
    try {
      const phone = normalizePhone(req.params.phone);
      if (!phone) {
        return res.status(400).json({ success: false, message: "A valid phone number is required" });
      }

      const usage = await quota.getUsage(phone);
      return res.json({
        success: true,
        usage: {
          currentCount: usage.currentCount,
          limit: usage.limit,
          remaining: usage.remaining,
          daysRemaining: usage.daysRemaining,
          periodStart: usage.periodStart,
          periodEnd: usage.periodEnd,
        },
      });
    } catch (err) {
      return res.status(500).json({ success: false, message: errorMessage(err) });
    }
  };

  return { listWhitelist, whitelistStats, addToWhitelist, removeFromWhitelist, getUser, getUsage };
};
