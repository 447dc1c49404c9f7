import { Request, Response } from "express";
import { Services } from "../services/container";
import { errorMessage } from "../utils/errors";
import { createLogger } from "../utils/logger";

const log = createLogger("SmsWebhook");

// ClickSend posts lowercase keys; other gateways capitalise them
const pickField = (body: Record<string, unknown>, keys: string[]): string | null => {
  for (const key of keys) {
    const value = body[key];
    if (typeof value === "string" && value.trim()) return value;
    if (typeof value === "number") return String(value);
  }
  return null;
};

export const createSmsController = ({ router }: Services) => {
  const receiveInbound = async (req: Request, res: Response) => {
    const body: Record<string, unknown> = req.body && typeof req.body === "object" ? req.body : {};
    const from = pickField(body, ["from", "From"]);
    const text = pickField(body, ["body", "Body", "message"]);

    if (!from || !text) {
      return res.status(400).json({ success: false, message: "Missing sender or message body" });
    }

    try {
      const outcome = await router.handleInbound(from, text);
      return res.json({ success: true, outcome: outcome.kind });
    } catch (err) {
      log.error("Inbound webhook failed", err);
      return res.status(500).json({ success: false, message: errorMessage(err) });
    }
  };

  return { receiveInbound };
};
