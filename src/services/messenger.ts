import { AssistantStore } from "../store/types";
import { Clock, DeliveryCategory, PhoneKey, QueryIntent } from "../types/domain";
import { errorMessage } from "../utils/errors";
import { createLogger } from "../utils/logger";
import { maskPhone } from "../utils/phone";
import { DeliveryResult, SmsGateway, truncateSms } from "./smsGateway";

const log = createLogger("SMS");

export interface Messenger {
  /** Onboarding prompts, command acknowledgements, billing notices. Never counted against quota. */
  sendSystem(phone: PhoneKey, body: string): Promise<boolean>;
  /** An answer to a user query. */
  sendReply(phone: PhoneKey, body: string, intent: QueryIntent, responseTimeMs: number): Promise<boolean>;
}

type MessengerDeps = {
  store: AssistantStore;
  gateway: SmsGateway;
  now: Clock;
};

/**
 * Outbound path: deliver through the gateway, then append the delivery log
 * and (on success) the outbound transcript row. Never throws; the result
 * says whether the text left the building.
 */
export const createMessenger = ({ store, gateway, now }: MessengerDeps): Messenger => {
  const record = async (what: string, write: () => Promise<void>) => {
    try {
      await write();
    } catch (err) {
      log.error(`Failed to record ${what}`, err);
    }
  };

  const send = async (
    phone: PhoneKey,
    text: string,
    category: DeliveryCategory,
    intent: QueryIntent | null,
    responseTimeMs: number
  ): Promise<boolean> => {
    const body = truncateSms(text);

    let result: DeliveryResult;
    try {
      result = await gateway.deliver(phone, body);
    } catch (err) {
      result = { ok: false, error: errorMessage(err) };
    }

    const createdAt = now();
    await record("delivery log", () =>
      store.appendDeliveryLog({
        phone,
        body,
        category,
        status: result.ok ? result.status : "FAILED",
        providerMessageId: result.ok ? result.providerMessageId : null,
        error: result.ok ? null : result.error,
        createdAt,
      })
    );

    if (!result.ok) {
      log.warn("Outbound SMS not delivered", { to: maskPhone(phone), category, error: result.error });
      return false;
    }

    await record("outbound message", () =>
      store.appendMessage({
        phone,
        direction: "outbound",
        body,
        intent,
        responseTimeMs,
        createdAt,
      })
    );
    return true;
  };

  return {
    sendSystem: (phone, body) => send(phone, body, "system", null, 0),
    sendReply: (phone, body, intent, responseTimeMs) => send(phone, body, "reply", intent, responseTimeMs),
  };
};
