import axios from "axios";
import { PhoneKey } from "../types/domain";
import { createLogger } from "../utils/logger";
import { describeHttpError } from "../utils/http";
import { maskPhone } from "../utils/phone";
import { DeliveryResult, SmsGateway, truncateSms } from "./smsGateway";

const CLICKSEND_BASE_URL = "https://rest.clicksend.com/v3";

const log = createLogger("ClickSend");

type ClickSendConfig = {
  username: string;
  apiKey: string;
  sender: string | null;
  timeoutMs: number;
};

type ClickSendMessage = {
  message_id?: string;
  status?: string;
  to?: string;
};

type ClickSendResponse = {
  http_code?: number;
  response_code?: string;
  response_msg?: string;
  data?: {
    messages?: ClickSendMessage[];
  };
};

/**
 * ClickSend REST v3 transport. One attempt per message; failures come back
 * as `{ ok: false }` and are never retried here.
 */
export const createClickSendGateway = (config: ClickSendConfig): SmsGateway => {
  const client = axios.create({
    baseURL: CLICKSEND_BASE_URL,
    timeout: config.timeoutMs,
    auth: { username: config.username, password: config.apiKey },
    headers: { "Content-Type": "application/json" },
  });

  const deliver = async (phone: PhoneKey, text: string): Promise<DeliveryResult> => {
    const payload = {
      messages: [
        {
          source: "sms-assistant",
          body: truncateSms(text),
          to: phone,
          ...(config.sender ? { from: config.sender } : {}),
        },
      ],
    };

    try {
      const res = await client.post<ClickSendResponse>("/sms/send", payload);
      const message = res.data.data?.messages?.[0];
      if (!message || message.status !== "SUCCESS") {
        const error = message?.status || res.data.response_code || "UNKNOWN";
        log.warn("Delivery rejected", { to: maskPhone(phone), error });
        return { ok: false, error };
      }
      return { ok: true, status: message.status, providerMessageId: message.message_id ?? null };
    } catch (err) {
      const error = describeHttpError(err);
      log.error("Delivery failed", err, { to: maskPhone(phone) });
      return { ok: false, error };
    }
  };

  return { deliver };
};
