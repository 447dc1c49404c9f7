import { PhoneKey } from "../types/domain";

export const MAX_SMS_LENGTH = 1600;

export type DeliveryResult =
  | { ok: true; status: string; providerMessageId: string | null }
  | { ok: false; error: string };

export interface SmsGateway {
  deliver(phone: PhoneKey, text: string): Promise<DeliveryResult>;
}

export const truncateSms = (text: string): string =>
  text.length > MAX_SMS_LENGTH ? text.slice(0, MAX_SMS_LENGTH) : text;
