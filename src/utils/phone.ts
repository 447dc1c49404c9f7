import { PhoneKey } from "../types/domain";

/**
 * Canonicalize any phone spelling into the key every table uses.
 * Returns null when the input has no digits at all.
 */
export function normalizePhone(raw: string | null | undefined): PhoneKey | null {
  if (!raw) return null;
  const digits = raw.replace(/\D/g, "");
  if (!digits) return null;

  // Bare US national number
  if (digits.length === 10) return `+1${digits}`;
  return `+${digits}`;
}

// Last four digits for log lines
export const maskPhone = (phone: string): string =>
  phone.length > 4 ? `***${phone.slice(-4)}` : phone;
