import dotenv from "dotenv";
import { StoreDriver } from "../store/types";

dotenv.config();

export type AppSettings = {
  nodeEnv: string;
  assistantName: string;
  monthlySmsLimit: number;
  quotaWarningRemaining: number;
  quotaEnforced: boolean;
  adminApiKey: string;
  allowedOrigins: string[];
};

export type AppConfig = AppSettings & {
  port: number;
  storeDriver: StoreDriver;
  mongoUri: string | null;
  externalTimeoutMs: number;
  legacyWhitelistFile: string | null;
  stripe: {
    secretKey: string;
    webhookSecret: string;
  };
  clicksend: {
    username: string;
    apiKey: string;
    sender: string | null;
  };
  openai: {
    apiKey: string;
    model: string;
    baseUrl: string;
  };
};

export const requireEnv = (name: string): string => {
  const value = process.env[name];
  if (!value) throw new Error(`Missing env var: ${name}`);
  return value;
};

const optionalEnv = (name: string): string | null => {
  const value = process.env[name]?.trim();
  return value ? value : null;
};

export const parseBoolean = (value: string | undefined) => {
  if (!value) return false;
  const normalized = value.trim().toLowerCase();
  return normalized === "true" || normalized === "1" || normalized === "yes";
};

export const parseNumber = (name: string, fallback: number): number => {
  const raw = process.env[name];
  if (!raw) return fallback;
  const value = Number(raw);
  if (Number.isNaN(value)) {
    throw new Error(`${name} must be a valid number`);
  }
  return value;
};

const parseStoreDriver = (value: string | undefined): StoreDriver =>
  value?.trim().toLowerCase() === "memory" ? "memory" : "mongo";

const parseList = (value: string | undefined): string[] =>
  (value || "")
    .split(",")
    .map((item) => item.trim())
    .filter(Boolean);

/**
 * Read the whole process configuration once at boot.
 * Throws on the first missing required variable.
 */
export const loadConfig = (): AppConfig => {
  const storeDriver = parseStoreDriver(process.env.STORE_DRIVER);
  const mongoUri = optionalEnv("MONGO_URI") ?? optionalEnv("MONGODB_URI");
  if (storeDriver === "mongo" && !mongoUri) {
    throw new Error("Missing env var: MONGO_URI");
  }

  return {
    nodeEnv: process.env.NODE_ENV || "development",
    port: parseNumber("PORT", 5000),
    storeDriver,
    mongoUri,
    assistantName: optionalEnv("ASSISTANT_NAME") ?? "Sage",
    monthlySmsLimit: parseNumber("MONTHLY_SMS_LIMIT", 300),
    quotaWarningRemaining: parseNumber("QUOTA_WARNING_REMAINING", 30),
    quotaEnforced: parseBoolean(process.env.QUOTA_ENFORCED),
    externalTimeoutMs: parseNumber("EXTERNAL_TIMEOUT_MS", 15000),
    adminApiKey: requireEnv("ADMIN_API_KEY"),
    allowedOrigins: parseList(process.env.ALLOWED_ORIGINS),
    legacyWhitelistFile: optionalEnv("LEGACY_WHITELIST_FILE"),
    stripe: {
      secretKey: requireEnv("STRIPE_SECRET_KEY"),
      webhookSecret: requireEnv("STRIPE_WEBHOOK_SECRET"),
    },
    clicksend: {
      username: requireEnv("CLICKSEND_USERNAME"),
      apiKey: requireEnv("CLICKSEND_API_KEY"),
      sender: optionalEnv("CLICKSEND_SENDER"),
    },
    openai: {
      apiKey: requireEnv("OPENAI_API_KEY"),
      model: optionalEnv("OPENAI_MODEL") ?? "gpt-4o-mini",
      baseUrl: optionalEnv("OPENAI_BASE_URL") ?? "https://api.openai.com/v1",
    },
  };
};
