const MIN_LENGTH = 2;
const MAX_LENGTH = 500;

// Short replies that are always fine, whatever their length
const SHORT_ALLOW_LIST = new Set([
  "y",
  "n",
  "k",
  "ok",
  "hi",
  "yo",
  "hey",
  "yes",
  "no",
  "ty",
  "thanks",
  "help",
  "info",
  "start",
  "stop",
]);

const SPAM_KEYWORDS = [
  "free",
  "winner",
  "claim prize",
  "claim your prize",
  "cash prize",
  "click here",
  "act now",
  "limited time",
  "buy now",
  "gift card",
  "lottery",
  "risk free",
  "urgent reply",
  "congratulations you",
];

// Phrasing that marks a real question even when a spam keyword appears
const LEGITIMATE_PATTERNS = [
  /^\s*(what|why|how|who|when|where|which|is|are|can|could|would|should|do|does|did|will)\b/i,
  /\?\s*$/,
  /\b(free will|meaning of life|philosoph\w*|ethic\w*|moral\w*)\b/i,
];

const escapeRegExp = (value: string) => value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");

const SPAM_PATTERNS = SPAM_KEYWORDS.map((keyword) => new RegExp(`\\b${escapeRegExp(keyword)}\\b`, "i"));

export type ContentCheck =
  | { allowed: true }
  | { allowed: false; reason: "too_short" | "too_long" | "spam" };

export function isLikelySpam(text: string): boolean {
  if (!SPAM_PATTERNS.some((pattern) => pattern.test(text))) return false;
  return !LEGITIMATE_PATTERNS.some((pattern) => pattern.test(text));
}

export function checkContent(raw: string): ContentCheck {
  const text = raw.trim();
  const bare = text.toLowerCase().replace(/[.!?]+$/, "");
  if (SHORT_ALLOW_LIST.has(bare)) return { allowed: true };

  if (text.length < MIN_LENGTH) return { allowed: false, reason: "too_short" };
  if (text.length > MAX_LENGTH) return { allowed: false, reason: "too_long" };
  if (isLikelySpam(text)) return { allowed: false, reason: "spam" };
  return { allowed: true };
}
