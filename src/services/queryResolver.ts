import axios from "axios";
import { PhoneKey, QueryIntent } from "../types/domain";
import { describeHttpError } from "../utils/http";
import { createLogger } from "../utils/logger";
import { maskPhone } from "../utils/phone";

const log = createLogger("Resolver");

export type QueryContext =
  | { personalized: true; firstName: string; location: string }
  | { personalized: false };

export type ResolvedQuery = {
  text: string;
  intent: QueryIntent;
};

export interface QueryResolver {
  resolve(phone: PhoneKey, text: string, context: QueryContext): Promise<ResolvedQuery>;
}

const INTENT_PATTERNS: [Exclude<QueryIntent, "general" | "error">, RegExp][] = [
  ["weather", /\b(weather|forecast|rain(ing)?|snow(ing)?|temperature|temp|sunny|humid(ity)?|wind(y)?)\b/i],
  ["business_hours", /\b(hours|open(s|ing)?|clos(e|es|ed|ing))\b/i],
  ["sports_schedule", /\b(game|games|schedule|match|playing|plays|kickoff|tip-?off|vs\.?|nfl|nba|mlb|nhl|mls)\b/i],
];

export function classifyIntent(text: string): Exclude<QueryIntent, "error"> {
  for (const [intent, pattern] of INTENT_PATTERNS) {
    if (pattern.test(text)) return intent;
  }
  return "general";
}

const INTENT_GUIDANCE: Record<Exclude<QueryIntent, "error">, string> = {
  weather: "Give the current conditions and the short-term forecast.",
  business_hours: "Give today's opening hours and mention if they vary by day.",
  sports_schedule: "Give the next game's date, time and opponent.",
  general: "Answer directly.",
};

type ChatCompletionResponse = {
  choices?: { message?: { content?: string | null } }[];
};

type OpenAiResolverConfig = {
  apiKey: string;
  model: string;
  baseUrl: string;
  timeoutMs: number;
  assistantName: string;
  fallbackText: string;
};

export const buildSystemPrompt = (
  assistantName: string,
  intent: Exclude<QueryIntent, "error">,
  context: QueryContext
): string => {
  const lines = [
    `You are ${assistantName}, an assistant that answers questions by text message.`,
    "Keep replies under 300 characters, plain text, no markdown.",
    INTENT_GUIDANCE[intent],
  ];
  if (context.personalized) {
    lines.push(`The user's name is ${context.firstName} and they are in ${context.location}.`);
  }
  return lines.join(" ");
};

/**
 * Intent keyword match plus one chat-completion call against an
 * OpenAI-compatible endpoint. Failures come back as the fallback text with
 * intent "error"; nothing is retried.
 */
export const createOpenAiQueryResolver = (config: OpenAiResolverConfig): QueryResolver => {
  const client = axios.create({
    baseURL: config.baseUrl,
    timeout: config.timeoutMs,
    headers: {
      Authorization: `Bearer ${config.apiKey}`,
      "Content-Type": "application/json",
    },
  });

  const resolve = async (phone: PhoneKey, text: string, context: QueryContext): Promise<ResolvedQuery> => {
    const intent = classifyIntent(text);
    try {
      const res = await client.post<ChatCompletionResponse>("/chat/completions", {
        model: config.model,
        max_tokens: 300,
        messages: [
          { role: "system", content: buildSystemPrompt(config.assistantName, intent, context) },
          { role: "user", content: text },
        ],
      });
      const answer = res.data.choices?.[0]?.message?.content?.trim();
      if (!answer) {
        log.warn("Empty completion", { phone: maskPhone(phone), intent });
        return { text: config.fallbackText, intent: "error" };
      }
      return { text: answer, intent };
    } catch (err) {
      log.error("Completion request failed", describeHttpError(err), { phone: maskPhone(phone), intent });
      return { text: config.fallbackText, intent: "error" };
    }
  };

  return { resolve };
};
