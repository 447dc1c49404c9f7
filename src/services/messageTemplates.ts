/**
 * Every SMS the service sends on its own behalf (anything that is not an
 * answer to a user question) is built here.
 */

export type UsageNoticeParams = {
  count: number;
  remaining: number;
  daysRemaining: number;
};

const plural = (value: number, unit: string) => `${value} ${unit}${value === 1 ? "" : "s"}`;

const formatDay = (date: Date) =>
  date.toLocaleDateString("en-US", {
    weekday: "long",
    month: "long",
    day: "numeric",
    timeZone: "UTC",
  });

export const createMessageTemplates = (assistantName: string) => ({
  namePrompt: () =>
    `Hi! I'm ${assistantName}, your personal text assistant. Before we get started, what's your first name?`,

  nameRetry: () => "Sorry, I didn't catch that. Please reply with just your first name (letters only).",

  locationPrompt: (firstName: string) =>
    `Nice to meet you, ${firstName}! What city or ZIP code are you in? It helps me answer local questions like weather and store hours.`,

  locationRetry: () => "Please reply with your city or ZIP code (for example: Austin, TX or 78701).",

  onboardingComplete: (firstName: string) =>
    `You're all set, ${firstName}! Text me anything: game schedules, store hours, the weather, or any other question.`,

  readyForQuestions: () => "You're all set! You can ask me questions now.",

  welcomeBack: (firstName: string | null) =>
    firstName
      ? `Welcome back, ${firstName}! You're subscribed to ${assistantName} again. What can I help you with?`
      : `Welcome back! You're subscribed to ${assistantName} again. What can I help you with?`,

  unsubscribed: () =>
    `You've been unsubscribed from ${assistantName} texts. Reply START at any time to resubscribe.`,

  help: () =>
    `${assistantName}: text me any question and I'll reply by SMS. Reply STOP to unsubscribe, START to resubscribe. Msg&data rates may apply.`,

  startGuidance: () => `This number isn't subscribed to ${assistantName} yet. Text START to get started.`,

  subscriptionInactive: () =>
    `Your ${assistantName} subscription isn't active right now. Please update your billing details to keep asking questions.`,

  goodbye: () =>
    `Your ${assistantName} subscription has ended and you won't receive further replies. Thanks for texting with us!`,

  trialEnding: (trialEnd: Date | null) =>
    trialEnd
      ? `Heads up: your ${assistantName} free trial ends ${formatDay(trialEnd)}. Your subscription continues automatically unless you cancel.`
      : `Heads up: your ${assistantName} free trial ends soon. Your subscription continues automatically unless you cancel.`,

  paymentFailed: () =>
    `We couldn't process your latest ${assistantName} payment. Please update your payment method to keep your access.`,

  quotaWarning: ({ count, remaining, daysRemaining }: UsageNoticeParams) =>
    `Heads up: you've used ${count} messages this period. ${plural(remaining, "message")} left, resets in ${plural(daysRemaining, "day")}.`,

  quotaExceeded: ({ count, daysRemaining }: UsageNoticeParams) =>
    `You've reached your limit of ${count} messages for this period. Your allowance resets in ${plural(daysRemaining, "day")}.`,

  fallback: () => "Sorry, something went wrong on our end. Please try again in a few minutes.",
});

export type MessageTemplates = ReturnType<typeof createMessageTemplates>;
