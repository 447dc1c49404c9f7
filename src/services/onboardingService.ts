import { AssistantStore } from "../store/types";
import { Clock, OnboardingField, OnboardingStep, PhoneKey, UserProfile } from "../types/domain";
import { createLogger } from "../utils/logger";
import { maskPhone } from "../utils/phone";
import { collapseWhitespace, titleCase } from "../utils/text";
import { MessageTemplates } from "./messageTemplates";

const log = createLogger("Onboarding");

const NAME_MIN_LENGTH = 2;
const NAME_MAX_LENGTH = 50;
const LOCATION_MIN_LENGTH = 2;
const LOCATION_MAX_LENGTH = 100;

export type FieldCheck = { ok: true; value: string } | { ok: false };

export type OnboardingResult = {
  reply: string;
  step: number;
  accepted: boolean;
};

/**
 * "john!!" -> "John". Rejects anything that leaves fewer than two
 * characters, and raw input longer than 50 characters.
 */
export function cleanFirstName(input: string): FieldCheck {
  const titled = titleCase(input.trim());
  if (titled.length > NAME_MAX_LENGTH) return { ok: false };
  const value = collapseWhitespace(titled.replace(/[^\p{L}\s'-]/gu, ""));
  if (value.length < NAME_MIN_LENGTH) return { ok: false };
  return { ok: true, value };
}

export function cleanLocation(input: string): FieldCheck {
  const value = titleCase(input.trim());
  if (value.length < LOCATION_MIN_LENGTH || value.length > LOCATION_MAX_LENGTH) return { ok: false };
  return { ok: true, value };
}

export interface OnboardingService {
  /** Feed one inbound text into the step machine. Never throws on odd profile state. */
  advance(phone: PhoneKey, text: string): Promise<OnboardingResult>;
  /** The prompt a phone should see next, without changing anything. */
  promptFor(profile: UserProfile | null): string;
}

type OnboardingDeps = {
  store: AssistantStore;
  templates: MessageTemplates;
  now: Clock;
};

export const createOnboardingService = ({ store, templates, now }: OnboardingDeps): OnboardingService => {
  const logStep = async (phone: PhoneKey, step: number, field: OnboardingField, value: string) => {
    try {
      await store.appendOnboardingLog({ phone, step, field, value, createdAt: now() });
    } catch (err) {
      log.error("Failed to write onboarding log", err, { phone: maskPhone(phone) });
    }
  };

  const promptFor = (profile: UserProfile | null): string => {
    if (!profile) return templates.namePrompt();
    if (profile.onboardingCompleted) return templates.welcomeBack(profile.firstName);
    if (profile.onboardingStep === OnboardingStep.AWAITING_LOCATION && profile.firstName) {
      return templates.locationPrompt(profile.firstName);
    }
    return templates.namePrompt();
  };

  // Another message moved the profile first; answer from where it is now
  const superseded = async (phone: PhoneKey): Promise<OnboardingResult> => {
    const current = await store.getProfile(phone);
    log.info("Onboarding step already taken by a concurrent message", { phone: maskPhone(phone) });
    return {
      reply: current?.onboardingCompleted ? templates.readyForQuestions() : promptFor(current),
      step: current?.onboardingStep ?? OnboardingStep.AWAITING_NAME,
      accepted: false,
    };
  };

  const collectName = async (phone: PhoneKey, text: string): Promise<OnboardingResult> => {
    const check = cleanFirstName(text);
    if (!check.ok) {
      return { reply: templates.nameRetry(), step: OnboardingStep.AWAITING_NAME, accepted: false };
    }

    const updated = await store.advanceOnboarding(
      phone,
      OnboardingStep.AWAITING_NAME,
      { firstName: check.value, onboardingStep: OnboardingStep.AWAITING_LOCATION },
      now()
    );
    if (!updated) return superseded(phone);

    await logStep(phone, OnboardingStep.AWAITING_LOCATION, "first_name", check.value);
    return {
      reply: templates.locationPrompt(check.value),
      step: OnboardingStep.AWAITING_LOCATION,
      accepted: true,
    };
  };

  const collectLocation = async (profile: UserProfile, text: string): Promise<OnboardingResult> => {
    const check = cleanLocation(text);
    if (!check.ok) {
      return { reply: templates.locationRetry(), step: OnboardingStep.AWAITING_LOCATION, accepted: false };
    }

    // A location step without a stored name cannot complete; go back for the name
    if (!profile.firstName) {
      const reset = await store.advanceOnboarding(
        profile.phone,
        OnboardingStep.AWAITING_LOCATION,
        { onboardingStep: OnboardingStep.AWAITING_NAME },
        now()
      );
      if (!reset) return superseded(profile.phone);
      return { reply: templates.namePrompt(), step: OnboardingStep.AWAITING_NAME, accepted: false };
    }

    const updated = await store.advanceOnboarding(
      profile.phone,
      OnboardingStep.AWAITING_LOCATION,
      {
        location: check.value,
        onboardingStep: OnboardingStep.COMPLETE,
        onboardingCompleted: true,
      },
      now()
    );
    if (!updated) return superseded(profile.phone);

    await logStep(profile.phone, OnboardingStep.COMPLETE, "location", check.value);
    return {
      reply: templates.onboardingComplete(profile.firstName),
      step: OnboardingStep.COMPLETE,
      accepted: true,
    };
  };

  const advance = async (phone: PhoneKey, text: string): Promise<OnboardingResult> => {
    const { profile } = await store.ensureProfile(phone, now());

    switch (profile.onboardingStep) {
      case OnboardingStep.NEW: {
        const moved = await store.advanceOnboarding(
          phone,
          OnboardingStep.NEW,
          { onboardingStep: OnboardingStep.AWAITING_NAME },
          now()
        );
        if (!moved) return superseded(phone);
        return { reply: templates.namePrompt(), step: OnboardingStep.AWAITING_NAME, accepted: false };
      }
      case OnboardingStep.AWAITING_NAME:
        return collectName(phone, text);
      case OnboardingStep.AWAITING_LOCATION:
        return collectLocation(profile, text);
      default:
        return { reply: templates.readyForQuestions(), step: profile.onboardingStep, accepted: false };
    }
  };

  return { advance, promptFor };
};
