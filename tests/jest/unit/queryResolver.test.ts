import { buildSystemPrompt, classifyIntent } from "../../../src/services/queryResolver";

describe("classifyIntent", () => {
  test("spots weather questions", () => {
    expect(classifyIntent("Will it rain tomorrow?")).toBe("weather");
    expect(classifyIntent("what's the forecast")).toBe("weather");
  });

  test("spots business hours questions", () => {
    expect(classifyIntent("When does the library open on Saturday?")).toBe("business_hours");
  });

  test("spots sports schedule questions", () => {
    expect(classifyIntent("What time is the Packers game?")).toBe("sports_schedule");
  });

  test("falls back to general", () => {
    expect(classifyIntent("Tell me a joke")).toBe("general");
  });
});

describe("buildSystemPrompt", () => {
  test("adds name and location for onboarded users", () => {
    const prompt = buildSystemPrompt("Sage", "general", { personalized: true, firstName: "Ann", location: "Boston" });
    expect(prompt).toContain("You are Sage,");
    expect(prompt).toContain("The user's name is Ann and they are in Boston.");
  });

  test("omits personal details otherwise", () => {
    const prompt = buildSystemPrompt("Sage", "weather", { personalized: false });
    expect(prompt).not.toContain("The user's name");
    expect(prompt).toContain("Give the current conditions and the short-term forecast.");
  });
});
