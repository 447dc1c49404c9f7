import { checkContent, isLikelySpam } from "../../../src/services/contentFilter";

describe("checkContent", () => {
  test("lets short acknowledgements through", () => {
    expect(checkContent("ok")).toEqual({ allowed: true });
    expect(checkContent("OK!")).toEqual({ allowed: true });
    expect(checkContent("y")).toEqual({ allowed: true });
  });

  test("rejects one-character noise", () => {
    expect(checkContent("x")).toEqual({ allowed: false, reason: "too_short" });
  });

  test("rejects texts over 500 characters", () => {
    expect(checkContent("a".repeat(501))).toEqual({ allowed: false, reason: "too_long" });
    expect(checkContent("a".repeat(500))).toEqual({ allowed: true });
  });

  test("rejects spam phrasing", () => {
    expect(checkContent("Claim your prize now")).toEqual({ allowed: false, reason: "spam" });
    expect(checkContent("Congratulations you are a winner")).toEqual({ allowed: false, reason: "spam" });
  });

  test("allows questions that happen to contain spam keywords", () => {
    expect(checkContent("Is parking free downtown on Sundays?")).toEqual({ allowed: true });
    expect(checkContent("Do we have free will")).toEqual({ allowed: true });
  });
});

describe("isLikelySpam", () => {
  test("ignores keywords inside longer words", () => {
    expect(isLikelySpam("Freedom trail opening times")).toBe(false);
  });
});
