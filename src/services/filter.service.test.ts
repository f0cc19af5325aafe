import { describe, expect, it } from "vitest";
import {
  createSubjectFilter,
  DEFAULT_KEYWORDS,
  isJobRelated,
} from "./filter.service";

describe("isJobRelated", () => {
  it.each([
    "Thanks for applying to Acme",
    "THANK YOU FOR APPLYING",
    "Your Application to Globex",
    "We received your application",
    "Follow-Up: Senior Engineer",
    "An update on your candidacy",
    "Initech Recruiting",
    "You applied for Analyst",
    "Thanks from the Hooli team",
  ])("includes %j", (subject) => {
    expect(isJobRelated(subject)).toBe(true);
  });

  it.each([
    "Weekly newsletter",
    "Your order has shipped",
    "Interview tips for 2024",
    "",
  ])("excludes %j", (subject) => {
    expect(isJobRelated(subject)).toBe(false);
  });

  it("matches each default keyword on its own", () => {
    for (const keyword of DEFAULT_KEYWORDS) {
      expect(isJobRelated(`re: ${keyword.toUpperCase()} !`)).toBe(true);
    }
  });

  it("uses the given keyword list instead of the defaults", () => {
    expect(isJobRelated("Interview invitation", ["interview"])).toBe(true);
    expect(isJobRelated("Application received", ["interview"])).toBe(false);
  });
});

describe("createSubjectFilter", () => {
  it("normalizes configured keywords and ignores blanks", () => {
    const matches = createSubjectFilter(["  Offer ", "", "Onsite"]);

    expect(matches("Your OFFER letter")).toBe(true);
    expect(matches("onsite schedule")).toBe(true);
    expect(matches("Application received")).toBe(false);
  });

  it("falls back to the default keywords", () => {
    const matches = createSubjectFilter();

    expect(matches("Application received")).toBe(true);
    expect(matches("Weekly newsletter")).toBe(false);
  });
});
