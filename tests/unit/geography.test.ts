/**
 * Unit tests for the geography filter
 */

import { describe, it, expect } from "vitest";
import { checkGeography, classifyLocation } from "@/extraction";

describe("classifyLocation", () => {
  it.each([
    ["San Francisco, CA", "us"],
    ["Remote - US", "us"],
    ["New York, New York", "us"],
    ["Springfield, IL", "us"],
    ["New Mexico", "us"],
    ["United States", "us"],
    ["London, UK", "non_us"],
    ["Toronto, ON", "non_us"],
    ["EMEA", "non_us"],
    ["Remote", "ambiguous"],
    ["Anywhere", "ambiguous"],
    ["", "ambiguous"],
  ])("%s → %s", (location, expected) => {
    expect(classifyLocation(location)).toBe(expected);
  });

  it.each([
    ["Tbilisi, Georgia", "non_us"],
    ["Durham, England", "non_us"],
    ["Portland, UK", "non_us"],
    ["Georgia", "ambiguous"],
    ["Atlanta, Georgia", "us"],
    ["Savannah, GA", "us"],
    ["Albuquerque, New Mexico", "us"],
    ["London, UK or Remote, US", "us"],
  ])("non-US markers outweigh state and city names: %s → %s", (location, expected) => {
    expect(classifyLocation(location)).toBe(expected);
  });

  it("does not read a two-letter country code as a state", () => {
    expect(classifyLocation("Berlin, DE")).toBe("non_us");
    expect(classifyLocation("Lagos, NG")).toBe("ambiguous");
  });
});

describe("checkGeography", () => {
  it("rejects a UK posting", () => {
    expect(checkGeography("London, UK", [])).toEqual({
      ok: false,
      reason: "non_us_location",
      detail: "London, UK",
    });
  });

  it("rejects non-US places that share a name with a US state or city", () => {
    for (const location of ["Tbilisi, Georgia", "Durham, England", "Portland, UK"]) {
      expect(checkGeography(location, [])).toEqual({
        ok: false,
        reason: "non_us_location",
        detail: location,
      });
    }
  });

  it("accepts when an alternate location is in the US", () => {
    expect(checkGeography("Remote", ["Austin, TX"])).toEqual({ ok: true });
    expect(checkGeography("London, UK", ["Seattle, WA"])).toEqual({ ok: true });
  });

  it("rejects postings with no location", () => {
    expect(checkGeography("", [])).toEqual({
      ok: false,
      reason: "unconfirmed_location",
      detail: "no location stated",
    });
  });

  it("rejects unconfirmed locations", () => {
    expect(checkGeography("Remote", [])).toEqual({
      ok: false,
      reason: "unconfirmed_location",
      detail: "Remote",
    });
  });

  it("reports every candidate when a non-US marker is present", () => {
    expect(checkGeography("Remote", ["EMEA"])).toEqual({
      ok: false,
      reason: "non_us_location",
      detail: "Remote | EMEA",
    });
  });
});
