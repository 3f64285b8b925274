import { describe, expect, it } from "vitest";
import { isPresent, none, some, valueOr } from "../optional.js";

describe("Optional", () => {
  it("keeps explicit zero values present", () => {
    expect(isPresent(some(false))).toBe(true);
    expect(isPresent(some(0))).toBe(true);
    expect(isPresent(some(""))).toBe(true);
  });

  it("treats none as absent", () => {
    expect(isPresent(none<string>())).toBe(false);
    expect(none()).toEqual({ present: false });
  });

  it("unwraps with a fallback", () => {
    expect(valueOr(some(0), 7)).toBe(0);
    expect(valueOr(none<number>(), 7)).toBe(7);
  });
});
