import { describe, expect, it } from "vitest";
import { ERROR_CATALOG } from "../../index.js";

describe("ERROR_CATALOG", () => {
  it("should have all expected domains", () => {
    const domains = new Set(Object.values(ERROR_CATALOG).map((e) => e.domain));

    expect(domains).toContain("internal");
    expect(domains).toContain("registry");
    expect(domains).toContain("template");
    expect(domains).toContain("plugin");
    expect(domains).toContain("config");
  });

  it("should prefix every code with its domain", () => {
    for (const [code, entry] of Object.entries(ERROR_CATALOG)) {
      expect(code.startsWith(`${entry.domain.toUpperCase()}_`)).toBe(true);
    }
  });

  it("should have a title and description for every entry", () => {
    for (const entry of Object.values(ERROR_CATALOG)) {
      expect(entry.title.length).toBeGreaterThan(0);
      expect(entry.description.length).toBeGreaterThan(0);
    }
  });
});
