// pattern: Functional Core

import { describe, it, expect } from "vitest";
import { buildQuerySignature, buildSearchQuery } from "./query.ts";

describe("buildSearchQuery", () => {
  it("joins language, created date and extra text in that order", () => {
    expect(buildSearchQuery("Java", "2024-01-01", "topic:backend")).toBe(
      "language:Java created:>2024-01-01 topic:backend",
    );
  });

  it("omits blank or missing parts", () => {
    expect(buildSearchQuery("", "2024-01-01", null)).toBe("created:>2024-01-01");
    expect(buildSearchQuery("Go", "  ", "")).toBe("language:Go");
    expect(buildSearchQuery(null, null, "stars:>10")).toBe("stars:>10");
  });

  it("returns an empty string when every part is blank", () => {
    expect(buildSearchQuery("", " ", null)).toBe("");
  });

  it("passes extra query text through without escaping", () => {
    expect(buildSearchQuery("Rust", "2023-06-01", "topic:cli stars:>100")).toBe(
      "language:Rust created:>2023-06-01 topic:cli stars:>100",
    );
  });
});

describe("buildQuerySignature", () => {
  it("joins the four parameters with pipes", () => {
    expect(buildQuerySignature("Java", "2024-01-01", "topic:backend", 10)).toBe(
      "Java|2024-01-01|topic:backend|10",
    );
  });

  it("maps null and blank extra queries to the same key", () => {
    const fromNull = buildQuerySignature("Java", "2024-01-01", null, 10);
    const fromEmpty = buildQuerySignature("Java", "2024-01-01", "", 10);
    const fromSpaces = buildQuerySignature("Java", "2024-01-01", "   ", 10);

    expect(fromNull).toBe("Java|2024-01-01||10");
    expect(fromEmpty).toBe(fromNull);
    expect(fromSpaces).toBe(fromNull);
  });

  it("distinguishes limits", () => {
    expect(buildQuerySignature("Java", "2024-01-01", null, 10)).not.toBe(
      buildQuerySignature("Java", "2024-01-01", null, 11),
    );
  });
});
