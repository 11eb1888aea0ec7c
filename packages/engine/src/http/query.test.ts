import { describe, expect, it } from "vitest";
import { parseQueryString } from "./query.js";

describe("parseQueryString", () => {
  it("splits pairs on & and =", () => {
    expect([...parseQueryString("a=1&b=2")]).toEqual([
      ["a", "1"],
      ["b", "2"],
    ]);
  });

  it("keeps the last value for a repeated key", () => {
    const params = parseQueryString("a=1&a=2&json=true");

    expect(params.get("a")).toBe("2");
    expect([...params.keys()]).toEqual(["a", "json"]);
  });

  it("drops empty segments and segments without =", () => {
    expect([...parseQueryString("&&a=1&flag&")]).toEqual([["a", "1"]]);
  });

  it("splits on the first = only", () => {
    expect(parseQueryString("expr=x=y").get("expr")).toBe("x=y");
  });

  it("keeps empty keys and values as sent", () => {
    expect([...parseQueryString("=x&k=")]).toEqual([
      ["", "x"],
      ["k", ""],
    ]);
  });

  it("does not percent-decode", () => {
    expect(parseQueryString("q=a%20b").get("q")).toBe("a%20b");
  });

  it("returns an empty map for an empty query", () => {
    expect(parseQueryString("").size).toBe(0);
  });
});
