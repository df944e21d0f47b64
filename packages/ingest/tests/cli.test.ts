import { describe, expect, it } from "vitest";
import { parseCliArgs } from "../src/lib/cli";
import { ALL_DOMAINS, parseDomains } from "../src/lib/settings";

describe("parseCliArgs", () => {
  it("returns no overrides without arguments", () => {
    expect(parseCliArgs([])).toEqual({});
  });

  it("maps flags onto config overrides", () => {
    expect(
      parseCliArgs([
        "--quotes",
        "--books",
        "--quotes",
        "--images",
        "--backup",
        "--max-pages=3",
        "--limit-categories=2",
        "--file=data/partners.xlsx",
      ]),
    ).toEqual({
      domains: ["quotes", "books"],
      downloadImages: true,
      backup: true,
      maxPages: 3,
      limitCategories: 2,
      librairiesFile: "data/partners.xlsx",
    });
  });

  it("selects a single stage and the analytics step", () => {
    expect(parseCliArgs(["--load-only", "--analytics", "--load-only"])).toEqual({ phase: "load", analytics: true });
    expect(() => parseCliArgs(["--extract-only", "--transform-only"])).toThrow(
      "Choose one of --extract-only, --transform-only, --load-only",
    );
  });

  it("rejects bad values", () => {
    expect(() => parseCliArgs(["--max-pages=0"])).toThrow('--max-pages expects a positive integer, got "0"');
    expect(() => parseCliArgs(["--limit-categories=two"])).toThrow(
      '--limit-categories expects a positive integer, got "two"',
    );
    expect(() => parseCliArgs(["--file="])).toThrow("--file expects a path");
    expect(() => parseCliArgs(["--all"])).toThrow("Unknown argument: --all");
  });
});

describe("parseDomains", () => {
  it("defaults to every domain", () => {
    expect(parseDomains(undefined)).toEqual(ALL_DOMAINS);
    expect(parseDomains("nothing,useful")).toEqual(ALL_DOMAINS);
  });

  it("keeps known domains once, in order", () => {
    expect(parseDomains(" Quotes ,librairies,quotes,films")).toEqual(["quotes", "librairies"]);
  });
});
