import { describe, expect, it } from "vitest";

import {
  configurationNameForRepo,
  parseRepoSpec,
  resourceName,
  sanitizeNameComponent,
  shortHash,
} from "../src/shared/names";

describe("sanitizeNameComponent", () => {
  it("lowercases and replaces disallowed characters", () => {
    expect(sanitizeNameComponent("Hops_Ops")).toBe("hops-ops");
    expect(sanitizeNameComponent("helm.certmanager")).toBe("helm-certmanager");
  });

  it("collapses and trims hyphens", () => {
    expect(sanitizeNameComponent("__a..b__")).toBe("a-b");
  });

  it("falls back when nothing is left", () => {
    expect(sanitizeNameComponent("---")).toBe("xrd");
    expect(sanitizeNameComponent("")).toBe("xrd");
  });
});

describe("resourceName", () => {
  it("joins sanitized parts", () => {
    expect(resourceName("My-Org", "My_Repo")).toBe("my-org-my-repo");
  });

  it("clamps to 63 characters", () => {
    const name = resourceName("a".repeat(40), "b".repeat(40));
    expect(name).toBe(`${"a".repeat(40)}-${"b".repeat(22)}`);
    expect(name.length).toBe(63);
  });

  it("does not end with a hyphen after clamping", () => {
    expect(resourceName("a".repeat(62), "b")).toBe("a".repeat(62));
  });

  it("derives configuration names from repo specs", () => {
    expect(configurationNameForRepo({ org: "Acme", repo: "platform.config" })).toBe("acme-platform-config");
  });
});

describe("parseRepoSpec", () => {
  it("accepts supported forms", () => {
    const expected = { org: "acme", repo: "platform" };
    expect(parseRepoSpec("acme/platform")).toEqual(expected);
    expect(parseRepoSpec("https://github.com/acme/platform.git")).toEqual(expected);
    expect(parseRepoSpec("http://github.com/acme/platform")).toEqual(expected);
    expect(parseRepoSpec("github.com/acme/platform")).toEqual(expected);
    expect(parseRepoSpec("acme/platform/")).toEqual(expected);
  });

  it("rejects empty input", () => {
    expect(() => parseRepoSpec("  ")).toThrow(/--repo cannot be empty\./);
  });

  it("rejects one or three segments", () => {
    expect(() => parseRepoSpec("acme")).toThrow(/Invalid --repo 'acme': expected <org>\/<repo>\./);
    expect(() => parseRepoSpec("acme/platform/extra")).toThrow(/expected <org>\/<repo>/);
  });

  it("rejects empty segments", () => {
    expect(() => parseRepoSpec("/platform")).toThrow(/expected <org>\/<repo>/);
    expect(() => parseRepoSpec("acme//")).toThrow(/expected <org>\/<repo>/);
  });
});

describe("shortHash", () => {
  it("returns eight hex characters and is stable", () => {
    expect(shortHash("ghcr.io/acme/fn_render")).toMatch(/^[0-9a-f]{8}$/);
    expect(shortHash("ghcr.io/acme/fn_render")).toBe(shortHash("ghcr.io/acme/fn_render"));
  });
});
