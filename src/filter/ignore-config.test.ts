import { describe, test, expect } from "vitest";
import { ConfigError } from "#/errors";
import { createMockFileSystem } from "#/test-utils/mocks";
import { loadIgnorePatterns, normalizeIgnorePatterns } from "./ignore-config";

describe("normalizeIgnorePatterns", () => {
  test("splits globs on commas and trims", () => {
    expect(normalizeIgnorePatterns(["foo, bar", " baz ", ""])).toEqual(["foo", "bar", "baz"]);
  });

  test("keeps regex rules whole", () => {
    expect(normalizeIgnorePatterns(["re:^a{1,2}$", "x,,y"])).toEqual(["re:^a{1,2}$", "x", "y"]);
  });
});

describe("loadIgnorePatterns", () => {
  test("reads a JSON array", () => {
    const fs = createMockFileSystem({ "ignore.json": '["legacy/*", "re:^tmp-\\\\d+$"]' });

    expect(loadIgnorePatterns(fs, "ignore.json")).toEqual(["legacy/*", "re:^tmp-\\d+$"]);
  });

  test("reads an object with patterns", () => {
    const fs = createMockFileSystem({ "ignore.json": '{"patterns": ["a/*,b/*"]}' });

    expect(loadIgnorePatterns(fs, "ignore.json")).toEqual(["a/*", "b/*"]);
  });

  test("rejects a missing file", () => {
    expect(() => loadIgnorePatterns(createMockFileSystem(), "ignore.json")).toThrow(
      "Ignore config file 'ignore.json' not found."
    );
  });

  test("rejects invalid JSON", () => {
    const fs = createMockFileSystem({ "ignore.json": "[legacy" });

    expect(() => loadIgnorePatterns(fs, "ignore.json")).toThrow("Invalid JSON in ignore.json");
  });

  test("rejects the wrong shape", () => {
    const fs = createMockFileSystem({ "ignore.json": '{"rules": ["a"]}' });

    expect(() => loadIgnorePatterns(fs, "ignore.json")).toThrow(ConfigError);
  });
});
