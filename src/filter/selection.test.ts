import { describe, test, expect } from "vitest";
import { parseLetterFilter } from "./letters";
import { compileIgnorePolicy } from "./pattern-matcher";
import { selectRepositories } from "./selection";

const ALL = ["alpha", "beta/app", "legacy/one", "gamma", "zulu"];

const base = {
  letters: parseLetterFilter(undefined),
  ignore: compileIgnorePolicy([]),
  maxRepositories: 0,
};

describe("selectRepositories", () => {
  test("selects everything by default", () => {
    expect(selectRepositories(ALL, base).selected).toEqual(ALL);
  });

  test("applies letter filter and ignore rules together", () => {
    const selection = selectRepositories(ALL, {
      ...base,
      letters: parseLetterFilter("a-m"),
      ignore: compileIgnorePolicy(["legacy/*"]),
    });

    expect(selection).toEqual({
      selected: ["alpha", "beta/app", "gamma"],
      ignored: ["legacy/one"],
      filteredByLetter: ["zulu"],
      truncated: [],
      override: false,
    });
  });

  test("caps in source order after filtering", () => {
    const selection = selectRepositories(ALL, {
      ...base,
      ignore: compileIgnorePolicy(["alpha"]),
      maxRepositories: 2,
    });

    expect(selection.selected).toEqual(["beta/app", "legacy/one"]);
    expect(selection.truncated).toEqual(["gamma", "zulu"]);
  });

  test("an explicit repository overrides every filter and the cap", () => {
    const selection = selectRepositories(ALL, {
      ...base,
      repository: "legacy/one",
      letters: parseLetterFilter("a"),
      ignore: compileIgnorePolicy(["legacy/*"]),
      maxRepositories: 1,
    });

    expect(selection).toEqual({
      selected: ["legacy/one"],
      ignored: [],
      filteredByLetter: [],
      truncated: [],
      override: true,
    });
  });
});
