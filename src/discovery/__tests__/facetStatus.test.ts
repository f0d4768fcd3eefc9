import { describe, expect, it } from "vitest";

import { isIncorrectlyCompleted, repairIncorrectCompletion } from "../facetStatus";

describe("isIncorrectlyCompleted", () => {
  it("flags a completed facet that still carries a page cursor", () => {
    expect(
      isIncorrectlyCompleted({ status: "completed", currentPage: 4, resumeFromPage: 1, errorMessage: null }),
    ).toBe(true);
    expect(
      isIncorrectlyCompleted({ status: "completed", currentPage: 1, resumeFromPage: 3, errorMessage: null }),
    ).toBe(true);
  });

  it("accepts a cursor explained by an error message", () => {
    expect(
      isIncorrectlyCompleted({ status: "completed", currentPage: 4, resumeFromPage: 1, errorMessage: "stopped" }),
    ).toBe(false);
  });

  it("ignores clean and non-completed facets", () => {
    expect(
      isIncorrectlyCompleted({ status: "completed", currentPage: 1, resumeFromPage: 1, errorMessage: null }),
    ).toBe(false);
    expect(
      isIncorrectlyCompleted({ status: "discovering", currentPage: 9, resumeFromPage: 10, errorMessage: null }),
    ).toBe(false);
  });
});

describe("repairIncorrectCompletion", () => {
  it("resumes after the last recorded page", () => {
    expect(repairIncorrectCompletion({ currentPage: 4, resumeFromPage: 1 })).toEqual({
      status: "discovering",
      errorMessage: "Auto-fixed: marked completed at page 4; resuming from page 5",
      currentPage: 5,
      resumeFromPage: 5,
    });
  });

  it("keeps a pending resume page", () => {
    expect(repairIncorrectCompletion({ currentPage: 1, resumeFromPage: 3 })).toMatchObject({
      currentPage: 3,
      resumeFromPage: 3,
    });
  });
});
