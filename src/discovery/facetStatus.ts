import type { FacetUpdate } from "../store/updates";
import type { SearchFacet } from "../types";

/**
 * A facet marked completed while still carrying a page cursor past the first
 * page (and no explanatory message), or a pending resume page, most likely
 * crashed mid-discovery. Heuristic only.
 */
export function isIncorrectlyCompleted(
  facet: Pick<SearchFacet, "status" | "currentPage" | "resumeFromPage" | "errorMessage">,
): boolean {
  if (facet.status !== "completed") {
    return false;
  }
  return (facet.currentPage > 1 && !facet.errorMessage) || facet.resumeFromPage > 1;
}

export function repairIncorrectCompletion(
  facet: Pick<SearchFacet, "currentPage" | "resumeFromPage">,
): FacetUpdate {
  const resumePage = facet.currentPage > 1 ? facet.currentPage + 1 : Math.max(1, facet.resumeFromPage);
  return {
    status: "discovering",
    errorMessage: `Auto-fixed: marked completed at page ${facet.currentPage}; resuming from page ${resumePage}`,
    currentPage: resumePage,
    resumeFromPage: resumePage,
  };
}
