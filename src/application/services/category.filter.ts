import { SegmentMatch } from "../../domain/entities/segment-match";
import { ANY_SUB_CATEGORY, CATEGORY_OPTIONS } from "../../domain/constants/categories";
import { QueryValidationError } from "../../domain/errors/search.errors";

export interface CategorySelection {
  category: string;
  subCategory: string;
}

export function assertCategorySelection({ category, subCategory }: CategorySelection): void {
  if (!Object.hasOwn(CATEGORY_OPTIONS, category)) {
    throw new QueryValidationError(`Unknown category: ${category}`);
  }
  if (!CATEGORY_OPTIONS[category].includes(subCategory)) {
    throw new QueryValidationError(`Unknown sub-category "${subCategory}" for category "${category}"`);
  }
}

/**
 * Narrow matches to a sub-category by looking for its name in the video
 * title or description. "Any" keeps everything.
 */
export function filterByCategory(
  matches: readonly SegmentMatch[],
  selection: CategorySelection
): SegmentMatch[] {
  assertCategorySelection(selection);

  if (selection.subCategory === ANY_SUB_CATEGORY) {
    return [...matches];
  }

  const name = selection.subCategory.toLowerCase();
  return matches.filter((match) => {
    const title = (match.video.title ?? "").toLowerCase();
    const description = (match.video.description ?? "").toLowerCase();
    return title.includes(name) || description.includes(name);
  });
}
