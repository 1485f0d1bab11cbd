export const ANY_SUB_CATEGORY = "Any";

// Sub-categories other than "Any" are matched against video title and description
export const CATEGORY_OPTIONS: Readonly<Record<string, readonly string[]>> = {
  "Speeches of politicians": [ANY_SUB_CATEGORY, "Donald Trump", "Vladimir Putin", "Xi Jinping"],
  Movies: [ANY_SUB_CATEGORY],
  "News clips": [ANY_SUB_CATEGORY],
  "Music clips": [ANY_SUB_CATEGORY],
  "Sport clips": [ANY_SUB_CATEGORY],
};

export const DEFAULT_CATEGORY = "Speeches of politicians";
