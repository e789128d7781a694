export type IngredientMatcher = (pattern: string, ingredient: string) => boolean;

/**
 * Loose ingredient match: equality, substring in either direction, or any
 * word of one side being a substring of a word on the other side.
 *
 * The word rule over-matches on short words ("pea" matches "peanut butter",
 * "oil" matches "boiled eggs"). Callers that need exact word matching should
 * pass `wordBoundaryIngredientMatch` instead.
 */
export const fuzzyIngredientMatch: IngredientMatcher = (pattern, ingredient) => {
  const left = pattern.toLowerCase().trim();
  const right = ingredient.toLowerCase().trim();
  if (!left || !right) return false;
  if (left === right || right.includes(left) || left.includes(right)) return true;

  const leftWords = left.split(/\s+/);
  const rightWords = right.split(/\s+/);
  return leftWords.some((leftWord) =>
    rightWords.some((rightWord) => rightWord.includes(leftWord) || leftWord.includes(rightWord))
  );
};

export const wordBoundaryIngredientMatch: IngredientMatcher = (pattern, ingredient) => {
  const leftWords = new Set(pattern.toLowerCase().split(/\s+/).filter(Boolean));
  const rightWords = ingredient.toLowerCase().split(/\s+/).filter(Boolean);
  if (leftWords.size === 0 || rightWords.length === 0) return false;
  return Array.from(leftWords).every((word) => rightWords.includes(word));
};

export function findConflicts(
  ingredients: string[],
  patterns: string[],
  matcher: IngredientMatcher = fuzzyIngredientMatch
): string[] {
  return ingredients.filter((ingredient) => patterns.some((pattern) => matcher(pattern, ingredient)));
}
