import type { Recipe, RecipeMetadata } from "../types/contracts.js";

export const SECTION_SEPARATOR = " | ";
const TITLE_PREFIX = "Title: ";

export type RecipeDocument = {
  text: string;
  metadata: RecipeMetadata;
};

export function recipeText(recipe: Recipe): string {
  const nutrition = recipe.nutrition;
  return [
    `${TITLE_PREFIX}${recipe.title}`,
    `Description: ${recipe.description}`,
    `Cuisine Type: ${recipe.cuisineType}`,
    `Dietary Tags: ${recipe.dietaryTags.join(", ")}`,
    `Health Benefits: ${recipe.healthBenefits.join(", ")}`,
    `Ingredients: ${recipe.ingredients.map((ingredient) => ingredient.name).join(", ")}`,
    `Instructions: ${recipe.instructions.join(" ")}`,
    `Nutritional Info: Calories ${nutrition.calories ?? 0}, Protein ${nutrition.protein ?? 0}g, ` +
      `Carbs ${nutrition.carbohydrates ?? 0}g, Fat ${nutrition.fat ?? 0}g`
  ].join(SECTION_SEPARATOR);
}

/**
 * Splits a long recipe text at section boundaries. Only the first chunk keeps
 * the title prefix.
 */
export function recipeChunks(recipe: Recipe, chunkSize: number = 1000): string[] {
  const text = recipeText(recipe);
  if (text.length <= chunkSize) {
    return [text];
  }

  const chunks: string[] = [];
  let current = "";
  for (const section of text.split(SECTION_SEPARATOR)) {
    const candidate = current ? `${current}${SECTION_SEPARATOR}${section}` : section;
    if (current && candidate.length > chunkSize) {
      chunks.push(current);
      current = section;
    } else {
      current = candidate;
    }
  }
  if (current) chunks.push(current);
  return chunks;
}

export function recipeMetadata(recipe: Recipe): RecipeMetadata {
  return {
    id: recipe.id,
    title: recipe.title,
    cuisine_type: recipe.cuisineType,
    dietary_tags: [...recipe.dietaryTags],
    health_benefits: [...recipe.healthBenefits],
    ingredients: recipe.ingredients.map((ingredient) => ingredient.name.toLowerCase()),
    calories: recipe.nutrition.calories ?? 0,
    protein: recipe.nutrition.protein ?? 0,
    carbohydrates: recipe.nutrition.carbohydrates ?? 0,
    fat: recipe.nutrition.fat ?? 0,
    fiber: recipe.nutrition.fiber ?? 0
  };
}

export function recipeDocuments(recipes: Recipe[], chunkSize: number = 1000): RecipeDocument[] {
  return recipes.flatMap((recipe) => {
    const metadata = recipeMetadata(recipe);
    return recipeChunks(recipe, chunkSize).map((text) => ({ text, metadata }));
  });
}

/**
 * Reads the title back out of an indexed text ("Title: X | ..."). Returns
 * null for texts that do not start with a title section.
 */
export function titleFromText(text: string): string | null {
  if (!text.includes(SECTION_SEPARATOR)) {
    return null;
  }
  const [first] = text.split(SECTION_SEPARATOR);
  if (!first?.startsWith(TITLE_PREFIX)) {
    return null;
  }
  return first.slice(TITLE_PREFIX.length);
}
