import { benefitTagsFor } from "../config/healthBenefits.js";
import type { DietaryGuidelines, Recipe } from "../types/contracts.js";

const TRACKED_NUTRIENTS = ["calories", "protein", "carbohydrates", "fat", "fiber"] as const;

type TrackedNutrient = (typeof TRACKED_NUTRIENTS)[number];

export type NutrientRange = {
  min: number;
  avg: number;
  max: number;
};

export type Coverage = {
  totalRecipes: number;
  compatibleRecipes: number;
  coveragePercentage: number;
};

export type CorpusStats = {
  totalRecipes: number;
  dietaryRestrictionsCount: number;
  healthConditionsCount: number;
  allergiesCount: number;
  uniqueIngredients: number;
  cuisineTypes: string[];
  dietaryTags: string[];
  healthBenefits: string[];
  nutritionRanges: Record<TrackedNutrient, NutrientRange>;
  restrictionCoverage: Record<string, Coverage>;
  conditionCoverage: Record<string, Coverage>;
};

/**
 * Coverage counts a recipe for a restriction when it carries the restriction
 * tag, and for a condition when it lists any benefit mapped to the condition.
 */
export function computeCorpusStats(recipes: readonly Recipe[], guidelines: DietaryGuidelines): CorpusStats {
  const ingredients = new Set<string>();
  const cuisines = new Set<string>();
  const tags = new Set<string>();
  const benefits = new Set<string>();

  for (const recipe of recipes) {
    recipe.ingredients.forEach((ingredient) => ingredients.add(ingredient.name.toLowerCase()));
    cuisines.add(recipe.cuisineType);
    recipe.dietaryTags.forEach((tag) => tags.add(tag));
    recipe.healthBenefits.forEach((benefit) => benefits.add(benefit));
  }

  const restrictionCoverage: Record<string, Coverage> = {};
  for (const restriction of Object.keys(guidelines.dietaryRestrictions)) {
    restrictionCoverage[restriction] = coverage(recipes, (recipe) => recipe.dietaryTags.includes(restriction));
  }

  const conditionCoverage: Record<string, Coverage> = {};
  for (const condition of Object.keys(guidelines.healthConditions)) {
    const benefits = benefitTagsFor([condition]);
    conditionCoverage[condition] = coverage(recipes, (recipe) =>
      recipe.healthBenefits.some((benefit) => benefits.includes(benefit))
    );
  }

  return {
    totalRecipes: recipes.length,
    dietaryRestrictionsCount: Object.keys(guidelines.dietaryRestrictions).length,
    healthConditionsCount: Object.keys(guidelines.healthConditions).length,
    allergiesCount: Object.keys(guidelines.allergies).length,
    uniqueIngredients: ingredients.size,
    cuisineTypes: [...cuisines].sort(),
    dietaryTags: [...tags].sort(),
    healthBenefits: [...benefits].sort(),
    nutritionRanges: nutritionRanges(recipes),
    restrictionCoverage,
    conditionCoverage
  };
}

function nutritionRanges(recipes: readonly Recipe[]): Record<TrackedNutrient, NutrientRange> {
  const range = (nutrient: TrackedNutrient): NutrientRange => {
    const values = recipes.map((recipe) => recipe.nutrition[nutrient] ?? 0);
    if (values.length === 0) {
      return { min: 0, avg: 0, max: 0 };
    }
    return {
      min: Math.min(...values),
      avg: values.reduce((sum, value) => sum + value, 0) / values.length,
      max: Math.max(...values)
    };
  };

  return {
    calories: range("calories"),
    protein: range("protein"),
    carbohydrates: range("carbohydrates"),
    fat: range("fat"),
    fiber: range("fiber")
  };
}

function coverage(recipes: readonly Recipe[], covers: (recipe: Recipe) => boolean): Coverage {
  const compatibleRecipes = recipes.filter(covers).length;
  return {
    totalRecipes: recipes.length,
    compatibleRecipes,
    coveragePercentage: recipes.length > 0 ? (compatibleRecipes / recipes.length) * 100 : 0
  };
}
