import type {
  AllergyCheck,
  CompatibilityResult,
  DietaryGuidelines,
  DimensionResult,
  HealthCheck,
  Nutrition,
  NutrientName,
  Recipe,
  RestrictionCheck,
  UserProfile
} from "../types/contracts.js";
import { clamp, mean } from "../utils/normalize.js";
import { findConflicts, fuzzyIngredientMatch, type IngredientMatcher } from "./ingredientMatcher.js";

const RESTRICTION_WEIGHT = 0.4;
const ALLERGY_WEIGHT = 0.4;
const HEALTH_WEIGHT = 0.2;
const BENEFIT_WEIGHT = 0.6;
const NUTRIENT_WEIGHT = 0.4;
const AVOID_NUTRIENT_PENALTY = 0.2;
const RECOMMENDED_NUTRIENT_BONUS = 0.1;

export const COMPATIBLE_THRESHOLD = 0.7;
const HEALTH_COMPATIBLE_THRESHOLD = 0.6;

export type RankedCompatibility = {
  recipe: Recipe;
  compatibility: CompatibilityResult;
};

export class CompatibilityAnalyzer {
  constructor(
    private readonly guidelines: DietaryGuidelines,
    private readonly matcher: IngredientMatcher = fuzzyIngredientMatch
  ) {}

  analyze(
    recipe: Recipe,
    restrictions: string[] = [],
    allergies: string[] = [],
    healthConditions: string[] = []
  ): CompatibilityResult {
    const restriction = this.checkRestrictions(recipe, restrictions);
    const allergy = this.checkAllergies(recipe, allergies);
    const health = this.checkHealthConditions(recipe, healthConditions);
    const overallScore = fuseCompatibility(restriction.score, allergy.score, health.score);

    return {
      overallCompatible: overallScore >= COMPATIBLE_THRESHOLD,
      overallScore,
      restriction,
      allergy,
      health,
      issues: identifyIssues(restriction, allergy, health),
      suggestions: buildSuggestions(restriction, allergy, health)
    };
  }

  compatibleRecipes(
    recipes: Recipe[],
    profile: Pick<UserProfile, "dietaryRestrictions" | "allergies" | "healthConditions">,
    minScore: number = COMPATIBLE_THRESHOLD
  ): RankedCompatibility[] {
    return recipes
      .map((recipe) => ({
        recipe,
        compatibility: this.analyze(recipe, profile.dietaryRestrictions, profile.allergies, profile.healthConditions)
      }))
      .filter((item) => item.compatibility.overallScore >= minScore)
      .sort((left, right) => right.compatibility.overallScore - left.compatibility.overallScore);
  }

  private checkRestrictions(recipe: Recipe, restrictions: string[]): DimensionResult<RestrictionCheck> {
    const ingredients = ingredientNames(recipe);
    const results: Record<string, RestrictionCheck> = {};

    for (const restriction of restrictions) {
      const excludedIngredients = this.guidelines.dietaryRestrictions[restriction]?.excludedIngredients ?? [];
      const hasRestrictionTag = recipe.dietaryTags.includes(restriction);
      const conflictingIngredients = findConflicts(ingredients, excludedIngredients, this.matcher);

      let score = 1;
      if (conflictingIngredients.length > 0) {
        score = 0;
      } else if (!hasRestrictionTag) {
        score = 0.5;
      }

      results[restriction] = {
        compatible: hasRestrictionTag && conflictingIngredients.length === 0,
        score,
        hasRestrictionTag,
        conflictingIngredients,
        excludedIngredients
      };
    }

    return summarize(results, COMPATIBLE_THRESHOLD);
  }

  private checkAllergies(recipe: Recipe, allergies: string[]): DimensionResult<AllergyCheck> {
    const ingredients = ingredientNames(recipe);
    const results: Record<string, AllergyCheck> = {};

    for (const allergy of allergies) {
      const incompatibleIngredients = this.guidelines.allergies[allergy]?.incompatibleIngredients ?? [];
      const conflictingIngredients = findConflicts(ingredients, incompatibleIngredients, this.matcher);
      const compatible = conflictingIngredients.length === 0;

      results[allergy] = {
        compatible,
        score: compatible ? 1 : 0,
        conflictingIngredients,
        incompatibleIngredients
      };
    }

    return summarize(results, COMPATIBLE_THRESHOLD);
  }

  private checkHealthConditions(recipe: Recipe, conditions: string[]): DimensionResult<HealthCheck> {
    const results: Record<string, HealthCheck> = {};

    for (const condition of conditions) {
      const info = this.guidelines.healthConditions[condition];
      const recommendedBenefits = info?.recommendedBenefits ?? [];
      const avoidNutrients = info?.avoidNutrients ?? [];
      const recommendedNutrients = info?.recommendedNutrients ?? [];

      const hasRecommendedBenefits = recommendedBenefits.some((benefit) => recipe.healthBenefits.includes(benefit));
      const nutritionalScore = nutrientContentScore(recipe.nutrition, recommendedNutrients, avoidNutrients);
      const score = (hasRecommendedBenefits ? BENEFIT_WEIGHT : 0) + nutritionalScore * NUTRIENT_WEIGHT;

      results[condition] = {
        compatible: score >= HEALTH_COMPATIBLE_THRESHOLD,
        score,
        hasRecommendedBenefits,
        nutritionalScore,
        recommendedBenefits,
        avoidNutrients,
        recommendedNutrients
      };
    }

    return summarize(results, HEALTH_COMPATIBLE_THRESHOLD);
  }
}

export function fuseCompatibility(restrictionScore: number, allergyScore: number, healthScore: number): number {
  if (allergyScore === 0 || restrictionScore === 0) {
    return 0;
  }
  const fused = restrictionScore * RESTRICTION_WEIGHT + allergyScore * ALLERGY_WEIGHT + healthScore * HEALTH_WEIGHT;
  return clamp(fused, 0, 1);
}

export function nutrientContentScore(
  nutrition: Nutrition,
  recommendedNutrients: string[],
  avoidNutrients: string[]
): number {
  let score = 1;
  for (const nutrient of avoidNutrients) {
    if (nutrientValue(nutrition, nutrient) > 0) {
      score -= AVOID_NUTRIENT_PENALTY;
    }
  }
  for (const nutrient of recommendedNutrients) {
    if (nutrientValue(nutrition, nutrient) > 0) {
      score += RECOMMENDED_NUTRIENT_BONUS;
    }
  }
  return clamp(score, 0, 1);
}

export function nutrientValue(nutrition: Nutrition, nutrient: string): number {
  return isNutrientName(nutrient) ? nutrition[nutrient] ?? 0 : 0;
}

const NUTRIENT_NAMES: readonly NutrientName[] = [
  "calories",
  "protein",
  "carbohydrates",
  "fat",
  "fiber",
  "sodium",
  "sugar"
];

export function isNutrientName(value: string): value is NutrientName {
  return NUTRIENT_NAMES.some((name) => name === value);
}

function ingredientNames(recipe: Recipe): string[] {
  return recipe.ingredients.map((ingredient) => ingredient.name.toLowerCase());
}

function summarize<T extends { score: number }>(results: Record<string, T>, threshold: number): DimensionResult<T> {
  const score = mean(Object.values(results).map((result) => result.score), 1);
  return { compatible: score >= threshold, score, results };
}

function identifyIssues(
  restriction: DimensionResult<RestrictionCheck>,
  allergy: DimensionResult<AllergyCheck>,
  health: DimensionResult<HealthCheck>
): string[] {
  const issues: string[] = [];

  for (const [key, result] of Object.entries(restriction.results)) {
    if (result.compatible) continue;
    if (result.conflictingIngredients.length > 0) {
      issues.push(`Contains ingredients incompatible with ${key}: ${result.conflictingIngredients.join(", ")}`);
    } else if (!result.hasRestrictionTag) {
      issues.push(`Not tagged as ${key}`);
    }
  }

  for (const [key, result] of Object.entries(allergy.results)) {
    if (!result.compatible && result.conflictingIngredients.length > 0) {
      issues.push(`Contains ingredients that may cause ${key} reaction: ${result.conflictingIngredients.join(", ")}`);
    }
  }

  for (const [key, result] of Object.entries(health.results)) {
    if (result.compatible) continue;
    if (!result.hasRecommendedBenefits) {
      const missing = result.recommendedBenefits.length > 0 ? ` (missing: ${result.recommendedBenefits.join(", ")})` : "";
      issues.push(`Not optimized for ${key}${missing}`);
    }
    if (result.nutritionalScore < 0.5) {
      issues.push(`Nutritional content not ideal for ${key}`);
    }
  }

  return issues;
}

function buildSuggestions(
  restriction: DimensionResult<RestrictionCheck>,
  allergy: DimensionResult<AllergyCheck>,
  health: DimensionResult<HealthCheck>
): string[] {
  const suggestions: string[] = [];

  for (const [key, result] of Object.entries(restriction.results)) {
    if (result.compatible) continue;
    if (result.conflictingIngredients.length > 0) {
      suggestions.push(`Consider substituting ${result.conflictingIngredients.join(", ")} for ${key}-friendly alternatives`);
    } else if (!result.hasRestrictionTag) {
      suggestions.push(`Recipe may be compatible with ${key} but not explicitly tagged`);
    }
  }

  for (const [key, result] of Object.entries(allergy.results)) {
    if (!result.compatible && result.conflictingIngredients.length > 0) {
      suggestions.push(`Substitute ${result.conflictingIngredients.join(", ")} to avoid ${key} triggers`);
    }
  }

  for (const [key, result] of Object.entries(health.results)) {
    if (result.compatible) continue;
    if (!result.hasRecommendedBenefits) {
      suggestions.push(`Consider adding ingredients beneficial for ${key}`);
    }
    if (result.nutritionalScore < 0.5) {
      suggestions.push(`Adjust portion size or ingredients for better ${key} management`);
    }
  }

  return suggestions;
}
