import type {
  DietaryGuidelines,
  IngredientNutrientRecord,
  NutrientBoostSuggestion,
  NutrientDatabase,
  NutrientReductionSuggestion,
  Nutrition,
  NutritionOptimization,
  NutritionalGoals,
  NutrientAnalysis,
  OptimizationSuggestion,
  Recipe,
  SubstituteInfo,
  SubstitutionOption
} from "../types/contracts.js";
import { clamp, mean } from "../utils/normalize.js";
import { nutrientValue } from "./compatibilityAnalyzer.js";
import { normalizeIngredient } from "./ingredientNormalizer.js";

const COMPATIBILITY_WEIGHT = 0.7;
const SIMILARITY_WEIGHT = 0.3;
const FALLBACK_MIN_COMPATIBILITY = 0.5;
const FALLBACK_MIN_SIMILARITY = 0.3;
const BOOST_MIN_COMPATIBILITY = 0.7;
const SIGNIFICANT_DIFFERENCE = 0.1;
const MAX_SUGGESTIONS_PER_NUTRIENT = 3;
const SUBSTITUTIONS_PER_INGREDIENT = 2;

const SIMILARITY_NUTRIENTS = ["calories", "protein", "carbohydrates", "fat", "fiber"] as const;

export class SubstitutionEngine {
  constructor(
    private readonly guidelines: DietaryGuidelines,
    private readonly nutrients: NutrientDatabase
  ) {}

  findSubstitutions(ingredient: string, restrictions: string[] = [], allergies: string[] = []): SubstitutionOption[] {
    const normalized = normalizeIngredient(ingredient).name;
    const originalNutrition = this.nutritionOf(normalized);
    const options: SubstitutionOption[] = [];
    const seen = new Set<string>();

    for (const substitute of this.guidelines.ingredientSubstitutions[normalized]?.substitutes ?? []) {
      options.push(this.buildOption(ingredient, substitute, originalNutrition, restrictions, allergies));
      seen.add(substitute.name.toLowerCase());
    }

    for (const [candidate, record] of Object.entries(this.nutrients)) {
      const key = candidate.toLowerCase();
      if (key === normalized || seen.has(key)) continue;

      const compatibilityScore = this.substituteCompatibility(candidate, restrictions, allergies);
      if (compatibilityScore <= FALLBACK_MIN_COMPATIBILITY) continue;

      const nutritionalSimilarity = nutritionalSimilarityOf(originalNutrition, record.nutrition);
      if (nutritionalSimilarity <= FALLBACK_MIN_SIMILARITY) continue;

      options.push({
        originalIngredient: ingredient,
        substituteName: candidate,
        ratio: "1:1",
        notes: "Nutritionally similar alternative",
        compatibilityScore,
        nutritionalSimilarity,
        overallScore: fuseSubstitutionScore(compatibilityScore, nutritionalSimilarity)
      });
    }

    return options.sort((left, right) => right.overallScore - left.overallScore);
  }

  /**
   * Starts from 1, loses 0.5 per restriction that excludes the substitute and
   * gains 0.2 per restriction tag it carries. Any allergy listing it scores 0.
   */
  substituteCompatibility(substitute: string, restrictions: string[] = [], allergies: string[] = []): number {
    if (restrictions.length === 0 && allergies.length === 0) {
      return 1;
    }

    const name = substitute.toLowerCase();
    const tags = this.lookup(name)?.dietaryTags ?? [];
    let score = 1;

    for (const restriction of restrictions) {
      const excluded = this.guidelines.dietaryRestrictions[restriction]?.excludedIngredients ?? [];
      if (excluded.some((item) => item.toLowerCase() === name)) {
        score -= 0.5;
      } else if (tags.includes(restriction)) {
        score += 0.2;
      }
    }

    for (const allergy of allergies) {
      const incompatible = this.guidelines.allergies[allergy]?.incompatibleIngredients ?? [];
      if (incompatible.some((item) => item.toLowerCase() === name)) {
        return 0;
      }
    }

    return clamp(score, 0, 1);
  }

  optimizeNutrition(
    recipe: Recipe,
    goals: NutritionalGoals,
    restrictions: string[] = [],
    allergies: string[] = []
  ): NutritionOptimization {
    const targets = numericGoals(goals);
    const suggestions: OptimizationSuggestion[] = [];
    const nutrientAnalysis: Record<string, NutrientAnalysis> = {};

    for (const [nutrient, target] of Object.entries(targets)) {
      const current = nutrientValue(recipe.nutrition, nutrient);
      const difference = target - current;
      if (Math.abs(difference) <= SIGNIFICANT_DIFFERENCE) continue;

      const found =
        difference > 0
          ? this.boostSuggestions(nutrient, restrictions, allergies)
          : this.reductionSuggestions(recipe, nutrient, restrictions, allergies);
      suggestions.push(...found);

      nutrientAnalysis[nutrient] = {
        current,
        target,
        difference,
        suggestionsCount: found.length
      };
    }

    return {
      optimizationScore: optimizationScore(recipe.nutrition, targets),
      suggestions,
      nutrientAnalysis,
      currentNutrition: recipe.nutrition,
      targetNutrition: targets
    };
  }

  private boostSuggestions(nutrient: string, restrictions: string[], allergies: string[]): NutrientBoostSuggestion[] {
    const suggestions: NutrientBoostSuggestion[] = [];

    for (const [ingredient, record] of Object.entries(this.nutrients)) {
      const value = nutrientValue(record.nutrition, nutrient);
      if (value <= 0) continue;

      const compatibilityScore = this.substituteCompatibility(ingredient, restrictions, allergies);
      if (compatibilityScore <= BOOST_MIN_COMPATIBILITY) continue;

      suggestions.push({
        type: "add_ingredient",
        ingredient,
        nutrient,
        nutrientValue: value,
        compatibilityScore,
        suggestion: `Add ${ingredient} to boost ${nutrient}`
      });
    }

    return suggestions
      .sort((left, right) => right.nutrientValue - left.nutrientValue)
      .slice(0, MAX_SUGGESTIONS_PER_NUTRIENT);
  }

  private reductionSuggestions(
    recipe: Recipe,
    nutrient: string,
    restrictions: string[],
    allergies: string[]
  ): NutrientReductionSuggestion[] {
    const suggestions: NutrientReductionSuggestion[] = [];

    for (const { name } of recipe.ingredients) {
      const value = nutrientValue(this.nutritionOf(name.toLowerCase()) ?? {}, nutrient);
      if (value <= 0) continue;

      const substitutions = this.findSubstitutions(name, restrictions, allergies).slice(0, SUBSTITUTIONS_PER_INGREDIENT);
      for (const substitution of substitutions) {
        const substituteValue = nutrientValue(this.nutritionOf(substitution.substituteName.toLowerCase()) ?? {}, nutrient);
        if (substituteValue >= value) continue;

        suggestions.push({
          type: "substitute_ingredient",
          originalIngredient: name,
          substituteIngredient: substitution.substituteName,
          nutrient,
          reduction: value - substituteValue,
          compatibilityScore: substitution.compatibilityScore,
          suggestion: `Substitute ${name} with ${substitution.substituteName} to reduce ${nutrient}`
        });
      }
    }

    return suggestions
      .sort((left, right) => right.reduction - left.reduction)
      .slice(0, MAX_SUGGESTIONS_PER_NUTRIENT);
  }

  private buildOption(
    originalIngredient: string,
    substitute: SubstituteInfo,
    originalNutrition: Nutrition | undefined,
    restrictions: string[],
    allergies: string[]
  ): SubstitutionOption {
    const compatibilityScore = this.substituteCompatibility(substitute.name, restrictions, allergies);
    const nutritionalSimilarity = nutritionalSimilarityOf(
      originalNutrition,
      this.nutritionOf(substitute.name.toLowerCase())
    );

    return {
      originalIngredient,
      substituteName: substitute.name,
      ratio: substitute.ratio ?? "1:1",
      notes: substitute.notes ?? "",
      compatibilityScore,
      nutritionalSimilarity,
      overallScore: fuseSubstitutionScore(compatibilityScore, nutritionalSimilarity)
    };
  }

  private lookup(name: string): IngredientNutrientRecord | undefined {
    return this.nutrients[name] ?? Object.entries(this.nutrients).find(([key]) => key.toLowerCase() === name)?.[1];
  }

  private nutritionOf(name: string): Nutrition | undefined {
    return this.lookup(name)?.nutrition;
  }
}

export function fuseSubstitutionScore(compatibilityScore: number, nutritionalSimilarity: number): number {
  return compatibilityScore * COMPATIBILITY_WEIGHT + nutritionalSimilarity * SIMILARITY_WEIGHT;
}

export function nutritionalSimilarityOf(left: Nutrition | undefined, right: Nutrition | undefined): number {
  if (!left || !right) return 0;

  const similarities: number[] = [];
  for (const nutrient of SIMILARITY_NUTRIENTS) {
    const a = left[nutrient] ?? 0;
    const b = right[nutrient] ?? 0;
    if (a > 0 && b > 0) {
      similarities.push(1 - Math.abs(a - b) / Math.max(a, b));
    }
  }
  return mean(similarities, 0);
}

/**
 * Per target: at least 80% of it scores 1, at least 50% scores 0.7, anything
 * less 0.3. Targets of 0 or below are not tracked.
 */
export function optimizationScore(current: Nutrition, targets: Record<string, number>): number {
  const scores: number[] = [];
  for (const [nutrient, target] of Object.entries(targets)) {
    if (target <= 0) continue;
    const value = nutrientValue(current, nutrient);
    if (value >= target * 0.8) {
      scores.push(1);
    } else if (value >= target * 0.5) {
      scores.push(0.7);
    } else {
      scores.push(0.3);
    }
  }
  return mean(scores, 1);
}

export function numericGoals(goals: NutritionalGoals): Record<string, number> {
  const targets: Record<string, number> = {};
  for (const [nutrient, value] of Object.entries(goals)) {
    if (typeof value === "number" && Number.isFinite(value)) {
      targets[nutrient] = value;
    }
  }
  return targets;
}
