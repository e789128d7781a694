import { SYNTHETIC_SOURCE_KEY, type RecipeSource } from "../config/recipeSources.js";
import type { Nutrition, Recipe, RecipeDifficulty, RecipeIngredient } from "../types/contracts.js";
import { createChildLogger } from "../utils/logger.js";
import { titleCase, uniqueStrings } from "../utils/normalize.js";
import { createRandom, type Random } from "../utils/random.js";
import { fuzzyIngredientMatch } from "./ingredientMatcher.js";

const log = createChildLogger({ component: "candidateGenerator" });

export type MealCategory = "breakfast" | "lunch" | "dinner" | "dessert" | "snack";

const CATEGORY_KEYWORDS: Record<MealCategory, string[]> = {
  breakfast: ["pancakes", "oatmeal", "smoothie", "eggs", "toast"],
  lunch: ["salad", "sandwich", "soup", "pasta", "rice"],
  dinner: ["chicken", "fish", "beef", "vegetarian", "vegan"],
  dessert: ["cake", "cookies", "ice_cream", "pudding", "fruit"],
  snack: ["nuts", "fruit", "yogurt", "chips", "smoothie"]
};

const CATEGORY_INGREDIENTS: Record<MealCategory, string[]> = {
  breakfast: ["eggs", "milk", "flour", "butter", "sugar", "vanilla"],
  lunch: ["chicken", "rice", "vegetables", "olive oil", "garlic", "onion"],
  dinner: ["beef", "pasta", "tomatoes", "cheese", "herbs", "wine"],
  dessert: ["flour", "sugar", "eggs", "butter", "vanilla", "chocolate"],
  snack: ["nuts", "fruits", "yogurt", "honey", "cinnamon", "seeds"]
};

const CALORIE_RANGES: Record<MealCategory, [number, number]> = {
  breakfast: [200, 400],
  lunch: [300, 600],
  dinner: [400, 800],
  dessert: [150, 350],
  snack: [100, 250]
};

const CATEGORIES: MealCategory[] = ["breakfast", "lunch", "dinner", "dessert", "snack"];

const CUISINES = [
  "mediterranean",
  "asian",
  "indian",
  "american",
  "italian",
  "mexican",
  "french",
  "thai",
  "japanese",
  "chinese"
];

const DIETARY_OPTIONS = [
  "vegetarian",
  "vegan",
  "gluten-free",
  "dairy-free",
  "keto",
  "low_sodium",
  "diabetes_friendly",
  "heart_healthy"
];

// Dietary options that a health condition asks for directly.
const CONDITION_TAGS: Record<string, string[]> = {
  diabetes: ["diabetes_friendly"],
  heart_disease: ["heart_healthy"],
  hypertension: ["heart_healthy", "low_sodium"]
};

const MEATS = ["beef", "chicken"];
const ANIMAL_PRODUCTS = ["milk", "eggs", "cheese", "butter"];
const GLUTEN_SOURCES = ["flour", "pasta"];

const UNITS = ["cup", "tbsp", "tsp", "oz", "piece"];
const NOTES = ["", "fresh", "organic", "diced", "chopped"];
const DIFFICULTIES: RecipeDifficulty[] = ["easy", "medium", "hard"];

const GENERIC_STEPS = [
  "Prepare all ingredients as specified",
  "Heat cooking surface to medium temperature",
  "Combine ingredients in the specified order",
  "Cook until desired consistency is reached",
  "Let rest for a few minutes before serving",
  "Garnish and serve immediately"
];

const MAX_INGREDIENTS = 6;

export type CandidateRequest = {
  query?: string;
  dietaryRestrictions?: string[];
  allergies?: string[];
  healthConditions?: string[];
  count: number;
  seed?: number;
};

export type CandidateGeneratorOptions = {
  // allergy key -> ingredients that trigger it
  allergyTriggers?: Record<string, string[]>;
};

/**
 * Builds `count` synthetic recipes. Output depends only on the request and
 * the seed.
 */
export function generateCandidates(request: CandidateRequest, options: CandidateGeneratorOptions = {}): Recipe[] {
  const random = createRandom(request.seed ?? Date.now());
  const restrictions = request.dietaryRestrictions ?? [];
  const conditionTags = uniqueStrings((request.healthConditions ?? []).flatMap((condition) => CONDITION_TAGS[condition] ?? []));
  const allergyTriggers = (request.allergies ?? []).flatMap((allergy) => options.allergyTriggers?.[allergy] ?? []);

  const queryWords = (request.query ?? "").toLowerCase().split(/\s+/).filter((word) => word.length > 0);
  const keywords = queryWords.length > 0 ? queryWords : random.pick(Object.values(CATEGORY_KEYWORDS));

  const recipes: Recipe[] = [];
  for (let i = 0; i < Math.max(0, request.count); i++) {
    const category = random.pick(CATEGORIES);
    recipes.push(
      buildRecipe(random, {
        id: `dynamic_recipe_${i + 1}`,
        category,
        keywords: keywords.slice(0, 3),
        restrictions,
        conditionTags,
        allergyTriggers
      })
    );
  }
  return recipes;
}

type RecipeSeed = {
  id: string;
  category: MealCategory;
  keywords: string[];
  restrictions: string[];
  conditionTags: string[];
  allergyTriggers: string[];
};

function buildRecipe(random: Random, seed: RecipeSeed): Recipe {
  const cuisine = random.pick(CUISINES);

  const available = DIETARY_OPTIONS.filter((option) => !seed.restrictions.includes(option));
  const dietaryTags = uniqueStrings([
    ...random.sample(available, Math.min(2, available.length)),
    ...seed.conditionTags,
    ...seed.restrictions
  ]);

  const ingredients = buildIngredients(random, seed.category, seed.restrictions, seed.allergyTriggers);
  const nutrition = buildNutrition(random, seed.category, seed.restrictions);

  const titleParts = [titleCase(seed.category)];
  const keyword = seed.keywords[0];
  if (keyword) titleParts.push(titleCase(keyword));
  titleParts.push(`${titleCase(cuisine)} Style`);

  return {
    id: seed.id,
    title: titleParts.join(" "),
    description: `A delicious ${seed.category} recipe with ${cuisine} influences`,
    cuisineType: cuisine,
    dietaryTags,
    healthBenefits: deriveHealthBenefits(dietaryTags),
    ingredients,
    instructions: GENERIC_STEPS.slice(0, ingredients.length + 1),
    nutrition,
    prepTime: random.int(10, 45),
    cookTime: random.int(15, 60),
    servings: random.int(2, 6),
    difficulty: random.pick(DIFFICULTIES),
    source: "dynamic_generation"
  };
}

export function allowedIngredients(category: MealCategory, restrictions: string[], allergyTriggers: string[] = []): string[] {
  const vegan = restrictions.includes("vegan");
  const vegetarian = vegan || restrictions.includes("vegetarian");
  const glutenFree = restrictions.includes("gluten-free") || restrictions.includes("gluten_free");

  return CATEGORY_INGREDIENTS[category].filter((ingredient) => {
    if (vegetarian && MEATS.includes(ingredient)) return false;
    if (vegan && ANIMAL_PRODUCTS.includes(ingredient)) return false;
    if (glutenFree && GLUTEN_SOURCES.includes(ingredient)) return false;
    return !allergyTriggers.some((trigger) => fuzzyIngredientMatch(trigger, ingredient));
  });
}

function buildIngredients(
  random: Random,
  category: MealCategory,
  restrictions: string[],
  allergyTriggers: string[]
): RecipeIngredient[] {
  return allowedIngredients(category, restrictions, allergyTriggers)
    .slice(0, MAX_INGREDIENTS)
    .map((name) => ({
      name,
      amount: random.int(1, 4),
      unit: random.pick(UNITS),
      notes: random.pick(NOTES)
    }));
}

/**
 * Back-computes grams from a calorie draw: 4 kcal/g for protein and carbs,
 * 9 kcal/g for fat. Keto shifts most energy to fat.
 */
function buildNutrition(random: Random, category: MealCategory, restrictions: string[]): Nutrition {
  const [minCalories, maxCalories] = CALORIE_RANGES[category];
  const calories = random.int(minCalories, maxCalories);

  const keto = restrictions.includes("keto");
  const proteinRatio = restrictions.includes("vegetarian") ? 0.1 : 0.15;
  const carbRatio = keto ? 0.2 : 0.55;
  const fatRatio = keto ? 0.7 : 0.3;

  return {
    calories,
    protein: Math.floor((calories * proteinRatio) / 4),
    carbohydrates: Math.floor((calories * carbRatio) / 4),
    fat: Math.floor((calories * fatRatio) / 9),
    fiber: random.int(2, 8),
    sodium: random.int(200, 800),
    sugar: random.int(5, 25)
  };
}

export function deriveHealthBenefits(dietaryTags: string[]): string[] {
  const benefits: string[] = [];
  if (dietaryTags.includes("diabetes_friendly")) benefits.push("diabetes_friendly", "blood_sugar_control");
  if (dietaryTags.includes("heart_healthy")) benefits.push("heart_healthy", "cholesterol_lowering");
  if (dietaryTags.includes("vegetarian")) benefits.push("plant_based");
  if (dietaryTags.includes("vegan")) benefits.push("plant_based", "dairy_free");
  return uniqueStrings(benefits);
}

export type CandidateSourceStats = {
  totalSources: number;
  enabledSources: number;
  availableSources: string[];
  totalRateLimit: number;
};

type GenerateFn = (request: CandidateRequest, options: CandidateGeneratorOptions) => Recipe[];

/**
 * Boundary between the pipeline and candidate sources. A failing source
 * yields no candidates instead of failing the request.
 */
export class CandidateProvider {
  constructor(
    private readonly sources: RecipeSource[],
    private readonly options: CandidateGeneratorOptions = {},
    private readonly generate: GenerateFn = generateCandidates
  ) {}

  candidates(request: CandidateRequest): Recipe[] {
    if (!this.isEnabled(SYNTHETIC_SOURCE_KEY)) {
      return [];
    }

    try {
      return this.generate(request, this.options).slice(0, Math.max(0, request.count));
    } catch (error) {
      log.warn({
        msg: "Candidate generation failed",
        source: SYNTHETIC_SOURCE_KEY,
        error: error instanceof Error ? error.message : String(error)
      });
      return [];
    }
  }

  availableSources(): string[] {
    return this.sources.filter((source) => source.enabled).map((source) => source.key);
  }

  sourceStats(): CandidateSourceStats {
    const enabled = this.sources.filter((source) => source.enabled);
    return {
      totalSources: this.sources.length,
      enabledSources: enabled.length,
      availableSources: enabled.map((source) => source.key),
      totalRateLimit: enabled.reduce((sum, source) => sum + source.rateLimitPerHour, 0)
    };
  }

  private isEnabled(key: string): boolean {
    return this.sources.some((source) => source.key === key && source.enabled);
  }
}
