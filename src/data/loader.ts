import { existsSync, readFileSync } from "node:fs";
import path from "node:path";
import { z } from "zod";
import type {
  DietaryGuidelines,
  NutrientDatabase,
  Recipe,
  RecipeData
} from "../types/contracts.js";
import { SECTION_SEPARATOR } from "../services/recipeDocuments.js";
import { createChildLogger } from "../utils/logger.js";

const log = createChildLogger({ component: "dataLoader" });

export class DataLoadError extends Error {
  constructor(
    message: string,
    readonly file: string
  ) {
    super(message);
    this.name = "DataLoadError";
  }
}

const nonNegative = z.number().min(0);

const nutritionSchema = z
  .object({
    calories: nonNegative.optional(),
    protein: nonNegative.optional(),
    carbohydrates: nonNegative.optional(),
    fat: nonNegative.optional(),
    fiber: nonNegative.optional(),
    sodium: nonNegative.optional(),
    sugar: nonNegative.optional()
  })
  .default({});

const recipeSchema = z
  .object({
    id: z.union([z.string(), z.number()]).transform(String),
    // titles are read back out of the indexed text, which splits on the separator
    title: z
      .string()
      .min(1)
      .refine((title) => !title.includes(SECTION_SEPARATOR), `Title may not contain "${SECTION_SEPARATOR}"`),
    description: z.string().default(""),
    cuisine_type: z.string().default("Unknown"),
    dietary_tags: z.array(z.string()).default([]),
    health_benefits: z.array(z.string()).default([]),
    ingredients: z
      .array(
        z.object({
          name: z.string(),
          amount: z.union([z.number(), z.string()]).optional(),
          unit: z.string().optional(),
          notes: z.string().optional()
        })
      )
      .default([]),
    instructions: z.array(z.string()).default([]),
    nutritional_info: nutritionSchema,
    prep_time: z.number().optional(),
    cook_time: z.number().optional(),
    servings: z.number().optional(),
    difficulty: z.enum(["easy", "medium", "hard"]).optional(),
    source: z.enum(["static", "dynamic_generation"]).default("static")
  })
  .transform(
    (raw): Recipe => ({
      id: raw.id,
      title: raw.title,
      description: raw.description,
      cuisineType: raw.cuisine_type,
      dietaryTags: raw.dietary_tags,
      healthBenefits: raw.health_benefits,
      ingredients: raw.ingredients,
      instructions: raw.instructions,
      nutrition: raw.nutritional_info,
      prepTime: raw.prep_time,
      cookTime: raw.cook_time,
      servings: raw.servings,
      difficulty: raw.difficulty,
      source: raw.source
    })
  );

const recipesFileSchema = z.array(recipeSchema);

const nutrientsFileSchema = z
  .object({
    ingredients: z
      .record(
        z.object({
          dietary_tags: z.array(z.string()).default([]),
          nutrition: nutritionSchema
        })
      )
      .default({})
  })
  .transform((raw): NutrientDatabase => {
    const database: NutrientDatabase = {};
    for (const [name, record] of Object.entries(raw.ingredients)) {
      database[name.toLowerCase()] = { dietaryTags: record.dietary_tags, nutrition: record.nutrition };
    }
    return database;
  });

const guidelinesFileSchema = z
  .object({
    dietary_restrictions: z
      .record(z.object({ description: z.string().optional(), excluded_ingredients: z.array(z.string()).default([]) }))
      .default({}),
    allergies: z
      .record(z.object({ description: z.string().optional(), incompatible_ingredients: z.array(z.string()).default([]) }))
      .default({}),
    health_conditions: z
      .record(
        z.object({
          description: z.string().optional(),
          recommended_benefits: z.array(z.string()).default([]),
          avoid_nutrients: z.array(z.string()).default([]),
          recommended_nutrients: z.array(z.string()).default([])
        })
      )
      .default({}),
    ingredient_substitutions: z
      .record(
        z.object({
          substitutes: z
            .array(z.object({ name: z.string(), ratio: z.string().optional(), notes: z.string().optional() }))
            .default([])
        })
      )
      .default({})
  })
  .transform(
    (raw): DietaryGuidelines => ({
      dietaryRestrictions: mapValues(raw.dietary_restrictions, (info) => ({
        description: info.description,
        excludedIngredients: info.excluded_ingredients
      })),
      allergies: mapValues(raw.allergies, (info) => ({
        description: info.description,
        incompatibleIngredients: info.incompatible_ingredients
      })),
      healthConditions: mapValues(raw.health_conditions, (info) => ({
        description: info.description,
        recommendedBenefits: info.recommended_benefits,
        avoidNutrients: info.avoid_nutrients,
        recommendedNutrients: info.recommended_nutrients
      })),
      ingredientSubstitutions: mapValues(raw.ingredient_substitutions, (entry) => ({
        substitutes: entry.substitutes
      }))
    })
  );

export const RECIPES_FILE = "recipes.json";
export const NUTRIENTS_FILE = "nutritional_data.json";
export const GUIDELINES_FILE = "dietary_guidelines.json";

export function emptyRecipeData(): RecipeData {
  return {
    recipes: [],
    nutrients: {},
    guidelines: { dietaryRestrictions: {}, allergies: {}, healthConditions: {}, ingredientSubstitutions: {} }
  };
}

export function loadRecipeData(dataDir: string): RecipeData {
  const fallback = emptyRecipeData();
  const data: RecipeData = {
    recipes: readJSON(dataDir, RECIPES_FILE, recipesFileSchema) ?? fallback.recipes,
    nutrients: readJSON(dataDir, NUTRIENTS_FILE, nutrientsFileSchema) ?? fallback.nutrients,
    guidelines: readJSON(dataDir, GUIDELINES_FILE, guidelinesFileSchema) ?? fallback.guidelines
  };

  log.info({
    msg: "Recipe data loaded",
    dataDir,
    recipes: data.recipes.length,
    nutrientRecords: Object.keys(data.nutrients).length,
    restrictions: Object.keys(data.guidelines.dietaryRestrictions).length
  });

  return data;
}

function readJSON<S extends z.ZodTypeAny>(dataDir: string, fileName: string, schema: S): z.output<S> | null {
  const filePath = path.join(dataDir, fileName);
  if (!existsSync(filePath)) {
    log.warn({ msg: "Data file missing, using empty collection", file: filePath });
    return null;
  }

  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(filePath, "utf8"));
  } catch (error) {
    throw new DataLoadError(
      `Failed to read ${fileName}: ${error instanceof Error ? error.message : String(error)}`,
      filePath
    );
  }

  const result = schema.safeParse(raw);
  if (!result.success) {
    const details = result.error.errors.map((issue) => `${issue.path.join(".")}: ${issue.message}`).join("; ");
    throw new DataLoadError(`Invalid ${fileName}: ${details}`, filePath);
  }
  return result.data;
}

function mapValues<T, U>(record: Record<string, T>, map: (value: T) => U): Record<string, U> {
  const mapped: Record<string, U> = {};
  for (const [key, value] of Object.entries(record)) {
    mapped[key] = map(value);
  }
  return mapped;
}
