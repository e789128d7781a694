import { z } from "zod";

const keyList = z.array(z.string().trim().min(1)).default([]);

export const searchBodySchema = z.object({
  query: z.string().trim().min(1).max(500),
  dietaryRestrictions: keyList,
  allergies: keyList,
  healthConditions: keyList,
  nResults: z.number().int().min(1).max(50).default(5),
  includeDynamic: z.boolean().default(true),
  seed: z.number().int().optional()
});

export const profileSchema = z.object({
  dietaryRestrictions: keyList,
  allergies: keyList,
  healthConditions: keyList,
  preferences: keyList,
  nutritionalGoals: z.record(z.union([z.number().min(0), z.boolean()])).default({})
});

export const recommendBodySchema = z.object({
  profile: profileSchema,
  nRecommendations: z.number().int().min(1).max(25).default(5),
  includeDynamic: z.boolean().default(true),
  seed: z.number().int().optional()
});

export const compatibilityBodySchema = z.object({
  recipeId: z.string().min(1),
  dietaryRestrictions: keyList,
  allergies: keyList,
  healthConditions: keyList
});

export const nutritionAnalysisBodySchema = z.object({
  profile: profileSchema
});

// "a,b" -> ["a", "b"]; repeated query keys are merged
const csvParam = z
  .union([z.string(), z.array(z.string())])
  .optional()
  .transform((value) =>
    (Array.isArray(value) ? value : value === undefined ? [] : [value])
      .flatMap((item) => item.split(","))
      .map((item) => item.trim())
      .filter((item) => item.length > 0)
  );

export const substitutionQuerySchema = z.object({
  restrictions: csvParam,
  allergies: csvParam
});

export const ingredientParamsSchema = z.object({
  name: z.string().trim().min(1).max(100)
});
