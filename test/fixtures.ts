import assert from "node:assert/strict";
import type { DietaryGuidelines, NutrientDatabase, Recipe, RecipeData, UserProfile } from "../src/types/contracts.js";

export const guidelines: DietaryGuidelines = {
  dietaryRestrictions: {
    vegetarian: { excludedIngredients: ["chicken", "beef", "fish"] },
    vegan: { excludedIngredients: ["chicken", "beef", "fish", "milk", "eggs", "cheese", "honey"] },
    "gluten-free": { excludedIngredients: ["wheat flour", "pasta", "soy sauce"] }
  },
  allergies: {
    dairy: { incompatibleIngredients: ["milk", "whole milk", "cheese", "butter"] },
    soy: { incompatibleIngredients: ["soy sauce", "tofu", "soy milk"] },
    peanut: { incompatibleIngredients: ["peanut butter"] }
  },
  healthConditions: {
    diabetes: {
      recommendedBenefits: ["diabetes_friendly", "blood_sugar_control"],
      avoidNutrients: ["sugar"],
      recommendedNutrients: ["fiber"]
    },
    heart_disease: {
      recommendedBenefits: ["heart_healthy"],
      avoidNutrients: ["sodium"],
      recommendedNutrients: ["fiber"]
    }
  },
  ingredientSubstitutions: {
    milk: {
      substitutes: [
        { name: "oat milk", ratio: "1:1", notes: "Creamy" },
        { name: "whole milk", ratio: "1:1", notes: "Richer" }
      ]
    },
    butter: { substitutes: [{ name: "olive oil", ratio: "3:4" }] }
  }
};

export const nutrients: NutrientDatabase = {
  milk: { dietaryTags: ["vegetarian"], nutrition: { calories: 50, protein: 3, carbohydrates: 5, fat: 2 } },
  "whole milk": { dietaryTags: ["vegetarian"], nutrition: { calories: 60, protein: 3, carbohydrates: 5, fat: 3 } },
  "oat milk": { dietaryTags: ["vegan", "vegetarian"], nutrition: { calories: 45, protein: 1, carbohydrates: 7, fat: 1.5 } },
  lentils: { dietaryTags: ["vegan"], nutrition: { calories: 116, protein: 9, carbohydrates: 20, fat: 0.4, fiber: 8 } },
  "chicken breast": { dietaryTags: [], nutrition: { calories: 165, protein: 31, fat: 3.6 } },
  spinach: { dietaryTags: ["vegan"], nutrition: { calories: 23, protein: 3, carbohydrates: 4, fiber: 2 } }
};

export function makeRecipe(overrides: Partial<Recipe> & Pick<Recipe, "id" | "title">): Recipe {
  return {
    description: "",
    cuisineType: "Test",
    dietaryTags: [],
    healthBenefits: [],
    ingredients: [],
    instructions: [],
    nutrition: {},
    source: "static",
    ...overrides
  };
}

const withIngredients = (...names: string[]) => names.map((name) => ({ name }));

export const tofuStirFry = makeRecipe({
  id: "r_tofu",
  title: "Tofu Stir Fry",
  description: "Crispy tofu with broccoli in a garlic glaze",
  cuisineType: "Asian",
  dietaryTags: ["vegetarian", "vegan"],
  healthBenefits: ["heart_healthy"],
  ingredients: withIngredients("tofu", "broccoli", "soy sauce", "garlic"),
  instructions: ["Fry the tofu", "Add broccoli and soy sauce"],
  nutrition: { calories: 400, protein: 20, carbohydrates: 45, fat: 14, fiber: 6, sodium: 700 }
});

export const lentilSoup = makeRecipe({
  id: "r_lentil",
  title: "Lentil Soup",
  description: "Hearty lentil soup with spinach and carrots",
  cuisineType: "Mediterranean",
  dietaryTags: ["vegetarian", "vegan", "gluten-free"],
  healthBenefits: ["diabetes_friendly", "heart_healthy"],
  ingredients: withIngredients("lentils", "carrots", "onion", "spinach"),
  instructions: ["Simmer lentils with vegetables", "Stir in spinach"],
  nutrition: { calories: 320, protein: 18, carbohydrates: 48, fat: 6, fiber: 14, sodium: 300 }
});

export const chickenSalad = makeRecipe({
  id: "r_chicken",
  title: "Chicken Salad",
  description: "Grilled chicken breast over crisp lettuce",
  cuisineType: "American",
  dietaryTags: ["gluten-free"],
  ingredients: withIngredients("chicken breast", "lettuce", "olive oil"),
  instructions: ["Grill the chicken", "Slice over lettuce"],
  nutrition: { calories: 350, protein: 35, carbohydrates: 10, fat: 18, fiber: 3, sodium: 400 }
});

export const milkPancakes = makeRecipe({
  id: "r_pancakes",
  title: "Milk Pancakes",
  description: "Fluffy pancakes made with milk and eggs",
  cuisineType: "American",
  dietaryTags: ["vegetarian"],
  ingredients: withIngredients("wheat flour", "milk", "eggs", "sugar"),
  instructions: ["Whisk the batter", "Cook on a griddle"],
  nutrition: { calories: 450, protein: 12, carbohydrates: 70, fat: 12, fiber: 2, sodium: 350, sugar: 20 }
});

export const recipes: Recipe[] = [tofuStirFry, lentilSoup, chickenSalad, milkPancakes];

export function makeData(overrides: Partial<RecipeData> = {}): RecipeData {
  return { recipes, nutrients, guidelines, ...overrides };
}

export function makeProfile(overrides: Partial<UserProfile> = {}): UserProfile {
  return {
    dietaryRestrictions: [],
    allergies: [],
    healthConditions: [],
    preferences: [],
    nutritionalGoals: {},
    ...overrides
  };
}

export function assertClose(actual: number, expected: number, epsilon = 1e-9): void {
  assert.ok(Math.abs(actual - expected) <= epsilon, `expected ${actual} to be within ${epsilon} of ${expected}`);
}
