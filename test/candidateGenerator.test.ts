import test from "node:test";
import assert from "node:assert/strict";
import { defaultRecipeSources, recipeSourcesFromEnv } from "../src/config/recipeSources.js";
import {
  CandidateProvider,
  allowedIngredients,
  deriveHealthBenefits,
  generateCandidates
} from "../src/services/candidateGenerator.js";

const ANIMAL_INGREDIENTS = ["beef", "chicken", "milk", "eggs", "cheese", "butter"];

test("generateCandidates is deterministic for a fixed seed", () => {
  const request = { query: "quick pasta", dietaryRestrictions: ["vegetarian"], count: 4, seed: 42 };
  assert.deepEqual(generateCandidates(request), generateCandidates(request));
});

test("generateCandidates produces the requested number of dynamic recipes", () => {
  const recipes = generateCandidates({ count: 3, seed: 7 });

  assert.deepEqual(
    recipes.map((recipe) => recipe.id),
    ["dynamic_recipe_1", "dynamic_recipe_2", "dynamic_recipe_3"]
  );
  for (const recipe of recipes) {
    assert.equal(recipe.source, "dynamic_generation");
    assert.equal(recipe.instructions.length, Math.min(recipe.ingredients.length + 1, 6));
    assert.ok(recipe.ingredients.length > 0);
  }
  assert.deepEqual(generateCandidates({ count: 0, seed: 7 }), []);
});

test("generated titles carry the first query word", () => {
  const [recipe] = generateCandidates({ query: "spicy curry", count: 1, seed: 3 });
  assert.ok(recipe?.title.includes("Spicy"));
  assert.ok(recipe?.title.endsWith("Style"));
});

test("vegan requests exclude meat and animal products and carry the tag", () => {
  const recipes = generateCandidates({ dietaryRestrictions: ["vegan"], count: 10, seed: 11 });

  for (const recipe of recipes) {
    assert.ok(recipe.dietaryTags.includes("vegan"));
    for (const ingredient of recipe.ingredients) {
      assert.ok(!ANIMAL_INGREDIENTS.includes(ingredient.name), `${recipe.title} contains ${ingredient.name}`);
    }
  }
});

test("keto requests shift energy to fat", () => {
  const recipes = generateCandidates({ dietaryRestrictions: ["keto"], count: 5, seed: 5 });

  for (const recipe of recipes) {
    const calories = recipe.nutrition.calories ?? 0;
    assert.equal(recipe.nutrition.fat, Math.floor((calories * 0.7) / 9));
    assert.equal(recipe.nutrition.carbohydrates, Math.floor((calories * 0.2) / 4));
  }
});

test("health conditions add their dietary tags and benefits", () => {
  const recipes = generateCandidates({ healthConditions: ["diabetes"], count: 3, seed: 9 });

  for (const recipe of recipes) {
    assert.ok(recipe.dietaryTags.includes("diabetes_friendly"));
    assert.ok(recipe.healthBenefits.includes("blood_sugar_control"));
  }
});

test("allergy triggers remove matching ingredients", () => {
  const recipes = generateCandidates(
    { allergies: ["dairy"], count: 10, seed: 13 },
    { allergyTriggers: { dairy: ["milk", "cheese", "butter"] } }
  );

  for (const recipe of recipes) {
    for (const ingredient of recipe.ingredients) {
      assert.ok(!["milk", "cheese", "butter"].includes(ingredient.name));
    }
  }
});

test("allowedIngredients applies restriction and allergy exclusions", () => {
  assert.deepEqual(allowedIngredients("dinner", ["vegetarian"]), ["pasta", "tomatoes", "cheese", "herbs", "wine"]);
  assert.deepEqual(allowedIngredients("breakfast", ["vegan"]), ["flour", "sugar", "vanilla"]);
  assert.deepEqual(allowedIngredients("breakfast", ["gluten-free"]), ["eggs", "milk", "butter", "sugar", "vanilla"]);
  assert.deepEqual(allowedIngredients("breakfast", [], ["milk"]), ["eggs", "flour", "butter", "sugar", "vanilla"]);
});

test("deriveHealthBenefits maps dietary tags to benefits without duplicates", () => {
  assert.deepEqual(deriveHealthBenefits(["vegan", "heart_healthy", "vegetarian"]), [
    "heart_healthy",
    "cholesterol_lowering",
    "plant_based",
    "dairy_free"
  ]);
  assert.deepEqual(deriveHealthBenefits(["keto"]), []);
});

test("CandidateProvider returns nothing when the synthetic source is disabled", () => {
  const provider = new CandidateProvider(recipeSourcesFromEnv(false));
  assert.deepEqual(provider.candidates({ count: 3, seed: 1 }), []);
});

test("CandidateProvider contains generator failures", () => {
  const provider = new CandidateProvider(defaultRecipeSources, {}, () => {
    throw new Error("generator exploded");
  });
  assert.deepEqual(provider.candidates({ count: 3, seed: 1 }), []);
});

test("CandidateProvider caps the generator output at the requested count", () => {
  const provider = new CandidateProvider(defaultRecipeSources, {}, (request) =>
    generateCandidates({ ...request, count: request.count + 5 })
  );
  assert.equal(provider.candidates({ count: 2, seed: 1 }).length, 2);
});

test("CandidateProvider reports source statistics", () => {
  const provider = new CandidateProvider(defaultRecipeSources);

  assert.deepEqual(provider.availableSources(), ["mock_dynamic"]);
  assert.deepEqual(provider.sourceStats(), {
    totalSources: 3,
    enabledSources: 1,
    availableSources: ["mock_dynamic"],
    totalRateLimit: 1000
  });
});
