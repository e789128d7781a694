import test from "node:test";
import assert from "node:assert/strict";
import { recipeSourcesFromEnv } from "../src/config/recipeSources.js";
import { emptyRecipeData } from "../src/data/loader.js";
import { CandidateProvider } from "../src/services/candidateGenerator.js";
import { recipeText } from "../src/services/recipeDocuments.js";
import { RecipeRecommender, buildProfileQuery, dedupeByTitle } from "../src/services/recommendation.js";
import { assertClose, lentilSoup, makeData, makeProfile, milkPancakes } from "./fixtures.js";

const staticOnly = () => new CandidateProvider(recipeSourcesFromEnv(false));

const recommender = new RecipeRecommender(makeData(), {
  embeddingDimension: 500,
  candidateProvider: staticOnly()
});

test("search ranks the closest recipe first", () => {
  const response = recommender.search({ query: "lentil soup spinach", nResults: 4, includeDynamic: false });

  assert.equal(response.results[0]?.recipe.id, "r_lentil");
  assert.equal(response.results[0]?.compatibility.overallScore, 1);
  assert.equal(response.totalFound, 4);
  assert.equal(response.dynamicRecipesIncluded, false);
  assert.ok(response.results.every((result) => result.recipe.source === "static"));
});

test("search scores blend search distance with compatibility", () => {
  const { results } = recommender.search({ query: "lentil soup spinach", nResults: 4, includeDynamic: false });

  for (const result of results) {
    assertClose(result.overallScore, 0.6 * result.searchScore + 0.4 * result.compatibility.overallScore);
  }
  // the farthest hit is the reference distance
  assert.equal(results.at(-1)?.searchScore, 0);
});

test("an exact-text query keeps every score within [0, 1]", () => {
  const { results } = recommender.search({ query: recipeText(milkPancakes), nResults: 4, includeDynamic: false });

  assert.equal(results[0]?.recipe.id, "r_pancakes");
  assertClose(results[0]?.searchScore ?? 0, 1);
  for (const result of results) {
    assert.ok(result.distance >= 0, `distance ${result.distance}`);
    assert.ok(result.searchScore >= 0 && result.searchScore <= 1, `searchScore ${result.searchScore}`);
    assert.ok(result.overallScore >= 0 && result.overallScore <= 1, `overallScore ${result.overallScore}`);
  }
});

test("search drops recipes containing allergy triggers", () => {
  const response = recommender.search({ query: "tofu stir fry", allergies: ["soy"], includeDynamic: false });

  assert.ok(!response.results.some((result) => result.recipe.id === "r_tofu"));
  assert.equal(response.totalFound, 3);
  assert.deepEqual(response.filtersApplied, { dietaryRestrictions: [], allergies: ["soy"], healthConditions: [] });
});

test("search keeps only recipes tagged with a requested restriction", () => {
  const response = recommender.search({ query: "dinner", dietaryRestrictions: ["vegan"], includeDynamic: false });

  assert.deepEqual(response.results.map((result) => result.recipe.id).sort(), ["r_lentil", "r_tofu"]);
});

test("search keeps only recipes with a benefit for the health condition", () => {
  const response = recommender.search({ query: "soup", healthConditions: ["diabetes"], includeDynamic: false });

  assert.deepEqual(
    response.results.map((result) => result.recipe.id),
    ["r_lentil"]
  );
});

test("search returns each title once", () => {
  const duplicated = new RecipeRecommender(
    makeData({ recipes: [lentilSoup, { ...lentilSoup, id: "r_lentil_copy" }] }),
    { candidateProvider: staticOnly() }
  );

  const response = duplicated.search({ query: "lentil soup", includeDynamic: false });

  assert.equal(response.results.length, 1);
  assert.equal(response.results[0]?.recipe.id, "r_lentil");
});

test("search mixes in generated recipes and stays bounded", () => {
  const mixed = new RecipeRecommender(makeData());
  const response = mixed.search({ query: "healthy lunch", nResults: 3, seed: 7 });
  const titles = response.results.map((result) => result.recipe.title);

  assert.equal(response.results.length, 3);
  assert.equal(new Set(titles).size, titles.length);
  assert.equal(response.dynamicRecipesIncluded, true);
  assert.ok(response.totalFound >= 4);
  assert.ok(response.results.length <= response.totalFound);
});

test("search is repeatable for a fixed seed", () => {
  const mixed = new RecipeRecommender(makeData());
  const request = { query: "quick breakfast", nResults: 6, seed: 42 };

  assert.deepEqual(mixed.search(request), mixed.search(request));
});

test("generated results use the fixed search score and discounted compatibility", () => {
  const generatedOnly = new RecipeRecommender(emptyRecipeData());
  const response = generatedOnly.search({ query: "pasta", nResults: 2, seed: 3 });

  assert.ok(response.results.length > 0);
  for (const result of response.results) {
    assert.equal(result.recipe.source, "dynamic_generation");
    assert.equal(result.searchScore, 0.8);
    assert.equal(result.distance, 0.2);
    assertClose(result.overallScore, result.compatibility.overallScore * 0.8);
  }
});

test("an empty corpus without generation yields no results", () => {
  const empty = new RecipeRecommender(emptyRecipeData(), { candidateProvider: staticOnly() });
  const response = empty.search({ query: "anything" });

  assert.deepEqual(response.results, []);
  assert.equal(response.totalFound, 0);
});

test("buildProfileQuery joins preferences and goal flags", () => {
  assert.equal(buildProfileQuery(makeProfile()), "healthy recipe");
  assert.equal(
    buildProfileQuery(
      makeProfile({ preferences: ["lentil", "soup"], nutritionalGoals: { high_protein: true, low_fat: false, protein: 30 } })
    ),
    "lentil soup high protein"
  );
});

test("dedupeByTitle keeps the first occurrence", () => {
  const { results } = recommender.search({ query: "soup", nResults: 4, includeDynamic: false });
  const first = results[0];
  assert.ok(first);

  assert.deepEqual(dedupeByTitle([first, { ...first, overallScore: 0 }]), [first]);
});

test("recommend attaches a nutrition optimization when numeric goals are set", () => {
  const profile = makeProfile({ preferences: ["lentil"], nutritionalGoals: { high_protein: true, protein: 30 } });
  const response = recommender.recommend(profile, { nRecommendations: 2, includeDynamic: false });

  assert.equal(response.searchQuery, "lentil high protein");
  assert.equal(response.recommendations.length, 2);
  assert.equal(response.recommendations[0]?.recipe.id, "r_lentil");
  for (const recommendation of response.recommendations) {
    assert.deepEqual(recommendation.nutritionOptimization?.targetNutrition, { protein: 30 });
  }
});

test("recommend leaves out the optimization without numeric goals", () => {
  const response = recommender.recommend(makeProfile({ nutritionalGoals: { low_carb: true } }), {
    nRecommendations: 3,
    includeDynamic: false
  });

  assert.equal(response.searchQuery, "low carb");
  assert.equal(response.recommendations.length, 3);
  assert.ok(response.recommendations.every((recommendation) => recommendation.nutritionOptimization === undefined));
});

test("substitute wraps the ranked options", () => {
  const response = recommender.substitute("milk", [], ["dairy"]);

  assert.equal(response.originalIngredient, "milk");
  assert.equal(response.totalOptions, response.substitutions.length);
  assert.deepEqual(response.filtersApplied, { dietaryRestrictions: [], allergies: ["dairy"] });
  assert.ok(response.substitutions.some((option) => option.substituteName === "oat milk"));
});

test("nutritionAnalysis averages the compatible recipes", () => {
  const analysis = recommender.nutritionAnalysis(
    makeProfile({ dietaryRestrictions: ["vegetarian"], nutritionalGoals: { calories: 400, protein: 15 } })
  );

  assert.equal(analysis.compatibleCount, 3);
  assert.equal(analysis.incompatibleCount, 1);
  assert.equal(analysis.compatibilityRate, 0.75);
  assert.equal(analysis.averages.calories, 390);
  assertClose(analysis.averages.protein, 50 / 3);
  assert.deepEqual(
    analysis.goalChecks.map((check) => [check.nutrient, check.met]),
    [
      ["calories", true],
      ["protein", true]
    ]
  );
  assert.deepEqual(
    analysis.topRecipes.map((row) => row.title),
    ["Tofu Stir Fry", "Lentil Soup", "Milk Pancakes"]
  );
});

test("stats combine corpus, index and source figures", () => {
  const stats = recommender.stats();

  assert.equal(stats.totalRecipes, 4);
  assert.equal(stats.index.totalDocuments, 4);
  assert.equal(stats.embedder.embeddingDimension, 500);
  assert.equal(stats.sources.enabledSources, 0);
  assert.deepEqual(stats.sources.availableSources, []);
});
