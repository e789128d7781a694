import test from "node:test";
import assert from "node:assert/strict";
import {
  findConflicts,
  fuzzyIngredientMatch,
  wordBoundaryIngredientMatch
} from "../src/services/ingredientMatcher.js";

test("fuzzyIngredientMatch accepts equality and substrings in either direction", () => {
  assert.equal(fuzzyIngredientMatch("milk", "milk"), true);
  assert.equal(fuzzyIngredientMatch("chicken", "chicken breast"), true);
  assert.equal(fuzzyIngredientMatch("soy sauce", "sauce"), true);
  assert.equal(fuzzyIngredientMatch("Milk", "  MILK "), true);
});

test("fuzzyIngredientMatch matches on partial words", () => {
  assert.equal(fuzzyIngredientMatch("pea", "peanut butter"), true);
  assert.equal(fuzzyIngredientMatch("oil", "boiled eggs"), true);
  assert.equal(fuzzyIngredientMatch("tofu", "broccoli"), false);
});

test("fuzzyIngredientMatch never matches empty input", () => {
  assert.equal(fuzzyIngredientMatch("", "milk"), false);
  assert.equal(fuzzyIngredientMatch("milk", "   "), false);
});

test("wordBoundaryIngredientMatch requires whole words", () => {
  assert.equal(wordBoundaryIngredientMatch("pea", "peanut butter"), false);
  assert.equal(wordBoundaryIngredientMatch("soy sauce", "low sodium soy sauce"), true);
  assert.equal(wordBoundaryIngredientMatch("oil", "olive oil"), true);
});

test("findConflicts lists each matching ingredient once", () => {
  const ingredients = ["tofu", "broccoli", "soy sauce", "garlic"];
  assert.deepEqual(findConflicts(ingredients, ["soy sauce", "tofu", "soy milk"]), ["tofu", "soy sauce"]);
  assert.deepEqual(findConflicts(ingredients, ["shrimp"]), []);
  assert.deepEqual(findConflicts(["peanut butter"], ["pea"], wordBoundaryIngredientMatch), []);
});
