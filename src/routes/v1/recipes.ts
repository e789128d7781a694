import { Router } from "express";
import { NotFoundError } from "../../middleware/error.js";
import type { RecipeRecommender } from "../../services/recommendation.js";
import { compatibilityBodySchema, recommendBodySchema, searchBodySchema } from "./schemas.js";

export function createRecipesRouter(recommender: RecipeRecommender): Router {
  const router = Router();

  router.post("/recipes/search", (req, res) => {
    const body = searchBodySchema.parse(req.body);
    res.json(recommender.search(body));
  });

  router.post("/recipes/recommend", (req, res) => {
    const { profile, ...options } = recommendBodySchema.parse(req.body);
    res.json(recommender.recommend(profile, options));
  });

  router.post("/recipes/compatibility", (req, res) => {
    const body = compatibilityBodySchema.parse(req.body);
    const recipe = recommender.recipeById(body.recipeId);
    if (!recipe) {
      throw new NotFoundError(`Recipe ${body.recipeId} not found`);
    }

    const compatibility = recommender.analyzeCompatibility(
      recipe,
      body.dietaryRestrictions,
      body.allergies,
      body.healthConditions
    );
    res.json({ recipeId: recipe.id, title: recipe.title, compatibility });
  });

  return router;
}
