import { Router } from "express";
import type { RecipeRecommender } from "../../services/recommendation.js";
import { createIngredientsRouter } from "./ingredients.js";
import { createInsightsRouter } from "./insights.js";
import { createRecipesRouter } from "./recipes.js";

export function createV1Router(recommender: RecipeRecommender): Router {
  const router = Router();

  router.use("/", createRecipesRouter(recommender));
  router.use("/", createIngredientsRouter(recommender));
  router.use("/", createInsightsRouter(recommender));

  return router;
}
