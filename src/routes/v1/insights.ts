import { Router } from "express";
import type { RecipeRecommender } from "../../services/recommendation.js";
import { nutritionAnalysisBodySchema } from "./schemas.js";

export function createInsightsRouter(recommender: RecipeRecommender): Router {
  const router = Router();

  router.post("/nutrition/analysis", (req, res) => {
    const { profile } = nutritionAnalysisBodySchema.parse(req.body);
    res.json(recommender.nutritionAnalysis(profile));
  });

  router.get("/stats", (_req, res) => {
    res.json(recommender.stats());
  });

  return router;
}
