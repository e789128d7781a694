import { Router } from "express";
import type { RecipeRecommender } from "../../services/recommendation.js";
import { ingredientParamsSchema, substitutionQuerySchema } from "./schemas.js";

export function createIngredientsRouter(recommender: RecipeRecommender): Router {
  const router = Router();

  router.get("/ingredients/:name/substitutions", (req, res) => {
    const { name } = ingredientParamsSchema.parse(req.params);
    const { restrictions, allergies } = substitutionQuerySchema.parse(req.query);
    res.json(recommender.substitute(name, restrictions, allergies));
  });

  return router;
}
