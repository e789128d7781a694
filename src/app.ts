import express from "express";
import { createCors } from "./middleware/cors.js";
import { errorHandler, notFoundHandler } from "./middleware/error.js";
import { createHelmet } from "./middleware/helmet.js";
import { createRateLimiter } from "./middleware/rateLimit.js";
import { createHealthRouter } from "./routes/health.js";
import { createV1Router } from "./routes/v1/index.js";
import type { RecipeRecommender } from "./services/recommendation.js";
import { logger } from "./utils/logger.js";

export function createApp(recommender: RecipeRecommender): express.Express {
  const app = express();

  app.use(express.json({ limit: "256kb" }));

  app.use(createHelmet());
  app.use(createCors());

  app.use((req, res, next) => {
    const startedAt = Date.now();
    res.on("finish", () => {
      logger.debug({
        msg: "Request completed",
        method: req.method,
        url: req.originalUrl,
        status: res.statusCode,
        durationMs: Date.now() - startedAt,
      });
    });
    next();
  });

  app.use(createHealthRouter(recommender));
  app.use("/api/v1", createRateLimiter(), createV1Router(recommender));

  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
}
