import path from "node:path";
import { createApp } from "./app.js";
import { initEnv } from "./config/env.js";
import { recipeSourcesFromEnv } from "./config/recipeSources.js";
import { loadRecipeData } from "./data/loader.js";
import { CandidateProvider } from "./services/candidateGenerator.js";
import { RecipeRecommender, allergyTriggersFrom } from "./services/recommendation.js";
import { logger } from "./utils/logger.js";

const env = initEnv();

const data = loadRecipeData(path.resolve(env.DATA_DIR));
const recommender = new RecipeRecommender(data, {
  embeddingDimension: env.EMBEDDING_DIMENSION,
  chunkSize: env.CHUNK_SIZE,
  defaultSeed: env.GENERATOR_SEED,
  candidateProvider: new CandidateProvider(recipeSourcesFromEnv(env.DYNAMIC_RECIPES_ENABLED), {
    allergyTriggers: allergyTriggersFrom(data.guidelines),
  }),
});

const app = createApp(recommender);

const server = app.listen(env.PORT, () => {
  logger.info({
    msg: "Server started",
    port: env.PORT,
    environment: env.NODE_ENV,
    recipes: data.recipes.length,
  });
});

function gracefulShutdown(signal: string) {
  logger.info({
    msg: "Graceful shutdown initiated",
    signal,
  });

  server.close((err) => {
    if (err) {
      logger.error({
        msg: "Error during shutdown",
        error: err.message,
      });
      process.exit(1);
    }

    logger.info({
      msg: "Server closed gracefully",
    });
    process.exit(0);
  });

  setTimeout(() => {
    logger.error({
      msg: "Forced shutdown after timeout",
    });
    process.exit(1);
  }, 10000).unref();
}

process.on("SIGTERM", () => gracefulShutdown("SIGTERM"));
process.on("SIGINT", () => gracefulShutdown("SIGINT"));
