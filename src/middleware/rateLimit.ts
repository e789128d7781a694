import rateLimit from "express-rate-limit";
import { getEnv } from "../config/env.js";

export function createRateLimiter() {
  const env = getEnv();

  return rateLimit({
    windowMs: env.API_RATE_WINDOW_MS,
    max: env.API_RATE_MAX,
    standardHeaders: true,
    legacyHeaders: false,
    message: {
      error: "rate_limited",
      message: "Too many requests, please try again later",
      retryInSeconds: Math.ceil(env.API_RATE_WINDOW_MS / 1000),
    },
    keyGenerator: (req) => {
      const forwarded = req.headers["x-forwarded-for"];
      if (typeof forwarded === "string") {
        const [first] = forwarded.split(",");
        if (first) return first.trim();
      }
      return req.ip ?? "unknown";
    },
  });
}
