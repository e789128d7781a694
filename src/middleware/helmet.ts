import helmet from "helmet";
import { getEnv } from "../config/env.js";

export function createHelmet() {
  const env = getEnv();

  return helmet({
    contentSecurityPolicy: {
      directives: {
        defaultSrc: ["'none'"],
        frameAncestors: ["'none'"],
        connectSrc: ["'self'"],
      },
    },
    hsts: env.NODE_ENV === "production" ? {
      maxAge: 31536000,
      includeSubDomains: true,
      preload: true,
    } : false,
  });
}
