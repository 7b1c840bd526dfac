import express from "express";
import { createHelmet } from "./middleware/helmet.js";
import { createCors } from "./middleware/cors.js";
import { errorHandler, notFoundHandler } from "./middleware/error.js";
import type { ChatRateLimitOptions } from "./middleware/rateLimit.js";
import { createHealthRouter, type StateGauges } from "./routes/health.js";
import { createV1Router } from "./routes/v1/index.js";
import type { ChatPipeline } from "./services/chatPipeline.js";
import { logRequest } from "./utils/logger.js";

export type AppDeps = {
  pipeline: ChatPipeline;
  authorizedUsers: readonly number[];
  gauges: StateGauges;
  rateLimit?: ChatRateLimitOptions;
};

export function createApp(deps: AppDeps): express.Express {
  const app = express();

  app.use(express.json({ limit: "64kb" }));

  app.use(createHelmet());
  app.use(createCors());

  app.use((req, _res, next) => {
    logRequest(req);
    next();
  });

  app.use(createHealthRouter(deps.gauges));
  app.use(
    "/api/v1",
    createV1Router({
      pipeline: deps.pipeline,
      authorizedUsers: deps.authorizedUsers,
      rateLimit: deps.rateLimit,
    })
  );

  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
}
