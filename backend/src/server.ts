import { initEnv } from "./config/env.js";
import { createApp } from "./app.js";
import { ChatPipeline } from "./services/chatPipeline.js";
import { fetchTrackerIssues } from "./services/issueTracker.js";
import { AnthropicLanguageModel } from "./services/languageModel.js";
import { checkWebsites } from "./services/websiteStatus.js";
import { ExpiringCache } from "./state/expiringCache.js";
import { SessionHistory } from "./state/sessionHistory.js";
import type { StatusPayload } from "./types/contracts.js";
import { createChildLogger, logger } from "./utils/logger.js";

const env = initEnv();

const cache = new ExpiringCache<StatusPayload>({
  ttlMs: env.STATUS_CACHE_TTL_MINUTES * 60 * 1000,
});
const history = new SessionHistory({
  maxMessages: env.HISTORY_MAX_MESSAGES,
  expiryWindowMs: env.HISTORY_EXPIRY_HOURS * 60 * 60 * 1000,
});

const trackerLogger = createChildLogger({ component: "issue-tracker" });

const pipeline = new ChatPipeline({
  cache,
  history,
  probeWebsites: () =>
    checkWebsites(env.MONITORED_WEBSITES, { timeoutMs: env.WEBSITE_CHECK_TIMEOUT_MS }),
  fetchIssues: () =>
    fetchTrackerIssues({
      domain: env.SENTRY_DOMAIN,
      org: env.SENTRY_ORG,
      projects: env.SENTRY_PROJECTS,
      token: env.SENTRY_TOKEN,
      timeoutMs: env.SENTRY_TIMEOUT_MS,
      logger: trackerLogger,
    }),
  model: new AnthropicLanguageModel({
    apiKey: env.ANTHROPIC_API_KEY,
    model: env.LLM_MODEL,
    maxTokens: env.LLM_MAX_TOKENS,
  }),
  logger: createChildLogger({ component: "chat-pipeline" }),
  projects: env.SENTRY_PROJECTS,
});

const app = createApp({
  pipeline,
  authorizedUsers: env.AUTHORIZED_USERS,
  gauges: {
    cacheEntries: () => cache.storedCount(),
    historyUsers: () => history.userCount,
  },
  rateLimit: {
    windowMs: env.CHAT_RATE_WINDOW_MS,
    max: env.CHAT_RATE_MAX,
  },
});

const server = app.listen(env.PORT, () => {
  logger.info({
    msg: "Server started",
    port: env.PORT,
    environment: env.NODE_ENV,
    authorizedUsers: env.AUTHORIZED_USERS.length,
    monitoredWebsites: env.MONITORED_WEBSITES.length,
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

    cache.clear();
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
