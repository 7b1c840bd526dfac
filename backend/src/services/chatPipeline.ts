import type { ExpiringCache } from "../state/expiringCache.js";
import type { Exchange, SessionHistory, UserId } from "../state/sessionHistory.js";
import type { StatusPayload, StatusSnapshot, TrackerIssue, WebsiteStatus } from "../types/contracts.js";
import type { Logger } from "../utils/logger.js";
import { upstreamUnavailable } from "../middleware/error.js";
import type { TrackerFetchResult } from "./issueTracker.js";
import type { LanguageModelClient } from "./languageModel.js";
import { SYSTEM_PROMPT, buildPrompt } from "./prompt.js";

export const WEBSITE_STATUS_KEY = "website_status";
export const TRACKER_ISSUES_KEY = "tracker_issues";

export const WELCOME_MESSAGE = [
  "👋 Welcome to the Project Monitor Bot!",
  "",
  "I can help you monitor your projects and check their status. Here's what I can do:",
  "- Check website accessibility",
  "- Get the latest issues from monitored projects",
  "- Answer questions about your projects",
  "",
  "Just ask me anything about your projects!"
].join("\n");

export type ChatPipelineDeps = {
  cache: ExpiringCache<StatusPayload>;
  history: SessionHistory;
  probeWebsites: () => Promise<WebsiteStatus[]>;
  fetchIssues: () => Promise<TrackerFetchResult>;
  model: LanguageModelClient;
  logger: Logger;
  projects: readonly string[];
};

/**
 * Answers one chat message: gathers cached status signals, replays the user's recent
 * exchanges into the prompt, asks the model, and records the exchange once it succeeds.
 */
export class ChatPipeline {
  constructor(private readonly deps: ChatPipelineDeps) {}

  welcomeMessage(): string {
    return WELCOME_MESSAGE;
  }

  async handleMessage(userId: UserId, text: string): Promise<string> {
    const { history, logger } = this.deps;

    const dropped = history.cleanupAll();
    if (dropped > 0) {
      logger.debug({ msg: "Dropped expired chat histories", users: dropped });
    }

    const status = await this.getStatus();
    const previous = history.getHistory(userId);
    logger.debug({ msg: "Loaded chat history", userId, exchanges: previous.length });

    const prompt = buildPrompt({
      query: text,
      websites: status.websites,
      issues: status.issues,
      projects: this.deps.projects,
      history: previous
    });

    let reply: string;
    try {
      reply = await this.deps.model.complete({ system: SYSTEM_PROMPT, prompt });
    } catch (error) {
      logger.error({
        msg: "Language model request failed",
        userId,
        error: error instanceof Error ? error.message : String(error)
      });
      throw upstreamUnavailable(error);
    }

    history.addMessage(userId, text, reply);
    logger.info({ msg: "Answered chat message", userId });
    return reply;
  }

  async getStatus(): Promise<StatusSnapshot> {
    const [websites, issues] = await Promise.all([this.loadWebsites(), this.loadIssues()]);
    return { websites, issues };
  }

  getHistory(userId: UserId): readonly Exchange[] {
    return this.deps.history.getHistory(userId);
  }

  resetHistory(userId: UserId): void {
    this.deps.history.clearHistory(userId);
  }

  private async loadWebsites(): Promise<WebsiteStatus[]> {
    const payload = await this.deps.cache.getOrLoad(WEBSITE_STATUS_KEY, async () => ({
      kind: "websites",
      items: await this.deps.probeWebsites()
    }));
    return payload.kind === "websites" ? payload.items : [];
  }

  private async loadIssues(): Promise<TrackerIssue[]> {
    const { cache, logger } = this.deps;

    try {
      const payload = await cache.getOrLoad(
        TRACKER_ISSUES_KEY,
        async () => {
          const result = await this.deps.fetchIssues();
          return { kind: "issues", items: result.issues, failedProjects: result.failedProjects };
        },
        // A partial result is served to every waiting request, then fetched again next time.
        { shouldStore: (loaded) => loaded.kind === "issues" && loaded.failedProjects.length === 0 }
      );
      if (payload.kind !== "issues") {
        return [];
      }
      if (payload.failedProjects.length > 0) {
        logger.warn({ msg: "Serving partial tracker issues", failedProjects: payload.failedProjects });
      }
      return payload.items;
    } catch (error) {
      logger.error({
        msg: "Tracker issue fetch failed",
        error: error instanceof Error ? error.message : String(error)
      });
      return [];
    }
  }
}
