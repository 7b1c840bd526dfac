import type { Exchange } from "../state/sessionHistory.js";
import type { TrackerIssue, WebsiteStatus } from "../types/contracts.js";

export const SYSTEM_PROMPT = [
  "You are a helpful assistant specializing in monitoring project status and issues.",
  "Analyze the provided website status and tracker issues to give concise, relevant answers.",
  "Format replies as chat-friendly Markdown and use fitting emoji.",
  "Consider the conversation history when providing responses to maintain context.",
  "Make the culprit or reason obvious, for example a 500 response coming from a specific module."
].join(" ");

export const PROMPT_ISSUE_LIMIT = 5;

export type PromptInput = {
  query: string;
  websites: readonly WebsiteStatus[];
  issues: readonly TrackerIssue[];
  projects: readonly string[];
  history: readonly Exchange[];
};

export function buildPrompt(input: PromptInput): string {
  const sections = [
    `User Query: ${input.query}`,
    ["Current Status:", "Website Status:", ...formatWebsites(input.websites)].join("\n"),
    ["Latest Issues:", ...formatIssues(input.issues.slice(0, PROMPT_ISSUE_LIMIT))].join("\n"),
    `Projects being monitored: ${input.projects.length > 0 ? input.projects.join(", ") : "none"}`
  ];

  if (input.history.length > 0) {
    sections.push(["Previous Conversation:", ...input.history.map(formatExchange)].join("\n"));
  }

  return sections.join("\n\n");
}

function formatWebsites(websites: readonly WebsiteStatus[]): string[] {
  if (websites.length === 0) {
    return ["- No websites monitored"];
  }
  return websites.map((site) => {
    const state = site.accessible ? "up" : "down";
    const status = site.status === null ? "no response" : `HTTP ${site.status}`;
    const error = site.error ? ` - ${site.error}` : "";
    return `- ${site.url}: ${state} (${status})${error}`;
  });
}

function formatIssues(issues: readonly TrackerIssue[]): string[] {
  if (issues.length === 0) {
    return ["- No issues found"];
  }
  return issues.map((issue) => {
    const details = [
      issue.culprit ? `culprit: ${issue.culprit}` : null,
      issue.level ? `level: ${issue.level}` : null,
      issue.count !== undefined && issue.count !== null ? `events: ${issue.count}` : null,
      issue.lastSeen ? `last seen: ${issue.lastSeen}` : null
    ].filter((part): part is string => part !== null);
    const suffix = details.length > 0 ? ` (${details.join(", ")})` : "";
    return `- [${issue.project}] ${issue.title}${suffix}`;
  });
}

function formatExchange(exchange: Exchange): string {
  return `User: ${exchange.query}\nAssistant: ${exchange.response}`;
}
