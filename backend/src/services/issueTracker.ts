import { z } from "zod";
import { trackerIssueSchema, type TrackerIssue } from "../types/contracts.js";
import type { Logger } from "../utils/logger.js";

type FetchLike = typeof fetch;

export type TrackerFetchOptions = {
  domain: string;
  org?: string;
  projects: readonly string[];
  token?: string;
  fetchImpl?: FetchLike;
  timeoutMs?: number;
  logger?: Pick<Logger, "warn" | "error">;
};

export type TrackerFetchResult = {
  issues: TrackerIssue[];
  failedProjects: string[];
};

const DEFAULT_TIMEOUT_MS = 10_000;

const issueListSchema = z.array(z.unknown());

/**
 * Pulls the open issue list of every configured project and merges it, most recently seen
 * first. A project whose request fails is reported in `failedProjects` instead of aborting
 * the whole fetch.
 */
export async function fetchTrackerIssues(options: TrackerFetchOptions): Promise<TrackerFetchResult> {
  if (options.projects.length === 0) {
    options.logger?.warn({ msg: "No issue tracker projects configured" });
    return { issues: [], failedProjects: [] };
  }

  const fetchImpl = options.fetchImpl ?? fetch;
  const timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;

  const results = await Promise.all(
    options.projects.map(async (project) => {
      try {
        const issues = await fetchProjectIssues({ ...options, project, fetchImpl, timeoutMs });
        return { project, issues };
      } catch (error) {
        options.logger?.error({
          msg: "Failed to fetch tracker issues",
          project,
          error: error instanceof Error ? error.message : String(error)
        });
        return { project, issues: null };
      }
    })
  );

  const issues: TrackerIssue[] = [];
  const failedProjects: string[] = [];
  for (const result of results) {
    if (result.issues) {
      issues.push(...result.issues);
    } else {
      failedProjects.push(result.project);
    }
  }

  return { issues: sortByLastSeen(issues), failedProjects };
}

type ProjectFetchInput = {
  domain: string;
  org?: string;
  project: string;
  token?: string;
  fetchImpl: FetchLike;
  timeoutMs: number;
  logger?: Pick<Logger, "warn" | "error">;
};

async function fetchProjectIssues(input: ProjectFetchInput): Promise<TrackerIssue[]> {
  const endpoint = buildIssuesURL(input.domain, input.org ?? "", input.project);
  const controller = new AbortController();
  const timeout = setTimeout(() => controller.abort(), input.timeoutMs);

  try {
    const headers: Record<string, string> = {
      Accept: "application/json",
      "Content-Type": "application/json"
    };
    if (input.token) {
      headers.Authorization = `Bearer ${input.token}`;
    }

    const response = await input.fetchImpl(endpoint, {
      method: "GET",
      signal: controller.signal,
      headers
    });
    if (response.status !== 200) {
      throw new Error(`Unexpected status ${response.status}`);
    }

    const payload = issueListSchema.parse(await response.json());
    const issues = parseTrackerIssues(payload, input.project);
    const skipped = payload.length - issues.length;
    if (skipped > 0) {
      input.logger?.warn({ msg: "Skipped malformed tracker issues", project: input.project, skipped });
    }
    return issues;
  } finally {
    clearTimeout(timeout);
  }
}

export function buildIssuesURL(domain: string, org: string, project: string): string {
  return `https://${domain}/api/0/projects/${encodeURIComponent(org)}/${encodeURIComponent(project)}/issues/`;
}

/** Items that do not look like an issue are skipped. */
export function parseTrackerIssues(items: readonly unknown[], project: string): TrackerIssue[] {
  const issues: TrackerIssue[] = [];
  for (const item of items) {
    const parsed = trackerIssueSchema.safeParse(item);
    if (parsed.success) {
      issues.push({ ...parsed.data, project });
    }
  }
  return issues;
}

export function sortByLastSeen(issues: readonly TrackerIssue[]): TrackerIssue[] {
  return [...issues].sort((a, b) => (b.lastSeen ?? "").localeCompare(a.lastSeen ?? ""));
}
