import { z } from "zod";

export type WebsiteStatus = {
  url: string;
  status: number | null;
  accessible: boolean;
  error?: string;
};

export const trackerIssueSchema = z.object({
  id: z.string(),
  title: z.string(),
  culprit: z.string().nullish(),
  level: z.string().nullish(),
  status: z.string().nullish(),
  count: z.union([z.string(), z.number()]).nullish(),
  userCount: z.number().nullish(),
  lastSeen: z.string().nullish(),
  permalink: z.string().nullish(),
});

export type TrackerIssue = z.infer<typeof trackerIssueSchema> & {
  project: string;
};

/** Everything the status cache holds, one variant per upstream feed. */
export type StatusPayload =
  | { kind: "websites"; items: WebsiteStatus[] }
  | { kind: "issues"; items: TrackerIssue[]; failedProjects: string[] };

export type StatusSnapshot = {
  websites: WebsiteStatus[];
  issues: TrackerIssue[];
};

/** Accepts a JSON number or a plain decimal string such as a route param. */
export const userIdSchema = z.union([
  z.number().int().safe(),
  z.string().regex(/^-?\d+$/).pipe(z.coerce.number().int().safe()),
]);

export const chatRequestSchema = z.object({
  userId: z.number().int().safe(),
  text: z.string().trim().min(1).max(4000),
});
