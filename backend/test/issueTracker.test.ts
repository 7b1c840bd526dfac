import test from "node:test";
import assert from "node:assert/strict";
import {
  buildIssuesURL,
  fetchTrackerIssues,
  parseTrackerIssues,
  sortByLastSeen
} from "../src/services/issueTracker.js";

type RecordedRequest = { url: string; headers: Headers };

function trackerStub(responses: Record<string, { status: number; body?: unknown }>) {
  const requests: RecordedRequest[] = [];
  const fetchImpl: typeof fetch = async (input, init) => {
    const url = String(input);
    requests.push({ url, headers: new Headers(init?.headers) });
    const response = responses[url];
    if (!response) {
      throw new Error("connection refused");
    }
    return new Response(JSON.stringify(response.body ?? []), {
      status: response.status,
      headers: { "content-type": "application/json" }
    });
  };
  return { fetchImpl, requests };
}

function silentLogger() {
  const warnings: unknown[] = [];
  const errors: unknown[] = [];
  return {
    warnings,
    errors,
    logger: {
      warn: (payload: unknown) => {
        warnings.push(payload);
      },
      error: (payload: unknown) => {
        errors.push(payload);
      }
    }
  };
}

const API_URL = "https://tracker.example.com/api/0/projects/acme/api/issues/";
const WEB_URL = "https://tracker.example.com/api/0/projects/acme/web/issues/";

test("buildIssuesURL encodes the organization and project", () => {
  assert.equal(
    buildIssuesURL("tracker.example.com", "acme co", "web/app"),
    "https://tracker.example.com/api/0/projects/acme%20co/web%2Fapp/issues/"
  );
});

test("fetchTrackerIssues merges projects, tags them and sorts by lastSeen", async () => {
  const { fetchImpl, requests } = trackerStub({
    [API_URL]: {
      status: 200,
      body: [{ id: "1", title: "TypeError in checkout", culprit: "billing.charge", lastSeen: "2026-10-01T10:00:00Z" }]
    },
    [WEB_URL]: {
      status: 200,
      body: [{ id: "2", title: "500 on /login", lastSeen: "2026-10-02T09:00:00Z", count: "14" }]
    }
  });

  const result = await fetchTrackerIssues({
    domain: "tracker.example.com",
    org: "acme",
    projects: ["api", "web"],
    token: "test-token",
    fetchImpl
  });

  assert.deepEqual(result.failedProjects, []);
  assert.deepEqual(
    result.issues.map((issue) => [issue.id, issue.project]),
    [
      ["2", "web"],
      ["1", "api"]
    ]
  );
  assert.equal(result.issues[0]?.count, "14");
  assert.equal(requests.length, 2);
  assert.equal(requests[0]?.headers.get("authorization"), "Bearer test-token");
});

test("fetchTrackerIssues reports failing projects without dropping the others", async () => {
  const { fetchImpl } = trackerStub({
    [API_URL]: { status: 200, body: [{ id: "1", title: "Timeout" }] },
    [WEB_URL]: { status: 401, body: { detail: "Invalid token" } }
  });
  const { logger, errors } = silentLogger();

  const result = await fetchTrackerIssues({
    domain: "tracker.example.com",
    org: "acme",
    projects: ["api", "web", "worker"],
    fetchImpl,
    logger
  });

  assert.deepEqual(
    result.issues.map((issue) => issue.id),
    ["1"]
  );
  assert.deepEqual(result.failedProjects, ["web", "worker"]);
  assert.equal(errors.length, 2);
});

test("fetchTrackerIssues returns nothing and warns when no projects are configured", async () => {
  const { fetchImpl, requests } = trackerStub({});
  const { logger, warnings } = silentLogger();

  const result = await fetchTrackerIssues({
    domain: "tracker.example.com",
    projects: [],
    fetchImpl,
    logger
  });

  assert.deepEqual(result, { issues: [], failedProjects: [] });
  assert.equal(requests.length, 0);
  assert.equal(warnings.length, 1);
});

test("fetchTrackerIssues treats a non-list payload as a failure", async () => {
  const { fetchImpl } = trackerStub({
    [API_URL]: { status: 200, body: { detail: "unexpected" } }
  });

  const result = await fetchTrackerIssues({
    domain: "tracker.example.com",
    org: "acme",
    projects: ["api"],
    fetchImpl
  });

  assert.deepEqual(result, { issues: [], failedProjects: ["api"] });
});

test("parseTrackerIssues skips items without an id or title", () => {
  const issues = parseTrackerIssues(
    [{ id: "1", title: "ok" }, { id: "2" }, "garbage", { id: 3, title: "numeric id" }],
    "api"
  );

  assert.deepEqual(issues, [{ id: "1", title: "ok", project: "api" }]);
});

test("parseTrackerIssues keeps issues whose optional fields are null", () => {
  const issues = parseTrackerIssues(
    [{ id: "1", title: "Crash", level: "error", permalink: null, count: null, lastSeen: "2026-10-01T10:00:00Z" }],
    "api"
  );

  assert.deepEqual(issues, [
    { id: "1", title: "Crash", level: "error", permalink: null, count: null, lastSeen: "2026-10-01T10:00:00Z", project: "api" }
  ]);
});

test("fetchTrackerIssues warns about the items it had to skip", async () => {
  const { fetchImpl } = trackerStub({
    [API_URL]: { status: 200, body: [{ id: "1", title: "Kept", culprit: null }, { title: "no id" }, 42] }
  });
  const { logger, warnings } = silentLogger();

  const result = await fetchTrackerIssues({
    domain: "tracker.example.com",
    org: "acme",
    projects: ["api"],
    fetchImpl,
    logger
  });

  assert.deepEqual(
    result.issues.map((issue) => issue.id),
    ["1"]
  );
  assert.deepEqual(warnings, [{ msg: "Skipped malformed tracker issues", project: "api", skipped: 2 }]);
});

test("sortByLastSeen puts issues without lastSeen at the end", () => {
  const sorted = sortByLastSeen([
    { id: "a", title: "a", project: "p" },
    { id: "b", title: "b", project: "p", lastSeen: "2026-01-01T00:00:00Z" },
    { id: "c", title: "c", project: "p", lastSeen: "2026-03-01T00:00:00Z" }
  ]);

  assert.deepEqual(
    sorted.map((issue) => issue.id),
    ["c", "b", "a"]
  );
});
