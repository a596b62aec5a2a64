import { fetch } from "undici";
import { parseRepoId } from "../config.js";
import { SourceUnavailableError } from "../errors.js";
import { withRetry } from "../utils/retry.js";
import { ActivitySource, PullRequestRecord, ReleaseRecord } from "./types.js";

const API_ROOT = "https://api.github.com";

interface GitHubPrResponse {
  number: number;
  title: string;
  body?: string | null;
  labels?: unknown;
  merged_at: string | null;
  user?: unknown;
  html_url: string;
}

interface GitHubReleaseResponse {
  tag_name: string;
  name?: string | null;
  body?: string | null;
  html_url: string;
  published_at: string | null;
}

export interface GitHubClientOptions {
  token: string;
  perPage?: number;
  retryAttempts?: number;
  retryBaseDelayMs?: number;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null;
}

function isPrResponse(value: unknown): value is GitHubPrResponse {
  return (
    isRecord(value) &&
    typeof value.number === "number" &&
    typeof value.title === "string" &&
    typeof value.html_url === "string" &&
    (value.merged_at === null || typeof value.merged_at === "string")
  );
}

function isReleaseResponse(value: unknown): value is GitHubReleaseResponse {
  return (
    isRecord(value) &&
    typeof value.tag_name === "string" &&
    typeof value.html_url === "string" &&
    (value.published_at === null || typeof value.published_at === "string")
  );
}

// Entries without a string name are dropped rather than rendered blank
function labelNames(labels: unknown): string[] {
  if (!Array.isArray(labels)) return [];
  return labels.flatMap((label: unknown) =>
    isRecord(label) && typeof label.name === "string" && label.name ? [label.name] : []
  );
}

function authorLogin(user: unknown): string {
  return isRecord(user) && typeof user.login === "string" && user.login
    ? user.login
    : "unknown";
}

function isRateLimited(error: unknown): boolean {
  return error instanceof SourceUnavailableError && error.rateLimited;
}

async function githubRequest(
  url: string,
  repo: string,
  options: GitHubClientOptions,
  signal?: AbortSignal
): Promise<unknown> {
  const response = await fetch(url, {
    headers: {
      Accept: "application/vnd.github.v3+json",
      Authorization: `token ${options.token}`,
      "User-Agent": "repo-activity-digest",
    },
    signal,
  }).catch((error: unknown) => {
    // A cancelled scan rejects with its own reason, not as an outage
    if (signal?.aborted) throw signal.reason;
    throw new SourceUnavailableError(
      `GitHub request for ${repo} failed: ${String(error)}`,
      repo,
      undefined,
      { cause: error }
    );
  });

  if (!response.ok) {
    const text = await response.text();
    // GitHub reports an exhausted primary rate limit as 403
    const rateLimited =
      response.status === 429 ||
      (response.status === 403 &&
        response.headers.get("x-ratelimit-remaining") === "0");
    throw new SourceUnavailableError(
      `GitHub API error for ${repo}: ${response.status} ${response.statusText}\n${text}`,
      repo,
      response.status,
      { rateLimited }
    );
  }

  return response.json();
}

/**
 * Lazily walks a paginated list endpoint, one page per request, stopping
 * at an empty or short page. Pages are only requested when the consumer
 * asks for more items. Aborting `signal` cancels the request in flight and
 * stops further pages.
 */
async function* githubRequestPaginated(
  path: string,
  repo: string,
  options: GitHubClientOptions,
  signal?: AbortSignal
): AsyncGenerator<unknown> {
  const perPage = options.perPage ?? 100;
  let page = 1;

  while (true) {
    signal?.throwIfAborted();
    const separator = path.includes("?") ? "&" : "?";
    const pageUrl = `${API_ROOT}${path}${separator}page=${page}&per_page=${perPage}`;
    const results = await withRetry(
      () => githubRequest(pageUrl, repo, options, signal),
      {
        attempts: options.retryAttempts ?? 3,
        baseDelayMs: options.retryBaseDelayMs ?? 500,
        isRetryable: isRateLimited,
        onRetry: (_error, attempt, delay) =>
          console.error(`   ⏳ ${repo} rate limited, retry ${attempt} in ${delay}ms`),
      }
    );

    if (!Array.isArray(results)) {
      throw new SourceUnavailableError(
        `Expected array from GitHub API for ${repo}`,
        repo
      );
    }

    yield* results;

    if (results.length < perPage) {
      break;
    }
    page++;
  }
}

export async function* listMergedPullRequests(
  repo: string,
  options: GitHubClientOptions,
  signal?: AbortSignal
): AsyncGenerator<PullRequestRecord> {
  const { owner, name } = parseRepoId(repo);
  // No "sort by merged" exists; recency of update approximates merge order
  const path = `/repos/${owner}/${name}/pulls?state=closed&sort=updated&direction=desc`;

  for await (const item of githubRequestPaginated(path, repo, options, signal)) {
    if (!isPrResponse(item)) {
      throw new SourceUnavailableError(`Unexpected pull request payload for ${repo}`, repo);
    }
    if (!item.merged_at) continue; // closed without merging

    yield {
      number: item.number,
      title: item.title,
      body: item.body ?? "",
      url: item.html_url,
      mergedAt: new Date(item.merged_at),
      labels: labelNames(item.labels),
      author: authorLogin(item.user),
    };
  }
}

export async function* listReleases(
  repo: string,
  options: GitHubClientOptions,
  signal?: AbortSignal
): AsyncGenerator<ReleaseRecord> {
  const { owner, name } = parseRepoId(repo);
  const path = `/repos/${owner}/${name}/releases`;

  for await (const item of githubRequestPaginated(path, repo, options, signal)) {
    if (!isReleaseResponse(item)) {
      throw new SourceUnavailableError(`Unexpected release payload for ${repo}`, repo);
    }
    if (!item.published_at) continue; // draft

    yield {
      tag: item.tag_name,
      name: item.name || item.tag_name,
      body: item.body ?? "",
      url: item.html_url,
      publishedAt: new Date(item.published_at),
    };
  }
}

export function createGitHubActivitySource(
  options: GitHubClientOptions
): ActivitySource {
  return {
    listMergedPullRequests: (repo, signal) =>
      listMergedPullRequests(repo, options, signal),
    listReleases: (repo, signal) => listReleases(repo, options, signal),
  };
}
