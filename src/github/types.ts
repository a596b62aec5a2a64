export interface PullRequestRecord {
  readonly number: number;
  readonly title: string;
  readonly body: string;
  readonly url: string;
  readonly mergedAt: Date;
  readonly labels: readonly string[];
  readonly author: string;
}

export interface ReleaseRecord {
  readonly tag: string;
  readonly name: string; // falls back to the tag
  readonly body: string;
  readonly url: string;
  readonly publishedAt: Date;
}

/**
 * Activity feeds of a hosted repository. Both feeds are lazy and newest
 * first; unmerged pull requests and unpublished releases are never yielded.
 * Fetch failures reject with a SourceUnavailableError; an aborted `signal`
 * rejects with its reason and requests nothing further.
 */
export interface ActivitySource {
  listMergedPullRequests(
    repo: string,
    signal?: AbortSignal
  ): AsyncIterable<PullRequestRecord>;
  listReleases(repo: string, signal?: AbortSignal): AsyncIterable<ReleaseRecord>;
}
