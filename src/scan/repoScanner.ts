import type { ActivitySource } from "../github/types.js";
import type { RepoActivity } from "./model.js";
import { collectWithinWindow } from "./windowFilter.js";

/**
 * Pull requests and releases are separate timelines, each cut off on its own.
 * When one feed fails the other is cancelled before the scan rejects, and an
 * aborted `signal` cancels both.
 */
export async function scanRepo(
  source: ActivitySource,
  repo: string,
  since: Date,
  signal?: AbortSignal
): Promise<RepoActivity> {
  signal?.throwIfAborted();
  const controller = new AbortController();
  const forwardAbort = () => controller.abort(signal?.reason);
  signal?.addEventListener("abort", forwardAbort, { once: true });

  const collect = <T>(
    items: AsyncIterable<T>,
    timestampOf: (item: T) => Date
  ): Promise<T[]> =>
    collectWithinWindow(items, since, timestampOf, controller.signal).catch(
      (error: unknown) => {
        controller.abort(error);
        throw error;
      }
    );

  try {
    const [pullRequests, releases] = await Promise.all([
      collect(
        source.listMergedPullRequests(repo, controller.signal),
        (pr) => pr.mergedAt
      ),
      collect(
        source.listReleases(repo, controller.signal),
        (release) => release.publishedAt
      ),
    ]);
    return { repo, pullRequests, releases };
  } finally {
    signal?.removeEventListener("abort", forwardAbort);
  }
}
