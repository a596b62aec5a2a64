import type { PullRequestRecord, ReleaseRecord } from "../github/types.js";

export interface ProductDefinition {
  name: string;
  repos: string[]; // "owner/name", in reporting order
}

export interface RepoActivity {
  repo: string; // "owner/name"
  pullRequests: PullRequestRecord[]; // newest merge first
  releases: ReleaseRecord[]; // newest publish first
}

export interface ProductActivity {
  productName: string;
  repos: RepoActivity[];
}

export function repoHasActivity(repo: RepoActivity): boolean {
  return repo.pullRequests.length > 0 || repo.releases.length > 0;
}

export function hasChanges(product: ProductActivity): boolean {
  return product.repos.some(repoHasActivity);
}

export function totalPullRequests(product: ProductActivity): number {
  return product.repos.reduce((sum, repo) => sum + repo.pullRequests.length, 0);
}

export function totalReleases(product: ProductActivity): number {
  return product.repos.reduce((sum, repo) => sum + repo.releases.length, 0);
}
