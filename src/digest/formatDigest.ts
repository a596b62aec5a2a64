import { ProductActivity, repoHasActivity } from "../scan/model.js";

export const NO_CHANGES_SENTINEL =
  "No notable changes found in the lookback window.";

export const RELEASE_BODY_LIMIT = 200;
export const PR_BODY_LIMIT = 150;

export interface DigestOptions {
  releaseBodyLimit?: number;
  prBodyLimit?: number;
}

// Hard cap in code points first, then line breaks become spaces. May cut
// mid-word, never mid-character.
export function previewText(text: string, maxLength: number): string {
  return Array.from(text).slice(0, maxLength).join("").replace(/\r?\n/g, " ");
}

/**
 * Renders aggregated activity as the text block handed to the summarizer.
 * Never returns an empty string.
 */
export function formatDigest(
  products: ProductActivity[],
  options: DigestOptions = {}
): string {
  if (products.length === 0) {
    return NO_CHANGES_SENTINEL;
  }

  const releaseLimit = options.releaseBodyLimit ?? RELEASE_BODY_LIMIT;
  const prLimit = options.prBodyLimit ?? PR_BODY_LIMIT;
  const sections: string[] = [];

  for (const product of products) {
    const lines: string[] = [`## ${product.productName}`];

    for (const repo of product.repos) {
      if (!repoHasActivity(repo)) continue;
      lines.push(`\n### Repo: ${repo.repo}`);

      if (repo.releases.length > 0) {
        lines.push("\n**Releases:**");
        for (const release of repo.releases) {
          lines.push(
            `- ${release.name} (${release.tag}) — ${previewText(release.body, releaseLimit)}`
          );
        }
      }

      if (repo.pullRequests.length > 0) {
        lines.push(`\n**Merged PRs (${repo.pullRequests.length}):**`);
        for (const pr of repo.pullRequests) {
          const labels = pr.labels.length > 0 ? ` [${pr.labels.join(", ")}]` : "";
          lines.push(`- #${pr.number}: ${pr.title}${labels}`);
          const preview = previewText(pr.body, prLimit);
          if (preview) {
            lines.push(`  ${preview}`);
          }
        }
      }
    }

    sections.push(lines.join("\n"));
  }

  return sections.join("\n\n");
}
