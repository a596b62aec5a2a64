import { validateProducts } from "../config.js";
import type { ActivitySource } from "../github/types.js";
import {
  hasChanges,
  ProductActivity,
  ProductDefinition,
  RepoActivity,
} from "./model.js";
import { processInParallel } from "./processInParallel.js";
import { scanRepo } from "./repoScanner.js";

export interface AggregateOptions {
  concurrency?: number;
  onRepoScanned?: (activity: RepoActivity, completed: number, total: number) => void;
  signal?: AbortSignal;
}

interface ScanTask {
  productIndex: number;
  repo: string;
}

/**
 * Scans every configured repo and groups the results by product, in
 * configuration order. Products without any pull request or release in
 * the window are left out. Rejects on the first failed scan, cancelling the
 * scans still running.
 */
export async function aggregateProducts(
  source: ActivitySource,
  products: ProductDefinition[],
  since: Date,
  options: AggregateOptions = {}
): Promise<ProductActivity[]> {
  validateProducts(products);

  const tasks: ScanTask[] = products.flatMap((product, productIndex) =>
    product.repos.map((repo) => ({ productIndex, repo }))
  );

  const scanned = await processInParallel(
    tasks,
    options.concurrency ?? 4,
    (task, _index, signal) => scanRepo(source, task.repo, since, signal),
    (completed, total, activity) =>
      options.onRepoScanned?.(activity, completed, total),
    options.signal
  );

  // Tasks were flattened product by product, so slots regroup in order
  const grouped: ProductActivity[] = products.map((product) => ({
    productName: product.name,
    repos: [],
  }));
  tasks.forEach((task, index) => {
    grouped[task.productIndex].repos.push(scanned[index]);
  });

  return grouped.filter(hasChanges);
}
