import { promises as fs } from "node:fs";
import type { Config } from "../config.js";
import { formatDateKey, formatTimestamp, windowStart } from "../digest/dateUtils.js";
import { formatDigest } from "../digest/formatDigest.js";
import { SummarizerError } from "../errors.js";
import { createGitHubActivitySource } from "../github/client.js";
import type { ActivitySource } from "../github/types.js";
import { totalPullRequests, totalReleases } from "../scan/model.js";
import { aggregateProducts } from "../scan/productAggregator.js";
import {
  createOpenAIChatClient,
  PostDrafter,
  Summarizer,
} from "../summarizer/postDrafter.js";
import { withTimeout } from "../utils/timeout.js";

export interface DigestJobDeps {
  source?: ActivitySource;
  summarizer?: Summarizer;
  now?: Date;
  write?: (text: string) => void;
}

export interface DigestJobResult {
  since: Date;
  productCount: number;
  digest: string;
  output?: string;
}

function createSummarizer(config: Config): Summarizer {
  if (!config.openaiApiKey) {
    throw new Error("OPENAI_API_KEY is not set");
  }
  return new PostDrafter({
    client: createOpenAIChatClient(config.openaiApiKey, config.openaiBaseUrl),
    model: config.openaiModel,
    organization: config.organization,
    mode: config.mode,
  });
}

function banner(config: Config, now: Date): string {
  const title = config.mode === "posts" ? "PROPOSED X POSTS" : "CHANGE SUMMARY";
  const rule = "=".repeat(60);
  return `${rule}\n${title} · ${formatDateKey(now, config.timezone)}\n${rule}\n`;
}

export async function runDigestJob(
  config: Config,
  deps: DigestJobDeps = {}
): Promise<DigestJobResult> {
  const now = deps.now ?? new Date();
  const write = deps.write ?? ((text: string) => process.stdout.write(text));
  const source =
    deps.source ?? createGitHubActivitySource({ token: config.githubToken });
  const since = windowStart(now, config.lookbackDays);

  console.error(
    `🔎 Scanning ${config.products.length} products (lookback: ${config.lookbackDays} days, since ${formatTimestamp(since, config.timezone)})...`
  );

  const startTime = Date.now();
  const products = await withTimeout(
    (signal) =>
      aggregateProducts(source, config.products, since, {
        concurrency: config.concurrency,
        signal,
        onRepoScanned: (activity, completed, total) =>
          console.error(
            `   📦 ${activity.repo}: ${activity.pullRequests.length} PRs, ${activity.releases.length} releases (${completed}/${total})`
          ),
      }),
    config.timeoutMs,
    `Scan timed out after ${config.timeoutMs}ms`
  );
  const duration = ((Date.now() - startTime) / 1000).toFixed(1);
  console.error(`⏱️  Scanned in ${duration}s`);

  const digest = formatDigest(products);

  if (products.length === 0) {
    console.error("No notable changes found. Nothing to post.");
    return { since, productCount: 0, digest };
  }

  for (const product of products) {
    console.error(
      `   ✅ ${product.productName}: ${totalPullRequests(product)} PRs, ${totalReleases(product)} releases`
    );
  }

  let output: string;
  if (config.dryRun) {
    output = digest;
  } else {
    console.error("✍️  Drafting content...");
    try {
      const summarizer = deps.summarizer ?? createSummarizer(config);
      output = await summarizer.summarize(digest);
    } catch (error) {
      if (error instanceof SummarizerError) throw error;
      throw new SummarizerError(
        `Summarizer call failed: ${String(error)}`,
        digest,
        { cause: error }
      );
    }
  }

  if (config.outputFile) {
    await fs.writeFile(config.outputFile, `${output}\n`, "utf8");
    console.error(`📝 Content written to ${config.outputFile}`);
  } else if (config.dryRun) {
    write(`\n--- Raw changes (dry-run) ---\n\n${output}\n`);
  } else {
    write(`\n${banner(config, now)}\n${output}\n`);
  }

  return { since, productCount: products.length, digest, output };
}
