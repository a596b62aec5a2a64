#!/usr/bin/env node
import { loadConfig } from "../config.js";
import { ConfigurationError, SummarizerError } from "../errors.js";
import { parseCliArgs } from "./cliArgs.js";
import { runDigestJob } from "./runDigestJob.js";

const HELP = `
📋 Repository Activity Digest

Usage: npm run digest:run -- [options]

Options:
  --frequency=daily|weekly   Lookback preset: daily = 1 day, weekly = 14 days (default: weekly)
  --lookback-days=N          Override the lookback window in days
  --products=PATH            Product config JSON (default: products.json, or PRODUCTS_FILE)
  --github-token=TOKEN       GitHub token (falls back to GITHUB_TOKEN)
  --mode=posts|summary       Draft X posts, or a change summary for a human writer (default: posts)
  --output=PATH              Write the result to a file instead of stdout
  --dry-run                  Only scan GitHub and print the digest, skip drafting
  --help, -h                 Show this help message

Examples:
  npm run digest:run                                # Weekly posts to stdout
  npm run digest:run -- --frequency=daily --dry-run # Yesterday's raw digest
  npm run digest:run -- --output=posts.md           # Save drafted posts
`;

async function main(): Promise<void> {
  const { help, overrides } = parseCliArgs(process.argv.slice(2));
  if (help) {
    console.log(HELP);
    return;
  }

  const config = loadConfig(overrides);
  await runDigestJob(config);
}

main().catch((err: unknown) => {
  if (err instanceof ConfigurationError) {
    console.error(`Error: ${err.message}`);
  } else if (err instanceof SummarizerError) {
    console.error("Drafting failed:", err.message);
    if (err.digest) {
      console.error("\n--- Scanned digest ---\n");
      console.error(err.digest);
    }
  } else {
    console.error("Digest job failed:", err);
  }
  process.exit(1);
});
