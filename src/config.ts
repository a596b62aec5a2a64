import dotenv from "dotenv";
import { readFileSync } from "node:fs";
import { fileURLToPath } from "url";
import { dirname, join, resolve } from "path";
import { ConfigurationError } from "./errors.js";
import type { ProductDefinition } from "./scan/model.js";

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

dotenv.config({ path: join(__dirname, "..", ".env") });

export type Frequency = "daily" | "weekly";
export type DraftMode = "posts" | "summary";

export const LOOKBACK_DAYS: Record<Frequency, number> = {
  daily: 1,
  weekly: 14,
};

export interface RepoConfig {
  owner: string;
  name: string;
}

export interface Config {
  githubToken: string;
  openaiApiKey?: string;
  openaiModel: string;
  openaiBaseUrl?: string;
  organization: string;

  products: ProductDefinition[];
  frequency: Frequency;
  lookbackDays: number;

  timezone: string;
  concurrency: number;
  timeoutMs: number;

  mode: DraftMode;
  outputFile?: string;
  dryRun: boolean;
}

// Values coming from the command line win over the environment.
export interface CliOverrides {
  frequency?: string;
  lookbackDays?: string;
  githubToken?: string;
  productsFile?: string;
  output?: string;
  mode?: string;
  dryRun?: boolean;
}

const REPO_PATTERN = /^[A-Za-z0-9_.-]+\/[A-Za-z0-9_.-]+$/;

export function parseRepoId(repo: string): RepoConfig {
  if (!REPO_PATTERN.test(repo)) {
    throw new ConfigurationError(
      `Invalid repo format: ${repo}. Expected format: owner/name`
    );
  }
  const [owner, name] = repo.split("/");
  return { owner, name };
}

/**
 * Checks the product list shape and rejects a repo that appears under
 * more than one product, since it would be scanned and reported twice.
 */
export function validateProducts(products: ProductDefinition[]): void {
  if (products.length === 0) {
    throw new ConfigurationError("At least one product must be configured");
  }

  const productNames = new Set<string>();
  const owners = new Map<string, string>();

  for (const product of products) {
    if (product.name.trim().length === 0) {
      throw new ConfigurationError("Product names must not be empty");
    }
    if (productNames.has(product.name)) {
      throw new ConfigurationError(`Duplicate product name: ${product.name}`);
    }
    productNames.add(product.name);

    if (product.repos.length === 0) {
      throw new ConfigurationError(
        `Product "${product.name}" must list at least one repository`
      );
    }

    for (const repo of product.repos) {
      parseRepoId(repo);
      const key = repo.toLowerCase();
      const owner = owners.get(key);
      if (owner !== undefined) {
        throw new ConfigurationError(
          `Repository ${repo} is listed under both "${owner}" and "${product.name}"`
        );
      }
      owners.set(key, product.name);
    }
  }
}

export function parseProducts(raw: unknown): ProductDefinition[] {
  if (!Array.isArray(raw)) {
    throw new ConfigurationError(
      "Product config must be a JSON array of { name, repos } entries"
    );
  }

  const products = raw.map((entry: unknown, index): ProductDefinition => {
    if (typeof entry !== "object" || entry === null) {
      throw new ConfigurationError(`Product entry ${index} is not an object`);
    }
    const name: unknown = Reflect.get(entry, "name");
    const repos: unknown = Reflect.get(entry, "repos");
    if (typeof name !== "string") {
      throw new ConfigurationError(`Product entry ${index} has no name`);
    }
    if (
      !Array.isArray(repos) ||
      !repos.every((repo): repo is string => typeof repo === "string")
    ) {
      throw new ConfigurationError(
        `Product "${name}" must have a repos array of "owner/name" strings`
      );
    }
    return { name, repos: repos.map((repo) => repo.trim()) };
  });

  validateProducts(products);
  return products;
}

export function loadProducts(path: string): ProductDefinition[] {
  let text: string;
  try {
    text = readFileSync(path, "utf8");
  } catch (error) {
    throw new ConfigurationError(
      `Could not read product config ${path}: ${String(error)}`
    );
  }

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    throw new ConfigurationError(
      `Product config ${path} is not valid JSON: ${String(error)}`
    );
  }

  return parseProducts(raw);
}

function parsePositiveInteger(
  value: string | undefined,
  label: string
): number | undefined {
  if (value === undefined || value === "") return undefined;
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new ConfigurationError(`${label} must be a positive integer, got "${value}"`);
  }
  return parsed;
}

function parseFrequency(value: string | undefined): Frequency {
  const frequency = value ?? "weekly";
  if (frequency !== "daily" && frequency !== "weekly") {
    throw new ConfigurationError(
      `Unknown frequency "${frequency}". Expected daily or weekly`
    );
  }
  return frequency;
}

function parseMode(value: string | undefined): DraftMode {
  const mode = value ?? "posts";
  if (mode !== "posts" && mode !== "summary") {
    throw new ConfigurationError(`Unknown mode "${mode}". Expected posts or summary`);
  }
  return mode;
}

export function loadConfig(
  overrides: CliOverrides = {},
  env: NodeJS.ProcessEnv = process.env
): Config {
  const githubToken = overrides.githubToken || env.GITHUB_TOKEN;
  if (!githubToken) {
    throw new ConfigurationError(
      "GITHUB_TOKEN is required. Set it in .env or pass --github-token"
    );
  }

  const dryRun = overrides.dryRun ?? false;
  const openaiApiKey = env.OPENAI_API_KEY || undefined;
  if (!dryRun && !openaiApiKey) {
    throw new ConfigurationError(
      "OPENAI_API_KEY is required unless --dry-run is set"
    );
  }

  const frequency = parseFrequency(overrides.frequency);
  const lookbackDays =
    parsePositiveInteger(overrides.lookbackDays, "--lookback-days") ??
    LOOKBACK_DAYS[frequency];

  const productsFile = resolve(
    overrides.productsFile || env.PRODUCTS_FILE || "products.json"
  );

  return {
    githubToken,
    openaiApiKey,
    openaiModel: env.OPENAI_MODEL || "gpt-4o-mini",
    openaiBaseUrl: env.OPENAI_BASE_URL || undefined,
    organization: env.DIGEST_ORGANIZATION || "the team",
    products: loadProducts(productsFile),
    frequency,
    lookbackDays,
    timezone: env.DIGEST_TIMEZONE || "Europe/London",
    concurrency:
      parsePositiveInteger(env.DIGEST_CONCURRENCY, "DIGEST_CONCURRENCY") ?? 4,
    timeoutMs:
      parsePositiveInteger(env.DIGEST_TIMEOUT_MS, "DIGEST_TIMEOUT_MS") ?? 300_000,
    mode: parseMode(overrides.mode),
    outputFile: overrides.output || undefined,
    dryRun,
  };
}
