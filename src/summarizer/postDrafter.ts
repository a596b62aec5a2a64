import OpenAI from "openai";
import { promises as fs } from "node:fs";
import { join, dirname } from "path";
import { fileURLToPath } from "url";
import type { DraftMode } from "../config.js";
import { SummarizerError } from "../errors.js";
import { withRetry } from "../utils/retry.js";

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

export const MAX_POST_LENGTH = 280;
export const MAX_THREAD_POSTS = 3;

export interface SummarizeOptions {
  maxPosts?: number;
  maxPostLength?: number;
}

// String in, string out, may fail.
export interface Summarizer {
  summarize(digest: string, options?: SummarizeOptions): Promise<string>;
}

export type ChatMessage = OpenAI.Chat.ChatCompletionMessageParam;

export interface ChatRequest {
  model: string;
  messages: ChatMessage[];
  temperature: number;
}

export interface ChatClient {
  complete(request: ChatRequest): Promise<string | null>;
}

export function createOpenAIChatClient(apiKey: string, baseURL?: string): ChatClient {
  const openai = new OpenAI({ apiKey, baseURL });
  return {
    async complete(request) {
      const completion = await openai.chat.completions.create(request);
      return completion.choices[0]?.message?.content ?? null;
    },
  };
}

function isTransient(error: unknown): boolean {
  if (error instanceof OpenAI.APIConnectionError) return true;
  if (error instanceof OpenAI.APIError) {
    const status = error.status ?? 0;
    return status === 429 || status >= 500;
  }
  return false;
}

const PROMPT_FILES: Record<DraftMode, string> = {
  posts: "x-posts-prompt.md",
  summary: "change-summary-prompt.md",
};

const INSTRUCTIONS: Record<DraftMode, string> = {
  posts: "Draft holistic X posts for each product that has notable updates.",
  summary: "Summarize the notable changes per product so a human can draft X posts.",
};

async function loadPrompt(name: string): Promise<string> {
  const promptPath = join(__dirname, "..", "..", "prompts", name);
  return fs.readFile(promptPath, "utf8");
}

export interface PostDrafterOptions {
  client: ChatClient;
  model: string;
  organization: string;
  mode: DraftMode;
  temperature?: number;
  retryBaseDelayMs?: number;
}

export class PostDrafter implements Summarizer {
  constructor(private readonly options: PostDrafterOptions) {}

  async buildSystemPrompt(options: SummarizeOptions = {}): Promise<string> {
    const template = await loadPrompt(PROMPT_FILES[this.options.mode]);
    return template
      .replaceAll("{{ORGANIZATION}}", this.options.organization)
      .replaceAll("{{MAX_POST_LENGTH}}", String(options.maxPostLength ?? MAX_POST_LENGTH))
      .replaceAll("{{MAX_THREAD_POSTS}}", String(options.maxPosts ?? MAX_THREAD_POSTS));
  }

  buildUserPrompt(digest: string): string {
    return (
      `Here are the recent GitHub changes for ${this.options.organization}, grouped by product.\n` +
      `${INSTRUCTIONS[this.options.mode]}\n\n` +
      digest
    );
  }

  async summarize(digest: string, options: SummarizeOptions = {}): Promise<string> {
    const systemPrompt = await this.buildSystemPrompt(options);
    const request: ChatRequest = {
      model: this.options.model,
      messages: [
        { role: "system", content: systemPrompt },
        { role: "user", content: this.buildUserPrompt(digest) },
      ],
      temperature: this.options.temperature ?? 0.7,
    };

    let content: string | null;
    try {
      content = await withRetry(() => this.options.client.complete(request), {
        attempts: 3,
        baseDelayMs: this.options.retryBaseDelayMs ?? 2000,
        isRetryable: isTransient,
        onRetry: (error, attempt, delay) =>
          console.error(`   ⏳ Summarizer retry ${attempt} after ${delay}ms (${String(error)})`),
      });
    } catch (error) {
      throw new SummarizerError(
        `Summarizer call failed: ${error instanceof Error ? error.message : String(error)}`,
        digest,
        { cause: error }
      );
    }

    if (!content || content.trim().length === 0) {
      throw new SummarizerError("Summarizer returned an empty response", digest);
    }
    return content.trim();
  }
}
