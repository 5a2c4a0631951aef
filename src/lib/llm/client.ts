import Anthropic from "@anthropic-ai/sdk";
import { fetch as undiciFetch } from "undici";
import { z } from "zod";
import { LlmProvider, config } from "../config";
import type { TextGenerator } from "./types";

export interface TextGeneratorSettings {
  provider: LlmProvider;
  model: string;
  endpoint: string;
  apiKey: string;
  timeoutMs: number;
  enabled: boolean;
}

export function textGeneratorSettings(): TextGeneratorSettings {
  return {
    provider: config.llmProvider,
    model: config.llmModel,
    endpoint: config.llmEndpoint,
    apiKey: config.anthropicApiKey,
    timeoutMs: config.llmTimeoutMs,
    enabled: config.llmAnalysisEnabled,
  };
}

let client: Anthropic | null = null;
let clientKey = "";

function getClient(apiKey: string, timeoutMs: number): Anthropic | null {
  if (!apiKey) return null;
  if (!client || clientKey !== apiKey) {
    // One attempt per call: the analyst owns the retry policy.
    client = new Anthropic({ apiKey, maxRetries: 0, timeout: timeoutMs });
    clientKey = apiKey;
  }
  return client;
}

export function anthropicGenerator(settings: TextGeneratorSettings): TextGenerator | null {
  const anthropic = getClient(settings.apiKey, settings.timeoutMs);
  if (!anthropic) return null;

  return async (prompt) => {
    try {
      const response = await anthropic.messages.create({
        model: settings.model,
        max_tokens: 4096,
        temperature: 0.1,
        messages: [{ role: "user", content: prompt }],
      });
      return response.content
        .filter((block): block is Anthropic.TextBlock => block.type === "text")
        .map((block) => block.text)
        .join("");
    } catch (error) {
      console.error(`[llm] Anthropic request failed:`, error);
      return null;
    }
  };
}

const ollamaReplySchema = z.object({ response: z.string() });

export function ollamaGenerator(settings: TextGeneratorSettings): TextGenerator {
  return async (prompt) => {
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), settings.timeoutMs);
    try {
      const response = await undiciFetch(settings.endpoint, {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body: JSON.stringify({
          model: settings.model,
          prompt,
          stream: false,
          options: { temperature: 0.1 },
        }),
        signal: controller.signal,
      });
      if (!response.ok) {
        console.error(`[llm] ${settings.endpoint} returned HTTP ${response.status}`);
        return null;
      }
      const parsed = ollamaReplySchema.safeParse(await response.json());
      if (!parsed.success) {
        console.error(`[llm] Unexpected reply shape from ${settings.endpoint}`);
        return null;
      }
      return parsed.data.response;
    } catch (error) {
      if (error instanceof Error && error.name === "AbortError") {
        console.error(`[llm] Request to ${settings.endpoint} timed out after ${settings.timeoutMs}ms`);
      } else {
        console.error(`[llm] Cannot reach ${settings.endpoint}:`, error);
      }
      return null;
    } finally {
      clearTimeout(timeout);
    }
  };
}

/** The configured generator, or `null` when model analysis is disabled or unconfigured. */
export function createTextGenerator(settings: TextGeneratorSettings = textGeneratorSettings()): TextGenerator | null {
  if (!settings.enabled) return null;
  if (settings.provider === "ollama") return ollamaGenerator(settings);
  const generator = anthropicGenerator(settings);
  if (!generator) console.warn("[llm] ANTHROPIC_API_KEY is not set; model analysis disabled");
  return generator;
}
