import { z } from "zod";
import { ConfidenceTuning, config } from "../config";
import { overlayConfig } from "../configs/merge";
import { ConfigLayer, MergedConfig, fieldConfigSchema } from "../configs/schema";
import { PipelineError, pipelineError } from "../errors";
import { PageElement, loadDocument } from "../extraction/dom";
import { parseJsonReply } from "../llm/json-repair";
import { buildRefinementPrompt } from "../llm/prompts";
import type { TextGenerator } from "../llm/types";
import { Result, err, ok } from "../result";
import { guessCards, matchConfiguredCards, safeFindAll } from "./heuristics";

export interface ValidationResult {
  dealersFound: boolean;
  confidence: number;
  needsRefinement: boolean;
  suggestedSelectors?: { dealer_cards: string[] };
  dealerCount: number;
  matchedSelector?: string;
  notes: string;
}

export type ResolutionState = "validated" | "heuristic_refined" | "model_refined" | "unresolved" | "skipped";

export interface Resolution {
  state: ResolutionState;
  config: MergedConfig;
  confidence: number;
  validation: ValidationResult | null;
}

const SNIPPET_PATTERNS = ['[class*="dealer"]', '[class*="location"]', '[class*="result"]'];
const SNIPPETS_PER_PATTERN = 2;
const MAX_SNIPPETS = 5;
const SNIPPET_LENGTH = 500;
const PAGE_TEXT_LENGTH = 8000;

const refinementReplySchema = z.object({
  dealers_found: z.boolean(),
  dealer_cards_selector: z.string().trim().min(1).nullable().optional(),
  data_fields: z.record(z.string(), fieldConfigSchema.catch({})).optional().catch(undefined),
  confidence: z.number().min(0).max(1).optional().catch(undefined),
  notes: z.string().optional().catch(undefined),
});

export interface PostSearchValidatorOptions {
  generate: TextGenerator | null;
  tuning?: ConfidenceTuning;
}

/**
 * Checks a config's card selectors against the HTML a search actually
 * produced and repairs them when they match nothing.
 */
export class PostSearchValidator {
  private readonly generate: TextGenerator | null;
  private readonly tuning: ConfidenceTuning;

  constructor(options: PostSearchValidatorOptions) {
    this.generate = options.generate;
    this.tuning = options.tuning ?? config.confidence;
  }

  validate(html: string, url: string, mergedConfig: MergedConfig): ValidationResult {
    const root = loadDocument(html);
    const configured = mergedConfig.selectors?.dealer_cards ?? [];

    const matched = matchConfiguredCards(root, configured);
    if (matched) {
      console.log(`[validator] ${url}: ${matched.count} cards with configured selector ${matched.selector}`);
      return {
        dealersFound: true,
        confidence: this.tuning.selectorsMatched,
        needsRefinement: false,
        dealerCount: matched.count,
        matchedSelector: matched.selector,
        notes: `Found ${matched.count} cards with ${matched.selector}`,
      };
    }

    console.log(`[validator] ${url}: configured card selectors matched nothing; trying generic patterns`);
    const guess = guessCards(root, this.tuning);
    if (guess) {
      const count = guess.elements.length;
      console.log(`[validator] ${url}: ${count} cards with generic pattern ${guess.selector}`);
      return {
        dealersFound: true,
        confidence: guess.confidence,
        needsRefinement: true,
        suggestedSelectors: { dealer_cards: [guess.selector] },
        dealerCount: count,
        notes: `Found ${count} cards using heuristic pattern ${guess.selector}`,
      };
    }

    return {
      dealersFound: false,
      confidence: this.tuning.unresolved,
      needsRefinement: true,
      dealerCount: 0,
      notes: "No result cards detected in HTML",
    };
  }

  /** Apply the heuristic suggestion, if any, and stamp validation provenance. */
  refine(validation: ValidationResult, mergedConfig: MergedConfig): MergedConfig {
    if (!validation.needsRefinement) return mergedConfig;
    if (!validation.suggestedSelectors) {
      console.warn("[validator] Refinement needed but there is no suggestion");
      return mergedConfig;
    }

    console.log(`[validator] Refining card selectors to ${validation.suggestedSelectors.dealer_cards.join(", ")}`);
    return overlayConfig(mergedConfig, {
      selectors: { dealer_cards: [...validation.suggestedSelectors.dealer_cards] },
      metadata: {
        post_search_validated: true,
        validation_confidence: validation.confidence,
        dealer_count: validation.dealerCount,
        validation_notes: validation.notes,
      },
    });
  }

  /**
   * Ask the model for the card selector and field map, showing it samples of
   * likely cards and the page text. Accepted only when the model reports that
   * results are present and its selector matches something in the page.
   */
  async refineWithModel(
    html: string,
    url: string,
    mergedConfig: MergedConfig
  ): Promise<Result<MergedConfig, PipelineError>> {
    if (!this.generate) return err(pipelineError("disabled", "Model refinement is disabled"));

    const root = loadDocument(html);
    const prompt = buildRefinementPrompt(sampleSnippets(root), root.text().slice(0, PAGE_TEXT_LENGTH), url);

    let reply: string | null;
    try {
      reply = await this.generate(prompt);
    } catch (error) {
      console.error("[validator] Text generation failed:", error);
      reply = null;
    }
    if (reply === null) return err(pipelineError("network", "Text generation service returned no reply"));

    const json = parseJsonReply(reply);
    if (!json.ok) return err(json.error);

    const parsed = refinementReplySchema.safeParse(json.value);
    if (!parsed.success) return err(pipelineError("parse", "Refinement reply has an unexpected shape"));
    const answer = parsed.data;
    if (!answer.dealers_found || !answer.dealer_cards_selector) {
      return err(pipelineError("validation", "Model found no result cards"));
    }

    const selector = answer.dealer_cards_selector;
    const count = safeFindAll(root, selector).length;
    if (count === 0) {
      return err(pipelineError("validation", `Model selector ${selector} matches nothing in the page`));
    }

    const override: ConfigLayer = {
      selectors: { dealer_cards: [selector] },
      metadata: {
        post_search_validated: true,
        llm_refined: true,
        ...(answer.confidence === undefined ? {} : { validation_confidence: answer.confidence }),
        dealer_count: count,
        validation_notes: answer.notes ?? "",
      },
    };
    if (answer.data_fields) override.data_fields = answer.data_fields;

    console.log(`[validator] Model refined card selector for ${url} to ${selector} (${count} cards)`);
    return ok(overlayConfig(mergedConfig, override));
  }

  /**
   * Run validation and whatever refinement it calls for, returning the
   * config to extract with. Never fails: the worst case keeps the input
   * config at the unresolved confidence.
   */
  async resolve(html: string, url: string, mergedConfig: MergedConfig): Promise<Resolution> {
    if (mergedConfig.post_search_validation?.enabled === false) {
      console.log(`[validator] Post-search validation disabled for ${url}`);
      return {
        state: "skipped",
        config: mergedConfig,
        confidence: mergedConfig.confidence ?? this.tuning.selectorsMatched,
        validation: null,
      };
    }

    const validation = this.validate(html, url, mergedConfig);
    if (!validation.needsRefinement) {
      return { state: "validated", config: mergedConfig, confidence: validation.confidence, validation };
    }

    if (validation.suggestedSelectors && validation.confidence >= this.tuning.refinementThreshold) {
      return {
        state: "heuristic_refined",
        config: this.refine(validation, mergedConfig),
        confidence: validation.confidence,
        validation,
      };
    }

    const modelRefined = await this.refineWithModel(html, url, mergedConfig);
    if (modelRefined.ok) {
      return {
        state: "model_refined",
        config: modelRefined.value,
        confidence: modelRefined.value.metadata?.validation_confidence ?? validation.confidence,
        validation,
      };
    }
    console.warn(`[validator] Model refinement for ${url} failed (${modelRefined.error.kind}): ${modelRefined.error.message}`);

    if (validation.suggestedSelectors) {
      console.log(`[validator] Using the heuristic suggestion for ${url} as a best guess`);
      return {
        state: "heuristic_refined",
        config: this.refine(validation, mergedConfig),
        confidence: validation.confidence,
        validation,
      };
    }

    console.warn(`[validator] Could not resolve card selectors for ${url}; continuing unresolved`);
    return { state: "unresolved", config: mergedConfig, confidence: this.tuning.unresolved, validation };
  }
}

function sampleSnippets(root: PageElement): string[] {
  const snippets: string[] = [];
  for (const pattern of SNIPPET_PATTERNS) {
    for (const el of safeFindAll(root, pattern).slice(0, SNIPPETS_PER_PATTERN)) {
      snippets.push(el.html().slice(0, SNIPPET_LENGTH));
    }
  }
  return snippets.slice(0, MAX_SNIPPETS);
}
