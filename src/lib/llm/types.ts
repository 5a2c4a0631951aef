import type { FieldConfig, InputField, Interactions, SelectorKind } from "../configs/schema";
import type { Candidate } from "../discovery/scorer";

/**
 * Canonical shape of a structure analysis. Every key is always present:
 * whatever the model left out is filled from the documented defaults.
 */
export interface AnalysisResult {
  selectors: Record<SelectorKind, string[]> & Record<string, string[]>;
  dataFields: Record<string, FieldConfig>;
  interactions: Interactions;
  inputFields: Record<string, InputField>;
  extraction: Record<string, string[]>;
  confidence: number;
  notes: string;
}

export interface LocatorVerdict {
  isLocator: boolean;
  locatorUrl: string | null;
  candidates: Candidate[];
  confidence: number;
  /** How the verdict was reached, for logs and the discovery cache. */
  method: "current_page" | "model_choice" | "heuristic" | "none";
}

/**
 * Opaque text-generation boundary. Resolves to the raw reply, or `null` when
 * the service could not be reached or timed out.
 */
export type TextGenerator = (prompt: string) => Promise<string | null>;
