import { PipelineError, pipelineError } from "../errors";
import { Result, err, ok } from "../result";
import { JsonObject, isJsonObject } from "../storage/json-files";

const CLOSER_FOR: Record<string, string> = { "{": "}", "[": "]" };
const CLOSERS = new Set(["}", "]", ")"]);

export function stripCodeFences(text: string): string {
  return text.replace(/```[A-Za-z]*[ \t]*\r?\n?/g, "").trim();
}

/**
 * First balanced `{...}` span, ignoring braces inside string literals. A reply
 * cut off before the object closes yields everything from the first `{`, so
 * that bracket repair can close it.
 */
export function extractJsonObject(text: string): string | null {
  const start = text.indexOf("{");
  if (start === -1) return null;

  let depth = 0;
  let inString = false;
  let escaped = false;

  for (let i = start; i < text.length; i++) {
    const ch = text[i];
    if (inString) {
      if (escaped) escaped = false;
      else if (ch === "\\") escaped = true;
      else if (ch === '"') inString = false;
      continue;
    }
    if (ch === '"') inString = true;
    else if (ch === "{") depth++;
    else if (ch === "}") {
      depth--;
      if (depth === 0) return text.slice(start, i + 1);
    }
  }
  return text.slice(start);
}

/**
 * Stack-based repair of bracket kinds. A closer that does not match the most
 * recent opener (`)` or `}` where a list was opened, `]` or `)` where an
 * object was opened) is replaced by the expected one. Stray closers with
 * nothing open are dropped. An unterminated string and any brackets still
 * open at the end are closed.
 */
export function repairBracketMismatches(text: string): string {
  const expected: string[] = [];
  let out = "";
  let inString = false;
  let escaped = false;

  for (const ch of text) {
    if (inString) {
      out += ch;
      if (escaped) escaped = false;
      else if (ch === "\\") escaped = true;
      else if (ch === '"') inString = false;
      continue;
    }

    if (ch === '"') {
      inString = true;
      out += ch;
    } else if (ch in CLOSER_FOR) {
      expected.push(CLOSER_FOR[ch]);
      out += ch;
    } else if (CLOSERS.has(ch)) {
      const closer = expected.pop();
      if (closer !== undefined) out += closer;
    } else {
      out += ch;
    }
  }

  if (inString) out = (escaped ? out.slice(0, -1) : out) + '"';
  while (expected.length > 0) out += expected.pop();
  return out;
}

/** Drop commas that directly precede `}` or `]` outside string literals. */
export function removeTrailingCommas(text: string): string {
  let out = "";
  let inString = false;
  let escaped = false;

  for (let i = 0; i < text.length; i++) {
    const ch = text[i];
    if (inString) {
      out += ch;
      if (escaped) escaped = false;
      else if (ch === "\\") escaped = true;
      else if (ch === '"') inString = false;
      continue;
    }
    if (ch === '"') inString = true;
    if (ch === ",") {
      let j = i + 1;
      while (j < text.length && /\s/.test(text[j])) j++;
      if (text[j] === "}" || text[j] === "]") continue;
    }
    out += ch;
  }
  return out;
}

export function repairJson(text: string): string {
  return removeTrailingCommas(repairBracketMismatches(text));
}

/**
 * Parse a model reply that is supposed to hold one JSON object, tolerating
 * prose around it, code fences, trailing commas, mismatched bracket kinds
 * and truncation.
 */
export function parseJsonReply(reply: string): Result<JsonObject, PipelineError> {
  if (!reply.trim()) return err(pipelineError("parse", "Empty model reply"));

  const span = extractJsonObject(stripCodeFences(reply));
  if (span === null) return err(pipelineError("parse", "No JSON object in model reply"));

  let parsed: unknown;
  try {
    parsed = JSON.parse(repairJson(span));
  } catch (error) {
    return err(pipelineError("parse", `Unparsable model reply: ${reply.slice(0, 200)}`, error));
  }

  if (!isJsonObject(parsed)) return err(pipelineError("parse", "Model reply is not a JSON object"));
  return ok(parsed);
}
