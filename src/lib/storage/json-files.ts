import { randomUUID } from "crypto";
import { existsSync, mkdirSync, readFileSync, renameSync, rmSync, writeFileSync } from "fs";
import { dirname } from "path";
import { PipelineError, describeError, pipelineError } from "../errors";
import { Result, err, ok } from "../result";

export type JsonObject = { [key: string]: unknown };

export function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Read and parse a JSON object file. A missing file is `ok(null)`; unreadable
 * or malformed content (including a top-level non-object) is a
 * `config_load` error.
 */
export function readJsonObject(path: string): Result<JsonObject | null, PipelineError> {
  if (!existsSync(path)) return ok(null);

  let raw: string;
  try {
    raw = readFileSync(path, "utf-8");
  } catch (error) {
    return err(pipelineError("config_load", `Cannot read ${path}: ${describeError(error)}`, error));
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    return err(pipelineError("config_load", `Malformed JSON in ${path}: ${describeError(error)}`, error));
  }

  if (!isJsonObject(parsed)) {
    return err(pipelineError("config_load", `Expected a JSON object in ${path}`));
  }
  return ok(parsed);
}

/**
 * Write JSON so that concurrent readers see either the previous file or the
 * complete new one: the payload goes to a sibling temp file which is then
 * renamed over the target. Concurrent writers race; the last rename wins.
 */
export function writeJsonAtomic(path: string, data: unknown): void {
  const dir = dirname(path);
  if (!existsSync(dir)) mkdirSync(dir, { recursive: true });

  const tmpPath = `${path}.${process.pid}.${randomUUID()}.tmp`;
  try {
    writeFileSync(tmpPath, JSON.stringify(data, null, 2) + "\n", "utf-8");
    renameSync(tmpPath, path);
  } catch (error) {
    rmSync(tmpPath, { force: true });
    throw error;
  }
}
