import { LLMResponseParseError } from "../errors.js";

const FENCE_PATTERN = /```(?:json)?\s*([\s\S]*?)```/i;

/**
 * Parse the JSON payload of a model response. Accepts bare JSON, JSON inside
 * a ``` fence, or JSON surrounded by prose (first opening bracket to the last
 * matching closing bracket).
 */
export function parseJsonResponse(text: string): unknown {
  const fenced = FENCE_PATTERN.exec(text);
  const candidate = (fenced?.[1] ?? text).trim();

  try {
    return JSON.parse(candidate);
  } catch {
    // fall through to bracket scan
  }

  const start = candidate.search(/[[{]/);
  if (start !== -1) {
    const close = candidate[start] === "[" ? "]" : "}";
    const end = candidate.lastIndexOf(close);
    if (end > start) {
      try {
        return JSON.parse(candidate.slice(start, end + 1));
      } catch {
        // reported below
      }
    }
  }

  throw new LLMResponseParseError("Model response is not valid JSON", text);
}
