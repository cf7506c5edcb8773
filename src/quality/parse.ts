/**
 * JSON extraction from model output
 *
 * Models asked for bare JSON still wrap it in markdown fences or prose now and
 * then. Parsing tries three strategies in order and stops at the first that
 * yields a JSON object:
 *
 * 1. `direct`   - the whole text
 * 2. `fenced`   - the text with markdown code-fence markers removed
 * 3. `embedded` - the span from the first `{` to the last `}`
 */

export type ParseStrategy = "direct" | "fenced" | "embedded";

export type ParseOutcome =
  | { kind: "ok"; value: Record<string, unknown>; strategy: ParseStrategy }
  | { kind: "empty" }
  | { kind: "malformed"; reason: string };

const FENCE_MARKER = /```[a-zA-Z]*/g;

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function tryParseObject(text: string): Record<string, unknown> | null {
  let decoded: unknown;
  try {
    decoded = JSON.parse(text);
  } catch {
    return null;
  }
  return isRecord(decoded) ? decoded : null;
}

/**
 * Remove markdown code-fence markers such as ```json and ```
 */
export function stripCodeFences(text: string): string {
  return text.replace(FENCE_MARKER, "").trim();
}

/**
 * The first-brace-to-last-brace span of `text`, or null if there is none
 */
export function findEmbeddedObject(text: string): string | null {
  const start = text.indexOf("{");
  const end = text.lastIndexOf("}");
  if (start === -1 || end <= start) {
    return null;
  }
  return text.slice(start, end + 1);
}

/**
 * Parse model output into a JSON object
 */
export function parseModelJson(text: string): ParseOutcome {
  const trimmed = text.trim();
  if (trimmed === "") {
    return { kind: "empty" };
  }

  const direct = tryParseObject(trimmed);
  if (direct) {
    return { kind: "ok", value: direct, strategy: "direct" };
  }

  const unfenced = stripCodeFences(trimmed);
  const fenced = tryParseObject(unfenced);
  if (fenced) {
    return { kind: "ok", value: fenced, strategy: "fenced" };
  }

  const candidate = findEmbeddedObject(unfenced);
  if (candidate === null) {
    return { kind: "malformed", reason: "No JSON object found in model output" };
  }

  const embedded = tryParseObject(candidate);
  if (embedded) {
    return { kind: "ok", value: embedded, strategy: "embedded" };
  }

  return { kind: "malformed", reason: "Embedded JSON object could not be parsed" };
}
