/**
 * Itinerary response parser
 *
 * Models the model's reply as free text that should contain one JSON object.
 * Strategies run in priority order and each returns a Result; the first `ok`
 * wins. When every strategy fails a default itinerary (one empty day per trip
 * day) is returned, so callers always receive an object.
 */

import { dayKey, isJsonObject, type JsonObject, type JsonValue, type ParsedItinerary } from "./types";

// ============================================================================
// TYPES
// ============================================================================

export type ParseStrategyName = "whole_text" | "embedded_object" | "outer_braces";

export interface ParseFailure {
  strategy: ParseStrategyName;
  reason: string;
}

export type ParseResult =
  | { ok: true; value: ParsedItinerary; strategy: ParseStrategyName }
  | { ok: false; failure: ParseFailure };

export interface ParseOutcome {
  itinerary: ParsedItinerary;
  /** null when the default itinerary was synthesized */
  strategy: ParseStrategyName | null;
  failures: ParseFailure[];
}

type JsonDecodeResult = { ok: true; value: JsonValue } | { ok: false; reason: string };

// ============================================================================
// HELPERS
// ============================================================================

const LEADING_FENCE = /^\s*```(?:json)?\s*/i;
const TRAILING_FENCE = /\s*```\s*$/;

export function stripCodeFences(text: string): string {
  if (!text) return text;
  return text.replace(LEADING_FENCE, "").replace(TRAILING_FENCE, "").trim();
}

function decodeJson(text: string): JsonDecodeResult {
  try {
    const value: JsonValue = JSON.parse(text);
    return { ok: true, value };
  } catch (error) {
    return { ok: false, reason: error instanceof Error ? error.message : String(error) };
  }
}

/**
 * Index just past the JSON container that opens at `start`, or -1 when it never closes.
 * String literals (and their escapes) are skipped so braces inside them do not count.
 */
export function findJsonValueEnd(text: string, start: number): number {
  let depth = 0;
  let inString = false;
  let escaped = false;

  for (let i = start; i < text.length; i++) {
    const ch = text[i];

    if (inString) {
      if (escaped) {
        escaped = false;
      } else if (ch === "\\") {
        escaped = true;
      } else if (ch === '"') {
        inString = false;
      }
      continue;
    }

    if (ch === '"') {
      inString = true;
    } else if (ch === "{" || ch === "[") {
      depth++;
    } else if (ch === "}" || ch === "]") {
      depth--;
      if (depth === 0) return i + 1;
      if (depth < 0) return -1;
    }
  }

  return -1;
}

// ============================================================================
// STRATEGIES
// ============================================================================

function parseWholeText(raw: string): ParseResult {
  const decoded = decodeJson(raw);
  if (!decoded.ok) {
    return { ok: false, failure: { strategy: "whole_text", reason: decoded.reason } };
  }
  if (!isJsonObject(decoded.value)) {
    return { ok: false, failure: { strategy: "whole_text", reason: "top-level JSON value is not an object" } };
  }
  return { ok: true, value: decoded.value, strategy: "whole_text" };
}

function parseEmbeddedObject(raw: string): ParseResult {
  let start = raw.indexOf("{");
  let attempts = 0;

  while (start !== -1) {
    attempts++;
    const end = findJsonValueEnd(raw, start);
    if (end !== -1) {
      const decoded = decodeJson(raw.slice(start, end));
      if (decoded.ok && isJsonObject(decoded.value)) {
        return { ok: true, value: decoded.value, strategy: "embedded_object" };
      }
    }
    start = raw.indexOf("{", start + 1);
  }

  return {
    ok: false,
    failure: {
      strategy: "embedded_object",
      reason: attempts === 0 ? "no '{' in response" : `no complete object at any of ${attempts} candidate positions`,
    },
  };
}

function parseOuterBraces(raw: string): ParseResult {
  const first = raw.indexOf("{");
  const last = raw.lastIndexOf("}");
  if (first === -1 || last <= first) {
    return { ok: false, failure: { strategy: "outer_braces", reason: "no brace pair" } };
  }

  const decoded = decodeJson(raw.slice(first, last + 1));
  if (!decoded.ok) {
    return { ok: false, failure: { strategy: "outer_braces", reason: decoded.reason } };
  }
  if (!isJsonObject(decoded.value)) {
    return { ok: false, failure: { strategy: "outer_braces", reason: "braced span is not an object" } };
  }
  return { ok: true, value: decoded.value, strategy: "outer_braces" };
}

const STRATEGIES: ReadonlyArray<(raw: string) => ParseResult> = [
  parseWholeText,
  parseEmbeddedObject,
  parseOuterBraces,
];

// ============================================================================
// PUBLIC API
// ============================================================================

export function buildDefaultItinerary(days: number): ParsedItinerary {
  const itinerary: JsonObject = {};
  for (let day = 1; day <= days; day++) {
    itinerary[dayKey(day)] = {
      theme: `第${day}天行程`,
      schedule: { morning: [], afternoon: [], evening: [] },
      tips: "",
    };
  }
  return itinerary;
}

export function parseItineraryResponseDetailed(responseText: string | null | undefined, days: number): ParseOutcome {
  const raw = stripCodeFences((responseText ?? "").trim());
  const failures: ParseFailure[] = [];

  for (const strategy of STRATEGIES) {
    const result = strategy(raw);
    if (result.ok) {
      return { itinerary: result.value, strategy: result.strategy, failures };
    }
    failures.push(result.failure);
  }

  console.warn(
    `[ItineraryParser] Falling back to default itinerary (${days} days): ` +
      failures.map((f) => `${f.strategy}: ${f.reason}`).join("; ")
  );
  return { itinerary: buildDefaultItinerary(days), strategy: null, failures };
}

/**
 * Best-effort extraction of the itinerary object from a model reply.
 */
export function parseItineraryResponse(responseText: string | null | undefined, days: number): ParsedItinerary {
  return parseItineraryResponseDetailed(responseText, days).itinerary;
}
