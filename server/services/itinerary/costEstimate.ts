import type { ActivityType, CostEstimate, JsonObject, JsonValue } from "./types";

export const RESTAURANT_FALLBACK_COST: CostEstimate = { label: "人均50-150元（估算）", amount: 50 };
export const SPOT_FALLBACK_COST: CostEstimate = { label: "门票以景区公示为准", amount: null };

const TICKET_FIELDS = ["ticket_price", "ticket", "price", "cost"] as const;
const FIRST_NUMBER = /\d+(?:\.\d+)?/;
const FREE_TEXT = /免费|free/i;

/** First number in a price text ("人均80-120" → 80); free entry → 0. */
export function extractAmount(text: string): number | null {
  const match = text.match(FIRST_NUMBER);
  if (match) return Number.parseFloat(match[0]);
  return FREE_TEXT.test(text) ? 0 : null;
}

function fromPriceValue(value: JsonValue | undefined, numericLabel: (amount: number) => string): CostEstimate | null {
  if (typeof value === "number" && Number.isFinite(value)) {
    return { label: numericLabel(value), amount: value };
  }
  if (typeof value === "string" && value.trim()) {
    const label = value.trim();
    return { label, amount: extractAmount(label) };
  }
  return null;
}

export function estimateCost(activity: JsonObject, type: ActivityType): CostEstimate {
  if (type === "restaurant") {
    return fromPriceValue(activity.price_range, (n) => `人均${n}元`) ?? RESTAURANT_FALLBACK_COST;
  }

  for (const field of TICKET_FIELDS) {
    const estimate = fromPriceValue(activity[field], (n) => `门票${n}元`);
    if (estimate) return estimate;
  }
  return SPOT_FALLBACK_COST;
}
