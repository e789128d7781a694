export type NormalizedIngredient = {
  raw: string;
  name: string;
  quantity?: number;
  unit?: string;
};

const UNIT_PATTERNS: Array<{ unit: string; re: RegExp }> = [
  { unit: "cup", re: /\d\s*cups?\b/i },
  { unit: "tbsp", re: /\d\s*tbsp\b/i },
  { unit: "tsp", re: /\d\s*tsp\b/i },
  { unit: "oz", re: /\d\s*oz\b/i },
  { unit: "lb", re: /\d\s*lbs?\b/i },
  { unit: "kg", re: /\d\s*kg\b/i },
  { unit: "g", re: /\d\s*g\b/i },
  { unit: "ml", re: /\d\s*ml\b/i },
  { unit: "l", re: /\d\s*l\b/i }
];

const QUANTITY_UNIT_RE = /\d+(?:[.,/]\d+)?\s*(?:cups?|tbsp|tsp|oz|lbs?|kg|g|ml|l)\b/gi;
const MODIFIER_WORDS_RE = /\b(fresh|dried|frozen|canned|organic|raw|cooked)\b/gi;

export function normalizeIngredientName(raw: string): string {
  return String(raw ?? "")
    .toLowerCase()
    .replace(QUANTITY_UNIT_RE, " ")
    .replace(MODIFIER_WORDS_RE, " ")
    .replace(/\s+/g, " ")
    .trim();
}

export function normalizeIngredient(raw: string): NormalizedIngredient {
  const prepared = String(raw ?? "").trim();
  const name = normalizeIngredientName(prepared);

  return {
    raw: prepared,
    name: name || prepared.toLowerCase(),
    quantity: parseQuantity(prepared),
    unit: parseUnit(prepared)
  };
}

function parseQuantity(input: string): number | undefined {
  const match = input.match(/(\d+(?:[.,]\d+)?(?:\s*\/\s*\d+(?:[.,]\d+)?)?)/);
  if (!match?.[1]) {
    return undefined;
  }

  const raw = match[1].replace(",", ".").replace(/\s+/g, "");
  if (raw.includes("/")) {
    const [left, right] = raw.split("/");
    const l = Number(left);
    const r = Number(right);
    if (Number.isFinite(l) && Number.isFinite(r) && r > 0) {
      return round3(l / r);
    }
  }

  const parsed = Number(raw);
  if (!Number.isFinite(parsed)) {
    return undefined;
  }
  return round3(parsed);
}

function parseUnit(input: string): string | undefined {
  for (const pattern of UNIT_PATTERNS) {
    if (pattern.re.test(input)) {
      return pattern.unit;
    }
  }
  return undefined;
}

function round3(value: number): number {
  return Math.round(value * 1000) / 1000;
}
