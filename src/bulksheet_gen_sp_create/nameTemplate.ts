import type { MatchType } from "./types";

export const TEMPLATE_TOKENS = {
  sku: "[SKU]",
  matchType: "match_type",
  adType: "SP",
  root: "[Root]",
  keyword: "[KW]",
  adGroup: "AG",
} as const;

export type TemplateToken = (typeof TEMPLATE_TOKENS)[keyof typeof TEMPLATE_TOKENS];

/**
 * Literal example dates offered by the template builder. Each one stands for a
 * format; a template containing it gets the start date in that format.
 */
export const DATE_EXAMPLES = ["250423", "04/23/2025", "23-04-2025", "Apr 23, 2025"] as const;

export type DateExample = (typeof DATE_EXAMPLES)[number];

const MONTH_ABBREVIATIONS = [
  "Jan",
  "Feb",
  "Mar",
  "Apr",
  "May",
  "Jun",
  "Jul",
  "Aug",
  "Sep",
  "Oct",
  "Nov",
  "Dec",
];

type DateParts = { yyyy: string; mm: string; dd: string };

function splitCompactDate(startDate: string): DateParts {
  const match = /^(\d{4})(\d{2})(\d{2})$/.exec(startDate);
  if (!match) {
    throw new Error(`Invalid start date: ${startDate}. Expected YYYYMMDD.`);
  }
  return { yyyy: match[1], mm: match[2], dd: match[3] };
}

export function formatDateExample(example: DateExample, startDate: string): string {
  const { yyyy, mm, dd } = splitCompactDate(startDate);
  switch (example) {
    case "250423":
      return `${dd}${mm}${yyyy.slice(2)}`;
    case "04/23/2025":
      return `${mm}/${dd}/${yyyy}`;
    case "23-04-2025":
      return `${dd}-${mm}-${yyyy}`;
    case "Apr 23, 2025":
      return `${MONTH_ABBREVIATIONS[Number(mm) - 1] ?? mm} ${dd}, ${yyyy}`;
    default: {
      const neverExample: never = example;
      throw new Error(`Unsupported date example: ${String(neverExample)}`);
    }
  }
}

/** Grouped SKUs arrive joined by "_"; show them as `FIRST+<rest count>`. */
export function skuDisplayValue(sku: string): string {
  const parts = sku.split("_");
  if (parts.length > 1) return `${parts[0]}+${parts.length - 1}`;
  return sku;
}

const TOKEN_PATTERN = /\[SKU\]|match_type|\[Root\]|\[KW\]|SP/g;

export function renderNameTemplate(params: {
  template: string;
  sku: string;
  matchType: MatchType;
  startDate: string;
}): string {
  let rendered = params.template;
  for (const example of DATE_EXAMPLES) {
    if (rendered.includes(example)) {
      rendered = rendered.split(example).join(formatDateExample(example, params.startDate));
    }
  }

  const skuDisplay = skuDisplayValue(params.sku);
  return rendered.replace(TOKEN_PATTERN, (token) => {
    if (token === TEMPLATE_TOKENS.sku) return skuDisplay;
    if (token === TEMPLATE_TOKENS.matchType) return params.matchType;
    return token;
  });
}
