import { z } from "zod";
import { readBundledJson } from "../../utils/data-file.js";

const IndustryTable = z.object({
  default: z.string(),
  industries: z.array(z.object({ name: z.string(), keywords: z.array(z.string().min(1)).min(1) })),
});

type IndustryTableT = z.infer<typeof IndustryTable>;

let table: IndustryTableT | null = null;

function getTable(): IndustryTableT {
  table ??= IndustryTable.parse(readBundledJson("evaluation/invoker/industry-keywords.json"));
  return table;
}

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/**
 * Infer an industry label from the proposal text. First industry in table
 * order with a whole-word keyword hit wins.
 */
export function detectIndustry(name: string, concept: string): string {
  const { default: fallback, industries } = getTable();
  const text = `${name} ${concept}`.toLowerCase();

  for (const industry of industries) {
    const hit = industry.keywords.some((keyword) =>
      new RegExp(`(^|[^a-z0-9])${escapeRegExp(keyword.toLowerCase())}($|[^a-z0-9])`).test(text)
    );
    if (hit) {
      return industry.name;
    }
  }
  return fallback;
}
