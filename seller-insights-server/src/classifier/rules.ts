import { readFileSync, existsSync } from "fs";
import { isAbsolute, resolve } from "path";
import { fileURLToPath } from "url";
import yaml from "js-yaml";
import { z } from "zod";

const keywordList = z.array(z.string().trim().min(1)).min(1);

const rulesSchema = z
  .object({
    goal_keywords: keywordList,
    product_keywords: keywordList,
    insight_keywords: keywordList,
    inventory_keywords: keywordList,
    hardcoded_questions: z.array(
      z.object({
        question: z.string().min(1),
        response: z.string().min(1).optional(),
      })
    ),
    hardcoded_responses: z.record(z.string(), z.string().min(1)),
  })
  .superRefine((rules, ctx) => {
    rules.hardcoded_questions.forEach((entry, i) => {
      if (entry.response !== undefined && !(entry.response in rules.hardcoded_responses)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["hardcoded_questions", i, "response"],
          message: `Unknown response key '${entry.response}'`,
        });
      }
    });
  });

export interface HardcodedEntry {
  /** Normalised question text */
  question: string;
  /** Canned answer; absent means the handler's rephrase prompt */
  response?: string;
}

export interface ClassifierRules {
  goalKeywords: string[];
  productKeywords: string[];
  insightKeywords: string[];
  inventoryKeywords: string[];
  hardcoded: Map<string, HardcodedEntry>;
}

/** Lower-case, trim and collapse internal whitespace */
export function normalizeQuestion(text: string): string {
  return text.toLowerCase().trim().replace(/\s+/g, " ");
}

/** Validate an already-parsed YAML document into rules. */
export function parseClassifierRules(doc: unknown): ClassifierRules {
  const parsed = rulesSchema.safeParse(doc);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ");
    throw new Error(`Invalid classifier rules: ${issues}`);
  }

  const r = parsed.data;
  const hardcoded = new Map<string, HardcodedEntry>();
  for (const entry of r.hardcoded_questions) {
    const question = normalizeQuestion(entry.question);
    hardcoded.set(question, {
      question,
      response: entry.response === undefined ? undefined : r.hardcoded_responses[entry.response],
    });
  }

  return {
    goalKeywords: r.goal_keywords,
    productKeywords: r.product_keywords,
    insightKeywords: r.insight_keywords,
    inventoryKeywords: r.inventory_keywords,
    hardcoded,
  };
}

/** seller-insights-server/, where config/ lives */
export const SERVER_ROOT = fileURLToPath(new URL("../../", import.meta.url));

/**
 * Load classifier rules from YAML. Relative paths resolve against `baseDir`
 * (the server package root by default).
 */
export function loadClassifierRules(path: string, baseDir: string = SERVER_ROOT): ClassifierRules {
  const rulesPath = isAbsolute(path) ? path : resolve(baseDir, path);

  if (!existsSync(rulesPath)) {
    throw new Error(`Classifier rules file not found at: ${rulesPath}`);
  }

  let doc: unknown;
  try {
    doc = yaml.load(readFileSync(rulesPath, "utf8"));
  } catch (error) {
    throw new Error(
      `Failed to load classifier rules: ${error instanceof Error ? error.message : String(error)}`
    );
  }
  return parseClassifierRules(doc);
}
