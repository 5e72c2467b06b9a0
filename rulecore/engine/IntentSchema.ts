// rulecore/engine/IntentSchema.ts
//
// Intent validation at the engine boundary, plus a tolerant parser for raw
// classifier output (object, JSON text, or JSON wrapped in a code fence).

import { z } from "zod";

import { JsonObjectSchema } from "../state/StateSchemas";
import { formatZodIssues } from "../utils/zodIssues";
import { INTENT_TYPES, type Intent } from "./EngineTypes";

export const IntentSchema: z.ZodType<Intent, z.ZodTypeDef, unknown> = z.object({
  type: z.enum(INTENT_TYPES),
  category: z.string().trim().min(1),
  action: z.string().default(""),
  target: z.string().default(""),
  parameters: JsonObjectSchema.default({}),
  confidence: z.number().min(0).max(1),
});

export type IntentParseResult = { ok: true; intent: Intent } | { ok: false; issues: string[] };

export function validateIntent(value: unknown): IntentParseResult {
  const parsed = IntentSchema.safeParse(value);
  if (!parsed.success) return { ok: false, issues: formatZodIssues(parsed.error) };
  return { ok: true, intent: parsed.data };
}

const FENCE = /```(?:json)?\s*([\s\S]*?)```/i;

/** Pull the JSON body out of classifier text; a fenced block wins over bare text. */
export function extractJsonText(text: string): string {
  const fenced = FENCE.exec(text);
  if (fenced?.[1]) return fenced[1].trim();

  const start = text.indexOf("{");
  const end = text.lastIndexOf("}");
  if (start !== -1 && end > start) return text.slice(start, end + 1);
  return text.trim();
}

/**
 * Accept classifier output in any of the shapes it tends to arrive in and
 * return a validated Intent. Never throws.
 */
export function parseIntentPayload(raw: unknown): IntentParseResult {
  if (typeof raw !== "string") return validateIntent(raw);

  let decoded: unknown;
  try {
    decoded = JSON.parse(extractJsonText(raw));
  } catch (err) {
    return { ok: false, issues: [`payload is not valid JSON: ${err instanceof Error ? err.message : String(err)}`] };
  }
  return validateIntent(decoded);
}

/** Intent with the optional fields filled in. Not validated. */
export function createIntent(fields: Pick<Intent, "category"> & Partial<Intent>): Intent {
  return {
    type: fields.type ?? "Execute",
    category: fields.category,
    action: fields.action ?? fields.category,
    target: fields.target ?? "",
    parameters: fields.parameters ?? {},
    confidence: fields.confidence ?? 1,
  };
}
