import type { z } from 'zod';
import { errorMessage } from '../../utils/errors.js';

export type JsonValidationResult<T> = { success: true; data: T } | { success: false; error: string };

const OPENING_FENCE_RE = /^```(?:json)?\s*/i;
const CLOSING_FENCE_RE = /\s*```$/;
const TRAILING_COMMA_RE = /,\s*([}\]])/g;

export function stripFences(text: string): string {
  return text.trim().replace(OPENING_FENCE_RE, '').replace(CLOSING_FENCE_RE, '').trim();
}

/**
 * Returns the first balanced `{...}` span of the text, or '' when there is none.
 * Braces inside string literals do not count towards depth.
 */
export function extractFirstJsonObject(text: string): string {
  const cleaned = stripFences(text);
  if (!cleaned) {
    return '';
  }
  if (cleaned.startsWith('{') && cleaned.endsWith('}')) {
    return cleaned;
  }

  const start = cleaned.indexOf('{');
  if (start < 0) {
    return '';
  }

  let depth = 0;
  let inString = false;
  let escaped = false;
  for (let index = start; index < cleaned.length; index += 1) {
    const char = cleaned[index];
    if (escaped) {
      escaped = false;
      continue;
    }
    if (char === '\\') {
      escaped = true;
      continue;
    }
    if (char === '"') {
      inString = !inString;
      continue;
    }
    if (inString) continue;

    if (char === '{') {
      depth += 1;
    } else if (char === '}') {
      depth -= 1;
      if (depth === 0) {
        return cleaned.slice(start, index + 1);
      }
    }
  }
  return '';
}

/** Cheap fixes tried before asking the model again. */
export function localJsonRepair(raw: string): string {
  const candidate = extractFirstJsonObject(raw) || stripFences(raw);
  return candidate.replace(TRAILING_COMMA_RE, '$1').trim();
}

export function formatZodIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
    .join('; ');
}

export function validateJsonOutput<T>(
  raw: string,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>
): JsonValidationResult<T> {
  const candidate = extractFirstJsonObject(raw);
  if (!candidate) {
    return { success: false, error: 'No JSON object found in model output.' };
  }

  let data: unknown;
  try {
    data = JSON.parse(candidate);
  } catch (error) {
    return { success: false, error: errorMessage(error) };
  }

  const parsed = schema.safeParse(data);
  if (!parsed.success) {
    return { success: false, error: formatZodIssues(parsed.error) };
  }
  return { success: true, data: parsed.data };
}
