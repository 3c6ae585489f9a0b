import type { z } from 'zod';
import { GenerationError } from '../utils/error-handler.js';

/**
 * Strip markdown fences and surrounding prose from a model's JSON answer
 */
export function extractJSON(response: string): string {
  let content = response.trim();

  if (content.startsWith('```json')) {
    content = content.slice(7);
  } else if (content.startsWith('```')) {
    content = content.slice(3);
  }
  if (content.endsWith('```')) {
    content = content.slice(0, -3);
  }
  content = content.trim();

  if (!content.startsWith('{') && !content.startsWith('[')) {
    const objectStart = content.indexOf('{');
    const arrayStart = content.indexOf('[');
    const start = objectStart >= 0 ? objectStart : arrayStart;
    if (start >= 0) content = content.slice(start);
  }

  if (!content.endsWith('}') && !content.endsWith(']')) {
    const objectEnd = content.lastIndexOf('}');
    const arrayEnd = content.lastIndexOf(']');
    const end = objectEnd >= 0 ? objectEnd : arrayEnd;
    if (end >= 0) content = content.slice(0, end + 1);
  }

  return content.trim();
}

/**
 * Parse a model response and validate it against a schema
 */
export function decodeStructured<T>(response: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>): T {
  const json = extractJSON(response);
  if (json.length === 0) {
    throw new GenerationError(`No JSON content found in response (${response.length} characters)`);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(json);
  } catch (error) {
    const preview = json.length > 200 ? `${json.slice(0, 200)}...` : json;
    throw new GenerationError(`Response is not valid JSON. Preview: ${preview}`, { cause: error });
  }

  const result = schema.safeParse(parsed);
  if (!result.success) {
    throw new GenerationError(`Response does not match the expected shape: ${result.error.message}`, {
      cause: result.error
    });
  }
  return result.data;
}
