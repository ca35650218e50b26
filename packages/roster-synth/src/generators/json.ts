/**
 * JSON extraction from model responses
 */

import { OutputError } from '../types.js';

/**
 * Whether the text ends inside an unterminated string, object or array.
 */
export function looksTruncated(text: string): boolean {
  let depth = 0;
  let inString = false;
  let escaped = false;

  for (const char of text) {
    if (inString) {
      if (escaped) escaped = false;
      else if (char === '\\') escaped = true;
      else if (char === '"') inString = false;
      continue;
    }
    if (char === '"') inString = true;
    else if (char === '{' || char === '[') depth++;
    else if (char === '}' || char === ']') depth--;
  }

  return inString || depth > 0;
}

/**
 * Parse the single JSON document of a response. Markdown code fences are
 * tolerated; anything else that does not parse is rejected.
 */
export function extractJson(response: string): unknown {
  let text = response.trim();
  const fenced = text.match(/^```(?:json)?\s*([\s\S]*?)\s*(?:```)?$/);
  if (fenced) {
    text = (fenced[1] ?? '').trim();
  }

  if (text.length === 0) {
    throw new OutputError('Model returned an empty response', 'MALFORMED_OUTPUT');
  }

  try {
    return JSON.parse(text);
  } catch (error) {
    const preview = text.substring(0, 200);
    if (looksTruncated(text)) {
      throw new OutputError('Model response ends mid-document', 'TRUNCATED_OUTPUT', {
        preview,
        length: text.length
      });
    }
    const errorMessage = error instanceof Error ? error.message : 'Unknown error';
    throw new OutputError(`Failed to parse model response as JSON: ${errorMessage}`, 'MALFORMED_OUTPUT', {
      preview
    });
  }
}
