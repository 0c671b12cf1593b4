import { LlmResponseError, toErrorMessage } from '../lib/errors.js';

/**
 * Pull the JSON object out of a model reply.
 *
 * Takes everything from the first `{` to the last `}` so that prose or
 * code fences around the object are ignored.
 */
export function extractJsonObject(text: string): unknown {
  const start = text.indexOf('{');
  const end = text.lastIndexOf('}');
  if (start < 0 || end < start) {
    throw new LlmResponseError('no-json', 'No valid JSON object found in the LLM response.');
  }

  const candidate = text.slice(start, end + 1);
  try {
    return JSON.parse(candidate);
  } catch (err) {
    throw new LlmResponseError('invalid-json', `Invalid JSON in the LLM response: ${toErrorMessage(err)}`);
  }
}
