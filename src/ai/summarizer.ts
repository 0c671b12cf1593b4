/**
 * Event summaries and the daily fact.
 *
 * Failures are returned, not thrown: one bad reply skips one message
 * and the rest of the brief still goes out.
 */
import { z } from 'zod';
import { LlmResponseError, toErrorMessage } from '../lib/errors.js';
import { createLogger } from '../lib/logger.js';
import type { ScrapedEvent } from '../scraper/current-events.js';
import type { ChatModel } from './chat-model.js';
import { extractJsonObject } from './json-extract.js';
import { buildFactPrompt, buildSummaryPrompt } from './prompts.js';

const log = createLogger('summarizer');

const SummaryResponseSchema = z.object({
  summary: z.object({
    title: z.string(),
    section_text: z.string().trim().min(1),
  }),
});

const FactResponseSchema = z.object({
  fact: z.string().trim().min(1),
});

export interface EventSummary {
  title: string;
  sectionText: string;
}

export type SummaryResult = { ok: true; summary: EventSummary } | { ok: false; error: string };

export type FactResult = { ok: true; fact: string } | { ok: false; error: string };

export const INVALID_JSON_ERROR = 'Invalid JSON response';
export const SUMMARY_ERROR = 'Error summarizing event';

export async function summarizeEvent(
  model: ChatModel,
  event: ScrapedEvent,
  options: { temperature?: number } = {}
): Promise<SummaryResult> {
  log.debug(`Summarizing "${event.title}"`);

  try {
    const reply = await model.complete(buildSummaryPrompt(event.title, event.text), options);
    const parsed = SummaryResponseSchema.safeParse(extractJsonObject(reply));
    if (!parsed.success) {
      throw new LlmResponseError('invalid-shape', `Unexpected summary shape: ${parsed.error.issues[0]?.message ?? 'unknown'}`);
    }
    return {
      ok: true,
      summary: {
        title: parsed.data.summary.title.trim() || event.title,
        sectionText: parsed.data.summary.section_text,
      },
    };
  } catch (err) {
    if (err instanceof LlmResponseError && err.kind === 'invalid-json') {
      log.error(`Error parsing JSON response for event: ${event.title}`, { error: err });
      return { ok: false, error: INVALID_JSON_ERROR };
    }
    log.error(`Error in Groq API call for event: ${event.title}`, { error: toErrorMessage(err) });
    return { ok: false, error: SUMMARY_ERROR };
  }
}

export async function fetchInterestingFact(model: ChatModel, temperature?: number): Promise<FactResult> {
  log.info('Requesting interesting fact');

  try {
    const reply = await model.complete(buildFactPrompt(), temperature !== undefined ? { temperature } : {});
    const parsed = FactResponseSchema.safeParse(extractJsonObject(reply));
    if (!parsed.success) {
      throw new LlmResponseError('invalid-shape', 'Reply has no "fact" string');
    }
    return { ok: true, fact: parsed.data.fact };
  } catch (err) {
    const message = toErrorMessage(err);
    log.error(`Error in Groq API call for interesting info: ${message}`);
    return { ok: false, error: `Failed to retrieve interesting info : ${message}` };
  }
}
