import { describe, expect, it } from 'vitest';
import type { ChatModel, CompletionOptions } from './chat-model.js';
import { fetchInterestingFact, INVALID_JSON_ERROR, SUMMARY_ERROR, summarizeEvent } from './summarizer.js';

class ScriptedModel implements ChatModel {
  readonly name = 'scripted';
  readonly prompts: string[] = [];
  readonly options: CompletionOptions[] = [];

  constructor(private readonly reply: string | Error) {}

  async complete(prompt: string, options: CompletionOptions = {}): Promise<string> {
    this.prompts.push(prompt);
    this.options.push(options);
    if (this.reply instanceof Error) {
      throw this.reply;
    }
    return this.reply;
  }
}

const event = {
  title: 'Glacier Survey',
  text: 'Glacier Survey Researchers publish a new map of the northern ice field.',
};

describe('summarizeEvent', () => {
  it('returns the summary from a fenced JSON reply', async () => {
    const body = JSON.stringify({ summary: { title: 'Glacier Survey', section_text: '- One\n- Two\n- Three' } });
    const model = new ScriptedModel('```json\n' + body + '\n```');

    const result = await summarizeEvent(model, event);

    expect(result).toEqual({ ok: true, summary: { title: 'Glacier Survey', sectionText: '- One\n- Two\n- Three' } });
    expect(model.prompts[0]).toContain('This is the title: Glacier Survey');
    expect(model.prompts[0]).toContain(event.text);
  });

  it('passes the temperature through', async () => {
    const model = new ScriptedModel(JSON.stringify({ summary: { title: 'x', section_text: '- y' } }));

    await summarizeEvent(model, event, { temperature: 0.2 });

    expect(model.options).toEqual([{ temperature: 0.2 }]);
  });

  it('falls back to the event title when the model leaves it empty', async () => {
    const model = new ScriptedModel(JSON.stringify({ summary: { title: ' ', section_text: '- y' } }));

    const result = await summarizeEvent(model, event);

    expect(result).toEqual({ ok: true, summary: { title: 'Glacier Survey', sectionText: '- y' } });
  });

  it('reports a truncated reply', async () => {
    const result = await summarizeEvent(new ScriptedModel('{"summary": {'), event);

    expect(result).toEqual({ ok: false, error: SUMMARY_ERROR });
  });

  it('reports JSON that does not parse', async () => {
    const result = await summarizeEvent(new ScriptedModel('{"summary": {"title": "x",}}'), event);

    expect(result).toEqual({ ok: false, error: INVALID_JSON_ERROR });
  });

  it('reports a reply with the wrong shape', async () => {
    const result = await summarizeEvent(new ScriptedModel('{"summary": {"title": "x"}}'), event);

    expect(result).toEqual({ ok: false, error: SUMMARY_ERROR });
  });

  it('rejects a blank summary', async () => {
    const result = await summarizeEvent(new ScriptedModel('{"summary": {"title": "x", "section_text": " \\n "}}'), event);

    expect(result).toEqual({ ok: false, error: SUMMARY_ERROR });
  });

  it('reports API failures without throwing', async () => {
    const result = await summarizeEvent(new ScriptedModel(new Error('rate limited')), event);

    expect(result).toEqual({ ok: false, error: 'Error summarizing event' });
  });
});

describe('fetchInterestingFact', () => {
  it('returns the trimmed fact and uses the given temperature', async () => {
    const model = new ScriptedModel('{"fact": " Honey never spoils. "}');

    const result = await fetchInterestingFact(model, 1.5);

    expect(result).toEqual({ ok: true, fact: 'Honey never spoils.' });
    expect(model.options).toEqual([{ temperature: 1.5 }]);
    expect(model.prompts[0]).toContain("It can't be about jellyfish.");
  });

  it('describes the failure', async () => {
    const result = await fetchInterestingFact(new ScriptedModel(new Error('rate limited')));

    expect(result).toEqual({ ok: false, error: 'Failed to retrieve interesting info : rate limited' });
  });

  it('rejects a blank fact', async () => {
    const result = await fetchInterestingFact(new ScriptedModel('{"fact": "   "}'));

    expect(result).toEqual({ ok: false, error: 'Failed to retrieve interesting info : Reply has no "fact" string' });
  });

  it('rejects a reply without a fact', async () => {
    const result = await fetchInterestingFact(new ScriptedModel('{"trivia": "x"}'));

    expect(result).toEqual({ ok: false, error: 'Failed to retrieve interesting info : Reply has no "fact" string' });
  });
});
