/**
 * Prompt templates. Both ask for a bare JSON object so the reply can be
 * pulled out with extractJsonObject().
 */

export const TITLE_MARKER = 'This is the title:';

export function buildSummaryPrompt(title: string, sectionText: string): string {
  return `You will summarize the key event of the day in a JSON format. The structure of the JSON should be as follows:

{
  "summary": {
    "title": ${JSON.stringify(title)},
    "section_text": "- <summary point 1>\\n- <summary point 2>\\n- <summary point 3>"
  }
}

Provide a very simple, concise, three-point summarization. Make it extremely concise. If there is a name, political party, or geographical region
mentioned, then please briefly explain that.

${TITLE_MARKER} ${title}

Here is the text to summarize:
${sectionText}
`;
}

export const FACT_PROMPT = `Tell me a random obscure, interesting, and enriching piece of information. It can't be about jellyfish.
It can come from anything: physics, biology, animals, plants, computer science, maths, psychology, economics,
history, political science, or pretty much any other field.

Return the output in a JSON format:
{
  "fact": "<interesting info>"
}
`;

export function buildFactPrompt(): string {
  return FACT_PROMPT;
}
