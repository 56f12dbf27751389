// node/src/services/prompt-templates.ts — answer-synthesis prompt and the fixed no-model answers
import type { ContextItem } from './providers/retrieval-types';

export const NO_CONTEXT_ANSWER =
  "I'm sorry, I could not find any supporting information to answer that question.";

export const FALLBACK_PREAMBLE =
  'A generated answer is not available right now. Here is the most relevant information I found:';

/** Items with blank text are skipped; each block is headed by the item title, else its type. */
export function renderContext(items: ContextItem[]): string {
  return items
    .filter((item) => item.text.trim().length > 0)
    .map((item) => `${item.title?.trim() || item.type}:\n${item.text}`)
    .join('\n\n');
}

/** Preamble followed by the raw text of the first two non-blank items. */
export function buildExtractiveAnswer(items: ContextItem[]): string {
  const snippets = items
    .map((item) => item.text)
    .filter((text) => text.trim().length > 0)
    .slice(0, 2);
  return [FALLBACK_PREAMBLE, snippets.join('\n\n')].join('\n\n');
}

export function buildAnswerPrompt(params: { question: string; context: string }): string {
  return `
You are an assistant for a sustainable fashion brand. Use the provided context to answer the question.
If the context does not contain the answer, say so instead of guessing.

Context:
${params.context}

Question: ${params.question}
`.trim();
}
