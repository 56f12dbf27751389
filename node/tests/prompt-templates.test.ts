import { describe, expect, it } from 'vitest';
import {
  buildAnswerPrompt,
  buildExtractiveAnswer,
  FALLBACK_PREAMBLE,
  renderContext,
} from '@/services/prompt-templates';
import type { ContextItem } from '@/services/providers/retrieval-types';

function item(overrides: Partial<ContextItem> & Pick<ContextItem, 'type' | 'text'>): ContextItem {
  return { id: null, title: null, score: null, source: 'test', metadata: {}, ...overrides };
}

describe('renderContext', () => {
  it('heads each block with its title, else its type, and skips blank text', () => {
    const rendered = renderContext([
      item({ type: 'document', title: 'Care', text: 'Wash cold.' }),
      item({ type: 'document', title: 'Empty', text: '   ' }),
      item({ type: 'product', text: 'Brand: Solstice' }),
    ]);
    expect(rendered).toBe('Care:\nWash cold.\n\nproduct:\nBrand: Solstice');
  });

  it('is empty when nothing has text', () => {
    expect(renderContext([item({ type: 'document', text: '' })])).toBe('');
  });
});

describe('buildExtractiveAnswer', () => {
  it('quotes the first two non-blank snippets after the preamble', () => {
    const answer = buildExtractiveAnswer([
      item({ type: 'document', text: '' }),
      item({ type: 'document', text: 'First.' }),
      item({ type: 'product', text: 'Second.' }),
      item({ type: 'product', text: 'Third.' }),
    ]);
    expect(answer).toBe(`${FALLBACK_PREAMBLE}\n\nFirst.\n\nSecond.`);
  });
});

describe('buildAnswerPrompt', () => {
  it('embeds the context and the question', () => {
    expect(buildAnswerPrompt({ question: 'How to wash?', context: 'Care:\nWash cold.' })).toBe(
      [
        'You are an assistant for a sustainable fashion brand. Use the provided context to answer the question.',
        'If the context does not contain the answer, say so instead of guessing.',
        '',
        'Context:',
        'Care:',
        'Wash cold.',
        '',
        'Question: How to wash?',
      ].join('\n'),
    );
  });
});
