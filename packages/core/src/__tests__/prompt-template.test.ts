import { describe, expect, it } from 'vitest';
import { compilePromptTemplate, formatPrompt, PromptTemplateError } from '../index';

describe('compilePromptTemplate', () => {
  it('splits text and placeholders into segments', () => {
    const template = compilePromptTemplate('History: {messages}\nQ: {question}');

    expect(template.segments).toEqual([
      { kind: 'text', value: 'History: ' },
      { kind: 'field', name: 'messages' },
      { kind: 'text', value: '\nQ: ' },
      { kind: 'field', name: 'question' }
    ]);
  });

  it('treats doubled braces as literal braces', () => {
    const template = compilePromptTemplate('Reply as {{"answer": "..."}} to {question}');

    expect(template.segments).toEqual([
      { kind: 'text', value: 'Reply as {"answer": "..."} to ' },
      { kind: 'field', name: 'question' }
    ]);
  });

  it('rejects unknown placeholders', () => {
    expect(() => compilePromptTemplate('Hello {name}')).toThrow(PromptTemplateError);
    expect(() => compilePromptTemplate('Hello {name}')).toThrow('Unknown placeholder "{name}" at position 6');
  });

  it('rejects placeholders padded with spaces', () => {
    expect(() => compilePromptTemplate('History: { messages }')).toThrow('Unknown placeholder "{ messages }" at position 9');
  });

  it('rejects an unclosed placeholder', () => {
    expect(() => compilePromptTemplate('Q: {question')).toThrow('Unclosed placeholder at position 3');
  });

  it('rejects a lone closing brace', () => {
    expect(() => compilePromptTemplate('Q: question}')).toThrow('Single "}" encountered at position 11');
  });
});

describe('formatPrompt', () => {
  it('fills question and renders messages as JSON', () => {
    const template = compilePromptTemplate('Conversation: {messages}\nQuestion: {question}');

    const prompt = formatPrompt(template, {
      question: 'When does the library open?',
      messages: [{ role: 'user', content: 'hi' }]
    });

    expect(prompt).toBe('Conversation: [{"role":"user","content":"hi"}]\nQuestion: When does the library open?');
  });

  it('repeats a placeholder used more than once', () => {
    const template = compilePromptTemplate('{question} / {question}');

    expect(formatPrompt(template, { question: 'why', messages: [] })).toBe('why / why');
  });

  it('renders an empty history as an empty JSON array', () => {
    const template = compilePromptTemplate('{messages}');

    expect(formatPrompt(template, { question: 'x', messages: [] })).toBe('[]');
  });
});
