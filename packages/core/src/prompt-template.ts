export type PromptField = 'messages' | 'question';

const isPromptField = (value: string): value is PromptField => value === 'messages' || value === 'question';

export type PromptSegment = { kind: 'text'; value: string } | { kind: 'field'; name: PromptField };

export interface PromptTemplate {
  readonly source: string;
  readonly segments: readonly PromptSegment[];
}

export interface PromptValues {
  messages: unknown[];
  question: string;
}

export class PromptTemplateError extends Error {
  readonly position: number;

  constructor(message: string, position: number) {
    super(`${message} at position ${position}`);
    this.name = 'PromptTemplateError';
    this.position = position;
  }
}

/**
 * Parses a template using `{messages}` and `{question}` placeholders.
 * Literal braces are written doubled (`{{` and `}}`).
 */
export const compilePromptTemplate = (source: string): PromptTemplate => {
  const segments: PromptSegment[] = [];
  let text = '';
  let index = 0;

  const flushText = () => {
    if (text.length > 0) {
      segments.push({ kind: 'text', value: text });
      text = '';
    }
  };

  while (index < source.length) {
    const char = source[index];

    if (char === '{') {
      if (source[index + 1] === '{') {
        text += '{';
        index += 2;
        continue;
      }

      const close = source.indexOf('}', index + 1);
      if (close === -1) {
        throw new PromptTemplateError('Unclosed placeholder', index);
      }

      const name = source.slice(index + 1, close);
      if (!isPromptField(name)) {
        throw new PromptTemplateError(`Unknown placeholder "{${name}}"`, index);
      }

      flushText();
      segments.push({ kind: 'field', name });
      index = close + 1;
      continue;
    }

    if (char === '}') {
      if (source[index + 1] === '}') {
        text += '}';
        index += 2;
        continue;
      }
      throw new PromptTemplateError('Single "}" encountered', index);
    }

    text += char;
    index += 1;
  }

  flushText();
  return { source, segments };
};

export const renderMessages = (messages: unknown[]): string => JSON.stringify(messages);

export const formatPrompt = (template: PromptTemplate, values: PromptValues): string =>
  template.segments
    .map((segment) => {
      if (segment.kind === 'text') return segment.value;
      return segment.name === 'messages' ? renderMessages(values.messages) : values.question;
    })
    .join('');
