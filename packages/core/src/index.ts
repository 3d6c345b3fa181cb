export const routes = {
  root: '/',
  health: '/health'
} as const;

export const CLEANUP_INSTRUCTION =
  'Convert markdown syntax to plain text, keep everything in a single paragraph, correct spelling and remove emojis.';

export {
  compilePromptTemplate,
  formatPrompt,
  renderMessages,
  PromptTemplateError,
  type PromptField,
  type PromptSegment,
  type PromptTemplate,
  type PromptValues
} from './prompt-template';

export {
  computeBackoffDelay,
  retryWithBackoff,
  DEFAULT_RETRY_BASE_DELAY_MS,
  DEFAULT_RETRY_MAX_ATTEMPTS,
  DEFAULT_RETRY_MAX_DELAY_MS,
  type RetryEvent,
  type RetryOptions
} from './retry';
