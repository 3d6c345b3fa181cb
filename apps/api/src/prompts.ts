import { readFileSync } from 'node:fs';
import { resolve } from 'node:path';
import { compilePromptTemplate, type PromptTemplate } from '@context-qa/core';
import type { ApiConfig } from './config';

export interface PromptFiles {
  systemInstruction: string;
  promptTemplate: PromptTemplate;
}

export class PromptFileError extends Error {
  readonly path: string;

  constructor(path: string, cause: unknown) {
    super(`${path} could not be read`, { cause });
    this.name = 'PromptFileError';
    this.path = path;
  }
}

const readRequiredFile = (path: string, label: string): string => {
  const absolutePath = resolve(path);
  try {
    const content = readFileSync(absolutePath, 'utf8');
    console.info({ scope: 'bootstrap', message: `Loaded ${label}.`, path: absolutePath });
    return content;
  } catch (error) {
    console.error({
      scope: 'bootstrap',
      message: `${label} not found.`,
      path: absolutePath,
      error: error instanceof Error ? error.message : 'Unknown file error'
    });
    throw new PromptFileError(path, error);
  }
};

export const loadPromptFiles = (config: Pick<ApiConfig, 'systemInstructionsPath' | 'promptTemplatePath'>): PromptFiles => {
  const systemInstruction = readRequiredFile(config.systemInstructionsPath, 'system instructions');
  const promptTemplate = compilePromptTemplate(readRequiredFile(config.promptTemplatePath, 'prompt template'));

  return { systemInstruction, promptTemplate };
};
