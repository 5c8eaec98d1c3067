/**
 * Prompt templates loaded from markdown files
 *
 * Templates use {name} placeholders. Rendering is a single pass, so
 * placeholders inside substituted values are left as they are.
 */

import { readFileSync } from 'fs';
import { join } from 'path';
import { PromptError, errorMessage } from '@rioplatense/core';

export interface PromptSet {
  system: string;
  translation: string;
  languageDetection: string;
}

const PROMPT_FILES: ReadonlyArray<{ key: keyof PromptSet; file: string; placeholders: readonly string[] }> = [
  { key: 'system', file: 'system.md', placeholders: [] },
  { key: 'translation', file: 'translation.md', placeholders: ['text', 'reference_phrases'] },
  { key: 'languageDetection', file: 'language-detection.md', placeholders: ['text'] },
];

const PLACEHOLDER = /\{(\w+)\}/g;

export function renderTemplate(template: string, values: Readonly<Record<string, string>>): string {
  return template.replace(PLACEHOLDER, (match, name: string) =>
    Object.prototype.hasOwnProperty.call(values, name) ? values[name] : match
  );
}

function readPrompt(dir: string, file: string): string {
  const path = join(dir, file);
  let content: string;
  try {
    content = readFileSync(path, 'utf-8').trim();
  } catch (error) {
    throw new PromptError(`Prompt file not found: ${path} (${errorMessage(error)})`, { cause: error });
  }
  if (!content) {
    throw new PromptError(`Prompt file is empty: ${path}`);
  }
  return content;
}

/**
 * Load every prompt and check required placeholders
 *
 * @throws PromptError
 */
export function loadPrompts(dir: string): PromptSet {
  const prompts: PromptSet = { system: '', translation: '', languageDetection: '' };

  for (const { key, file, placeholders } of PROMPT_FILES) {
    const content = readPrompt(dir, file);
    const missing = placeholders.filter(name => !content.includes(`{${name}}`));
    if (missing.length > 0) {
      throw new PromptError(`${file} is missing placeholders: ${missing.map(name => `{${name}}`).join(', ')}`);
    }
    prompts[key] = content;
  }

  return Object.freeze(prompts);
}
