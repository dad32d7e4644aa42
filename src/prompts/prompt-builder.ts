import fs from 'node:fs';
import { fileURLToPath } from 'node:url';
import type { Blueprint } from '../blueprints/views.js';
import type { SchemaViolation } from '../exceptions.js';

const readPromptTemplate = (filename: string) => {
  const filePath = fileURLToPath(new URL(filename, import.meta.url));
  return fs.readFileSync(filePath, 'utf-8');
};

const ROOT_TYPE_PHRASES = {
  object: 'a valid JSON object',
  array: 'a valid JSON array',
  any: 'a valid JSON value',
} as const;

const rootTypePhrase = (rootType: Blueprint['rootType']) =>
  ROOT_TYPE_PHRASES[rootType ?? 'any'];

// Single pass, so placeholders that occur inside page content stay literal.
const fillTemplate = (template: string, values: Record<string, string>) =>
  template.replace(/\{(\w+)\}/g, (match, key: string) => values[key] ?? match);

export class PromptBuilder {
  private readonly systemTemplate: string;
  private readonly extractionTemplate: string;

  constructor(private readonly maxContentChars = 20000) {
    this.systemTemplate = readPromptTemplate('./system_prompt.md').trim();
    this.extractionTemplate = readPromptTemplate('./extraction_prompt.md').trimEnd();
  }

  get systemPrompt(): string {
    return this.systemTemplate;
  }

  isTruncated(markdown: string): boolean {
    return markdown.length > this.maxContentChars;
  }

  /** Deterministic: the same blueprint and markdown always give the same prompt. */
  build(blueprint: Blueprint, markdown: string): string {
    const content = this.isTruncated(markdown)
      ? markdown.slice(0, this.maxContentChars)
      : markdown;

    return fillTemplate(this.extractionTemplate, {
      domain: blueprint.domain,
      schema: JSON.stringify(blueprint.schema, null, 2),
      content,
      root_type: rootTypePhrase(blueprint.rootType),
    });
  }
}

export const buildParseRepairMessage = (rootType: Blueprint['rootType']) =>
  `Your previous reply could not be used: it was not ${rootTypePhrase(rootType)}. ` +
  'Return only valid JSON matching the schema, with no other text.';

export const buildViolationRepairMessage = (violations: SchemaViolation[]) => {
  const lines = violations.map(
    (violation) => `- ${violation.path || '(root)'}: ${violation.message} [${violation.rule}]`
  );
  return [
    'Your previous reply does not validate against the JSON schema:',
    ...lines,
    'Fix these problems and return only the corrected JSON, with no other text.',
  ].join('\n');
};
