import { createRequire } from 'node:module';
import path from 'node:path';
import { InvalidInputError } from '../exceptions.js';
import { createLogger } from '../logging-config.js';
import { htmlToMarkdown } from './markdown.js';

type PdfParseFn = (
  dataBuffer: Buffer,
  options?: import('pdf-parse').Options
) => Promise<import('pdf-parse').Result>;
const require = createRequire(import.meta.url);
const pdfParse = require('pdf-parse') as PdfParseFn;

const logger = createLogger('structura.extractors.file');

const TEXT_EXTENSIONS = new Set(['.md', '.markdown', '.txt']);
const HTML_EXTENSIONS = new Set(['.html', '.htm']);

const strictDecoder = new TextDecoder('utf-8', { fatal: true });

const toBuffer = (content: Buffer | string) =>
  typeof content === 'string' ? Buffer.from(content, 'utf-8') : content;

/**
 * Uploaded document to markdown.
 */
export class FileExtractor {
  async extract(filename: string, content: Buffer | string): Promise<string> {
    const extension = path.extname(filename).toLowerCase();
    const bytes = toBuffer(content);

    let markdown: string;
    if (TEXT_EXTENSIONS.has(extension)) {
      markdown = bytes.toString('utf-8');
    } else if (HTML_EXTENSIONS.has(extension)) {
      markdown = htmlToMarkdown(bytes.toString('utf-8')).content;
    } else if (extension === '.pdf') {
      markdown = await this.readPdf(filename, bytes);
    } else {
      logger.warning(`Unknown file extension '${extension || '(none)'}', decoding as text`);
      markdown = this.decodeUnknown(filename, bytes);
    }

    if (!markdown.trim()) {
      throw new InvalidInputError(`File '${filename}' has no extractable content`);
    }
    return markdown;
  }

  /** Page texts, separated by a blank line. */
  private async readPdf(filename: string, bytes: Buffer): Promise<string> {
    let parsed: import('pdf-parse').Result;
    try {
      parsed = await pdfParse(bytes);
    } catch (error) {
      logger.warning(`Could not parse PDF '${filename}'`, error);
      throw new InvalidInputError(`Could not read PDF '${filename}'`, { cause: error });
    }
    logger.debug(`Read ${parsed.numpages} page(s) from '${filename}'`);
    return parsed.text.trim();
  }

  private decodeUnknown(filename: string, bytes: Buffer): string {
    const unsupported = new InvalidInputError(
      `Unsupported file type for '${filename}'. Supported types: .md, .markdown, .txt, .html, .htm, .pdf`
    );
    if (bytes.includes(0)) {
      throw unsupported;
    }
    try {
      return strictDecoder.decode(bytes);
    } catch {
      throw unsupported;
    }
  }
}
