/**
 * JSON parser for LLM outputs.
 * Extracts JSON from code fences or free-form text and tolerates minor issues.
 */

export class JsonParseError extends Error {
  constructor(public readonly raw: string) {
    super('Unable to parse LLM JSON output');
    this.name = 'JsonParseError';
  }
}

type ParseAttempt = { success: true; value: unknown } | { success: false };

export class JsonParser {
  /** Parse JSON from LLM content, throwing JsonParseError when nothing parses */
  static parse(raw: string): unknown {
    const attempt = this.tryParseLenient(raw);
    if (attempt.success) return attempt.value;
    throw new JsonParseError(raw);
  }

  /** Same as parse, but reports failure instead of throwing */
  static tryParseLenient(raw: string): ParseAttempt {
    // Fast path
    const direct = this.tryParse(raw.trim());
    if (direct.success) return direct;

    // Extract from ```json ... ``` fences first
    const fencedJson =
      this.extractFencedJson(raw, 'json') ?? this.extractFencedJson(raw);
    if (fencedJson !== null) {
      const fromFence = this.firstSuccess(fencedJson, this.minorRepairs(fencedJson));
      if (fromFence.success) return fromFence;
    }

    // Extract a plausible JSON object/array, trying each opener in order
    for (const sliced of this.sliceJsonLike(raw)) {
      const attempt = this.firstSuccess(sliced, this.minorRepairs(sliced));
      if (attempt.success) return attempt;
    }

    // Last resort: attempt minor repairs on the whole string
    return this.tryParse(this.minorRepairs(raw));
  }

  private static firstSuccess(...candidates: string[]): ParseAttempt {
    for (const candidate of candidates) {
      const attempt = this.tryParse(candidate);
      if (attempt.success) return attempt;
    }
    return { success: false };
  }

  private static tryParse(text: string): ParseAttempt {
    if (!text) return { success: false };
    try {
      const value: unknown = JSON.parse(text);
      return { success: true, value };
    } catch {
      return { success: false };
    }
  }

  private static extractFencedJson(text: string, lang?: string): string | null {
    const pattern = lang
      ? new RegExp('```\\s*' + lang + '\\s*\\n([\\s\\S]*?)\\n?```', 'i')
      : /```\s*\n([\s\S]*?)\n?```/i;
    const match = text.match(pattern);
    if (!match) return null;
    return match[1].trim();
  }

  private static sliceJsonLike(text: string): string[] {
    const starts = [text.indexOf('{'), text.indexOf('[')]
      .filter((index) => index !== -1)
      .sort((a, b) => a - b);
    return starts.map((start) => this.sliceBalanced(text, start));
  }

  private static sliceBalanced(text: string, start: number): string {
    // Naive balance matching
    const open = text[start];
    const close = open === '[' ? ']' : '}';
    let depth = 0;
    for (let i = start; i < text.length; i++) {
      const ch = text[i];
      if (ch === '"') {
        // skip strings
        const end = this.findStringEnd(text, i);
        if (end === -1) break;
        i = end;
        continue;
      }
      if (ch === open) depth++;
      if (ch === close) depth--;
      if (depth === 0) {
        return text.slice(start, i + 1);
      }
    }
    // Unbalanced: let the caller try it as-is and with repairs
    return text.slice(start);
  }

  private static findStringEnd(text: string, startQuoteIndex: number): number {
    let i = startQuoteIndex + 1;
    while (i < text.length) {
      if (text[i] === '\\') {
        i += 2;
        continue;
      }
      if (text[i] === '"') return i;
      i++;
    }
    return -1;
  }

  private static minorRepairs(text: string): string {
    let repaired = text.trim();

    // Fix double braces at start/end (common LLM output issue)
    if (repaired.startsWith('{{') && repaired.endsWith('}}')) {
      repaired = repaired.slice(1, -1);
    }

    // Backticks don't need escaping in JSON
    repaired = repaired.replace(/\\`/g, '`');

    // Remove trailing commas before } or ]
    repaired = repaired.replace(/,\s*([}\]])/g, '$1');
    return repaired;
  }
}
