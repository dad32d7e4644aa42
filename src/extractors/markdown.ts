import TurndownService from 'turndown';

export interface MarkdownContentStats {
  original_html_chars: number;
  initial_markdown_chars: number;
  filtered_chars_removed: number;
  final_filtered_chars: number;
  url?: string;
}

export interface HtmlToMarkdownOptions {
  /** Keep anchors and images; dropped by default as they carry little data. */
  extract_links?: boolean;
  url?: string;
}

/**
 * Drop serialized JSON blobs (hydration state and the like) and collapse
 * blank runs.
 */
export const preprocessMarkdownContent = (
  input: string,
  maxNewlines = 3
): { content: string; chars_filtered: number } => {
  const originalLength = input.length;
  let content = input;

  content = content.replace(/`\{["\w][\s\S]*?\}`/g, '');
  content = content.replace(/\{"\$type":[^}]{100,}\}/g, '');
  content = content.replace(/\{"[^"]{5,}":\{[^}]{100,}\}/g, '');
  content = content.replace(/\n{4,}/g, '\n'.repeat(maxNewlines));

  const filteredLines: string[] = [];
  for (const line of content.split('\n')) {
    const stripped = line.trim();
    if (!stripped) {
      continue;
    }
    if (
      (stripped.startsWith('{') || stripped.startsWith('[')) &&
      stripped.length > 100
    ) {
      continue;
    }
    filteredLines.push(line);
  }

  content = filteredLines.join('\n').trim();
  return {
    content,
    chars_filtered: originalLength - content.length,
  };
};

export const htmlToMarkdown = (
  html: string,
  options: HtmlToMarkdownOptions = {}
): { content: string; stats: MarkdownContentStats } => {
  let pageHtml = html;
  if (!options.extract_links) {
    pageHtml = pageHtml
      .replace(/<a\b[^>]*>/gi, '')
      .replace(/<\/a>/gi, '')
      .replace(/<img\b[^>]*>/gi, '');
  }

  const turndown = new TurndownService({
    headingStyle: 'atx',
    codeBlockStyle: 'fenced',
    bulletListMarker: '-',
  });
  turndown.remove(['script', 'style', 'noscript', 'template']);
  let content = turndown.turndown(pageHtml);
  const initialMarkdownLength = content.length;

  const preprocessed = preprocessMarkdownContent(content);
  content = preprocessed.content;

  const stats: MarkdownContentStats = {
    original_html_chars: pageHtml.length,
    initial_markdown_chars: initialMarkdownLength,
    filtered_chars_removed: preprocessed.chars_filtered,
    final_filtered_chars: content.length,
  };
  if (options.url) {
    stats.url = options.url;
  }
  return { content, stats };
};
