import type { CLIErrorView } from '@subarray-lab/core';

const TITLE_STYLE = '\u001B[1;31m';
const RESET = '\u001B[0m';
const DEFAULT_WIDTH = 80;
const CONTINUATION_INDENT = '  ';

/**
 * Error block for stderr: the title, then location, excerpt, one line per
 * detail and the workaround. Sections longer than the terminal width wrap
 * with an indented continuation.
 */
export function renderCLIView(view: CLIErrorView): string {
  const width = view.terminalWidth > 0 ? view.terminalWidth : DEFAULT_WIDTH;
  const title = `❌ ${view.title}`;

  const sections = [
    view.location && `📍 ${view.location}`,
    view.excerpt && `Excerpt: ${view.excerpt}`,
    ...(view.details ?? []).map((detail) => `- ${detail}`),
    view.workaround && `💡 Workaround: ${view.workaround}`,
  ].filter(
    (section): section is string =>
      typeof section === 'string' && section.length > 0
  );

  return [
    view.colors ? `${TITLE_STYLE}${title}${RESET}` : title,
    ...sections.flatMap((section) => wrapSection(section, width)),
  ].join('\n');
}

function wrapSection(text: string, width: number): string[] {
  const lines: string[] = [];
  let line = '';
  for (const word of text.split(/\s+/)) {
    if (line === '') {
      line = lines.length === 0 ? word : `${CONTINUATION_INDENT}${word}`;
    } else if (line.length + 1 + word.length > width) {
      lines.push(line);
      line = `${CONTINUATION_INDENT}${word}`;
    } else {
      line = `${line} ${word}`;
    }
  }
  if (line !== '') {
    lines.push(line);
  }
  return lines;
}
