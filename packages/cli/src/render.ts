import type { CLIErrorView } from '@jsonstrata/core';

// Minimal ANSI helpers
const ANSI = {
  reset: '\u001B[0m',
  red: '\u001B[31m',
  bold: '\u001B[1m',
  dim: '\u001B[2m',
};

function colorize(text: string, useColor: boolean, color: string): string {
  if (!useColor) return text;
  return `${color}${text}${ANSI.reset}`;
}

function wrapText(text: string, width: number): string {
  if (!text) return '';
  const words = text.split(/\s+/);
  const lines: string[] = [];
  let line = '';
  for (const word of words) {
    if ((line + (line ? ' ' : '') + word).length > width) {
      if (line) lines.push(line);
      line = word;
    } else {
      line = line ? `${line} ${word}` : word;
    }
  }
  if (line) lines.push(line);
  return lines.join('\n');
}

export function renderCLIView(view: CLIErrorView): string {
  const width = view.terminalWidth || 80;
  const lines: string[] = [];

  lines.push(
    colorize(colorize(view.title, view.colors, ANSI.bold), view.colors, ANSI.red)
  );

  if (view.location) {
    lines.push(wrapText(view.location, width));
  }
  if (view.source) {
    // file names are not wrapped
    lines.push(`Source: ${view.source}`);
  }
  if (view.excerpt) {
    lines.push(wrapText(`Excerpt: ${view.excerpt}`, width));
  }
  if (view.workaround) {
    lines.push(wrapText(`Workaround: ${view.workaround}`, width));
  }
  for (const detail of view.details) {
    lines.push(colorize(`  - ${detail}`, view.colors, ANSI.dim));
  }

  return lines.join('\n');
}

export function stripAnsi(input: string): string {
  // eslint-disable-next-line no-control-regex
  const ansiRe = /[\u001B\u009B][[\]()#;?]*(?:\d{1,4}(?:;\d{0,4})*)?[\dA-PR-TZcf-ntqry=><~]/g;
  return input.replace(ansiRe, '');
}
