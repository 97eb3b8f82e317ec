import type { StructuredLogEvent } from './structured-log-event.js';

interface FormatOptions {
  color?: boolean;
  verbose?: boolean;
}

const ANSI_RESET = '\u001B[0m';
const ANSI_RED = '\u001B[31m';
const ANSI_YELLOW = '\u001B[33m';
const ANSI_GRAY = '\u001B[90m';

function colorize(event: StructuredLogEvent, text: string): string {
  if (event.severity === 'ERR') return `${ANSI_RED}${text}${ANSI_RESET}`;
  if (event.severity === 'WRN') return `${ANSI_YELLOW}${text}${ANSI_RESET}`;
  return `${ANSI_GRAY}${text}${ANSI_RESET}`;
}

export function formatConsole(event: StructuredLogEvent, options: FormatOptions = {}): string {
  const prefix = `${event.severity} [${event.logger}]`;
  const labels = options.verbose === true
    ? Object.entries(event.labels).map(([key, value]) => ` ${key}=${value}`).join('')
    : '';
  let output = `${options.color === true ? colorize(event, prefix) : prefix} ${event.message}${labels}`;

  if (event.severity === 'ERR' && typeof event.stack === 'string' && event.stack.length > 0) {
    const stackLines = event.stack.split('\n').map((line) => `    ${line}`).join('\n');
    output += `\n${stackLines}`;
  }

  return output;
}
