export const TRANSCRIPT_PLACEHOLDER = '${text}';

/**
 * Quote text as a single POSIX shell word: `'` becomes `'\''` and the whole
 * thing is wrapped in single quotes.
 */
export function shellQuote(text: string): string {
  return `'${text.replace(/'/g, "'\\''")}'`;
}

export function hasPlaceholder(template: string): boolean {
  return template.includes(TRANSCRIPT_PLACEHOLDER);
}

/**
 * Substitute the quoted transcript for every placeholder in the template.
 * A template without the placeholder is returned as is.
 */
export function renderCommand(template: string, transcript: string): string {
  if (!hasPlaceholder(template)) {
    return template;
  }
  return template.split(TRANSCRIPT_PLACEHOLDER).join(shellQuote(transcript));
}
