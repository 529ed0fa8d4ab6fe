/**
 * Handlebars template helpers
 */

import type Handlebars from 'handlebars';

/**
 * reStructuredText heading: the text underlined with `marker`
 */
export function heading(text: string, marker: string): string {
  return `${text}\n${marker.repeat(text.length)}`;
}

/**
 * Indent every non-empty line, so a multi-line docstring stays inside its directive
 */
export function indent(text: string, width: number): string {
  const padding = ' '.repeat(width);
  return text
    .split('\n')
    .map((line) => (line === '' ? line : padding + line))
    .join('\n');
}

/**
 * Quote a value as a string literal for conf.py
 */
export function pyString(value: string): string {
  return JSON.stringify(value);
}

/**
 * Register all helpers with a Handlebars environment
 */
export function registerHelpers(handlebars: typeof Handlebars): void {
  handlebars.registerHelper('heading', heading);
  handlebars.registerHelper('indent', indent);
  handlebars.registerHelper('pyString', pyString);
}
