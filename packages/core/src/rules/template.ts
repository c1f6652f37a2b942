/**
 * Message and fix templates
 *
 * `{{name}}` is replaced by the text of the capture `name`; `{{$match}}`
 * by the text of the whole match. Placeholders naming nothing render as
 * an empty string.
 */

import type { Bindings } from '../matcher/types.js';

const PLACEHOLDER = /\{\{\s*(\$?[A-Za-z_][\w.-]*)\s*\}\}/g;

/** Placeholder for the text of the whole match */
export const MATCH_PLACEHOLDER = '$match';

/**
 * Names referenced by a template, built-ins included, in order of appearance
 */
export function templatePlaceholders(template: string): string[] {
  const names: string[] = [];
  for (const match of template.matchAll(PLACEHOLDER)) {
    const name = match[1];
    if (name && !names.includes(name)) {
      names.push(name);
    }
  }
  return names;
}

/**
 * Capture names referenced by a template, without the built-ins
 */
export function templateCaptures(template: string): string[] {
  return templatePlaceholders(template).filter((name) => !name.startsWith('$'));
}

export function renderTemplate(template: string, bindings: Bindings, source: string, matchText: string): string {
  return template.replace(PLACEHOLDER, (_placeholder, name: string) => {
    if (name === MATCH_PLACEHOLDER) {
      return matchText;
    }
    const node = bindings[name];
    if (!node) {
      return '';
    }
    return node.text ?? source.slice(node.span.startIndex, node.span.endIndex);
  });
}
