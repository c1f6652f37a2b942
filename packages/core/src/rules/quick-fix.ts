/**
 * Quick Fix - renders fix templates into text edits and applies them
 *
 * Fixes are suggestions only: the kernel never writes files. Callers (the
 * CLI, editors, the rule tester) decide whether to apply them.
 */

import { FixApplicationError } from '../errors.js';
import { renderTemplate } from './template.js';

import type { Match } from '../matcher/types.js';
import type { Position, Span } from '../parsers/types.js';
import type { FixTemplate, SuggestedFix, TextEdit, ViolationLocation } from './types.js';

const DEFAULT_FIX_DESCRIPTION = 'Apply suggested fix';

/**
 * One-based location with an exclusive end for a span
 */
export function spanToLocation(span: Span): ViolationLocation {
  return {
    line: span.startPosition.row + 1,
    column: span.startPosition.column + 1,
    endLine: span.endPosition.row + 1,
    endColumn: span.endPosition.column + 1,
    startOffset: span.startIndex,
    endOffset: span.endIndex,
  };
}

function pointLocation(position: Position, offset: number): ViolationLocation {
  return {
    line: position.row + 1,
    column: position.column + 1,
    endLine: position.row + 1,
    endColumn: position.column + 1,
    startOffset: offset,
    endOffset: offset,
  };
}

/**
 * Render a fix template for one match.
 *
 * @returns null when an edit targets a capture the match did not bind
 */
export function renderFix(template: FixTemplate, match: Match, source: string): SuggestedFix | null {
  const matchText = source.slice(match.span.startIndex, match.span.endIndex);
  const edits: TextEdit[] = [];

  for (const edit of template.edits) {
    let span: Span = match.span;
    if (edit.target !== undefined) {
      const target = match.bindings[edit.target];
      if (!target) {
        return null;
      }
      span = target.span;
    }

    const content = edit.content === undefined ? '' : renderTemplate(edit.content, match.bindings, source, matchText);
    switch (edit.type) {
      case 'replace':
        edits.push({ location: spanToLocation(span), content });
        break;
      case 'remove':
        edits.push({ location: spanToLocation(span), content: '' });
        break;
      case 'insert-before':
        edits.push({ location: pointLocation(span.startPosition, span.startIndex), content });
        break;
      case 'insert-after':
        edits.push({ location: pointLocation(span.endPosition, span.endIndex), content });
        break;
    }
  }

  const description =
    template.description === undefined
      ? DEFAULT_FIX_DESCRIPTION
      : renderTemplate(template.description, match.bindings, source, matchText);
  return { description, edits };
}

/**
 * Apply a fix to the content it was computed for.
 *
 * @throws FixApplicationError when edits overlap or fall outside the content
 */
export function applyFix(content: string, fix: SuggestedFix): string {
  const edits = [...fix.edits].sort(
    (a, b) => a.location.startOffset - b.location.startOffset || a.location.endOffset - b.location.endOffset
  );

  let previousEnd = 0;
  for (const edit of edits) {
    const { startOffset, endOffset } = edit.location;
    if (startOffset < 0 || endOffset > content.length || startOffset > endOffset) {
      throw new FixApplicationError(`Edit ${startOffset}-${endOffset} is outside the content`, {
        startOffset,
        endOffset,
        length: content.length,
      });
    }
    if (startOffset < previousEnd) {
      throw new FixApplicationError(`Edit ${startOffset}-${endOffset} overlaps a previous edit`, {
        startOffset,
        endOffset,
      });
    }
    previousEnd = endOffset;
  }

  let result = '';
  let cursor = 0;
  for (const edit of edits) {
    result += content.slice(cursor, edit.location.startOffset) + edit.content;
    cursor = edit.location.endOffset;
  }
  return result + content.slice(cursor);
}
