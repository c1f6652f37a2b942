/**
 * Tree-sitter Parser - adapter for the grammars loaded by the tree-sitter loader
 *
 * Walks the native tree with a cursor so every child keeps its grammar
 * field name. `ERROR` nodes and missing nodes stay in the tree, flagged
 * with `hasError`, and are reported as diagnostics.
 */

import { BaseParser } from '../base-parser.js';
import { createDraftNode, finalizeTree, type DraftDiagnostic, type DraftNode } from '../syntax-tree.js';
import {
  createTreeSitterParser,
  getTreeSitterLoadingError,
  isTreeSitterAvailable,
  type TreeSitterLanguageId,
} from './loader.js';

import type { SyntaxTree } from '../types.js';
import type { TreeSitterCursor, TreeSitterParser as NativeParser } from './types.js';

/** Characters handed to the native parser per input callback */
const INPUT_CHUNK_SIZE = 16 * 1024;

const EXTENSIONS: Readonly<Record<TreeSitterLanguageId, string[]>> = {
  python: ['.py', '.pyi'],
  java: ['.java'],
  go: ['.go'],
};

export class TreeSitterParser extends BaseParser {
  readonly language: TreeSitterLanguageId;
  readonly extensions: string[];
  private parser: NativeParser | null = null;

  constructor(language: TreeSitterLanguageId) {
    super();
    this.language = language;
    this.extensions = [...EXTENSIONS[language]];
  }

  override isAvailable(): boolean {
    return isTreeSitterAvailable(this.language);
  }

  override getUnavailableReason(): string | null {
    return getTreeSitterLoadingError(this.language);
  }

  protected buildTree(source: string): SyntaxTree {
    if (!this.parser) {
      this.parser = createTreeSitterParser(this.language);
    }
    const nativeTree = this.parser.parse((index) =>
      index < source.length ? source.slice(index, index + INPUT_CHUNK_SIZE) : null
    );

    const diagnostics: DraftDiagnostic[] = [];
    const cursor = nativeTree.walk();
    const root = this.convertCursor(cursor, diagnostics);
    return finalizeTree(this.language, source, root, diagnostics);
  }

  /**
   * Convert the subtree under the cursor. Iterative to keep deep trees off the call stack.
   */
  private convertCursor(cursor: TreeSitterCursor, diagnostics: DraftDiagnostic[]): DraftNode {
    const root = this.currentDraft(cursor, diagnostics);
    const stack: DraftNode[] = [root];

    if (!cursor.gotoFirstChild()) {
      return root;
    }
    for (;;) {
      const parent = stack[stack.length - 1];
      const draft = this.currentDraft(cursor, diagnostics);
      parent?.children.push(draft);

      if (cursor.gotoFirstChild()) {
        stack.push(draft);
        continue;
      }
      while (!cursor.gotoNextSibling()) {
        if (!cursor.gotoParent() || stack.length <= 1) {
          return root;
        }
        stack.pop();
      }
    }
  }

  private currentDraft(cursor: TreeSitterCursor, diagnostics: DraftDiagnostic[]): DraftNode {
    const fieldName = cursor.currentFieldName;
    const isError = cursor.nodeType === 'ERROR';
    const isMissing = cursor.nodeIsMissing;

    if (isError) {
      diagnostics.push({ message: 'Unexpected syntax', startIndex: cursor.startIndex, endIndex: cursor.endIndex });
    } else if (isMissing) {
      diagnostics.push({
        message: `Missing ${cursor.nodeType}`,
        startIndex: cursor.startIndex,
        endIndex: cursor.endIndex,
      });
    }

    return createDraftNode(cursor.nodeType, cursor.startIndex, cursor.endIndex, {
      named: cursor.nodeIsNamed,
      field: typeof fieldName === 'string' && fieldName.length > 0 ? fieldName : null,
      hasError: isError || isMissing,
    });
  }
}
