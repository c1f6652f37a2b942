/**
 * Structural types for the parts of the `tree-sitter` binding the adapter uses.
 *
 * The binding and its grammars are optional native packages loaded with
 * `require` at run time, so the adapter describes only what it touches.
 */

export interface TreeSitterPoint {
  row: number;
  column: number;
}

/** Opaque grammar handle exported by a `tree-sitter-<language>` package */
export type TreeSitterLanguage = object;

export interface TreeSitterCursor {
  readonly nodeType: string;
  readonly nodeIsNamed: boolean;
  readonly nodeIsMissing: boolean;
  readonly startIndex: number;
  readonly endIndex: number;
  /** Field name of the current node; a string or null depending on the binding release */
  readonly currentFieldName?: unknown;
  gotoFirstChild(): boolean;
  gotoNextSibling(): boolean;
  gotoParent(): boolean;
}

export interface TreeSitterNode {
  readonly type: string;
  readonly startIndex: number;
  readonly endIndex: number;
}

export interface TreeSitterTree {
  readonly rootNode: TreeSitterNode;
  walk(): TreeSitterCursor;
}

export type TreeSitterInput = (index: number, position?: TreeSitterPoint) => string | null;

export interface TreeSitterParser {
  setLanguage(language: TreeSitterLanguage): void;
  parse(input: string | TreeSitterInput): TreeSitterTree;
}

export type TreeSitterParserConstructor = new () => TreeSitterParser;
