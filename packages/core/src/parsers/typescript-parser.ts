/**
 * TypeScript Parser - TypeScript/JavaScript adapter using the TypeScript Compiler API
 *
 * Node kinds are `ts.SyntaxKind` names (`CatchClause`, `Block`, ...). Field
 * names are the property of the parent node holding the child (`block`,
 * `catchClause`, `statements`, ...). Punctuation tokens are anonymous nodes.
 */

import ts from 'typescript';

import { BaseParser } from './base-parser.js';
import { createDraftNode, finalizeTree, type DraftDiagnostic, type DraftNode } from './syntax-tree.js';

import type { Language, SyntaxTree } from './types.js';

/**
 * Kind names without the `FirstX`/`LastX` range markers that alias real kinds
 */
const KIND_NAMES: ReadonlyMap<number, string> = (() => {
  const names = new Map<number, string>();
  for (const [name, value] of Object.entries(ts.SyntaxKind)) {
    if (typeof value !== 'number' || /^(First|Last)[A-Z]/.test(name) || name === 'Count') {
      continue;
    }
    if (!names.has(value)) {
      names.set(value, name);
    }
  }
  return names;
})();

/** Parent properties that reference nodes but are not syntactic children */
const NON_CHILD_PROPERTIES = new Set([
  'parent',
  'original',
  'symbol',
  'localSymbol',
  'locals',
  'nextContainer',
  'flowNode',
  'endFlowNode',
  'returnFlowNode',
  'emitNode',
  'jsDoc',
  'jsDocCache',
  'externalModuleIndicator',
  'commonJsModuleIndicator',
  'imports',
  'moduleAugmentations',
]);

const SCRIPT_KINDS: Record<string, ts.ScriptKind> = {
  '.ts': ts.ScriptKind.TS,
  '.mts': ts.ScriptKind.TS,
  '.cts': ts.ScriptKind.TS,
  '.tsx': ts.ScriptKind.TSX,
  '.js': ts.ScriptKind.JS,
  '.mjs': ts.ScriptKind.JS,
  '.cjs': ts.ScriptKind.JS,
  '.jsx': ts.ScriptKind.JSX,
};

export function syntaxKindName(kind: ts.SyntaxKind): string {
  return KIND_NAMES.get(kind) ?? `Kind${kind}`;
}

function isPunctuation(kind: ts.SyntaxKind): boolean {
  return (
    (kind >= ts.SyntaxKind.FirstPunctuation && kind <= ts.SyntaxKind.LastPunctuation) ||
    kind === ts.SyntaxKind.EndOfFileToken
  );
}

/**
 * TypeScript/JavaScript adapter.
 *
 * One class serves both languages; the instance's language decides which
 * extensions it claims and the default script kind.
 */
export class TypeScriptParser extends BaseParser {
  readonly language: Language;
  readonly extensions: string[];

  constructor(language: 'typescript' | 'javascript' = 'typescript') {
    super();
    this.language = language;
    this.extensions = language === 'typescript' ? ['.ts', '.tsx', '.mts', '.cts'] : ['.js', '.jsx', '.mjs', '.cjs'];
  }

  protected buildTree(source: string, filePath: string): SyntaxTree {
    const fileName = `/${filePath.replace(/\\/g, '/').replace(/^\/+/, '')}`;
    const sourceFile = ts.createSourceFile(fileName, source, ts.ScriptTarget.Latest, true, this.getScriptKind(fileName));

    const root = createDraftNode(syntaxKindName(sourceFile.kind), 0, source.length);
    this.convertChildren(sourceFile, root, sourceFile);

    const diagnostics: DraftDiagnostic[] = this.getSyntacticDiagnostics(sourceFile).map((diagnostic) => ({
      message: ts.flattenDiagnosticMessageText(diagnostic.messageText, '\n'),
      startIndex: diagnostic.start,
      endIndex: diagnostic.start + diagnostic.length,
    }));
    for (const diagnostic of diagnostics) {
      this.markError(root, diagnostic.startIndex);
    }

    return finalizeTree(this.language, source, root, diagnostics);
  }

  private getScriptKind(fileName: string): ts.ScriptKind {
    const dot = fileName.lastIndexOf('.');
    const extension = dot === -1 ? '' : fileName.slice(dot).toLowerCase();
    return SCRIPT_KINDS[extension] ?? (this.language === 'typescript' ? ts.ScriptKind.TS : ts.ScriptKind.JS);
  }

  private convertChildren(node: ts.Node, draft: DraftNode, sourceFile: ts.SourceFile): void {
    const fields = this.childFields(node);
    ts.forEachChild(node, (child) => {
      draft.children.push(this.convertNode(child, fields.get(child) ?? null, sourceFile));
    });
  }

  private convertNode(node: ts.Node, field: string | null, sourceFile: ts.SourceFile): DraftNode {
    const draft = createDraftNode(syntaxKindName(node.kind), node.getStart(sourceFile), node.getEnd(), {
      named: !isPunctuation(node.kind),
      field,
    });
    this.convertChildren(node, draft, sourceFile);
    return draft;
  }

  /**
   * Map each syntactic child to the parent property holding it
   */
  private childFields(node: ts.Node): Map<unknown, string> {
    const fields = new Map<unknown, string>();
    for (const key of Object.keys(node)) {
      if (NON_CHILD_PROPERTIES.has(key)) {
        continue;
      }
      const value: unknown = Reflect.get(node, key);
      if (Array.isArray(value)) {
        for (const element of value) {
          if (!fields.has(element)) fields.set(element, key);
        }
      } else if (typeof value === 'object' && value !== null && !fields.has(value)) {
        fields.set(value, key);
      }
    }
    return fields;
  }

  /**
   * Flag the innermost node containing a diagnostic offset
   */
  private markError(root: DraftNode, offset: number): void {
    let current = root;
    for (;;) {
      const next = current.children.find((child) => child.startIndex <= offset && offset < child.endIndex);
      if (!next) break;
      current = next;
    }
    current.hasError = true;
  }

  /**
   * Syntactic diagnostics through a single-file program (public API only)
   */
  private getSyntacticDiagnostics(sourceFile: ts.SourceFile): readonly ts.DiagnosticWithLocation[] {
    const host: ts.CompilerHost = {
      getSourceFile: (name) => (name === sourceFile.fileName ? sourceFile : undefined),
      getDefaultLibFileName: () => '/lib.d.ts',
      writeFile: () => undefined,
      getCurrentDirectory: () => '/',
      getCanonicalFileName: (name) => name,
      useCaseSensitiveFileNames: () => true,
      getNewLine: () => '\n',
      fileExists: (name) => name === sourceFile.fileName,
      readFile: () => undefined,
    };
    const program = ts.createProgram({
      rootNames: [sourceFile.fileName],
      options: { noLib: true, noResolve: true, allowJs: true, types: [] },
      host,
    });
    return program.getSyntacticDiagnostics(sourceFile);
  }
}
