import ts from 'typescript';
import { FunctionKeySet, normalizePath } from './function-key.js';
import { SourceParseError } from './errors.js';
import type { FunctionKey } from './types.js';

export interface DeclarationOptions {
  /** Directory glob patterns are resolved against */
  cwd?: string;
  /** Glob patterns of files to leave out */
  exclude?: string[];
}

const COMPILER_OPTIONS: ts.CompilerOptions = {
  target: ts.ScriptTarget.ES2022,
  allowJs: true,
  jsx: ts.JsxEmit.Preserve,
  noResolve: true,
  noLib: true,
  noEmit: true,
  types: [],
};

/**
 * Collects every function definition declared in a set of source files.
 * Nested, class-scoped and conditional definitions are all included.
 */
export class DeclarationExtractor {
  private cwd: string;
  private exclude: string[];

  constructor(options: DeclarationOptions = {}) {
    this.cwd = options.cwd ?? process.cwd();
    this.exclude = options.exclude ?? [];
  }

  /** Declared functions in every file matching any of the patterns */
  async declaredFunctions(patterns: string[]): Promise<FunctionKeySet> {
    const files = await this.resolveFiles(patterns);
    return this.extract(files);
  }

  /** Get absolute file paths matching the patterns, deduplicated and sorted */
  async resolveFiles(patterns: string[]): Promise<string[]> {
    const { glob } = await import('glob');
    const included: string[] = [];

    for (const pattern of patterns) {
      const matches = await glob(pattern, {
        cwd: this.cwd,
        absolute: true,
        ignore: this.exclude,
        nodir: true,
      });
      included.push(...matches.map(m => normalizePath(m, this.cwd)));
    }

    return [...new Set(included)].sort();
  }

  /** Parse the files and collect their declarations. Any syntax error aborts. */
  extract(files: string[]): FunctionKeySet {
    const declared = new FunctionKeySet();
    if (files.length === 0) return declared;

    // Parent pointers are needed to name functions after what they are assigned to
    const host = ts.createCompilerHost(COMPILER_OPTIONS, true);
    const program = ts.createProgram(files, COMPILER_OPTIONS, host);

    for (const file of files) {
      const sourceFile = program.getSourceFile(file);
      if (!sourceFile) {
        throw new SourceParseError(file, ['not a JavaScript or TypeScript source file']);
      }

      const diagnostics = program.getSyntacticDiagnostics(sourceFile);
      if (diagnostics.length > 0) {
        throw new SourceParseError(file, diagnostics.map(d => formatDiagnostic(d)));
      }

      declared.addAll(declarationsIn(sourceFile, file));
    }

    return declared;
  }
}

/** Convenience wrapper over DeclarationExtractor */
export function declaredFunctions(
  patterns: string[],
  options: DeclarationOptions = {}
): Promise<FunctionKeySet> {
  return new DeclarationExtractor(options).declaredFunctions(patterns);
}

/** Yield a key for every function definition in the file, at any depth */
export function* declarationsIn(sourceFile: ts.SourceFile, path: string): Generator<FunctionKey> {
  for (const node of walk(sourceFile)) {
    if (!isFunctionDefinition(node)) continue;

    const name = functionName(node, sourceFile);
    if (name === null) continue;

    const { line } = sourceFile.getLineAndCharacterOfPosition(startPosition(node, sourceFile));
    yield { path, line: line + 1, name };
  }
}

function* walk(node: ts.Node): Generator<ts.Node> {
  yield node;
  const children: ts.Node[] = [];
  ts.forEachChild(node, child => {
    children.push(child);
  });
  for (const child of children) {
    yield* walk(child);
  }
}

type FunctionDefinition =
  | ts.FunctionDeclaration
  | ts.FunctionExpression
  | ts.ArrowFunction
  | ts.MethodDeclaration
  | ts.ConstructorDeclaration
  | ts.GetAccessorDeclaration
  | ts.SetAccessorDeclaration;

/** Function-like nodes with a body. Overloads and ambient signatures are not definitions. */
function isFunctionDefinition(node: ts.Node): node is FunctionDefinition {
  return (
    (ts.isFunctionDeclaration(node) ||
      ts.isFunctionExpression(node) ||
      ts.isArrowFunction(node) ||
      ts.isMethodDeclaration(node) ||
      ts.isConstructorDeclaration(node) ||
      ts.isGetAccessorDeclaration(node) ||
      ts.isSetAccessorDeclaration(node)) &&
    node.body !== undefined
  );
}

/**
 * The name the runtime gives the function, or null for anonymous ones
 * (callbacks, IIFEs, constructors of anonymous classes). With `inferMembers`
 * off, functions assigned to a property count as anonymous: that is the name
 * V8 pushes as the enclosing name while it compiles their bodies.
 */
function functionName(node: FunctionDefinition, sourceFile: ts.SourceFile, inferMembers = true): string | null {
  if (ts.isFunctionDeclaration(node)) {
    if (node.name) return node.name.text;
    return hasModifier(node, ts.SyntaxKind.DefaultKeyword) ? 'default' : null;
  }

  if (ts.isMethodDeclaration(node)) {
    return propertyNameText(node.name, sourceFile);
  }

  if (ts.isGetAccessorDeclaration(node)) {
    return `get ${propertyNameText(node.name, sourceFile)}`;
  }

  if (ts.isSetAccessorDeclaration(node)) {
    return `set ${propertyNameText(node.name, sourceFile)}`;
  }

  if (ts.isConstructorDeclaration(node)) {
    const cls = node.parent;
    if (cls.name) return cls.name.text;
    if (hasModifier(cls, ts.SyntaxKind.DefaultKeyword)) return 'default';
    return ts.isClassExpression(cls) ? bindingName(cls, sourceFile, inferMembers) : null;
  }

  if (ts.isFunctionExpression(node) && node.name) {
    return node.name.text;
  }

  return bindingName(node, sourceFile, inferMembers);
}

/** Name inferred from what an anonymous function or class expression is assigned to */
function bindingName(node: ts.Expression, sourceFile: ts.SourceFile, inferMembers: boolean): string | null {
  const parent = node.parent;

  if (ts.isVariableDeclaration(parent) && parent.initializer === node) {
    return ts.isIdentifier(parent.name) ? parent.name.text : null;
  }

  if ((ts.isPropertyDeclaration(parent) || ts.isPropertyAssignment(parent)) && parent.initializer === node) {
    return propertyNameText(parent.name, sourceFile);
  }

  if (
    ts.isBinaryExpression(parent) &&
    parent.right === node &&
    parent.operatorToken.kind === ts.SyntaxKind.EqualsToken
  ) {
    const target = parent.left;
    if (ts.isIdentifier(target)) return target.text;
    if (inferMembers && ts.isPropertyAccessExpression(target)) return memberName(target, sourceFile);
    return null;
  }

  if (ts.isExportAssignment(parent) && parent.expression === node) {
    return 'default';
  }

  return null;
}

/**
 * V8's inferred name for a function assigned to `a.b.c`: the access chain
 * without `this` and `prototype` segments, behind the name of the enclosing
 * function when that name starts with a capital letter.
 * `Foo.prototype.bar` gives `Foo.bar`; `this.inner` inside `function Legacy`
 * gives `Legacy.inner`.
 */
function memberName(target: ts.PropertyAccessExpression, sourceFile: ts.SourceFile): string | null {
  const segments: string[] = [];
  let current: ts.Expression = target;
  while (ts.isPropertyAccessExpression(current)) {
    segments.unshift(current.name.text);
    current = current.expression;
  }

  if (ts.isIdentifier(current)) {
    segments.unshift(current.text);
  } else if (current.kind !== ts.SyntaxKind.ThisKeyword) {
    return null;
  }

  const enclosing = ts.findAncestor(target.parent, isFunctionDefinition);
  const enclosingName = enclosing ? functionName(enclosing, sourceFile, false) : null;
  if (enclosingName !== null && /^\p{Lu}/u.test(enclosingName)) {
    segments.unshift(enclosingName);
  }

  const name = segments.filter(segment => segment !== 'prototype').join('.');
  return name === '' ? null : name;
}

function propertyNameText(name: ts.PropertyName, sourceFile: ts.SourceFile): string {
  if (ts.isComputedPropertyName(name)) {
    return `[${name.expression.getText(sourceFile)}]`;
  }
  return name.text;
}

function hasModifier(node: ts.Node, kind: ts.SyntaxKind): boolean {
  const modifiers = ts.canHaveModifiers(node) ? ts.getModifiers(node) : undefined;
  return modifiers?.some(m => m.kind === kind) ?? false;
}

/**
 * Where the function's runtime range begins: the `function` (or `async`)
 * keyword, the property name of a method or accessor, the `constructor`
 * keyword, or the start of an arrow function. Decorators and `export`
 * modifiers are skipped.
 */
function startPosition(node: FunctionDefinition, sourceFile: ts.SourceFile): number {
  if (ts.isConstructorDeclaration(node)) {
    return tokenStart(node, ts.SyntaxKind.ConstructorKeyword, sourceFile);
  }

  if (ts.isMethodDeclaration(node) || ts.isGetAccessorDeclaration(node) || ts.isSetAccessorDeclaration(node)) {
    return node.name.getStart(sourceFile);
  }

  if (ts.isFunctionDeclaration(node) || ts.isFunctionExpression(node)) {
    const asyncModifier = ts.getModifiers(node)?.find(m => m.kind === ts.SyntaxKind.AsyncKeyword);
    if (asyncModifier) return asyncModifier.getStart(sourceFile);
    return tokenStart(node, ts.SyntaxKind.FunctionKeyword, sourceFile);
  }

  return node.getStart(sourceFile);
}

function tokenStart(node: ts.Node, kind: ts.SyntaxKind, sourceFile: ts.SourceFile): number {
  const token = node.getChildren(sourceFile).find(child => child.kind === kind);
  return (token ?? node).getStart(sourceFile);
}

function formatDiagnostic(diagnostic: ts.Diagnostic): string {
  const message = ts.flattenDiagnosticMessageText(diagnostic.messageText, '\n');
  if (diagnostic.file && diagnostic.start !== undefined) {
    const { line, character } = diagnostic.file.getLineAndCharacterOfPosition(diagnostic.start);
    return `(${line + 1},${character + 1}): ${message}`;
  }
  return message;
}
