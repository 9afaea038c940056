import ts from "typescript";
import { sortIds } from "../determinism/CanonicalOrder.js";

export interface ImportBinding {
  local: string;
  /** Exported name, "default", or "*" for a namespace or require binding. */
  imported: string;
}

export interface ImportRecord {
  specifier: string;
  typeOnly: boolean;
  bindings: ImportBinding[];
}

export type DeclarationKind = "type" | "value";

export interface DeclarationRecord {
  name: string;
  kind: DeclarationKind;
  /** Identifiers referenced anywhere in the declaration, sorted, unique. */
  references: string[];
}

export interface ModuleInfo {
  imports: ImportRecord[];
  declarations: DeclarationRecord[];
}

function stringSpecifier(expr: ts.Expression | undefined): string | undefined {
  if (!expr || !ts.isStringLiteralLike(expr)) return undefined;
  return expr.text;
}

function importRecord(node: ts.ImportDeclaration): ImportRecord | undefined {
  const specifier = stringSpecifier(node.moduleSpecifier);
  if (specifier === undefined) return undefined;

  const clause = node.importClause;
  if (!clause) return { specifier, typeOnly: false, bindings: [] };

  const bindings: ImportBinding[] = [];
  let valueBindings = 0;
  if (clause.name) {
    bindings.push({ local: clause.name.text, imported: "default" });
    valueBindings++;
  }
  const named = clause.namedBindings;
  if (named && ts.isNamespaceImport(named)) {
    bindings.push({ local: named.name.text, imported: "*" });
    valueBindings++;
  } else if (named) {
    for (const el of named.elements) {
      bindings.push({ local: el.name.text, imported: (el.propertyName ?? el.name).text });
      if (!el.isTypeOnly) valueBindings++;
    }
  }

  const typeOnly = clause.isTypeOnly || (bindings.length > 0 && valueBindings === 0);
  return { specifier, typeOnly, bindings };
}

function isMemberName(node: ts.Identifier): boolean {
  const parent = node.parent;
  if (!parent) return false;
  if (ts.isPropertyAccessExpression(parent)) return parent.name === node;
  if (ts.isQualifiedName(parent)) return parent.right === node;
  if (
    ts.isPropertyAssignment(parent) ||
    ts.isPropertySignature(parent) ||
    ts.isPropertyDeclaration(parent) ||
    ts.isMethodDeclaration(parent) ||
    ts.isMethodSignature(parent) ||
    ts.isGetAccessorDeclaration(parent) ||
    ts.isSetAccessorDeclaration(parent) ||
    ts.isEnumMember(parent)
  ) {
    return parent.name === node;
  }
  return false;
}

function collectReferences(root: ts.Node): string[] {
  const refs = new Set<string>();
  function visit(node: ts.Node): void {
    if (ts.isIdentifier(node) && !isMemberName(node)) refs.add(node.text);
    ts.forEachChild(node, visit);
  }
  visit(root);
  return sortIds(refs);
}

function declarationNames(statement: ts.Statement): { name: string; kind: DeclarationKind; node: ts.Node }[] {
  if (ts.isInterfaceDeclaration(statement) || ts.isTypeAliasDeclaration(statement)) {
    return [{ name: statement.name.text, kind: "type", node: statement }];
  }
  if (ts.isEnumDeclaration(statement)) {
    return [{ name: statement.name.text, kind: "type", node: statement }];
  }
  if (ts.isFunctionDeclaration(statement) || ts.isClassDeclaration(statement)) {
    return [{ name: statement.name?.text ?? "default", kind: "value", node: statement }];
  }
  if (ts.isVariableStatement(statement)) {
    return statement.declarationList.declarations
      .filter((d): d is ts.VariableDeclaration & { name: ts.Identifier } => ts.isIdentifier(d.name))
      .map((d) => ({ name: d.name.text, kind: "value" as const, node: d }));
  }
  return [];
}

/**
 * Module specifiers and top-level declarations of one source file.
 * Covers static imports, re-exports, `import x = require()`, dynamic `import()`
 * and `require()` calls.
 */
export function parseModule(fileName: string, fileText: string): ModuleInfo {
  const sourceFile = ts.createSourceFile(fileName, fileText, ts.ScriptTarget.Latest, true);

  const imports: ImportRecord[] = [];
  const byName = new Map<string, { kind: DeclarationKind; refs: Set<string> }>();

  function visit(node: ts.Node): void {
    if (ts.isImportDeclaration(node)) {
      const record = importRecord(node);
      if (record) imports.push(record);
    } else if (ts.isExportDeclaration(node)) {
      const specifier = stringSpecifier(node.moduleSpecifier);
      if (specifier !== undefined) imports.push({ specifier, typeOnly: node.isTypeOnly, bindings: [] });
    } else if (ts.isImportEqualsDeclaration(node) && ts.isExternalModuleReference(node.moduleReference)) {
      const specifier = stringSpecifier(node.moduleReference.expression);
      if (specifier !== undefined) {
        imports.push({
          specifier,
          typeOnly: node.isTypeOnly,
          bindings: [{ local: node.name.text, imported: "*" }],
        });
      }
    } else if (ts.isCallExpression(node) && node.arguments.length === 1) {
      const isDynamicImport = node.expression.kind === ts.SyntaxKind.ImportKeyword;
      const isRequire = ts.isIdentifier(node.expression) && node.expression.text === "require";
      const specifier = stringSpecifier(node.arguments[0]);
      if ((isDynamicImport || isRequire) && specifier !== undefined) {
        imports.push({ specifier, typeOnly: false, bindings: [] });
      }
    }
    ts.forEachChild(node, visit);
  }
  visit(sourceFile);

  for (const statement of sourceFile.statements) {
    for (const decl of declarationNames(statement)) {
      const existing = byName.get(decl.name);
      const refs = existing?.refs ?? new Set<string>();
      for (const r of collectReferences(decl.node)) refs.add(r);
      // a value and a type sharing one name (const Foo / type Foo) count as a value
      const kind: DeclarationKind = existing?.kind === "value" || decl.kind === "value" ? "value" : "type";
      byName.set(decl.name, { kind, refs });
    }
  }

  const declarations = sortIds(byName.keys()).map((name) => {
    const entry = byName.get(name);
    const references = entry ? sortIds([...entry.refs].filter((r) => r !== name)) : [];
    return { name, kind: entry?.kind ?? "value", references };
  });

  return { imports, declarations };
}
