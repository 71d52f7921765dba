/**
 * Source to Pattern Context Extractor
 *
 * Parses TypeScript source with the compiler API (syntax only, no type
 * checking) and produces the class, function and interface summaries the
 * pattern detectors work on.
 *
 * @module
 */

import * as fs from "node:fs/promises";
import * as path from "node:path";
import ts from "typescript";
import type {
  ClassInfo,
  FunctionInfo,
  InterfaceInfo,
  MethodInfo,
  PropertyInfo,
  ParameterInfo,
  PatternAnalysisContext,
} from "./interfaces.js";
import {
  generateClassId,
  generateFunctionId,
  generateInterfaceId,
  generateMethodId,
} from "../../../utils/index.js";
import { AnalysisError, ErrorCode } from "../../errors.js";

// =============================================================================
// Node Helpers
// =============================================================================

function hasModifier(node: ts.Node, kind: ts.SyntaxKind): boolean {
  if (!ts.canHaveModifiers(node)) return false;
  return (ts.getModifiers(node) ?? []).some((m) => m.kind === kind);
}

function lineOf(node: ts.Node, sourceFile: ts.SourceFile): number {
  return sourceFile.getLineAndCharacterOfPosition(node.getStart(sourceFile)).line + 1;
}

function memberName(name: ts.PropertyName, sourceFile: ts.SourceFile): string {
  if (
    ts.isIdentifier(name) ||
    ts.isPrivateIdentifier(name) ||
    ts.isStringLiteral(name) ||
    ts.isNumericLiteral(name)
  ) {
    return name.text;
  }
  return name.getText(sourceFile);
}

function isPrivateMember(node: ts.ClassElement | ts.ParameterDeclaration): boolean {
  if (hasModifier(node, ts.SyntaxKind.PrivateKeyword)) return true;
  return node.name !== undefined && ts.isPrivateIdentifier(node.name);
}

function scriptKindFor(filePath: string): ts.ScriptKind {
  switch (path.extname(filePath).toLowerCase()) {
    case ".tsx":
      return ts.ScriptKind.TSX;
    case ".js":
    case ".mjs":
    case ".cjs":
      return ts.ScriptKind.JS;
    case ".jsx":
      return ts.ScriptKind.JSX;
    default:
      return ts.ScriptKind.TS;
  }
}

/**
 * Heritage clause entries as bare names: `Prototype<Shape>` becomes `Prototype`.
 */
function heritageNames(
  clauses: ts.NodeArray<ts.HeritageClause> | undefined,
  token: ts.SyntaxKind.ExtendsKeyword | ts.SyntaxKind.ImplementsKeyword,
  sourceFile: ts.SourceFile
): string[] {
  if (!clauses) return [];
  return clauses
    .filter((clause) => clause.token === token)
    .flatMap((clause) => clause.types.map((t) => t.expression.getText(sourceFile)));
}

// =============================================================================
// Conversion
// =============================================================================

function convertParameter(param: ts.ParameterDeclaration, sourceFile: ts.SourceFile): ParameterInfo {
  return {
    name: param.name.getText(sourceFile),
    type: param.type?.getText(sourceFile),
    isOptional: param.questionToken !== undefined || param.initializer !== undefined,
  };
}

function isParameterProperty(param: ts.ParameterDeclaration): boolean {
  return (
    hasModifier(param, ts.SyntaxKind.PublicKeyword) ||
    hasModifier(param, ts.SyntaxKind.PrivateKeyword) ||
    hasModifier(param, ts.SyntaxKind.ProtectedKeyword) ||
    hasModifier(param, ts.SyntaxKind.ReadonlyKeyword)
  );
}

function convertParameterProperty(param: ts.ParameterDeclaration, sourceFile: ts.SourceFile): PropertyInfo {
  return {
    name: param.name.getText(sourceFile),
    type: param.type?.getText(sourceFile),
    isStatic: false,
    isPrivate: hasModifier(param, ts.SyntaxKind.PrivateKeyword),
    isReadonly: hasModifier(param, ts.SyntaxKind.ReadonlyKeyword),
    defaultValue: param.initializer?.getText(sourceFile),
  };
}

function convertMethod(
  method: ts.MethodDeclaration,
  classId: string,
  sourceFile: ts.SourceFile
): MethodInfo {
  const name = memberName(method.name, sourceFile);
  const isPrivate = isPrivateMember(method);
  const isProtected = hasModifier(method, ts.SyntaxKind.ProtectedKeyword);

  return {
    id: generateMethodId(classId, name, lineOf(method, sourceFile)),
    name,
    classId,
    parameters: method.parameters.map((p) => convertParameter(p, sourceFile)),
    returnType: method.type?.getText(sourceFile),
    isStatic: hasModifier(method, ts.SyntaxKind.StaticKeyword),
    isAbstract: hasModifier(method, ts.SyntaxKind.AbstractKeyword),
    isPrivate,
    isPublic: !isPrivate && !isProtected,
    body: method.body?.getText(sourceFile),
  };
}

function convertProperty(prop: ts.PropertyDeclaration, sourceFile: ts.SourceFile): PropertyInfo {
  return {
    name: memberName(prop.name, sourceFile),
    type: prop.type?.getText(sourceFile),
    isStatic: hasModifier(prop, ts.SyntaxKind.StaticKeyword),
    isPrivate: isPrivateMember(prop),
    isReadonly: hasModifier(prop, ts.SyntaxKind.ReadonlyKeyword),
    defaultValue: prop.initializer?.getText(sourceFile),
  };
}

function convertClass(
  node: ts.ClassDeclaration,
  filePath: string,
  sourceFile: ts.SourceFile
): ClassInfo {
  const name = node.name?.text ?? "default";
  const line = lineOf(node, sourceFile);
  const id = generateClassId(filePath, name, line);

  const methods: MethodInfo[] = [];
  const properties: PropertyInfo[] = [];
  let constructorNode: ts.ConstructorDeclaration | undefined;

  for (const member of node.members) {
    if (ts.isMethodDeclaration(member)) {
      // Overload signatures carry no body and are not abstract
      if (!member.body && !hasModifier(member, ts.SyntaxKind.AbstractKeyword)) continue;
      methods.push(convertMethod(member, id, sourceFile));
    } else if (ts.isPropertyDeclaration(member)) {
      properties.push(convertProperty(member, sourceFile));
    } else if (ts.isConstructorDeclaration(member)) {
      if (!constructorNode || (!constructorNode.body && member.body)) {
        constructorNode = member;
      }
    }
  }

  const constructorParams: ParameterInfo[] = [];
  if (constructorNode) {
    for (const param of constructorNode.parameters) {
      constructorParams.push(convertParameter(param, sourceFile));
      if (isParameterProperty(param)) {
        properties.push(convertParameterProperty(param, sourceFile));
      }
    }
  }

  const hasPrivateConstructor =
    constructorNode !== undefined &&
    (hasModifier(constructorNode, ts.SyntaxKind.PrivateKeyword) ||
      hasModifier(constructorNode, ts.SyntaxKind.ProtectedKeyword));

  return {
    id,
    name,
    filePath,
    line,
    methods,
    properties,
    constructorParams,
    extendsClass: heritageNames(node.heritageClauses, ts.SyntaxKind.ExtendsKeyword, sourceFile)[0],
    implementsInterfaces: heritageNames(node.heritageClauses, ts.SyntaxKind.ImplementsKeyword, sourceFile),
    isAbstract: hasModifier(node, ts.SyntaxKind.AbstractKeyword),
    isExported: hasModifier(node, ts.SyntaxKind.ExportKeyword),
    hasPrivateConstructor,
  };
}

function convertFunction(
  node: ts.FunctionDeclaration,
  name: string,
  filePath: string,
  sourceFile: ts.SourceFile
): FunctionInfo {
  const line = lineOf(node, sourceFile);
  return {
    id: generateFunctionId(filePath, name, line),
    name,
    filePath,
    line,
    parameters: node.parameters.map((p) => convertParameter(p, sourceFile)),
    returnType: node.type?.getText(sourceFile),
    isExported: hasModifier(node, ts.SyntaxKind.ExportKeyword),
    body: node.body?.getText(sourceFile),
  };
}

function convertInterface(
  node: ts.InterfaceDeclaration,
  filePath: string,
  sourceFile: ts.SourceFile
): InterfaceInfo {
  const line = lineOf(node, sourceFile);
  const methods: InterfaceInfo["methods"] = [];
  const properties: InterfaceInfo["properties"] = [];

  for (const member of node.members) {
    if (ts.isMethodSignature(member)) {
      methods.push({
        name: memberName(member.name, sourceFile),
        parameters: member.parameters.map((p) => convertParameter(p, sourceFile)),
        returnType: member.type?.getText(sourceFile),
      });
    } else if (ts.isPropertySignature(member)) {
      properties.push({
        name: memberName(member.name, sourceFile),
        type: member.type?.getText(sourceFile),
        isOptional: member.questionToken !== undefined,
      });
    }
  }

  return {
    id: generateInterfaceId(filePath, node.name.text, line),
    name: node.name.text,
    filePath,
    line,
    methods,
    properties,
    extendsInterfaces: heritageNames(node.heritageClauses, ts.SyntaxKind.ExtendsKeyword, sourceFile),
    isExported: hasModifier(node, ts.SyntaxKind.ExportKeyword),
  };
}

// =============================================================================
// Public API
// =============================================================================

/**
 * Extract the pattern analysis context from TypeScript source text.
 *
 * Classes and interfaces are collected wherever they are declared; functions
 * only at the top level of the file.
 */
export function extractPatternContext(source: string, filePath: string): PatternAnalysisContext {
  const sourceFile = ts.createSourceFile(
    filePath,
    source,
    ts.ScriptTarget.Latest,
    true,
    scriptKindFor(filePath)
  );

  const context: PatternAnalysisContext = {
    classes: [],
    functions: [],
    interfaces: [],
    filePath,
  };

  const visit = (node: ts.Node): void => {
    if (ts.isClassDeclaration(node)) {
      context.classes.push(convertClass(node, filePath, sourceFile));
    } else if (ts.isInterfaceDeclaration(node)) {
      context.interfaces.push(convertInterface(node, filePath, sourceFile));
    } else if (ts.isFunctionDeclaration(node) && node.parent === sourceFile && node.name && node.body) {
      context.functions.push(convertFunction(node, node.name.text, filePath, sourceFile));
    }
    ts.forEachChild(node, visit);
  };
  visit(sourceFile);

  return context;
}

/**
 * Read a file and extract its context.
 *
 * @throws AnalysisError SOURCE_NOT_FOUND when the file is missing or unreadable
 */
export async function extractFileContext(filePath: string): Promise<PatternAnalysisContext> {
  let source: string;
  try {
    source = await fs.readFile(filePath, "utf-8");
  } catch (error) {
    const missing =
      error instanceof Error && "code" in error && error.code === "ENOENT";
    throw new AnalysisError(
      missing ? `Source file not found: ${filePath}` : `Failed to read ${filePath}`,
      ErrorCode.SOURCE_NOT_FOUND,
      { filePath, cause: error instanceof Error ? error.message : String(error) }
    );
  }
  return extractPatternContext(source, filePath);
}

/**
 * Concatenate contexts into one cross-file context.
 */
export function mergeContexts(contexts: PatternAnalysisContext[]): PatternAnalysisContext {
  const merged: PatternAnalysisContext = { classes: [], functions: [], interfaces: [] };
  for (const context of contexts) {
    merged.classes.push(...context.classes);
    merged.functions.push(...context.functions);
    merged.interfaces.push(...context.interfaces);
  }
  const only = contexts.length === 1 ? contexts[0] : undefined;
  if (only?.filePath) {
    merged.filePath = only.filePath;
  }
  return merged;
}
