/**
 * Source-level type safety checks over src/, walked with the TypeScript compiler API
 */

import * as fs from 'fs';
import * as path from 'path';
import * as ts from 'typescript';

interface Violation {
  file: string;
  line: number;
  text: string;
}

describe('Property: Type Safety Compliance', () => {
  const sources = getAllTypeScriptFiles(path.join(process.cwd(), 'src')).map((filePath) => {
    const sourceCode = fs.readFileSync(path.join(process.cwd(), filePath), 'utf-8');
    return ts.createSourceFile(filePath, sourceCode, ts.ScriptTarget.Latest, true);
  });

  it('should find the source tree', () => {
    expect(sources.map((s) => s.fileName)).toContain('src/download/core/FetchOrchestrator.ts');
  });

  it('should never use the "any" type', () => {
    const violations = collect(sources, (node) => node.kind === ts.SyntaxKind.AnyKeyword);
    expect(report(violations)).toEqual([]);
  });

  it('should not cast values other than "as const"', () => {
    const violations = collect(
      sources,
      (node) =>
        (ts.isAsExpression(node) || ts.isTypeAssertionExpression(node)) &&
        !(ts.isTypeReferenceNode(node.type) && node.type.typeName.getText() === 'const'),
    );
    expect(report(violations)).toEqual([]);
  });

  it('should not use non-null assertions', () => {
    const violations = collect(sources, (node) => ts.isNonNullExpression(node));
    expect(report(violations)).toEqual([]);
  });

  it('should not silence the compiler with comments', () => {
    const violations = sources.flatMap((source) =>
      source.text
        .split('\n')
        .map((text, index) => ({ file: source.fileName, line: index + 1, text: text.trim() }))
        .filter(({ text }) => /@ts-(ignore|expect-error|nocheck)/.test(text)),
    );
    expect(report(violations)).toEqual([]);
  });

  it('should give every exported function an explicit return type', () => {
    const violations = collect(
      sources,
      (node) =>
        ts.isFunctionDeclaration(node) &&
        node.modifiers?.some((m) => m.kind === ts.SyntaxKind.ExportKeyword) === true &&
        !node.type,
    );
    expect(report(violations)).toEqual([]);
  });
});

/**
 * Helper Functions
 */

function collect(sources: ts.SourceFile[], matches: (node: ts.Node) => boolean): Violation[] {
  const violations: Violation[] = [];

  sources.forEach((sourceFile) => {
    function visit(node: ts.Node) {
      if (matches(node)) {
        violations.push({
          file: sourceFile.fileName,
          line: sourceFile.getLineAndCharacterOfPosition(node.getStart()).line + 1,
          text: node.getText(sourceFile).split('\n')[0],
        });
      }
      ts.forEachChild(node, visit);
    }
    visit(sourceFile);
  });

  return violations;
}

function report(violations: Violation[]): string[] {
  return violations.map(({ file, line, text }) => `${file}:${line} ${text}`);
}

function getAllTypeScriptFiles(dirPath: string, arrayOfFiles: string[] = []): string[] {
  if (!fs.existsSync(dirPath)) {
    return arrayOfFiles;
  }

  fs.readdirSync(dirPath).forEach((file) => {
    const filePath = path.join(dirPath, file);

    if (fs.statSync(filePath).isDirectory()) {
      arrayOfFiles = getAllTypeScriptFiles(filePath, arrayOfFiles);
    } else if (file.endsWith('.ts') && !file.endsWith('.d.ts')) {
      arrayOfFiles.push(path.relative(process.cwd(), filePath).replace(/\\/g, '/'));
    }
  });

  return arrayOfFiles;
}
