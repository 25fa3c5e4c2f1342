import ts from 'typescript';

export interface SyntaxIssue {
  line: number;
  message: string;
}

export interface ParsedArtifact {
  sourceFile: ts.SourceFile;
  syntaxErrors: SyntaxIssue[];
}

const ARTIFACT_FILE = 'artifact.ts';

function lineOf(sourceFile: ts.SourceFile, node: ts.Node): number {
  return sourceFile.getLineAndCharacterOfPosition(node.getStart(sourceFile)).line + 1;
}

/**
 * Parses artifact text as a TypeScript module. Syntax errors come from the
 * compiler's syntactic pass only; unresolved imports and type errors are left
 * to the external `tsc` rule.
 */
export function parseArtifact(artifact: string): ParsedArtifact {
  const sourceFile = ts.createSourceFile(
    ARTIFACT_FILE,
    artifact,
    ts.ScriptTarget.Latest,
    true,
    ts.ScriptKind.TS,
  );

  const { diagnostics = [] } = ts.transpileModule(artifact, {
    fileName: ARTIFACT_FILE,
    reportDiagnostics: true,
    compilerOptions: { target: ts.ScriptTarget.ES2022, module: ts.ModuleKind.ESNext },
  });

  const syntaxErrors = diagnostics
    .filter((d) => d.category === ts.DiagnosticCategory.Error && d.file !== undefined)
    .map((d) => ({
      line:
        d.file && d.start !== undefined
          ? d.file.getLineAndCharacterOfPosition(d.start).line + 1
          : 0,
      message: ts.flattenDiagnosticMessageText(d.messageText, '\n'),
    }));

  return { sourceFile, syntaxErrors };
}

export function walk(node: ts.Node, visit: (node: ts.Node) => void): void {
  visit(node);
  ts.forEachChild(node, (child) => walk(child, visit));
}

export type FunctionLike =
  | ts.FunctionDeclaration
  | ts.MethodDeclaration
  | ts.FunctionExpression
  | ts.ArrowFunction
  | ts.GetAccessorDeclaration;

export interface Declaration {
  name: string;
  line: number;
  node: ts.Node;
  /** Set for function-like declarations */
  fn?: FunctionLike;
}

function isFunctionInitializer(
  node: ts.Expression | undefined,
): node is ts.ArrowFunction | ts.FunctionExpression {
  return node !== undefined && (ts.isArrowFunction(node) || ts.isFunctionExpression(node));
}

/**
 * Named declarations a reader would expect documented or typed: function
 * declarations, classes, methods, getters and `const f = () => ...` bindings.
 */
export function collectDeclarations(sourceFile: ts.SourceFile): Declaration[] {
  const declarations: Declaration[] = [];

  walk(sourceFile, (node) => {
    if (ts.isFunctionDeclaration(node) && node.body) {
      declarations.push({
        name: node.name?.text ?? 'default',
        line: lineOf(sourceFile, node),
        node,
        fn: node,
      });
    } else if (ts.isClassDeclaration(node)) {
      declarations.push({ name: node.name?.text ?? 'default', line: lineOf(sourceFile, node), node });
    } else if ((ts.isMethodDeclaration(node) || ts.isGetAccessorDeclaration(node)) && node.body) {
      declarations.push({ name: node.name.getText(sourceFile), line: lineOf(sourceFile, node), node, fn: node });
    } else if (
      ts.isVariableDeclaration(node) &&
      ts.isIdentifier(node.name) &&
      isFunctionInitializer(node.initializer)
    ) {
      declarations.push({
        name: node.name.text,
        line: lineOf(sourceFile, node),
        node,
        fn: node.initializer,
      });
    }
  });

  return declarations;
}

export function hasJsDoc(node: ts.Node): boolean {
  return ts.getJSDocCommentsAndTags(node).length > 0;
}

/**
 * Cyclomatic approximation: 1 plus one per branch point (conditionals, loops,
 * catch clauses, non-default switch cases and short-circuit operators).
 */
export function functionComplexity(fn: ts.Node): number {
  let count = 1;
  const visit = (node: ts.Node) => {
    switch (node.kind) {
      case ts.SyntaxKind.IfStatement:
      case ts.SyntaxKind.ForStatement:
      case ts.SyntaxKind.ForInStatement:
      case ts.SyntaxKind.ForOfStatement:
      case ts.SyntaxKind.WhileStatement:
      case ts.SyntaxKind.DoStatement:
      case ts.SyntaxKind.CatchClause:
      case ts.SyntaxKind.CaseClause:
      case ts.SyntaxKind.ConditionalExpression:
        count++;
        break;
      case ts.SyntaxKind.BinaryExpression:
        if (ts.isBinaryExpression(node)) {
          const op = node.operatorToken.kind;
          if (
            op === ts.SyntaxKind.AmpersandAmpersandToken ||
            op === ts.SyntaxKind.BarBarToken ||
            op === ts.SyntaxKind.QuestionQuestionToken
          ) {
            count++;
          }
        }
        break;
    }
    ts.forEachChild(node, visit);
  };
  ts.forEachChild(fn, visit);
  return count;
}

export function nodeLine(sourceFile: ts.SourceFile, node: ts.Node): number {
  return lineOf(sourceFile, node);
}
