/**
 * ts-ast-utils.ts
 * Low-level, deterministic AST helpers for the declaration scanner.
 *
 * Determinism rules:
 * - File paths in origins are project-relative with forward slashes.
 * - All string truncation uses a single policy:
 *     head (maxLen - 1 chars) + "…"
 *   Applied via truncateDeterministically().
 */

import * as path from 'node:path';
import type { Decorator } from 'ts-morph';
import { Node } from 'ts-morph';
import type { Origin } from '../../models/origin.js';

/** Tail sentinel appended when a string is truncated. */
const TRUNCATION_SENTINEL = '…';

/** Most decorator arguments kept per scanned entry. */
const MAX_ARGS = 10;

export class TsAstUtils {
  // ---------------------------------------------------------------------------
  // Origin
  // ---------------------------------------------------------------------------

  /**
   * Derive an Origin from a ts-morph Node.
   *
   * @param symbolHint  - Optional symbol name to attach (e.g. "Todo.find").
   * @param projectRoot - When given, `file` is made relative to it.
   */
  static getOrigin(node: Node, symbolHint?: string, projectRoot?: string): Origin {
    const sourceFile = node.getSourceFile();
    const { line: startLine0, character: startChar0 } =
      sourceFile.compilerNode.getLineAndCharacterOfPosition(node.getStart());
    const { line: endLine0 } =
      sourceFile.compilerNode.getLineAndCharacterOfPosition(node.getEnd());

    const origin: Origin = {
      file: TsAstUtils.relativeFile(sourceFile.getFilePath(), projectRoot),
      startLine: startLine0 + 1,
      startCol: startChar0 + 1,
      endLine: endLine0 + 1,
    };
    if (symbolHint !== undefined) {
      origin.symbol = symbolHint;
    }
    return origin;
  }

  static relativeFile(filePath: string, projectRoot?: string): string {
    if (projectRoot === undefined) return filePath;
    return path.relative(projectRoot, filePath).split(path.sep).join('/');
  }

  // ---------------------------------------------------------------------------
  // Literal extraction
  // ---------------------------------------------------------------------------

  /**
   * String value of a StringLiteral or NoSubstitutionTemplateLiteral node.
   * Returns null for any other node kind.
   */
  static getStringLiteralValue(node: Node): string | null {
    if (Node.isStringLiteral(node) || Node.isNoSubstitutionTemplateLiteral(node)) {
      return node.getLiteralValue();
    }
    return null;
  }

  /**
   * String value of property `name` in an object literal argument.
   * Returns null when the node is not an object literal, the property is
   * missing, or its initializer is not a string literal.
   */
  static getObjectStringProperty(node: Node, name: string): string | null {
    if (!Node.isObjectLiteralExpression(node)) return null;
    const property = node.getProperty(name);
    if (property === undefined || !Node.isPropertyAssignment(property)) return null;
    const initializer = property.getInitializer();
    return initializer !== undefined ? TsAstUtils.getStringLiteralValue(initializer) : null;
  }

  // ---------------------------------------------------------------------------
  // Decorators
  // ---------------------------------------------------------------------------

  /**
   * Dotted name of a decorator expression, without the call:
   * `@param.path.string('id')` → "param.path.string".
   */
  static getDecoratorFullName(decorator: Decorator): string {
    return decorator.getFullName();
  }

  /** Argument texts of a decorator call, bounded and truncated. */
  static getDecoratorArgs(decorator: Decorator, maxLen = 200): string[] {
    return decorator
      .getArguments()
      .slice(0, MAX_ARGS)
      .map((arg) => TsAstUtils.truncateDeterministically(arg.getText().trim(), maxLen));
  }

  // ---------------------------------------------------------------------------
  // Bounded string utilities
  // ---------------------------------------------------------------------------

  /**
   * Truncate a string to at most `maxLen` characters: the first
   * `maxLen - 1` characters followed by "…".
   */
  static truncateDeterministically(s: string, maxLen: number): string {
    if (s.length <= maxLen) return s;
    return s.slice(0, maxLen - 1) + TRUNCATION_SENTINEL;
  }
}
