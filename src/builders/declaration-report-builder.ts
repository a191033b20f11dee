/**
 * declaration-report-builder.ts
 * Lists every annotation site of a ts-morph Project without loading the
 * code, and flags declarations the registry would reject at run time.
 *
 * Ordering:
 *   - source files by path; classes by id ("<file>#<ClassName>")
 *   - entries in source order. This differs from the registry aggregate,
 *     which follows decorator evaluation: member decorators run before the
 *     class decorator, so a runtime aggregate lists a class-level model-spec
 *     after its property-specs.
 *   - diagnostics by file, then line, then column
 *
 * Diagnostics mirror the registry rules: duplicate request body,
 * parameter index collision, relation use (unless allowRelations) and cookie use.
 */

import { Node } from 'ts-morph';
import type {
  ClassDeclaration,
  Decorator,
  GetAccessorDeclaration,
  MethodDeclaration,
  ParameterDeclaration,
  Project,
  PropertyDeclaration,
  SetAccessorDeclaration,
  SourceFile,
} from 'ts-morph';
import type {
  DeclarationReport,
  ScanDiagnostic,
  ScannedClass,
  ScannedEntry,
  ScannedSite,
} from '../models/declaration-report.js';
import type { MetadataKind } from '../models/metadata-entry.js';
import { METADATA_KINDS } from '../models/metadata-entry.js';
import { DecoratorParser } from '../parsers/annotations/decorator-parser.js';
import { TsAstUtils } from '../parsers/ts/ts-ast-utils.js';
import { SilentLogger } from '../services/logger.js';
import type { Logger } from '../services/logger.js';

export interface DeclarationReportOptions {
  /** Root used to relativize file paths. Defaults to the paths as loaded. */
  projectRoot?: string;
  decoratorAliases?: Record<string, MetadataKind>;
  includeTestFiles?: boolean;
  /** Accept relation decorators, as a registry created with allowRelations does. */
  allowRelations?: boolean;
}

const TEST_FILE = /(\.(test|spec)\.tsx?$)|([\\/]__tests__[\\/])/;

export class DeclarationReportBuilder {
  private readonly _options: DeclarationReportOptions;
  private readonly _log: Logger;
  private readonly _parser: DecoratorParser;

  constructor(options: DeclarationReportOptions = {}, logger?: Logger) {
    this._options = options;
    this._log = logger ?? new SilentLogger();
    this._parser = new DecoratorParser(options.decoratorAliases);
  }

  build(project: Project): DeclarationReport {
    const sourceFiles = this._sourceFiles(project);
    const classes: ScannedClass[] = [];
    const diagnostics: ScanDiagnostic[] = [];

    for (const sourceFile of sourceFiles) {
      for (const classDecl of sourceFile.getClasses()) {
        const scanned = this._scanClass(classDecl);
        if (scanned === null) continue;
        classes.push(scanned);
        diagnostics.push(...this._diagnose(scanned));
      }
    }

    classes.sort((a, b) => (a.id < b.id ? -1 : a.id > b.id ? 1 : 0));
    diagnostics.sort(
      (a, b) =>
        a.origin.file.localeCompare(b.origin.file) ||
        (a.origin.startLine ?? 0) - (b.origin.startLine ?? 0) ||
        (a.origin.startCol ?? 0) - (b.origin.startCol ?? 0),
    );

    const counts = new Map<MetadataKind, number>();
    let entries = 0;
    for (const scanned of classes) {
      for (const entry of scanned.entries) {
        counts.set(entry.kind, (counts.get(entry.kind) ?? 0) + 1);
        entries++;
      }
    }
    const byKind: Partial<Record<MetadataKind, number>> = {};
    for (const kind of METADATA_KINDS) {
      const count = counts.get(kind);
      if (count !== undefined) byKind[kind] = count;
    }

    this._log.info('Declaration report built', {
      files: sourceFiles.length,
      classes: classes.length,
      entries,
      diagnostics: diagnostics.length,
    });

    return {
      projectRoot: this._options.projectRoot ?? '',
      classes,
      diagnostics,
      stats: { files: sourceFiles.length, classes: classes.length, entries, byKind },
    };
  }

  // ---------------------------------------------------------------------------
  // Scanning
  // ---------------------------------------------------------------------------

  private _sourceFiles(project: Project): SourceFile[] {
    return project
      .getSourceFiles()
      .filter((sf) => !sf.isDeclarationFile())
      .filter((sf) => this._options.includeTestFiles === true || !TEST_FILE.test(sf.getFilePath()))
      .sort((a, b) => a.getFilePath().localeCompare(b.getFilePath()));
  }

  private _scanClass(classDecl: ClassDeclaration): ScannedClass | null {
    const className = classDecl.getName();
    if (className === undefined) {
      this._log.debug('Skipping anonymous class', {
        file: classDecl.getSourceFile().getFilePath(),
      });
      return null;
    }

    const entries: Array<{ pos: number; entry: ScannedEntry }> = [];
    const collect = (decorators: Decorator[], site: ScannedSite, symbol: string): void => {
      for (const decorator of decorators) {
        const parsed = this._parser.parse(decorator, symbol, this._options.projectRoot);
        if (parsed === null) continue;
        const entry: ScannedEntry = {
          site,
          kind: parsed.kind,
          decorator: parsed.name,
          args: parsed.args,
          origin: parsed.origin,
        };
        if (parsed.location !== null) entry.location = parsed.location;
        entries.push({ pos: decorator.getStart(), entry });
      }
    };

    collect(classDecl.getDecorators(), { className }, className);

    for (const ctor of classDecl.getConstructors()) {
      this._collectParameters(collect, className, undefined, ctor.getParameters());
    }

    const members: Array<
      MethodDeclaration | PropertyDeclaration | GetAccessorDeclaration | SetAccessorDeclaration
    > = [
      ...classDecl.getMethods(),
      ...classDecl.getProperties(),
      ...classDecl.getGetAccessors(),
      ...classDecl.getSetAccessors(),
    ];
    for (const member of members) {
      const name = member.getName();
      const site: ScannedSite = member.isStatic()
        ? { className, member: name, isStatic: true }
        : { className, member: name };
      collect(member.getDecorators(), site, `${className}.${name}`);
      if (Node.isMethodDeclaration(member)) {
        this._collectParameters(collect, className, site, member.getParameters());
      }
    }

    if (entries.length === 0) return null;
    entries.sort((a, b) => a.pos - b.pos);

    const file = TsAstUtils.relativeFile(
      classDecl.getSourceFile().getFilePath(),
      this._options.projectRoot,
    );
    return {
      id: `${file}#${className}`,
      className,
      file,
      origin: TsAstUtils.getOrigin(classDecl, className, this._options.projectRoot),
      entries: entries.map(({ entry }) => entry),
    };
  }

  private _collectParameters(
    collect: (decorators: Decorator[], site: ScannedSite, symbol: string) => void,
    className: string,
    owner: ScannedSite | undefined,
    parameters: ParameterDeclaration[],
  ): void {
    parameters.forEach((parameter, index) => {
      const site: ScannedSite = owner !== undefined ? { ...owner, index } : { className, index };
      const symbol =
        owner?.member !== undefined
          ? `${className}.${owner.member}[${index}]`
          : `${className}.constructor[${index}]`;
      collect(parameter.getDecorators(), site, symbol);
    });
  }

  // ---------------------------------------------------------------------------
  // Diagnostics
  // ---------------------------------------------------------------------------

  private _diagnose(scanned: ScannedClass): ScanDiagnostic[] {
    const diagnostics: ScanDiagnostic[] = [];
    const bodiesByMethod = new Map<string, ScannedEntry>();
    const byParameter = new Map<string, ScannedEntry>();

    for (const entry of scanned.entries) {
      const { site } = entry;

      if (entry.kind === 'relation-spec' && this._options.allowRelations !== true) {
        diagnostics.push({
          code: 'unsupported-relation',
          severity: 'error',
          message: `${scanned.className}: relation decorator "${entry.decorator}" is not supported`,
          origin: entry.origin,
        });
      }

      if (entry.kind === 'parameter-spec' && this._isCookie(entry)) {
        diagnostics.push({
          code: 'unsupported-cookie',
          severity: 'error',
          message: `${scanned.className}: parameter location "cookie" is not supported`,
          origin: entry.origin,
        });
      }

      if (site.member === undefined || site.index === undefined) continue;
      if (entry.kind !== 'parameter-spec' && entry.kind !== 'request-body-spec') continue;

      const methodKey = `${site.isStatic === true ? 'static ' : ''}${site.member}`;
      if (entry.kind === 'request-body-spec') {
        const previous = bodiesByMethod.get(methodKey);
        if (previous !== undefined) {
          diagnostics.push({
            code: 'duplicate-request-body',
            severity: 'error',
            message:
              `${scanned.className}.${site.member}: second request body ` +
              `(first declared at line ${previous.origin.startLine ?? '?'})`,
            origin: entry.origin,
          });
        } else {
          bodiesByMethod.set(methodKey, entry);
        }
      }

      const parameterKey = `${methodKey}[${site.index}]`;
      const previous = byParameter.get(parameterKey);
      if (previous !== undefined) {
        diagnostics.push({
          code: 'parameter-collision',
          severity: 'error',
          message:
            `${scanned.className}.${site.member}[${site.index}]: ${entry.kind} collides ` +
            `with ${previous.kind}`,
          origin: entry.origin,
        });
      } else {
        byParameter.set(parameterKey, entry);
      }
    }

    for (const diagnostic of diagnostics) {
      this._log.warn(diagnostic.message, { code: diagnostic.code, file: diagnostic.origin.file });
    }
    return diagnostics;
  }

  private _isCookie(entry: ScannedEntry): boolean {
    return entry.location === 'cookie';
  }
}
