/**
 * declaration-report.ts
 * Output of the static declaration scanner.
 *
 * ID convention: ScannedClass.id === "<file>#<className>"
 * Ordering: classes sorted by id; entries in source order; diagnostics
 * sorted by file, then line.
 */

import type { MetadataKind } from './metadata-entry.js';
import type { ParameterLocation } from './openapi.js';
import type { Origin } from './origin.js';

export interface ScannedSite {
  className: string;
  /** Method or property name; absent for the class itself and constructor parameters. */
  member?: string;
  /** Parameter index for constructor and method parameters. */
  index?: number;
  isStatic?: boolean;
}

export interface ScannedEntry {
  site: ScannedSite;
  kind: MetadataKind;
  /** Full decorator expression name as written, e.g. "param.path.string". */
  decorator: string;
  /** Raw argument texts, truncated. */
  args: string[];
  /** Parameter location of a parameter-spec, when statically known. */
  location?: ParameterLocation;
  origin: Origin;
}

export interface ScannedClass {
  id: string;
  className: string;
  file: string;
  origin: Origin;
  entries: ScannedEntry[];
}

export type DiagnosticCode =
  | 'duplicate-request-body'
  | 'parameter-collision'
  | 'unsupported-relation'
  | 'unsupported-cookie';

export interface ScanDiagnostic {
  code: DiagnosticCode;
  severity: 'error' | 'warning';
  message: string;
  origin: Origin;
}

export interface DeclarationReport {
  projectRoot: string;
  classes: ScannedClass[];
  diagnostics: ScanDiagnostic[];
  stats: {
    files: number;
    classes: number;
    entries: number;
    byKind: Partial<Record<MetadataKind, number>>;
  };
}
