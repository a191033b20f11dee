/**
 * scanner-config.ts
 * Configuration for the static declaration scanner.
 */

import type { MetadataKind } from './metadata-entry.js';

export interface ScannerConfig {
  /** Path to the tsconfig.json whose files are scanned. */
  tsConfigPath: string;
  /** Root used to relativize file paths in the report. Defaults to the tsconfig directory. */
  projectRoot?: string;
  /**
   * Extra decorator root identifiers mapped to a metadata kind, for projects
   * that re-export the annotations under other names (e.g. `{ Get: 'route-spec' }`).
   */
  decoratorAliases?: Record<string, MetadataKind>;
  /** Scan *.test.ts / *.spec.ts and __tests__ directories too. Defaults to false. */
  includeTestFiles?: boolean;
  /** Do not flag relation decorators. Defaults to false, matching RegistryOptions. */
  allowRelations?: boolean;
}
