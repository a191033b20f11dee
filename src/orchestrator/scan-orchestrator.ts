/**
 * scan-orchestrator.ts
 * Single entry-point for a static declaration scan.
 *
 * Pipeline order:
 *   1. TsProjectFactory.create(tsConfigPath)
 *   2. DeclarationReportBuilder.build(project)
 *   3. Optional disk output (MetadataExporter)
 *   4. Return report
 */

import * as path from 'node:path';
import type { Project } from 'ts-morph';
import { DeclarationReportBuilder } from '../builders/declaration-report-builder.js';
import type { DeclarationReport } from '../models/declaration-report.js';
import type { ScannerConfig } from '../models/scanner-config.js';
import { TsProjectFactory } from '../parsers/ts/ts-project-factory.js';
import { MetadataExporter } from '../services/metadata-exporter.js';
import { SilentLogger } from '../services/logger.js';
import type { Logger } from '../services/logger.js';

export interface ScanOrchestratorOptions {
  /** Write the report as deterministic JSON to this path. */
  outputPath?: string;
  logger?: Logger;
  /** Scan this project instead of loading cfg.tsConfigPath. */
  project?: Project;
}

export class ScanOrchestrator {
  private readonly _cfg: ScannerConfig;
  private readonly _options: ScanOrchestratorOptions;
  private readonly _log: Logger;

  constructor(cfg: ScannerConfig, options: ScanOrchestratorOptions = {}) {
    this._cfg = cfg;
    this._options = options;
    this._log = options.logger ?? new SilentLogger();
  }

  run(): DeclarationReport {
    const projectRoot = path.resolve(this._cfg.projectRoot ?? path.dirname(this._cfg.tsConfigPath));
    this._log.info('Declaration scan starting', { projectRoot });

    // Step 1: Project
    this._log.info('Step 1/2  Loading TypeScript project', { tsConfigPath: this._cfg.tsConfigPath });
    const project = this._options.project ?? TsProjectFactory.create(this._cfg.tsConfigPath);
    this._log.info('Step 1/2  Done', { sourceFiles: project.getSourceFiles().length });

    // Step 2: Report
    this._log.info('Step 2/2  Scanning annotation sites');
    const builder = new DeclarationReportBuilder(
      {
        projectRoot,
        ...(this._cfg.decoratorAliases !== undefined && { decoratorAliases: this._cfg.decoratorAliases }),
        ...(this._cfg.includeTestFiles !== undefined && { includeTestFiles: this._cfg.includeTestFiles }),
        ...(this._cfg.allowRelations !== undefined && { allowRelations: this._cfg.allowRelations }),
      },
      this._log,
    );
    const report = builder.build(project);
    this._log.info('Step 2/2  Done', {
      classes: report.stats.classes,
      entries: report.stats.entries,
      diagnostics: report.diagnostics.length,
    });

    for (const scanned of report.classes) {
      this._log.debug('  class', { id: scanned.id, entries: scanned.entries.length });
    }

    // Step 3: Disk output
    if (this._options.outputPath !== undefined) {
      this._log.info('Writing report JSON', { path: this._options.outputPath });
      MetadataExporter.writeToFile(report, this._options.outputPath);
      this._log.info('Report JSON written');
    }

    this._log.info('Declaration scan complete');
    return report;
  }
}
