#!/usr/bin/env node
/**
 * cli.ts
 * Command-line entry point for the static declaration scan.
 *
 * Output:
 *   <outputPath> : DeclarationReport as deterministic JSON
 *                   (default: output/<project-name>/declarations.json)
 *
 * Usage:
 *   annotation-registry <tsConfigPath> [outputPath] [--debug] [--allow-relations]
 *
 * Exit codes: 0 on success, 1 on usage or scan failure, 2 when the report
 * carries error diagnostics.
 */

import * as path from 'node:path';
import type { ScannerConfig } from './models/scanner-config.js';
import { ScanOrchestrator } from './orchestrator/scan-orchestrator.js';
import { ConsoleLogger, TeeLogger } from './services/logger.js';

const rawArgs = process.argv.slice(2);
const verbose = rawArgs.includes('--debug');
const allowRelations = rawArgs.includes('--allow-relations');
const positional = rawArgs.filter((a) => !a.startsWith('--'));
const [tsConfigPath, rawOutputPath] = positional;

if (!tsConfigPath) {
  console.error('Usage: annotation-registry <tsConfigPath> [outputPath] [--debug] [--allow-relations]');
  console.error('');
  console.error('  tsConfigPath : path to the tsconfig whose files are scanned');
  console.error('  outputPath   : (optional) report JSON path');
  console.error('                  defaults to output/<project-name>/declarations.json');
  console.error('  --debug      : emit debug-level logs and write a log file');
  console.error('  --allow-relations : do not report relation decorators');
  process.exit(1);
}

const resolvedTsConfigPath = path.resolve(tsConfigPath);
const projectRoot = path.dirname(resolvedTsConfigPath);
const outputPath = path.resolve(
  rawOutputPath ?? path.join('output', path.basename(projectRoot), 'declarations.json'),
);

const cfg: ScannerConfig = { tsConfigPath: resolvedTsConfigPath, projectRoot, allowRelations };

console.log('Declaration scan starting…');
console.log(`  tsConfigPath: ${cfg.tsConfigPath}`);
console.log(`  output      : ${outputPath}`);
if (verbose) {
  console.log('  debug       : on');
}

const t0 = Date.now();

try {
  const logger = verbose ? new TeeLogger('debug') : new ConsoleLogger('warn');
  const report = new ScanOrchestrator(cfg, { outputPath, logger }).run();
  const elapsed = Date.now() - t0;

  const errors = report.diagnostics.filter((d) => d.severity === 'error').length;
  console.log('');
  console.log(errors === 0 ? 'Scan complete ✓' : 'Scan complete with errors');
  console.log(`  files       : ${report.stats.files}`);
  console.log(`  classes     : ${report.stats.classes}`);
  console.log(`  entries     : ${report.stats.entries}`);
  console.log(`  diagnostics : ${report.diagnostics.length}`);
  console.log(`  elapsed     : ${elapsed} ms`);

  if (logger instanceof TeeLogger) {
    const timestamp = new Date().toISOString().replace(/[:.]/g, '-').slice(0, 19);
    const logPath = path.join('logs', path.basename(projectRoot), timestamp, 'scan.log');
    logger.flush(path.resolve(logPath));
    console.log(`  log         : ${logPath}`);
  }

  process.exit(errors === 0 ? 0 : 2);
} catch (err) {
  const elapsed = Date.now() - t0;
  console.error('');
  console.error(`Scan FAILED after ${elapsed} ms`);
  console.error(err instanceof Error ? err.message : String(err));
  if (err instanceof Error && err.stack) {
    console.error(err.stack);
  }
  process.exit(1);
}
