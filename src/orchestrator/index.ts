/**
 * orchestrator/index.ts
 * Barrel export for the scan orchestrator.
 */

export { ScanOrchestrator } from './scan-orchestrator.js';
export type { ScanOrchestratorOptions } from './scan-orchestrator.js';
