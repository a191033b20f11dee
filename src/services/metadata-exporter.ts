/**
 * metadata-exporter.ts
 * Serialize reports and generated documents to deterministic JSON.
 *
 * Constraints:
 * - Same value → identical bytes.
 * - Object keys are sorted recursively; array order is kept as given.
 * - Indentation: 2 spaces, trailing newline on files.
 */

import * as fs from 'node:fs';
import * as path from 'node:path';

export class MetadataExporter {
  static toJson(value: unknown): string {
    return JSON.stringify(value, MetadataExporter._stableSortReplacer(), 2);
  }

  /** Write the serialized value, creating parent directories as needed. */
  static writeToFile(value: unknown, outPath: string): string {
    const resolved = path.resolve(outPath);
    fs.mkdirSync(path.dirname(resolved), { recursive: true });
    fs.writeFileSync(resolved, MetadataExporter.toJson(value) + '\n', 'utf-8');
    return resolved;
  }

  // ---------------------------------------------------------------------------
  // Stable sort replacer
  // ---------------------------------------------------------------------------

  private static _stableSortReplacer(): (key: string, value: unknown) => unknown {
    return (_key: string, value: unknown): unknown => {
      if (value === null || typeof value !== 'object' || Array.isArray(value)) return value;
      const sorted: Record<string, unknown> = {};
      for (const [k, v] of Object.entries(value).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))) {
        sorted[k] = v;
      }
      return sorted;
    };
  }
}
