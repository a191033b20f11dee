/**
 * metadata-exporter.test.ts
 */

import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { MetadataExporter } from '../metadata-exporter.js';

let tmpDir: string;

beforeEach(() => {
  tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'annotation-export-'));
});

afterEach(() => {
  fs.rmSync(tmpDir, { recursive: true, force: true });
});

describe('MetadataExporter', () => {
  it('sorts object keys recursively and keeps array order', () => {
    const json = MetadataExporter.toJson({ b: 1, a: { d: [3, 1], c: null } });
    expect(json).toBe('{\n  "a": {\n    "c": null,\n    "d": [\n      3,\n      1\n    ]\n  },\n  "b": 1\n}');
  });

  it('produces identical output for differently ordered input', () => {
    expect(MetadataExporter.toJson({ x: 1, y: { q: 1, p: 2 } })).toBe(
      MetadataExporter.toJson({ y: { p: 2, q: 1 }, x: 1 }),
    );
  });

  it('writes to nested paths, creating directories', () => {
    const target = path.join(tmpDir, 'a', 'b', 'report.json');
    const written = MetadataExporter.writeToFile({ z: true, a: false }, target);

    expect(written).toBe(path.resolve(target));
    expect(fs.readFileSync(target, 'utf-8')).toBe('{\n  "a": false,\n  "z": true\n}\n');
  });
});
