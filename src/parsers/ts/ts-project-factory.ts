/**
 * ts-project-factory.ts
 * Creates ts-morph Projects for the declaration scanner.
 *
 * Rules:
 * - create() loads exactly the provided tsconfig; never auto-discovers others.
 * - createInMemory() builds a project from source text only (no disk access).
 */

import { Project } from 'ts-morph';

export class TsProjectFactory {
  /**
   * Create a ts-morph Project from the given tsconfig path.
   *
   * @param tsConfigPath - Absolute or CWD-relative path to tsconfig.json.
   */
  static create(tsConfigPath: string): Project {
    return new Project({
      tsConfigFilePath: tsConfigPath,
      skipAddingFilesFromTsConfig: false,
      skipFileDependencyResolution: true,
    });
  }

  /**
   * Create a Project on an in-memory file system holding `files`
   * (path → source text). Paths are taken as given, e.g. "/src/todo.ts".
   */
  static createInMemory(files: Readonly<Record<string, string>>): Project {
    const project = new Project({
      useInMemoryFileSystem: true,
      compilerOptions: { experimentalDecorators: true, emitDecoratorMetadata: true },
    });
    for (const filePath of Object.keys(files).sort()) {
      project.createSourceFile(filePath, files[filePath] ?? '');
    }
    return project;
  }
}
