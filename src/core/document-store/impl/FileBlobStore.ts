/**
 * File-backed blob store: one file per blob under a single directory
 */

import * as path from "node:path";
import type { IBlobStore } from "../interfaces/IDocumentStore.js";
import { ensureDirectory, fileExists, findFiles, readFileIfExists, writeFileAtomic } from "../../../utils/fs.js";

export class FileBlobStore implements IBlobStore {
  constructor(private readonly rootDir: string) {}

  get location(): string {
    return this.rootDir;
  }

  async read(name: string): Promise<Buffer | null> {
    return readFileIfExists(this.resolve(name));
  }

  async write(name: string, data: Buffer): Promise<void> {
    await ensureDirectory(this.rootDir);
    await writeFileAtomic(this.resolve(name), data);
  }

  async list(): Promise<string[]> {
    if (!(await fileExists(this.rootDir))) return [];
    const names = await findFiles({ patterns: ["*.json"], cwd: this.rootDir });
    return names.sort();
  }

  private resolve(name: string): string {
    if (name.length === 0 || name !== path.basename(name)) {
      throw new RangeError(`Invalid blob name: ${name}`);
    }
    return path.join(this.rootDir, name);
  }
}
