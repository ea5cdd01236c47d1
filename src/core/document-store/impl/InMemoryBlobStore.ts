/**
 * In-memory blob store, used by tests and dry runs
 */

import type { IBlobStore } from "../interfaces/IDocumentStore.js";

export class InMemoryBlobStore implements IBlobStore {
  readonly location = "memory";
  private readonly blobs = new Map<string, Buffer>();

  async read(name: string): Promise<Buffer | null> {
    const blob = this.blobs.get(name);
    return blob ? Buffer.from(blob) : null;
  }

  async write(name: string, data: Buffer): Promise<void> {
    this.blobs.set(name, Buffer.from(data));
  }

  async list(): Promise<string[]> {
    return [...this.blobs.keys()].sort();
  }
}
