/**
 * Document Store Module
 *
 * Canonical, one-blob-per-entity persistence with change detection.
 *
 * @module
 */

// Models
export * from "./models/canonical.js";
export * from "./models/entity-path.js";

// Interfaces
export * from "./interfaces/IDocumentStore.js";

// Implementation
export { FileBlobStore } from "./impl/FileBlobStore.js";
export { InMemoryBlobStore } from "./impl/InMemoryBlobStore.js";
export { CanonicalDocumentStore } from "./impl/CanonicalDocumentStore.js";

import type { IBlobStore, IDocumentStore } from "./interfaces/IDocumentStore.js";
import { FileBlobStore } from "./impl/FileBlobStore.js";
import { InMemoryBlobStore } from "./impl/InMemoryBlobStore.js";
import { CanonicalDocumentStore } from "./impl/CanonicalDocumentStore.js";

/**
 * Create a document store over a directory, or over memory when no
 * directory is given
 */
export function createDocumentStore(schemasDir?: string): IDocumentStore {
  const blobs: IBlobStore = schemasDir ? new FileBlobStore(schemasDir) : new InMemoryBlobStore();
  return new CanonicalDocumentStore(blobs);
}
