/**
 * Canonical Document Store
 *
 * Keeps one canonical JSON blob per entity. Change detection compares the
 * canonical structure of the new document with the parsed stored blob; the
 * blob is rewritten on every write so the store always reflects the latest
 * fetch.
 */

import type { IBlobStore, IDocumentStore, DocumentWriteResult } from "../interfaces/IDocumentStore.js";
import { canonicalize, parseCanonical, serializeCanonical, type JsonValue } from "../models/canonical.js";
import { entityIdToFileName, fileNameToEntityId } from "../models/entity-path.js";
import { StoreWriteError } from "../../errors.js";
import { calculateContentHash, createLogger } from "../../../utils/index.js";
import { isDeepStrictEqual } from "node:util";

const logger = createLogger("document-store");

export class CanonicalDocumentStore implements IDocumentStore {
  constructor(private readonly blobs: IBlobStore) {}

  nameFor(entityId: string): string {
    return entityIdToFileName(entityId);
  }

  async write(entityId: string, document: unknown): Promise<DocumentWriteResult> {
    const name = this.nameFor(entityId);
    const canonical = canonicalize(document);
    const bytes = Buffer.from(serializeCanonical(canonical), "utf-8");

    let stored: Buffer | null;
    try {
      stored = await this.blobs.read(name);
      await this.blobs.write(name, bytes);
    } catch (error) {
      throw new StoreWriteError(entityId, error, name);
    }

    const previous = stored === null ? null : this.parseStored(stored, name);
    return {
      changed: previous === null || !isDeepStrictEqual(previous, canonical),
      isNew: stored === null,
      name,
      contentHash: calculateContentHash(bytes),
    };
  }

  async read(entityId: string): Promise<JsonValue | null> {
    return this.readCanonical(this.nameFor(entityId));
  }

  async has(entityId: string): Promise<boolean> {
    return (await this.blobs.read(this.nameFor(entityId))) !== null;
  }

  async list(): Promise<string[]> {
    const ids: string[] = [];
    for (const name of await this.blobs.list()) {
      const id = fileNameToEntityId(name);
      if (id === null) {
        logger.debug({ name, location: this.blobs.location }, "Skipping blob with foreign name");
        continue;
      }
      ids.push(id);
    }
    return ids.sort();
  }

  private async readCanonical(name: string): Promise<JsonValue | null> {
    const content = await this.blobs.read(name);
    return content === null ? null : this.parseStored(content, name);
  }

  /**
   * A blob that is not valid JSON counts as unknown content, so the next
   * write reports a change and repairs it.
   */
  private parseStored(content: Buffer, name: string): JsonValue | null {
    try {
      return parseCanonical(content);
    } catch (error) {
      logger.warn({ err: error, name }, "Stored document is not valid JSON, treating as changed");
      return null;
    }
  }
}
