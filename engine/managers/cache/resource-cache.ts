/**
 * Resource Cache
 *
 * Shared store of recently produced frames, addressed by URI.
 * Eviction is strictly FIFO by insertion (a streaming cache, not an LRU):
 * reads never extend an entry's life. Base64 is produced on demand and never
 * stored.
 *
 * Every method is synchronous, so puts, gets and evictions from different
 * stream loops cannot interleave. Encoding and I/O happen before put() is
 * called, never while the cache is being mutated.
 */

import * as crypto from "crypto";
import { CACHE } from "@framecast/types";
import type { ImageFormat, ResourceEncoding } from "@framecast/types";
import { ResourceExhaustedError, ResourceNotFoundError } from "../../core/app-error";
import { logger } from "../../utils/logger";

/**
 * Metadata supplied by the producer
 */
export interface ResourceMetadata {
  streamId: string;
  width: number;
  height: number;
  timestamp: number;
  format?: ImageFormat;
  quality?: number;
}

/**
 * One cached frame. Frozen once stored.
 */
export interface CachedResource extends Readonly<ResourceMetadata> {
  readonly uri: string;
  readonly sequence: number;
  readonly mimeType: string;
  readonly data: Buffer;
  readonly size: number;
}

export type ResourceSummary = Omit<CachedResource, "data">;

export interface ResourceCacheOptions {
  maxEntries?: number;
  maxEntryBytes?: number;
}

export interface ResourceCacheStats {
  entries: number;
  maxEntries: number;
  bytes: number;
  puts: number;
  hits: number;
  misses: number;
  evictions: number;
  hitRate: number;
}

/**
 * Calculate a fast digest of a frame payload
 *
 * Samples the buffer at regular intervals, so the cost is bounded for
 * large frames. Uniqueness of URIs comes from the sequence number; the
 * digest only makes the URI content-addressed.
 */
export function frameDigest(buffer: Buffer): string {
  if (buffer.length === 0) {
    return crypto.createHash("md5").digest("hex").slice(0, 8);
  }

  const sampleSize = Math.max(1, Math.min(1000, Math.floor(buffer.length / 100) || buffer.length));
  const step = Math.max(1, Math.floor(buffer.length / sampleSize));
  const sample = Buffer.allocUnsafe(sampleSize);

  for (let i = 0; i < sampleSize; i++) {
    sample[i] = buffer[Math.min(buffer.length - 1, i * step)];
  }

  return crypto
    .createHash("md5")
    .update(sample)
    .update(String(buffer.length))
    .digest("hex")
    .slice(0, 8);
}

function summarize(entry: CachedResource): ResourceSummary {
  return {
    uri: entry.uri,
    sequence: entry.sequence,
    mimeType: entry.mimeType,
    size: entry.size,
    streamId: entry.streamId,
    width: entry.width,
    height: entry.height,
    timestamp: entry.timestamp,
    format: entry.format,
    quality: entry.quality,
  };
}

/**
 * FIFO frame cache shared by every stream
 */
export class ResourceCache {
  private readonly entries = new Map<string, CachedResource>();
  private readonly maxEntries: number;
  private readonly maxEntryBytes: number;
  private sequence: number = 0;
  private bytes: number = 0;
  private hits: number = 0;
  private misses: number = 0;
  private evictions: number = 0;

  constructor(options: ResourceCacheOptions = {}) {
    this.maxEntries = Math.max(1, Math.floor(options.maxEntries ?? CACHE.MAX_ENTRIES));
    this.maxEntryBytes = options.maxEntryBytes ?? CACHE.MAX_FRAME_BYTES;
  }

  /**
   * Store a frame and return its URI
   *
   * @throws ResourceExhaustedError when the payload exceeds maxEntryBytes
   */
  put(data: Buffer, mimeType: string, metadata: ResourceMetadata): string {
    if (data.length > this.maxEntryBytes) {
      throw new ResourceExhaustedError("Frame exceeds maximum cacheable size", undefined, {
        size: data.length,
        maxEntryBytes: this.maxEntryBytes,
        streamId: metadata.streamId,
      });
    }

    const sequence = ++this.sequence;
    const uri = `${CACHE.URI_PREFIX}${sequence}-${frameDigest(data)}`;

    const entry: CachedResource = Object.freeze({
      ...metadata,
      uri,
      sequence,
      mimeType,
      data,
      size: data.length,
    });

    this.entries.set(uri, entry);
    this.bytes += data.length;

    while (this.entries.size > this.maxEntries) {
      this.evictOldest();
    }

    return uri;
  }

  /**
   * Look up a frame
   *
   * @throws ResourceNotFoundError when the URI was evicted or never existed
   */
  get(uri: string): CachedResource {
    const entry = this.entries.get(uri);
    if (!entry) {
      this.misses++;
      logger.debug("Resource cache miss", { uri });
      throw new ResourceNotFoundError(uri);
    }
    this.hits++;
    return entry;
  }

  /**
   * Fetch a frame's payload as raw bytes or as base64 text
   */
  getEncoded(uri: string, encoding: "binary"): Buffer;
  getEncoded(uri: string, encoding: "base64"): string;
  getEncoded(uri: string, encoding: ResourceEncoding): Buffer | string;
  getEncoded(uri: string, encoding: ResourceEncoding): Buffer | string {
    const entry = this.get(uri);
    return encoding === "base64" ? entry.data.toString("base64") : entry.data;
  }

  /**
   * Metadata of a cached frame without its payload. Not counted as a lookup.
   *
   * @throws ResourceNotFoundError when the URI is not cached
   */
  describe(uri: string): ResourceSummary {
    const entry = this.entries.get(uri);
    if (!entry) {
      throw new ResourceNotFoundError(uri);
    }
    return summarize(entry);
  }

  has(uri: string): boolean {
    return this.entries.has(uri);
  }

  /**
   * Most recent frame, optionally for one stream
   */
  latest(streamId?: string): CachedResource | null {
    const all = [...this.entries.values()];
    for (let i = all.length - 1; i >= 0; i--) {
      if (!streamId || all[i].streamId === streamId) {
        return all[i];
      }
    }
    return null;
  }

  /**
   * Entries without payloads, oldest first
   */
  list(streamId?: string): ResourceSummary[] {
    const result: ResourceSummary[] = [];
    for (const entry of this.entries.values()) {
      if (!streamId || entry.streamId === streamId) {
        result.push(summarize(entry));
      }
    }
    return result;
  }

  stats(): ResourceCacheStats {
    const lookups = this.hits + this.misses;
    return {
      entries: this.entries.size,
      maxEntries: this.maxEntries,
      bytes: this.bytes,
      puts: this.sequence,
      hits: this.hits,
      misses: this.misses,
      evictions: this.evictions,
      hitRate: lookups > 0 ? this.hits / lookups : 0,
    };
  }

  clear(): void {
    this.entries.clear();
    this.bytes = 0;
  }

  get size(): number {
    return this.entries.size;
  }

  private evictOldest(): void {
    const oldest = this.entries.keys().next();
    if (oldest.done) return;
    const entry = this.entries.get(oldest.value);
    this.entries.delete(oldest.value);
    this.evictions++;
    if (entry) {
      this.bytes -= entry.size;
    }
  }
}
