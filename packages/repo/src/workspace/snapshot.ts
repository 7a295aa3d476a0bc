import { createHash } from 'crypto';

export function sha256(content: Uint8Array | string): string {
  return createHash('sha256').update(content).digest('hex');
}

/**
 * Content-addressed storage for file bodies. Implementations must never hand
 * out a buffer they keep a reference to.
 */
export interface BlobStore {
  has(digest: string): boolean;
  get(digest: string): Buffer | undefined;
  /** Stores a copy of `content` under its SHA-256 digest and returns the digest */
  put(content: Uint8Array): string;
  readonly size: number;
}

export class MemoryBlobStore implements BlobStore {
  private readonly blobs = new Map<string, Buffer>();

  has(digest: string): boolean {
    return this.blobs.has(digest);
  }

  get(digest: string): Buffer | undefined {
    const blob = this.blobs.get(digest);
    return blob ? Buffer.from(blob) : undefined;
  }

  put(content: Uint8Array): string {
    const digest = sha256(content);
    if (!this.blobs.has(digest)) {
      this.blobs.set(digest, Buffer.from(content));
    }
    return digest;
  }

  get size(): number {
    return this.blobs.size;
  }
}

/**
 * Digest of a tree manifest: sorted `(path, blobDigest)` pairs.
 */
export function manifestDigest(entries: ReadonlyMap<string, string>): string {
  const hash = createHash('sha256');
  for (const path of [...entries.keys()].sort()) {
    hash.update(path);
    hash.update('\0');
    hash.update(entries.get(path) ?? '');
    hash.update('\n');
  }
  return hash.digest('hex');
}

/**
 * An immutable file tree issued by a {@link SnapshotStore}.
 */
export class Snapshot {
  private readonly entries: ReadonlyMap<string, string>;

  constructor(
    readonly id: string,
    readonly generation: number,
    entries: ReadonlyMap<string, string>,
    private readonly blobs: BlobStore,
  ) {
    this.entries = new Map(entries);
  }

  /** Sorted file paths */
  get paths(): string[] {
    return [...this.entries.keys()].sort();
  }

  get size(): number {
    return this.entries.size;
  }

  has(path: string): boolean {
    return this.entries.has(path);
  }

  blobDigest(path: string): string | undefined {
    return this.entries.get(path);
  }

  /** Returns a copy of the file body, or undefined if the path is absent */
  read(path: string): Buffer | undefined {
    const digest = this.entries.get(path);
    return digest === undefined ? undefined : this.blobs.get(digest);
  }

  readText(path: string): string | undefined {
    return this.read(path)?.toString('utf8');
  }

  /** Path to blob digest pairs, sorted by path */
  manifest(): Array<[string, string]> {
    return this.paths.map((path) => [path, this.entries.get(path) ?? '']);
  }

  /** Copies every file body into a fresh map */
  toTree(): Map<string, Buffer> {
    const tree = new Map<string, Buffer>();
    for (const path of this.paths) {
      const body = this.read(path);
      if (body) tree.set(path, body);
    }
    return tree;
  }

  /**
   * Stable across processes for the same tree; changes whenever any file
   * body or path changes.
   */
  digest(): string {
    return this.id;
  }
}
