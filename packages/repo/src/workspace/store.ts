import {
  SnapshotCorruptedError,
  type FileEdit,
  type FileOperation,
  type PatchConflict,
  type PatchSet,
} from '@patchloop/shared';
import { applyHunks } from './hunks';
import { BlobStore, MemoryBlobStore, Snapshot, manifestDigest, sha256 } from './snapshot';

export type FileTree =
  | Readonly<Record<string, string | Uint8Array>>
  | ReadonlyMap<string, string | Uint8Array>;

export type ApplyResult =
  | { status: 'applied'; snapshot: Snapshot; filesChanged: string[] }
  | { status: 'conflict'; conflicts: PatchConflict[] };

function toBytes(content: string | Uint8Array): Buffer {
  return typeof content === 'string' ? Buffer.from(content, 'utf8') : Buffer.from(content);
}

function isMapTree(tree: FileTree): tree is ReadonlyMap<string, string | Uint8Array> {
  return tree instanceof Map;
}

function treeEntries(tree: FileTree): Array<[string, string | Uint8Array]> {
  return isMapTree(tree) ? [...tree.entries()] : Object.entries(tree);
}

/**
 * Working copy used while deriving: new bodies are staged here and only
 * reach the blob store once every operation has applied.
 */
class WorkingCopy {
  readonly entries: Map<string, string>;
  readonly staged = new Map<string, Buffer>();

  constructor(
    base: Snapshot,
    private readonly blobs: BlobStore,
  ) {
    this.entries = new Map(base.manifest());
  }

  read(path: string): Buffer | undefined {
    const digest = this.entries.get(path);
    if (digest === undefined) return undefined;
    return this.staged.get(digest) ?? this.blobs.get(digest);
  }

  write(path: string, content: Buffer): void {
    const digest = sha256(content);
    if (!this.blobs.has(digest)) this.staged.set(digest, content);
    this.entries.set(path, digest);
  }
}

/**
 * Issues immutable snapshots and derives new ones from patch sets. Every
 * snapshot ever issued stays reachable through {@link get} and {@link history}.
 */
export class SnapshotStore {
  private readonly snapshots: Snapshot[] = [];

  constructor(private readonly blobs: BlobStore = new MemoryBlobStore()) {}

  create(tree: FileTree): Snapshot {
    const entries = new Map<string, string>();
    for (const [path, content] of treeEntries(tree)) {
      entries.set(path, this.blobs.put(toBytes(content)));
    }
    return this.issue(entries);
  }

  derive(base: Snapshot, patchSet: PatchSet): ApplyResult {
    const working = new WorkingCopy(base, this.blobs);
    const conflicts: PatchConflict[] = [];
    const changed = new Set<string>();

    for (const operation of patchSet.operations) {
      const conflict = this.applyOperation(working, operation);
      if (conflict) {
        conflicts.push(conflict);
        continue;
      }
      changed.add(operation.path);
      if (operation.op === 'rename') changed.add(operation.to);
    }

    if (conflicts.length > 0) {
      return { status: 'conflict', conflicts };
    }

    for (const content of working.staged.values()) {
      this.blobs.put(content);
    }
    return {
      status: 'applied',
      snapshot: this.issue(working.entries),
      filesChanged: [...changed].sort(),
    };
  }

  get(generation: number): Snapshot | undefined {
    return this.snapshots[generation];
  }

  latest(): Snapshot | undefined {
    return this.snapshots[this.snapshots.length - 1];
  }

  history(): Snapshot[] {
    return [...this.snapshots];
  }

  /**
   * Re-hashes every blob the snapshot references.
   * @throws SnapshotCorruptedError on a missing blob or a digest mismatch
   */
  verify(snapshot: Snapshot): void {
    const manifest = snapshot.manifest();
    for (const [path, digest] of manifest) {
      const body = this.blobs.get(digest);
      if (!body) {
        throw new SnapshotCorruptedError(`Blob ${digest} for ${path} is missing`, {
          details: { path, digest, generation: snapshot.generation },
        });
      }
      const actual = sha256(body);
      if (actual !== digest) {
        throw new SnapshotCorruptedError(`Blob for ${path} hashes to ${actual}, expected ${digest}`, {
          details: { path, digest, actual, generation: snapshot.generation },
        });
      }
    }
    if (manifestDigest(new Map(manifest)) !== snapshot.id) {
      throw new SnapshotCorruptedError(`Snapshot ${snapshot.generation} manifest does not match its id`);
    }
  }

  private issue(entries: ReadonlyMap<string, string>): Snapshot {
    const snapshot = new Snapshot(manifestDigest(entries), this.snapshots.length, entries, this.blobs);
    this.snapshots.push(snapshot);
    return snapshot;
  }

  private applyOperation(working: WorkingCopy, operation: FileOperation): PatchConflict | undefined {
    switch (operation.op) {
      case 'create': {
        if (working.entries.has(operation.path) && !operation.overwrite) {
          return {
            path: operation.path,
            reason: 'path-exists',
            message: `Cannot create ${operation.path}: file already exists`,
          };
        }
        working.write(operation.path, toBytes(operation.content));
        return undefined;
      }
      case 'modify': {
        const current = working.read(operation.path);
        if (!current) return notFound(operation.path, 'modify');
        const edited = applyEdit(current, operation.edit);
        if (!edited.ok) return mismatch(operation.path, edited.message);
        working.write(operation.path, edited.content);
        return undefined;
      }
      case 'delete': {
        if (!working.entries.has(operation.path)) return notFound(operation.path, 'delete');
        working.entries.delete(operation.path);
        return undefined;
      }
      case 'rename': {
        const current = working.read(operation.path);
        if (!current) return notFound(operation.path, 'rename');
        if (working.entries.has(operation.to) && !operation.overwrite) {
          return {
            path: operation.to,
            reason: 'path-exists',
            message: `Cannot rename ${operation.path} to ${operation.to}: destination exists`,
          };
        }
        let content = current;
        if (operation.edit) {
          const edited = applyEdit(current, operation.edit);
          if (!edited.ok) return mismatch(operation.path, edited.message);
          content = edited.content;
        }
        working.entries.delete(operation.path);
        working.write(operation.to, content);
        return undefined;
      }
    }
  }
}

function applyEdit(
  current: Buffer,
  edit: FileEdit,
): { ok: true; content: Buffer } | { ok: false; message: string } {
  if (edit.kind === 'content') return { ok: true, content: toBytes(edit.content) };
  const result = applyHunks(current.toString('utf8'), edit.hunks);
  return result.ok ? { ok: true, content: toBytes(result.content) } : result;
}

function notFound(path: string, verb: string): PatchConflict {
  return { path, reason: 'path-not-found', message: `Cannot ${verb} ${path}: file does not exist` };
}

function mismatch(path: string, detail: string): PatchConflict {
  return { path, reason: 'context-mismatch', message: `Stale edit for ${path}: ${detail}` };
}
