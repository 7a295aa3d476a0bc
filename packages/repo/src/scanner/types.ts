export interface ScanOptions {
  /** Extra gitignore-style patterns */
  excludes?: string[];
  /** Files larger than this are left out of the tree with a warning */
  maxFileBytes?: number;
}

export interface ScanResult {
  root: string;
  /** Relative POSIX path to file body */
  tree: Map<string, Buffer>;
  /** Files in the tree with an executable permission bit */
  executables: string[];
  /** Symbolic links found in the project; nothing may be written through them */
  symlinks: string[];
  warnings: string[];
}
