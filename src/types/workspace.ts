/**
 * Handle to a run's temporary directory.
 */
export interface Workspace {
  id: string;
  /** Absolute path of the directory */
  path: string;
  createdAt: Date;
}

/**
 * Kernel source unpacked inside a workspace.
 */
export interface ExtractedSourceTree {
  version: string;
  /** <workspace>/linux-<version> */
  rootPath: string;
  /** <rootPath>/.config, the file the editor reads and rewrites */
  configPath: string;
}
