/**
 * Settings for one capture run. Built once at start, frozen, and passed
 * down to every component.
 */
export interface RunConfiguration {
  /** Exact upstream kernel release, e.g. "6.6.30" */
  readonly pinnedVersion: string;
  /** Baseline file name under configDir, e.g. "x86_64.config" */
  readonly configFileName: string;
  /** Absolute directory holding the tracked baseline files */
  readonly configDir: string;
  /** Base URL of the kernel.org-style mirror */
  readonly mirrorUrl: string;
  /** Program that hosts the editor target, normally make */
  readonly editorCommand: string;
  /** kconfig front end to run, e.g. "menuconfig" */
  readonly editorTarget: EditorTarget;
  /** Parent directory for run workspaces */
  readonly tmpRoot: string;
}

export const EditorTarget = {
  CONFIG: 'config',
  MENUCONFIG: 'menuconfig',
  NCONFIG: 'nconfig',
  XCONFIG: 'xconfig',
  GCONFIG: 'gconfig',
} as const;

export type EditorTarget = (typeof EditorTarget)[keyof typeof EditorTarget];
