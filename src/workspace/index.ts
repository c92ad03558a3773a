export {
  WorkspaceManager,
  WORKSPACE_PREFIX,
  withWorkspace,
  listWorkspaces,
  cleanupStaleWorkspaces,
} from './manager.js';
