export {
  archiveName,
  archiveUrl,
  sourceTreePath,
  extractArchive,
  fetchSource,
  type FetchFn,
  type Extractor,
  type FetchSourceOptions,
} from './source-fetcher.js';
export {
  baselinePath,
  assertBaselineExists,
  seedConfig,
  persistConfig,
} from './config-files.js';
export { launchEditor, type LaunchEditorOptions } from './editor-launcher.js';
