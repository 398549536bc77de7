/**
 * Filesystem-dependent implementations
 *
 * Use @taskdesk/core/memory for in-memory alternatives.
 */

// ConfigStore
export { FsConfigStore, CONFIG_FILE_NAME } from './config_store/fs';
