export { FsConfigStore, CONFIG_FILE_NAME } from './fs_config_store';
