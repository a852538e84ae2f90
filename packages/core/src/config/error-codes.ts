/**
 * Configuration error codes
 */
export enum ConfigErrorCode {
    ENV_FILE_LOAD_FAILED = 'config_env_file_load_failed',
}
