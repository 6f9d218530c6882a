export * from './paths.js';
export { walkUpDirectories } from './fs-walk.js';
export { loadUserConfig } from './loader.js';
export {
    UserConfigSchema,
    AuthConfigSchema,
    RuntimeConfigSchema,
    DEFAULT_RUN_TIMEOUT_MS,
    DEFAULT_INTROSPECT_TIMEOUT_MS,
    DEFAULT_KILL_GRACE_MS,
    type UserConfig,
    type AuthConfig,
    type RuntimeConfig,
} from './schemas.js';
export { ConfigError } from './errors.js';
export { ConfigErrorCode } from './error-codes.js';
