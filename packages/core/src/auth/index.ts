export {
    type AuthTokenProvider,
    EnvTokenProvider,
    CommandTokenProvider,
    createDefaultTokenProvider,
} from './token-provider.js';
export { AuthError } from './errors.js';
export { AuthErrorCode } from './error-codes.js';
