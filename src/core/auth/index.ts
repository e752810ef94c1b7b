export { TokenStore } from './token-store';
export {
  authorize,
  extractBearerToken,
  tokenPreview,
  MissingCredentialError,
  InvalidCredentialError,
  type AuthError,
  type AuthResult,
} from './authorizer';
