export { SecureLinkError } from './SecureLinkError';
export type { ErrorContext } from './ErrorContext';
export { ConfigurationError, TransportError, CryptoError } from './errors';
export { ErrorFactory } from './errorFactory';
