export {
  ErrorCategory,
  ErrorCode,
  getErrorCategory,
  getErrorMessage,
  isTransportError,
  isDecodeError,
  isTimeoutError,
} from './error-codes';

export { RelayError, describeError } from './relay-error';
