/**
 * Error Codes for the task relay
 *
 * E1xx: Configuration errors - prevent startup
 * E2xx: Transport errors - Queue Store unreachable, logged and retried next tick
 * E3xx: Decode errors - command discarded without a result
 * E4xx: Validation errors - failure result, command finalized normally
 * E5xx: Handler errors - fault inside an action, converted to a failure result
 * E6xx: Timeout errors - waited too long for a result
 */

/**
 * Error Categories
 */
export enum ErrorCategory {
  CONFIG = 'CONFIG',
  TRANSPORT = 'TRANSPORT',
  DECODE = 'DECODE',
  VALIDATION = 'VALIDATION',
  HANDLER = 'HANDLER',
  TIMEOUT = 'TIMEOUT',
}

/**
 * Error Codes
 */
export enum ErrorCode {
  // E1xx: Configuration
  E101_MISSING_API_TOKEN = 'E101',
  E102_INVALID_PORT = 'E102',
  E103_INVALID_INTERVAL = 'E103',
  E104_CONFIG_FILE_UNREADABLE = 'E104',
  E105_INVALID_CONFIG_VALUE = 'E105',

  // E2xx: Transport
  E201_QUEUE_STORE_UNREACHABLE = 'E201',
  E202_QUEUE_STORE_HTTP_STATUS = 'E202',
  E203_QUEUE_STORE_TIMEOUT = 'E203',
  E204_QUEUE_STORE_BAD_REPLY = 'E204',
  E205_QUEUE_STORE_REFUSED = 'E205',

  // E3xx: Decode
  E301_COMMAND_UNPARSABLE = 'E301',
  E302_COMMAND_EMPTY = 'E302',
  E303_COMMAND_NOT_MAPPING = 'E303',

  // E4xx: Validation
  E401_MISSING_ACTION = 'E401',
  E402_MISSING_PARAMETER = 'E402',
  E403_INVALID_PARAMETER = 'E403',

  // E5xx: Handler
  E502_PROCESS_SPAWN_FAILURE = 'E502',

  // E6xx: Timeout
  E602_RESULT_WAIT_TIMEOUT = 'E602',
}

/**
 * Error messages for each error code
 */
const ERROR_MESSAGES: Record<string, string> = {
  E101: 'API token is not configured',
  E102: 'Invalid port',
  E103: 'Invalid interval',
  E104: 'Configuration file could not be read',
  E105: 'Invalid configuration value',

  E201: 'Queue Store unreachable',
  E202: 'Queue Store returned an error status',
  E203: 'Queue Store request timed out',
  E204: 'Queue Store reply was not understood',
  E205: 'Queue Store refused the request',

  E301: 'Command document could not be parsed',
  E302: 'Command document is empty',
  E303: 'Command document is not a mapping',

  E401: 'missing action',
  E402: 'Missing required parameter',
  E403: 'Invalid parameter',

  E502: 'Process could not be started',

  E602: 'Timed out waiting for result',
};

/**
 * Get the error category for an error code
 */
export function getErrorCategory(code: ErrorCode): ErrorCategory {
  const codeStr = code.toString();
  if (codeStr.startsWith('E1')) {
    return ErrorCategory.CONFIG;
  }
  if (codeStr.startsWith('E2')) {
    return ErrorCategory.TRANSPORT;
  }
  if (codeStr.startsWith('E3')) {
    return ErrorCategory.DECODE;
  }
  if (codeStr.startsWith('E4')) {
    return ErrorCategory.VALIDATION;
  }
  if (codeStr.startsWith('E5')) {
    return ErrorCategory.HANDLER;
  }
  if (codeStr.startsWith('E6')) {
    return ErrorCategory.TIMEOUT;
  }
  throw new Error(`Unknown error code: ${code}`);
}

/**
 * Get the error message for an error code
 */
export function getErrorMessage(code: ErrorCode): string {
  const codeStr = code.toString();
  return ERROR_MESSAGES[codeStr] || `Unknown error: ${code}`;
}

export function isTransportError(code: ErrorCode): boolean {
  return getErrorCategory(code) === ErrorCategory.TRANSPORT;
}

export function isDecodeError(code: ErrorCode): boolean {
  return getErrorCategory(code) === ErrorCategory.DECODE;
}

export function isTimeoutError(code: ErrorCode): boolean {
  return getErrorCategory(code) === ErrorCategory.TIMEOUT;
}
