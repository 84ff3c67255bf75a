export {
  loadRelayConfig,
  readConfigFile,
  readEnvironment,
  DEFAULT_CONFIG,
  DEFAULT_PORT,
  DEFAULT_POLL_INTERVAL_MS,
  DEFAULT_LIST_TIMEOUT_MS,
  DEFAULT_REQUEST_TIMEOUT_MS,
  DEFAULT_PROCESS_TIMEOUT_MS,
  DEFAULT_MAX_READ_BYTES,
  DEFAULT_STATIC_DIR,
  type RelayConfig,
  type RelayConfigOverrides,
  type LoadRelayConfigOptions,
} from './relay-config';
