export {
  CoordinatorClient,
  createCommandFilename,
  type CoordinatorClientConfig,
  type WaitOptions,
} from './coordinator-client';
