export type {
  AppError,
  ConfigIssue,
  ConfigInvalidError,
  ResourceCloseFailureError,
  ValidatedAppConfig,
} from './app-error.js';
export { Err, describeCause } from './factories.js';
export { formatAppError } from './formatter.js';
