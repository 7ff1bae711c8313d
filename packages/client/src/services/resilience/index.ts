export { RetryManager, type RetryConfig, type RetryResult } from './RetryManager';
export { ErrorClassifier } from './ErrorClassifier';
