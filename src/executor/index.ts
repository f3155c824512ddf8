export {
  RequestExecutor,
  type ExecuteOptions,
  type RequestExecutorOptions,
} from './request-executor.js';
export {
  BulkDispatcher,
  summarize,
  type BulkOptions,
  type BulkSummary,
} from './bulk-dispatcher.js';
export { Semaphore } from './semaphore.js';
export { classifyError, classifyResponse, isAuthRejection } from './classify.js';
