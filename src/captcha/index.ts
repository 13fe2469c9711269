export {
  AntiCaptchaClient,
  API_URL,
  DEFAULT_POLL_INTERVAL_MS,
  DEFAULT_TIMEOUT_MS,
  type AntiCaptchaClientConfig,
  type SolvedTask,
} from './client.js';
export { createAntiCaptchaClientFromEnv, clientConfigFromEnv, type FromEnvOptions } from './factory.js';
export { GotTransport, DEFAULT_HTTP_TIMEOUT_MS, type HttpTransport, type HttpResponse, type GotTransportConfig } from './transport.js';
export {
  createHCaptchaConfig,
  withSolutionDetails,
  type HCaptchaConfig,
  type HCaptchaConfigInput,
} from './hcaptcha-config.js';
export {
  decodeCreateTaskResponse,
  decodeTaskResult,
  decodeSolution,
  decodeImageSolution,
  decodeHCaptchaSolution,
} from './decode.js';
export { buildImageTask, createImageTask, solveImage } from './tasks/image-to-text.js';
export {
  buildHCaptchaTask,
  createHCaptchaTask,
  solveHCaptcha,
  type HCaptchaSolveResult,
} from './tasks/hcaptcha.js';

export {
  TASK_TYPES,
  type TaskKind,
  type TaskType,
  type TaskRequest,
  type TaskResult,
  type ReadyTaskResult,
  type CreateTaskResponse,
  type CreateTaskOptions,
  type SolveOptions,
  type Solution,
  type ImageSolution,
  type HCaptchaSolution,
  type ImageTaskOptions,
  type JsonObject,
} from './types.js';
