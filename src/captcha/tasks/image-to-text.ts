import { AppError } from '../../shared/errors.js';
import { componentLogger } from '../../shared/logger.js';
import { decodeImageSolution } from '../decode.js';
import type { AntiCaptchaClient } from '../client.js';
import { TASK_TYPES, type ImageTaskOptions, type SolveOptions, type TaskRequest } from '../types.js';

/**
 * Builds the ImageToTextTask envelope. The image string is forwarded
 * untouched; the service decides whether it is a valid picture.
 */
export function buildImageTask(imageData: string, options: ImageTaskOptions = {}): TaskRequest {
  const task: TaskRequest = {
    type: TASK_TYPES.image,
    body: imageData,
  };

  for (const [key, value] of Object.entries(options)) {
    if (value !== undefined) {
      task[key] = value;
    }
  }

  return task;
}

export async function createImageTask(
  client: AntiCaptchaClient,
  imageData: string,
  options: ImageTaskOptions = {},
  signal?: AbortSignal,
): Promise<number> {
  return client.createTask(buildImageTask(imageData, options), { signal });
}

/**
 * Solves an image CAPTCHA:
 *   1. Submits the base64 image as an ImageToTextTask
 *   2. Polls until the task is ready or the deadline fires
 *   3. Returns `solution.text`
 */
export async function solveImage(
  client: AntiCaptchaClient,
  imageData: string,
  options: SolveOptions & { image?: ImageTaskOptions } = {},
): Promise<string> {
  const log = componentLogger(client.logger, 'task:image');
  log.info({ imageLength: imageData.length }, 'Solving image CAPTCHA');

  const { taskId, result } = await client.solveTask(buildImageTask(imageData, options.image), options);
  let text: string;
  try {
    ({ text } = decodeImageSolution(result, 'solveImage'));
  } catch (error) {
    log.error({ err: error, taskId }, 'Invalid image solution in response');
    client.events.emit('task:failed', {
      operation: 'solveImage',
      code: error instanceof AppError ? error.code : 'UNKNOWN',
      error: error instanceof Error ? error.message : String(error),
    });
    throw error;
  }

  log.info({ taskId, solutionLength: text.length }, 'Image CAPTCHA solved');
  return text;
}
