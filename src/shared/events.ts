import { EventEmitter } from 'eventemitter3';
import type { TaskKind } from '../captcha/types.js';

/**
 * Payloads of the events a client emits over the life of a task.
 */
export interface ClientEventPayloads {
  'task:created': {
    taskId: number;
    kind: TaskKind;
  };
  'task:pending': {
    taskId: number;
    attempt: number;
    status: string;
  };
  'task:ready': {
    taskId: number;
    durationMs: number;
    cost?: string;
  };
  'task:failed': {
    operation: string;
    code: string;
    error: string;
  };
}

export type ClientEvents = {
  [K in keyof ClientEventPayloads]: (payload: ClientEventPayloads[K]) => void;
};

/**
 * Strongly-typed event emitter. Each client owns one instance.
 */
export class TypedEventEmitter extends EventEmitter<ClientEvents> {}
