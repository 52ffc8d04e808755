import { randomBytes } from 'node:crypto';

import { parseJson, safeParseOrThrow, ValidationError } from '@taskhook/core-validation';
import { z } from 'zod';

/**
 * Lower value is more urgent: the queue always serves CRITICAL before LOW.
 */
export const TaskPriority = {
  CRITICAL: 0,
  HIGH: 1,
  NORMAL: 2,
  LOW: 3
} as const;

export type TaskPriority = (typeof TaskPriority)[keyof typeof TaskPriority];
export type TaskPriorityName = keyof typeof TaskPriority;

export const TASK_PRIORITY_NAMES = ['CRITICAL', 'HIGH', 'NORMAL', 'LOW'] as const satisfies readonly TaskPriorityName[];

export function priorityName(priority: TaskPriority): TaskPriorityName {
  return TASK_PRIORITY_NAMES[priority];
}

export type SourceMetadata = Readonly<Record<string, string>>;

export interface TaskMessage {
  readonly taskId: string;
  readonly installationId: string;
  readonly provider: string;
  readonly inputMessage: string;
  readonly priority: TaskPriority;
  readonly sourceMetadata: SourceMetadata;
  /** ISO-8601 */
  readonly createdAt: string;
}

export type TaskMessageInit = {
  installationId: string;
  provider: string;
  inputMessage: string;
  priority: TaskPriority;
  sourceMetadata?: Record<string, string>;
};

export function generateTaskId(): string {
  return `task-${randomBytes(6).toString('hex')}`;
}

/**
 * Build a frozen message with a fresh task id.
 */
export function buildTaskMessage(init: TaskMessageInit, now: Date = new Date()): TaskMessage {
  return freezeMessage({
    taskId: generateTaskId(),
    installationId: init.installationId,
    provider: init.provider,
    inputMessage: init.inputMessage,
    priority: init.priority,
    sourceMetadata: { ...init.sourceMetadata },
    createdAt: now.toISOString()
  });
}

function freezeMessage(message: TaskMessage): TaskMessage {
  Object.freeze(message.sourceMetadata);
  return Object.freeze(message);
}

export const taskMessageWireSchema = z.object({
  task_id: z.string().min(1),
  installation_id: z.string().min(1),
  provider: z.string().min(1),
  input_message: z.string(),
  priority: z.enum(TASK_PRIORITY_NAMES),
  source_metadata: z.record(z.string()),
  created_at: z.string().datetime({ offset: true })
});

export type TaskMessageWire = z.infer<typeof taskMessageWireSchema>;

export function toWire(message: TaskMessage): TaskMessageWire {
  return {
    task_id: message.taskId,
    installation_id: message.installationId,
    provider: message.provider,
    input_message: message.inputMessage,
    priority: priorityName(message.priority),
    source_metadata: { ...message.sourceMetadata },
    created_at: message.createdAt
  };
}

export function fromWire(wire: TaskMessageWire): TaskMessage {
  return freezeMessage({
    taskId: wire.task_id,
    installationId: wire.installation_id,
    provider: wire.provider,
    inputMessage: wire.input_message,
    priority: TaskPriority[wire.priority],
    sourceMetadata: { ...wire.source_metadata },
    createdAt: wire.created_at
  });
}

export function encodeTaskMessage(message: TaskMessage): string {
  return JSON.stringify(toWire(message));
}

/**
 * @throws ValidationError when the payload is not JSON or misses a field
 */
export function decodeTaskMessage(raw: string): TaskMessage {
  const parsed = parseJson(raw);
  if (!parsed.ok) {
    throw new ValidationError(`taskMessage: ${parsed.message}`, [], 'taskMessage');
  }
  return fromWire(safeParseOrThrow(taskMessageWireSchema, parsed.value, 'taskMessage'));
}
