import { QueueConfig } from '../config';
import { errorMessage } from '../utils/errors';

export enum TaskType {
  NOTIFY_SUBSCRIBERS = 'NOTIFY_SUBSCRIBERS',
  POST_TO_SOCIAL = 'POST_TO_SOCIAL',
  SEND_ACCOUNT_EMAIL = 'SEND_ACCOUNT_EMAIL'
}

export enum TaskStatus {
  PENDING = 'PENDING',
  PROCESSING = 'PROCESSING',
  COMPLETED = 'COMPLETED',
  FAILED = 'FAILED',
  DEAD_LETTER = 'DEAD_LETTER'
}

export interface NotifyPayload {
  contentKind: string;
  contentId: number;
  recipients: string[];
  subject: string;
  body: string;
  reference: string;
}

export interface SocialPostPayload {
  contentKind: string;
  contentId: number;
  editorId: number;
  text: string;
  imageId: string | null;
}

export type AccountEmailPurpose = 'password_reset' | 'username_reminder';

export interface AccountEmailPayload {
  purpose: AccountEmailPurpose;
  recipients: string[];
  subject: string;
  body: string;
  reference: string;
}

interface TaskBase {
  id: string;
  status: TaskStatus;
  attempts: number;
  maxAttempts: number;
  createdAt: Date;
  processedAt?: Date;
  error?: string;
}

export interface NotifyTask extends TaskBase {
  type: TaskType.NOTIFY_SUBSCRIBERS;
  payload: NotifyPayload;
}

export interface SocialPostTask extends TaskBase {
  type: TaskType.POST_TO_SOCIAL;
  payload: SocialPostPayload;
}

export interface AccountEmailTask extends TaskBase {
  type: TaskType.SEND_ACCOUNT_EMAIL;
  payload: AccountEmailPayload;
}

export type Task = NotifyTask | SocialPostTask | AccountEmailTask;

export type NewTask =
  | Pick<NotifyTask, 'id' | 'type' | 'payload'>
  | Pick<SocialPostTask, 'id' | 'type' | 'payload'>
  | Pick<AccountEmailTask, 'id' | 'type' | 'payload'>;

export interface TaskHandlers {
  notifySubscribers(task: NotifyTask): Promise<void>;
  postToSocial(task: SocialPostTask): Promise<void>;
  sendAccountEmail(task: AccountEmailTask): Promise<void>;
}

export class TaskTimeoutError extends Error {
  constructor(ms: number) {
    super(`Task timed out after ${ms}ms`);
    this.name = 'TaskTimeoutError';
  }
}

/**
 * Runs side effects one at a time, off the request path. A failing task is
 * retried with exponential backoff and parked in the dead letter queue after
 * `maxAttempts`. Handlers may see the same task more than once. Finished
 * tasks are only counted, not kept.
 */
export class AsyncTaskQueue {
  private handlers?: TaskHandlers;
  private queue: Task[] = [];
  private processing: boolean = false;
  private deadLetterQueue: Task[] = [];
  private completedCount: number = 0;
  private timers: Set<NodeJS.Timeout> = new Set();
  private idleWaiters: Array<() => void> = [];

  constructor(private readonly config: QueueConfig) {}

  setHandlers(handlers: TaskHandlers): void {
    this.handlers = handlers;
  }

  enqueue(newTask: NewTask): Task {
    const task: Task = {
      ...newTask,
      status: TaskStatus.PENDING,
      attempts: 0,
      maxAttempts: this.config.maxAttempts,
      createdAt: new Date()
    };

    this.queue.push(task);
    console.log(`📥 Task enqueued: ${task.type} (ID: ${task.id})`);

    if (!this.processing) {
      this.startProcessing();
    }
    return task;
  }

  private startProcessing(): void {
    this.processing = true;
    this.processQueue().catch((error) => {
      console.error('❌ Task queue stopped unexpectedly:', error);
      this.processing = false;
      this.resolveIfIdle();
    });
  }

  private async processQueue(): Promise<void> {
    const task = this.queue.shift();
    if (!task) {
      this.processing = false;
      this.resolveIfIdle();
      return;
    }

    try {
      task.status = TaskStatus.PROCESSING;
      console.log(`⚙️  Processing task: ${task.type} (Attempt ${task.attempts + 1}/${task.maxAttempts})`);

      await this.withTimeout(this.executeTask(task));

      task.status = TaskStatus.COMPLETED;
      task.processedAt = new Date();
      task.error = undefined;
      this.completedCount++;
      console.log(`✅ Task completed: ${task.type} (ID: ${task.id})`);

    } catch (error) {
      task.attempts++;
      task.error = errorMessage(error);

      if (task.attempts >= task.maxAttempts) {
        task.status = TaskStatus.DEAD_LETTER;
        this.deadLetterQueue.push(task);
        console.error(`💀 Task moved to dead letter queue: ${task.type} (ID: ${task.id}): ${task.error}`);
      } else {
        task.status = TaskStatus.FAILED;
        const backoffDelay = Math.pow(2, task.attempts) * this.config.retryBaseDelayMs;
        console.warn(`⚠️  Task failed, retrying in ${backoffDelay}ms: ${task.type}: ${task.error}`);

        this.schedule(() => {
          this.queue.unshift(task);
          if (!this.processing) {
            this.startProcessing();
          }
        }, backoffDelay);
      }
    }

    this.schedule(() => {
      this.processQueue().catch((error) => {
        console.error('❌ Task queue stopped unexpectedly:', error);
        this.processing = false;
        this.resolveIfIdle();
      });
    }, this.config.pollIntervalMs);
  }

  private async executeTask(task: Task): Promise<void> {
    if (!this.handlers) {
      throw new Error('No task handlers registered');
    }

    switch (task.type) {
      case TaskType.NOTIFY_SUBSCRIBERS:
        await this.handlers.notifySubscribers(task);
        break;
      case TaskType.POST_TO_SOCIAL:
        await this.handlers.postToSocial(task);
        break;
      case TaskType.SEND_ACCOUNT_EMAIL:
        await this.handlers.sendAccountEmail(task);
        break;
    }
  }

  private withTimeout(work: Promise<void>): Promise<void> {
    const ms = this.config.taskTimeoutMs;
    return new Promise((resolve, reject) => {
      const timer = setTimeout(() => reject(new TaskTimeoutError(ms)), ms);
      work.then(
        () => {
          clearTimeout(timer);
          resolve();
        },
        (error: unknown) => {
          clearTimeout(timer);
          reject(error);
        }
      );
    });
  }

  private schedule(callback: () => void, delay: number): void {
    const timer = setTimeout(() => {
      this.timers.delete(timer);
      callback();
    }, delay);
    this.timers.add(timer);
  }

  private isIdle(): boolean {
    return !this.processing && this.queue.length === 0 && this.timers.size === 0;
  }

  private resolveIfIdle(): void {
    if (this.isIdle()) {
      this.idleWaiters.splice(0).forEach((resolve) => resolve());
    }
  }

  /** Resolves once no task is queued, running or waiting for a retry. */
  onIdle(): Promise<void> {
    if (this.isIdle()) {
      return Promise.resolve();
    }
    return new Promise((resolve) => this.idleWaiters.push(resolve));
  }

  /** Cancels pending retries; queued tasks are dropped. */
  stop(): void {
    this.timers.forEach((timer) => clearTimeout(timer));
    this.timers.clear();
    this.queue = [];
    this.processing = false;
    this.resolveIfIdle();
  }

  getStatus() {
    return {
      queueLength: this.queue.length,
      processing: this.processing,
      completedCount: this.completedCount,
      deadLetterQueueLength: this.deadLetterQueue.length
    };
  }

  getDeadLetterQueue(): Task[] {
    return this.deadLetterQueue;
  }
}
