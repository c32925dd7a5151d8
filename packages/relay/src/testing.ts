import { vi } from 'vitest';
import type { BoardTask, ChatIdentity, CreatedTask, TaskAccountId, TaskDraft } from '@taskrelay/shared-types';
import type { CompletionService, Notifier, TaskSource } from './ports.js';
import { DeliveryFailedError } from './errors.js';

/**
 * In-process stand-ins for the external services, used by the tests
 */

export class FakeTaskSource implements TaskSource {
  private readonly tasks = new Map<TaskAccountId, BoardTask[]>();
  private readonly failures = new Map<TaskAccountId, Error>();
  private nextId = 1;

  readonly listTasks = vi.fn(async (account: TaskAccountId): Promise<BoardTask[]> => {
    const failure = this.failures.get(account);
    if (failure) {
      throw failure;
    }
    return (this.tasks.get(account) ?? []).map((task) => ({ ...task }));
  });

  readonly createTask = vi.fn(async (_account: TaskAccountId, _draft: TaskDraft): Promise<CreatedTask> => {
    return { id: `NEW${this.nextId++}` };
  });

  setTasks(account: TaskAccountId, tasks: BoardTask[]): void {
    this.tasks.set(account, tasks);
  }

  failFor(account: TaskAccountId, error: Error): void {
    this.failures.set(account, error);
  }
}

export class FakeNotifier implements Notifier {
  readonly sent: Array<{ chatIdentity: ChatIdentity; text: string }> = [];
  private readonly failing = new Set<ChatIdentity>();

  async sendMessage(chatIdentity: ChatIdentity, text: string): Promise<void> {
    if (this.failing.has(chatIdentity)) {
      throw new DeliveryFailedError(chatIdentity, 'refused');
    }
    this.sent.push({ chatIdentity, text });
  }

  failFor(chatIdentity: ChatIdentity): void {
    this.failing.add(chatIdentity);
  }

  recover(chatIdentity: ChatIdentity): void {
    this.failing.delete(chatIdentity);
  }
}

export class FakeCompletion implements CompletionService {
  readonly complete = vi.fn(async (prompt: string): Promise<string> => `AI: ${prompt}`);
}
