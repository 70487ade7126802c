/**
 * Notification Dispatch - Task Registry
 *
 * Binds task names to handlers, queues, retry policies and payload schemas.
 * Registration happens once at startup; `build()` seals the registry and the
 * result is shared read-only by every worker context. Processes that only
 * dispatch use a `TaskRouteTable`, which carries no handlers.
 */

import {
  TaskOutcome,
  type RegisteredTask,
  type RetryPolicy,
  type TaskContext,
  type TaskDefinition,
  type TaskPayload,
  type TaskRoute,
  type TaskRouteDefinition,
  type TaskRouter,
} from '../types/interfaces';
import { Logger } from '../../logging/logger';
import { DuplicateTaskError, RegistrySealedError, UnknownTaskError } from './errors';

function describeIssues(error: { issues: { path: (string | number)[]; message: string }[] }): string {
  return error.issues
    .map(issue => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}

export function toTaskRoute<TPayload extends TaskPayload>(definition: TaskRouteDefinition<TPayload>): TaskRoute {
  return Object.freeze({
    name: definition.name,
    queue: definition.queue,
    retryPolicy: Object.freeze<RetryPolicy>({ ...definition.retryPolicy }),
    validatePayload(payload: unknown) {
      const parsed = definition.payloadSchema.safeParse(payload);
      return parsed.success
        ? { ok: true as const, payload: parsed.data }
        : { ok: false as const, reason: `Invalid payload for ${definition.name}: ${describeIssues(parsed.error)}` };
    },
  });
}

function toRegisteredTask<TPayload extends TaskPayload>(definition: TaskDefinition<TPayload>): RegisteredTask {
  const route = toTaskRoute(definition);

  return Object.freeze({
    name: route.name,
    queue: route.queue,
    retryPolicy: route.retryPolicy,
    validatePayload: route.validatePayload,
    async execute(payload: unknown, context: TaskContext): Promise<TaskOutcome> {
      const validated = route.validatePayload(payload);
      if (!validated.ok) {
        return TaskOutcome.fatal(validated.reason);
      }
      return definition.handler(validated.payload, context);
    },
  });
}

/**
 * Task routes without handlers, for processes that dispatch but never execute.
 */
export class TaskRouteTable implements TaskRouter {
  private readonly routes = new Map<string, TaskRoute>();

  constructor(routes: Iterable<TaskRoute>) {
    for (const route of routes) {
      if (this.routes.has(route.name)) {
        throw new DuplicateTaskError(route.name);
      }
      this.routes.set(route.name, route);
    }
  }

  resolve(taskName: string): TaskRoute | undefined {
    return this.routes.get(taskName);
  }

  assertRouted(taskNames: Iterable<string>): void {
    const missing = [...taskNames].filter(name => !this.routes.has(name));
    if (missing.length > 0) {
      throw new UnknownTaskError(missing);
    }
  }
}

/**
 * Sealed, immutable view of the registered tasks.
 */
export class TaskRegistry implements TaskRouter {
  private readonly tasks: ReadonlyMap<string, RegisteredTask>;

  constructor(tasks: Map<string, RegisteredTask>) {
    this.tasks = new Map(tasks);
  }

  resolve(taskName: string): RegisteredTask | undefined {
    return this.tasks.get(taskName);
  }

  /**
   * Startup check that every task name a caller may dispatch has a handler.
   */
  assertRegistered(taskNames: Iterable<string>): void {
    const missing = [...taskNames].filter(name => !this.tasks.has(name));
    if (missing.length > 0) {
      throw new UnknownTaskError(missing);
    }
  }

  list(): RegisteredTask[] {
    return [...this.tasks.values()];
  }

  queues(): string[] {
    return [...new Set(this.list().map(task => task.queue))];
  }
}

export class TaskRegistryBuilder {
  private tasks = new Map<string, RegisteredTask>();
  private sealed = false;
  private logger: Logger;

  constructor(logger?: Logger) {
    this.logger = logger ?? new Logger('task-registry');
  }

  register<TPayload extends TaskPayload>(definition: TaskDefinition<TPayload>): this {
    if (this.sealed) {
      throw new RegistrySealedError(definition.name);
    }
    if (this.tasks.has(definition.name)) {
      throw new DuplicateTaskError(definition.name);
    }

    this.tasks.set(definition.name, toRegisteredTask(definition));
    this.logger.debug(`Task registered: ${definition.name}`, {
      taskName: definition.name,
      queue: definition.queue,
      maxRetries: definition.retryPolicy.maxRetries,
    });
    return this;
  }

  build(): TaskRegistry {
    this.sealed = true;
    this.logger.info(`Task registry sealed with ${this.tasks.size} task(s)`);
    return new TaskRegistry(this.tasks);
  }
}
