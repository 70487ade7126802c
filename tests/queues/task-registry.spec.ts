import { describe, expect, it, vi } from 'vitest';
import { z } from 'zod';
import { TaskRegistryBuilder, TaskRouteTable, toTaskRoute } from '../../shared/queues/core/TaskRegistry';
import {
  DuplicateTaskError,
  RegistrySealedError,
  UnknownTaskError,
} from '../../shared/queues/core/errors';
import { TaskOutcome, type TaskDefinition } from '../../shared/queues/types/interfaces';
import { makeContext, testLogger } from '../helpers/fakes';

const greetSchema = z.object({ name: z.string().min(1) });
type Greet = z.infer<typeof greetSchema>;

function definition(name: string, handler = vi.fn(async (_payload: Greet) => TaskOutcome.success())): TaskDefinition<Greet> {
  return {
    name,
    queue: 'emails',
    retryPolicy: { maxRetries: 3, baseDelaySeconds: 60, backoffStrategy: 'exponential' },
    payloadSchema: greetSchema,
    handler,
  };
}

describe('TaskRegistry', () => {
  it('resolves registered tasks and returns undefined otherwise', () => {
    const registry = new TaskRegistryBuilder(testLogger).register(definition('greet')).build();

    expect(registry.resolve('greet')?.queue).toBe('emails');
    expect(registry.resolve('missing')).toBeUndefined();
    expect(registry.list().map(task => task.name)).toEqual(['greet']);
    expect(registry.queues()).toEqual(['emails']);
  });

  it('refuses duplicate names', () => {
    const builder = new TaskRegistryBuilder(testLogger).register(definition('greet'));
    expect(() => builder.register(definition('greet'))).toThrow(DuplicateTaskError);
  });

  it('is sealed by build', () => {
    const builder = new TaskRegistryBuilder(testLogger).register(definition('greet'));
    const registry = builder.build();

    expect(() => builder.register(definition('other'))).toThrow(RegistrySealedError);
    expect(registry.resolve('other')).toBeUndefined();
  });

  it('reports every missing task name at once', () => {
    const registry = new TaskRegistryBuilder(testLogger).register(definition('greet')).build();

    expect(() => registry.assertRegistered(['greet'])).not.toThrow();
    try {
      registry.assertRegistered(['greet', 'a', 'b']);
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(UnknownTaskError);
      expect(error).toHaveProperty('taskNames', ['a', 'b']);
      expect(error).toHaveProperty('message', 'No handler registered for: a, b');
    }
  });

  it('validates payloads before calling the handler', async () => {
    const handler = vi.fn(async (_payload: Greet) => TaskOutcome.success());
    const registry = new TaskRegistryBuilder(testLogger).register(definition('greet', handler)).build();
    const task = registry.resolve('greet');
    if (!task) throw new Error('greet not registered');

    await expect(task.execute({ name: 'Hanna' }, makeContext())).resolves.toEqual({ kind: 'success' });
    expect(handler).toHaveBeenCalledWith({ name: 'Hanna' }, expect.anything());

    const outcome = await task.execute({ name: 42 }, makeContext());
    expect(outcome.kind).toBe('fatal');
    expect(handler).toHaveBeenCalledTimes(1);
  });

  it('describes payload problems by path', () => {
    const registry = new TaskRegistryBuilder(testLogger).register(definition('greet')).build();
    expect(registry.resolve('greet')?.validatePayload({})).toEqual({
      ok: false,
      reason: 'Invalid payload for greet: name: Required',
    });
  });
});

describe('TaskRouteTable', () => {
  it('resolves routes without handlers and validates their payloads', () => {
    const table = new TaskRouteTable([toTaskRoute(definition('greet'))]);
    const route = table.resolve('greet');

    expect(route).toMatchObject({ name: 'greet', queue: 'emails', retryPolicy: { maxRetries: 3 } });
    expect(route).not.toHaveProperty('execute');
    expect(route?.validatePayload({ name: 'Hanna' })).toEqual({ ok: true, payload: { name: 'Hanna' } });
    expect(table.resolve('missing')).toBeUndefined();
  });

  it('refuses duplicate names', () => {
    expect(() => new TaskRouteTable([toTaskRoute(definition('greet')), toTaskRoute(definition('greet'))])).toThrow(
      DuplicateTaskError
    );
  });

  it('reports task names without a route', () => {
    const table = new TaskRouteTable([toTaskRoute(definition('greet'))]);

    expect(() => table.assertRouted(['greet'])).not.toThrow();
    expect(() => table.assertRouted(['greet', 'other'])).toThrow('No handler registered for: other');
  });
});
