/**
 * Notification Dispatch - Error Types
 */

export class QueueError extends Error {
  readonly code: string;

  constructor(code: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/**
 * Raised to the caller when a task could not be placed on the broker.
 */
export class EnqueueError extends QueueError {
  constructor(message: string, options?: { cause?: unknown }, code: string = 'ENQUEUE_FAILED') {
    super(code, message, options);
  }
}

export class BrokerUnavailableError extends EnqueueError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options, 'BROKER_UNAVAILABLE');
  }
}

/**
 * Malformed, oversized or otherwise undeliverable envelope.
 */
export class EnvelopeError extends QueueError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('INVALID_ENVELOPE', message, options);
  }
}

export class DuplicateTaskError extends QueueError {
  constructor(taskName: string) {
    super('DUPLICATE_TASK', `Task already registered: ${taskName}`);
  }
}

export class RegistrySealedError extends QueueError {
  constructor(taskName: string) {
    super('REGISTRY_SEALED', `Cannot register ${taskName}: registry is sealed`);
  }
}

export class UnknownTaskError extends QueueError {
  readonly taskNames: string[];

  constructor(taskNames: string[]) {
    super('UNKNOWN_TASK', `No handler registered for: ${taskNames.join(', ')}`);
    this.taskNames = taskNames;
  }
}

export class DeliveryAlreadySettledError extends QueueError {
  constructor(deliveryId: string) {
    super('DELIVERY_SETTLED', `Delivery already settled: ${deliveryId}`);
  }
}

export class PoolStateError extends QueueError {
  constructor(message: string) {
    super('POOL_STATE', message);
  }
}
