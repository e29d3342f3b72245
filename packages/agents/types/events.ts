// Domain events emitted over a run's lifetime
// Used to surface coordinator progress to CLI and MCP callers

export type DomainEventType =
  // BC1: Analysis Orchestration
  | 'RunRequested'
  | 'RunRejected'
  | 'ResultConsolidated'
  | 'RunFinished'
  | 'RunFailed'
  // BC2: Analysis Workers
  | 'WorkerDispatched'
  | 'WorkerSucceeded'
  | 'WorkerFailed'
  | 'WorkerResultRejected'
  | 'WorkerTimedOut'
  | 'LateResultDiscarded'
  // BC3: Resources
  | 'PoolShutdown';

export const DOMAIN_EVENT_TYPES: readonly DomainEventType[] = [
  'RunRequested', 'RunRejected', 'ResultConsolidated', 'RunFinished', 'RunFailed',
  'WorkerDispatched', 'WorkerSucceeded', 'WorkerFailed', 'WorkerResultRejected',
  'WorkerTimedOut', 'LateResultDiscarded', 'PoolShutdown',
];

export interface DomainEvent<T = unknown> {
  eventId: string;
  type: DomainEventType;
  timestamp: Date;
  sourceContext: string;   // bounded context name
  payload: T;
}

export interface EventBus {
  emit(event: DomainEvent): void;
  on(type: DomainEventType, handler: (event: DomainEvent) => void): void;
  off(type: DomainEventType, handler: (event: DomainEvent) => void): void;
}

// Simple in-process event bus implementation
export class SimpleEventBus implements EventBus {
  private handlers = new Map<DomainEventType, Set<(event: DomainEvent) => void>>();

  emit(event: DomainEvent): void {
    const typeHandlers = this.handlers.get(event.type);
    if (typeHandlers) {
      for (const handler of typeHandlers) {
        handler(event);
      }
    }
  }

  on(type: DomainEventType, handler: (event: DomainEvent) => void): void {
    let typeHandlers = this.handlers.get(type);
    if (!typeHandlers) {
      typeHandlers = new Set();
      this.handlers.set(type, typeHandlers);
    }
    typeHandlers.add(handler);
  }

  off(type: DomainEventType, handler: (event: DomainEvent) => void): void {
    this.handlers.get(type)?.delete(handler);
  }
}
