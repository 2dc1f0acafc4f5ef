// Pipeline lifecycle events
// Emitted by ConversationPipeline so callers (CLI, MCP server, tests) can observe runs

export type DomainEventType =
  | 'RunStarted'
  | 'StageCompleted'
  | 'RunCompleted'
  | 'RunRejected'
  | 'RunFailed';

export interface DomainEvent<T = unknown> {
  eventId: string;
  type: DomainEventType;
  timestamp: Date;
  sourceContext: string;   // pipeline name
  payload: T;
}

export type DomainEventHandler = (event: DomainEvent) => void;

export interface EventBus {
  emit(event: DomainEvent): void;
  on(type: DomainEventType, handler: DomainEventHandler): void;
  off(type: DomainEventType, handler: DomainEventHandler): void;
}

// Simple in-process event bus implementation
export class SimpleEventBus implements EventBus {
  private handlers = new Map<DomainEventType, Set<DomainEventHandler>>();

  emit(event: DomainEvent): void {
    const typeHandlers = this.handlers.get(event.type);
    if (typeHandlers) {
      for (const handler of typeHandlers) {
        handler(event);
      }
    }
  }

  on(type: DomainEventType, handler: DomainEventHandler): void {
    const existing = this.handlers.get(type);
    if (existing) {
      existing.add(handler);
    } else {
      this.handlers.set(type, new Set([handler]));
    }
  }

  off(type: DomainEventType, handler: DomainEventHandler): void {
    this.handlers.get(type)?.delete(handler);
  }
}
