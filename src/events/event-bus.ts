/**
 * Event Bus for Kernel Workbench
 *
 * Emits events for monitoring long-running operations.
 * Listeners subscribe to 'event'; each event carries the session tick it
 * happened in.
 */

import { EventEmitter } from 'events';

export type WorkbenchEventType =
  | 'operation:started'
  | 'operation:progress'
  | 'operation:completed'
  | 'registry:saved'
  | 'registry:save_failed'
  | 'session:tick';

export interface WorkbenchEvent {
  id: string;
  type: WorkbenchEventType;
  timestamp: Date;
  tick: number;
  data: Record<string, unknown>;
}

class EventBus extends EventEmitter {
  private currentTick = 0;

  emitEvent(type: WorkbenchEventType, data: Record<string, unknown> = {}): boolean {
    const event: WorkbenchEvent = {
      id: `${Date.now()}-${Math.random().toString(36).slice(2, 8)}`,
      type,
      timestamp: new Date(),
      tick: this.currentTick,
      data,
    };

    return super.emit('event', event);
  }

  setTick(tick: number): void {
    this.currentTick = tick;
  }
}

// Singleton instance
export const eventBus = new EventBus();

// Helper functions for common events
export function emitOperationStarted(operationId: string, kind: string, detail: string): void {
  eventBus.emitEvent('operation:started', { operationId, kind, detail });
}

export function emitOperationProgress(operationId: string, received: number, total: number | null): void {
  eventBus.emitEvent('operation:progress', { operationId, received, total });
}

export function emitOperationCompleted(operationId: string, kind: string, outcome: string): void {
  eventBus.emitEvent('operation:completed', { operationId, kind, outcome });
}

export function emitRegistrySaved(path: string, records: number): void {
  eventBus.emitEvent('registry:saved', { path, records });
}

export function emitRegistrySaveFailed(path: string, error: string): void {
  eventBus.emitEvent('registry:save_failed', { path, error });
}

export function emitSessionTick(tick: number, openOperations: number): void {
  eventBus.setTick(tick);
  eventBus.emitEvent('session:tick', { tick, openOperations });
}
