// Domain events emitted by the scan pipeline

import type { ScanStage, ScanState, ScanStatus } from './scan.js';

export type DomainEventType =
  | 'ScanStarted'
  | 'ScanStateChanged'
  | 'StageRetried'
  | 'StageDegraded'
  | 'ScanCompleted';

export interface DomainEvent<T = unknown> {
  eventId: string;
  type: DomainEventType;
  timestamp: Date;
  sourceContext: string;
  payload: T;
}

export interface ScanStartedPayload {
  fundName: string;
}

export interface ScanStateChangedPayload {
  fundName: string;
  from: ScanState;
  to: ScanState;
}

export interface StageRetriedPayload {
  fundName: string;
  stage: ScanStage;
  attempt: number;
  delayMs: number;
  error: string;
}

export interface StageDegradedPayload {
  fundName: string;
  stage: ScanStage;
  error: string;
}

export interface ScanCompletedPayload {
  fundName: string;
  status: ScanStatus;
  durationMs: number;
}

export interface ScanEventPayloads {
  ScanStarted: ScanStartedPayload;
  ScanStateChanged: ScanStateChangedPayload;
  StageRetried: StageRetriedPayload;
  StageDegraded: StageDegradedPayload;
  ScanCompleted: ScanCompletedPayload;
}

/** Event as handed to `onEvent` listeners; `payload` narrows on `type`. */
export type ScanEvent = {
  [K in DomainEventType]: { type: K; payload: ScanEventPayloads[K] };
}[DomainEventType];

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
