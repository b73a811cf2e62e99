/**
 * Event Bus
 *
 * Typed in-process dispatcher for wallet lifecycle events.
 */

import { v4 as uuidv4 } from 'uuid';
import type { NetworkName } from '../utils/types.js';
import { createLogger } from '../utils/logger.js';

const logger = createLogger('EVENTS');

export interface BaseWalletEvent {
  readonly id: string;
  readonly timestamp: Date;
  readonly walletName: string;
}

export interface WalletCreatedEvent extends BaseWalletEvent {
  readonly type: 'wallet_created';
  readonly walletId: number;
  readonly network: NetworkName;
}

export interface WalletLoadedEvent extends BaseWalletEvent {
  readonly type: 'wallet_loaded';
  readonly walletId: number;
  readonly network: NetworkName;
}

export interface BalanceScannedEvent extends BaseWalletEvent {
  readonly type: 'balance_scanned';
  readonly balance: string;
}

export interface TransactionSentEvent extends BaseWalletEvent {
  readonly type: 'transaction_sent';
  readonly txid: string;
  readonly address: string;
  readonly amount: string;
}

export interface TransactionFailedEvent extends BaseWalletEvent {
  readonly type: 'transaction_failed';
  readonly address: string;
  readonly amount: string;
  readonly error: string;
}

export interface WalletDeletedEvent extends BaseWalletEvent {
  readonly type: 'wallet_deleted';
}

export type WalletEvent =
  | WalletCreatedEvent
  | WalletLoadedEvent
  | BalanceScannedEvent
  | TransactionSentEvent
  | TransactionFailedEvent
  | WalletDeletedEvent;

type DistributiveOmit<T, K extends PropertyKey> = T extends unknown ? Omit<T, K> : never;

/** An event before the bus stamps it with an id and timestamp */
export type WalletEventInput = DistributiveOmit<WalletEvent, 'id' | 'timestamp'>;

type EventHandler = (event: WalletEvent) => void;

export class EventBus {
  private handlers: Set<EventHandler> = new Set();
  private eventHistory: WalletEvent[] = [];

  constructor(
    private readonly maxHistorySize: number = 1000,
    private readonly maxSubscribers: number = 100
  ) {}

  /**
   * Subscribe to all events. Returns the unsubscribe function.
   */
  subscribe(handler: EventHandler): () => void {
    if (this.handlers.size >= this.maxSubscribers) {
      logger.warn('Max subscribers reached, rejecting subscription', {
        maxSubscribers: this.maxSubscribers,
      });
      return () => undefined;
    }
    this.handlers.add(handler);
    return () => {
      this.handlers.delete(handler);
    };
  }

  /**
   * Stamp and dispatch an event to every subscriber
   */
  emit(input: WalletEventInput): WalletEvent {
    const event: WalletEvent = { ...input, id: uuidv4(), timestamp: new Date() };

    this.eventHistory.push(event);
    // Trim once history has grown 50% past the limit
    if (this.eventHistory.length > this.maxHistorySize * 1.5) {
      this.eventHistory = this.eventHistory.slice(-this.maxHistorySize);
    }

    for (const handler of this.handlers) {
      try {
        handler(event);
      } catch (error) {
        logger.error('Event handler error', { type: event.type, error: String(error) });
      }
    }

    return event;
  }

  getRecentEvents(count: number = 100): WalletEvent[] {
    return this.eventHistory.slice(-count);
  }

  getWalletEvents(walletName: string, count: number = 50): WalletEvent[] {
    return this.eventHistory.filter((e) => e.walletName === walletName).slice(-count);
  }

  get subscriberCount(): number {
    return this.handlers.size;
  }

  clearHistory(): void {
    this.eventHistory = [];
  }
}

// Singleton instance
export const eventBus = new EventBus();
