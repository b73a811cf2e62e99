/**
 * Events Module Exports
 */

export { EventBus, eventBus } from './event-bus.js';
export type {
  WalletEvent,
  WalletEventInput,
  WalletCreatedEvent,
  WalletLoadedEvent,
  BalanceScannedEvent,
  TransactionSentEvent,
  TransactionFailedEvent,
  WalletDeletedEvent,
} from './event-bus.js';
