
// * """"""""""""""""""""""""""""""""""""""""""""""""""""""""" *
// *                                                           *
// *                         F. EVENTS                         *
// *                                                           *
// * """"""""""""""""""""""""""""""""""""""""""""""""""""""""" *


import { Address, addressKey } from '../utils';

import { getLogger } from '../logger';
import { AccountState, consumeGas, requireStateModification } from '../sections/5_execution-model';
import { cost } from './g_fees';


const logger = getLogger('events');


export interface SweepEvent {
  name: 'Sweep';
  asset: Address;
  recipient: Address;
  amount: bigint;
};

export interface RefundEvent {
  name: 'Refund';
  asset: Address;
  recipient: Address;
  amount: bigint;
};

/** the refund asked for more than was held */
export interface ActualRefundEvent {
  name: 'ActualRefund';
  asset: Address;
  recipient: Address;
  requested: bigint;
  actual: bigint;
};

export interface RefundAndSweepEvent {
  name: 'RefundAndSweep';
  asset: Address;
  refundRecipient: Address;
  refundCap: bigint;
  sweepRecipient: Address;
  actualRefund: bigint;
  remaining: bigint;
};

export interface BalanceInjectedEvent {
  name: 'BalanceInjected';
  asset: Address;
  target: Address;
  placeholder: Uint8Array;
  amountReplaced: bigint;
  offset: number;
  success: boolean;
  resultData: Uint8Array;
};

export interface TransferEvent {
  name: 'Transfer';
  from: Address;
  to: Address;
  amount: bigint;
};

export interface ApprovalEvent {
  name: 'Approval';
  owner: Address;
  spender: Address;
  amount: bigint;
};

export type Event =
  | SweepEvent
  | RefundEvent
  | ActualRefundEvent
  | RefundAndSweepEvent
  | BalanceInjectedEvent
  | TransferEvent
  | ApprovalEvent;

/** an event, tagged with the account whose frame emitted it */
export type Log = { address: Address } & Event;

/** LOG : record an event on behalf of the current storage owner */
export function emit(state: AccountState, event: Event) {
  requireStateModification(state);
  consumeGas(state, cost.log);
  state.transaction.logs.push({ address: state.frame.self, ...event });
  logger.debug({ emitter: addressKey(state.frame.self), event: event.name }, 'event emitted');
}

/** logs of a given kind, in emission order */
export function logsNamed<N extends Event['name']>(logs: Log[], name: N): ({ address: Address } & Extract<Event, { name: N }>)[] {
  return logs.filter((log): log is { address: Address } & Extract<Event, { name: N }> => log.name === name);
}
