
// * """"""""""""""""""""""""""""""""""""""""""""""""""""""""" *
// *                                                           *
// *                    5. EXECUTION MODEL                     *
// *                                                           *
// * """"""""""""""""""""""""""""""""""""""""""""""""""""""""" *


import { Address } from '../utils';

import { OutOfGas, StaticCallViolation } from '../appendix/a_errors';
import { cost } from '../appendix/g_fees';
import { loadStorage, storeStorage } from './3_world-state';
import { Transaction, loadTransient, storeTransient } from './4_transaction';


// * ---------------------------
// *  5.1. Execution frame.


/** μg */
export interface GasMeter {
  available: bigint;
};

/**
 * I
 *
 * `self` and `codeAddress` differ when the frame is borrowed: the code of
 * `codeAddress` runs against the storage and balances of `self`.
 */
export interface ExecutionFrame {
  /** Ia : effective storage owner */
  self: Address;
  /** code identity */
  codeAddress: Address;
  /** Is */
  caller: Address;
  /** Io */
  origin: Address;
  /** Iv */
  value: bigint;
  /** Id */
  callData: Uint8Array;
  /** Ie */
  depth: number;
  /** Iw */
  canModifyState: boolean;
  gas: GasMeter;
};

/** handle on the account whose storage is in effect, passed to every primitive */
export interface AccountState {
  readonly transaction: Transaction;
  readonly frame: ExecutionFrame;
};

/** code of an account: reads its frame, returns its output, throws an `ExecutionError` to revert */
export type Program = (state: AccountState) => Uint8Array;


// * ---------------------------
// *  5.2. Machine operations.


export function consumeGas(state: AccountState, amount: bigint) {
  const meter = state.frame.gas;
  if (meter.available < amount) throw new OutOfGas(amount, meter.available);
  meter.available -= amount;
}

export function requireStateModification(state: AccountState) {
  if (!state.frame.canModifyState) throw new StaticCallViolation();
}

/** SLOAD */
export function sload(state: AccountState, slot: bigint) {
  consumeGas(state, cost.storageLoad);
  return loadStorage(state.transaction.worldState, state.frame.self, slot);
}

/** SSTORE */
export function sstore(state: AccountState, slot: bigint, value: bigint) {
  requireStateModification(state);
  consumeGas(state, cost.storageStore);
  storeStorage(state.transaction.worldState, state.frame.self, slot, value);
}

/** TLOAD */
export function tload(state: AccountState, slot: bigint) {
  consumeGas(state, cost.transientAccess);
  return loadTransient(state.transaction, state.frame.self, slot);
}

/** TSTORE */
export function tstore(state: AccountState, slot: bigint, value: bigint) {
  requireStateModification(state);
  consumeGas(state, cost.transientAccess);
  storeTransient(state.transaction, state.frame.self, slot, value);
}
