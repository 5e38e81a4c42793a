
// * """"""""""""""""""""""""""""""""""""""""""""""""""""""""" *
// *                                                           *
// *                      4. TRANSACTION                       *
// *                                                           *
// * """"""""""""""""""""""""""""""""""""""""""""""""""""""""" *


import { Address, addressKey, bigintToHexString } from '../utils';

import { getConfig } from '../config';
import { getLogger } from '../logger';
import { ExecutionError } from '../appendix/a_errors';
import type { Log } from '../appendix/f_events';
import { Chain, WorldState } from './3_world-state';
import { messageCall } from './6_message-call';


const logger = getLogger('transaction');


// * ---------------------------
// *  4.1. Transaction context.


/** transient storage : `addressKey(account)` -> `bigintToHexString(slot)` -> word */
export type TransientStorage = Record<string, Record<string, bigint>>;

/** everything that lives exactly as long as one top-level transaction */
export interface Transaction {
  chain: Chain;
  /** working copy of the world state, committed to the chain on success */
  worldState: WorldState;
  /** ephemeral storage, never committed */
  transientStorage: TransientStorage;
  /** Al */
  logs: Log[];
  /** Io */
  origin: Address;
};

export function loadTransient(transaction: Transaction, account: Address, slot: bigint) {
  return transaction.transientStorage[addressKey(account)]?.[bigintToHexString(slot)] ?? 0n;
}

export function storeTransient(transaction: Transaction, account: Address, slot: bigint, value: bigint) {
  const key = addressKey(account);
  const storage = transaction.transientStorage[key] ?? {};
  transaction.transientStorage[key] = storage;
  if (value === 0n) delete storage[bigintToHexString(slot)];
  else storage[bigintToHexString(slot)] = value;
}


// * ---------------------------
// *  4.2. Checkpoints.


export interface Checkpoint {
  worldState: WorldState;
  transientStorage: TransientStorage;
  logCount: number;
};

export function checkpoint(transaction: Transaction): Checkpoint {
  return {
    worldState: structuredClone(transaction.worldState),
    transientStorage: structuredClone(transaction.transientStorage),
    logCount: transaction.logs.length,
  };
}

export function revertTo(transaction: Transaction, saved: Checkpoint) {
  transaction.worldState = saved.worldState;
  transaction.transientStorage = saved.transientStorage;
  transaction.logs.length = saved.logCount;
}


// * ---------------------------
// *  4.3. Execution.


export interface TransactionRequest {
  from: Address;
  to: Address;
  value?: bigint;
  data?: Uint8Array;
  gasLimit?: bigint;
};

export interface Receipt {
  success: boolean;
  /** return data, or the revert payload */
  output: Uint8Array;
  error: ExecutionError | null;
  logs: Log[];
  gasUsed: bigint;
};

/** run one top-level call; the chain only sees its effects when it succeeds */
export function executeTransaction(chain: Chain, request: TransactionRequest): Receipt {
  const gasLimit = request.gasLimit ?? getConfig().TX_GAS_LIMIT;

  const transaction: Transaction = {
    chain,
    worldState: structuredClone(chain.worldState),
    transientStorage: {},
    logs: [],
    origin: request.from,
  };

  const result = messageCall(transaction, {
    sender: request.from,
    origin: request.from,
    recipient: request.to,
    codeAddress: null,
    value: request.value ?? 0n,
    apparentValue: request.value ?? 0n,
    data: request.data ?? new Uint8Array(),
    gas: gasLimit,
    depth: 0,
    canModifyState: true,
  });

  if (result.success) chain.worldState = transaction.worldState;

  const gasUsed = gasLimit - result.remainingGas;
  logger.debug({ to: addressKey(request.to), success: result.success, gasUsed: gasUsed.toString(), error: result.error?.name }, 'transaction executed');

  return {
    success: result.success,
    output: result.output,
    error: result.error,
    logs: result.success ? transaction.logs : [],
    gasUsed,
  };
}
