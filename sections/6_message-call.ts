
// * """"""""""""""""""""""""""""""""""""""""""""""""""""""""" *
// *                                                           *
// *                     6. MESSAGE CALL                       *
// *                                                           *
// * """"""""""""""""""""""""""""""""""""""""""""""""""""""""" *


import { Address, addressKey, min } from '../utils';

import { getConfig } from '../config';
import { getLogger } from '../logger';
import { CallDepthExceeded, ExecutionError, InsufficientBalance, OutOfGas, StaticCallViolation } from '../appendix/a_errors';
import { cost } from '../appendix/g_fees';
import { getAccount, getBalance, resolveCode } from './3_world-state';
import { Transaction, checkpoint, revertTo } from './4_transaction';
import { AccountState, ExecutionFrame, consumeGas } from './5_execution-model';


const logger = getLogger('message-call');


export interface MessageCallParams {
  /** s */
  sender: Address;
  /** o */
  origin: Address;
  /** r : storage owner of the new frame */
  recipient: Address;
  /** c : code to run, `null` to run whatever `recipient` points at */
  codeAddress: Address | null;
  /** v */
  value: bigint;
  /** ~v */
  apparentValue: bigint;
  /** d */
  data: Uint8Array;
  /** g */
  gas: bigint;
  /** e */
  depth: number;
  /** w */
  canModifyState: boolean;
};

/** z = 1 */
export interface CallSuccess {
  success: true;
  /** o */
  output: Uint8Array;
  error: null;
  /** g' */
  remainingGas: bigint;
};

/** z = 0 */
export interface CallFailure {
  success: false;
  /** o : the revert payload */
  output: Uint8Array;
  /** what made the callee revert */
  error: ExecutionError;
  /** g' */
  remainingGas: bigint;
};

export type CallResult = CallSuccess | CallFailure;

/** Θ : run a call in a fresh frame, undoing every effect of the frame when it reverts */
export function messageCall(transaction: Transaction, params: MessageCallParams): CallResult {
  if (params.depth > getConfig().MAX_CALL_DEPTH) {
    const error = new CallDepthExceeded(params.depth);
    return { success: false, output: error.returnData, error, remainingGas: params.gas };
  }

  const saved = checkpoint(transaction);

  const resolved = params.codeAddress === null
    ? resolveCode(transaction.chain, transaction.worldState, params.recipient)
    : resolveCode(transaction.chain, transaction.worldState, params.codeAddress);

  const frame: ExecutionFrame = {
    self: params.recipient,
    codeAddress: resolved.codeAddress,
    caller: params.sender,
    origin: params.origin,
    value: params.apparentValue,
    callData: params.data,
    depth: params.depth,
    canModifyState: params.canModifyState,
    gas: { available: params.gas },
  };
  const state: AccountState = { transaction, frame };

  try {
    consumeGas(state, cost.call);
    transferValue(state, params.sender, params.recipient, params.value);

    const output = resolved.program === null ? new Uint8Array() : resolved.program(state);
    return { success: true, output, error: null, remainingGas: frame.gas.available };
  } catch (e) {
    if (!(e instanceof ExecutionError)) throw e;

    revertTo(transaction, saved);
    logger.debug({ self: addressKey(frame.self), code: addressKey(frame.codeAddress), error: e.name }, e.message);

    // an exceptional halt burns the whole frame's gas, a revert gives the rest back
    const remainingGas = e instanceof OutOfGas ? 0n : frame.gas.available;
    return { success: false, output: e.returnData, error: e, remainingGas };
  }
}

function transferValue(state: AccountState, sender: Address, recipient: Address, value: bigint) {
  if (value === 0n) return;
  if (!state.frame.canModifyState) throw new StaticCallViolation();

  const worldState = state.transaction.worldState;
  const balance = getBalance(worldState, sender);
  if (balance < value) throw new InsufficientBalance(sender, balance, value);

  getAccount(worldState, sender).balance -= value;
  getAccount(worldState, recipient).balance += value;
}


// * ---------------------------
// *  6.1. Calls from a running frame.


/** L(n) */
export function allButOne64th(n: bigint) {
  return n - (n / 64n); // bigint divisions are automatically floored down
}

export interface SubCall {
  data: Uint8Array;
  /** gas to forward, capped to what the frame can forward; everything forwardable when omitted */
  gas?: bigint;
};

/** run `invoke` with `gas` taken from the caller's meter, giving back what the callee left */
function withForwardedGas(state: AccountState, requested: bigint | undefined, invoke: (gas: bigint) => CallResult) {
  const meter = state.frame.gas;
  const forwardable = allButOne64th(meter.available);
  const gas = requested === undefined ? forwardable : min(requested, forwardable);
  meter.available -= gas;
  const result = invoke(gas);
  meter.available += result.remainingGas;
  return result;
}

/** CALL */
export function call(state: AccountState, to: Address, subCall: SubCall & { value?: bigint }): CallResult {
  const value = subCall.value ?? 0n;
  if (value > 0n) consumeGas(state, cost.callValue);

  const { transaction, frame } = state;
  return withForwardedGas(state, subCall.gas, gas => messageCall(transaction, {
    sender: frame.self,
    origin: frame.origin,
    recipient: to,
    codeAddress: null,
    value,
    apparentValue: value,
    data: subCall.data,
    gas,
    depth: frame.depth + 1,
    canModifyState: frame.canModifyState,
  }));
}

/** DELEGATECALL : run the code of `codeAddress` against this frame's storage, keeping caller and value */
export function delegateCall(state: AccountState, codeAddress: Address, subCall: SubCall): CallResult {
  const { transaction, frame } = state;
  return withForwardedGas(state, subCall.gas, gas => messageCall(transaction, {
    sender: frame.caller,
    origin: frame.origin,
    recipient: frame.self,
    codeAddress,
    value: 0n,
    apparentValue: frame.value,
    data: subCall.data,
    gas,
    depth: frame.depth + 1,
    canModifyState: frame.canModifyState,
  }));
}

/** STATICCALL */
export function staticCall(state: AccountState, to: Address, subCall: SubCall): CallResult {
  const { transaction, frame } = state;
  return withForwardedGas(state, subCall.gas, gas => messageCall(transaction, {
    sender: frame.self,
    origin: frame.origin,
    recipient: to,
    codeAddress: null,
    value: 0n,
    apparentValue: 0n,
    data: subCall.data,
    gas,
    depth: frame.depth + 1,
    canModifyState: false,
  }));
}
