
// * """"""""""""""""""""""""""""""""""""""""""""""""""""""""" *
// *                                                           *
// *                D. CALL BATCH CODEC & DISPATCH             *
// *                                                           *
// * """"""""""""""""""""""""""""""""""""""""""""""""""""""""" *


import { Address, addressKey } from '../utils';

import { getLogger } from '../logger';
import { AccountState } from '../sections/5_execution-model';
import { CallResult, allButOne64th, call, delegateCall } from '../sections/6_message-call';
import { InsufficientBudget, MalformedBatch } from './a_errors';
import { Decoded, RlpError, asAddress, asBigint, asBytes, asList, rlp, rlpDecode } from './b_recursive-length-prefix';


const logger = getLogger('dispatch');


// * ---------------------------
// *  D.1. Call descriptors.


/** what happens to the batch when a call fails */
export enum ErrorPolicy {
  /** fail the whole batch with the callee's own error */
  REVERT = 0,
  /** stop dispatching, silently */
  ABORT = 1,
  /** continue, and let the next fallback-only call run */
  IGNORE = 2,
  /** continue, fallback flag untouched */
  FALLTHROUGH = 3,
}

export interface CallDescriptor {
  target: Address;
  nativeAmount: bigint;
  inputBuffer: Uint8Array;
  /** gas forwarded to the call, 0 for everything forwardable */
  budgetCap: bigint;
  /** run the target's code against the current storage owner */
  contextPreserving: boolean;
  /** only run when the call right before failed under `IGNORE` */
  fallbackOnly: boolean;
  errorPolicy: ErrorPolicy;
};

export interface PerCallResult {
  index: number;
  success: boolean;
  skipped: boolean;
  returnData: Uint8Array;
};

export function callDescriptor(target: Address, inputBuffer: Uint8Array, options: Partial<Omit<CallDescriptor, 'target' | 'inputBuffer'>> = {}): CallDescriptor {
  return {
    target,
    nativeAmount: options.nativeAmount ?? 0n,
    inputBuffer,
    budgetCap: options.budgetCap ?? 0n,
    contextPreserving: options.contextPreserving ?? false,
    fallbackOnly: options.fallbackOnly ?? false,
    errorPolicy: options.errorPolicy ?? ErrorPolicy.REVERT,
  };
}


// * ---------------------------
// *  D.2. Codec.


const CONTEXT_PRESERVING_FLAG = 0b0001n;
const FALLBACK_ONLY_FLAG = 0b0010n;
const POLICY_SHIFT = 2n;

/** RLP([ [target, nativeAmount, inputBuffer, budgetCap, flags], ... ]) */
export function encodeBatch(calls: CallDescriptor[]) {
  return rlp(calls.map(descriptor => {
    let flags = BigInt(descriptor.errorPolicy) << POLICY_SHIFT;
    if (descriptor.contextPreserving) flags |= CONTEXT_PRESERVING_FLAG;
    if (descriptor.fallbackOnly) flags |= FALLBACK_ONLY_FLAG;
    return [ descriptor.target, descriptor.nativeAmount, descriptor.inputBuffer, descriptor.budgetCap, flags ];
  }));
}

export function decodeBatch(data: Uint8Array): CallDescriptor[] {
  try {
    return asList(rlpDecode(data), 'batch').map((item, index) => decodeDescriptor(item, index));
  } catch (e) {
    if (e instanceof RlpError) throw new MalformedBatch(e.message);
    throw e;
  }
}

function decodeDescriptor(item: Decoded, index: number): CallDescriptor {
  const fields = asList(item, `call ${index}`);
  if (fields.length !== 5) throw new MalformedBatch(`call ${index} has ${fields.length} fields`);

  const flags = asBigint(fields[4], `call ${index} flags`);
  const policy = Number(flags >> POLICY_SHIFT);
  if (!isErrorPolicy(policy)) throw new MalformedBatch(`call ${index} has unknown error policy ${policy}`);

  return {
    target: asAddress(fields[0], `call ${index} target`),
    nativeAmount: asBigint(fields[1], `call ${index} native amount`),
    // copied: hydration writes into it
    inputBuffer: asBytes(fields[2], `call ${index} input`).slice(),
    budgetCap: asBigint(fields[3], `call ${index} budget cap`),
    contextPreserving: (flags & CONTEXT_PRESERVING_FLAG) !== 0n,
    fallbackOnly: (flags & FALLBACK_ONLY_FLAG) !== 0n,
    errorPolicy: policy,
  };
}

function isErrorPolicy(value: number): value is ErrorPolicy {
  return value === ErrorPolicy.REVERT
    || value === ErrorPolicy.ABORT
    || value === ErrorPolicy.IGNORE
    || value === ErrorPolicy.FALLTHROUGH;
}


// * ---------------------------
// *  D.3. Dispatch.


/** run the calls in order from the current frame, applying each call's error policy */
export function dispatch(state: AccountState, calls: CallDescriptor[]): PerCallResult[] {
  const results: PerCallResult[] = [];
  let fallbackArmed = false;

  for (let index = 0; index < calls.length; index++) {
    const descriptor = calls[index];

    // the flag only ever speaks for the call right before this one
    const previousIgnored = fallbackArmed;
    fallbackArmed = false;
    if (descriptor.fallbackOnly && !previousIgnored) {
      results.push({ index, success: false, skipped: true, returnData: new Uint8Array() });
      continue;
    }

    const result = dispatchOne(state, descriptor, index);
    results.push({ index, success: result.success, skipped: false, returnData: result.output });
    logger.debug({ index, target: addressKey(descriptor.target), success: result.success }, 'call dispatched');

    if (result.success) continue;

    if (descriptor.errorPolicy === ErrorPolicy.REVERT) {
      throw result.error;
    } else if (descriptor.errorPolicy === ErrorPolicy.ABORT) {
      break;
    } else if (descriptor.errorPolicy === ErrorPolicy.IGNORE) {
      fallbackArmed = true;
    }
  }

  return results;
}

function dispatchOne(state: AccountState, descriptor: CallDescriptor, index: number): CallResult {
  let gas: bigint | undefined = undefined;
  if (descriptor.budgetCap !== 0n) {
    const forwardable = allButOne64th(state.frame.gas.available);
    if (forwardable < descriptor.budgetCap) throw new InsufficientBudget(index, descriptor.budgetCap, forwardable);
    gas = descriptor.budgetCap;
  }

  if (descriptor.contextPreserving) {
    return delegateCall(state, descriptor.target, { data: descriptor.inputBuffer, gas });
  }
  return call(state, descriptor.target, { data: descriptor.inputBuffer, value: descriptor.nativeAmount, gas });
}
