
// * """"""""""""""""""""""""""""""""""""""""""""""""""""""""" *
// *                                                           *
// *                   12. EXECUTOR MODULE                     *
// *                                                           *
// * """"""""""""""""""""""""""""""""""""""""""""""""""""""""" *
// * Entry points of the smart account module. Each one exists as
// * a function over an `AccountState`, and is reachable through
// * the module's program with `selector ‖ RLP(args)` call data.


import { concatBytes, equalsBytes } from 'ethereum-cryptography/utils';

import { Address, addressKey, isZeroAddress } from '../utils';

import { getLogger } from '../logger';
import { MalformedCallData, UnknownSelector } from '../appendix/a_errors';
import { Decoded, Input, RlpError, asAddress, asBigint, asBytes, asList, rlp, rlpDecode } from '../appendix/b_recursive-length-prefix';
import { SELECTOR_SIZE, selector, selectorOf } from '../appendix/c_call-data';
import { PerCallResult, decodeBatch, dispatch } from '../appendix/d_batch-codec';
import { NATIVE_ASSET, WORD_SIZE } from './2_conventions';
import { AccountState, Program } from './5_execution-model';
import { decodeHydrationProgram, hydrate } from './8_hydration';
import { InjectionRequest, InjectionResult, injectBalanceAndCall, pullFromCaller } from './9_balance-injector';
import { RefundAndSweepResult, markOpHashSuccess as markSuccess, refundAndSweep as refundAndSweepPrimitive, sweep as sweepPrimitive, validateOpHashAndSweep as validateAndSweepPrimitive } from './10_settlement';
import { assertDelegationAllowed, onlyBorrowedFrame } from './11_invocation-guard';


const logger = getLogger('executor');


// * ---------------------------
// *  12.1. Entry points.


/** hydrate the batch, then dispatch it; acts on the owner's balances so it needs a borrowed frame */
export function hydrateAndExecute(state: AccountState, moduleAddress: Address, batch: Uint8Array, program: Uint8Array): PerCallResult[] {
  onlyBorrowedFrame(state.frame, moduleAddress);
  return hydrateThenDispatch(state, moduleAddress, batch, program);
}

export interface SweepAfterExecution {
  /** zero address for the caller */
  sweepTarget: Address;
  assets: Address[];
  sweepNative: boolean;
};

/** hydrate, dispatch, then sweep what is left of each listed asset; usable directly, router style */
export function hydrateExecuteAndSweep(state: AccountState, moduleAddress: Address, batch: Uint8Array, program: Uint8Array, settlement: SweepAfterExecution): PerCallResult[] {
  const results = hydrateThenDispatch(state, moduleAddress, batch, program);

  const recipient = isZeroAddress(settlement.sweepTarget) ? state.frame.caller : settlement.sweepTarget;
  for (const asset of settlement.assets) sweepPrimitive(state, asset, recipient);
  if (settlement.sweepNative) sweepPrimitive(state, NATIVE_ASSET, recipient);

  return results;
}

function hydrateThenDispatch(state: AccountState, moduleAddress: Address, batch: Uint8Array, program: Uint8Array) {
  const calls = decodeBatch(batch);
  const hydration = decodeHydrationProgram(program);
  assertDelegationAllowed(state.frame, moduleAddress, calls);

  hydrate(state, calls, hydration);
  logger.debug({ self: addressKey(state.frame.self), calls: calls.length, entries: hydration.entries.length }, 'batch hydrated');

  return dispatch(state, calls);
}

export function injectAndCall(state: AccountState, request: InjectionRequest): InjectionResult {
  return injectBalanceAndCall(state, request);
}

/** as `injectAndCall`, after pulling the caller's whole balance of the asset in */
export function injectSweepAndCall(state: AccountState, request: InjectionRequest): InjectionResult {
  pullFromCaller(state, request.asset);
  return injectBalanceAndCall(state, request);
}

export function sweep(state: AccountState, moduleAddress: Address, asset: Address, recipient: Address) {
  onlyBorrowedFrame(state.frame, moduleAddress);
  return sweepPrimitive(state, asset, recipient);
}

export function refundAndSweep(state: AccountState, moduleAddress: Address, asset: Address, refundRecipient: Address, refundCap: bigint, sweepRecipient: Address): RefundAndSweepResult {
  onlyBorrowedFrame(state.frame, moduleAddress);
  return refundAndSweepPrimitive(state, asset, refundRecipient, refundCap, sweepRecipient);
}

export function markOpHashSuccess(state: AccountState, moduleAddress: Address, opHash: Uint8Array) {
  onlyBorrowedFrame(state.frame, moduleAddress);
  markSuccess(state, opHash);
}

export function validateOpHashAndSweep(state: AccountState, moduleAddress: Address, opHash: Uint8Array, asset: Address, recipient: Address) {
  onlyBorrowedFrame(state.frame, moduleAddress);
  return validateAndSweepPrimitive(state, opHash, asset, recipient);
}


// * ---------------------------
// *  12.2. Call data.


export const executorSignatures = {
  hydrateAndExecute: 'hydrateAndExecute(bytes,bytes)',
  hydrateExecuteAndSweep: 'hydrateExecuteAndSweep(bytes,bytes,address,address[],bool)',
  injectAndCall: 'injectAndCall(address,address,bytes,uint256,bytes32)',
  injectSweepAndCall: 'injectSweepAndCall(address,address,bytes,uint256,bytes32)',
  sweep: 'sweep(address,address)',
  refundAndSweep: 'refundAndSweep(address,address,uint256,address)',
  markOpHashSuccess: 'markOpHashSuccess(bytes32)',
  validateOpHashAndSweep: 'validateOpHashAndSweep(bytes32,address,address)',
} as const;

function encodeEntry(signature: string, args: Input[]) {
  return concatBytes(selector(signature), rlp(args));
}

function injectionArgs(request: InjectionRequest): Input[] {
  return [ request.asset, request.target, request.inputBuffer, BigInt(request.offset), request.placeholder ];
}

/** call data builders for the module's entry points */
export const executorCalls = {
  hydrateAndExecute: (batch: Uint8Array, program: Uint8Array) =>
    encodeEntry(executorSignatures.hydrateAndExecute, [ batch, program ]),
  hydrateExecuteAndSweep: (batch: Uint8Array, program: Uint8Array, settlement: SweepAfterExecution) =>
    encodeEntry(executorSignatures.hydrateExecuteAndSweep, [ batch, program, settlement.sweepTarget, settlement.assets, settlement.sweepNative ]),
  injectAndCall: (request: InjectionRequest) =>
    encodeEntry(executorSignatures.injectAndCall, injectionArgs(request)),
  injectSweepAndCall: (request: InjectionRequest) =>
    encodeEntry(executorSignatures.injectSweepAndCall, injectionArgs(request)),
  sweep: (asset: Address, recipient: Address) =>
    encodeEntry(executorSignatures.sweep, [ asset, recipient ]),
  refundAndSweep: (asset: Address, refundRecipient: Address, refundCap: bigint, sweepRecipient: Address) =>
    encodeEntry(executorSignatures.refundAndSweep, [ asset, refundRecipient, refundCap, sweepRecipient ]),
  markOpHashSuccess: (opHash: Uint8Array) =>
    encodeEntry(executorSignatures.markOpHashSuccess, [ opHash ]),
  validateOpHashAndSweep: (opHash: Uint8Array, asset: Address, recipient: Address) =>
    encodeEntry(executorSignatures.validateOpHashAndSweep, [ opHash, asset, recipient ]),
};

/** RLP([ [success, skipped, returnData], ... ]) */
export function encodeDispatchResults(results: PerCallResult[]) {
  return rlp(results.map(result => [ result.success, result.skipped, result.returnData ]));
}

export function decodeDispatchResults(output: Uint8Array): PerCallResult[] {
  return asList(rlpDecode(output), 'results').map((item, index) => {
    const [ success, skipped, returnData ] = asList(item, `result ${index}`);
    return {
      index,
      success: asBigint(success, 'success') !== 0n,
      skipped: asBigint(skipped, 'skipped') !== 0n,
      returnData: asBytes(returnData, 'return data'),
    };
  });
}


// * ---------------------------
// *  12.3. Program.


type Handler = (state: AccountState, args: Decoded[]) => Uint8Array;

function argCount(args: Decoded[], count: number) {
  if (args.length !== count) throw new RlpError(`Expected ${count} arguments, got ${args.length}`);
  return args;
}

function asBool(item: Decoded, what: string) {
  return asBigint(item, what) !== 0n;
}

function asOpHash(item: Decoded) {
  const bytes = asBytes(item, 'opHash');
  if (bytes.length !== WORD_SIZE) throw new RlpError(`Expected 32 bytes for opHash, got ${bytes.length}`);
  return bytes;
}

function asInjectionRequest(args: Decoded[]): InjectionRequest {
  const [ asset, target, inputBuffer, offset, placeholder ] = argCount(args, 5);
  const rawOffset = asBigint(offset, 'offset');
  if (rawOffset > BigInt(Number.MAX_SAFE_INTEGER)) throw new RlpError(`Offset too large: ${rawOffset}`);
  return {
    asset: asAddress(asset, 'asset'),
    target: asAddress(target, 'target'),
    inputBuffer: asBytes(inputBuffer, 'input buffer'),
    offset: Number(rawOffset),
    placeholder: asBytes(placeholder, 'placeholder'),
  };
}

/** program of the module deployed at `moduleAddress` */
export function createExecutorModule(moduleAddress: Address): Program {
  const routes: [ Uint8Array, Handler ][] = [
    [ selector(executorSignatures.hydrateAndExecute), (state, args) => {
      const [ batch, program ] = argCount(args, 2);
      const results = hydrateAndExecute(state, moduleAddress, asBytes(batch, 'batch'), asBytes(program, 'program'));
      return encodeDispatchResults(results);
    } ],
    [ selector(executorSignatures.hydrateExecuteAndSweep), (state, args) => {
      const [ batch, program, sweepTarget, assets, sweepNative ] = argCount(args, 5);
      const results = hydrateExecuteAndSweep(state, moduleAddress, asBytes(batch, 'batch'), asBytes(program, 'program'), {
        sweepTarget: asAddress(sweepTarget, 'sweep target'),
        assets: asList(assets, 'assets').map((asset, index) => asAddress(asset, `asset ${index}`)),
        sweepNative: asBool(sweepNative, 'sweep native'),
      });
      return encodeDispatchResults(results);
    } ],
    [ selector(executorSignatures.injectAndCall), (state, args) => {
      const result = injectAndCall(state, asInjectionRequest(args));
      return rlp([ result.amountReplaced, result.resultData ]);
    } ],
    [ selector(executorSignatures.injectSweepAndCall), (state, args) => {
      const result = injectSweepAndCall(state, asInjectionRequest(args));
      return rlp([ result.amountReplaced, result.resultData ]);
    } ],
    [ selector(executorSignatures.sweep), (state, args) => {
      const [ asset, recipient ] = argCount(args, 2);
      return rlp(sweep(state, moduleAddress, asAddress(asset, 'asset'), asAddress(recipient, 'recipient')));
    } ],
    [ selector(executorSignatures.refundAndSweep), (state, args) => {
      const [ asset, refundRecipient, refundCap, sweepRecipient ] = argCount(args, 4);
      const result = refundAndSweep(
        state,
        moduleAddress,
        asAddress(asset, 'asset'),
        asAddress(refundRecipient, 'refund recipient'),
        asBigint(refundCap, 'refund cap'),
        asAddress(sweepRecipient, 'sweep recipient'),
      );
      return rlp([ result.actualRefund, result.remaining ]);
    } ],
    [ selector(executorSignatures.markOpHashSuccess), (state, args) => {
      const [ opHash ] = argCount(args, 1);
      markOpHashSuccess(state, moduleAddress, asOpHash(opHash));
      return new Uint8Array();
    } ],
    [ selector(executorSignatures.validateOpHashAndSweep), (state, args) => {
      const [ opHash, asset, recipient ] = argCount(args, 3);
      return rlp(validateOpHashAndSweep(state, moduleAddress, asOpHash(opHash), asAddress(asset, 'asset'), asAddress(recipient, 'recipient')));
    } ],
  ];

  return (state) => {
    const callData = state.frame.callData;
    if (callData.length < SELECTOR_SIZE) throw new MalformedCallData('missing selector');

    const called = selectorOf(callData);
    const route = routes.find(([ routeSelector ]) => equalsBytes(routeSelector, called));
    if (route === undefined) throw new UnknownSelector(called);

    try {
      const args = asList(rlpDecode(callData.subarray(SELECTOR_SIZE)), 'arguments');
      return route[1](state, args);
    } catch (e) {
      if (e instanceof RlpError) throw new MalformedCallData(e.message);
      throw e;
    }
  };
}
