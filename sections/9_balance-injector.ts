
// * """"""""""""""""""""""""""""""""""""""""""""""""""""""""" *
// *                                                           *
// *              9. SINGLE-SLOT BALANCE INJECTOR              *
// *                                                           *
// * """"""""""""""""""""""""""""""""""""""""""""""""""""""""" *
// * Router path: one placeholder word in one prepared call is
// * swapped for the live balance of one asset, then the call is
// * made. Stricter than hydration: the word being replaced must
// * equal the declared placeholder.


import { equalsBytes } from 'ethereum-cryptography/utils';

import { Address, addressKey, bytesToHexString, isSameAddress } from '../utils';

import { getLogger } from '../logger';
import { AmountOffsetOutOfBounds, AssetTransferFailed, NoValueAvailable, PlaceholderMismatch, TargetCallFailed } from '../appendix/a_errors';
import { decodeUintResult, encodeCall, toWord } from '../appendix/c_call-data';
import { assetSignatures } from '../appendix/e_fungible-asset';
import { emit } from '../appendix/f_events';
import { NATIVE_ASSET, WORD_SIZE } from './2_conventions';
import { AccountState } from './5_execution-model';
import { call } from './6_message-call';
import { assetBalanceOf, balanceOf } from './7_value-sampler';


const logger = getLogger('balance-injector');


export interface InjectionRequest {
  asset: Address;
  target: Address;
  inputBuffer: Uint8Array;
  /** byte offset of the placeholder word in `inputBuffer` */
  offset: number;
  placeholder: Uint8Array;
};

export interface InjectionResult {
  amountReplaced: bigint;
  resultData: Uint8Array;
};

export function injectBalanceAndCall(state: AccountState, request: InjectionRequest): InjectionResult {
  const { asset, target, inputBuffer, offset, placeholder } = request;
  const isNative = isSameAddress(asset, NATIVE_ASSET);

  const amount = balanceOf(state, asset, state.frame.self);
  if (amount === 0n) throw new NoValueAvailable(asset);

  if (offset + WORD_SIZE > inputBuffer.length) throw new AmountOffsetOutOfBounds(offset, inputBuffer.length);
  const found = inputBuffer.slice(offset, offset + WORD_SIZE);
  if (placeholder.length !== WORD_SIZE || !equalsBytes(found, placeholder)) throw new PlaceholderMismatch(offset, placeholder, found);

  const data = inputBuffer.slice();
  data.set(toWord(amount), offset);

  const result = call(state, target, { data, value: isNative ? amount : 0n });
  if (!result.success) throw new TargetCallFailed(result.output);

  logger.debug({ asset: addressKey(asset), target: addressKey(target), amount: amount.toString(), placeholder: bytesToHexString(placeholder) }, 'balance injected');
  emit(state, {
    name: 'BalanceInjected',
    asset,
    target,
    placeholder,
    amountReplaced: amount,
    offset,
    success: true,
    resultData: result.output,
  });

  return { amountReplaced: amount, resultData: result.output };
}

/**
 * Pull the caller's whole balance of `asset` in, then inject.
 * For the native asset the value attached to the call already is the pull.
 */
export function pullFromCaller(state: AccountState, asset: Address) {
  if (isSameAddress(asset, NATIVE_ASSET)) return 0n;

  const from = state.frame.caller;
  const amount = assetBalanceOf(state, asset, from);
  if (amount === 0n) return 0n;

  const result = call(state, asset, { data: encodeCall(assetSignatures.transferFrom, [ from, state.frame.self, amount ]) });
  if (!result.success) throw result.error;
  if (decodeUintResult(result.output) === 0n) throw new AssetTransferFailed(asset, state.frame.self, amount);

  logger.debug({ asset: addressKey(asset), from: addressKey(from), amount: amount.toString() }, 'asset pulled from caller');
  return amount;
}
