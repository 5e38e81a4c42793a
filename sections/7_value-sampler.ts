
// * """"""""""""""""""""""""""""""""""""""""""""""""""""""""" *
// *                                                           *
// *                     7. VALUE SAMPLER                      *
// *                                                           *
// * """"""""""""""""""""""""""""""""""""""""""""""""""""""""" *
// * Reads only. Balances and allowances are live: they reflect
// * the world state at the moment they are sampled.


import { Address, isSameAddress } from '../utils';

import { AssetQueryFailed } from '../appendix/a_errors';
import { decodeUintResult, encodeCall } from '../appendix/c_call-data';
import { assetSignatures } from '../appendix/e_fungible-asset';
import { NATIVE_ASSET } from './2_conventions';
import { getBalance } from './3_world-state';
import { AccountState } from './5_execution-model';
import { staticCall } from './6_message-call';


/** where an account id comes from */
export enum ValueSource {
  SELF = 0x0,
  CALLER = 0x1,
  ORIGIN = 0x2,
  EXPLICIT = 0x3,
}

export type AccountSource =
  | { source: ValueSource.SELF }
  | { source: ValueSource.CALLER }
  | { source: ValueSource.ORIGIN }
  | { source: ValueSource.EXPLICIT, account: Address };

export function resolveAccount(state: AccountState, from: AccountSource): Address {
  switch (from.source) {
    case ValueSource.SELF: return state.frame.self;
    case ValueSource.CALLER: return state.frame.caller;
    case ValueSource.ORIGIN: return state.frame.origin;
    case ValueSource.EXPLICIT: return from.account;
  }
}

export function nativeBalanceOf(state: AccountState, account: Address) {
  return getBalance(state.transaction.worldState, account);
}

export function assetBalanceOf(state: AccountState, asset: Address, account: Address) {
  return queryAsset(state, asset, encodeCall(assetSignatures.balanceOf, [ account ]));
}

export function assetAllowanceOf(state: AccountState, asset: Address, owner: Address, spender: Address) {
  return queryAsset(state, asset, encodeCall(assetSignatures.allowance, [ owner, spender ]));
}

/** native balance when `asset` is the native sentinel, asset balance otherwise */
export function balanceOf(state: AccountState, asset: Address, account: Address) {
  if (isSameAddress(asset, NATIVE_ASSET)) return nativeBalanceOf(state, account);
  return assetBalanceOf(state, asset, account);
}

function queryAsset(state: AccountState, asset: Address, data: Uint8Array) {
  const result = staticCall(state, asset, { data });
  const value = result.success ? decodeUintResult(result.output) : null;
  // an account without code answers with empty data
  if (value === null) throw new AssetQueryFailed(asset, result.output);
  return value;
}


// * ---------------------------
// *  7.1. Sources.


export const fromSelf: AccountSource = { source: ValueSource.SELF };
export const fromCaller: AccountSource = { source: ValueSource.CALLER };
export const fromOrigin: AccountSource = { source: ValueSource.ORIGIN };

export function fromAccount(account: Address): AccountSource {
  return { source: ValueSource.EXPLICIT, account };
}
