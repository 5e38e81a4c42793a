
// * """"""""""""""""""""""""""""""""""""""""""""""""""""""""" *
// *                                                           *
// *                   E. FUNGIBLE ASSET                       *
// *                                                           *
// * """"""""""""""""""""""""""""""""""""""""""""""""""""""""" *
// * Reference token program: balances, owner -> spender
// * allowances, transfers. Mappings live at KEC(key ‖ slot) in
// * the asset account's storage.


import { equalsBytes } from 'ethereum-cryptography/utils';

import { Address, bytesToBigint } from '../utils';

import { MAX_UINT_256, hashConcat } from '../sections/2_conventions';
import { Chain, loadStorage, storeStorage } from '../sections/3_world-state';
import { checkpoint, revertTo } from '../sections/4_transaction';
import { AccountState, Program, sload, sstore } from '../sections/5_execution-model';
import { InsufficientAllowance, InsufficientBalance, MalformedCallData, UnknownSelector } from './a_errors';
import { readAddressWord, readWord, selector, selectorOf, toWord } from './c_call-data';
import { emit } from './f_events';


export const assetSignatures = {
  balanceOf: 'balanceOf(address)',
  allowance: 'allowance(address,address)',
  transfer: 'transfer(address,uint256)',
  transferFrom: 'transferFrom(address,address,uint256)',
  approve: 'approve(address,uint256)',
} as const;

const BALANCES_SLOT = 0n;
const ALLOWANCES_SLOT = 1n;

export function balanceSlot(owner: Address) {
  return bytesToBigint(hashConcat(toWord(owner), toWord(BALANCES_SLOT)));
}

export function allowanceSlot(owner: Address, spender: Address) {
  const inner = hashConcat(toWord(owner), toWord(ALLOWANCES_SLOT));
  return bytesToBigint(hashConcat(toWord(spender), inner));
}


// * ---------------------------
// *  E.1. Program.


export interface FungibleAssetOptions {
  /** `false` makes failed transfers return a false word instead of reverting */
  revertOnFailure?: boolean;
};

const TRUE_WORD = toWord(1n);
const FALSE_WORD = toWord(0n);

export function createFungibleAsset(options: FungibleAssetOptions = {}): Program {
  const revertOnFailure = options.revertOnFailure ?? true;

  const routes: [ Uint8Array, (state: AccountState) => Uint8Array ][] = [
    [ selector(assetSignatures.balanceOf), state => {
      const owner = addressArg(state, 0);
      return toWord(sload(state, balanceSlot(owner)));
    } ],
    [ selector(assetSignatures.allowance), state => {
      const owner = addressArg(state, 0);
      const spender = addressArg(state, 1);
      return toWord(sload(state, allowanceSlot(owner, spender)));
    } ],
    [ selector(assetSignatures.transfer), state => {
      const to = addressArg(state, 0);
      const amount = uintArg(state, 1);
      return settle(state, revertOnFailure, () => move(state, state.frame.caller, to, amount));
    } ],
    [ selector(assetSignatures.transferFrom), state => {
      const from = addressArg(state, 0);
      const to = addressArg(state, 1);
      const amount = uintArg(state, 2);
      return settle(state, revertOnFailure, () => {
        spendAllowance(state, from, state.frame.caller, amount);
        move(state, from, to, amount);
      });
    } ],
    [ selector(assetSignatures.approve), state => {
      const spender = addressArg(state, 0);
      const amount = uintArg(state, 1);
      sstore(state, allowanceSlot(state.frame.caller, spender), amount);
      emit(state, { name: 'Approval', owner: state.frame.caller, spender, amount });
      return TRUE_WORD;
    } ],
  ];

  return (state) => {
    const called = selectorOf(state.frame.callData);
    const route = routes.find(([ routeSelector ]) => equalsBytes(routeSelector, called));
    if (route === undefined) throw new UnknownSelector(called);
    return route[1](state);
  };
}

function settle(state: AccountState, revertOnFailure: boolean, effect: () => void) {
  if (revertOnFailure) {
    effect();
    return TRUE_WORD;
  }
  const saved = checkpoint(state.transaction);
  try {
    effect();
    return TRUE_WORD;
  } catch (e) {
    if (!(e instanceof InsufficientBalance || e instanceof InsufficientAllowance)) throw e;
    revertTo(state.transaction, saved);
    return FALSE_WORD;
  }
}

function move(state: AccountState, from: Address, to: Address, amount: bigint) {
  const fromBalance = sload(state, balanceSlot(from));
  if (fromBalance < amount) throw new InsufficientBalance(from, fromBalance, amount);
  sstore(state, balanceSlot(from), fromBalance - amount);
  sstore(state, balanceSlot(to), sload(state, balanceSlot(to)) + amount);
  emit(state, { name: 'Transfer', from, to, amount });
}

function spendAllowance(state: AccountState, owner: Address, spender: Address, amount: bigint) {
  const allowance = sload(state, allowanceSlot(owner, spender));
  if (allowance === MAX_UINT_256) return;
  if (allowance < amount) throw new InsufficientAllowance(owner, spender, allowance, amount);
  sstore(state, allowanceSlot(owner, spender), allowance - amount);
}

function addressArg(state: AccountState, index: number) {
  const value = readAddressWord(state.frame.callData, index);
  if (value === null) throw new MalformedCallData(`argument ${index} is not an address`);
  return value;
}

function uintArg(state: AccountState, index: number) {
  const value = readWord(state.frame.callData, index);
  if (value === null) throw new MalformedCallData(`argument ${index} is missing`);
  return value;
}


// * ---------------------------
// *  E.2. Genesis helpers.


/** credit `owner` without a transfer, for genesis and tests */
export function mintAsset(chain: Chain, asset: Address, owner: Address, amount: bigint) {
  const slot = balanceSlot(owner);
  storeStorage(chain.worldState, asset, slot, loadStorage(chain.worldState, asset, slot) + amount);
}

/** set an allowance without an approval, for genesis and tests */
export function setAllowance(chain: Chain, asset: Address, owner: Address, spender: Address, amount: bigint) {
  storeStorage(chain.worldState, asset, allowanceSlot(owner, spender), amount);
}
