
// * """"""""""""""""""""""""""""""""""""""""""""""""""""""""" *
// *                                                           *
// *                      3. WORLD STATE                       *
// *                                                           *
// * """"""""""""""""""""""""""""""""""""""""""""""""""""""""" *


import { Address, addressKey, bigintToHexString } from '../utils';

import type { Program } from './5_execution-model';


/** σ : `addressKey(address)` -> `account` */
export type WorldState = Record<string, Account>;

/** σ[a] */
export interface Account {
  /** σ[a]b */
  balance: bigint;
  /** σ[a]s : `bigintToHexString(slot)` -> word */
  storage: Record<string, bigint>;
  /** σ[a]c : name of the program run when the account is called, `null` for plain accounts */
  code: string | null;
  /** delegation designator: calling the account runs this account's code against its own storage */
  delegation: Address | null;
};

/** the ledger: committed world state plus the programs accounts may point to */
export interface Chain {
  worldState: WorldState;
  programs: Record<string, Program>;
};

export function createChain(): Chain {
  return { worldState: {}, programs: {} };
}

export function emptyAccount(): Account {
  return { balance: 0n, storage: {}, code: null, delegation: null };
}

/** σ[a], created empty on first touch */
export function getAccount(worldState: WorldState, account: Address): Account {
  const key = addressKey(account);
  let existing = worldState[key];
  if (existing === undefined) {
    existing = emptyAccount();
    worldState[key] = existing;
  }
  return existing;
}

/** σ[a]b, zero for unknown accounts */
export function getBalance(worldState: WorldState, account: Address) {
  return worldState[addressKey(account)]?.balance ?? 0n;
}

export function loadStorage(worldState: WorldState, account: Address, slot: bigint) {
  return worldState[addressKey(account)]?.storage[bigintToHexString(slot)] ?? 0n;
}

export function storeStorage(worldState: WorldState, account: Address, slot: bigint, value: bigint) {
  const storage = getAccount(worldState, account).storage;
  if (value === 0n) delete storage[bigintToHexString(slot)];
  else storage[bigintToHexString(slot)] = value;
}


// * ---------------------------
// *  3.1. Genesis helpers.


export function createAccount(chain: Chain, account: Address, balance = 0n) {
  getAccount(chain.worldState, account).balance += balance;
  return account;
}

/** install a program under `name` and point `account` at it */
export function deployProgram(chain: Chain, account: Address, name: string, program: Program) {
  const existing = chain.programs[name];
  if (existing !== undefined && existing !== program) throw new Error(`Program name already taken: ${name}`);
  chain.programs[name] = program;
  getAccount(chain.worldState, account).code = name;
  return account;
}

/** make `account` run the code of `implementation` against its own storage */
export function delegateAccount(chain: Chain, account: Address, implementation: Address | null) {
  getAccount(chain.worldState, account).delegation = implementation;
  return account;
}

/** code run when `account` is called: its own, or its delegate's */
export function resolveCode(chain: Chain, worldState: WorldState, account: Address): { codeAddress: Address, program: Program | null } {
  const target = worldState[addressKey(account)];
  const codeAddress = target?.delegation ?? account;
  const name = worldState[addressKey(codeAddress)]?.code ?? null;
  return { codeAddress, program: name === null ? null : chain.programs[name] ?? null };
}
