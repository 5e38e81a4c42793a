import { Address, address } from '../utils';

import { Revert } from '../appendix/a_errors';
import { Chain } from '../sections/3_world-state';
import { Transaction } from '../sections/4_transaction';
import { AccountState, Program } from '../sections/5_execution-model';


export const ALICE = address('0xa11ce');
export const BOB = address('0xb0b');
export const CAROL = address('0xca201');
export const ACCOUNT = address('0xacc0');
export const MODULE = address('0x0d01e');
export const RECORDER = address('0x5ec0');
export const REJECTER = address('0x0e7ec7');
export const ASSET = address('0xa55e7');
export const WRITER = address('0x7e17e');
export const DRIVER = address('0xd1e');


export interface TestFrame {
  self: Address;
  codeAddress?: Address;
  caller?: Address;
  origin?: Address;
  value?: bigint;
  gas?: bigint;
  canModifyState?: boolean;
};

/** a frame at depth 0 working directly on the chain's committed state */
export function testState(chain: Chain, frame: TestFrame): AccountState {
  const caller = frame.caller ?? ALICE;
  const origin = frame.origin ?? caller;
  const transaction: Transaction = {
    chain,
    worldState: chain.worldState,
    transientStorage: {},
    logs: [],
    origin,
  };
  return {
    transaction,
    frame: {
      self: frame.self,
      codeAddress: frame.codeAddress ?? frame.self,
      caller,
      origin,
      value: frame.value ?? 0n,
      callData: new Uint8Array(),
      depth: 0,
      canModifyState: frame.canModifyState ?? true,
      gas: { available: frame.gas ?? 10_000_000n },
    },
  };
}


export interface SeenCall {
  self: Address;
  codeAddress: Address;
  caller: Address;
  value: bigint;
  callData: Uint8Array;
  gas: bigint;
};

/** echoes its call data back, remembering every frame it ran in */
export function recorder() {
  const seen: SeenCall[] = [];
  const program: Program = state => {
    const { frame } = state;
    seen.push({
      self: frame.self,
      codeAddress: frame.codeAddress,
      caller: frame.caller,
      value: frame.value,
      callData: frame.callData.slice(),
      gas: frame.gas.available,
    });
    return frame.callData.slice();
  };
  return { program, seen };
}

export function rejecter(payload: Uint8Array): Program {
  return () => {
    throw new Revert(payload);
  };
}
