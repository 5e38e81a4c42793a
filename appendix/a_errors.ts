
// * """"""""""""""""""""""""""""""""""""""""""""""""""""""""" *
// *                                                           *
// *                         A. ERRORS                         *
// *                                                           *
// * """"""""""""""""""""""""""""""""""""""""""""""""""""""""" *
// * Throwing an `ExecutionError` reverts the current frame.
// * Its return data is `selector(signature) ‖ RLP(args)`.


import { concatBytes, utf8ToBytes } from 'ethereum-cryptography/utils';

import { bytesToHexString } from '../utils';
import { rlp } from './b_recursive-length-prefix';
import { selector } from './c_call-data';


export type ErrorArg = bigint | Uint8Array | boolean;

export abstract class ExecutionError extends Error {
  abstract readonly signature: string;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }

  protected abstract args(): ErrorArg[];

  /** raw revert payload seen by the calling frame */
  get returnData(): Uint8Array {
    return concatBytes(selector(this.signature), rlp(this.args()));
  }
}


// * ---------------------------
// *  A.1. Format errors.


export class UnknownDataKind extends ExecutionError {
  readonly signature = 'UnknownDataKind(uint8)';
  constructor(readonly nibble: number) {
    super(`Unknown hydration data kind: 0x${nibble.toString(16)}`);
  }
  protected args() { return [ BigInt(this.nibble) ]; }
}

export class UnknownValueSource extends ExecutionError {
  readonly signature = 'UnknownValueSource(uint8)';
  constructor(readonly nibble: number) {
    super(`Unknown hydration value source: 0x${nibble.toString(16)}`);
  }
  protected args() { return [ BigInt(this.nibble) ]; }
}

export class OffsetOutOfBounds extends ExecutionError {
  readonly signature = 'OffsetOutOfBounds(uint256,uint256,uint256,uint256)';
  constructor(readonly callIndex: number, readonly offset: number, readonly width: number, readonly length: number) {
    super(`Write of ${width} bytes at offset ${offset} overflows input of call ${callIndex} (${length} bytes)`);
  }
  protected args() { return [ BigInt(this.callIndex), BigInt(this.offset), BigInt(this.width), BigInt(this.length) ]; }
}

export class TruncatedHydrationProgram extends ExecutionError {
  readonly signature = 'TruncatedHydrationProgram(uint256,uint256)';
  constructor(readonly position: number, readonly needed: number) {
    super(`Hydration program ends at ${position}, ${needed} more bytes expected`);
  }
  protected args() { return [ BigInt(this.position), BigInt(this.needed) ]; }
}

export class CallIndexOutOfBounds extends ExecutionError {
  readonly signature = 'CallIndexOutOfBounds(uint256,uint256)';
  constructor(readonly callIndex: number, readonly callCount: number) {
    super(`Call index ${callIndex} out of a batch of ${callCount} calls`);
  }
  protected args() { return [ BigInt(this.callIndex), BigInt(this.callCount) ]; }
}

export class PlaceholderMismatch extends ExecutionError {
  readonly signature = 'PlaceholderMismatch(uint256,bytes32,bytes32)';
  constructor(readonly offset: number, readonly placeholder: Uint8Array, readonly found: Uint8Array) {
    super(`Expected placeholder 0x${bytesToHexString(placeholder)} at offset ${offset}, found 0x${bytesToHexString(found)}`);
  }
  protected args() { return [ BigInt(this.offset), this.placeholder, this.found ]; }
}

export class AmountOffsetOutOfBounds extends ExecutionError {
  readonly signature = 'AmountOffsetOutOfBounds(uint256,uint256)';
  constructor(readonly offset: number, readonly length: number) {
    super(`Amount at offset ${offset} overflows input of ${length} bytes`);
  }
  protected args() { return [ BigInt(this.offset), BigInt(this.length) ]; }
}

export class MalformedBatch extends ExecutionError {
  readonly signature = 'MalformedBatch(string)';
  constructor(readonly reason: string) {
    super(`Malformed call batch: ${reason}`);
  }
  protected args() { return [ utf8ToBytes(this.reason) ]; }
}

export class MalformedCallData extends ExecutionError {
  readonly signature = 'MalformedCallData(string)';
  constructor(readonly reason: string) {
    super(`Malformed call data: ${reason}`);
  }
  protected args() { return [ utf8ToBytes(this.reason) ]; }
}

export class UnknownSelector extends ExecutionError {
  readonly signature = 'UnknownSelector(bytes4)';
  constructor(readonly selector: Uint8Array) {
    super(`Unknown selector: 0x${bytesToHexString(selector)}`);
  }
  protected args() { return [ this.selector ]; }
}


// * ---------------------------
// *  A.2. Precondition errors.


export class NoValueAvailable extends ExecutionError {
  readonly signature = 'NoValueAvailable(address)';
  constructor(readonly asset: Uint8Array) {
    super(`No balance of 0x${bytesToHexString(asset)} to inject`);
  }
  protected args() { return [ this.asset ]; }
}

export class SuccessSentinelNotSet extends ExecutionError {
  readonly signature = 'SuccessSentinelNotSet(bytes32)';
  constructor(readonly opHash: Uint8Array) {
    super(`Success sentinel not set for operation 0x${bytesToHexString(opHash)}`);
  }
  protected args() { return [ this.opHash ]; }
}

export class NotDelegateCall extends ExecutionError {
  readonly signature = 'NotDelegateCall()';
  constructor() {
    super('Only callable from a borrowed storage frame');
  }
  protected args() { return []; }
}

export class DelegateCallNotAllowed extends ExecutionError {
  readonly signature = 'DelegateCallNotAllowed(uint256)';
  constructor(readonly callIndex: number) {
    super(`Call ${callIndex} requests borrowed execution outside of a borrowed storage frame`);
  }
  protected args() { return [ BigInt(this.callIndex) ]; }
}

export class InsufficientBudget extends ExecutionError {
  readonly signature = 'InsufficientBudget(uint256,uint256,uint256)';
  constructor(readonly callIndex: number, readonly budgetCap: bigint, readonly available: bigint) {
    super(`Call ${callIndex} needs a budget of ${budgetCap}, only ${available} available`);
  }
  protected args() { return [ BigInt(this.callIndex), this.budgetCap, this.available ]; }
}


// * ---------------------------
// *  A.3. Sub-call errors.


export class TargetCallFailed extends ExecutionError {
  readonly signature = 'TargetCallFailed(bytes)';
  constructor(readonly payload: Uint8Array) {
    super(`Target call failed with 0x${bytesToHexString(payload)}`);
  }
  protected args() { return [ this.payload ]; }
}

export class AssetQueryFailed extends ExecutionError {
  readonly signature = 'AssetQueryFailed(address,bytes)';
  constructor(readonly asset: Uint8Array, readonly payload: Uint8Array) {
    super(`Balance query on 0x${bytesToHexString(asset)} failed`);
  }
  protected args() { return [ this.asset, this.payload ]; }
}


// * ---------------------------
// *  A.4. Asset transfer errors.


export class NativeTransferFailed extends ExecutionError {
  readonly signature = 'NativeTransferFailed(address,uint256)';
  constructor(readonly recipient: Uint8Array, readonly amount: bigint) {
    super(`Native transfer of ${amount} to 0x${bytesToHexString(recipient)} failed`);
  }
  protected args() { return [ this.recipient, this.amount ]; }
}

export class AssetTransferFailed extends ExecutionError {
  readonly signature = 'AssetTransferFailed(address,address,uint256)';
  constructor(readonly asset: Uint8Array, readonly recipient: Uint8Array, readonly amount: bigint) {
    super(`Transfer of ${amount} 0x${bytesToHexString(asset)} to 0x${bytesToHexString(recipient)} returned false`);
  }
  protected args() { return [ this.asset, this.recipient, this.amount ]; }
}

export class InsufficientBalance extends ExecutionError {
  readonly signature = 'InsufficientBalance(address,uint256,uint256)';
  constructor(readonly owner: Uint8Array, readonly balance: bigint, readonly needed: bigint) {
    super(`0x${bytesToHexString(owner)} holds ${balance}, ${needed} needed`);
  }
  protected args() { return [ this.owner, this.balance, this.needed ]; }
}

export class InsufficientAllowance extends ExecutionError {
  readonly signature = 'InsufficientAllowance(address,address,uint256,uint256)';
  constructor(readonly owner: Uint8Array, readonly spender: Uint8Array, readonly allowance: bigint, readonly needed: bigint) {
    super(`0x${bytesToHexString(spender)} may spend ${allowance} of 0x${bytesToHexString(owner)}, ${needed} needed`);
  }
  protected args() { return [ this.owner, this.spender, this.allowance, this.needed ]; }
}


// * ---------------------------
// *  A.5. Machine errors.


export class OutOfGas extends ExecutionError {
  readonly signature = 'OutOfGas(uint256,uint256)';
  constructor(readonly needed: bigint, readonly available: bigint) {
    super(`Out of gas: ${needed} needed, ${available} available`);
  }
  protected args() { return [ this.needed, this.available ]; }
}

export class StaticCallViolation extends ExecutionError {
  readonly signature = 'StaticCallViolation()';
  constructor() {
    super('State modification attempted in a static call');
  }
  protected args() { return []; }
}

export class CallDepthExceeded extends ExecutionError {
  readonly signature = 'CallDepthExceeded(uint256)';
  constructor(readonly depth: number) {
    super(`Call depth ${depth} exceeded`);
  }
  protected args() { return [ BigInt(this.depth) ]; }
}

/** revert with an arbitrary payload */
export class Revert extends ExecutionError {
  readonly signature = 'Revert(bytes)';
  constructor(readonly payload: Uint8Array) {
    super(`Reverted with 0x${bytesToHexString(payload)}`);
  }
  protected args() { return [ this.payload ]; }

  override get returnData() {
    return this.payload;
  }
}
