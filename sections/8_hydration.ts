
// * """"""""""""""""""""""""""""""""""""""""""""""""""""""""" *
// *                                                           *
// *                 8. HYDRATION INTERPRETER                  *
// *                                                           *
// * """"""""""""""""""""""""""""""""""""""""""""""""""""""""" *
// * Patches values sampled at execution time into an already
// * decoded call batch. Writes are fixed width and in place:
// * a buffer is never resized, so the bound check on every write
// * is all the memory safety there is to enforce.
// *
// * Program layout:
// *   byte 0                 initial call index
// *   0x00 ‖ index           move the cursor to call `index`
// *   (kind << 4 | source)   command, followed by its operands:
// *     [20 bytes]           explicit account, when source = EXPLICIT
// *     [20 bytes]           asset, for ASSET_BALANCE and ASSET_ALLOWANCE
// *     [source ‖ 20 bytes]  spender, for ASSET_ALLOWANCE
// *     [2 bytes]            big endian write offset, for buffer writing kinds


import { concatBytes } from 'ethereum-cryptography/utils';

import { Address, addressKey, bigintToBytes } from '../utils';

import { getLogger } from '../logger';
import {
  CallIndexOutOfBounds,
  OffsetOutOfBounds,
  TruncatedHydrationProgram,
  UnknownDataKind,
  UnknownValueSource,
} from '../appendix/a_errors';
import { toWord } from '../appendix/c_call-data';
import { CallDescriptor } from '../appendix/d_batch-codec';
import { cost } from '../appendix/g_fees';
import { ADDRESS_SIZE } from './2_conventions';
import { AccountState, consumeGas } from './5_execution-model';
import { AccountSource, ValueSource, assetAllowanceOf, assetBalanceOf, nativeBalanceOf, resolveAccount } from './7_value-sampler';


const logger = getLogger('hydration');


// * ---------------------------
// *  8.1. Commands.


export enum DataKind {
  ACCOUNT_ID = 0x1,
  NATIVE_BALANCE = 0x2,
  ASSET_BALANCE = 0x3,
  ASSET_ALLOWANCE = 0x4,
  CALL_TARGET = 0x5,
  CALL_VALUE = 0x6,
}

export type HydrationCommand =
  | { kind: DataKind.ACCOUNT_ID, from: AccountSource, offset: number }
  | { kind: DataKind.NATIVE_BALANCE, from: AccountSource, offset: number }
  | { kind: DataKind.ASSET_BALANCE, from: AccountSource, asset: Address, offset: number }
  | { kind: DataKind.ASSET_ALLOWANCE, from: AccountSource, asset: Address, spender: AccountSource, offset: number }
  | { kind: DataKind.CALL_TARGET, from: AccountSource }
  | { kind: DataKind.CALL_VALUE, from: AccountSource };

export interface CursorAdvance {
  kind: 'advance';
  callIndex: number;
};

export type HydrationEntry = CursorAdvance | HydrationCommand;

export interface HydrationProgram {
  initialCallIndex: number;
  entries: HydrationEntry[];
};

const CURSOR_ADVANCE_MARKER = 0x00;
const MAX_VALUE_SOURCE = ValueSource.EXPLICIT;
const MAX_DATA_KIND = DataKind.CALL_VALUE;
const OFFSET_SIZE = 2;


// * ---------------------------
// *  8.2. Decoding.


/** cursor over the program bytes, every read checks what is left first */
class ProgramReader {
  private position = 0;

  constructor(private readonly bytes: Uint8Array) {}

  get exhausted() {
    return this.position >= this.bytes.length;
  }

  private take(size: number) {
    const remaining = this.bytes.length - this.position;
    if (remaining < size) throw new TruncatedHydrationProgram(this.position, size - remaining);
    const slice = this.bytes.subarray(this.position, this.position + size);
    this.position += size;
    return slice;
  }

  readByte() {
    return this.take(1)[0];
  }

  readAddress(): Address {
    return this.take(ADDRESS_SIZE).slice();
  }

  readUint16() {
    const [ high, low ] = this.take(OFFSET_SIZE);
    return (high << 8) | low;
  }

  readSource(nibble: number): AccountSource {
    if (nibble > MAX_VALUE_SOURCE) throw new UnknownValueSource(nibble);
    if (nibble === ValueSource.EXPLICIT) return { source: ValueSource.EXPLICIT, account: this.readAddress() };
    if (nibble === ValueSource.CALLER) return { source: ValueSource.CALLER };
    if (nibble === ValueSource.ORIGIN) return { source: ValueSource.ORIGIN };
    return { source: ValueSource.SELF };
  }
}

export function decodeHydrationProgram(bytes: Uint8Array): HydrationProgram {
  const reader = new ProgramReader(bytes);
  if (reader.exhausted) return { initialCallIndex: 0, entries: [] };

  const initialCallIndex = reader.readByte();
  const entries: HydrationEntry[] = [];

  while (!reader.exhausted) {
    const opcode = reader.readByte();
    const kind = opcode >> 4;
    const sourceNibble = opcode & 0x0f;

    if (sourceNibble > MAX_VALUE_SOURCE) throw new UnknownValueSource(sourceNibble);

    if (opcode === CURSOR_ADVANCE_MARKER) {
      entries.push({ kind: 'advance', callIndex: reader.readByte() });
      continue;
    }

    if (kind === 0 || kind > MAX_DATA_KIND) throw new UnknownDataKind(kind);

    const from = reader.readSource(sourceNibble);

    switch (kind) {
      case DataKind.ACCOUNT_ID:
        entries.push({ kind: DataKind.ACCOUNT_ID, from, offset: reader.readUint16() });
        break;
      case DataKind.NATIVE_BALANCE:
        entries.push({ kind: DataKind.NATIVE_BALANCE, from, offset: reader.readUint16() });
        break;
      case DataKind.ASSET_BALANCE: {
        const asset = reader.readAddress();
        entries.push({ kind: DataKind.ASSET_BALANCE, from, asset, offset: reader.readUint16() });
        break;
      }
      case DataKind.ASSET_ALLOWANCE: {
        const asset = reader.readAddress();
        const spender = reader.readSource(reader.readByte());
        entries.push({ kind: DataKind.ASSET_ALLOWANCE, from, asset, spender, offset: reader.readUint16() });
        break;
      }
      case DataKind.CALL_TARGET:
        entries.push({ kind: DataKind.CALL_TARGET, from });
        break;
      case DataKind.CALL_VALUE:
        entries.push({ kind: DataKind.CALL_VALUE, from });
        break;
    }
  }

  return { initialCallIndex, entries };
}


// * ---------------------------
// *  8.3. Encoding.


function encodeSource(from: AccountSource) {
  return from.source === ValueSource.EXPLICIT ? from.account : new Uint8Array();
}

function encodeOffset(offset: number) {
  if (!Number.isInteger(offset) || offset < 0 || offset > 0xffff) throw new Error(`Invalid write offset: ${offset}`);
  return bigintToBytes(BigInt(offset), OFFSET_SIZE);
}

function encodeCallIndex(callIndex: number) {
  if (!Number.isInteger(callIndex) || callIndex < 0 || callIndex > 0xff) throw new Error(`Invalid call index: ${callIndex}`);
  return new Uint8Array([ callIndex ]);
}

export function encodeHydrationProgram(program: HydrationProgram) {
  const parts: Uint8Array[] = [ encodeCallIndex(program.initialCallIndex) ];

  for (const entry of program.entries) {
    if (entry.kind === 'advance') {
      parts.push(new Uint8Array([ CURSOR_ADVANCE_MARKER ]), encodeCallIndex(entry.callIndex));
      continue;
    }

    parts.push(new Uint8Array([ (entry.kind << 4) | entry.from.source ]), encodeSource(entry.from));

    if (entry.kind === DataKind.ASSET_BALANCE) {
      parts.push(entry.asset);
    } else if (entry.kind === DataKind.ASSET_ALLOWANCE) {
      parts.push(entry.asset, new Uint8Array([ entry.spender.source ]), encodeSource(entry.spender));
    }

    if (entry.kind !== DataKind.CALL_TARGET && entry.kind !== DataKind.CALL_VALUE) {
      parts.push(encodeOffset(entry.offset));
    }
  }

  return concatBytes(...parts);
}


// * ---------------------------
// *  8.4. Execution.


/**
 * Run every entry against `calls`, in program order, before any of them is
 * dispatched. Entries are resolved first and applied once the whole program
 * has resolved, so a failing entry leaves `calls` untouched.
 */
export function hydrate(state: AccountState, calls: CallDescriptor[], program: HydrationProgram) {
  const staged: (() => void)[] = [];
  let callIndex = program.initialCallIndex;

  for (const entry of program.entries) {
    consumeGas(state, cost.hydrationEntry);

    if (entry.kind === 'advance') {
      callIndex = entry.callIndex;
      continue;
    }

    if (callIndex >= calls.length) throw new CallIndexOutOfBounds(callIndex, calls.length);
    const index = callIndex;
    const descriptor = calls[index];
    const account = resolveAccount(state, entry.from);

    switch (entry.kind) {
      case DataKind.ACCOUNT_ID:
        staged.push(stageWrite(descriptor, index, entry.offset, account));
        break;
      case DataKind.NATIVE_BALANCE:
        staged.push(stageWrite(descriptor, index, entry.offset, toWord(nativeBalanceOf(state, account))));
        break;
      case DataKind.ASSET_BALANCE:
        staged.push(stageWrite(descriptor, index, entry.offset, toWord(assetBalanceOf(state, entry.asset, account))));
        break;
      case DataKind.ASSET_ALLOWANCE: {
        const spender = resolveAccount(state, entry.spender);
        staged.push(stageWrite(descriptor, index, entry.offset, toWord(assetAllowanceOf(state, entry.asset, account, spender))));
        break;
      }
      case DataKind.CALL_TARGET:
        staged.push(() => {
          descriptor.target = account;
          logger.debug({ callIndex: index, target: addressKey(account) }, 'call target hydrated');
        });
        break;
      case DataKind.CALL_VALUE: {
        const value = nativeBalanceOf(state, account);
        staged.push(() => {
          descriptor.nativeAmount = value;
          logger.debug({ callIndex: index, value: value.toString() }, 'call value hydrated');
        });
        break;
      }
    }
  }

  for (const apply of staged) apply();
  return calls;
}

/** bound check now, write later: buffers are never resized */
function stageWrite(descriptor: CallDescriptor, callIndex: number, offset: number, value: Uint8Array) {
  const length = descriptor.inputBuffer.length;
  if (offset + value.length > length) throw new OffsetOutOfBounds(callIndex, offset, value.length, length);
  return () => {
    descriptor.inputBuffer.set(value, offset);
    logger.debug({ callIndex, offset, width: value.length }, 'input hydrated');
  };
}
