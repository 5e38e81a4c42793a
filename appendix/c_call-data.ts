
// * """"""""""""""""""""""""""""""""""""""""""""""""""""""""" *
// *                                                           *
// *                       C. CALL DATA                        *
// *                                                           *
// * """"""""""""""""""""""""""""""""""""""""""""""""""""""""" *
// * Selector and fixed 32 bytes word layout used by programs
// * with static arguments only (fungible assets, recorders...).
// * Entry points with dynamic arguments take `selector ‖ RLP(args)`.


import { concatBytes, utf8ToBytes } from 'ethereum-cryptography/utils';

import { bigintToBytes, bytesToBigint } from '../utils';
import { KEC, UINT_256_BOUND, WORD_SIZE } from '../sections/2_conventions';


/** a static argument: addresses are left padded, integers are big endian */
export type Word = bigint | Uint8Array;

export const SELECTOR_SIZE = 4;

/** first 4 bytes of KEC(signature) */
export function selector(signature: string) {
  return KEC(utf8ToBytes(signature)).slice(0, SELECTOR_SIZE);
}

export function selectorOf(callData: Uint8Array) {
  return callData.slice(0, SELECTOR_SIZE);
}

export function toWord(value: Word): Uint8Array {
  if (typeof value === 'bigint') {
    if (value < 0n || value >= UINT_256_BOUND) throw new Error(`Value out of uint256 range: ${value}`);
    return bigintToBytes(value, WORD_SIZE);
  }
  if (value.length > WORD_SIZE) throw new Error(`Value wider than a word: ${value.length} bytes`);
  const word = new Uint8Array(WORD_SIZE);
  word.set(value, WORD_SIZE - value.length);
  return word;
}

/** selector(signature) ‖ word(arg0) ‖ word(arg1) ‖ ... */
export function encodeCall(signature: string, args: Word[] = []) {
  return concatBytes(selector(signature), ...args.map(toWord));
}

/** words after the selector, `null` when the data is too short */
export function readWord(callData: Uint8Array, index: number): bigint | null {
  const start = SELECTOR_SIZE + index * WORD_SIZE;
  if (start + WORD_SIZE > callData.length) return null;
  return bytesToBigint(callData.slice(start, start + WORD_SIZE));
}

/** `null` when the data is too short or the upper 12 bytes are dirty */
export function readAddressWord(callData: Uint8Array, index: number): Uint8Array | null {
  const word = readWord(callData, index);
  if (word === null || word >= 2n ** 160n) return null;
  return bigintToBytes(word, 20);
}

/** a return value made of a single word */
export function decodeUintResult(returnData: Uint8Array): bigint | null {
  if (returnData.length !== WORD_SIZE) return null;
  return bytesToBigint(returnData);
}
