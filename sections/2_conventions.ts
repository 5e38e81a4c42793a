
// * """"""""""""""""""""""""""""""""""""""""""""""""""""""""" *
// *                                                           *
// *                     2. CONVENTIONS                        *
// *                                                           *
// * """"""""""""""""""""""""""""""""""""""""""""""""""""""""" *


import { keccak256 } from 'ethereum-cryptography/keccak';
import { concatBytes, utf8ToBytes } from 'ethereum-cryptography/utils';

import { address, bytesToBigint } from '../utils';


/** KEC */
export const KEC = keccak256;

/** KEC(a ‖ b ‖ ...) */
export function hashConcat(...items: Uint8Array[]) {
  return KEC(concatBytes(...items));
}


// * ---------------------------
// *  2.1. Widths.


export const WORD_SIZE = 32;
export const ADDRESS_SIZE = 20;

/** 2^256 */
export const UINT_256_BOUND = 2n ** 256n;

/** 2^256 - 1, a cap meaning "no cap" */
export const MAX_UINT_256 = UINT_256_BOUND - 1n;


// * ---------------------------
// *  2.2. Well-known identities.


/** stands for the ledger's base currency wherever an asset address is expected */
export const NATIVE_ASSET = address('0xeeeeeeeeeeeeeeeeeeeeeeeeeeeeeeeeeeeeeeee');

export const ZERO_ADDRESS = address(0n);


// * ---------------------------
// *  2.3. Success sentinel.


/** domain separator of the success sentinel slots */
export const SUCCESS_SENTINEL_NAMESPACE = KEC(utf8ToBytes('smart-account.settlement.success-sentinel'));

/** word a producer step writes once its operation succeeded */
export const SUCCESS_VALUE = 1n;

/** hash(namespace, opHash) */
export function successSentinelSlot(opHash: Uint8Array) {
  if (opHash.length !== 32) throw new Error(`Invalid opHash length: ${opHash.length}`);
  return bytesToBigint(hashConcat(SUCCESS_SENTINEL_NAMESPACE, opHash));
}
