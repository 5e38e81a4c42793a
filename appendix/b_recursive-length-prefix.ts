
// * """"""""""""""""""""""""""""""""""""""""""""""""""""""""" *
// *                                                           *
// *               B. RECURSIVE LENGTH PREFIX                  *
// *                                                           *
// * """"""""""""""""""""""""""""""""""""""""""""""""""""""""" *
// * Wire format of call batches and of the executor module's
// * entry point arguments.


import { concatBytes } from 'ethereum-cryptography/utils';

import { bytesToBigint } from '../utils';


/** T */
export type Input = List | ByteArray | bigint | boolean;

/** L */
export type List = Input[];

/** B */
export type ByteArray = Uint8Array;

/** what comes out of the decoder: integers and booleans are plain byte arrays */
export type Decoded = Uint8Array | Decoded[];

export class RlpError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'RlpError';
  }
}


// * ---------------------------
// *  B.1. Encoding.


/** RLP(x) */
export function rlp(x: Input): Uint8Array {
  if (typeof x === 'boolean') return encodeBytes(toBigEndian(x ? 1n : 0n));
  if (typeof x === 'bigint') return encodeBytes(toBigEndian(x));
  if (x instanceof Uint8Array) return encodeBytes(x);
  return encodeList(x);
}

/** Rb(x) */
export function encodeBytes(x: ByteArray): ByteArray {
  if (x.length === 1 && x[0] < 128) return x;
  if (x.length < 56) return concatBytes(new Uint8Array([ 128 + x.length ]), x);
  const length = toBigEndian(BigInt(x.length));
  return concatBytes(new Uint8Array([ 183 + length.length ]), length, x);
}

/** BE(x), the empty byte array for zero */
export function toBigEndian(x: bigint): Uint8Array {
  if (x < 0n) throw new RlpError(`Cannot encode negative integer: ${x}`);
  if (x === 0n) return new Uint8Array();

  let hex = x.toString(16);
  if (hex.length % 2 !== 0) hex = '0' + hex; // Ensure even length

  const numBytes = hex.length / 2;
  const byteArray = new Uint8Array(numBytes);

  for (let i = 0, j = 0; i < numBytes; i++, j += 2) {
    byteArray[i] = parseInt(hex.slice(j, j + 2), 16);
  }

  return byteArray;
}

/** Rl(x) */
export function encodeList(x: List) {
  const s = concatBytes(...x.map(item => rlp(item)));
  if (s.length < 56) return concatBytes(new Uint8Array([ 192 + s.length ]), s);
  const length = toBigEndian(BigInt(s.length));
  return concatBytes(new Uint8Array([ 247 + length.length ]), length, s);
}


// * ---------------------------
// *  B.2. Decoding.


/** RLP⁻¹(x), the whole input must be consumed by a single item */
export function rlpDecode(data: Uint8Array): Decoded {
  const { item, next } = decodeItem(data, 0);
  if (next !== data.length) throw new RlpError(`Trailing bytes after item: ${data.length - next}`);
  return item;
}

function decodeItem(data: Uint8Array, offset: number): { item: Decoded, next: number } {
  if (offset >= data.length) throw new RlpError(`Unexpected end of input at ${offset}`);
  const prefix = data[offset];

  if (prefix < 0x80) {
    return { item: data.slice(offset, offset + 1), next: offset + 1 };
  }

  if (prefix < 0xb8) {
    const length = prefix - 0x80;
    const start = offset + 1;
    const bytes = readRange(data, start, length);
    if (length === 1 && bytes[0] < 0x80) throw new RlpError(`Non canonical single byte at ${offset}`);
    return { item: bytes, next: start + length };
  }

  if (prefix < 0xc0) {
    const { length, start } = readLongLength(data, offset, prefix - 0xb7);
    return { item: readRange(data, start, length), next: start + length };
  }

  let length: number;
  let start: number;
  if (prefix < 0xf8) {
    length = prefix - 0xc0;
    start = offset + 1;
  } else {
    ({ length, start } = readLongLength(data, offset, prefix - 0xf7));
  }

  const end = start + length;
  if (end > data.length) throw new RlpError(`List overflows input: ${end} > ${data.length}`);

  const items: Decoded[] = [];
  let cursor = start;
  while (cursor < end) {
    const decoded = decodeItem(data.subarray(0, end), cursor);
    items.push(decoded.item);
    cursor = decoded.next;
  }
  return { item: items, next: end };
}

function readLongLength(data: Uint8Array, offset: number, lengthOfLength: number) {
  const lengthBytes = readRange(data, offset + 1, lengthOfLength);
  if (lengthBytes[0] === 0) throw new RlpError(`Leading zero in length at ${offset}`);
  const length = bytesToBigint(lengthBytes);
  if (length < 56n) throw new RlpError(`Non canonical long length at ${offset}`);
  if (length > BigInt(data.length)) throw new RlpError(`Length overflows input at ${offset}`);
  return { length: Number(length), start: offset + 1 + lengthOfLength };
}

function readRange(data: Uint8Array, start: number, length: number) {
  if (start + length > data.length) throw new RlpError(`Item overflows input: ${start + length} > ${data.length}`);
  return data.slice(start, start + length);
}


// * ---------------------------
// *  B.3. Decoded items.


export function asBytes(item: Decoded, what: string): Uint8Array {
  if (!(item instanceof Uint8Array)) throw new RlpError(`Expected bytes for ${what}`);
  return item;
}

export function asList(item: Decoded, what: string): Decoded[] {
  if (item instanceof Uint8Array) throw new RlpError(`Expected list for ${what}`);
  return item;
}

export function asBigint(item: Decoded, what: string): bigint {
  const bytes = asBytes(item, what);
  if (bytes.length > 32) throw new RlpError(`Integer wider than 32 bytes for ${what}`);
  if (bytes.length > 0 && bytes[0] === 0) throw new RlpError(`Leading zero in integer for ${what}`);
  return bytesToBigint(bytes);
}

export function asAddress(item: Decoded, what: string): Uint8Array {
  const bytes = asBytes(item, what);
  if (bytes.length !== 20) throw new RlpError(`Expected 20 bytes for ${what}, got ${bytes.length}`);
  return bytes;
}
