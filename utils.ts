
import { equalsBytes } from 'ethereum-cryptography/utils';


/**
 * Stringify a bigint to a 0x hex string.
 * Used to serialize storage slots in order to use them as `Record` keys
 */
export function bigintToHexString(value: bigint) {
  return `0x${value.toString(16)}`;
}

export function bigintToBytes(value: bigint, byteSize: number): Uint8Array {
  const result = new Uint8Array(byteSize);
  for (let i = 0; i < byteSize; i++) {
    result[byteSize - i - 1] = Number((value >> BigInt(8 * i)) & BigInt(0xff));
  }
  return result;
}

export function bytesToBigint(value: Uint8Array): bigint {
  if (value.length === 0) return 0n;
  return BigInt(`0x${bytesToHexString(value)}`);
}

export function hexStringToBytes(value: string): Uint8Array {

  // hex string regex with optional prefix `0x`
  const isValid = /^(0x)?[0-9a-fA-F]*$/.test(value);
  if (!isValid) throw new Error(`Invalid hex string: ${value}`);

  let v = value;
  if (v.startsWith('0x')) v = v.slice(2);
  if (v.length % 2 !== 0) v = `0${v}`;

  const result = new Uint8Array(v.length / 2);
  for (let i = 0; i < v.length; i += 2) {
    result[i / 2] = parseInt(v.slice(i, i + 2), 16);
  }
  return result;
}

export function bytesToHexString(value: Uint8Array) {
  return [...value].map(x => x.toString(16).padStart(2, '0')).join('');
}


// * ---------------------------
// *  Addresses.


/** 20 bytes account id */
export type Address = Uint8Array;

export function address(value: string | bigint): Address {
  if (typeof value === 'bigint') return bigintToBytes(value, 20);
  const bytes = hexStringToBytes(value);
  if (bytes.length > 20) throw new Error(`Invalid address: ${value}`);
  return bigintToBytes(bytesToBigint(bytes), 20);
}

/** key of an account in the world state */
export function addressKey(account: Address) {
  return bytesToHexString(account);
}

export function isSameAddress(a: Address, b: Address) {
  return equalsBytes(a, b);
}

export function isZeroAddress(account: Address) {
  return account.every(byte => byte === 0);
}

/** min(a, b) */
export function min(a: bigint, b: bigint) {
  return a < b ? a : b;
}
