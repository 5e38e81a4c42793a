
// * """"""""""""""""""""""""""""""""""""""""""""""""""""""""" *
// *                                                           *
// *                 10. SETTLEMENT PRIMITIVES                 *
// *                                                           *
// * """"""""""""""""""""""""""""""""""""""""""""""""""""""""" *
// * Every primitive acts on the live balance of the current
// * storage owner, and no external call happens between reading
// * a balance and the transfer it sizes.


import { Address, addressKey, isSameAddress, min } from '../utils';

import { getLogger } from '../logger';
import { AssetTransferFailed, MalformedCallData, NativeTransferFailed, SuccessSentinelNotSet } from '../appendix/a_errors';
import { decodeUintResult, encodeCall } from '../appendix/c_call-data';
import { assetSignatures } from '../appendix/e_fungible-asset';
import { emit } from '../appendix/f_events';
import { MAX_UINT_256, NATIVE_ASSET, SUCCESS_VALUE, WORD_SIZE, successSentinelSlot } from './2_conventions';
import { AccountState, tload, tstore } from './5_execution-model';
import { call } from './6_message-call';
import { balanceOf } from './7_value-sampler';


const logger = getLogger('settlement');


// * ---------------------------
// *  10.1. Transfers.


/** move `amount` of `asset` from the storage owner to `recipient` */
export function transferOut(state: AccountState, asset: Address, recipient: Address, amount: bigint) {
  if (isSameAddress(asset, NATIVE_ASSET)) {
    const result = call(state, recipient, { data: new Uint8Array(), value: amount });
    if (!result.success) throw new NativeTransferFailed(recipient, amount);
  } else {
    const result = call(state, asset, { data: encodeCall(assetSignatures.transfer, [ recipient, amount ]) });
    if (!result.success) throw result.error;
    // assets that answer nothing are taken at their word
    if (decodeUintResult(result.output) === 0n) throw new AssetTransferFailed(asset, recipient, amount);
  }
  logger.debug({ asset: addressKey(asset), recipient: addressKey(recipient), amount: amount.toString() }, 'transferred');
}


// * ---------------------------
// *  10.2. Sweep.


/** move up to `cap` of the held `asset` to `recipient`, returns the amount moved */
export function sweep(state: AccountState, asset: Address, recipient: Address, cap = MAX_UINT_256) {
  const amount = min(balanceOf(state, asset, state.frame.self), cap);
  if (amount > 0n) transferOut(state, asset, recipient, amount);
  emit(state, { name: 'Sweep', asset, recipient, amount });
  return amount;
}


// * ---------------------------
// *  10.3. Refund and sweep.


export interface RefundAndSweepResult {
  actualRefund: bigint;
  remaining: bigint;
};

/** refund up to `refundCap` to `refundRecipient`, everything left to `sweepRecipient` */
export function refundAndSweep(state: AccountState, asset: Address, refundRecipient: Address, refundCap: bigint, sweepRecipient: Address): RefundAndSweepResult {
  const balance = balanceOf(state, asset, state.frame.self);
  const actualRefund = min(balance, refundCap);
  const remaining = balance - actualRefund;

  if (refundCap > balance) {
    emit(state, { name: 'ActualRefund', asset, recipient: refundRecipient, requested: refundCap, actual: actualRefund });
  }

  if (actualRefund > 0n) transferOut(state, asset, refundRecipient, actualRefund);
  emit(state, { name: 'Refund', asset, recipient: refundRecipient, amount: actualRefund });

  if (remaining > 0n) transferOut(state, asset, sweepRecipient, remaining);
  emit(state, { name: 'Sweep', asset, recipient: sweepRecipient, amount: remaining });

  emit(state, {
    name: 'RefundAndSweep',
    asset,
    refundRecipient,
    refundCap,
    sweepRecipient,
    actualRefund,
    remaining,
  });

  return { actualRefund, remaining };
}


// * ---------------------------
// *  10.4. Success sentinel.


/** producer side: mark `opHash` as succeeded for the rest of the transaction */
export function markOpHashSuccess(state: AccountState, opHash: Uint8Array) {
  tstore(state, sentinelSlot(opHash), SUCCESS_VALUE);
}

export function isOpHashSuccessful(state: AccountState, opHash: Uint8Array) {
  return tload(state, sentinelSlot(opHash)) === SUCCESS_VALUE;
}

function sentinelSlot(opHash: Uint8Array) {
  if (opHash.length !== WORD_SIZE) throw new MalformedCallData(`expected 32 bytes for opHash, got ${opHash.length}`);
  return successSentinelSlot(opHash);
}

/** sweep only when a previous step of the same transaction marked `opHash` as succeeded */
export function validateOpHashAndSweep(state: AccountState, opHash: Uint8Array, asset: Address, recipient: Address) {
  if (!isOpHashSuccessful(state, opHash)) throw new SuccessSentinelNotSet(opHash);
  return sweep(state, asset, recipient);
}
