
// * """"""""""""""""""""""""""""""""""""""""""""""""""""""""" *
// *                                                           *
// *                 11. INVOCATION-MODE GUARD                 *
// *                                                           *
// * """"""""""""""""""""""""""""""""""""""""""""""""""""""""" *
// * A frame is borrowed when the module's code runs against some
// * other account's storage. The module's own address is fixed
// * when the module is created and compared against `self`.


import { Address, isSameAddress } from '../utils';

import { DelegateCallNotAllowed, NotDelegateCall } from '../appendix/a_errors';
import { CallDescriptor } from '../appendix/d_batch-codec';
import { ExecutionFrame } from './5_execution-model';


export function isBorrowedFrame(frame: ExecutionFrame, moduleAddress: Address) {
  return !isSameAddress(frame.self, moduleAddress);
}

/** context check: the caller must be running the module against its own storage */
export function onlyBorrowedFrame(frame: ExecutionFrame, moduleAddress: Address) {
  if (!isBorrowedFrame(frame, moduleAddress)) throw new NotDelegateCall();
}

/**
 * Nested delegation gate: outside of a borrowed frame, a batch may not run
 * code of its choosing against the module's own storage. Checked over the
 * whole batch before hydration, fallback-only calls included.
 */
export function assertDelegationAllowed(frame: ExecutionFrame, moduleAddress: Address, calls: CallDescriptor[]) {
  if (isBorrowedFrame(frame, moduleAddress)) return;
  const index = calls.findIndex(descriptor => descriptor.contextPreserving);
  if (index !== -1) throw new DelegateCallNotAllowed(index);
}
