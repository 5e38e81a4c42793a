
// * """"""""""""""""""""""""""""""""""""""""""""""""""""""""" *
// *                                                           *
// *                     G. FEE SCHEDULE                       *
// *                                                           *
// * """"""""""""""""""""""""""""""""""""""""""""""""""""""""" *
// * Flat costs, enough to make computational budgets observable.
// * Not an accurate model of any network's gas schedule.


/** G */
export const cost = {
  /** Gcall : paid by every message call on entry */
  call: 700n,
  /** Gcallvalue : paid by the caller when value is transferred */
  callValue: 9_000n,
  /** Gsload */
  storageLoad: 2_100n,
  /** Gsset */
  storageStore: 5_000n,
  /** Gwarmaccess : transient storage reads and writes */
  transientAccess: 100n,
  /** Glog */
  log: 375n,
  /** paid per hydration entry */
  hydrationEntry: 3n,
} as const;
