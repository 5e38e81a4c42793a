import { InsufficientBudget, MalformedBatch, Revert } from '../../appendix/a_errors';
import { asBigint, asList, rlp, rlpDecode } from '../../appendix/b_recursive-length-prefix';
import { ErrorPolicy, callDescriptor, decodeBatch, dispatch, encodeBatch } from '../../appendix/d_batch-codec';
import { createAccount, createChain, deployProgram, getBalance } from '../../sections/3_world-state';
import { ACCOUNT, ALICE, BOB, RECORDER, REJECTER, recorder, rejecter, testState } from '../fixtures';


describe('Batch codec', () => {
  test('round trip', () => {
    const calls = [
      callDescriptor(BOB, new Uint8Array([ 1, 2, 3 ]), { nativeAmount: 5n, budgetCap: 100_000n }),
      callDescriptor(RECORDER, new Uint8Array(), { contextPreserving: true, fallbackOnly: true, errorPolicy: ErrorPolicy.FALLTHROUGH }),
    ];
    expect(decodeBatch(encodeBatch(calls))).toEqual(calls);
  });

  test('flags pack the error policy above the two booleans', () => {
    const encoded = encodeBatch([ callDescriptor(BOB, new Uint8Array(), { contextPreserving: true, errorPolicy: ErrorPolicy.IGNORE }) ]);
    const [ fields ] = asList(rlpDecode(encoded), 'batch');
    expect(asBigint(asList(fields, 'call')[4], 'flags')).toEqual(9n);
  });

  test('reject malformed batches', () => {
    expect(() => decodeBatch(new Uint8Array([ 0xc2, 0x01 ]))).toThrow(MalformedBatch);
    expect(() => decodeBatch(rlp(new Uint8Array([ 1, 2 ])))).toThrow(MalformedBatch);
    expect(() => decodeBatch(rlp([ [ BOB, 0n, new Uint8Array(), 0n ] ]))).toThrow(new MalformedBatch('call 0 has 4 fields'));
    expect(() => decodeBatch(rlp([ [ BOB, 0n, new Uint8Array(), 0n, 16n ] ]))).toThrow(new MalformedBatch('call 0 has unknown error policy 4'));
    expect(() => decodeBatch(rlp([ [ new Uint8Array(19), 0n, new Uint8Array(), 0n, 0n ] ]))).toThrow(MalformedBatch);
  });

  test('empty batch', () => {
    expect(decodeBatch(encodeBatch([]))).toEqual([]);
  });
});


describe('Dispatch', () => {
  const payload = new Uint8Array([ 0xde, 0xad ]);

  function setup() {
    const chain = createChain();
    const recorded = recorder();
    deployProgram(chain, RECORDER, 'recorder', recorded.program);
    deployProgram(chain, REJECTER, 'rejecter', rejecter(payload));
    createAccount(chain, ACCOUNT, 1_000n);
    const state = testState(chain, { self: ACCOUNT, caller: ALICE });
    return { chain, state, seen: recorded.seen };
  }

  test('calls run in order and report their output', () => {
    const { state, seen } = setup();
    const results = dispatch(state, [
      callDescriptor(RECORDER, new Uint8Array([ 1 ])),
      callDescriptor(RECORDER, new Uint8Array([ 2 ])),
    ]);
    expect(results).toEqual([
      { index: 0, success: true, skipped: false, returnData: new Uint8Array([ 1 ]) },
      { index: 1, success: true, skipped: false, returnData: new Uint8Array([ 2 ]) },
    ]);
    expect(seen.map(call => call.callData[0])).toEqual([ 1, 2 ]);
    expect(seen[0].caller).toEqual(ACCOUNT);
  });

  test('revert policy propagates the callee error itself', () => {
    const { state } = setup();
    let thrown: unknown = null;
    try {
      dispatch(state, [ callDescriptor(REJECTER, new Uint8Array()) ]);
    } catch (e) {
      thrown = e;
    }
    expect(thrown).toBeInstanceOf(Revert);
    expect(thrown instanceof Revert && thrown.returnData).toEqual(payload);
  });

  test('abort policy stops the batch', () => {
    const { state, seen } = setup();
    const results = dispatch(state, [
      callDescriptor(REJECTER, new Uint8Array(), { errorPolicy: ErrorPolicy.ABORT }),
      callDescriptor(RECORDER, new Uint8Array()),
    ]);
    expect(results).toEqual([ { index: 0, success: false, skipped: false, returnData: payload } ]);
    expect(seen).toHaveLength(0);
  });

  test('ignore policy arms the next fallback call only', () => {
    const { state, seen } = setup();
    const results = dispatch(state, [
      callDescriptor(REJECTER, new Uint8Array(), { errorPolicy: ErrorPolicy.IGNORE }),
      callDescriptor(RECORDER, new Uint8Array([ 1 ]), { fallbackOnly: true }),
      callDescriptor(RECORDER, new Uint8Array([ 2 ]), { fallbackOnly: true }),
    ]);
    expect(results.map(result => [ result.success, result.skipped ])).toEqual([ [ false, false ], [ true, false ], [ false, true ] ]);
    expect(seen).toHaveLength(1);
  });

  test('fallback calls are skipped after a success', () => {
    const { state, seen } = setup();
    const results = dispatch(state, [
      callDescriptor(RECORDER, new Uint8Array([ 1 ])),
      callDescriptor(RECORDER, new Uint8Array([ 2 ]), { fallbackOnly: true }),
    ]);
    expect(results[1]).toEqual({ index: 1, success: false, skipped: true, returnData: new Uint8Array() });
    expect(seen).toHaveLength(1);
  });

  test('fallthrough policy continues without arming fallbacks', () => {
    const { state, seen } = setup();
    const results = dispatch(state, [
      callDescriptor(REJECTER, new Uint8Array(), { errorPolicy: ErrorPolicy.FALLTHROUGH }),
      callDescriptor(RECORDER, new Uint8Array([ 1 ]), { fallbackOnly: true }),
      callDescriptor(RECORDER, new Uint8Array([ 2 ])),
    ]);
    expect(results.map(result => [ result.success, result.skipped ])).toEqual([ [ false, false ], [ false, true ], [ true, false ] ]);
    expect(seen.map(call => call.callData[0])).toEqual([ 2 ]);
  });

  test('native amounts are sent with ordinary calls', () => {
    const { state, seen } = setup();
    dispatch(state, [ callDescriptor(RECORDER, new Uint8Array(), { nativeAmount: 400n }) ]);
    expect(seen[0].value).toEqual(400n);
    expect(getBalance(state.transaction.worldState, RECORDER)).toEqual(400n);
    expect(getBalance(state.transaction.worldState, ACCOUNT)).toEqual(600n);
  });

  test('context preserving calls run against the current storage owner', () => {
    const { state, seen } = setup();
    dispatch(state, [ callDescriptor(RECORDER, new Uint8Array(), { contextPreserving: true, nativeAmount: 400n }) ]);
    expect(seen[0].self).toEqual(ACCOUNT);
    expect(seen[0].codeAddress).toEqual(RECORDER);
    expect(seen[0].caller).toEqual(ALICE);
    expect(getBalance(state.transaction.worldState, ACCOUNT)).toEqual(1_000n);
  });

  test('budget cap is the gas forwarded to the call', () => {
    const { state, seen } = setup();
    dispatch(state, [ callDescriptor(RECORDER, new Uint8Array(), { budgetCap: 50_000n }) ]);
    // the callee has paid for its own call
    expect(seen[0].gas).toEqual(49_300n);
  });

  test('budget cap above the forwardable gas fails the batch', () => {
    const chain = createChain();
    const recorded = recorder();
    deployProgram(chain, RECORDER, 'recorder', recorded.program);
    const state = testState(chain, { self: ACCOUNT, gas: 10_000n });
    expect(() => dispatch(state, [ callDescriptor(RECORDER, new Uint8Array(), { budgetCap: 1_000_000n }) ]))
      .toThrow(new InsufficientBudget(0, 1_000_000n, 9_844n));
    expect(recorded.seen).toHaveLength(0);
  });
});
