import { concatBytes } from 'ethereum-cryptography/utils';

import {
  DelegateCallNotAllowed,
  MalformedCallData,
  NotDelegateCall,
  OffsetOutOfBounds,
  SuccessSentinelNotSet,
  UnknownSelector,
} from '../../appendix/a_errors';
import { asBigint, asList, rlpDecode } from '../../appendix/b_recursive-length-prefix';
import { selector, toWord } from '../../appendix/c_call-data';
import { CallDescriptor, ErrorPolicy, callDescriptor, encodeBatch } from '../../appendix/d_batch-codec';
import { balanceSlot, createFungibleAsset, mintAsset, setAllowance } from '../../appendix/e_fungible-asset';
import { logsNamed } from '../../appendix/f_events';
import { NATIVE_ASSET, ZERO_ADDRESS } from '../../sections/2_conventions';
import { createAccount, createChain, delegateAccount, deployProgram, getBalance, loadStorage } from '../../sections/3_world-state';
import { executeTransaction } from '../../sections/4_transaction';
import { sstore } from '../../sections/5_execution-model';
import { call } from '../../sections/6_message-call';
import { fromSelf } from '../../sections/7_value-sampler';
import { DataKind, encodeHydrationProgram } from '../../sections/8_hydration';
import { createExecutorModule, decodeDispatchResults, executorCalls, executorSignatures } from '../../sections/12_executor-module';
import { ACCOUNT, ALICE, ASSET, BOB, CAROL, DRIVER, MODULE, RECORDER, REJECTER, WRITER, recorder, rejecter } from '../fixtures';


const USER = ALICE;
const payload = new Uint8Array([ 0xde, 0xad ]);
const placeholder = new Uint8Array(32).fill(0xee);
const noHydration = new Uint8Array();

function setup() {
  const chain = createChain();
  const recorded = recorder();
  deployProgram(chain, MODULE, 'executor', createExecutorModule(MODULE));
  deployProgram(chain, RECORDER, 'recorder', recorded.program);
  deployProgram(chain, REJECTER, 'rejecter', rejecter(payload));
  deployProgram(chain, ASSET, 'asset', createFungibleAsset());
  deployProgram(chain, WRITER, 'writer', state => {
    sstore(state, 1n, 42n);
    return new Uint8Array();
  });
  createAccount(chain, USER, 5_000n);
  createAccount(chain, ACCOUNT, 1_000n);
  delegateAccount(chain, ACCOUNT, MODULE);
  return { chain, seen: recorded.seen };
}

function execute(calls: CallDescriptor[], program: Uint8Array) {
  return executorCalls.hydrateAndExecute(encodeBatch(calls), program);
}


describe('Executor module: hydrate and execute', () => {
  test('own id and caller balance are hydrated before dispatch', () => {
    const { chain, seen } = setup();
    const untouched = new Uint8Array(64).fill(0xab);
    const data = execute(
      [ callDescriptor(RECORDER, new Uint8Array(96)), callDescriptor(RECORDER, untouched) ],
      new Uint8Array([ 0x00, 0x10, 0x00, 0x00, 0x21, 0x00, 0x20 ]),
    );

    const receipt = executeTransaction(chain, { from: USER, to: ACCOUNT, data });
    expect(receipt.success).toBe(true);

    expect(seen[0].callData.slice(0, 20)).toEqual(ACCOUNT);
    expect(seen[0].callData.slice(32, 64)).toEqual(toWord(5_000n));
    expect(seen[1].callData).toEqual(untouched);
    expect(seen[0].caller).toEqual(ACCOUNT);

    const results = decodeDispatchResults(receipt.output);
    expect(results).toEqual([
      { index: 0, success: true, skipped: false, returnData: seen[0].callData },
      { index: 1, success: true, skipped: false, returnData: untouched },
    ]);
  });

  test('balances are sampled before any call moves value', () => {
    const { chain, seen } = setup();
    const data = execute(
      [ callDescriptor(BOB, new Uint8Array(), { nativeAmount: 400n }), callDescriptor(RECORDER, new Uint8Array(32)) ],
      encodeHydrationProgram({ initialCallIndex: 1, entries: [ { kind: DataKind.NATIVE_BALANCE, from: fromSelf, offset: 0 } ] }),
    );

    const receipt = executeTransaction(chain, { from: USER, to: ACCOUNT, data });
    expect(receipt.success).toBe(true);
    expect(seen[0].callData).toEqual(toWord(1_000n));
    expect(getBalance(chain.worldState, ACCOUNT)).toEqual(600n);
    expect(getBalance(chain.worldState, BOB)).toEqual(400n);
  });

  test('an out of bounds write dispatches nothing', () => {
    const { chain, seen } = setup();
    const data = execute(
      [ callDescriptor(BOB, new Uint8Array(), { nativeAmount: 400n }), callDescriptor(RECORDER, new Uint8Array(64)) ],
      encodeHydrationProgram({
        initialCallIndex: 1,
        entries: [
          { kind: DataKind.ACCOUNT_ID, from: fromSelf, offset: 0 },
          { kind: DataKind.NATIVE_BALANCE, from: fromSelf, offset: 50 },
        ],
      }),
    );

    const receipt = executeTransaction(chain, { from: USER, to: ACCOUNT, data });
    expect(receipt.error).toBeInstanceOf(OffsetOutOfBounds);
    expect(receipt.output).toEqual(new OffsetOutOfBounds(1, 50, 32, 64).returnData);
    expect(seen).toHaveLength(0);
    expect(getBalance(chain.worldState, BOB)).toEqual(0n);
  });

  test('context preserving calls write the account storage', () => {
    const { chain } = setup();
    const data = execute([ callDescriptor(WRITER, new Uint8Array(), { contextPreserving: true }) ], noHydration);

    expect(executeTransaction(chain, { from: USER, to: ACCOUNT, data }).success).toBe(true);
    expect(loadStorage(chain.worldState, ACCOUNT, 1n)).toEqual(42n);
    expect(loadStorage(chain.worldState, WRITER, 1n)).toEqual(0n);
  });

  test('a failing call fails the whole operation with its own payload', () => {
    const { chain } = setup();
    const data = execute([
      callDescriptor(BOB, new Uint8Array(), { nativeAmount: 400n }),
      callDescriptor(REJECTER, new Uint8Array(), { errorPolicy: ErrorPolicy.REVERT }),
    ], noHydration);

    const receipt = executeTransaction(chain, { from: USER, to: ACCOUNT, data });
    expect(receipt.success).toBe(false);
    expect(receipt.output).toEqual(payload);
    expect(getBalance(chain.worldState, BOB)).toEqual(0n);
  });

  test('requires a borrowed frame', () => {
    const { chain, seen } = setup();
    const data = execute([ callDescriptor(RECORDER, new Uint8Array()) ], noHydration);
    const receipt = executeTransaction(chain, { from: USER, to: MODULE, data });
    expect(receipt.error).toBeInstanceOf(NotDelegateCall);
    expect(seen).toHaveLength(0);
  });
});


describe('Executor module: hydrate, execute and sweep', () => {
  test('router style, leftovers go back to the caller', () => {
    const { chain } = setup();
    const data = executorCalls.hydrateExecuteAndSweep(encodeBatch([]), noHydration, { sweepTarget: ZERO_ADDRESS, assets: [], sweepNative: true });

    const receipt = executeTransaction(chain, { from: USER, to: MODULE, value: 300n, data });
    expect(receipt.success).toBe(true);
    expect(decodeDispatchResults(receipt.output)).toEqual([]);
    expect(getBalance(chain.worldState, USER)).toEqual(5_000n);
    expect(getBalance(chain.worldState, MODULE)).toEqual(0n);
    expect(logsNamed(receipt.logs, 'Sweep')).toEqual([ { address: MODULE, name: 'Sweep', asset: NATIVE_ASSET, recipient: USER, amount: 300n } ]);
  });

  test('listed assets go to the sweep target', () => {
    const { chain } = setup();
    mintAsset(chain, ASSET, MODULE, 70n);
    const data = executorCalls.hydrateExecuteAndSweep(encodeBatch([]), noHydration, { sweepTarget: CAROL, assets: [ ASSET ], sweepNative: false });

    const receipt = executeTransaction(chain, { from: USER, to: MODULE, data });
    expect(receipt.success).toBe(true);
    expect(loadStorage(chain.worldState, ASSET, balanceSlot(CAROL))).toEqual(70n);
    expect(logsNamed(receipt.logs, 'Sweep')).toHaveLength(1);
  });

  test('cannot borrow the module own storage', () => {
    const { chain } = setup();
    const batch = encodeBatch([
      callDescriptor(RECORDER, new Uint8Array()),
      callDescriptor(WRITER, new Uint8Array(), { contextPreserving: true }),
    ]);
    const data = executorCalls.hydrateExecuteAndSweep(batch, noHydration, { sweepTarget: ZERO_ADDRESS, assets: [], sweepNative: false });

    const receipt = executeTransaction(chain, { from: USER, to: MODULE, data });
    expect(receipt.error).toBeInstanceOf(DelegateCallNotAllowed);
    expect(receipt.output).toEqual(new DelegateCallNotAllowed(1).returnData);
  });
});


describe('Executor module: injection', () => {
  const inputBuffer = concatBytes(new Uint8Array([ 1, 2, 3, 4 ]), placeholder);

  test('inject the account native balance', () => {
    const { chain, seen } = setup();
    const data = executorCalls.injectAndCall({ asset: NATIVE_ASSET, target: RECORDER, inputBuffer, offset: 4, placeholder });

    const receipt = executeTransaction(chain, { from: USER, to: ACCOUNT, data });
    expect(receipt.success).toBe(true);
    const [ amount, resultData ] = asList(rlpDecode(receipt.output), 'output');
    expect(asBigint(amount, 'amount')).toEqual(1_000n);
    expect(resultData).toEqual(concatBytes(new Uint8Array([ 1, 2, 3, 4 ]), toWord(1_000n)));
    expect(seen[0].value).toEqual(1_000n);
    expect(getBalance(chain.worldState, RECORDER)).toEqual(1_000n);
  });

  test('pull from the caller, then inject', () => {
    const { chain, seen } = setup();
    mintAsset(chain, ASSET, USER, 90n);
    setAllowance(chain, ASSET, USER, MODULE, 90n);
    const data = executorCalls.injectSweepAndCall({ asset: ASSET, target: RECORDER, inputBuffer, offset: 4, placeholder });

    const receipt = executeTransaction(chain, { from: USER, to: MODULE, data });
    expect(receipt.success).toBe(true);
    expect(seen[0].callData.slice(4)).toEqual(toWord(90n));
    expect(loadStorage(chain.worldState, ASSET, balanceSlot(MODULE))).toEqual(90n);
    expect(loadStorage(chain.worldState, ASSET, balanceSlot(USER))).toEqual(0n);
  });
});


describe('Executor module: settlement', () => {
  test('sweep called directly always fails', () => {
    const { chain } = setup();
    createAccount(chain, MODULE, 500n);
    const receipt = executeTransaction(chain, { from: USER, to: MODULE, data: executorCalls.sweep(NATIVE_ASSET, BOB) });
    expect(receipt.error).toBeInstanceOf(NotDelegateCall);
    expect(receipt.output).toEqual(new NotDelegateCall().returnData);
    expect(getBalance(chain.worldState, MODULE)).toEqual(500n);
  });

  test('sweep through the account', () => {
    const { chain } = setup();
    const receipt = executeTransaction(chain, { from: USER, to: ACCOUNT, data: executorCalls.sweep(NATIVE_ASSET, BOB) });
    expect(asBigint(rlpDecode(receipt.output), 'amount')).toEqual(1_000n);
    expect(getBalance(chain.worldState, BOB)).toEqual(1_000n);
    expect(logsNamed(receipt.logs, 'Sweep')).toEqual([ { address: ACCOUNT, name: 'Sweep', asset: NATIVE_ASSET, recipient: BOB, amount: 1_000n } ]);
  });

  test('refund and sweep through the account', () => {
    const { chain } = setup();
    const receipt = executeTransaction(chain, { from: USER, to: ACCOUNT, data: executorCalls.refundAndSweep(NATIVE_ASSET, CAROL, 300n, BOB) });
    const [ actualRefund, remaining ] = asList(rlpDecode(receipt.output), 'output');
    expect(asBigint(actualRefund, 'refund')).toEqual(300n);
    expect(asBigint(remaining, 'remaining')).toEqual(700n);
    expect(getBalance(chain.worldState, CAROL)).toEqual(300n);
    expect(getBalance(chain.worldState, BOB)).toEqual(700n);
  });

  test('a marked operation unlocks the sweep for the rest of the transaction only', () => {
    const { chain } = setup();
    const opHash = new Uint8Array(32).fill(0x42);
    deployProgram(chain, DRIVER, 'driver', state => {
      const marked = call(state, ACCOUNT, { data: executorCalls.markOpHashSuccess(opHash) });
      if (!marked.success) throw marked.error;
      const swept = call(state, ACCOUNT, { data: executorCalls.validateOpHashAndSweep(opHash, NATIVE_ASSET, BOB) });
      if (!swept.success) throw swept.error;
      return swept.output;
    });

    const unlocked = executeTransaction(chain, { from: USER, to: DRIVER });
    expect(unlocked.success).toBe(true);
    expect(getBalance(chain.worldState, BOB)).toEqual(1_000n);

    createAccount(chain, ACCOUNT, 10n);
    const locked = executeTransaction(chain, { from: USER, to: ACCOUNT, data: executorCalls.validateOpHashAndSweep(opHash, NATIVE_ASSET, BOB) });
    expect(locked.error).toBeInstanceOf(SuccessSentinelNotSet);
    expect(getBalance(chain.worldState, ACCOUNT)).toEqual(10n);
  });
});


describe('Executor module: call data', () => {
  test('missing selector', () => {
    const { chain } = setup();
    const receipt = executeTransaction(chain, { from: USER, to: ACCOUNT, data: new Uint8Array([ 1, 2 ]) });
    expect(receipt.error).toBeInstanceOf(MalformedCallData);
    expect(receipt.error?.message).toEqual('Malformed call data: missing selector');
  });

  test('unknown selector', () => {
    const { chain } = setup();
    const receipt = executeTransaction(chain, { from: USER, to: ACCOUNT, data: new Uint8Array(4) });
    expect(receipt.error).toBeInstanceOf(UnknownSelector);
  });

  test('bad arguments', () => {
    const { chain } = setup();
    const truncated = concatBytes(selector(executorSignatures.sweep), new Uint8Array([ 0xc1 ]));
    expect(executeTransaction(chain, { from: USER, to: ACCOUNT, data: truncated }).error).toBeInstanceOf(MalformedCallData);

    const missing = concatBytes(selector(executorSignatures.sweep), new Uint8Array([ 0xc0 ]));
    const receipt = executeTransaction(chain, { from: USER, to: ACCOUNT, data: missing });
    expect(receipt.error?.message).toEqual('Malformed call data: Expected 2 arguments, got 0');
  });
});
