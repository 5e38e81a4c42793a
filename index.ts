export * from './utils';
export { loadConfig, getConfig } from './config';
export type { EngineConfig } from './config';
export { makeLogger, getLogger } from './logger';
export type { ILogger } from './logger';

export * from './sections/2_conventions';
export * from './sections/3_world-state';
export * from './sections/4_transaction';
export * from './sections/5_execution-model';
export * from './sections/6_message-call';
export * from './sections/7_value-sampler';
export * from './sections/8_hydration';
export * from './sections/9_balance-injector';
// the guarded entry points of the executor module carry the settlement names
export { transferOut, isOpHashSuccessful } from './sections/10_settlement';
export type { RefundAndSweepResult } from './sections/10_settlement';
export * from './sections/11_invocation-guard';
export * from './sections/12_executor-module';

export * from './appendix/a_errors';
export * from './appendix/b_recursive-length-prefix';
export * from './appendix/c_call-data';
export * from './appendix/d_batch-codec';
export * from './appendix/e_fungible-asset';
export * from './appendix/f_events';
export { cost } from './appendix/g_fees';
