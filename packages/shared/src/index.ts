export * from './constants';
export type * from './types/transaction';
export type * from './types/balance';
export type * from './types/settlement';
export type * from './types/game';
export type * from './types/errors';
