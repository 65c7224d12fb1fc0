export * from './domain/calculations/money';
export * from './domain/calculations/ledger';
export * from './domain/calculations/balance-validator';
export * from './domain/calculations/settlement-planner';
export * from './domain/validation/amount-validator';
export * from './domain/games/game-lifecycle';
export * from './domain/settlements/status-store';
export * from './domain/settlements/reconciler';
export * from './domain/settlements/settlement-session';
export * from './core/locks/keyed-lock';
export * from './core/storage/indexeddb';
export * from './api/pocketbase-client';
export { ENGINE_CONFIG } from './config';
