export * from './accounts';
export * from './catalog';
export * from './social';
export { createStoreGuard, type StoreGuard } from './store-guard';
