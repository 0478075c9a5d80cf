export * from './catalog-schema';
export * from './account-schema';
export * from './social-schema';
