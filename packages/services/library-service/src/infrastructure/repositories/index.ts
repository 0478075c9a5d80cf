export * from './memory/MemoryDatabase';
export * from './memory/MemoryCatalogRepositories';
export * from './memory/MemoryAccountRepositories';
export * from './memory/MemorySocialRepositories';
export * from './drizzle/DrizzleCatalogRepositories';
export * from './drizzle/DrizzleAccountRepositories';
export * from './drizzle/DrizzleSocialRepositories';
