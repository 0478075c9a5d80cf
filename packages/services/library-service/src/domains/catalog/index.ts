export * from './entities';
export type { IBookRepository } from './repositories/IBookRepository';
export type { IAuthorRepository } from './repositories/IAuthorRepository';
export type { ILibraryRepository } from './repositories/ILibraryRepository';
