import type { Router } from 'express';
import { registerResourceRoutes, type ResourceHandler } from '@shelfwise/platform-core';
import type {
  Author,
  AuthorInput,
  AuthorQuery,
  Book,
  BookInput,
  BookQuery,
  Library,
  LibraryInput,
  LibraryQuery,
} from '@domains/catalog';
import type { CatalogController } from '../controllers/CatalogController';

interface CatalogRouteDeps {
  catalogController: CatalogController;
  books: ResourceHandler<Book, BookInput, BookInput, BookQuery>;
  authors: ResourceHandler<Author, AuthorInput, AuthorInput, AuthorQuery>;
  libraries: ResourceHandler<Library, LibraryInput, LibraryInput, LibraryQuery>;
}

export function registerCatalogRoutes(router: Router, deps: CatalogRouteDeps): void {
  const { catalogController, books, authors, libraries } = deps;

  // before /books/:id, which would otherwise claim "stats"
  router.get('/books/stats', (req, res) => catalogController.stats(req, res));

  registerResourceRoutes(router, '/books', books);
  registerResourceRoutes(router, '/authors', authors);
  registerResourceRoutes(router, '/libraries', libraries);
}
