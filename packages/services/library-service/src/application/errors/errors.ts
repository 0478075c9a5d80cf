import { createDomainServiceError } from '@shelfwise/platform-core';

const StandardCodes = {
  VALIDATION_ERROR: 'VALIDATION_ERROR',
  NOT_FOUND: 'NOT_FOUND',
  UNAUTHORIZED: 'UNAUTHORIZED',
  FORBIDDEN: 'FORBIDDEN',
  CONFLICT: 'CONFLICT',
  SERVICE_UNAVAILABLE: 'SERVICE_UNAVAILABLE',
  INTERNAL_ERROR: 'INTERNAL_ERROR',
} as const;

const CatalogErrorBase = createDomainServiceError('Catalog', StandardCodes);

export class CatalogError extends CatalogErrorBase {
  static unknownAuthor(authorId: number) {
    return CatalogError.validationError('author', `Invalid pk "${authorId}" - object does not exist.`);
  }

  static unknownBooks(bookIds: number[]) {
    return CatalogError.invalidFields({
      books: bookIds.map(id => `Invalid pk "${id}" - object does not exist.`),
    });
  }

  static duplicateBook() {
    return CatalogError.conflict('A book with this title by this author already exists.', {
      non_field_errors: ['The fields title, author must make a unique set.'],
    });
  }
}

const AccountErrorBase = createDomainServiceError('Account', StandardCodes);

export class AccountError extends AccountErrorBase {
  static invalidCredentials() {
    return AccountError.unauthorized('Unable to log in with provided credentials.');
  }

  static usernameTaken() {
    return AccountError.conflict('A user with that username already exists.', {
      username: ['A user with that username already exists.'],
    });
  }
}

const SocialErrorBase = createDomainServiceError('Social', StandardCodes);

export class SocialError extends SocialErrorBase {}
