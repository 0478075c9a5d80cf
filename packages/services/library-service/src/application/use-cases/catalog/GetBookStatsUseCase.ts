import type { IBookRepository } from '@domains/catalog';
import { toStatsWire, type BookStatsWire } from '@application/serializers';
import type { StoreGuard } from '../store-guard';

export class GetBookStatsUseCase {
  constructor(
    private readonly books: IBookRepository,
    private readonly guard: StoreGuard
  ) {}

  async execute(): Promise<BookStatsWire> {
    const stats = await this.guard('books.getStats', () => this.books.getStats());
    return toStatsWire(stats);
  }
}
