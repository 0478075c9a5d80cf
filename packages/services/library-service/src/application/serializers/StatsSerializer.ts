import type { BookHighlight, BookStats } from '@domains/catalog';

export interface BookStatsWire {
  total_books: number;
  total_authors: number;
  latest: BookHighlight | null;
  oldest: BookHighlight | null;
  counts_by_decade: Array<{ decade: number; count: number }>;
}

export function toStatsWire(stats: BookStats): BookStatsWire {
  return {
    total_books: stats.totalBooks,
    total_authors: stats.totalAuthors,
    latest: stats.latest,
    oldest: stats.oldest,
    counts_by_decade: stats.countsByDecade.map(({ decade, count }) => ({ decade, count })),
  };
}
