export interface BookHighlight {
  title: string;
  year: number;
  author: string;
}

export interface DecadeCount {
  decade: number;
  count: number;
}

export interface BookStats {
  totalBooks: number;
  totalAuthors: number;
  latest: BookHighlight | null;
  oldest: BookHighlight | null;
  countsByDecade: DecadeCount[];
}
