export * from './Book';
export * from './Author';
export * from './BookStats';
export * from './Library';
