export { GetBookStatsUseCase } from './GetBookStatsUseCase';
