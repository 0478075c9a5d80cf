import type { Request, Response } from 'express';
import type { GetBookStatsUseCase } from '@application/use-cases';
import { ServiceErrors, sendSuccess } from '../utils/response-helpers';

export class CatalogController {
  constructor(private readonly getBookStats: GetBookStatsUseCase) {}

  async stats(_req: Request, res: Response): Promise<void> {
    try {
      const stats = await this.getBookStats.execute();
      sendSuccess(res, 'Book statistics retrieved successfully', 'stats', stats);
    } catch (error) {
      ServiceErrors.fromException(res, error, 'Failed to compute book statistics');
    }
  }
}
