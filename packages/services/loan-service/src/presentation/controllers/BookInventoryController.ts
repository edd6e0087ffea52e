import type { Request, Response } from 'express';
import { AdjustBookCopiesRequestSchema, BookIdParamsSchema } from '@biblioteca/shared-contracts';
import type { AdjustBookCopiesUseCase } from '../../application/use-cases/loans';
import { actorFrom, handleRequest } from '../utils/response-helpers';

export class BookInventoryController {
  constructor(private readonly adjustBookCopies: AdjustBookCopiesUseCase) {}

  async adjustTotalCopies(req: Request, res: Response): Promise<void> {
    await handleRequest({
      req,
      res,
      errorMessage: 'Failed to adjust book copies',
      handler: async () => {
        const { bookId } = BookIdParamsSchema.parse(req.params);
        const { totalCopies } = AdjustBookCopiesRequestSchema.parse(req.body);
        return this.adjustBookCopies.execute({ actor: actorFrom(req), bookId, totalCopies });
      },
    });
  }
}
