/**
 * Service Factory - Composition Root
 * Wires the loan store, the engine components and the controllers.
 */

import type { ILoanStore } from '../../domains/loans/repositories/ILoanStore';
import {
  createLoanDomain,
  systemClock,
  type AuthorizationPolicy,
  type Clock,
  type LoanDomain,
} from '../../domains/loans/services';
import {
  AdjustBookCopiesUseCase,
  CreateLoanUseCase,
  GetLoanStatusUseCase,
  GetUserLoanStatsUseCase,
  ListLoansUseCase,
  ListOverdueLoansUseCase,
  ReturnLoanUseCase,
} from '../../application/use-cases/loans';
import { LoanController } from '../../presentation/controllers/LoanController';
import { BookInventoryController } from '../../presentation/controllers/BookInventoryController';
import { getDatabase } from '../database/DatabaseConnectionFactory';
import { DrizzleLoanStore } from '../repositories/DrizzleLoanStore';
import { InMemoryLoanStore } from '../repositories/InMemoryLoanStore';
import { getLogger, type LoanStoreKind } from '../../config/service-config';

const logger = getLogger('service-factory');

export class ServiceFactory {
  private readonly domain: LoanDomain;

  constructor(
    private readonly store: ILoanStore,
    clock: Clock = systemClock
  ) {
    this.domain = createLoanDomain(clock);
  }

  static createStore(kind: LoanStoreKind): ILoanStore {
    logger.info('Creating loan store', { kind });
    return kind === 'memory' ? new InMemoryLoanStore() : new DrizzleLoanStore(getDatabase());
  }

  static forStore(kind: LoanStoreKind): ServiceFactory {
    return new ServiceFactory(ServiceFactory.createStore(kind));
  }

  getStore(): ILoanStore {
    return this.store;
  }

  getAuthorizationPolicy(): AuthorizationPolicy {
    return this.domain.policy;
  }

  createLoanController(): LoanController {
    return new LoanController({
      createLoan: new CreateLoanUseCase(this.store, this.domain),
      returnLoan: new ReturnLoanUseCase(this.store, this.domain),
      getLoanStatus: new GetLoanStatusUseCase(this.store, this.domain),
      getUserLoanStats: new GetUserLoanStatsUseCase(this.store, this.domain),
      listLoans: new ListLoansUseCase(this.store, this.domain),
      listOverdueLoans: new ListOverdueLoansUseCase(this.store, this.domain),
    });
  }

  createBookInventoryController(): BookInventoryController {
    return new BookInventoryController(new AdjustBookCopiesUseCase(this.store, this.domain));
  }
}
