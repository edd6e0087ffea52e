export { CreateLoanUseCase, type CreateLoanRequest } from './CreateLoanUseCase';
export { ReturnLoanUseCase, type ReturnLoanRequest } from './ReturnLoanUseCase';
export { GetLoanStatusUseCase, type GetLoanStatusRequest } from './GetLoanStatusUseCase';
export { GetUserLoanStatsUseCase, type GetUserLoanStatsRequest } from './GetUserLoanStatsUseCase';
export { ListLoansUseCase, type ListLoansRequest } from './ListLoansUseCase';
export { ListOverdueLoansUseCase, type ListOverdueLoansRequest } from './ListOverdueLoansUseCase';
export { AdjustBookCopiesUseCase, type AdjustBookCopiesRequest } from './AdjustBookCopiesUseCase';
