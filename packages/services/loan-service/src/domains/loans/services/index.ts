import { AuthorizationPolicy } from './AuthorizationPolicy';
import { EligibilityGuard } from './EligibilityGuard';
import { InventoryLedger } from './InventoryLedger';
import { LoanStateMachine } from './LoanStateMachine';
import { systemClock, type Clock } from './Clock';

export { AuthorizationPolicy, LOAN_ACTIONS, type LoanAction } from './AuthorizationPolicy';
export { EligibilityGuard, type EligibilityInput } from './EligibilityGuard';
export { InventoryLedger, assertInventoryBounds } from './InventoryLedger';
export { LoanStateMachine, canTransition, effectiveStatus, isOverdue } from './LoanStateMachine';
export { systemClock, type Clock } from './Clock';

/** Engine components shared by the loan use cases */
export interface LoanDomain {
  clock: Clock;
  ledger: InventoryLedger;
  stateMachine: LoanStateMachine;
  eligibility: EligibilityGuard;
  policy: AuthorizationPolicy;
}

export function createLoanDomain(clock: Clock = systemClock): LoanDomain {
  const ledger = new InventoryLedger();
  return {
    clock,
    ledger,
    stateMachine: new LoanStateMachine(ledger, clock),
    eligibility: new EligibilityGuard(),
    policy: new AuthorizationPolicy(),
  };
}
