/**
 * Orchestration Module
 *
 * The facade the HTTP layer talks to, and the account setup routes.
 */

export { OrchestrationFacade, createOrchestrationFacade } from './orchestration.facade';
export type {
  SetupSummary,
  IssuanceSummary,
  BootstrapSummary,
  LedgerProbe,
  OrchestrationDependencies,
  FacadeOverrides,
} from './orchestration.facade';
export { AccountsController } from './accounts.controller';
export { createAccountsRouters } from './accounts.routes';
export type { AccountsRouters } from './accounts.routes';
