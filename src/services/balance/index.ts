export { BalanceInspector, balanceOf } from './balance.inspector';
export type { BalanceResult } from './balance.inspector';
export { accountIdValidation } from './balance.validation';
export { BalanceController } from './balance.controller';
export { createBalanceRouters } from './balance.routes';
export type { BalanceRouters } from './balance.routes';
