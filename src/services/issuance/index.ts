/**
 * Issuance Module
 *
 * The two-transaction issuance workflow, its state machine and its route.
 */

export { AssetIssuanceWorkflow } from './issuance.workflow';
export type { IssuanceResult, IssuanceSuccess, IssuanceFailure } from './issuance.workflow';
export {
  IssuanceState,
  FailureStage,
  isValidTransition,
  validateTransition,
  isTerminalState,
  getAllowedTransitions,
  stageForState,
} from './issuance.state';
export { issueAssetValidation, checkIssuanceInput, readAmount } from './issuance.validation';
export type { IssuanceInputCheck } from './issuance.validation';
export { IssuanceController } from './issuance.controller';
export { createIssuanceRouter } from './issuance.routes';
