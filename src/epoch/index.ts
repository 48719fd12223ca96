/**
 * Epoch Module
 *
 * Epoch synchronization state machine and the output value rule.
 */
export { EpochCoordinator } from './EpochCoordinator';
export type {
  EpochCoordinatorOptions,
  EpochCoordinatorEvents,
} from './EpochCoordinator';
export type { OutputEmitter } from './OutputEmitter';
export { EpochSequenceError, EpochEmissionError } from './errors';
export {
  FOLD_OPERATORS,
  DEFAULT_FOLD_OPERATOR,
  resolveFoldOperator,
  roundTo,
} from './fold';
export type { FoldOperator, FoldOperatorName } from './fold';
export { computeEpochOutput, RESCALE_MODE } from './output';
export type { OutputInputs } from './output';
