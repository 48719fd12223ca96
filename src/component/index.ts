/**
 * Component Module
 *
 * Process lifecycle around the epoch coordinator.
 */
export {
  SimulationComponent,
  createComponent,
  EMISSION_ERROR_DESCRIPTION,
} from './SimulationComponent';
export type {
  ComponentState,
  SimulationComponentEvents,
  SimulationComponentOptions,
} from './SimulationComponent';
export { BusOutputEmitter } from './BusOutputEmitter';
export {
  EPOCH_TOPIC,
  SIMSTATE_TOPIC,
  STATUS_READY_TOPIC,
  STATUS_ERROR_TOPIC,
  componentTopic,
} from './topics';
