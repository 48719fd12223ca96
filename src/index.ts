/**
 * Epoch Sync - Epoch-Synchronized Simulation Participant
 *
 * Waits for exactly one input per configured peer in each epoch, folds the
 * inputs into an aggregate, and emits a derived output once the epoch is
 * complete.
 *
 * @example
 * ```typescript
 * import { EpochCoordinator } from 'epoch-sync';
 *
 * const coordinator = new EpochCoordinator({
 *   peers: ['P1', 'P2'],
 *   baseValue: 2.0,
 *   mode: 'Correct',
 *   emitter: { emit: async (output) => console.log(output) },
 * });
 *
 * coordinator.onEpochStart(1);
 * coordinator.onPeerInput('P1', 1, 3.0, 'P1-1');
 * coordinator.onPeerInput('P2', 1, 4.0, 'P2-1');
 * // emits { epoch: 1, causalIds: ['P1-1', 'P2-1'], value: 24 }
 * ```
 *
 * @packageDocumentation
 */

// Core types
export * from './core';

// Utils
export * from './utils';

// Configuration
export * from './config';

// Epoch module
export * from './epoch';

// Messages module
export * from './messages';

// Transport module
export * from './transport';

// Component module
export * from './component';
