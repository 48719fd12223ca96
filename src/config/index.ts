/**
 * Component Configuration
 *
 * Loaded once from environment variables at startup and frozen.
 */

import { z } from 'zod';
import type { OutputMode, PeerId } from '../core/types';
import { DEFAULT_FOLD_OPERATOR, type FoldOperatorName } from '../epoch/fold';
import { ConfigValidationError } from './errors';

export { ConfigValidationError } from './errors';

export interface ComponentConfig {
  simulationId: string;
  componentName: string;
  /** Rescaling multiplier, and the base of the standalone formula */
  baseValue: number;
  mode: OutputMode;
  inputComponents: readonly PeerId[];
  /** Seconds to wait between completing an epoch and emitting its output */
  outputDelay: number;
  topicBase: string;
  fold: FoldOperatorName;
}

export type Environment = Record<string, string | undefined>;

// Unset and empty variables both fall back to the default
const optional = <T extends z.ZodTypeAny>(schema: T) =>
  z.preprocess((value) => (value === '' ? undefined : value), schema);

const EnvironmentSchema = z.object({
  SIMULATION_ID: z.string().min(1, 'SIMULATION_ID is required'),
  SIMULATION_COMPONENT_NAME: z.string().min(1, 'SIMULATION_COMPONENT_NAME is required'),
  COMPLEX_VALUE: optional(z.coerce.number().finite().default(1.0)),
  COMPLEX_STRING: z.string().default(''),
  INPUT_COMPONENTS: z.string().default(''),
  OUTPUT_DELAY: optional(z.coerce.number().finite().nonnegative().default(0)),
  SIMPLE_TOPIC: optional(z.string().default('SimpleTopic')),
  FOLD_OPERATOR: optional(
    z.enum(['multiplicative', 'additive']).default(DEFAULT_FOLD_OPERATOR),
  ),
});

/**
 * Split a comma-separated component list, dropping empty names
 */
export function parseComponentList(value: string): PeerId[] {
  return value
    .split(',')
    .map((name) => name.trim())
    .filter((name) => name.length > 0);
}

export function loadComponentConfig(
  env: Environment = process.env,
): Readonly<ComponentConfig> {
  const result = EnvironmentSchema.safeParse(env);

  if (!result.success) {
    const issue = result.error.issues[0];
    const field = String(issue?.path[0] ?? 'environment');
    throw new ConfigValidationError(
      `Invalid configuration for ${field}: ${issue?.message ?? 'unknown error'}`,
      field,
      env[field],
    );
  }

  const parsed = result.data;
  return Object.freeze({
    simulationId: parsed.SIMULATION_ID,
    componentName: parsed.SIMULATION_COMPONENT_NAME,
    baseValue: parsed.COMPLEX_VALUE,
    mode: parsed.COMPLEX_STRING,
    inputComponents: Object.freeze(parseComponentList(parsed.INPUT_COMPONENTS)),
    outputDelay: parsed.OUTPUT_DELAY,
    topicBase: parsed.SIMPLE_TOPIC,
    fold: parsed.FOLD_OPERATOR,
  });
}
