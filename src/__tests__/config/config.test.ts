import { describe, it, expect } from 'vitest';
import {
  ConfigValidationError,
  loadComponentConfig,
  parseComponentList,
} from '../../config';

const REQUIRED = {
  SIMULATION_ID: 'sim-1',
  SIMULATION_COMPONENT_NAME: 'node-c',
};

function loadError(env: Record<string, string | undefined>): ConfigValidationError {
  try {
    loadComponentConfig(env);
  } catch (error) {
    if (error instanceof ConfigValidationError) {
      return error;
    }
    throw error;
  }
  throw new Error('Expected configuration to be rejected');
}

describe('Config Module', () => {
  describe('loadComponentConfig', () => {
    it('should apply defaults', () => {
      expect(loadComponentConfig(REQUIRED)).toEqual({
        simulationId: 'sim-1',
        componentName: 'node-c',
        baseValue: 1,
        mode: '',
        inputComponents: [],
        outputDelay: 0,
        topicBase: 'SimpleTopic',
        fold: 'multiplicative',
      });
    });

    it('should parse every variable', () => {
      const config = loadComponentConfig({
        ...REQUIRED,
        COMPLEX_VALUE: '2.5',
        COMPLEX_STRING: 'Correct',
        INPUT_COMPONENTS: 'P1,,P2,',
        OUTPUT_DELAY: '0.25',
        SIMPLE_TOPIC: 'Results',
        FOLD_OPERATOR: 'additive',
      });

      expect(config).toEqual({
        simulationId: 'sim-1',
        componentName: 'node-c',
        baseValue: 2.5,
        mode: 'Correct',
        inputComponents: ['P1', 'P2'],
        outputDelay: 0.25,
        topicBase: 'Results',
        fold: 'additive',
      });
    });

    it('should treat empty variables as unset', () => {
      const config = loadComponentConfig({
        ...REQUIRED,
        COMPLEX_VALUE: '',
        OUTPUT_DELAY: '',
        SIMPLE_TOPIC: '',
        FOLD_OPERATOR: '',
      });

      expect(config.baseValue).toBe(1);
      expect(config.outputDelay).toBe(0);
      expect(config.topicBase).toBe('SimpleTopic');
      expect(config.fold).toBe('multiplicative');
    });

    it('should freeze the result', () => {
      const config = loadComponentConfig({ ...REQUIRED, INPUT_COMPONENTS: 'P1' });

      expect(Object.isFrozen(config)).toBe(true);
      expect(Object.isFrozen(config.inputComponents)).toBe(true);
    });

    it('should reject a missing simulation id', () => {
      const error = loadError({ SIMULATION_COMPONENT_NAME: 'node-c' });

      expect(error.field).toBe('SIMULATION_ID');
      expect(error.value).toBeUndefined();
      expect(error.message).toBe('Invalid configuration for SIMULATION_ID: Required');
    });

    it('should reject a non-numeric base value', () => {
      const error = loadError({ ...REQUIRED, COMPLEX_VALUE: 'abc' });

      expect(error.field).toBe('COMPLEX_VALUE');
      expect(error.value).toBe('abc');
    });

    it('should reject a negative output delay', () => {
      const error = loadError({ ...REQUIRED, OUTPUT_DELAY: '-1' });

      expect(error.field).toBe('OUTPUT_DELAY');
      expect(error.value).toBe('-1');
    });

    it('should reject an unknown fold operator', () => {
      expect(loadError({ ...REQUIRED, FOLD_OPERATOR: 'max' }).field).toBe('FOLD_OPERATOR');
    });
  });

  describe('parseComponentList', () => {
    it('should trim names and drop empty entries', () => {
      expect(parseComponentList(' P1 , P2 ,')).toEqual(['P1', 'P2']);
      expect(parseComponentList('')).toEqual([]);
    });
  });
});
