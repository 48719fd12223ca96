import { describe, it, expect, beforeEach } from 'vitest';
import { MessageFactory } from '../../messages/MessageFactory';
import { MessageValidationError } from '../../messages/errors';
import { decodeMessage, encodeMessage } from '../../messages/codec';

const NOW = new Date('2026-01-01T00:00:00.000Z');

describe('Messages Module', () => {
  describe('MessageFactory', () => {
    let factory: MessageFactory;

    beforeEach(() => {
      factory = new MessageFactory('sim-1', 'node-a', () => NOW);
    });

    it('should create a complex message', () => {
      const message = factory.createComplexMessage({
        epoch: 2,
        triggeringMessageIds: ['manager-1'],
        value: 1.5,
      });

      expect(message).toEqual({
        Type: 'Complex',
        SimulationId: 'sim-1',
        SourceProcessId: 'node-a',
        MessageId: 'node-a-1',
        EpochNumber: 2,
        TriggeringMessageIds: ['manager-1'],
        Timestamp: '2026-01-01T00:00:00.000Z',
        ComplexValue: 1.5,
      });
    });

    it('should number message ids per source', () => {
      factory.createComplexMessage({ epoch: 1, triggeringMessageIds: [], value: 1 });
      const second = factory.createStatusMessage({
        epoch: 1,
        triggeringMessageIds: [],
        value: 'ready',
      });

      expect(second.MessageId).toBe('node-a-2');
      expect(factory.nextMessageId()).toBe('node-a-3');
    });

    it('should copy the triggering ids', () => {
      const ids = ['manager-1'];
      const message = factory.createComplexMessage({ epoch: 1, triggeringMessageIds: ids, value: 1 });

      ids.push('late');
      expect(message.TriggeringMessageIds).toEqual(['manager-1']);
    });

    it('should reject a non-finite complex value', () => {
      try {
        factory.createComplexMessage({ epoch: 1, triggeringMessageIds: [], value: Infinity });
        expect.unreachable();
      } catch (error) {
        expect(error).toBeInstanceOf(MessageValidationError);
        if (error instanceof MessageValidationError) {
          expect(error.messageType).toBe('Complex');
          expect(error.issues).toHaveLength(1);
          expect(error.issues[0].startsWith('ComplexValue: ')).toBe(true);
        }
      }
    });

    it('should reject a negative epoch number', () => {
      expect(() =>
        factory.createComplexMessage({ epoch: -1, triggeringMessageIds: [], value: 1 }),
      ).toThrow(MessageValidationError);
    });

    it('should only include a status description when given', () => {
      const ready = factory.createStatusMessage({
        epoch: 1,
        triggeringMessageIds: [],
        value: 'ready',
      });
      const failed = factory.createStatusMessage({
        epoch: 1,
        triggeringMessageIds: [],
        value: 'error',
        description: 'Internal error when creating complex message.',
      });

      expect('Description' in ready).toBe(false);
      expect(failed.Description).toBe('Internal error when creating complex message.');
    });

    it('should create epoch and simulation state messages', () => {
      const epoch = factory.createEpochMessage({
        epoch: 3,
        triggeringMessageIds: [],
        startTime: '2026-01-01T02:00:00.000Z',
        endTime: '2026-01-01T03:00:00.000Z',
      });
      const state = factory.createSimStateMessage({
        epoch: 0,
        triggeringMessageIds: [],
        state: 'stopped',
      });

      expect(epoch.Type).toBe('Epoch');
      expect(epoch.EpochNumber).toBe(3);
      expect(state.Type).toBe('SimState');
      expect(state.SimulationState).toBe('stopped');
    });
  });

  describe('codec', () => {
    const factory = new MessageFactory('sim-1', 'node-a', () => NOW);

    it('should decode what it encodes', () => {
      const message = factory.createComplexMessage({
        epoch: 4,
        triggeringMessageIds: ['x-1', 'y-2'],
        value: 0.125,
      });

      expect(decodeMessage(encodeMessage(message))).toEqual(message);
    });

    it('should decode string payloads', () => {
      const message = factory.createStatusMessage({
        epoch: 1,
        triggeringMessageIds: [],
        value: 'ready',
      });

      expect(decodeMessage(JSON.stringify(message))).toEqual(message);
    });

    it('should return null for invalid JSON', () => {
      expect(decodeMessage('{not json')).toBeNull();
    });

    it('should return null for unknown message types', () => {
      expect(decodeMessage(JSON.stringify({ Type: 'Unknown' }))).toBeNull();
    });

    it('should return null when a required attribute is missing', () => {
      const { ComplexValue: _dropped, ...partial } = factory.createComplexMessage({
        epoch: 1,
        triggeringMessageIds: [],
        value: 2,
      });

      expect(decodeMessage(JSON.stringify(partial))).toBeNull();
    });

    it('should return null for a non-numeric complex value', () => {
      const message = factory.createComplexMessage({
        epoch: 1,
        triggeringMessageIds: [],
        value: 2,
      });

      expect(decodeMessage(JSON.stringify({ ...message, ComplexValue: '2' }))).toBeNull();
    });
  });
});
