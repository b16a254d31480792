/**
 * Unit tests for EventEmitter
 */
import { describe, it, expect, vi, beforeEach } from 'vitest';
import { EventEmitter } from '../../../lib/events/EventEmitter';

type TestEvents = {
  'page-added': [number];
  progress: [string, number];
  done: [];
};

describe('EventEmitter', () => {
  let emitter: EventEmitter<TestEvents>;

  beforeEach(() => {
    emitter = new EventEmitter<TestEvents>();
  });

  describe('on() / off()', () => {
    it('should register handlers once per function', () => {
      const handler = vi.fn();
      emitter.on('done', handler);
      emitter.on('done', handler);

      expect(emitter.listenerCount('done')).toBe(1);
    });

    it('should remove only the given handler', () => {
      const first = vi.fn();
      const second = vi.fn();
      emitter.on('done', first);
      emitter.on('done', second);
      emitter.off('done', first);

      emitter.emit('done');

      expect(first).not.toHaveBeenCalled();
      expect(second).toHaveBeenCalledTimes(1);
    });

    it('should ignore removing a handler that was never added', () => {
      expect(() => emitter.off('progress', vi.fn())).not.toThrow();
      expect(emitter.listenerCount('progress')).toBe(0);
    });
  });

  describe('emit()', () => {
    it('should pass the event arguments to every handler', () => {
      const received: string[] = [];
      emitter.on('progress', (label, count) => received.push(`${label}:${count}`));
      emitter.on('progress', (label) => received.push(label));

      emitter.emit('progress', 'spells', 3);

      expect(received).toEqual(['spells:3', 'spells']);
    });

    it('should keep calling handlers after one throws', () => {
      const consoleSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
      const failing = vi.fn(() => {
        throw new Error('Handler error');
      });
      const next = vi.fn();
      emitter.on('page-added', failing);
      emitter.on('page-added', next);

      emitter.emit('page-added', 2);

      expect(next).toHaveBeenCalledWith(2);
      expect(consoleSpy).toHaveBeenCalledWith('[EventEmitter] Error in handler for "page-added":', expect.any(Error));
    });

    it('should not throw when nothing listens', () => {
      expect(() => emitter.emit('done')).not.toThrow();
    });
  });

  describe('once()', () => {
    it('should call the handler for the first emit only', () => {
      const handler = vi.fn();
      emitter.once('page-added', handler);

      emitter.emit('page-added', 1);
      emitter.emit('page-added', 2);

      expect(handler).toHaveBeenCalledTimes(1);
      expect(handler).toHaveBeenCalledWith(1);
      expect(emitter.listenerCount('page-added')).toBe(0);
    });
  });

  describe('removeAllListeners()', () => {
    it('should clear one event or every event', () => {
      emitter.on('done', vi.fn());
      emitter.on('page-added', vi.fn());

      emitter.removeAllListeners('done');
      expect(emitter.listenerCount('done')).toBe(0);
      expect(emitter.listenerCount('page-added')).toBe(1);

      emitter.removeAllListeners();
      expect(emitter.listenerCount('page-added')).toBe(0);
    });
  });
});
