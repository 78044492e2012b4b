// src/ts/communication/hostChannel.test.ts
import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { HostChannel, hostChannel } from './hostChannel.js';
import { reportModuleError, normalizeError } from './errorReporting.js';
import { createModuleLogger } from '../utils/moduleLogger.js';
import type { PayloadMap } from '../core/coreTypes.js';

const T0 = '2026-01-01T00:00:00.000Z';

describe('HostChannel', () => {
  let channel: HostChannel;

  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date(T0));
    channel = new HostChannel();
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.useRealTimers();
    vi.restoreAllMocks();
  });

  describe('session replacement', () => {
    it('delivers only to the most recently initialized handler', () => {
      const first = vi.fn();
      const second = vi.fn();

      channel.initialize('alpha', first);
      channel.initialize('beta', second);
      channel.send('state.changed', { step: 1 });
      channel.requestClose();

      expect(first).not.toHaveBeenCalled();
      expect(second).toHaveBeenCalledTimes(2);
      expect(second.mock.calls[0][1].moduleId).toBe('beta');
      expect(second.mock.calls[1][1].moduleId).toBe('beta');
    });

    it('does not warn when replacing a session', () => {
      channel.initialize('alpha', vi.fn());
      channel.initialize('beta', vi.fn());

      expect(console.warn).not.toHaveBeenCalled();
      expect(channel.moduleId).toBe('beta');
    });
  });

  describe('dispose', () => {
    it('turns every later send into a no-op, however often it is called', () => {
      const handler = vi.fn();
      channel.initialize('alpha', handler);

      channel.dispose();
      channel.dispose();
      channel.send('state.changed');
      channel.requestLogout();

      expect(handler).not.toHaveBeenCalled();
      expect(channel.droppedEventCount).toBe(2);
    });

    it('clears the observers', () => {
      channel.initialize('alpha', vi.fn());
      channel.dispose();

      expect(channel.isInitialized).toBe(false);
      expect(channel.moduleId).toBeNull();
      expect(channel.isStandalone).toBe(true);
    });
  });

  describe('event stamping', () => {
    it('adds moduleId and an ISO-8601 timestamp to every payload', () => {
      const handler = vi.fn();
      channel.initialize('wallet', handler);

      channel.send('custom.ping', { value: 42 });

      expect(handler).toHaveBeenCalledWith('custom.ping', {
        value: 42,
        moduleId: 'wallet',
        timestamp: T0,
      });
    });

    it('lets moduleId and timestamp win over same-named data keys', () => {
      const handler = vi.fn();
      channel.initialize('wallet', handler);

      channel.send('custom.ping', { moduleId: 'spoofed', timestamp: 'yesterday' });

      expect(handler).toHaveBeenCalledWith('custom.ping', { moduleId: 'wallet', timestamp: T0 });
    });

    it('keeps timestamps non-decreasing when the clock moves backwards', () => {
      const stamps: string[] = [];
      channel.initialize('wallet', (_type, payload) => {
        stamps.push(String(payload.timestamp));
      });

      channel.send('a');
      vi.setSystemTime(new Date('2026-01-01T00:00:05.000Z'));
      channel.send('b');
      vi.setSystemTime(new Date('2026-01-01T00:00:02.000Z'));
      channel.send('c');

      expect(stamps).toEqual([
        T0,
        '2026-01-01T00:00:05.000Z',
        '2026-01-01T00:00:05.000Z',
      ]);
      for (const stamp of stamps) {
        expect(Number.isNaN(Date.parse(stamp))).toBe(false);
      }
    });
  });

  describe('standalone and uninitialized use', () => {
    it('drops sends without a handler and reports standalone', () => {
      channel.initialize('payments');

      expect(() => channel.requestClose('user_action')).not.toThrow();
      expect(channel.isStandalone).toBe(true);
      expect(channel.isInitialized).toBe(true);
      expect(channel.droppedEventCount).toBe(1);
      expect(console.warn).toHaveBeenCalledWith(
        "⚠️ [payments] Dropped 'module.close_request': module is running standalone"
      );
    });

    it('drops sends before initialize with a bridge diagnostic', () => {
      channel.send('state.changed');

      expect(channel.isStandalone).toBe(true);
      expect(channel.droppedEventCount).toBe(1);
      expect(console.warn).toHaveBeenCalledWith(
        "⚠️ [module-bridge] Dropped 'state.changed': host channel not initialized"
      );
    });
  });

  describe('handler failures', () => {
    it('logs a throwing handler and returns normally', () => {
      const failure = new Error('host exploded');
      channel.initialize('wallet', () => {
        throw failure;
      });

      expect(() => channel.notifyStateChange({ balance: 10 })).not.toThrow();
      expect(console.error).toHaveBeenCalledWith(
        "❌ [wallet] Host handler failed while handling 'state.changed':",
        failure
      );
    });
  });

  describe('convenience emitters', () => {
    let calls: Array<[string, PayloadMap]>;

    beforeEach(() => {
      calls = [];
      channel.initialize('wallet', (type, payload) => {
        calls.push([type, payload]);
      });
    });

    it('requestNavigation sends route and params', () => {
      channel.requestNavigation('/history', { page: 2 });

      expect(calls).toEqual([
        ['navigation.request', { route: '/history', params: { page: 2 }, moduleId: 'wallet', timestamp: T0 }],
      ]);
    });

    it('requestClose and requestLogout default the reason to user_action', () => {
      channel.requestClose();
      channel.requestLogout();

      expect(calls[0]).toEqual(['module.close_request', { reason: 'user_action', moduleId: 'wallet', timestamp: T0 }]);
      expect(calls[1]).toEqual(['auth.logout_request', { reason: 'user_action', moduleId: 'wallet', timestamp: T0 }]);
    });

    it('reportError omits context and trace when not given', () => {
      channel.reportError('boom');
      channel.reportError('boom', 'module_build', 'at line 1');

      expect(calls[0][1]).toEqual({ error: 'boom', moduleId: 'wallet', timestamp: T0 });
      expect(calls[1][1]).toEqual({
        error: 'boom',
        context: 'module_build',
        stackTrace: 'at line 1',
        moduleId: 'wallet',
        timestamp: T0,
      });
    });

    it('requestData sends dataType and params', () => {
      channel.requestData('balance');

      expect(calls).toEqual([
        ['data.request', { dataType: 'balance', params: {}, moduleId: 'wallet', timestamp: T0 }],
      ]);
    });

    it('notifyStateChange and sendCustom pass data through', () => {
      channel.notifyStateChange({ tab: 'cards' });
      channel.sendCustom('wallet.card_added', { last4: '0000' });

      expect(calls[0]).toEqual(['state.changed', { tab: 'cards', moduleId: 'wallet', timestamp: T0 }]);
      expect(calls[1]).toEqual(['wallet.card_added', { last4: '0000', moduleId: 'wallet', timestamp: T0 }]);
    });
  });
});

describe('process-wide hostChannel', () => {
  afterEach(() => {
    hostChannel.dispose();
    vi.restoreAllMocks();
  });

  it('silently hands communication to the last module initialized', () => {
    const first = vi.fn();
    const second = vi.fn();

    hostChannel.initialize('first-module', first);
    hostChannel.initialize('second-module', second);
    hostChannel.requestClose();

    expect(first).not.toHaveBeenCalled();
    expect(second).toHaveBeenCalledTimes(1);
    expect(second.mock.calls[0][1].moduleId).toBe('second-module');
  });
});

describe('normalizeError', () => {
  it('uses message and stack of Error instances', () => {
    const error = new Error('bad state');
    expect(normalizeError(error)).toEqual({ message: 'bad state', trace: error.stack });
  });

  it('falls back to the error name for an empty message', () => {
    const error = new TypeError('');
    expect(normalizeError(error).message).toBe('TypeError');
  });

  it('keeps strings and serializes other values', () => {
    expect(normalizeError('plain')).toEqual({ message: 'plain' });
    expect(normalizeError({ code: 7 })).toEqual({ message: '{"code":7}' });
    expect(normalizeError(undefined)).toEqual({ message: 'undefined' });
  });
});

describe('reportModuleError', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('logs the error and forwards it as error.report', () => {
    vi.spyOn(console, 'error').mockImplementation(() => {});
    const channel = new HostChannel();
    const handler = vi.fn();
    channel.initialize('wallet', handler);
    const logger = createModuleLogger('wallet');

    const result = reportModuleError(channel, logger, 'card declined', 'checkout');

    expect(result).toEqual({ message: 'card declined' });
    expect(console.error).toHaveBeenCalledWith('❌ [wallet] Module error in checkout: card declined');
    expect(handler).toHaveBeenCalledWith(
      'error.report',
      expect.objectContaining({ error: 'card declined', context: 'checkout' })
    );
    expect(handler.mock.calls[0][1]).not.toHaveProperty('stackTrace');
  });
});
