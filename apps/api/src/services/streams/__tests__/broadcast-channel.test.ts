import { describe, it, expect, jest } from '@jest/globals';
import { BroadcastChannel } from '../broadcast-channel.js';

describe('BroadcastChannel', () => {
  it('fans out to every subscriber until unsubscribed', () => {
    const channel = new BroadcastChannel<number>('test');
    const a = jest.fn();
    const b = jest.fn();
    const offA = channel.subscribe(a);
    channel.subscribe(b);

    channel.publish(1);
    offA();
    channel.publish(2);

    expect(a.mock.calls).toEqual([[1]]);
    expect(b.mock.calls).toEqual([[1], [2]]);
    expect(channel.size).toBe(1);
  });

  it('keeps delivering when a listener throws', () => {
    const errorSpy = jest.spyOn(console, 'error').mockImplementation(() => undefined);
    const channel = new BroadcastChannel<string>('test');
    const after = jest.fn();
    channel.subscribe(() => {
      throw new Error('boom');
    });
    channel.subscribe(after);

    channel.publish('x');

    expect(after).toHaveBeenCalledWith('x');
    expect(errorSpy).toHaveBeenCalledWith('[test] listener error:', expect.any(Error));
    errorSpy.mockRestore();
  });

  it('publishes with no subscribers', () => {
    expect(() => new BroadcastChannel<number>('empty').publish(1)).not.toThrow();
  });

  it('ignores publishes and subscribes after close', () => {
    const channel = new BroadcastChannel<number>('test');
    const listener = jest.fn();
    channel.subscribe(listener);
    channel.close();

    channel.publish(1);
    const off = channel.subscribe(listener);
    off();

    expect(listener).not.toHaveBeenCalled();
    expect(channel.isClosed).toBe(true);
    expect(channel.size).toBe(0);
  });
});
