import { AsyncChannel } from '../../src/utils/asyncChannel';
import { Turnstile } from '../../src/utils/turnstile';
import { withTimeout } from '../../src/utils/timeout';
import { TimeoutError } from '../../src/errors';

describe('AsyncChannel', () => {
  it('delivers buffered items before reporting done', async () => {
    const channel = new AsyncChannel<number>();
    channel.push(1);
    channel.push(2);
    channel.close();

    expect(await channel.take()).toEqual({ done: false, value: 1 });
    expect(await channel.take()).toEqual({ done: false, value: 2 });
    expect(await channel.take()).toEqual({ done: true, value: undefined });
  });

  it('wakes a waiting consumer', async () => {
    const channel = new AsyncChannel<string>();
    const pending = channel.take();
    channel.push('ready');
    await expect(pending).resolves.toEqual({ done: false, value: 'ready' });
  });

  it('surfaces failures after buffered items', async () => {
    const channel = new AsyncChannel<number>();
    channel.push(1);
    channel.fail(new Error('boom'));
    expect(await channel.take()).toEqual({ done: false, value: 1 });
    await expect(channel.take()).rejects.toThrow('boom');
  });

  it('refuses pushes after close', () => {
    const channel = new AsyncChannel<number>();
    channel.close();
    expect(() => channel.push(1)).toThrow('Cannot push to a closed channel');
  });
});

describe('Turnstile', () => {
  it('lets tickets through in order regardless of arrival', async () => {
    const turnstile = new Turnstile();
    const order: number[] = [];

    const second = turnstile.wait(2).then(() => {
      order.push(2);
      turnstile.pass(2);
    });
    const first = turnstile.wait(1).then(() => {
      order.push(1);
      turnstile.pass(1);
    });

    await turnstile.wait(0);
    order.push(0);
    turnstile.pass(0);

    await Promise.all([first, second]);
    expect(order).toEqual([0, 1, 2]);
  });

  it('opens for later tickets when an earlier one passes without waiting', async () => {
    const turnstile = new Turnstile();
    const later = turnstile.wait(1);
    turnstile.pass(0);
    await expect(later).resolves.toBeUndefined();
  });
});

describe('withTimeout', () => {
  it('resolves with the value when in time', async () => {
    await expect(withTimeout(Promise.resolve(5), 1000, 'fast')).resolves.toBe(5);
  });

  it('rejects with TimeoutError when too slow', async () => {
    const slow = new Promise<number>((resolve) => setTimeout(() => resolve(1), 200));
    await expect(withTimeout(slow, 10, 'slow op')).rejects.toBeInstanceOf(TimeoutError);
    await slow;
  });
});
