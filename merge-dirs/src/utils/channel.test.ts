import { describe, it, expect } from 'vitest';
import { Channel } from './channel.js';

async function drain<T>(channel: Channel<T>): Promise<T[]> {
  const received: T[] = [];
  for await (const value of channel) {
    received.push(value);
  }
  return received;
}

describe('Channel', () => {
  it('should deliver buffered values in send order', async () => {
    const channel = new Channel<number>();
    channel.send(1);
    channel.send(2);
    channel.close();

    expect(await drain(channel)).toEqual([1, 2]);
  });

  it('should wake a waiting consumer', async () => {
    const channel = new Channel<string>();
    const received = drain(channel);

    await Promise.resolve();
    channel.send('a');
    await Promise.resolve();
    channel.send('b');
    channel.close();

    expect(await received).toEqual(['a', 'b']);
  });

  it('should collect values from concurrent producers', async () => {
    const channel = new Channel<number>();
    const producers = [0, 1, 2].map(async offset => {
      for (let i = 0; i < 3; i++) {
        await new Promise(resolve => setTimeout(resolve, 1));
        channel.send(offset * 10 + i);
      }
    });
    const done = Promise.all(producers).finally(() => channel.close());

    const received = await drain(channel);
    await done;

    expect([...received].sort((a, b) => a - b)).toEqual([0, 1, 2, 10, 11, 12, 20, 21, 22]);
  });

  it('should end immediately when closed while empty', async () => {
    const channel = new Channel<number>();
    channel.close();

    expect(await drain(channel)).toEqual([]);
  });

  it('should reject sends after close', () => {
    const channel = new Channel<number>();
    channel.close();

    expect(() => channel.send(1)).toThrow('Cannot send on a closed channel');
  });
});
