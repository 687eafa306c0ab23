import { describe, it, expect } from 'vitest';
import { Channel } from '../../src/operations/channel.js';

type Msg = { type: 'step'; n: number } | { type: 'end' };

function channel() {
  return new Channel<Msg>((message) => message.type === 'end');
}

describe('Channel', () => {
  it('should return undefined when nothing is pending', () => {
    expect(channel().poll()).toBeUndefined();
  });

  it('should deliver messages in send order', () => {
    const ch = channel();
    ch.send({ type: 'step', n: 1 });
    ch.send({ type: 'step', n: 2 });
    ch.send({ type: 'end' });

    expect(ch.drain()).toEqual([{ type: 'step', n: 1 }, { type: 'step', n: 2 }, { type: 'end' }]);
  });

  it('should discard sends after the terminal message', () => {
    const ch = channel();
    expect(ch.send({ type: 'end' })).toBe(true);
    expect(ch.send({ type: 'step', n: 3 })).toBe(false);
    expect(ch.send({ type: 'end' })).toBe(false);
    expect(ch.drain()).toEqual([{ type: 'end' }]);
  });

  it('should be closed once the terminal is sent and finished once it is polled', () => {
    const ch = channel();
    ch.send({ type: 'step', n: 1 });
    ch.send({ type: 'end' });

    expect(ch.closed).toBe(true);
    expect(ch.finished).toBe(false);
    ch.poll();
    expect(ch.finished).toBe(false);
    ch.poll();
    expect(ch.finished).toBe(true);
    expect(ch.poll()).toBeUndefined();
  });

  it('should report sends after drop as undelivered', () => {
    const ch = channel();
    ch.send({ type: 'step', n: 1 });
    ch.drop();

    expect(ch.send({ type: 'step', n: 2 })).toBe(false);
    expect(ch.send({ type: 'end' })).toBe(false);
    expect(ch.closed).toBe(true);
    expect(ch.poll()).toBeUndefined();
  });
});
