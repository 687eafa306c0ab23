/**
 * Single-producer / single-consumer result channel.
 *
 * The producing worker never blocks: sends after the receiver was dropped,
 * or after the terminal message, are discarded and reported as `false`.
 * The consumer polls without blocking; once the terminal message has been
 * polled the channel is exhausted and every later poll yields `undefined`.
 */
export class Channel<M> {
  private queue: M[] = [];
  private terminalSent = false;
  private terminalPolled = false;
  private dropped = false;
  private isTerminal: (message: M) => boolean;

  constructor(isTerminal: (message: M) => boolean) {
    this.isTerminal = isTerminal;
  }

  // ---------------------------------------------------------------------------
  // Sender side
  // ---------------------------------------------------------------------------

  send(message: M): boolean {
    if (this.terminalSent) {
      return false;
    }
    if (this.isTerminal(message)) {
      this.terminalSent = true;
    }
    if (this.dropped) {
      return false;
    }
    this.queue.push(message);
    return true;
  }

  /**
   * True once a terminal message has been sent (delivered or not).
   */
  get closed(): boolean {
    return this.terminalSent;
  }

  // ---------------------------------------------------------------------------
  // Receiver side
  // ---------------------------------------------------------------------------

  poll(): M | undefined {
    const message = this.queue.shift();
    if (message !== undefined && this.isTerminal(message)) {
      this.terminalPolled = true;
    }
    return message;
  }

  drain(): M[] {
    const messages: M[] = [];
    let message = this.poll();
    while (message !== undefined) {
      messages.push(message);
      message = this.poll();
    }
    return messages;
  }

  /**
   * True once the terminal message has been consumed.
   */
  get finished(): boolean {
    return this.terminalPolled;
  }

  /**
   * Stop receiving. Queued messages are discarded; the worker keeps running
   * and its later sends go nowhere.
   */
  drop(): void {
    this.dropped = true;
    this.queue = [];
  }

  get isDropped(): boolean {
    return this.dropped;
  }
}
