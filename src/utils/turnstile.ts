/**
 * Lets numbered tickets through one at a time, in ticket order. A ticket
 * may `pass` without having waited (e.g. when its file failed early), which
 * still opens the way for the next one.
 */
export class Turnstile {
  private next = 0;
  private readonly passed = new Set<number>();
  private readonly waiting = new Map<number, () => void>();

  wait(ticket: number): Promise<void> {
    if (ticket <= this.next) {
      return Promise.resolve();
    }
    return new Promise((resolve) => {
      this.waiting.set(ticket, resolve);
    });
  }

  pass(ticket: number): void {
    this.passed.add(ticket);
    while (this.passed.has(this.next)) {
      this.passed.delete(this.next);
      this.next++;
    }
    const wake = this.waiting.get(this.next);
    if (wake) {
      this.waiting.delete(this.next);
      wake();
    }
  }
}
