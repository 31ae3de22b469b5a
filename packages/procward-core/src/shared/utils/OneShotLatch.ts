/**
 * Single-notification latch. Once signalled it stays signalled.
 */
export class OneShotLatch {
  private signalled = false;
  private release: () => void = () => undefined;
  private readonly released: Promise<void>;

  constructor() {
    this.released = new Promise<void>((resolve) => {
      this.release = resolve;
    });
  }

  signal(): void {
    if (this.signalled) {
      return;
    }
    this.signalled = true;
    this.release();
  }

  wait(): Promise<void> {
    return this.released;
  }

  isSignalled(): boolean {
    return this.signalled;
  }
}
