// largest delay setTimeout takes, longer ones fire after 1ms
export const MAX_TIMEOUT = 2 ** 31 - 1;

export class Timer {
  private timer: NodeJS.Timeout | null = null;

  constructor(fn: () => void, delay: number) {
    if (delay <= 0) {
      fn();
      return;
    }

    this.timer = setTimeout(fn, delay);
  }

  /**
   * Cancel the timer
   */
  public cancel(): void {
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
  }
}
