/**
 * Progress Indicator
 *
 * Spinner on stderr while a command runs. Silent when stderr is not a
 * terminal, so piped output and tests see nothing.
 */

const SPINNER_FRAMES = ['⠋', '⠙', '⠹', '⠸', '⠼', '⠴', '⠦', '⠧', '⠇', '⠏'];

export class ProgressIndicator {
  private interval: NodeJS.Timeout | null = null;
  private frameIndex = 0;
  private message = '';
  private isActive = false;

  constructor(private readonly stream: NodeJS.WriteStream = process.stderr) {}

  private get enabled(): boolean {
    return this.stream.isTTY === true;
  }

  start(message: string): void {
    if (this.isActive) {
      this.stop();
    }

    this.message = message;
    if (!this.enabled) {
      return;
    }
    this.isActive = true;
    this.frameIndex = 0;
    this.update();

    this.interval = setInterval(() => {
      this.frameIndex = (this.frameIndex + 1) % SPINNER_FRAMES.length;
      this.update();
    }, 100);
    this.interval.unref();
  }

  private update(): void {
    if (!this.isActive) return;
    const frame = SPINNER_FRAMES[this.frameIndex] ?? '';
    this.stream.write(`\r${frame} ${this.message}`);
  }

  updateMessage(message: string): void {
    this.message = message;
    this.update();
  }

  /**
   * Stop the spinner and clear the line
   */
  stop(): void {
    if (this.interval) {
      clearInterval(this.interval);
      this.interval = null;
    }
    if (this.isActive) {
      this.stream.write('\r' + ' '.repeat(this.stream.columns || 80) + '\r');
      this.isActive = false;
    }
  }

  fail(message?: string): void {
    this.stop();
    if (message && this.enabled) {
      this.stream.write(`✗ ${message}\n`);
    }
  }
}

export function formatElapsedTime(ms: number): string {
  if (ms < 1000) return `${ms}ms`;
  if (ms < 60000) return `${(ms / 1000).toFixed(1)}s`;
  const minutes = Math.floor(ms / 60000);
  const seconds = Math.floor((ms % 60000) / 1000);
  return `${minutes}m ${seconds}s`;
}

let globalProgress: ProgressIndicator | null = null;

export function getProgressIndicator(): ProgressIndicator {
  if (!globalProgress) {
    globalProgress = new ProgressIndicator();
  }
  return globalProgress;
}

export function resetProgressIndicator(): void {
  if (globalProgress) {
    globalProgress.stop();
    globalProgress = null;
  }
}
