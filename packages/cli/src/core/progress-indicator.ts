/**
 * Sweep progress on stderr: a spinner line that the handler retitles after
 * each trial. JSON and CSV on stdout stay clean, and nothing is drawn when
 * stderr is not a TTY.
 */

const FRAMES = '⠋⠙⠹⠸⠼⠴⠦⠧⠇⠏';
const FRAME_MS = 100;

export class ProgressIndicator {
  private timer: NodeJS.Timeout | undefined;
  private tick = 0;
  private label = '';
  private running = false;

  constructor(private readonly stream: NodeJS.WriteStream = process.stderr) {}

  private draw(): void {
    if (this.running && this.stream.isTTY) {
      this.stream.write(`\r${FRAMES[this.tick % FRAMES.length] ?? ''} ${this.label}`);
    }
  }

  start(label: string): void {
    this.stop();
    this.label = label;
    this.tick = 0;
    this.running = true;
    if (!this.stream.isTTY) return;

    this.draw();
    this.timer = setInterval(() => {
      this.tick += 1;
      this.draw();
    }, FRAME_MS);
    this.timer.unref();
  }

  updateMessage(label: string): void {
    this.label = label;
    this.draw();
  }

  stop(): void {
    clearInterval(this.timer);
    this.timer = undefined;
    if (this.running && this.stream.isTTY) {
      this.stream.write(`\r${' '.repeat(this.stream.columns || 80)}\r`);
    }
    this.running = false;
  }

  fail(message?: string): void {
    this.stop();
    if (message) console.error(`✗ ${message}`);
  }
}

/**
 * `[████░░░░] 50% (2/4)`; the fill stops at 100% even if `done` overshoots.
 */
export function createProgressBar(done: number, total: number, width = 30): string {
  if (total === 0) return `[${' '.repeat(width)}] 0%`;

  const percent = Math.min(100, Math.round((done / total) * 100));
  const cells = Math.round((percent * width) / 100);
  return `[${'█'.repeat(cells)}${'░'.repeat(width - cells)}] ${percent}% (${done}/${total})`;
}

let shared: ProgressIndicator | undefined;

/** One indicator per command run; `execute` resets it when the command ends. */
export function getProgressIndicator(): ProgressIndicator {
  shared ??= new ProgressIndicator();
  return shared;
}

export function resetProgressIndicator(): void {
  shared?.stop();
  shared = undefined;
}
