import chalk from "chalk";
import ora, { Ora } from "ora";

/**
 * Terminal progress output (Singleton)
 * - Everything goes to stderr; stdout carries command results only
 * - Progress stays on one line (spinner updates in place)
 * - Background colors for section headers
 */
export class Output {
  private static instance: Output | null = null;
  private spinner: Ora | null = null;
  private taskStartTime: number | null = null;
  private taskOriginalMessage: string | null = null;
  private taskLines: string[] = [];

  private constructor() {}

  static getInstance(): Output {
    if (!Output.instance) {
      Output.instance = new Output();
    }
    return Output.instance;
  }

  /**
   * Start a task with spinner. Completes any previous task first.
   */
  task(message: string): void {
    if (this.spinner) {
      this.done();
    }

    this.taskStartTime = Date.now();
    this.taskOriginalMessage = message;
    this.taskLines = [];
    this.spinner = ora({ text: message, stream: process.stderr }).start();
  }

  /**
   * Add a line below the spinner. Kept after the task completes.
   * If no task is active, displays as a regular info message.
   */
  taskLine(message: string): void {
    if (!this.spinner) {
      this.info(message);
      return;
    }
    this.taskLines.push(message);
    this.#updateTaskDisplay();
  }

  #updateTaskDisplay(): void {
    if (!this.spinner) return;

    const currentText = this.taskOriginalMessage ?? "";
    if (this.taskLines.length === 0) {
      this.spinner.text = currentText;
      return;
    }

    const taskLinesText = this.taskLines
      .map((line) => chalk.dim(`  ${line}`))
      .join("\n");
    this.spinner.text = `${currentText}\n${taskLinesText}`;
  }

  /**
   * Complete task with duration display
   */
  done(message?: string, showTime: boolean = true): void {
    if (!this.spinner) return;

    let text = message || this.taskOriginalMessage || "done";
    if (showTime && this.taskStartTime) {
      text += chalk.dim(` (${formatDuration(Date.now() - this.taskStartTime)})`);
    }

    this.spinner.text = text;
    this.spinner.succeed();
    this.spinner = null;

    for (const line of this.taskLines) {
      console.error(chalk.dim(`  ${line}`));
    }

    this.taskStartTime = null;
    this.taskOriginalMessage = null;
    this.taskLines = [];
  }

  /**
   * Show key-value pairs, padded to the longest key. Undefined values are
   * skipped.
   */
  obj(obj: Record<string, string | number | undefined>): void {
    this.#stopTask();

    const entries = Object.entries(obj).filter(
      (entry): entry is [string, string | number] => entry[1] !== undefined
    );
    const maxKeyLength = Math.max(0, ...entries.map(([key]) => key.length));
    for (const [key, value] of entries) {
      console.error(`${chalk.dim(key.padEnd(maxKeyLength + 2))}${value}`);
    }
  }

  successBlock(label: string, message: string = ""): void {
    this.#stopTask();
    console.error(
      `\n${chalk.bgGreen.black(` ${label} `)}${message && ` ${message}`}`
    );
  }

  info(message: string): void {
    this.#stopTask();
    console.error(chalk.dim(message));
  }

  warn(message: string): void {
    this.#stopTask();
    console.error(chalk.yellow(message));
  }

  warnBlock(label: string, message: string = ""): void {
    this.#stopTask();
    console.error(
      `\n${chalk.bgYellow.black(` ${label} `)}${message && ` ${message}`}`
    );
  }

  /**
   * Stop spinner without showing result
   */
  #stopTask(): void {
    if (this.spinner) {
      this.spinner.stop();
      this.spinner.clear();
      this.spinner = null;
    }
    this.taskStartTime = null;
    this.taskOriginalMessage = null;
    this.taskLines = [];
  }
}

function formatDuration(durationMs: number): string {
  if (durationMs < 1000) return `${durationMs}ms`;
  if (durationMs < 2000) return `${(durationMs / 1000).toFixed(2)}s`;
  return `${(durationMs / 1000).toFixed(1)}s`;
}

/**
 * Global singleton output instance
 */
export const out = Output.getInstance();
