import { errorMessage, type SimulatorCommand } from '@cellsim/domain';

export type CommandSource = 'keyboard' | 'api' | 'internal';

export interface QueuedCommand {
  command: SimulatorCommand;
  source: CommandSource;
}

export type CommandHandler = (entry: QueuedCommand) => Promise<void> | void;

/**
 * Single queue that every producer (keyboard, control API, internal
 * triggers) feeds. Commands run one at a time in submission order.
 */
export class CommandBus {
  private tail: Promise<void> = Promise.resolve();
  private handler: CommandHandler | null = null;
  private closed = false;
  private queued = 0;

  /** Install the consumer. Commands submitted before this are refused. */
  setHandler(handler: CommandHandler): void {
    this.handler = handler;
  }

  get pending(): number {
    return this.queued;
  }

  get isOpen(): boolean {
    return !this.closed && this.handler !== null;
  }

  submit(command: SimulatorCommand, source: CommandSource): boolean {
    const handler = this.handler;
    if (this.closed || !handler) return false;

    this.queued++;
    this.tail = this.tail
      .then(() => handler({ command, source }))
      .catch((err: unknown) => {
        console.error(`[commands] ${command} from ${source} failed: ${errorMessage(err)}`);
      })
      .finally(() => {
        this.queued--;
      });
    return true;
  }

  /** Resolves once everything submitted so far has run. */
  drain(): Promise<void> {
    return this.tail;
  }

  /** Refuse new commands; queued ones still run. */
  close(): void {
    this.closed = true;
  }
}
