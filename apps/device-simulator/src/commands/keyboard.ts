import { createInterface } from 'node:readline';
import type { Readable } from 'node:stream';
import { commandForKey } from '@cellsim/domain';
import type { CommandBus } from './command-bus.js';

export const KEY_HELP = [
  '  a  send ALERT (button press)',
  '  t  send TEMP now',
  '  g  send GNSS now',
  '  c  send COUNT now',
  '  s  show device config',
  '  i  show route position',
  '  q  quit',
].join('\n');

export interface KeyboardProducer {
  close(): void;
}

/**
 * One command per input line. End of input counts as `quit` so a closed
 * stdin shuts the simulator down cleanly.
 */
export function attachKeyboard(bus: CommandBus, input: Readable = process.stdin): KeyboardProducer {
  const rl = createInterface({ input, terminal: false });
  let closing = false;

  rl.on('line', (line) => {
    if (line.trim() === '') return;
    const command = commandForKey(line);
    if (!command) {
      console.log(`[keys] unknown key "${line.trim()}"\n${KEY_HELP}`);
      return;
    }
    bus.submit(command, 'keyboard');
  });

  rl.on('close', () => {
    if (!closing) bus.submit('quit', 'keyboard');
  });

  return {
    close() {
      closing = true;
      rl.close();
    },
  };
}
