export const SIMULATOR_COMMANDS = [
  'alert',
  'temperature',
  'gnss',
  'counter',
  'show-config',
  'route-info',
  'quit',
] as const;

export type SimulatorCommand = (typeof SIMULATOR_COMMANDS)[number];

const KEY_MAP: Readonly<Record<string, SimulatorCommand>> = {
  a: 'alert',
  t: 'temperature',
  g: 'gnss',
  c: 'counter',
  s: 'show-config',
  i: 'route-info',
  q: 'quit',
};

/** Translate a single-key console line into a command; `null` for anything else. */
export function commandForKey(line: string): SimulatorCommand | null {
  return KEY_MAP[line.trim().toLowerCase()] ?? null;
}
