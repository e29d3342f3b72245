// Argument parsing for `consensus analyze`

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

export interface AnalyzeOptions {
  query: string;
  subject?: string;
  timeoutMs?: number;
  concurrency?: number;
  weights: Record<string, number>;
  server?: string;
  json: boolean;
  help: boolean;
}

function takeValue(args: string[], i: number, flag: string): string {
  const value = args[i + 1];
  if (value === undefined || value.startsWith('--')) {
    throw new UsageError(`${flag} requires a value`);
  }
  return value;
}

function positiveInt(value: string, flag: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n < 1) {
    throw new UsageError(`${flag} expects a positive integer, got "${value}"`);
  }
  return n;
}

export function parseAnalyzeArgs(args: string[]): AnalyzeOptions {
  const options: AnalyzeOptions = { query: '', weights: {}, json: false, help: false };
  const queryParts: string[] = [];

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    switch (arg) {
      case '--subject':
        options.subject = takeValue(args, i++, arg);
        break;
      case '--timeout':
        options.timeoutMs = positiveInt(takeValue(args, i++, arg), arg);
        break;
      case '--concurrency':
        options.concurrency = positiveInt(takeValue(args, i++, arg), arg);
        break;
      case '--weight': {
        const entry = takeValue(args, i++, arg);
        const eq = entry.indexOf('=');
        const weight = Number(entry.slice(eq + 1));
        if (eq < 1 || entry.slice(eq + 1).trim() === '' || !Number.isFinite(weight) || weight < 0 || weight > 1) {
          throw new UsageError(`--weight expects id=weight with weight in [0, 1], got "${entry}"`);
        }
        options.weights[entry.slice(0, eq)] = weight;
        break;
      }
      case '--server':
        options.server = takeValue(args, i++, arg);
        break;
      case '--json':
        options.json = true;
        break;
      case '--help':
      case '-h':
        options.help = true;
        break;
      default:
        if (arg.startsWith('--')) throw new UsageError(`Unknown option ${arg}`);
        queryParts.push(arg);
    }
  }

  options.query = queryParts.join(' ').trim();
  return options;
}

/** Conventional shell exit status for a process ended by `signal` (128 + signal number). */
export function signalExitCode(signal: 'SIGINT' | 'SIGTERM'): number {
  return signal === 'SIGTERM' ? 143 : 130;
}
