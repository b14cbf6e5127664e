// Argument parsing for the fund-scan CLI (no parser dependency)

export const COMMANDS = ['scan', 'batch', 'summary', 'risk', 'selftest', 'help'] as const;
export type Command = (typeof COMMANDS)[number];

export interface CliArgs {
  command: Command;
  funds: string[];
  provider?: 'demo' | 'fmp';
  concurrency?: number;
  delayMs?: number;
  exportPath?: string;
  configFile?: string;
  json: boolean;
  help: boolean;
}

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

function isCommand(value: string): value is Command {
  return COMMANDS.some((c) => c === value);
}

function numberFlag(flag: string, value: string): number {
  const n = Number(value);
  if (!value.trim() || !Number.isFinite(n)) {
    throw new UsageError(`${flag} expects a number, got "${value}"`);
  }
  return n;
}

export function parseArgs(argv: readonly string[]): CliArgs {
  const args: CliArgs = { command: 'help', funds: [], json: false, help: false };
  if (argv.length === 0) return args;

  const [first, ...rest] = argv;
  if (first === '--help' || first === '-h') {
    args.help = true;
    return args;
  }
  if (!isCommand(first)) {
    throw new UsageError(`Unknown command: ${first}`);
  }
  args.command = first;

  const positional: string[] = [];
  for (let i = 0; i < rest.length; i++) {
    const arg = rest[i];
    const next = (): string => {
      const value = rest[i + 1];
      if (value === undefined || value.startsWith('--')) {
        throw new UsageError(`${arg} requires a value`);
      }
      i++;
      return value;
    };

    switch (arg) {
      case '--provider': {
        const value = next();
        if (value !== 'demo' && value !== 'fmp') {
          throw new UsageError(`Invalid provider "${value}". Valid: demo, fmp`);
        }
        args.provider = value;
        break;
      }
      case '--concurrency':
        args.concurrency = numberFlag(arg, next());
        break;
      case '--delay':
        args.delayMs = numberFlag(arg, next());
        break;
      case '--export':
        args.exportPath = next();
        break;
      case '--config':
        args.configFile = next();
        break;
      case '--funds':
        positional.push(...next().split(',').map((f) => f.trim()).filter(Boolean));
        break;
      case '--json':
        args.json = true;
        break;
      case '--help':
      case '-h':
        args.help = true;
        break;
      default:
        if (arg.startsWith('--')) throw new UsageError(`Unknown option: ${arg}`);
        positional.push(arg);
    }
  }

  if (args.help || args.command === 'help' || args.command === 'selftest') return args;

  if (args.command === 'batch') {
    if (positional.length === 0) throw new UsageError('batch requires at least one fund name');
    args.funds = positional;
  } else {
    const fund = positional.join(' ').trim();
    if (!fund) throw new UsageError(`${args.command} requires a <fund> name`);
    args.funds = [fund];
  }
  return args;
}
