import { Command, CommanderError } from 'commander';
import { startApiServer } from './api/server';
import type { AppConfig } from './config';
import { checkCode } from './naptan';
import { runRealtime } from './realtime';
import { type Painter, renderBoard, renderList } from './render/board';
import type { TimetableSource } from './timetable/client';
import type { BusArrival } from './types/bus';
import type { Logger } from './utils/logger';

type CliOptions = {
  naptan?: string;
  realtime?: boolean;
  list?: boolean;
  api?: boolean;
};

export interface CliDependencies {
  config: AppConfig;
  client: TimetableSource;
  logger: Logger;
  out: (text: string) => void;
  err: (text: string) => void;
  clear: () => void;
  sleep: (ms: number) => Promise<void>;
  now: () => Date;
  paint?: Painter;
}

function buildProgram(deps: CliDependencies): Command {
  return new Command()
    .name('next-bus')
    .description('Live bus departures for a NaPTAN stop code')
    .usage('[-t] -n <code> [interval] | -a')
    .version(deps.config.version, '--version')
    .option('-n, --naptan <code>', 'NaPTAN code of the stop (8 digits)')
    .option('-t, --realtime', `refresh the board every ${deps.config.refreshIntervalMs / 1000} seconds`)
    .option('-l, --list', 'print one line per departure instead of a table')
    .option('-a, --api', `serve departures as JSON on ${deps.config.apiHost}:${deps.config.apiPort}`)
    .argument('[interval]', 'accepted for compatibility, the refresh interval is fixed')
    .exitOverride()
    .configureOutput({ writeOut: deps.out, writeErr: deps.err });
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Runs the command line and resolves with the process exit code, or `null`
 * when the API server was started and keeps the process alive.
 */
export async function runCli(argv: string[], deps: CliDependencies): Promise<number | null> {
  const program = buildProgram(deps);
  try {
    program.parse(argv, { from: 'user' });
  } catch (error) {
    if (error instanceof CommanderError) return error.exitCode;
    throw error;
  }

  const options = program.opts<CliOptions>();
  const print = (lines: string[]) => deps.out(`${lines.join('\n')}\n`);

  if (options.api) {
    try {
      await startApiServer({ client: deps.client, config: deps.config, logger: deps.logger });
    } catch (error) {
      deps.err(`Error: ${errorMessage(error)}\n`);
      return 1;
    }
    return null;
  }

  if (options.naptan === undefined) {
    deps.err(program.helpInformation());
    return 1;
  }

  if (program.args.length > 0) {
    deps.logger.debug('Ignoring interval argument', { interval: program.args[0] });
  }

  let code: string;
  try {
    code = checkCode(options.naptan, deps.config);
  } catch (error) {
    deps.err(`Error: ${errorMessage(error)}\n`);
    return 1;
  }

  const render = (arrivals: BusArrival[], now: Date) =>
    print(options.list ? renderList(arrivals, code, now) : renderBoard(arrivals, code, now, deps.paint));

  try {
    if (options.realtime) {
      await runRealtime({
        load: () => deps.client.getBuses(code),
        render,
        clear: deps.clear,
        sleep: deps.sleep,
        now: deps.now,
        intervalMs: deps.config.refreshIntervalMs,
      });
    }
    render(await deps.client.getBuses(code), deps.now());
    return 0;
  } catch (error) {
    deps.err(`Error: ${errorMessage(error)}\n`);
    return 1;
  }
}
