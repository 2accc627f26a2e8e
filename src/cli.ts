import { Command, CommanderError, Option } from 'commander';
import { runMonitor, type MonitorDependencies, type MonitorOptions } from './commands/monitor.js';
import { EfaCliError, EXIT_CODES, UsageError } from './lib/errors.js';
import { loggers } from './lib/logger.js';
import { EfaClient } from './services/efa.js';
import { ConfigService } from './services/config.js';

export const VERSION = '0.1.0';

/**
 * 可重複的逗號分隔選項，逗號在 buildFilter 才拆開
 */
function collect(value: string, previous: string[]): string[] {
  return previous.concat(value);
}

export function createCli(deps: MonitorDependencies): Command {
  const cli = new Command();

  cli
    .name('efa-m')
    .description('Departure monitor for EFA-based public transit services')
    .version(VERSION, '-V, --version')
    .argument('<city>', 'city or municipality')
    .argument('<name>', '[address:|poi:|stop:]<name> of the stop, address or point of interest')
    .option('-d, --date <dd.mm.yyyy>', 'departure date')
    .option('-t, --time <hh:mm>', 'departure time')
    .option('-l, --line <lines>', 'only show these lines (comma-separated, repeatable)', collect, [])
    .option('-L, --linelist', 'list lines serving the stop instead of departures')
    .option('-p, --platform <platforms>', 'only show these platforms (comma-separated, repeatable)', collect, [])
    .option('-r, --relative', 'show minutes until departure instead of departure times')
    .option('-u, --efa-url <url>', 'EFA departure monitor endpoint')
    .addOption(new Option('-f, --format <format>', 'output format').choices(['table', 'json']))
    .option('-v, --verbose', 'write debug logs to stderr')
    .allowExcessArguments(false)
    .showHelpAfterError()
    .exitOverride()
    .configureOutput({
      writeOut: deps.io.stdout,
      writeErr: deps.io.stderr,
    })
    .action(async (city: string, name: string, options: MonitorOptions) => {
      await runMonitor([city, name], options, deps);
    });

  return cli;
}

function defaultDependencies(): MonitorDependencies {
  return {
    service: new EfaClient(),
    config: new ConfigService(),
    io: {
      stdout: (text) => process.stdout.write(text),
      stderr: (text) => process.stderr.write(text),
    },
  };
}

/**
 * 執行 CLI，回傳結束碼
 */
export async function run(
  argv: readonly string[],
  deps: MonitorDependencies = defaultDependencies()
): Promise<number> {
  const cli = createCli(deps);
  const requestId = loggers.efa.pushRequestId();
  loggers.cli.debug('Invocation', { requestId, argv: [...argv] });

  try {
    await cli.parseAsync([...argv], { from: 'user' });
    return EXIT_CODES.SUCCESS;
  } catch (error) {
    // commander 已輸出說明或錯誤訊息
    if (error instanceof CommanderError) {
      return error.exitCode;
    }
    if (error instanceof UsageError) {
      deps.io.stderr(`error: ${error.message}\n\n`);
      deps.io.stderr(cli.helpInformation());
      return error.exitCode;
    }
    if (error instanceof EfaCliError) {
      deps.io.stderr(`${error.message}\n`);
      return error.exitCode;
    }
    throw error;
  } finally {
    loggers.efa.popRequestId();
  }
}
