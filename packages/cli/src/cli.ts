import { Command, Option } from 'commander'
import { createRequire } from 'node:module'
import { runAddCommand } from './commands/homework/add.js'
import { runClearCommand } from './commands/homework/clear.js'
import { runDoneCommand } from './commands/homework/done.js'
import { runLsCommand } from './commands/homework/ls.js'
import { runQueryCommand } from './commands/homework/query.js'
import { runRmCommand } from './commands/homework/rm.js'
import { runSettingsCommand } from './commands/settings.js'
import { runStatsCommand } from './commands/stats.js'
import {
  processOutputSink,
  withOutput,
  type AnyCommandResult,
  type OutputSink,
} from './output/index.js'
import type { CliContext } from './session.js'

const require = createRequire(import.meta.url)

type CliPackageJson = {
  version?: unknown
}

function resolveCliVersion(): string {
  const packageJson: CliPackageJson = require('../package.json')
  if (typeof packageJson.version === 'string' && packageJson.version.trim().length > 0) {
    return packageJson.version.trim()
  }
  throw new Error('Unable to resolve CLI version from package.json.')
}

export interface CreateCliOptions {
  context?: Partial<CliContext>
  output?: OutputSink
}

export function createCli(options: CreateCliOptions = {}): Command {
  const context: CliContext = {
    env: options.context?.env ?? process.env,
    cwd: options.context?.cwd ?? process.cwd(),
    clock: options.context?.clock ?? (() => new Date()),
    logger: options.context?.logger,
  }
  const sink = options.output ?? processOutputSink

  type Runner = (
    context: CliContext,
    args: unknown[],
    options: Record<string, unknown>
  ) => Promise<AnyCommandResult>
  const action = (run: Runner) => withOutput(sink, (args, opts) => run(context, args, opts))

  const program = new Command()

  program
    .name('duedesk')
    .description('duedesk - track homework deadlines from the command line')
    .version(resolveCliVersion(), '-v, --version', 'output the version number')
    // Global options
    .option('--document <path>', 'homework document to use (default: $DUEDESK_HOME/homework_data.json)')
    .option('--json', 'output in JSON format')
    .option('--no-headers', 'omit table headers')
    .option('--no-color', 'disable colored output')

  program
    .command('ls')
    .alias('list')
    .description('List homework, most urgent first. Completed homework past due is hidden.')
    .action(action(runLsCommand))

  program
    .command('add')
    .description('Add a homework item')
    .argument('<code>', 'Unique homework code')
    .argument('<subject>', 'Subject name')
    .argument('<content>', 'What needs to be done')
    .requiredOption('-d, --due <date>', 'Due date (DD/MM/YYYY or D/M/YYYY)')
    .option('-c, --created <date>', 'Creation date (default: today)')
    .action(action(runAddCommand))

  program
    .command('query')
    .description('List homework created or due on a date')
    .argument('<date>', 'Date to match (DD/MM/YYYY or D/M/YYYY)')
    .addOption(new Option('--by <field>', 'Which date to match').choices(['due', 'create']).default('due'))
    .action(action(runQueryCommand))

  program
    .command('done')
    .description('Mark a homework item as completed')
    .argument('<code>', 'Homework code')
    .action(action(runDoneCommand))

  program
    .command('rm')
    .alias('delete')
    .description('Delete homework items')
    .argument('<codes...>', 'Homework codes to delete')
    .action(action(runRmCommand))

  program
    .command('clear')
    .description('Delete every homework item')
    .option('-y, --yes', 'Confirm clearing everything')
    .action(action(runClearCommand))

  program
    .command('stats')
    .description('Show status counts, or the daily created/due series with --daily')
    .option('--daily', 'Show the daily series instead of totals')
    .action(action(runStatsCommand))

  program
    .command('settings')
    .description('Show or change reminder and chart settings')
    .option('--remind-days <n>', 'Days before the due date that count as "due soon"')
    .option('--chart-days <n>', 'Days covered by the daily series')
    .action(action(runSettingsCommand))

  return program
}
