import { Command, CommanderError, Option } from 'commander'
import chalk from 'chalk'
import { SnapshotPublisher } from './core/SnapshotPublisher'
import { SignalGuard } from './core/SignalGuard'
import { PublishError } from './core/ErrorHandling'
import { PartialConfig } from './core/PublishConfig'
import { PublishReport } from './core/interfaces'

export interface CliOptions {
  ref?: string
  tag?: string
  access?: string
  otp?: string
  dryRun?: boolean
  tempRoot?: string
  skipHooks?: boolean
  config?: string
}

export interface CliDependencies {
  createPublisher: (projectPath: string) => SnapshotPublisher
  createSignalGuard: () => SignalGuard
  cwd: () => string
  exit: (code: number) => never
  writeOut: (str: string) => void
  writeErr: (str: string) => void
}

const defaultDependencies: CliDependencies = {
  createPublisher: (projectPath) => new SnapshotPublisher(projectPath),
  createSignalGuard: () => new SignalGuard(),
  cwd: () => process.cwd(),
  exit: (code) => process.exit(code),
  writeOut: (str) => process.stdout.write(str),
  writeErr: (str) => process.stderr.write(str)
}

function isAccessLevel(value: string | undefined): value is 'public' | 'restricted' {
  return value === 'public' || value === 'restricted'
}

/**
 * Build the snapshot-publish command line
 */
export function createProgram(overrides: Partial<CliDependencies> = {}): Command {
  const deps: CliDependencies = { ...defaultDependencies, ...overrides }
  const program = new Command()

  program
    .name('snapshot-publish')
    .description('Publish a package from the committed HEAD of a git repository')
    .version('0.1.0')
    .argument('[package]', 'package directory relative to the repository root', '.')
    .allowExcessArguments(false)
    .option('--ref <rev>', 'revision to export (default: HEAD)')
    .option('--tag <name>', 'publish with tag')
    .addOption(
      new Option('--access <level>', 'access level for scoped packages').choices(['public', 'restricted'])
    )
    .option('--otp <code>', '2FA one-time password')
    .option('--dry-run', 'pass --dry-run to the publish command')
    .option('--temp-root <dir>', 'parent directory of the temporary workspace')
    .option('--skip-hooks', 'skip prePublish hooks')
    .option('-c, --config <path>', 'custom configuration file path')
    .configureOutput({
      writeOut: deps.writeOut,
      writeErr: deps.writeErr
    })
    .exitOverride((err: CommanderError) => {
      if (err.code === 'commander.helpDisplayed' || err.code === 'commander.version') {
        deps.exit(0)
      }
      if (err.code === 'commander.unknownOption') {
        // Exit with code 2 for invalid options (POSIX convention)
        deps.exit(2)
      }
      deps.writeErr(`Usage: ${program.name()} ${program.usage()}\n`)
      deps.exit(1)
    })
    .action(async (packagePath: string, options: CliOptions) => {
      const exitCode = await runPublish(packagePath, options, deps)
      deps.exit(exitCode)
    })

  return program
}

async function runPublish(packagePath: string, options: CliOptions, deps: CliDependencies): Promise<number> {
  const guard = deps.createSignalGuard()
  const signal = guard.install()

  try {
    console.log(chalk.bold('\n📦 snapshot-publish\n'))

    const publisher = deps.createPublisher(deps.cwd())

    // Load configuration (CLI args take priority)
    const cliArgs: PartialConfig = {}
    if (options.ref) {
      cliArgs.source = { ref: options.ref }
    }
    if (options.tempRoot) {
      cliArgs.workspace = { tempRoot: options.tempRoot }
    }
    if (options.dryRun) {
      cliArgs.publish = { dryRun: true }
    }

    await publisher.loadConfig(cliArgs, options.config)

    const report = await publisher.publish({
      packagePath,
      tag: options.tag,
      access: isAccessLevel(options.access) ? options.access : undefined,
      otp: options.otp,
      skipHooks: options.skipHooks,
      signal
    })

    printReport(report)
    return guard.receivedSignal ? 1 : report.exitCode
  } catch (error) {
    if (error instanceof PublishError) {
      console.error(chalk.red.bold('\n❌ エラー'))
      console.error(chalk.red(error.message))
      printActions(error.suggestedActions)
      return guard.receivedSignal ? 1 : error.exitCode
    }

    console.error(chalk.red.bold('\n❌ エラー'))
    console.error(chalk.red((error as Error).message))
    console.error(chalk.gray('\nスタックトレース:'))
    console.error(chalk.gray((error as Error).stack))
    return 1
  } finally {
    guard.dispose()
  }
}

function printReport(report: PublishReport): void {
  const packageLabel = report.packageDir === '.' ? '(ルート)' : report.packageDir

  if (report.success) {
    console.log(chalk.green.bold('\n✅ 成功！'))
    console.log(chalk.green(`${report.ref} の ${packageLabel} を公開しました`))
  } else {
    console.error(chalk.red.bold(report.state === 'INTERRUPTED' ? '\n⛔ 中断' : '\n❌ 失敗'))
    if (report.failedStage) {
      console.error(chalk.red(`失敗したステージ: ${report.failedStage}`))
    }
    for (const error of report.errors) {
      console.error(chalk.red(`  - ${error}`))
    }
    printActions(report.suggestedActions)
  }

  if (report.warnings.length > 0) {
    console.log(chalk.yellow('⚠️  警告:'))
    for (const warning of report.warnings) {
      console.log(chalk.yellow(`  - ${warning}`))
    }
  }

  console.log(chalk.gray(`処理時間: ${(report.duration / 1000).toFixed(2)}秒 (exit code: ${report.exitCode})\n`))
}

function printActions(actions: string[]): void {
  if (actions.length === 0) return
  console.error(chalk.gray('\n対処方法:'))
  for (const action of actions) {
    console.error(chalk.gray(`  - ${action}`))
  }
}
