import { errorMessage, shutdownPerfCore } from '../src/perf/perf-core.ts';
import commands from './muxrail-commands.ts';

type CommandName = keyof typeof commands;

function isCommandName(value: string | undefined): value is CommandName {
  return value !== undefined && Object.hasOwn(commands, value);
}

function printUsage(): void {
  const lines = ['usage: muxrail <command> [options]', '', 'commands:'];
  for (const [name, command] of Object.entries(commands)) {
    lines.push(`  ${name.padEnd(16)}${command.summary ?? ''}`);
  }
  process.stdout.write(`${lines.join('\n')}\n`);
}

async function main(argv: readonly string[]): Promise<number> {
  const [name, ...rest] = argv;
  if (name === undefined || name === '--help' || name === '-h' || name === 'help') {
    printUsage();
    return 0;
  }
  if (!isCommandName(name)) {
    process.stderr.write(`muxrail: unknown command "${name}"\n`);
    printUsage();
    return 2;
  }
  await commands[name].run(rest, import.meta.url);
  return 0;
}

function oclifExitCode(error: unknown): number | null {
  if (typeof error !== 'object' || error === null || !('oclif' in error)) {
    return null;
  }
  const details = error.oclif;
  if (typeof details === 'object' && details !== null && 'exit' in details) {
    return typeof details.exit === 'number' ? details.exit : null;
  }
  return null;
}

try {
  process.exitCode = await main(process.argv.slice(2));
} catch (error: unknown) {
  const exitCode = oclifExitCode(error);
  if (exitCode !== null) {
    process.exitCode = exitCode;
  } else {
    process.stderr.write(`muxrail: ${errorMessage(error)}\n`);
    process.exitCode = 1;
  }
} finally {
  shutdownPerfCore();
}
