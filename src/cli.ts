import { Command, CommanderError } from 'commander';
import { loadConfig } from './config.js';
import { toCliError } from './errors.js';
import { setLogLevel } from './logger.js';
import { networkCommands } from './commands/network.js';
import { registerCommandTree, runLeaf, type LeafDependencies } from './commands/registry.js';
import { ConsoleOutput, processStreams, type OutputSink, type OutputStreams } from './output.js';
import { promptConfirm } from './prompt.js';
import { sessionFromConfig } from './session.js';

export const VERSION = '0.1.0';

export interface CliDependencies extends LeafDependencies {
  createOutput(options: { json: boolean }): OutputSink;
  streams: OutputStreams;
}

export function defaultDependencies(): CliDependencies {
  const config = loadConfig();
  setLogLevel(config.logLevel);
  return {
    restoreSession: sessionFromConfig(config),
    confirm: (question) => promptConfirm(question),
    createOutput: (options) => new ConsoleOutput(options),
    streams: processStreams,
  };
}

export function createProgram(deps: CliDependencies, state: { exitCode: number }): Command {
  const program = new Command();

  program
    .name('vcd-net')
    .description('Manage vCloud Director networks from the command line')
    .version(VERSION)
    .option('-j, --json', 'print results as JSON')
    .option('-v, --verbose', 'log requests and failures to stderr')
    .showHelpAfterError()
    .exitOverride()
    .configureOutput({
      writeOut: (text) => deps.streams.writeOut(text),
      writeErr: (text) => deps.streams.writeErr(text),
    });

  registerCommandTree(program, networkCommands, async (leaf, input, command) => {
    const globals = command.optsWithGlobals();
    if (globals.verbose === true) {
      setLogLevel('debug');
    }
    const output = deps.createOutput({ json: globals.json === true });
    state.exitCode = await runLeaf(leaf, input, deps, output);
  });

  return program;
}

/**
 * Parses one command line and runs it. Resolves to the process exit status.
 */
export async function main(argv: string[], deps: CliDependencies = defaultDependencies()): Promise<number> {
  const state = { exitCode: 0 };
  const program = createProgram(deps, state);

  try {
    await program.parseAsync(argv, { from: 'user' });
  } catch (error) {
    if (error instanceof CommanderError) {
      return error.exitCode;
    }
    deps.streams.writeErr(`Error: ${toCliError(error).message}\n`);
    return 1;
  }
  return state.exitCode;
}
