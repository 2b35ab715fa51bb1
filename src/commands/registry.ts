import { Option, type Command } from 'commander';
import { err, ok, toCliError, type Result } from '../errors.js';
import { createLogger } from '../logger.js';
import { resolvePlatform, resolveVdc, type ResourceScope } from '../locator.js';
import type { OutputSink } from '../output.js';
import type { Confirm } from '../prompt.js';
import type { RestoreSession, SessionContext } from '../session.js';
import type { Platform } from '../vcd/platform.js';
import type { TaskSummary } from '../vcd/task.js';
import type { NetworkSummary } from '../vcd/types.js';
import type { Vdc } from '../vcd/vdc.js';
import type { LeafInput } from './params.js';

// =============================================================================
// Types
// =============================================================================

export type Outcome =
  | { kind: 'task'; task: TaskSummary; message?: string }
  | { kind: 'records'; records: NetworkSummary[] }
  | { kind: 'aborted' };

export interface ArgumentSpec {
  name: string;
  description: string;
}

export type OptionSpec =
  | { kind: 'value'; flags: string; description: string }
  | { kind: 'list'; flags: string; description: string }
  | {
      kind: 'flag';
      flags: string;
      description: string;
      defaultValue?: boolean;
      /** Opposite flag writing false into the same option value; the last one given wins. */
      negatedBy?: { flags: string; description: string };
    };

export interface LeafDependencies {
  restoreSession: RestoreSession;
  confirm: Confirm;
}

interface LeafDefinition<P> {
  name: string;
  summary: string;
  arguments: ArgumentSpec[];
  options: OptionSpec[];
  parse(input: LeafInput): Result<P>;
  /** Question to ask before the remote call; undefined skips the prompt. */
  confirmation?(params: P): string | undefined;
}

export interface PlatformLeaf<P> extends LeafDefinition<P> {
  invoke(platform: Platform, params: P): Promise<Result<Outcome>>;
}

export interface VdcLeaf<P> extends LeafDefinition<P> {
  invoke(vdc: Vdc, params: P): Promise<Result<Outcome>>;
}

/** A leaf with its parameter type erased, ready to be placed in the command table. */
export interface CommandLeaf {
  name: string;
  summary: string;
  scope: ResourceScope;
  arguments: ArgumentSpec[];
  options: OptionSpec[];
  execute(input: LeafInput, deps: LeafDependencies): Promise<Result<Outcome>>;
}

export interface CommandGroup {
  name: string;
  summary: string;
  help?: string;
  leaves: CommandLeaf[];
}

export interface CommandTree {
  name: string;
  summary: string;
  groups: CommandGroup[];
}

const logger = createLogger('dispatch');

// =============================================================================
// Leaf definitions
// =============================================================================

async function prepare<P>(
  leaf: LeafDefinition<P>,
  scope: ResourceScope,
  input: LeafInput,
  deps: LeafDependencies
): Promise<Result<{ params: P; session: SessionContext } | null>> {
  const parsed = leaf.parse(input);
  if (!parsed.ok) {
    return parsed;
  }

  const question = leaf.confirmation?.(parsed.value);
  if (question !== undefined && !(await deps.confirm(question))) {
    return ok(null);
  }

  const session = await deps.restoreSession({ requireVdcSelected: scope === 'vdc' });
  if (!session.ok) {
    return session;
  }
  return ok({ params: parsed.value, session: session.value });
}

export function definePlatformLeaf<P>(leaf: PlatformLeaf<P>): CommandLeaf {
  return {
    name: leaf.name,
    summary: leaf.summary,
    scope: 'platform',
    arguments: leaf.arguments,
    options: leaf.options,
    async execute(input, deps) {
      const prepared = await prepare(leaf, 'platform', input, deps);
      if (!prepared.ok) return prepared;
      if (prepared.value === null) return ok<Outcome>({ kind: 'aborted' });

      return leaf.invoke(resolvePlatform(prepared.value.session), prepared.value.params);
    },
  };
}

export function defineVdcLeaf<P>(leaf: VdcLeaf<P>): CommandLeaf {
  return {
    name: leaf.name,
    summary: leaf.summary,
    scope: 'vdc',
    arguments: leaf.arguments,
    options: leaf.options,
    async execute(input, deps) {
      const prepared = await prepare(leaf, 'vdc', input, deps);
      if (!prepared.ok) return prepared;
      if (prepared.value === null) return ok<Outcome>({ kind: 'aborted' });

      const vdc = resolveVdc(prepared.value.session);
      if (!vdc.ok) return vdc;
      return leaf.invoke(vdc.value, prepared.value.params);
    },
  };
}

export async function taskOutcome(pending: Promise<Result<TaskSummary>>, message?: string): Promise<Result<Outcome>> {
  const result = await pending;
  if (!result.ok) return result;
  return ok<Outcome>({ kind: 'task', task: result.value, message });
}

export async function recordsOutcome(pending: Promise<Result<NetworkSummary[]>>): Promise<Result<Outcome>> {
  const result = await pending;
  if (!result.ok) return result;
  return ok<Outcome>({ kind: 'records', records: result.value });
}

// =============================================================================
// Dispatch
// =============================================================================

function render(outcome: Outcome, output: OutputSink): void {
  switch (outcome.kind) {
    case 'task':
      output.task(outcome.task);
      if (outcome.message) output.message(outcome.message);
      return;
    case 'records':
      output.records(outcome.records);
      return;
    case 'aborted':
      output.message('Aborted.');
      return;
  }
}

/**
 * Runs one leaf and turns its outcome into output and an exit status. This
 * is the only place where a failure becomes a message and an exit code.
 */
export async function runLeaf(
  leaf: CommandLeaf,
  input: LeafInput,
  deps: LeafDependencies,
  output: OutputSink
): Promise<number> {
  let outcome: Result<Outcome>;
  try {
    outcome = await leaf.execute(input, deps);
  } catch (error) {
    outcome = err(toCliError(error));
  }

  if (!outcome.ok) {
    logger.debug(`${leaf.name} failed`, { kind: outcome.error.kind, ...outcome.error.details });
    output.error(outcome.error);
    return 1;
  }
  render(outcome.value, output);
  return 0;
}

// =============================================================================
// Registration
// =============================================================================

function addOption(command: Command, spec: OptionSpec): void {
  if (spec.kind !== 'flag') {
    command.option(spec.flags, spec.description);
    return;
  }
  const option = new Option(spec.flags, spec.description);
  if (spec.defaultValue !== undefined) {
    option.default(spec.defaultValue);
  }
  command.addOption(option);

  if (spec.negatedBy) {
    const negated = new Option(spec.negatedBy.flags, spec.negatedBy.description);
    command.addOption(negated);
    const key = option.attributeName();
    command.on(`option:${negated.name()}`, () => {
      command.setOptionValue(key, false);
    });
  }
}

export interface LeafRunner {
  (leaf: CommandLeaf, input: LeafInput, command: Command): Promise<void>;
}

/**
 * Registers `<root> <group> <leaf>` commands for every entry of the
 * table. Paths match exactly; commander is left to report unknown ones.
 */
export function registerCommandTree(program: Command, tree: CommandTree, run: LeafRunner): void {
  const root = program.command(tree.name).description(tree.summary);

  for (const group of tree.groups) {
    const groupCommand = root.command(group.name).description(group.summary);
    if (group.help) {
      groupCommand.addHelpText('after', group.help);
    }

    for (const leaf of group.leaves) {
      const leafCommand = groupCommand.command(leaf.name).description(leaf.summary);
      for (const argument of leaf.arguments) {
        leafCommand.argument(`<${argument.name}>`, argument.description);
      }
      for (const option of leaf.options) {
        addOption(leafCommand, option);
      }
      leafCommand.action(async () => {
        const options: Record<string, unknown> = leafCommand.opts();
        await run(leaf, { args: leafCommand.args, options }, leafCommand);
      });
    }
  }
}
