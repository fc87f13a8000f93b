/**
 * Command-table dispatch shared by the two CLIs.
 *
 * A table maps a command name to its handler and the minimal number of
 * positional arguments it needs. Unknown names and short argument lists are
 * reported on stdout and never reach a handler.
 */

export interface CommandSpec {
  /** Positional arguments as shown in usage, e.g. `<name> <resource_group> [kind]`. */
  args?: string;
  minArgs?: number;
  run: (args: string[]) => unknown;
}

export type CommandTable = ReadonlyMap<string, CommandSpec>;

export interface DispatchOptions {
  /** Lines printed when no command is given. */
  help: string[];
  /** Lower-case the command name before lookup. */
  ignoreCase?: boolean;
}

export type DispatchResult =
  | { status: 'help' }
  | { status: 'unknown'; command: string }
  | { status: 'usage'; command: string }
  | { status: 'ran'; command: string; result: unknown };

export function usageOf(name: string, spec: CommandSpec): string {
  return spec.args ? `Usage: ${name} ${spec.args}` : `Usage: ${name}`;
}

export async function dispatch(
  table: CommandTable,
  argv: readonly string[],
  options: DispatchOptions,
): Promise<DispatchResult> {
  const [first, ...args] = argv;
  if (first === undefined) {
    for (const line of options.help) console.log(line);
    return { status: 'help' };
  }

  const command = options.ignoreCase ? first.toLowerCase() : first;
  const spec = table.get(command);
  if (!spec) {
    console.log(`Unknown command: ${command}`);
    console.log(`Available: ${[...table.keys()].join(', ')}`);
    return { status: 'unknown', command };
  }

  if (args.length < (spec.minArgs ?? 0)) {
    console.log(usageOf(command, spec));
    return { status: 'usage', command };
  }

  const result = await spec.run(args);
  return { status: 'ran', command, result };
}
