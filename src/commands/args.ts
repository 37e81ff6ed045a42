/**
 * Minimal argv helpers shared by the commands.
 *
 * Accepts `--flag value` and `--flag=value`; everything not consumed by a
 * value flag and not starting with `--` is positional.
 */

const VALUE_FLAGS = new Set(["--output", "--image-folder", "--name-template", "--email", "--api-token"]);

export interface ParsedArgs {
  positionals: string[];
  flags: Map<string, string | true>;
}

export function parseArgs(args: string[]): ParsedArgs {
  const positionals: string[] = [];
  const flags = new Map<string, string | true>();
  for (let i = 0; i < args.length; i++) {
    const arg = args[i] ?? "";
    if (!arg.startsWith("--")) {
      positionals.push(arg);
      continue;
    }
    const eq = arg.indexOf("=");
    if (eq > 0) {
      flags.set(arg.slice(0, eq), arg.slice(eq + 1));
    } else if (VALUE_FLAGS.has(arg)) {
      const value = args[i + 1];
      if (value === undefined || value.startsWith("--")) throw new Error(`missing value for ${arg}`);
      flags.set(arg, value);
      i++;
    } else {
      flags.set(arg, true);
    }
  }
  return { positionals, flags };
}

export function flagValue(parsed: ParsedArgs, name: string): string | undefined {
  const value = parsed.flags.get(name);
  return typeof value === "string" ? value : undefined;
}

export function hasFlag(parsed: ParsedArgs, name: string): boolean {
  return parsed.flags.has(name);
}
