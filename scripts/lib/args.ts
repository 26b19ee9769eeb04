/**
 * Minimal argv parsing shared by the scripts.
 *
 *   --key value   --flag   -k value   -kvalue   -abc (cluster of flags)
 *
 * Anything else is a positional argument.
 */

export type ArgSpec = {
  /** Short letter → long name. */
  aliases?: Record<string, string>;
  /** Long names that take a value. */
  valued?: ReadonlySet<string>;
};

export type ParsedArgs = {
  options: Record<string, string>;
  positionals: string[];
};

export function parseArgs(argv: string[], spec: ArgSpec = {}): ParsedArgs {
  const aliases = spec.aliases ?? {};
  const valued = spec.valued ?? new Set<string>();
  const options: Record<string, string> = {};
  const positionals: string[] = [];

  for (let index = 0; index < argv.length; index++) {
    const token = argv[index];

    if (token.startsWith("--")) {
      const key = token.slice(2);
      const value = argv[index + 1];
      if (valued.has(key)) {
        if (value === undefined || value.startsWith("-")) throw new Error(`Option --${key} needs a value`);
        options[key] = value;
        index++;
      } else if (spec.valued === undefined && value !== undefined && !value.startsWith("--")) {
        // With no valued list given, every option may carry a value.
        options[key] = value;
        index++;
      } else {
        options[key] = "true";
      }
      continue;
    }

    if (token.startsWith("-") && token.length > 1) {
      const letters = token.slice(1);
      for (let pos = 0; pos < letters.length; pos++) {
        const key = aliases[letters[pos]];
        if (key === undefined) throw new Error(`Unknown option -${letters[pos]}`);
        if (!valued.has(key)) {
          options[key] = "true";
          continue;
        }
        const rest = letters.slice(pos + 1);
        const value = rest !== "" ? rest : argv[++index];
        if (value === undefined) throw new Error(`Option -${letters[pos]} needs a value`);
        options[key] = value;
        break;
      }
      continue;
    }

    positionals.push(token);
  }

  return { options, positionals };
}

export type ViewArgs = {
  directory: string;
  unit: string | null;
  threadId: boolean;
  lines: boolean;
  image: boolean;
  help: boolean;
};

const VIEW_OPTIONS = new Set(["unit", "thread-id", "lines", "image", "help"]);

/** Arguments of `scripts/view.ts`; throws on unknown options. */
export function parseViewArgs(argv: string[], cwd: string = process.cwd()): ViewArgs {
  const { options, positionals } = parseArgs(argv, {
    aliases: { u: "unit", t: "thread-id", l: "lines", i: "image", h: "help" },
    valued: new Set(["unit"]),
  });
  for (const key of Object.keys(options)) {
    if (!VIEW_OPTIONS.has(key)) throw new Error(`Unknown option --${key}`);
  }
  if (positionals.length > 1) throw new Error(`Expected one directory, got ${positionals.length}`);

  return {
    directory: positionals[0] ?? cwd,
    unit: options.unit ?? null,
    threadId: options["thread-id"] === "true",
    lines: options.lines === "true",
    image: options.image === "true",
    help: options.help === "true",
  };
}
