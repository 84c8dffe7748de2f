export type Command = "grade" | "import";

export interface CliOptions {
  command: Command;
  configPath: string;
  output?: string;
  sortBy?: string;
  standardize?: boolean;
}

const DEFAULT_CONFIG = "course.config.json";

/**
 * Reads the value of a `--name=value` flag
 */
export const readFlag = (args: string[], name: string): string | undefined => {
  const flag = args.find((arg) => arg.startsWith(`--${name}=`));
  if (!flag) {
    return undefined;
  }
  const value = flag.slice(name.length + 3).trim();
  if (value === "") {
    console.warn(`Empty value for --${name}, ignoring it.`);
    return undefined;
  }
  return value;
};

/**
 * Parses the command line. The command defaults to "grade".
 */
export const parseCliArgs = (args: string[]): CliOptions => {
  const command: Command = args.includes("import") ? "import" : "grade";
  const unknown = args.filter(
    (arg) => !arg.startsWith("--") && arg !== "grade" && arg !== "import"
  );
  if (unknown.length > 0) {
    console.warn(`Ignoring unknown arguments: ${unknown.join(" ")}`);
  }

  return {
    command,
    configPath: readFlag(args, "config") ?? DEFAULT_CONFIG,
    output: readFlag(args, "output"),
    sortBy: readFlag(args, "sort"),
    standardize: args.includes("--no-standardize") ? false : undefined,
  };
};
