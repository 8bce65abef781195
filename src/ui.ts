import pc from "picocolors";

let verbose = false;

export function setVerbose(on: boolean): void {
  verbose = on;
}

export type Color = "green" | "yellow" | "red" | "cyan" | "dim";

const COLORS: Record<Color, (text: string) => string> = {
  green: pc.green,
  yellow: pc.yellow,
  red: pc.red,
  cyan: pc.cyan,
  dim: pc.dim,
};

export function styled(text: string, opts: { bold?: boolean; color?: Color } = {}): string {
  let result = opts.color ? COLORS[opts.color](text) : text;
  if (opts.bold) result = pc.bold(result);
  return result;
}

export function info(msg: string): void {
  console.log(`  ${msg}`);
}

export function success(msg: string): void {
  console.log(`  ${pc.green(msg)}`);
}

export function warn(msg: string): void {
  console.log(`  ${pc.yellow(msg)}`);
}

export function error(msg: string): void {
  console.error(`  ${pc.red(msg)}`);
}

/** Printed to stderr, only with --verbose. */
export function debug(msg: string): void {
  if (verbose) console.error(`  ${pc.dim(msg)}`);
}

export function heading(msg: string): void {
  console.log(`\n  ${pc.bold(msg)}`);
}

export function blank(): void {
  console.log();
}

export function muted(text: string): string {
  return pc.dim(text);
}

/** One line per entry, indented under the current heading. */
export function list(items: string[], marker = "-"): void {
  for (const item of items) info(`  ${marker} ${item}`);
}

export function cmd(command: string): string {
  return pc.bold(pc.cyan(command));
}

export function columns(name: string, detail: string, width = 20): string {
  return `${name.padEnd(width)} ${detail}`;
}
