// Simple ANSI color utilities - no dependencies needed

const isColorSupported =
  process.env.NO_COLOR === undefined &&
  process.env.FORCE_COLOR !== "0" &&
  (process.env.FORCE_COLOR === "1" ||
    process.env.COLORTERM !== undefined ||
    (process.stdout.isTTY && process.env.TERM !== "dumb"));

function colorize(code: string, text: string): string {
  if (!isColorSupported) return text;
  return `\x1b[${code}m${text}\x1b[0m`;
}

export const colors = {
  red: (text: string) => colorize("31", text),
  green: (text: string) => colorize("32", text),
  cyan: (text: string) => colorize("36", text),
  gray: (text: string) => colorize("90", text),
  bold: (text: string) => colorize("1", text),
  dim: (text: string) => colorize("2", text),
};

const symbols = {
  check: isColorSupported ? "✔" : "[OK]",
  cross: isColorSupported ? "✖" : "[ERR]",
  info: isColorSupported ? "ℹ" : "[i]",
};

export function log(message: string): void {
  console.log(message);
}

export function success(message: string): void {
  console.log(`${colors.green(symbols.check)} ${message}`);
}

export function error(message: string): void {
  console.error(`${colors.red(symbols.cross)} ${message}`);
}

export function info(message: string): void {
  console.log(`${colors.cyan(symbols.info)} ${message}`);
}

export function title(text: string): void {
  console.log(`\n${colors.bold(colors.cyan(text))}`);
}

export function field(label: string, value: string): void {
  console.log(`  ${colors.gray(`${label}:`)} ${value}`);
}
