/**
 * Output rendering helpers
 */

type Color = "red" | "green" | "yellow";

/**
 * Print JSON to stdout
 * @param data - Data to serialize
 * @param options - Rendering options
 */
export function printJson(data: unknown, options?: { raw?: boolean }): void {
  const json = options?.raw ? JSON.stringify(data) : JSON.stringify(data, null, 2);
  console.log(json);
}

/**
 * Print lines to stdout (one per line)
 */
export function printLines(lines: string[]): void {
  lines.forEach((line) => console.log(line));
}

/**
 * Render a number for plain-text output
 */
export function formatNumber(value: number): string {
  return Object.is(value, -0) ? "0" : String(value);
}

/**
 * Left-align rows into padded columns
 */
export function formatColumns(rows: string[][], gap = 2): string[] {
  const widths: number[] = [];
  for (const row of rows) {
    row.forEach((cell, i) => {
      widths[i] = Math.max(widths[i] ?? 0, cell.length);
    });
  }

  return rows.map((row) =>
    row
      .map((cell, i) => (i === row.length - 1 ? cell : cell.padEnd((widths[i] ?? 0) + gap)))
      .join("")
  );
}

/**
 * Apply ANSI color only if output stream is a TTY
 */
export function colorize(
  text: string,
  color: Color,
  stream: NodeJS.WriteStream = process.stdout
): string {
  if (!(stream.isTTY ?? false)) {
    return text;
  }

  const codes: Record<Color, string> = {
    red: "\x1b[31m",
    green: "\x1b[32m",
    yellow: "\x1b[33m",
  };

  const reset = "\x1b[0m";
  return `${codes[color]}${text}${reset}`;
}
