/**
 * ANSI Formatting Utilities
 *
 * Escape codes for level tags and status marks. Each output stream decides
 * on its own: colors are dropped when NO_COLOR is set or the stream is not a
 * TTY, so `spawn x | cat` gets plain text even from an interactive terminal.
 */

export const RESET = "\x1b[0m";
export const DIM = "\x1b[2m";

export const GREEN = "\x1b[32m";
export const YELLOW = "\x1b[33m";
export const CYAN = "\x1b[36m";

export type OutputStream = "stdout" | "stderr";

export interface Palette {
  dim(text: string): string;
  green(text: string): string;
  yellow(text: string): string;
  cyan(text: string): string;
}

const colorEnabled: Record<OutputStream, boolean> = {
  stdout: !process.env.NO_COLOR && process.stdout.isTTY === true,
  stderr: !process.env.NO_COLOR && process.stderr.isTTY === true,
};

/**
 * Force colors on or off, for one stream or (by default) both
 */
export function setColorEnabled(enabled: boolean, stream?: OutputStream): void {
  if (stream) {
    colorEnabled[stream] = enabled;
  } else {
    colorEnabled.stdout = enabled;
    colorEnabled.stderr = enabled;
  }
}

/**
 * Color helpers for text written to `stream`
 */
export function palette(stream: OutputStream): Palette {
  const wrap = (code: string, text: string): string =>
    colorEnabled[stream] ? `${code}${text}${RESET}` : text;

  return {
    dim: (text) => wrap(DIM, text),
    green: (text) => wrap(GREEN, text),
    yellow: (text) => wrap(YELLOW, text),
    cyan: (text) => wrap(CYAN, text),
  };
}

// Diagnostics go to stderr
export const { dim, cyan } = palette("stderr");
