import type { FrameSink } from "./types.js";

export const CLEAR_SCREEN = "\u001b[2J\u001b[H";

export interface TerminalSinkOptions {
  clear?: boolean;
}

export function createTerminalSink(
  write: (chunk: string) => void = (chunk) => {
    process.stdout.write(chunk);
  },
  options: TerminalSinkOptions = {}
): FrameSink<string> {
  const prefix = (options.clear ?? true) ? CLEAR_SCREEN : "";
  let previous: string | null = null;

  return {
    show(frame) {
      if (frame === previous) {
        return;
      }
      previous = frame;
      write(`${prefix}${frame}\n`);
    }
  };
}
