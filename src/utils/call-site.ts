/**
 * Call-site capture from V8 stack traces
 */

/** Source location of a log call */
export interface CallSite {
  module: string;
  function: string;
  line: number;
}

const UNKNOWN_CALL_SITE: CallSite = { module: "", function: "", line: 0 };

/** "at fn (file:line:col)" or "at file:line:col" */
const FRAME_PATTERN = /^\s*at (?:(.+?) \()?(.+?):(\d+):\d+\)?$/;

/** Module name of a file path or URL: its base name without extension */
function moduleName(location: string): string {
  const path = location.replace(/[?#].*$/, "");
  const base = path.split(/[\\/]/).pop() ?? "";
  const dot = base.lastIndexOf(".");
  return dot > 0 ? base.slice(0, dot) : base;
}

/** Parse one stack frame line; undefined if the line is not a frame */
export function parseFrame(frame: string): CallSite | undefined {
  const match = FRAME_PATTERN.exec(frame);
  if (!match) return undefined;
  const [, fn = "", location = "", line = "0"] = match;
  return {
    module: moduleName(location),
    function: fn.replace(/^async /, ""),
    line: Number.parseInt(line, 10),
  };
}

/** Stack frame lines of a stack trace, without the leading message line */
export function stackFrames(stack: string | undefined): string[] {
  if (!stack) return [];
  return stack.split("\n").filter((line) => /^\s*at /.test(line));
}

/** First call site in a stack trace */
export function parseCallSite(stack: string | undefined): CallSite {
  for (const frame of stackFrames(stack)) {
    const site = parseFrame(frame);
    if (site) return site;
  }
  return { ...UNKNOWN_CALL_SITE };
}

/**
 * Capture the stack of whoever called `boundary`. Frames from `boundary`
 * inward are left out.
 */
export function captureStack(boundary: (...args: never[]) => unknown): string | undefined {
  const holder: { stack?: string } = {};
  Error.captureStackTrace(holder, boundary);
  return holder.stack;
}
