/**
 * Build log classification
 *
 * Every line of build output is tagged with a severity the display layer
 * colours by. Rules are checked in order; the first match wins.
 */

export type Severity = "stage" | "error" | "warning" | "normal" | "input";

export interface LogLine {
  readonly text: string;
  readonly severity: Severity;
}

const ERROR_MARKERS = ["error:", "ERROR", "FAILED"];
const WARNING_MARKERS = ["warning:", "WARNING"];

export function classifyLine(text: string): Exclude<Severity, "input"> {
  if (text.startsWith("==>")) return "stage";
  if (ERROR_MARKERS.some((marker) => text.includes(marker))) return "error";
  if (WARNING_MARKERS.some((marker) => text.includes(marker))) return "warning";
  return "normal";
}

export function logLine(text: string, severity: Severity = classifyLine(text)): LogLine {
  return Object.freeze({ text, severity });
}

export function exitSummary(code: number): LogLine {
  return logLine(`==> Build finished with exit code ${code}`, code === 0 ? "stage" : "error");
}

/**
 * Append-only build transcript
 */
export class BuildLog {
  private entries: LogLine[] = [];

  get lines(): readonly LogLine[] {
    return this.entries;
  }

  get length(): number {
    return this.entries.length;
  }

  push(text: string): LogLine {
    const line = logLine(text);
    this.entries.push(line);
    return line;
  }

  pushInput(text: string): LogLine {
    const line = logLine(`> ${text}`, "input");
    this.entries.push(line);
    return line;
  }

  pushNote(text: string, severity: Severity): LogLine {
    const line = logLine(text, severity);
    this.entries.push(line);
    return line;
  }

  exit(code: number): LogLine {
    const line = exitSummary(code);
    this.entries.push(line);
    return line;
  }

  clear(): void {
    this.entries = [];
  }
}
