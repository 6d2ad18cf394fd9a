/**
 * Reporting capability passed through the call chain.
 *
 * Core modules never write to the console themselves; the CLI hands them a
 * ConsoleReporter and tests hand them a RecordingReporter.
 */

export type Severity = "info" | "success" | "warn" | "error";

export interface Reporter {
  /** Print a message with the given severity. */
  message(severity: Severity, text: string): void;
  info(text: string): void;
  success(text: string): void;
  warn(text: string): void;
  error(text: string): void;
  /** Report overall progress, 0–100. Purely cosmetic. */
  progress(percent: number, label?: string): void;
  /** Show a labelled version in a box. */
  panel(label: string, value: string): void;
}

const ICONS: Record<Severity, string> = {
  info: "ℹ️ ",
  success: "✅",
  warn: "⚠️ ",
  error: "❌",
};

abstract class BaseReporter implements Reporter {
  abstract message(severity: Severity, text: string): void;
  abstract progress(percent: number, label?: string): void;
  abstract panel(label: string, value: string): void;

  info(text: string): void {
    this.message("info", text);
  }

  success(text: string): void {
    this.message("success", text);
  }

  warn(text: string): void {
    this.message("warn", text);
  }

  error(text: string): void {
    this.message("error", text);
  }
}

export class ConsoleReporter extends BaseReporter {
  message(severity: Severity, text: string): void {
    const line = `${ICONS[severity]} ${text}`;
    if (severity === "error") console.error(line);
    else if (severity === "warn") console.warn(line);
    else console.log(line);
  }

  progress(percent: number, label?: string): void {
    const pct = String(clampPercent(percent)).padStart(3, " ");
    console.log(`[${pct}%]${label ? ` ${label}` : ""}`);
  }

  panel(label: string, value: string): void {
    console.log(formatPanel(label, value));
  }
}

export type ReportEntry =
  | { type: "message"; severity: Severity; text: string }
  | { type: "progress"; percent: number; label?: string }
  | { type: "panel"; label: string; value: string };

/** Keeps everything in memory; used by tests and by callers that want a transcript. */
export class RecordingReporter extends BaseReporter {
  readonly entries: ReportEntry[] = [];

  message(severity: Severity, text: string): void {
    this.entries.push({ type: "message", severity, text });
  }

  progress(percent: number, label?: string): void {
    this.entries.push({ type: "progress", percent: clampPercent(percent), label });
  }

  panel(label: string, value: string): void {
    this.entries.push({ type: "panel", label, value });
  }

  messages(severity?: Severity): string[] {
    const out: string[] = [];
    for (const entry of this.entries) {
      if (entry.type !== "message") continue;
      if (severity && entry.severity !== severity) continue;
      out.push(entry.text);
    }
    return out;
  }
}

export function clampPercent(percent: number): number {
  return Math.max(0, Math.min(100, Math.round(percent)));
}

/**
 * Render a one-line boxed panel.
 * Pure function, no side effects.
 */
export function formatPanel(label: string, value: string): string {
  const content = ` ${label}: ${value} `;
  const rule = "─".repeat(content.length);
  return [`┌${rule}┐`, `│${content}│`, `└${rule}┘`].join("\n");
}
