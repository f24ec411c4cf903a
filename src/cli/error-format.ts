/*
Purpose: render user-facing errors and per-package sync failures for CLI output.
Assumptions: stderr is the default stream; non-TTY output disables color.
Usage: console.error(renderCliError(err, { debug: isDebugEnabled }));
*/

import {
  createAnsiFormatter,
  formatErrorLines,
  resolveColorEnabled,
  type AnsiFormatter,
  type AnsiStyle,
  type ErrorFormatLine,
  type ErrorFormatLineKind,
} from "../core/error-format.js";
import type { SyncFailure } from "../app/orchestrator/package-orchestrator.js";

// =============================================================================
// TYPES
// =============================================================================

export type CliErrorFormatOptions = {
  debug?: boolean;
  useColor?: boolean;
  stream?: { isTTY?: boolean };
};

type LineLabel = {
  label: string;
  labelStyles: AnsiStyle[];
  textStyles: AnsiStyle[];
};

const LINE_LABELS: Partial<Record<ErrorFormatLineKind, LineLabel>> = {
  title: { label: "Error:", labelStyles: ["red", "bold"], textStyles: ["bold"] },
  hint: { label: "Hint:", labelStyles: ["yellow"], textStyles: [] },
  next: { label: "Next:", labelStyles: ["cyan"], textStyles: [] },
  code: { label: "Code:", labelStyles: ["dim"], textStyles: ["dim"] },
  name: { label: "Name:", labelStyles: ["dim"], textStyles: ["dim"] },
  cause: { label: "Cause:", labelStyles: ["dim"], textStyles: ["dim"] },
};

// =============================================================================
// OUTPUT
// =============================================================================

export function renderCliError(error: unknown, options: CliErrorFormatOptions = {}): string {
  const format = resolveFormatter(options);
  const lines = formatErrorLines(error, { mode: options.debug ? "debug" : "short" });
  return lines.map((line) => renderLine(line, format)).join("\n");
}

export function renderSyncFailure(
  packageName: string,
  failure: SyncFailure,
  options: CliErrorFormatOptions = {},
): string {
  const format = resolveFormatter(options);
  const retry = failure.retryable ? "retry later" : "fix the config before retrying";
  return `${format("x", ["red", "bold"])} ${packageName} ${format(`[${failure.kind}]`, ["red"])} ${
    failure.message
  } ${format(`(${retry})`, ["dim"])}`;
}

// =============================================================================
// INTERNALS
// =============================================================================

function resolveFormatter(options: CliErrorFormatOptions): AnsiFormatter {
  const stream = options.stream ?? process.stderr;
  return createAnsiFormatter(resolveColorEnabled({ stream, useColor: options.useColor }));
}

function renderLine(line: ErrorFormatLine, format: AnsiFormatter): string {
  if (line.kind === "stack") {
    return `${format("Stack:", ["dim"])}\n${format(indentMultiline(line.text, 2), ["dim"])}`;
  }

  const label = LINE_LABELS[line.kind];
  if (!label) return line.text;

  const text = label.textStyles.length > 0 ? format(line.text, label.textStyles) : line.text;
  return `${format(label.label, label.labelStyles)} ${text}`;
}

function indentMultiline(value: string, spaces: number): string {
  const prefix = " ".repeat(Math.max(0, spaces));
  return value
    .split("\n")
    .map((line) => `${prefix}${line}`)
    .join("\n");
}
