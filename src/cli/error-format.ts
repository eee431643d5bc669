/*
Purpose: render fatal reaper errors for the terminal.
Assumptions: output goes to stderr; color only when that stream is a TTY.
Usage: console.error(renderCliError(err, { debug }));
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

// =============================================================================
// TYPES
// =============================================================================

export type CliErrorFormatOptions = {
  debug?: boolean;
  useColor?: boolean;
  stream?: { isTTY?: boolean };
};

type LineStyle = {
  label: string | null;
  labelStyles: AnsiStyle[];
  textStyles: AnsiStyle[];
  block?: boolean;
};

const LINE_STYLES: Record<ErrorFormatLineKind, LineStyle> = {
  title: { label: "Error:", labelStyles: ["red", "bold"], textStyles: ["bold"] },
  message: { label: null, labelStyles: [], textStyles: [] },
  hint: { label: "Hint:", labelStyles: ["yellow"], textStyles: [] },
  next: { label: "Next:", labelStyles: ["cyan"], textStyles: [] },
  code: { label: "Code:", labelStyles: ["dim"], textStyles: ["dim"] },
  name: { label: "Name:", labelStyles: ["dim"], textStyles: ["dim"] },
  cause: { label: "Cause:", labelStyles: ["dim"], textStyles: ["dim"] },
  stack: { label: "Stack:", labelStyles: ["dim"], textStyles: ["dim"], block: true },
};

// =============================================================================
// OUTPUT
// =============================================================================

export function renderCliError(error: unknown, options: CliErrorFormatOptions = {}): string {
  const lines = formatErrorLines(error, { mode: options.debug ? "debug" : "short" });
  const useColor = resolveColorEnabled({
    stream: options.stream ?? process.stderr,
    useColor: options.useColor,
  });
  const format = createAnsiFormatter(useColor);

  return lines.map((line) => renderLine(line, format)).join("\n");
}

// =============================================================================
// INTERNALS
// =============================================================================

function renderLine(line: ErrorFormatLine, format: AnsiFormatter): string {
  const style = LINE_STYLES[line.kind];
  if (!style.label) {
    return format(line.text, style.textStyles);
  }

  const label = format(style.label, style.labelStyles);
  if (style.block) {
    const indented = line.text
      .split("\n")
      .map((text) => `  ${text}`)
      .join("\n");
    return `${label}\n${format(indented, style.textStyles)}`;
  }

  return `${label} ${format(line.text, style.textStyles)}`;
}
