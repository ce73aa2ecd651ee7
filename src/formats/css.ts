import type { KeyframeRule, StyleOutput } from "../types/cel.js";
import type { StyleFormatter } from "../cli-output.js";

export const DEFAULT_PRECISION = 4;

export type CssRenderOptions = {
  /** Decimal places kept for percentages and seconds */
  precision?: number;
};

type CssFormatterOptions = CssRenderOptions & {
  write?: (text: string) => void;
};

/** Round and drop trailing zeros: 33.333333 -> "33.3333", 0.6000000000000001 -> "0.6" */
export function formatNumber(value: number, precision: number = DEFAULT_PRECISION): string {
  return String(Number(value.toFixed(precision)));
}

function block(selector: string, declarations: string[]): string {
  const body = declarations.map((declaration) => `  ${declaration};`).join("\n");
  return `${selector} {\n${body}\n}`;
}

function renderKeyframes(rule: KeyframeRule, precision: number): string {
  const appear = formatNumber(rule.appearAt, precision);
  const disappear = formatNumber(rule.disappearAt, precision);
  return [
    `@keyframes ${rule.id} {`,
    `  ${appear}% { opacity: 1; }`,
    `  ${disappear}% { opacity: 0; }`,
    `}`,
  ].join("\n");
}

/**
 * Render generator output as a stylesheet. The shared rule for all children
 * comes first so the per-child rules after it take over `animation-name`.
 */
export function renderCss(output: StyleOutput, options: CssRenderOptions = {}): string {
  const precision = options.precision ?? DEFAULT_PRECISION;
  const { selector, shared } = output;

  const sharedDeclarations = [
    "opacity: 0",
    `animation-duration: ${formatNumber(shared.duration, precision)}s`,
    `animation-timing-function: ${shared.timingFunction}`,
    `animation-iteration-count: ${shared.iterationCount}`,
  ];
  if (shared.direction) {
    sharedDeclarations.push(`animation-direction: ${shared.direction}`);
  }

  const sections = [block(`${selector} > *`, sharedDeclarations)];

  for (const rule of output.keyframes) {
    sections.push(renderKeyframes(rule, precision));
  }

  for (const binding of output.bindings) {
    sections.push(block(`${selector} > :nth-child(${binding.index})`, [`animation-name: ${binding.ruleId}`]));
  }

  return sections.join("\n\n") + "\n";
}

export function createCssFormatter(options: CssFormatterOptions = {}): StyleFormatter {
  const write = options.write ?? ((text: string) => process.stdout.write(text));
  return {
    format: (output) => write(renderCss(output, options)),
  };
}
