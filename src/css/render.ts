import type { Declaration, KeyframesBlock, StyleRule } from './types';
import { formatValue } from './values';

export type RenderOptions = {
  indent?: string;
  /**
   * Keep keyframe blocks inside the rule that owns them, as preprocessor
   * source would. Off by default: plain CSS only accepts top-level
   * `@keyframes`, so they are written before their rule.
   */
  nestKeyframes?: boolean;
};

const renderDeclarations = (
  declarations: readonly Declaration[],
  pad: string,
): string[] =>
  declarations.map((d) => `${pad}${d.property}: ${formatValue(d.value)};`);

export const renderKeyframes = (
  block: KeyframesBlock,
  indent = '  ',
  depth = 0,
): string => {
  const pad = indent.repeat(depth);
  const lines = [`${pad}@${block.vendorPrefix ?? ''}keyframes ${block.name} {`];
  for (const step of block.steps) {
    lines.push(`${pad}${indent}${step.percentage}% {`);
    lines.push(...renderDeclarations(step.declarations, pad + indent + indent));
    lines.push(`${pad}${indent}}`);
  }
  lines.push(`${pad}}`);
  return lines.join('\n');
};

const renderRule = (rule: StyleRule, indent: string, nestKeyframes: boolean): string[] => {
  const inner = renderDeclarations(rule.declarations, indent);
  if (nestKeyframes) {
    inner.push(...rule.keyframes.map((block) => renderKeyframes(block, indent, 1)));
    return inner.length === 0 ? [] : [`${rule.selector} {\n${inner.join('\n')}\n}`];
  }
  const blocks = rule.keyframes.map((block) => renderKeyframes(block, indent));
  if (inner.length > 0) blocks.push(`${rule.selector} {\n${inner.join('\n')}\n}`);
  return blocks;
};

export const renderStylesheet = (
  rules: readonly StyleRule[],
  options: RenderOptions = {},
): string => {
  const indent = options.indent ?? '  ';
  const blocks = rules.flatMap((rule) =>
    renderRule(rule, indent, options.nestKeyframes ?? false),
  );
  return blocks.length === 0 ? '' : `${blocks.join('\n\n')}\n`;
};
