export const keyframesText = (
  atRule: string,
  name: string,
  property: string,
  steps: readonly (readonly [number, string])[],
): string =>
  [
    `${atRule} ${name} {`,
    ...steps.flatMap(([percentage, value]) => [
      `  ${percentage}% {`,
      `    ${property}: ${value};`,
      '  }',
    ]),
    '}',
  ].join('\n');

export const ruleText = (selector: string, declarations: readonly string[]): string =>
  [`${selector} {`, ...declarations.map((d) => `  ${d};`), '}'].join('\n');

export const stylesheetText = (blocks: readonly string[]): string => `${blocks.join('\n\n')}\n`;
