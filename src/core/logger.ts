export type ValueAdjustment = {
  parameter: string;
  given: number;
  used: number;
  reason: string;
};

export type StyleLogger = {
  onValueAdjusted: (source: string, adjustment: ValueAdjustment) => void;
  onRulesGenerated: (source: string, ruleCount: number, names: readonly string[]) => void;
};

export const createStyleLogger = (): StyleLogger => ({
  onValueAdjusted: (source, adjustment) => {
    console.warn(`${source}: ${adjustment.parameter} ${adjustment.reason}`, adjustment);
  },
  onRulesGenerated: (source, ruleCount, names) => {
    console.debug('Style rules generated', { source, ruleCount, names });
  },
});

export const silentStyleLogger: StyleLogger = {
  onValueAdjusted: () => undefined,
  onRulesGenerated: () => undefined,
};

export const defaultStyleLogger: StyleLogger = createStyleLogger();
