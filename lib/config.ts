export interface ManualInputConfig {
  manualEbit?: string; // DCF_MANUAL_EBIT
  nonInteractive: boolean; // DCF_NON_INTERACTIVE
}

const isTruthy = (value: string | undefined) => value === '1' || value?.toLowerCase() === 'true';

export const getManualInputConfig = (env: NodeJS.ProcessEnv = process.env): ManualInputConfig => {
  const manualEbit = env.DCF_MANUAL_EBIT?.trim();
  return {
    manualEbit: manualEbit ? manualEbit : undefined,
    nonInteractive: isTruthy(env.DCF_NON_INTERACTIVE),
  };
};
