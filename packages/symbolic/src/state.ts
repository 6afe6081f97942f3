import { createLogger, type EngineSettings, type Logger } from "@symcalc/core";

/**
 * Per-request evaluation state. `precision` starts at the configured value
 * and only grows, when a literal carries more significant digits.
 */
export interface EvaluationState {
  readonly settings: EngineSettings;
  precision: number;
  readonly log: Logger;
}

export function createEvaluationState(settings: EngineSettings): EvaluationState {
  return {
    settings,
    precision: settings.precision,
    log: createLogger("eval", settings.debug),
  };
}
