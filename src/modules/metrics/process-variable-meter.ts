/**
 * ProcessVariableMeter: measures how close the codebase is to the goal.
 */

import type { MetricsSettings } from '../config/config-schema.js'
import { createLogger } from '../../utils/logger.js'
import { computeProcessVariable, requirementsCoverage, testPassRate, textSimilarity } from './components.js'
import { StaticLintProvider } from './lint-provider.js'
import { extractCodebaseText } from './text.js'
import type { LintProvider, MeasureParams, Measurement } from './types.js'

const logger = createLogger('metrics')

export interface ProcessVariableMeter {
  measure(params: MeasureParams): Promise<Measurement>
}

export interface ProcessVariableMeterOptions {
  settings: MetricsSettings
  lintProvider?: LintProvider
}

export class ProcessVariableMeterImpl implements ProcessVariableMeter {
  private readonly _settings: MetricsSettings
  private readonly _lint: LintProvider

  constructor(options: ProcessVariableMeterOptions) {
    this._settings = options.settings
    this._lint = options.lintProvider ?? new StaticLintProvider()
  }

  async measure(params: MeasureParams): Promise<Measurement> {
    const text = await extractCodebaseText(params.codebasePath, this._settings.max_codebase_chars)
    const components = {
      similarity: textSimilarity(params.goal, text),
      testPassRate: testPassRate(params.testResults),
      lintScore: await this._lint.score(params.codebasePath),
      reqCoverage: requirementsCoverage(params.goal, text),
    }
    const pv = computeProcessVariable(components, this._settings.weights)
    logger.info({ ...components, pv }, 'Process variable measured')
    return { pv, components }
  }
}

export function createProcessVariableMeter(options: ProcessVariableMeterOptions): ProcessVariableMeter {
  return new ProcessVariableMeterImpl(options)
}
