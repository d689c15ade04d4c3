import type { GlobalOptions } from '../args.js'
import type { AppConfig } from '../../config/config-types.js'
import type { ConfigSource } from '../../config/config-loader.js'
import { createFormatter } from '../output.js'

interface ConfigResult {
  success: boolean
  source: ConfigSource
  config: AppConfig
  formatted?: string
}

export const buildConfigResult = (
  options: GlobalOptions,
  config: AppConfig,
  source: ConfigSource
): ConfigResult => {
  const result: ConfigResult = { success: true, source, config }

  if (options.format === 'text') {
    result.formatted = [
      `Page size: ${config.display.pageSize}`,
      `Currency:  ${config.display.currencySymbol}`,
      `Source:    ${source}`,
    ].join('\n')
  }

  return result
}

export const configCommand = (options: GlobalOptions, config: AppConfig, source: ConfigSource): void => {
  const formatter = createFormatter(options.format, options.quiet)
  const result = buildConfigResult(options, config, source)
  formatter.success(result.formatted ?? result)
}
