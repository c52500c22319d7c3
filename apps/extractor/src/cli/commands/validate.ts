import { loggers } from '../../config/logger.js'
import { loadRunConfig } from '../../config/run-config.js'
import { describeStrategy } from '../../engine/evaluators.js'
import { SAMPLE_FIELDS_PATH, loadFieldConfig } from '../../engine/field-config.js'
import type { FieldSpec } from '../../engine/types.js'
import { EXIT_CODES, type ExitCode } from '../exit-codes.js'

export interface ValidateCommandArgs {
  configPath?: string
  fieldsPath?: string
}

export function describeField(field: FieldSpec): string[] {
  const lines = [field.name]
  field.strategies.forEach((strategy, index) => {
    lines.push(`  ${index + 1}. ${describeStrategy(strategy)}`)
  })
  if (field.transforms.length > 0) {
    lines.push(`  transform: ${field.transforms.map(step => step.kind).join(' -> ')}`)
  }
  return lines
}

/**
 * Load both configurations without rendering anything. Errors propagate as
 * ConfigurationError; warnings are logged.
 */
export async function runValidateCommand(args: ValidateCommandArgs): Promise<ExitCode> {
  const loaded = loadRunConfig(args.configPath)
  for (const warning of loaded.warnings) {
    loggers.config.warn(warning, { config: args.configPath })
  }

  const fields = loadFieldConfig(args.fieldsPath || SAMPLE_FIELDS_PATH)

  for (const field of fields) {
    for (const line of describeField(field)) {
      console.log(line)
    }
  }
  console.log('')
  console.log(`OK: ${fields.length} field(s), formats ${loaded.config.formats.join(', ')}`)

  return EXIT_CODES.OK
}
