import { readFile } from 'node:fs/promises'
import { parse } from 'yaml'
import { z } from 'zod'
import { logger, type LoggerInterface } from '../logger'
import { Rule } from './rule'

const RuleDescriptionSchema = z.object({
  condition: z.unknown().refine(value => value !== undefined, { message: 'condition is required' }),
  action: z.string().refine(value => value.trim().length > 0, { message: 'action must be a non-empty string' }),
})

export class RuleFileError extends Error {
  constructor(message: string, readonly filePath?: string) {
    super(filePath ? `${filePath}: ${message}` : message)
    this.name = 'RuleFileError'
  }
}

export interface RuleLoadError {
  index: number
  message: string
}

export interface RuleLoadResult {
  rules: Rule[]
  errors: RuleLoadError[]
}

function errorMessage(error: unknown): string {
  if (error instanceof z.ZodError) {
    return error.issues.map(issue => {
      const path = issue.path.join('.')
      return path ? `${path}: ${issue.message}` : issue.message
    }).join('; ')
  }
  return error instanceof Error ? error.message : String(error)
}

/**
 * Builds rules from a parsed rule document. A single mapping counts as a
 * one-rule list. Invalid entries are logged and skipped; `index` in the
 * returned errors is 1-based.
 */
export function loadRules(input: unknown, log: LoggerInterface = logger): RuleLoadResult {
  const rules: Rule[] = []
  const errors: RuleLoadError[] = []

  if (input === null || input === undefined) {
    errors.push({ index: 0, message: 'rule document is empty' })
    log.error('Rule document is empty')
    return { rules, errors }
  }

  const entries: unknown[] = Array.isArray(input)
    ? input
    : typeof input === 'object'
      ? [input]
      : []

  if (entries.length === 0 && !Array.isArray(input)) {
    errors.push({ index: 0, message: 'rule document must be a mapping or a list of mappings' })
    log.error('Rule document must be a mapping or a list of mappings')
    return { rules, errors }
  }

  entries.forEach((entry, i) => {
    const index = i + 1
    try {
      const description = RuleDescriptionSchema.parse(entry)
      rules.push(Rule.fromDescription({ condition: description.condition, action: description.action }))
    } catch (error) {
      const message = errorMessage(error)
      errors.push({ index, message })
      log.error(`Invalid rule ${index}, skipping it: ${message}`)
    }
  })

  log.info(`Loaded ${rules.length} rule(s), ${errors.length} rejected`)
  return { rules, errors }
}

export async function loadRulesFromFile(filePath: string, log: LoggerInterface = logger): Promise<RuleLoadResult> {
  let content: string
  try {
    content = await readFile(filePath, 'utf8')
  } catch (error) {
    throw new RuleFileError(`cannot read rule file: ${errorMessage(error)}`, filePath)
  }

  let parsed: unknown
  try {
    parsed = parse(content)
  } catch (error) {
    throw new RuleFileError(`YAML syntax error: ${errorMessage(error)}`, filePath)
  }

  return loadRules(parsed, log)
}
