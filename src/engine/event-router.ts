import type { MatchData } from './condition-evaluator'
import type { Rule } from './rule'
import { getHeader, type WebhookRequest } from '../parser/webhook-request'
import { logger, type LoggerInterface } from '../logger'

export interface MatchedRule {
  rule: Rule
  /** 1-based position in the rule file */
  index: number
}

/**
 * The view of a request that conditions are evaluated against. Headers that
 * are absent leave their key out.
 */
export function toMatchData(request: WebhookRequest): MatchData {
  const data: Record<string, string> = { path: request.path }
  const fields: Array<[string, string]> = [
    ['gitlab_token', 'X-Gitlab-Token'],
    ['gitlab_event', 'X-Gitlab-Event'],
    ['gitlab_host', 'Host'],
  ]
  for (const [key, header] of fields) {
    const value = getHeader(request.headers, header)
    if (value !== undefined) {
      data[key] = value
    }
  }
  return data
}

export class EventRouter {
  constructor(private readonly rules: readonly Rule[]) {}

  get size(): number {
    return this.rules.length
  }

  /**
   * Yields matching rules in declaration order. Evaluation is lazy, so the
   * next rule is only evaluated once the caller asks for it. A rule that
   * throws while matching is logged and treated as not matching.
   */
  *matches(request: WebhookRequest, log: LoggerInterface = logger): Generator<MatchedRule> {
    const data = toMatchData(request)

    for (let i = 0; i < this.rules.length; i++) {
      const rule = this.rules[i]
      const index = i + 1
      let isMatch: boolean
      try {
        isMatch = rule.matches(data)
      } catch (error) {
        log.error(`Rule evaluation failed for rule ${index}:`, error)
        continue
      }
      if (isMatch) {
        yield { rule, index }
      }
    }
  }
}
