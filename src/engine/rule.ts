import { ConditionEvaluator, type ConditionDescription, type ConditionNode, type MatchData } from './condition-evaluator'

export interface RuleDescription {
  condition: unknown
  action: string
}

/**
 * A condition paired with the shell command to run when it holds. The action
 * is stored as given and never interpreted here.
 */
export class Rule {
  constructor(
    readonly condition: ConditionNode,
    readonly action: string
  ) {
    Object.freeze(this)
  }

  static fromDescription(description: RuleDescription): Rule {
    return new Rule(ConditionEvaluator.parse(description.condition), description.action)
  }

  matches(data: MatchData): boolean {
    return ConditionEvaluator.evaluate(this.condition, data)
  }

  toDescription(): { condition: ConditionDescription; action: string } {
    return {
      condition: ConditionEvaluator.serialize(this.condition),
      action: this.action,
    }
  }
}
