export { ConditionEvaluator, InvalidExpressionError } from './condition-evaluator'
export { Rule } from './rule'
export { EventRouter, toMatchData } from './event-router'
export { loadRules, loadRulesFromFile, RuleFileError } from './rule-loader'
export type { ConditionNode, ConditionDescription, MatchData } from './condition-evaluator'
export type { RuleDescription } from './rule'
export type { MatchedRule } from './event-router'
export type { RuleLoadResult, RuleLoadError } from './rule-loader'
