/**
 * Boolean conditions over flat string maps.
 *
 * A condition description is either a literal string (`key = value`,
 * `key != value`, `key ~= regex`, `key !~= regex`) or a single-key mapping
 * whose key is `any`, `all` or `not` and whose value is a list of nested
 * descriptions:
 *
 * ```yaml
 * any:
 *   - akane != kun
 *   - all:
 *       - genma = san
 *       - nabiki ~= tendou?
 * ```
 */

export type LiteralOperator = '=' | '!=' | '~=' | '!~='

export type ConditionDescription = string | { [kind: string]: ConditionDescription[] }

export interface LiteralNode {
  readonly kind: 'literal'
  readonly expression: string
  readonly lhs: string
  readonly operator: LiteralOperator
  readonly rhs: string
}

export interface NotNode {
  readonly kind: 'not'
  readonly children: readonly [ConditionNode]
}

export interface AllNode {
  readonly kind: 'all'
  readonly children: readonly ConditionNode[]
}

export interface AnyNode {
  readonly kind: 'any'
  readonly children: readonly ConditionNode[]
}

export type ConditionNode = LiteralNode | NotNode | AllNode | AnyNode

export type MatchData = Readonly<Record<string, string | undefined>>

export class InvalidExpressionError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'InvalidExpressionError'
  }
}

const LITERAL_PATTERN = /^(\w[\w\s]*)(=|!=|~=|!~=)(.*)$/

function describe(value: unknown): string {
  try {
    return JSON.stringify(value) ?? String(value)
  } catch {
    return String(value)
  }
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function isOperator(value: string): value is LiteralOperator {
  return value === '=' || value === '!=' || value === '~=' || value === '!~='
}

export class ConditionEvaluator {
  static literal(expression: string): LiteralNode {
    const match = expression.match(LITERAL_PATTERN)
    if (!match || !isOperator(match[2])) {
      throw new InvalidExpressionError(`${describe(expression)} is not a valid key<OP>value expression`)
    }
    const node: LiteralNode = {
      kind: 'literal',
      expression,
      lhs: match[1],
      operator: match[2],
      rhs: match[3],
    }
    return Object.freeze(node)
  }

  static not(child: ConditionNode): NotNode {
    const node: NotNode = { kind: 'not', children: Object.freeze([child] as const) }
    return Object.freeze(node)
  }

  static all(children: ConditionNode[]): AllNode {
    const node: AllNode = { kind: 'all', children: Object.freeze([...children]) }
    return Object.freeze(node)
  }

  static any(children: ConditionNode[]): AnyNode {
    const node: AnyNode = { kind: 'any', children: Object.freeze([...children]) }
    return Object.freeze(node)
  }

  static parse(description: unknown): ConditionNode {
    if (typeof description === 'string') {
      return this.literal(description)
    }

    if (!isPlainObject(description)) {
      throw new InvalidExpressionError(`${describe(description)} needs to be either a string or a mapping`)
    }

    const keys = Object.keys(description)
    if (keys.length !== 1) {
      throw new InvalidExpressionError('mapping must have exactly one key')
    }

    const key = keys[0]
    const value = description[key]

    switch (key.toLowerCase()) {
      case 'not':
        if (!Array.isArray(value)) {
          throw new InvalidExpressionError('NOT operand expects a list')
        }
        if (value.length !== 1) {
          throw new InvalidExpressionError('NOT operand expects only one element in the list')
        }
        return this.not(this.parse(value[0]))
      case 'any':
        if (!Array.isArray(value)) {
          throw new InvalidExpressionError('ANY operand expects a list')
        }
        return this.any(value.map(item => this.parse(item)))
      case 'all':
        if (!Array.isArray(value)) {
          throw new InvalidExpressionError('ALL operand expects a list')
        }
        return this.all(value.map(item => this.parse(item)))
      default:
        throw new InvalidExpressionError(`${describe(key)} is not a valid operand`)
    }
  }

  /**
   * Evaluates `node` against `data`. A literal whose key is missing from
   * `data` is false. Throws a `SyntaxError` when a `~=`/`!~=` pattern is not
   * a valid regular expression.
   */
  static evaluate(node: ConditionNode, data: MatchData): boolean {
    switch (node.kind) {
      case 'literal':
        return this.evaluateLiteral(node, data)
      case 'not':
        return !this.evaluate(node.children[0], data)
      case 'all':
        return node.children.every(child => this.evaluate(child, data))
      case 'any':
        return node.children.some(child => this.evaluate(child, data))
    }
  }

  static serialize(node: ConditionNode): ConditionDescription {
    if (node.kind === 'literal') {
      return node.expression
    }
    return { [node.kind]: node.children.map(child => this.serialize(child)) }
  }

  private static evaluateLiteral(node: LiteralNode, data: MatchData): boolean {
    const key = node.lhs.trim()
    if (!Object.prototype.hasOwnProperty.call(data, key)) {
      return false
    }
    const stored = data[key]
    if (stored === undefined) {
      return false
    }

    const value = stored.trim()
    const operand = node.rhs.trim()

    switch (node.operator) {
      case '=':
        return value === operand
      case '!=':
        return value !== operand
      case '~=':
        return matchesFromStart(operand, value)
      case '!~=':
        return !matchesFromStart(operand, value)
    }
  }
}

// sticky flag anchors the match at index 0 without requiring a full match
function matchesFromStart(pattern: string, value: string): boolean {
  return new RegExp(pattern, 'y').test(value)
}
