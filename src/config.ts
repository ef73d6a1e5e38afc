import { Command } from 'commander'
import { z } from 'zod'
import { parseLogRotation, type LogRotation } from './logger'

export const VERSION = '0.1.0'

const LOG_LEVEL_ALIASES: Record<string, string> = {
  warning: 'warn',
  critical: 'error',
}

const ConfigSchema = z.object({
  host: z.string().min(1),
  port: z.coerce.number().int().min(1, 'only positive ports are permitted').max(65535),
  rulesFile: z.string().min(1),
  logLevel: z.preprocess(
    value => {
      if (typeof value !== 'string') return value
      const lower = value.toLowerCase()
      return LOG_LEVEL_ALIASES[lower] ?? lower
    },
    z.enum(['debug', 'info', 'warn', 'error'])
  ),
  logFile: z.string().min(1),
  logRotate: z.preprocess(
    value => (typeof value === 'string' ? value.toLowerCase() : value),
    z.enum(['size', 'time'])
  ),
  logRotateArg: z.string().optional(),
  quiet: z.boolean(),
  actionTimeoutMs: z.coerce.number().int().min(0),
}).transform(({ logRotate, logRotateArg, ...rest }, ctx) => {
  // without an argument the log file grows unbounded
  let logRotation: LogRotation | null = null
  if (logRotateArg !== undefined) {
    const parsed = parseLogRotation(logRotate, logRotateArg)
    if (typeof parsed === 'string') {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['logRotateArg'], message: parsed })
      return z.NEVER
    }
    logRotation = parsed
  }
  return { ...rest, logRotation }
})

export type Config = z.infer<typeof ConfigSchema>

export class ConfigError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'ConfigError'
  }
}

type CliOptions = {
  host?: string
  port?: string
  rules?: string
  logLevel?: string
  logFile?: string
  logRotate?: string
  logRotateArg?: string
  quiet?: boolean
  actionTimeout?: string
}

export function createProgram(): Command {
  return new Command()
    .name('webhook-runner')
    .description('Runs shell commands when matching GitLab webhooks arrive')
    .version(VERSION, '-v, --version')
    .option('--host <host>', 'listen to host (env HOST, default 0.0.0.0)')
    .option('-p, --port <port>', 'listen to port (env PORT, default 7777)')
    .option('-r, --rules <file>', 'YAML rule file (env RULES_FILE, default rules.yaml)')
    .option('--log-level <level>', 'debug, info, warn or error (env LOG_LEVEL, default warn)')
    .option('--log-file <target>', "'stdout', 'stderr' or a file path (env LOG_FILE, default stderr)")
    .option('--log-rotate <mode>', "rotate the log file by 'size' or 'time', ignored for stdout and stderr (env LOG_ROTATE, default size)")
    .option('--log-rotate-arg <arg>', "a size like 512k or 1m, or '[interval:]when' with when one of S, M, H, D or midnight, e.g. '3:H' (env LOG_ROTATE_ARG, no rotation when unset)")
    .option('-q, --quiet', 'run in silent mode, no log output is generated')
    .option('--action-timeout <ms>', 'terminate actions running longer than this, 0 disables (env ACTION_TIMEOUT_MS)')
    .exitOverride()
}

/**
 * Resolves the configuration from command-line flags, falling back to
 * environment variables and then to defaults.
 */
export function loadConfig(argv: readonly string[], env: NodeJS.ProcessEnv = process.env): Config {
  const program = createProgram()
  program.parse([...argv], { from: 'user' })
  const cli = program.opts<CliOptions>()

  const result = ConfigSchema.safeParse({
    host: cli.host ?? env.HOST ?? '0.0.0.0',
    port: cli.port ?? env.PORT ?? 7777,
    rulesFile: cli.rules ?? env.RULES_FILE ?? 'rules.yaml',
    logLevel: cli.logLevel ?? env.LOG_LEVEL ?? 'warn',
    logFile: cli.logFile ?? env.LOG_FILE ?? 'stderr',
    logRotate: cli.logRotate ?? env.LOG_ROTATE ?? 'size',
    logRotateArg: cli.logRotateArg ?? (env.LOG_ROTATE_ARG || undefined),
    quiet: cli.quiet ?? false,
    actionTimeoutMs: cli.actionTimeout ?? env.ACTION_TIMEOUT_MS ?? 0,
  })

  if (!result.success) {
    const message = result.error.issues
      .map(issue => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ')
    throw new ConfigError(`Invalid configuration: ${message}`)
  }

  return result.data
}
