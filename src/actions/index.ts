export { executeAction, headerEnvironment, ENV_PREFIX } from './shell-action'
export type { ActionResult, ExecuteOptions } from './shell-action'
