export { AsyncQueue } from './async-queue'
export { WorkerBridge, BridgeNotRunningError } from './worker-bridge'
export { DispatchController, HandoffError } from './controller'
export { DispatchWorker } from './dispatch-worker'
export type { WorkerTask, WorkerBridgeOptions } from './worker-bridge'
export type { WorkerState, ActionOutcome, DispatchWorkerOptions } from './dispatch-worker'
