export { buildHeaders, cloneRequest, getHeader, pairRawHeaders } from './webhook-request'
export type { HeaderMap, WebhookRequest } from './webhook-request'
