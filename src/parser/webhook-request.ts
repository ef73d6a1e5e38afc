export type HeaderMap = Record<string, string>

/**
 * One webhook delivery as received by the HTTP acceptor. Header names keep
 * the case the sender used.
 */
export interface WebhookRequest {
  traceId: string
  clientAddress: string
  path: string
  requestLine: string
  headers: HeaderMap
  body: Buffer | null
}

// no prototype, so a header called `__proto__` is stored like any other
function emptyHeaderMap(): HeaderMap {
  return Object.create(null)
}

/**
 * Collapses `[name, value]` pairs into an ordered header map. Names compare
 * case-insensitively and the last value wins, under the last spelling seen.
 */
export function buildHeaders(pairs: Iterable<readonly [string, string]>): HeaderMap {
  const headers = emptyHeaderMap()
  const spelling = new Map<string, string>()

  for (const [name, value] of pairs) {
    const lower = name.toLowerCase()
    const previous = spelling.get(lower)
    if (previous !== undefined) {
      delete headers[previous]
    }
    spelling.set(lower, name)
    headers[name] = value
  }

  return headers
}

/** Pairs up Node's flat `rawHeaders` list. */
export function pairRawHeaders(rawHeaders: readonly string[]): Array<[string, string]> {
  const pairs: Array<[string, string]> = []
  for (let i = 0; i + 1 < rawHeaders.length; i += 2) {
    pairs.push([rawHeaders[i], rawHeaders[i + 1]])
  }
  return pairs
}

export function getHeader(headers: HeaderMap, name: string): string | undefined {
  const lower = name.toLowerCase()
  for (const [key, value] of Object.entries(headers)) {
    if (key.toLowerCase() === lower) return value
  }
  return undefined
}

export function cloneRequest(request: WebhookRequest): WebhookRequest {
  return {
    ...request,
    headers: Object.assign(emptyHeaderMap(), request.headers),
    body: request.body ? Buffer.from(request.body) : null,
  }
}
