import { OpenAPIHono, createRoute } from '@hono/zod-openapi'
import type { HttpBindings } from '@hono/node-server'
import type { DispatchController } from './dispatch'
import { buildHeaders, pairRawHeaders, type WebhookRequest } from './parser'
import { createEventTraceId, createLoggerWithTrace } from './logger'

function pathFromUrl(href: string): string {
  const url = new URL(href)
  return url.pathname + url.search
}

// `incoming` is missing when the app is driven through `app.request()`
type AppEnv = { Bindings: Partial<HttpBindings> }

/**
 * GitLab retries a hook that does not answer in time and ignores the status
 * code, so every POST is acknowledged with 200 as soon as it is queued.
 */
export function createApp(controller: DispatchController): OpenAPIHono<AppEnv> {
  const app = new OpenAPIHono<AppEnv>()

  app.get('/', (c) => {
    return c.text('Webhook runner is running')
  })

  app.openapi(
    createRoute({
      method: 'get',
      path: '/api/rules',
      responses: {
        200: {
          description: 'Rules currently loaded, in evaluation order',
        },
      },
    }),
    (c) => {
      const data = controller.rules.map(rule => rule.toDescription())
      return c.json({ data, total: data.length })
    }
  )

  app.post('*', async (c) => {
    const traceId = createEventTraceId()
    const log = createLoggerWithTrace(traceId, '[HTTPD]')
    const incoming = c.env?.incoming

    // the raw request target, dot segments and all; `c.req.url` is normalized
    const path = incoming?.url ?? pathFromUrl(c.req.url)
    const clientAddress = incoming?.socket.remoteAddress ?? 'unknown'
    const requestLine = `${c.req.method} ${path} HTTP/${incoming?.httpVersion ?? '1.1'}`

    log.debug(`Parsing incoming request from ${clientAddress}`)

    let pairs: Array<[string, string]>
    if (incoming) {
      pairs = pairRawHeaders(incoming.rawHeaders)
    } else {
      pairs = []
      c.req.raw.headers.forEach((value, name) => pairs.push([name, value]))
    }

    let body: Buffer | null = null
    if (c.req.header('Content-Length') !== undefined) {
      try {
        body = Buffer.from(await c.req.arrayBuffer())
      } catch (error) {
        log.error('Unable to read request body:', error)
      }
    }

    const request: WebhookRequest = {
      traceId,
      clientAddress,
      path,
      requestLine,
      headers: buildHeaders(pairs),
      body,
    }

    try {
      controller.submit(request)
      log.debug('Pushed request into dispatch queue')
    } catch (error) {
      log.error('Unable to push request into dispatch queue:', error)
    }

    log.info(`"${requestLine}" 200 from ${clientAddress}`)
    return c.body(null, 200)
  })

  return app
}
