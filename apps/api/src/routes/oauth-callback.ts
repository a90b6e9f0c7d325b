/**
 * OAuth Callback Route
 *
 * Redirect target for the loopback flow. Answers the browser with a small
 * HTML page; the shell learns the outcome by polling.
 */

import { Elysia, t } from 'elysia'
import { CALLBACK_PATH, type LoopbackAuthorizationFlow } from '../../lib/auth'
import { InvalidCallbackStateError } from '../../lib/errors'

export interface OAuthCallbackControllerDeps {
  loopbackFlow: LoopbackAuthorizationFlow
}

const HTML_ESCAPES: Record<string, string> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
  '"': '&quot;',
  "'": '&#39;',
}

export function escapeHtml(value: string): string {
  return value.replace(/[&<>"']/g, (ch) => HTML_ESCAPES[ch] ?? ch)
}

function page(title: string, message: string, status: number): Response {
  const body = `<!doctype html>
<html>
  <head><meta charset="utf-8"><title>${escapeHtml(title)}</title></head>
  <body>
    <h1>${escapeHtml(title)}</h1>
    <p>${escapeHtml(message)}</p>
  </body>
</html>
`
  return new Response(body, {
    status,
    headers: { 'Content-Type': 'text/html; charset=utf-8' },
  })
}

export function oauthCallbackController(deps: OAuthCallbackControllerDeps) {
  const { loopbackFlow } = deps

  return new Elysia().get(
    CALLBACK_PATH,
    ({ query }) => {
      try {
        const result = loopbackFlow.callback(query)
        if (result.status === 'denied') {
          return page('Authorization denied', `The provider reported: ${result.error}`, 200)
        }
        return page('Signed in', 'You can close this window and return to the terminal.', 200)
      } catch (err) {
        if (err instanceof InvalidCallbackStateError) {
          return page('Authorization failed', err.message, 400)
        }
        throw err
      }
    },
    {
      query: t.Object({
        state: t.Optional(t.String()),
        code: t.Optional(t.String()),
        error: t.Optional(t.String()),
      }),
    },
  )
}
