/**
 * Refresh token storage for the networked shell.
 *
 * The server never sees the refresh token; the CLI keeps it in
 * `$TABULA_HOME/credentials.json` (default `~/.tabula`), readable by the
 * owner only.
 */

import { chmod, mkdir, readFile, rm, writeFile } from 'node:fs/promises'
import { homedir } from 'node:os'
import { dirname, join } from 'node:path'
import type { RefreshTokenStore } from '@tabula/core'
import { z } from 'zod'

const credentialsFileSchema = z.object({
  refreshToken: z.string().min(1),
  savedAt: z.string(),
})

export function defaultCredentialsPath(env: NodeJS.ProcessEnv = process.env): string {
  const home = env.TABULA_HOME || join(homedir(), '.tabula')
  return join(home, 'credentials.json')
}

function isNotFound(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT'
}

/** Unparseable text yields undefined, which the schema then rejects. */
function parseJson(text: string): unknown {
  try {
    return JSON.parse(text)
  } catch {
    return undefined
  }
}

export class FileRefreshTokenStore implements RefreshTokenStore {
  constructor(readonly path: string = defaultCredentialsPath()) {}

  async get(): Promise<string | undefined> {
    let text: string
    try {
      text = await readFile(this.path, 'utf-8')
    } catch (err) {
      if (isNotFound(err)) return undefined
      throw err
    }

    const parsed = credentialsFileSchema.safeParse(parseJson(text))
    if (!parsed.success) {
      throw new Error(`Malformed credentials file ${this.path}; run \`tabula login\` again`)
    }
    return parsed.data.refreshToken
  }

  async set(refreshToken: string): Promise<void> {
    await mkdir(dirname(this.path), { recursive: true, mode: 0o700 })
    const body = { refreshToken, savedAt: new Date().toISOString() }
    await writeFile(this.path, `${JSON.stringify(body, null, 2)}\n`, { mode: 0o600 })
    // writeFile keeps the mode of an existing file
    await chmod(this.path, 0o600)
  }

  async clear(): Promise<void> {
    await rm(this.path, { force: true })
  }
}
