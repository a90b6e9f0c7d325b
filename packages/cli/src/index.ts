#!/usr/bin/env -S npx --no-install tsx
import { OAuthClient, oauthConfigFromEnv } from '@tabula/core'
import { program } from 'commander'
import { createClient } from './client'
import { FileRefreshTokenStore } from './credentials'
import { deviceLogin, logout, loopbackLogin, refreshLogin } from './login'

const DEFAULT_API_URL = process.env.TABULA_API_URL ?? 'http://127.0.0.1:8000'

function fail(e: unknown, fallback: string): never {
  console.error(e instanceof Error ? e.message : fallback)
  process.exit(1)
}

function deps(url: string) {
  return {
    client: createClient(url),
    oauth: new OAuthClient(oauthConfigFromEnv(process.env)),
    refreshTokens: new FileRefreshTokenStore(),
    print: (line: string) => console.log(line),
  }
}

program.name('tabula').description('CLI for the Tabula table store').version('0.1.0')

// ─────────────────────────────────────────────────────────────────────────────
// Credentials
// ─────────────────────────────────────────────────────────────────────────────

program
  .command('login')
  .description('Sign in to the remote store (device flow unless --loopback)')
  .option('--loopback', 'Sign in through a browser redirect to the server')
  .option('-u, --url <url>', 'Tabula API URL', DEFAULT_API_URL)
  .action(async (options: { loopback?: boolean; url: string }) => {
    try {
      const login = options.loopback ? loopbackLogin : deviceLogin
      const grant = await login(deps(options.url))
      console.log(`Signed in (token valid for ${grant.expiresIn}s)`)
    } catch (e) {
      fail(e, 'Login failed')
    }
  })

program
  .command('refresh')
  .description('Exchange the stored refresh token for a new access token')
  .option('-u, --url <url>', 'Tabula API URL', DEFAULT_API_URL)
  .action(async (options: { url: string }) => {
    try {
      const grant = await refreshLogin(deps(options.url))
      console.log(`Access token refreshed (valid for ${grant.expiresIn}s)`)
    } catch (e) {
      fail(e, 'Refresh failed')
    }
  })

program
  .command('logout')
  .description('Purge the access token on the server and forget the refresh token')
  .option('-u, --url <url>', 'Tabula API URL', DEFAULT_API_URL)
  .action(async (options: { url: string }) => {
    try {
      await logout(deps(options.url))
      console.log('Signed out')
    } catch (e) {
      fail(e, 'Logout failed')
    }
  })

program
  .command('status')
  .description('Show whether the server holds a valid access token')
  .option('-u, --url <url>', 'Tabula API URL', DEFAULT_API_URL)
  .action(async (options: { url: string }) => {
    try {
      const status = await createClient(options.url).authStatus()
      console.log(
        status.authenticated ? `Signed in until ${status.expiresAt ?? 'unknown'}` : 'Not signed in',
      )
    } catch (e) {
      fail(e, 'Status failed')
    }
  })

// ─────────────────────────────────────────────────────────────────────────────
// Databases
// ─────────────────────────────────────────────────────────────────────────────

const dbCommand = program.command('db').description('Manage local databases')

dbCommand
  .command('list')
  .description('List local and enrolled databases')
  .option('-u, --url <url>', 'Tabula API URL', DEFAULT_API_URL)
  .action(async (options: { url: string }) => {
    try {
      const databases = await createClient(options.url).listDatabases()
      if (databases.length === 0) {
        console.log('No databases')
        return
      }
      for (const db of databases) {
        console.log(`  ${db.name.padEnd(40)} ${db.enrolled ? 'sync on' : 'sync off'}`)
      }
    } catch (e) {
      fail(e, 'List failed')
    }
  })

dbCommand
  .command('rename <name> <new-name>')
  .description('Rename a database, moving its sync enrollment with it')
  .option('-u, --url <url>', 'Tabula API URL', DEFAULT_API_URL)
  .action(async (name: string, newName: string, options: { url: string }) => {
    try {
      await createClient(options.url).renameDatabase(name, newName)
      console.log(`Renamed ${name} to ${newName}`)
    } catch (e) {
      fail(e, 'Rename failed')
    }
  })

dbCommand
  .command('delete <name>')
  .description('Delete a database locally (the remote copy is kept)')
  .option('-u, --url <url>', 'Tabula API URL', DEFAULT_API_URL)
  .option('--force', 'Skip confirmation')
  .action(async (name: string, options: { url: string; force?: boolean }) => {
    if (!options.force) {
      console.log(`This will delete the local snapshot and sync state of ${name}`)
      console.log('Use --force to skip this confirmation')
      process.exit(1)
    }

    try {
      await createClient(options.url).deleteDatabase(name)
      console.log(`Deleted ${name}`)
    } catch (e) {
      fail(e, 'Delete failed')
    }
  })

// ─────────────────────────────────────────────────────────────────────────────
// Sync
// ─────────────────────────────────────────────────────────────────────────────

const syncCommand = program.command('sync').description('Manage background sync')

syncCommand
  .command('enable <name>')
  .description('Upload the database periodically')
  .option('-u, --url <url>', 'Tabula API URL', DEFAULT_API_URL)
  .action(async (name: string, options: { url: string }) => {
    try {
      await createClient(options.url).enableSync(name)
      console.log(`Sync enabled for ${name}`)
    } catch (e) {
      fail(e, 'Enable failed')
    }
  })

syncCommand
  .command('disable <name>')
  .description('Stop uploading the database')
  .option('-u, --url <url>', 'Tabula API URL', DEFAULT_API_URL)
  .action(async (name: string, options: { url: string }) => {
    try {
      await createClient(options.url).disableSync(name)
      console.log(`Sync disabled for ${name}`)
    } catch (e) {
      fail(e, 'Disable failed')
    }
  })

syncCommand
  .command('status <name>')
  .description('Show the sync state of a database')
  .option('-u, --url <url>', 'Tabula API URL', DEFAULT_API_URL)
  .action(async (name: string, options: { url: string }) => {
    try {
      const status = await createClient(options.url).syncStatus(name)
      console.log(JSON.stringify(status, null, 2))
    } catch (e) {
      fail(e, 'Status failed')
    }
  })

// ─────────────────────────────────────────────────────────────────────────────
// Remote copies
// ─────────────────────────────────────────────────────────────────────────────

const remoteCommand = program.command('remote').description('Uploaded copies in the remote store')

remoteCommand
  .command('list')
  .description('List uploaded copies')
  .option('-u, --url <url>', 'Tabula API URL', DEFAULT_API_URL)
  .action(async (options: { url: string }) => {
    try {
      const copies = await createClient(options.url).listRemote()
      if (copies.length === 0) {
        console.log('No remote copies')
        return
      }
      for (const copy of copies) {
        const size = copy.size === undefined ? '' : `${copy.size} B`
        console.log(`  ${copy.name.padEnd(40)} ${size.padEnd(12)} ${copy.modifiedAt ?? ''}`)
      }
    } catch (e) {
      fail(e, 'List failed')
    }
  })

remoteCommand
  .command('restore <name>')
  .description('Replace the local snapshot with the uploaded copy')
  .option('--from <source>', 'Restore the copy uploaded under another name')
  .option('-u, --url <url>', 'Tabula API URL', DEFAULT_API_URL)
  .action(async (name: string, options: { from?: string; url: string }) => {
    try {
      const restored = await createClient(options.url).restoreDatabase(name, options.from)
      console.log(`Restored ${restored.name} (${restored.tables} tables)`)
    } catch (e) {
      fail(e, 'Restore failed')
    }
  })

program.parseAsync().catch((e: unknown) => fail(e, 'Command failed'))
