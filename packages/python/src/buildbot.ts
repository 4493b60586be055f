import { existsSync } from 'node:fs'
import { homedir } from 'node:os'
import { dirname, join } from 'node:path'
import {
  captureCommand,
  logger,
  runCommand,
  type ProvisionContext,
} from '@bootstrap-kit/core'
import { installPythonPackage } from './pip.js'

export const SERVICE_ACCOUNT = 'buildbot'
export const SERVICE_HOME = '/var/lib/buildbot'
export const DEFAULT_ACCOUNT = 'vagrant'
export const DEFAULT_COORDINATOR = '10.0.2.2'
// Build agents are only reachable from their host machine.
export const AGENT_PASSWORD = 'pass'

// Newer Twisted releases need Python 2.7, which Ubuntu 10.04 lacks.
export const TWISTED_SPEC = 'twisted==15.4.0'

type Account = {
  name: string
  home: string
}

async function ensureServiceAccount(ctx: ProvisionContext): Promise<Account> {
  const entry = await captureCommand(ctx, ['getent', 'passwd', SERVICE_ACCOUNT])
  if (entry?.exitCode === 0) {
    const home = entry.stdout.trim().split(':')[5]
    return { name: SERVICE_ACCOUNT, home: home || SERVICE_HOME }
  }

  logger.info({ account: SERVICE_ACCOUNT }, 'Creating build agent account')
  await runCommand(ctx, [
    'sudo',
    'useradd',
    '--system',
    '--home',
    SERVICE_HOME,
    '--create-home',
    '--shell',
    '/bin/false',
    SERVICE_ACCOUNT,
  ])
  return { name: SERVICE_ACCOUNT, home: SERVICE_HOME }
}

async function resolveAccount(ctx: ProvisionContext): Promise<Account> {
  if (ctx.platform.platform === 'linux') {
    return ensureServiceAccount(ctx)
  }
  return { name: DEFAULT_ACCOUNT, home: join(dirname(homedir()), DEFAULT_ACCOUNT) }
}

export type InstallBuildAgentOptions = {
  /** Agent directory; defaults to `slave` in the account's home. */
  path?: string
  /** Directory holding the `buildslave` script. */
  scriptDir?: string
  shell?: boolean
  /** Address of the build coordinator. */
  coordinator?: string
}

/**
 * Creates a buildbot agent called `name`.
 *
 * @returns the agent directory, or null when it already exists
 */
export async function installBuildAgent(
  ctx: ProvisionContext,
  name: string,
  options: InstallBuildAgentOptions = {},
): Promise<string | null> {
  const { scriptDir = '', shell = false, coordinator = DEFAULT_COORDINATOR } =
    options

  const account = await resolveAccount(ctx)
  const path = options.path || join(account.home, 'slave')
  if (existsSync(path)) {
    return null
  }

  await installPythonPackage(ctx, TWISTED_SPEC)
  await installPythonPackage(ctx, 'buildbot-slave', 'buildbot')

  const create = [
    join(scriptDir, 'buildslave'),
    'create-slave',
    path,
    coordinator,
    name,
    AGENT_PASSWORD,
  ]
  const argv = ctx.platform.isWindows
    ? create
    : ['sudo', '-u', account.name, ...create]

  logger.info({ name, path, coordinator }, 'Creating build agent')
  await runCommand(ctx, argv, { shell })
  return path
}
