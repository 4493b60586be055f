// Every subprocess a helper starts goes through a CommandRunner, so tests can
// swap LocalRunner for a recording fake and nothing privileged runs.
import { execFile } from 'node:child_process'
import type { ProvisionContext } from './context.js'
import {
  ProvisionError,
  ProvisionErrorCode,
  isProvisionError,
} from './errors.js'
import { logger } from './logger.js'

export type Command = {
  argv: string[]
  cwd?: string
  env?: Record<string, string>
  shell?: boolean
}

export type ExecResult = {
  stdout: string
  stderr: string
  exitCode: number
  durationMs: number
}

export interface CommandRunner {
  run(command: Command): Promise<ExecResult>
}

/**
 * Layers `overrides` over `base`. Keys match case-insensitively, so an
 * inherited Windows `Path` gives way to an overriding `PATH`.
 */
export function mergeEnv(
  base: NodeJS.ProcessEnv,
  overrides: Record<string, string> = {},
): NodeJS.ProcessEnv {
  const replaced = new Set(Object.keys(overrides).map((key) => key.toUpperCase()))
  const env: NodeJS.ProcessEnv = {}

  for (const [key, value] of Object.entries(base)) {
    if (!replaced.has(key.toUpperCase())) env[key] = value
  }

  return { ...env, ...overrides }
}

export class LocalRunner implements CommandRunner {
  run(command: Command): Promise<ExecResult> {
    const [file, ...args] = command.argv
    if (file === undefined) {
      return Promise.reject(
        new ProvisionError(ProvisionErrorCode.INVALID_INPUT, 'Empty command'),
      )
    }

    const start = performance.now()

    return new Promise<ExecResult>((resolve, reject) => {
      execFile(
        file,
        args,
        {
          cwd: command.cwd,
          env: mergeEnv(process.env, command.env),
          shell: command.shell ?? false,
          maxBuffer: 10 * 1024 * 1024,
        },
        (error, stdout, stderr) => {
          const durationMs = Math.round(performance.now() - start)

          if (error && typeof error.code === 'string') {
            reject(
              new ProvisionError(
                ProvisionErrorCode.SPAWN_FAILED,
                `Command failed to start: ${file} (${error.code})`,
                { argv: command.argv },
                { cause: error },
              ),
            )
            return
          }

          const exitCode = error
            ? typeof error.code === 'number'
              ? error.code
              : 1
            : 0
          resolve({ stdout, stderr, exitCode, durationMs })
        },
      )
    })
  }
}

export type RunOptions = {
  cwd?: string
  shell?: boolean
}

function toCommand(
  ctx: ProvisionContext,
  argv: string[],
  options: RunOptions,
): Command {
  return {
    argv,
    cwd: options.cwd,
    shell: options.shell,
    env: { PATH: ctx.searchPath.toString() },
  }
}

/**
 * Runs a command with the context's search path and fails on a nonzero exit.
 */
export async function runCommand(
  ctx: ProvisionContext,
  argv: string[],
  options: RunOptions = {},
): Promise<ExecResult> {
  logger.debug({ argv, cwd: options.cwd }, 'Running command')
  const result = await ctx.runner.run(toCommand(ctx, argv, options))

  if (result.exitCode !== 0) {
    logger.error(
      { argv, exitCode: result.exitCode, stderr: result.stderr },
      'Command failed',
    )
    throw new ProvisionError(
      ProvisionErrorCode.COMMAND_FAILED,
      `Command exited with ${result.exitCode}: ${argv.join(' ')}`,
      { argv, exitCode: result.exitCode, stderr: result.stderr },
    )
  }

  return result
}

/**
 * Runs a command without failing on its exit status. Resolves to null when
 * the command cannot be started at all.
 */
export async function captureCommand(
  ctx: ProvisionContext,
  argv: string[],
): Promise<ExecResult | null> {
  try {
    return await ctx.runner.run(toCommand(ctx, argv, {}))
  } catch (error) {
    if (isProvisionError(error, ProvisionErrorCode.SPAWN_FAILED)) return null
    throw error
  }
}

/** Returns true iff the command starts and exits with status 0. */
export async function probeCommand(
  ctx: ProvisionContext,
  argv: string[],
): Promise<boolean> {
  const result = await captureCommand(ctx, argv)
  return result?.exitCode === 0
}
